import type { FormatCodec } from "../format-codec.js";

/**
 * Options for the JSON codec.
 */
export interface JsonCodecOptions {
	readonly reviver?: (key: string, value: unknown) => unknown;
}

/**
 * Creates a JSON codec.
 *
 * @param options - Optional configuration for JSON parsing
 * @param options.reviver - Passed through to `JSON.parse`
 * @returns A FormatCodec for JSON text
 *
 * @example
 * ```typescript
 * const codec = jsonCodec()
 * const layer = makeTreeParserLayer([codec])
 * ```
 */
export const jsonCodec = (options?: JsonCodecOptions): FormatCodec => ({
	name: "json",
	extensions: ["json"],
	parse: (raw: string): unknown => JSON.parse(raw, options?.reviver),
});

import YAML from "yaml";
import type { FormatCodec } from "../format-codec.js";

/**
 * Options for the YAML codec.
 */
export interface YamlCodecOptions {
	readonly uniqueKeys?: boolean;
	readonly maxAliasCount?: number;
}

/**
 * Creates a YAML codec.
 *
 * @param options - Optional configuration for YAML parsing
 * @param options.uniqueKeys - Reject mappings with duplicate keys (default: true)
 * @param options.maxAliasCount - Alias expansion limit against billion-laughs input (default: 100)
 * @returns A FormatCodec for YAML text
 *
 * @example
 * ```typescript
 * const codec = yamlCodec({ maxAliasCount: 10 })
 * const layer = makeTreeParserLayer([codec])
 * ```
 */
export const yamlCodec = (options?: YamlCodecOptions): FormatCodec => {
	const uniqueKeys = options?.uniqueKeys ?? true;
	const maxAliasCount = options?.maxAliasCount ?? 100;

	return {
		name: "yaml",
		extensions: ["yaml", "yml"],
		parse: (raw: string): unknown =>
			YAML.parse(raw, { uniqueKeys, maxAliasCount }),
	};
};

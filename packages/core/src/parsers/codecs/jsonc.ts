import jsonc, { type ParseError } from "jsonc-parser";
import type { FormatCodec } from "../format-codec.js";

/**
 * Options for the JSONC codec.
 */
export interface JsoncCodecOptions {
	readonly allowTrailingComma?: boolean;
}

/**
 * Creates a JSONC (JSON with Comments) codec.
 *
 * jsonc-parser recovers from syntax errors instead of throwing, so the
 * collected errors are turned into a thrown Error here: a malformed file
 * must not decode as a partial tree.
 *
 * @param options - Optional configuration for JSONC parsing
 * @param options.allowTrailingComma - Accept trailing commas (default: true)
 * @returns A FormatCodec for JSONC text
 */
export const jsoncCodec = (options?: JsoncCodecOptions): FormatCodec => {
	const allowTrailingComma = options?.allowTrailingComma ?? true;

	return {
		name: "jsonc",
		extensions: ["jsonc"],
		parse: (raw: string): unknown => {
			const errors: ParseError[] = [];
			const parsed: unknown = jsonc.parse(raw, errors, {
				allowTrailingComma,
				disallowComments: false,
			});
			const first = errors[0];
			if (first !== undefined) {
				throw new Error(
					`${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`,
				);
			}
			return parsed;
		},
	};
};

import JSON5 from "json5";
import type { FormatCodec } from "../format-codec.js";

/**
 * Creates a JSON5 codec.
 *
 * JSON5 is a superset of JSON that allows comments, trailing commas,
 * unquoted keys, and other human-friendly syntax.
 *
 * @returns A FormatCodec for JSON5 text
 */
export const json5Codec = (): FormatCodec => ({
	name: "json5",
	extensions: ["json5"],
	parse: (raw: string): unknown => JSON5.parse(raw),
});

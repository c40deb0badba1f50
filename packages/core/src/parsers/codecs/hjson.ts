import Hjson from "hjson";
import type { FormatCodec } from "../format-codec.js";

/**
 * Creates an Hjson (Human JSON) codec.
 *
 * Hjson allows `//`, block and `#` comments, unquoted keys and strings,
 * trailing commas, and multiline strings with `'''`.
 *
 * @returns A FormatCodec for Hjson text
 *
 * @see https://hjson.github.io for format specification
 */
export const hjsonCodec = (): FormatCodec => ({
	name: "hjson",
	extensions: ["hjson"],
	parse: (raw: string): unknown => Hjson.parse(raw),
});

import * as TOML from "smol-toml";
import type { FormatCodec } from "../format-codec.js";

/**
 * Replace TOML date-times with their ISO strings so the result only holds
 * JSON kinds.
 */
const toTree = (data: unknown): unknown => {
	if (data instanceof Date) {
		return data.toISOString();
	}
	if (Array.isArray(data)) {
		return data.map(toTree);
	}
	if (typeof data === "object" && data !== null) {
		return Object.fromEntries(
			Object.entries(data).map(([key, value]) => [key, toTree(value)]),
		);
	}
	return data;
};

/**
 * Creates a TOML codec.
 *
 * @remarks
 * - TOML has no null, so `nullLiteral` and `optional`'s null rule never
 *   see one from this format
 * - Dates are decoded as ISO-8601 strings
 *
 * @returns A FormatCodec for TOML text
 */
export const tomlCodec = (): FormatCodec => ({
	name: "toml",
	extensions: ["toml"],
	parse: (raw: string): unknown => toTree(TOML.parse(raw)),
});

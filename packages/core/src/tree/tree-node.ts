/**
 * Structural view of a tree value.
 *
 * Decoders never probe input with try/catch; they classify it once and
 * match on the resulting tag.
 */

import { Option } from "effect";

// ============================================================================
// TreeNode
// ============================================================================

export type TreeNode =
	| { readonly _tag: "Null" }
	| { readonly _tag: "Boolean"; readonly value: boolean }
	| { readonly _tag: "Number"; readonly value: number }
	| { readonly _tag: "String"; readonly value: string }
	| { readonly _tag: "Array"; readonly items: ReadonlyArray<unknown> }
	| {
			readonly _tag: "Object";
			readonly fields: Readonly<Record<string, unknown>>;
	  }
	| { readonly _tag: "Foreign"; readonly value: unknown };

export type TreeKind = TreeNode["_tag"];

export const isRecord = (
	value: unknown,
): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Classify an arbitrary value. Total: anything that is not a JSON value
 * (undefined, functions, symbols, bigints) is `Foreign`.
 */
export const classify = (value: unknown): TreeNode => {
	if (value === null) {
		return { _tag: "Null" };
	}
	if (Array.isArray(value)) {
		return { _tag: "Array", items: value };
	}
	if (isRecord(value)) {
		return { _tag: "Object", fields: value };
	}
	switch (typeof value) {
		case "boolean":
			return { _tag: "Boolean", value };
		case "number":
			return { _tag: "Number", value };
		case "string":
			return { _tag: "String", value };
		default:
			return { _tag: "Foreign", value };
	}
};

/**
 * Look up an own property. A property holding `undefined` counts as absent,
 * since no text format can produce one.
 */
export const lookupKey = (
	fields: Readonly<Record<string, unknown>>,
	key: string,
): Option.Option<unknown> => {
	if (!Object.prototype.hasOwnProperty.call(fields, key)) {
		return Option.none();
	}
	const value = fields[key];
	return value === undefined ? Option.none() : Option.some(value);
};

// ============================================================================
// Descriptions for error messages
// ============================================================================

const MAX_PREVIEW = 40;

const preview = (text: string): string => {
	const chars = Array.from(text);
	return chars.length > MAX_PREVIEW
		? `${chars.slice(0, MAX_PREVIEW - 3).join("")}...`
		: text;
};

/**
 * Short human description of a value, e.g. `number 5`, `string "five"`,
 * `array (length 2)`.
 */
export const describeValue = (value: unknown): string => {
	const node = classify(value);
	switch (node._tag) {
		case "Null":
			return "null";
		case "Boolean":
			return `boolean ${node.value}`;
		case "Number":
			return `number ${node.value}`;
		case "String":
			return `string ${preview(JSON.stringify(node.value))}`;
		case "Array":
			return `array (length ${node.items.length})`;
		case "Object":
			return "object";
		case "Foreign":
			return typeof node.value;
	}
};

import { Context, type Effect } from "effect";
import type {
	TextParseError,
	UnsupportedFormatError,
} from "../errors/text-errors.js";

// ============================================================================
// TreeParser Effect Service
// ============================================================================

export interface TreeParserShape {
	/**
	 * Parse raw text into a tree value using the codec registered for
	 * `format` (a file extension without the dot, e.g. "yaml").
	 */
	readonly parse: (
		content: string,
		format: string,
	) => Effect.Effect<unknown, TextParseError | UnsupportedFormatError>;
	/**
	 * Every extension with a registered codec.
	 */
	readonly formats: ReadonlyArray<string>;
}

export class TreeParser extends Context.Tag("TreeParser")<
	TreeParser,
	TreeParserShape
>() {}

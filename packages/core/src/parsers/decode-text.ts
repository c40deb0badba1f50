import { Effect, Either } from "effect";
import type { Decoder } from "../decoder/decoder.js";
import type { DecodeError } from "../errors/decode-errors.js";
import {
	TextParseError,
	type UnsupportedFormatError,
} from "../errors/text-errors.js";
import { TreeParser } from "./tree-parser-service.js";

/**
 * Parse JSON text and decode it, synchronously.
 *
 * @example
 * decodeString(field("a", string), '{"a":"foo"}') // Right("foo")
 */
export const decodeString = <A>(
	decoder: Decoder<A>,
	json: string,
): Either.Either<A, DecodeError | TextParseError> =>
	Either.try({
		try: (): unknown => JSON.parse(json),
		catch: (error) =>
			new TextParseError({
				format: "json",
				message: `Failed to parse json text: ${error instanceof Error ? error.message : "Unknown error"}`,
				cause: error,
			}),
	}).pipe(Either.flatMap((tree) => decoder.decode(tree)));

/**
 * Parse `content` with the TreeParser codec registered for `format`, then
 * decode the resulting tree.
 */
export const decodeText = <A>(
	decoder: Decoder<A>,
	content: string,
	format: string,
): Effect.Effect<
	A,
	DecodeError | TextParseError | UnsupportedFormatError,
	TreeParser
> =>
	Effect.gen(function* () {
		const parser = yield* TreeParser;
		const tree = yield* parser.parse(content, format);
		return yield* decoder.decode(tree);
	});

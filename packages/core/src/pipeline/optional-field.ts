/**
 * Fallback resolution for optional fields.
 *
 * At the last key of the path, with the current node an object:
 *
 * | key present | raw value | decoder on raw   | result             |
 * | ----------- | --------- | ---------------- | ------------------ |
 * | no          |           |                  | fallback           |
 * | yes         | not null  | accepts → V      | V                  |
 * | yes         | not null  | rejects          | the decoder's error |
 * | yes         | null      | accepts → V      | V                  |
 * | yes         | null      | rejects          | fallback           |
 *
 * Walking to the last key, an absent key or a `null` container counts as
 * absent. The input itself, and any non-null intermediate value, must be
 * an object: otherwise the lookup fails with `NotAContainer`.
 */

import { Either, Option } from "effect";
import { type Decoder, make } from "../decoder/decoder.js";
import {
	type DecodeError,
	notAContainer,
	prefixPath,
} from "../errors/decode-errors.js";
import { classify, lookupKey } from "../tree/tree-node.js";

const decodeLeaf = <A>(
	raw: unknown,
	decoder: Decoder<A>,
	fallback: A,
): Either.Either<A, DecodeError> => {
	const result = decoder.decode(raw);
	if (Either.isLeft(result) && raw === null) {
		return Either.right(fallback);
	}
	return result;
};

const walk = <A>(
	node: unknown,
	path: ReadonlyArray<string>,
	depth: number,
	decoder: Decoder<A>,
	fallback: A,
): Either.Either<A, DecodeError> => {
	if (depth === path.length) {
		return decodeLeaf(node, decoder, fallback);
	}
	const key = path[depth];
	const tree = classify(node);
	switch (tree._tag) {
		case "Object":
			return Option.match(lookupKey(tree.fields, key), {
				onNone: () => Either.right(fallback),
				onSome: (raw) =>
					Either.mapLeft(
						walk(raw, path, depth + 1, decoder, fallback),
						(error) => prefixPath(error, key),
					),
			});
		case "Null":
			// Only a null reached through a key stands for an absent container.
			return depth > 0
				? Either.right(fallback)
				: Either.left(notAContainer([], key, node));
		case "Array":
		case "Boolean":
		case "Number":
		case "String":
		case "Foreign":
			return Either.left(notAContainer([], key, node));
	}
};

export const optionalDecoder = <A>(
	path: ReadonlyArray<string>,
	decoder: Decoder<A>,
	fallback: A,
): Decoder<A> => make((input) => walk(input, path, 0, decoder, fallback));

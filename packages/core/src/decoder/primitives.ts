/**
 * Primitive decoders over tree values: scalars, containers, lookups and the
 * small set of combinators the pipeline module builds on.
 *
 * Every container decoder re-roots the errors of its children with
 * `prefixPath`, so a failure deep inside a structure reports the full path
 * from the input it was given.
 */

import { Either, Option, Schema } from "effect";
import {
	type DecodeError,
	fieldMissing,
	noMatchingAlternative,
	notAContainer,
	prefixPath,
	resolvedFailure,
	typeMismatch,
} from "../errors/decode-errors.js";
import { classify, lookupKey } from "../tree/tree-node.js";
import { type Decoder, make } from "./decoder.js";

// ============================================================================
// Constants
// ============================================================================

/**
 * Always succeeds with `value`, ignoring the input.
 */
export const succeed = <A>(value: A): Decoder<A> =>
	make(() => Either.right(value));

/**
 * Always fails with a `ResolvedFailure` carrying `reason`.
 */
export const fail = (reason: string): Decoder<never> =>
	make(() => Either.left(resolvedFailure([], reason)));

/**
 * Captures the raw tree value without inspecting it.
 */
export const value: Decoder<unknown> = make((input) => Either.right(input));

// ============================================================================
// Scalars
// ============================================================================

export const string: Decoder<string> = make((input) =>
	typeof input === "string"
		? Either.right(input)
		: Either.left(typeMismatch([], "string", input)),
);

export const number: Decoder<number> = make((input) =>
	typeof input === "number" && !Number.isNaN(input)
		? Either.right(input)
		: Either.left(typeMismatch([], "number", input)),
);

export const integer: Decoder<number> = make((input) =>
	typeof input === "number" && Number.isInteger(input)
		? Either.right(input)
		: Either.left(typeMismatch([], "integer", input)),
);

export const boolean: Decoder<boolean> = make((input) =>
	typeof input === "boolean"
		? Either.right(input)
		: Either.left(typeMismatch([], "boolean", input)),
);

/**
 * Accepts only `null` and succeeds with `value`.
 *
 * @example
 * decodeValue(nullLiteral(0), null) // Right(0)
 * decodeValue(nullLiteral(0), 1) // Left(TypeMismatch)
 */
export const nullLiteral = <A>(value: A): Decoder<A> =>
	make((input) =>
		input === null
			? Either.right(value)
			: Either.left(typeMismatch([], "null", input)),
	);

/**
 * `null` decodes to `null`; anything else goes to `decoder`.
 */
export const nullable = <A>(decoder: Decoder<A>): Decoder<A | null> =>
	make<A | null>((input) =>
		input === null ? Either.right(null) : decoder.decode(input),
	);

/**
 * Accepts exactly one of the given scalar values.
 */
export const literal = <L extends string | number | boolean | null>(
	...values: ReadonlyArray<L>
): Decoder<L> => {
	const expected =
		values.length === 1
			? JSON.stringify(values[0])
			: `one of ${values.map((v) => JSON.stringify(v)).join(", ")}`;
	return make((input) => {
		const match = values.find((candidate) => candidate === input);
		return match !== undefined
			? Either.right(match)
			: Either.left(typeMismatch([], expected, input));
	});
};

// ============================================================================
// Containers
// ============================================================================

export const array = <A>(decoder: Decoder<A>): Decoder<ReadonlyArray<A>> =>
	make<ReadonlyArray<A>>((input) => {
		const node = classify(input);
		if (node._tag !== "Array") {
			return Either.left(typeMismatch([], "array", input));
		}
		const decoded: A[] = [];
		for (let i = 0; i < node.items.length; i++) {
			const result = decoder.decode(node.items[i]);
			if (Either.isLeft(result)) {
				return Either.left(prefixPath(result.left, i));
			}
			decoded.push(result.right);
		}
		return Either.right(decoded);
	});

/**
 * Decodes every value of an object, in key order.
 */
export const keyValuePairs = <A>(
	decoder: Decoder<A>,
): Decoder<ReadonlyArray<readonly [string, A]>> =>
	make<ReadonlyArray<readonly [string, A]>>((input) => {
		const node = classify(input);
		if (node._tag !== "Object") {
			return Either.left(typeMismatch([], "object", input));
		}
		const decoded: Array<readonly [string, A]> = [];
		for (const [key, raw] of Object.entries(node.fields)) {
			if (raw === undefined) continue;
			const result = decoder.decode(raw);
			if (Either.isLeft(result)) {
				return Either.left(prefixPath(result.left, key));
			}
			decoded.push([key, result.right]);
		}
		return Either.right(decoded);
	});

export const dict = <A>(
	decoder: Decoder<A>,
): Decoder<Readonly<Record<string, A>>> =>
	map((pairs: ReadonlyArray<readonly [string, A]>) =>
		Object.fromEntries(pairs),
	)(keyValuePairs(decoder));

/**
 * Decodes the element at position `i` of an array.
 */
export const index = <A>(i: number, decoder: Decoder<A>): Decoder<A> =>
	make((input) => {
		const node = classify(input);
		if (node._tag !== "Array") {
			return Either.left(notAContainer([], i, input));
		}
		if (i < 0 || i >= node.items.length) {
			return Either.left(fieldMissing([i]));
		}
		return Either.mapLeft(decoder.decode(node.items[i]), (error) =>
			prefixPath(error, i),
		);
	});

// ============================================================================
// Object lookups
// ============================================================================

/**
 * Decodes the value under `key` of an object.
 *
 * - input not an object: `NotAContainer`
 * - key absent: `FieldMissing`
 * - value rejected: the child's error, re-rooted under `key`
 */
export const field = <A>(key: string, decoder: Decoder<A>): Decoder<A> =>
	make((input) => {
		const node = classify(input);
		if (node._tag !== "Object") {
			return Either.left(notAContainer([], key, input));
		}
		return Option.match(lookupKey(node.fields, key), {
			onNone: () => Either.left(fieldMissing([key])),
			onSome: (raw) =>
				Either.mapLeft(decoder.decode(raw), (error) => prefixPath(error, key)),
		});
	});

/**
 * Decodes the value at a nested key path. An empty path runs `decoder` on
 * the input itself.
 *
 * @example
 * at(["profile", "name"], string)
 */
export const at = <A>(
	path: ReadonlyArray<string>,
	decoder: Decoder<A>,
): Decoder<A> =>
	path.reduceRight<Decoder<A>>((inner, key) => field(key, inner), decoder);

// ============================================================================
// Combinators
// ============================================================================

export const map =
	<A, B>(f: (a: A) => B) =>
	(self: Decoder<A>): Decoder<B> =>
		make((input) => Either.map(self.decode(input), f));

/**
 * Run two decoders on the same input and combine their results. The first
 * failure wins.
 */
export const map2 = <A, B, C>(
	f: (a: A, b: B) => C,
	first: Decoder<A>,
	second: Decoder<B>,
): Decoder<C> =>
	make((input) =>
		Either.flatMap(first.decode(input), (a) =>
			Either.map(second.decode(input), (b) => f(a, b)),
		),
	);

/**
 * Decode with `self`, then pick the next decoder from its result and run
 * it on the same input.
 */
export const andThen =
	<A, B>(f: (a: A) => Decoder<B>) =>
	(self: Decoder<A>): Decoder<B> =>
		make((input) =>
			Either.flatMap(self.decode(input), (a) => f(a).decode(input)),
		);

/**
 * Tries each decoder in order and returns the first success. When all of
 * them fail the error lists every alternative's failure.
 */
export const oneOf = <A>(decoders: ReadonlyArray<Decoder<A>>): Decoder<A> =>
	make((input) => {
		const failures: DecodeError[] = [];
		for (const decoder of decoders) {
			const result = decoder.decode(input);
			if (Either.isRight(result)) {
				return result;
			}
			failures.push(result.left);
		}
		return Either.left(noMatchingAlternative([], failures));
	});

/**
 * Defers construction, for recursive structures.
 *
 * @example
 * interface Tree { readonly label: string; readonly children: ReadonlyArray<Tree> }
 * const tree: Decoder<Tree> = pipe(
 *   decode((label: string) => (children: ReadonlyArray<Tree>) => ({ label, children })),
 *   required("label", string),
 *   optional("children", array(lazy(() => tree)), []),
 * )
 */
export const lazy = <A>(thunk: () => Decoder<A>): Decoder<A> =>
	make((input) => thunk().decode(input));

// ============================================================================
// Schema adapter
// ============================================================================

/**
 * Use an Effect Schema as a leaf decoder. A parse failure becomes a
 * `TypeMismatch` naming the schema.
 *
 * @example
 * const port = fromSchema(Schema.NumberFromString)
 */
export const fromSchema = <A, I>(
	schema: Schema.Schema<A, I, never>,
): Decoder<A> => {
	const decodeEither = Schema.decodeUnknownEither(schema);
	const expected = String(schema.ast);
	return make((input) =>
		Either.mapLeft(decodeEither(input), () =>
			typeMismatch([], expected, input),
		),
	);
};

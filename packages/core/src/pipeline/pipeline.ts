/**
 * Pipeline combinators.
 *
 * A pipeline starts from `decode(constructor)` with a curried constructor
 * and feeds it one decoded argument per step:
 *
 * ```typescript
 * const user = pipe(
 *   decode((id: number) => (email: string) => (name: string) => ({ id, email, name })),
 *   required("id", integer),
 *   required("email", string),
 *   optional("name", string, "(anonymous)"),
 * )
 * ```
 *
 * Arguments reach the constructor in the order the steps are written,
 * whatever order the keys have in the input. A pipeline missing a step has
 * a function type, not the record type, so it does not type-check where a
 * `Decoder<User>` is expected.
 */

import { Either } from "effect";
import { type Decoder, make } from "../decoder/decoder.js";
import { at, field, succeed } from "../decoder/primitives.js";
import { resolvedFailure } from "../errors/decode-errors.js";
import { optionalDecoder } from "./optional-field.js";

// ============================================================================
// Entry
// ============================================================================

/**
 * Lift a curried constructor into a pipeline decoder. Always succeeds.
 */
export const decode = <F>(constructor: F): Decoder<F> => succeed(constructor);

// ============================================================================
// Applicative apply
// ============================================================================

/**
 * Runs `pipeline`, then `argument`, on the same input and applies the
 * pending function to the decoded argument.
 *
 * The first failure is returned unchanged. When the pipeline has already
 * failed the argument decoder is not run.
 */
export const apply = <A, B>(
	pipeline: Decoder<(a: A) => B>,
	argument: Decoder<A>,
): Decoder<B> =>
	make((input) =>
		Either.flatMap(pipeline.decode(input), (f) =>
			Either.map(argument.decode(input), f),
		),
	);

/**
 * Splice an arbitrary decoder into the next argument slot.
 *
 * @example
 * pipe(
 *   decode((a: string) => (total: number) => ({ a, total })),
 *   required("a", string),
 *   custom(map(([x, y]: readonly [number, number]) => x + y)(pairDecoder)),
 * )
 */
export const custom =
	<A>(argument: Decoder<A>) =>
	<B>(pipeline: Decoder<(a: A) => B>): Decoder<B> =>
		apply(pipeline, argument);

// ============================================================================
// Field steps
// ============================================================================

/**
 * The field must be present and accepted by `decoder`. `null` gets no
 * special treatment.
 */
export const required = <A>(key: string, decoder: Decoder<A>) =>
	custom(field(key, decoder));

/**
 * Like {@link required}, at a nested key path.
 */
export const requiredAt = <A>(
	path: ReadonlyArray<string>,
	decoder: Decoder<A>,
) => custom(at(path, decoder));

/**
 * Use `fallback` when the field is absent, or when it is `null` and
 * `decoder` rejects `null`. A present value that `decoder` rejects fails,
 * and so does an input that is not an object.
 */
export const optional = <A>(key: string, decoder: Decoder<A>, fallback: A) =>
	custom(optionalDecoder([key], decoder, fallback));

/**
 * Like {@link optional}, at a nested key path. A missing or `null`
 * intermediate container also yields `fallback`; any other non-object on
 * the way fails.
 */
export const optionalAt = <A>(
	path: ReadonlyArray<string>,
	decoder: Decoder<A>,
	fallback: A,
) => custom(optionalDecoder(path, decoder, fallback));

/**
 * Feed a constant, reading nothing from the input.
 */
export const hardcoded = <A>(value: A) => custom(succeed(value));

// ============================================================================
// Resolve
// ============================================================================

/**
 * Flatten a pipeline that produces a decoder: once the outer decoder
 * succeeds, the produced decoder runs against the same original input.
 *
 * @example
 * const versioned = resolve(
 *   pipe(
 *     decode((version: number) => (body: string) =>
 *       version > 2 ? succeed(body) : fail(`unsupported version ${version}`),
 *     ),
 *     required("version", integer),
 *     required("body", string),
 *   ),
 * )
 */
export const resolve = <A>(decoder: Decoder<Decoder<A>>): Decoder<A> =>
	make((input) =>
		Either.flatMap(decoder.decode(input), (inner) => inner.decode(input)),
	);

/**
 * Flatten a pipeline that produces an `Either`. `Left(reason)` becomes a
 * `ResolvedFailure`; `Right(value)` is the result.
 */
export const resolveResult = <A>(
	decoder: Decoder<Either.Either<A, string>>,
): Decoder<A> =>
	make((input) =>
		Either.flatMap(decoder.decode(input), (result) =>
			Either.mapLeft(result, (reason) => resolvedFailure([], reason)),
		),
	);

import { Either } from "effect";
import type { DecodeError } from "../errors/decode-errors.js";

// ============================================================================
// Decoder
// ============================================================================

/**
 * An immutable description of how to turn a tree value into an `A`.
 *
 * Decoders hold no state: running the same decoder on the same input twice
 * yields equal results, and one decoder may be shared by any number of
 * concurrent callers.
 */
export interface Decoder<A> {
	readonly _tag: "Decoder";
	readonly decode: (input: unknown) => Either.Either<A, DecodeError>;
}

/**
 * Extract the success type of a decoder.
 */
export type DecoderType<D> = D extends Decoder<infer A> ? A : never;

/**
 * Build a decoder from a run function.
 */
export const make = <A>(
	decode: (input: unknown) => Either.Either<A, DecodeError>,
): Decoder<A> => ({ _tag: "Decoder", decode });

/**
 * Run a decoder against an already parsed tree value.
 */
export const decodeValue = <A>(
	decoder: Decoder<A>,
	input: unknown,
): Either.Either<A, DecodeError> => decoder.decode(input);

export const isDecoder = (value: unknown): value is Decoder<unknown> =>
	typeof value === "object" &&
	value !== null &&
	"_tag" in value &&
	value._tag === "Decoder" &&
	"decode" in value &&
	typeof value.decode === "function";

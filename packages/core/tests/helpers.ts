import { Either } from "effect";
import type { DecodeError } from "../src/errors/decode-errors.js";

export const expectRight = <A, E extends { readonly _tag: string }>(
	result: Either.Either<A, E>,
): A => {
	if (Either.isLeft(result)) {
		throw new Error(`Expected success, got ${result.left._tag}`);
	}
	return result.right;
};

export const expectLeft = <A, E>(result: Either.Either<A, E>): E => {
	if (Either.isRight(result)) {
		throw new Error(`Expected failure, got ${JSON.stringify(result.right)}`);
	}
	return result.left;
};

/**
 * Plain-data view of a decode result, for comparing two runs.
 */
export type Outcome =
	| { readonly ok: true; readonly value: unknown }
	| { readonly ok: false; readonly tag: string; readonly message: string };

export const toOutcome = <A>(result: Either.Either<A, DecodeError>): Outcome =>
	Either.match(result, {
		onLeft: (error): Outcome => ({
			ok: false,
			tag: error._tag,
			message: error.message,
		}),
		onRight: (value): Outcome => ({ ok: true, value }),
	});

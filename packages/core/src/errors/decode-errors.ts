import { Data } from "effect";
import { describeValue } from "../tree/tree-node.js";

// ============================================================================
// Paths
// ============================================================================

/**
 * A location inside a tree value. String segments are object keys,
 * number segments are array indexes.
 */
export type PathSegment = string | number;
export type Path = ReadonlyArray<PathSegment>;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render a path the way it would be written to reach the value.
 *
 * @example
 * formatPath([]) // "$"
 * formatPath(["profile", "name"]) // "$.profile.name"
 * formatPath(["items", 0, "first name"]) // '$.items[0]["first name"]'
 */
export const formatPath = (path: Path): string => {
	let rendered = "$";
	for (const segment of path) {
		if (typeof segment === "number") {
			rendered += `[${segment}]`;
		} else if (IDENTIFIER.test(segment)) {
			rendered += `.${segment}`;
		} else {
			rendered += `[${JSON.stringify(segment)}]`;
		}
	}
	return rendered;
};

// ============================================================================
// Effect TaggedError Decode Error Types
// ============================================================================

export class FieldMissing extends Data.TaggedError("FieldMissing")<{
	readonly path: Path;
	readonly message: string;
}> {}

export class TypeMismatch extends Data.TaggedError("TypeMismatch")<{
	readonly path: Path;
	readonly expected: string;
	readonly actual: unknown;
	readonly message: string;
}> {}

export class NotAContainer extends Data.TaggedError("NotAContainer")<{
	readonly path: Path;
	readonly key: PathSegment;
	readonly actual: unknown;
	readonly message: string;
}> {}

export class ResolvedFailure extends Data.TaggedError("ResolvedFailure")<{
	readonly path: Path;
	readonly reason: string;
	readonly message: string;
}> {}

export class NoMatchingAlternative extends Data.TaggedError(
	"NoMatchingAlternative",
)<{
	readonly path: Path;
	readonly alternatives: ReadonlyArray<DecodeError>;
	readonly message: string;
}> {}

// ============================================================================
// Decode Error Union
// ============================================================================

export type DecodeError =
	| FieldMissing
	| TypeMismatch
	| NotAContainer
	| ResolvedFailure
	| NoMatchingAlternative;

// ============================================================================
// Constructors
// ============================================================================

// Messages are rendered once at construction; prefixPath rebuilds them.

export const fieldMissing = (path: Path): FieldMissing =>
	new FieldMissing({
		path,
		message: `Missing required field at ${formatPath(path)}`,
	});

export const typeMismatch = (
	path: Path,
	expected: string,
	actual: unknown,
): TypeMismatch =>
	new TypeMismatch({
		path,
		expected,
		actual,
		message: `Expected ${expected} at ${formatPath(path)}, got ${describeValue(actual)}`,
	});

export const notAContainer = (
	path: Path,
	key: PathSegment,
	actual: unknown,
): NotAContainer =>
	new NotAContainer({
		path,
		key,
		actual,
		message: `Cannot look up ${JSON.stringify(key)} at ${formatPath(path)}: expected ${typeof key === "number" ? "an array" : "an object"}, got ${describeValue(actual)}`,
	});

export const resolvedFailure = (path: Path, reason: string): ResolvedFailure =>
	new ResolvedFailure({
		path,
		reason,
		message:
			path.length === 0 ? reason : `${reason} (at ${formatPath(path)})`,
	});

export const noMatchingAlternative = (
	path: Path,
	alternatives: ReadonlyArray<DecodeError>,
): NoMatchingAlternative =>
	new NoMatchingAlternative({
		path,
		alternatives,
		message: `None of ${alternatives.length} alternatives matched at ${formatPath(path)}`,
	});

// ============================================================================
// Path prefixing
// ============================================================================

/**
 * Re-root an error produced by a child decoder under `segment`.
 *
 * Container decoders (field, at, array, dict, index) call this on the way
 * out so every reported path is absolute from the input the outermost
 * decoder received.
 */
export const prefixPath = (
	error: DecodeError,
	segment: PathSegment,
): DecodeError => {
	const path = [segment, ...error.path];
	switch (error._tag) {
		case "FieldMissing":
			return fieldMissing(path);
		case "TypeMismatch":
			return typeMismatch(path, error.expected, error.actual);
		case "NotAContainer":
			return notAContainer(path, error.key, error.actual);
		case "ResolvedFailure":
			return resolvedFailure(path, error.reason);
		case "NoMatchingAlternative":
			return noMatchingAlternative(
				path,
				error.alternatives.map((alternative) =>
					prefixPath(alternative, segment),
				),
			);
	}
};

/**
 * Prefix a whole path, innermost segment last.
 */
export const prefixPathAll = (error: DecodeError, path: Path): DecodeError =>
	path.reduceRight<DecodeError>(
		(current, segment) => prefixPath(current, segment),
		error,
	);

/**
 * Render an error as a human-readable report.
 * Nested alternatives of `oneOf` failures are indented beneath their parent.
 */
export const formatDecodeError = (error: DecodeError, depth = 0): string => {
	const indent = "  ".repeat(depth);
	if (error._tag !== "NoMatchingAlternative") {
		return `${indent}${error.message}`;
	}
	return [
		`${indent}${error.message}:`,
		...error.alternatives.map((alternative) =>
			formatDecodeError(alternative, depth + 1),
		),
	].join("\n");
};

/**
 * Type guard for any decode error produced by this library.
 */
export const isDecodeError = (value: unknown): value is DecodeError =>
	value instanceof FieldMissing ||
	value instanceof TypeMismatch ||
	value instanceof NotAContainer ||
	value instanceof ResolvedFailure ||
	value instanceof NoMatchingAlternative;

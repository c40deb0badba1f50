import { Data } from "effect";

// ============================================================================
// Effect TaggedError Text Error Types
// ============================================================================

export class TextParseError extends Data.TaggedError("TextParseError")<{
	readonly format: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class UnsupportedFormatError extends Data.TaggedError(
	"UnsupportedFormatError",
)<{
	readonly format: string;
	readonly message: string;
}> {}

// ============================================================================
// Text Error Union
// ============================================================================

export type TextError = TextParseError | UnsupportedFormatError;

/**
 * Main entry point for the pipedecode core library.
 *
 * Exports the decoder abstraction, primitive decoders, the pipeline
 * combinators, tagged errors, and the Effect service for parsing text.
 */

// ============================================================================
// Decoder
// ============================================================================

export {
	decodeValue,
	isDecoder,
	make,
} from "./decoder/decoder.js";

export type { Decoder, DecoderType } from "./decoder/decoder.js";

// ============================================================================
// Primitive Decoders
// ============================================================================

export {
	andThen,
	array,
	at,
	boolean,
	dict,
	fail,
	field,
	fromSchema,
	index,
	integer,
	keyValuePairs,
	lazy,
	literal,
	map,
	map2,
	nullable,
	nullLiteral,
	number,
	oneOf,
	string,
	succeed,
	value,
} from "./decoder/primitives.js";

// ============================================================================
// Pipeline
// ============================================================================

export {
	apply,
	custom,
	decode,
	hardcoded,
	optional,
	optionalAt,
	required,
	requiredAt,
	resolve,
	resolveResult,
} from "./pipeline/pipeline.js";

// ============================================================================
// Tree Values
// ============================================================================

export {
	classify,
	describeValue,
	isRecord,
	lookupKey,
} from "./tree/tree-node.js";

export type { TreeKind, TreeNode } from "./tree/tree-node.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	FieldMissing,
	TypeMismatch,
	NotAContainer,
	ResolvedFailure,
	NoMatchingAlternative,
	fieldMissing,
	typeMismatch,
	notAContainer,
	resolvedFailure,
	noMatchingAlternative,
	formatDecodeError,
	formatPath,
	isDecodeError,
	prefixPath,
	prefixPathAll,
} from "./errors/decode-errors.js";

export type { DecodeError, Path, PathSegment } from "./errors/decode-errors.js";

export {
	TextParseError,
	UnsupportedFormatError,
} from "./errors/text-errors.js";

export type { TextError } from "./errors/text-errors.js";

// ============================================================================
// Text Parsing
// ============================================================================

export { decodeString, decodeText } from "./parsers/decode-text.js";

export {
	makeTreeParser,
	makeTreeParserLayer,
	parseWith,
} from "./parsers/format-codec.js";

export type { FormatCodec } from "./parsers/format-codec.js";

export { TreeParser } from "./parsers/tree-parser-service.js";

export type { TreeParserShape } from "./parsers/tree-parser-service.js";

export {
	AllTextFormatsLayer,
	DefaultTreeParserLayer,
} from "./parsers/presets.js";

export { jsonCodec } from "./parsers/codecs/json.js";
export type { JsonCodecOptions } from "./parsers/codecs/json.js";
export { yamlCodec } from "./parsers/codecs/yaml.js";
export type { YamlCodecOptions } from "./parsers/codecs/yaml.js";
export { json5Codec } from "./parsers/codecs/json5.js";
export { jsoncCodec } from "./parsers/codecs/jsonc.js";
export type { JsoncCodecOptions } from "./parsers/codecs/jsonc.js";
export { tomlCodec } from "./parsers/codecs/toml.js";
export { hjsonCodec } from "./parsers/codecs/hjson.js";

import { Effect, Layer } from "effect";
import {
	TextParseError,
	UnsupportedFormatError,
} from "../errors/text-errors.js";
import { TreeParser, type TreeParserShape } from "./tree-parser-service.js";

// ============================================================================
// FormatCodec
// ============================================================================

/**
 * A FormatCodec turns raw text of one format into a tree value:
 * - A human-readable name (e.g., "json", "yaml", "toml")
 * - Supported file extensions without dots (e.g., ["yaml", "yml"])
 * - A synchronous parse function that throws on malformed input
 *
 * The compositor (makeTreeParserLayer) wraps parse in Effect.try
 * with proper error tagging.
 */
export interface FormatCodec {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly parse: (raw: string) => unknown;
}

const buildExtensionMap = (
	codecs: ReadonlyArray<FormatCodec>,
): ReadonlyMap<string, FormatCodec> => {
	const extensionMap = new Map<string, FormatCodec>();
	for (const codec of codecs) {
		for (const ext of codec.extensions) {
			const existing = extensionMap.get(ext);
			if (existing !== undefined) {
				console.warn(
					`Duplicate extension '.${ext}': '${existing.name}' overwritten by '${codec.name}'`,
				);
			}
			extensionMap.set(ext, codec);
		}
	}
	return extensionMap;
};

/**
 * Run a codec, turning anything it throws into a TextParseError.
 */
export const parseWith = (
	codec: FormatCodec,
	content: string,
): Effect.Effect<unknown, TextParseError> =>
	Effect.try({
		try: () => codec.parse(content),
		catch: (error) =>
			new TextParseError({
				format: codec.name,
				message: `Failed to parse ${codec.name} text: ${error instanceof Error ? error.message : "Unknown error"}`,
				cause: error,
			}),
	});

// ============================================================================
// makeTreeParser
// ============================================================================

/**
 * Builds a TreeParserShape from FormatCodec instances.
 *
 * 1. Builds an extension → codec lookup map (O(1) dispatch)
 * 2. Wraps parse in Effect.try with TextParseError
 * 3. Produces UnsupportedFormatError for unknown extensions
 * 4. Logs console.warn on duplicate extensions (last wins)
 *
 * @param codecs - Base codecs to register
 * @param extraCodecs - Codecs registered after the base ones; they win on a shared extension
 */
export const makeTreeParser = (
	codecs: ReadonlyArray<FormatCodec>,
	extraCodecs?: ReadonlyArray<FormatCodec>,
): TreeParserShape => {
	const extensionMap = buildExtensionMap(
		extraCodecs ? [...codecs, ...extraCodecs] : codecs,
	);
	const formats = Array.from(extensionMap.keys());
	const supportedExtensions = formats.map((ext) => `.${ext}`).join(", ");

	return {
		formats,
		parse: (content, format) => {
			const codec = extensionMap.get(format.toLowerCase());
			if (!codec) {
				return Effect.fail(
					new UnsupportedFormatError({
						format,
						message:
							supportedExtensions.length > 0
								? `Unsupported format '.${format}'. Available formats: ${supportedExtensions}`
								: `Unsupported format '.${format}'. No formats registered.`,
					}),
				);
			}
			return parseWith(codec, content);
		},
	};
};

/**
 * Layer form of {@link makeTreeParser}.
 *
 * @example
 * ```typescript
 * const layer = makeTreeParserLayer([jsonCodec(), yamlCodec()])
 * Effect.runPromise(decodeText(config, raw, "yaml").pipe(Effect.provide(layer)))
 * ```
 */
export const makeTreeParserLayer = (
	codecs: ReadonlyArray<FormatCodec>,
	extraCodecs?: ReadonlyArray<FormatCodec>,
): Layer.Layer<TreeParser> =>
	Layer.succeed(TreeParser, makeTreeParser(codecs, extraCodecs));

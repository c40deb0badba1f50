import { hjsonCodec } from "./codecs/hjson.js";
import { jsonCodec } from "./codecs/json.js";
import { json5Codec } from "./codecs/json5.js";
import { jsoncCodec } from "./codecs/jsonc.js";
import { tomlCodec } from "./codecs/toml.js";
import { yamlCodec } from "./codecs/yaml.js";
import { makeTreeParserLayer } from "./format-codec.js";

// ============================================================================
// Preset TreeParser Layers
// ============================================================================

/**
 * A TreeParser Layer that reads every supported text format:
 * - JSON (.json)
 * - YAML (.yaml, .yml)
 * - JSON5 (.json5)
 * - JSONC (.jsonc)
 * - TOML (.toml)
 * - Hjson (.hjson)
 *
 * @example
 * ```typescript
 * Effect.runPromise(
 *   decodeText(settings, raw, "toml").pipe(Effect.provide(AllTextFormatsLayer)),
 * )
 * ```
 */
export const AllTextFormatsLayer = makeTreeParserLayer([
	jsonCodec(),
	yamlCodec(),
	json5Codec(),
	jsoncCodec(),
	tomlCodec(),
	hjsonCodec(),
]);

/**
 * A TreeParser Layer for JSON and YAML, the recommended default.
 */
export const DefaultTreeParserLayer = makeTreeParserLayer([
	jsonCodec(),
	yamlCodec(),
]);

import { Effect, Either, pipe } from "effect";
import {
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	type MockInstance,
	vi,
} from "vitest";
import { decodeValue } from "../src/decoder/decoder.js";
import { array, field, integer, string } from "../src/decoder/primitives.js";
import type { DecodeError } from "../src/errors/decode-errors.js";
import type { TextError } from "../src/errors/text-errors.js";
import { hjsonCodec } from "../src/parsers/codecs/hjson.js";
import { jsonCodec } from "../src/parsers/codecs/json.js";
import { json5Codec } from "../src/parsers/codecs/json5.js";
import { jsoncCodec } from "../src/parsers/codecs/jsonc.js";
import { tomlCodec } from "../src/parsers/codecs/toml.js";
import { yamlCodec } from "../src/parsers/codecs/yaml.js";
import { decodeString, decodeText } from "../src/parsers/decode-text.js";
import {
	type FormatCodec,
	makeTreeParser,
	makeTreeParserLayer,
} from "../src/parsers/format-codec.js";
import {
	AllTextFormatsLayer,
	DefaultTreeParserLayer,
} from "../src/parsers/presets.js";
import { TreeParser } from "../src/parsers/tree-parser-service.js";
import { decode, optional, required } from "../src/pipeline/pipeline.js";
import { expectLeft, expectRight } from "./helpers.js";

const parseAll = (content: string, format: string) =>
	Effect.runSync(
		Effect.gen(function* () {
			const parser = yield* TreeParser;
			return yield* parser.parse(content, format);
		}).pipe(Effect.either, Effect.provide(AllTextFormatsLayer)),
	);

describe("codecs", () => {
	it("json", () => {
		expect(expectRight(parseAll('{"a": [1, null]}', "json"))).toEqual({
			a: [1, null],
		});
	});

	it("json with a reviver", () => {
		const codec = jsonCodec({
			reviver: (key, value) => (key === "n" ? Number(value) : value),
		});
		expect(codec.parse('{"n": "4"}')).toEqual({ n: 4 });
	});

	it("yaml and yml", () => {
		const text = "name: demo\ntags:\n  - a\n  - b\nempty: null\n";
		const expected = { name: "demo", tags: ["a", "b"], empty: null };
		expect(expectRight(parseAll(text, "yaml"))).toEqual(expected);
		expect(expectRight(parseAll(text, "yml"))).toEqual(expected);
	});

	it("yaml rejects duplicate keys by default", () => {
		const error = expectLeft(parseAll("a: 1\na: 2\n", "yaml"));
		expect(error._tag).toBe("TextParseError");
		expect(yamlCodec({ uniqueKeys: false }).parse("a: 1\na: 2\n")).toEqual({
			a: 2,
		});
	});

	it("json5", () => {
		const text = "{ unquoted: 'single', trailing: [1, 2,], } // comment";
		expect(expectRight(parseAll(text, "json5"))).toEqual({
			unquoted: "single",
			trailing: [1, 2],
		});
	});

	it("jsonc accepts comments and trailing commas", () => {
		const text = '{\n  // comment\n  "a": 1, /* block */\n  "b": [true,],\n}';
		expect(expectRight(parseAll(text, "jsonc"))).toEqual({ a: 1, b: [true] });
	});

	it("jsonc reports the first syntax error", () => {
		const error = expectLeft(parseAll('{"a": }', "jsonc"));
		expect(error._tag).toBe("TextParseError");
		expect(error.message).toBe(
			"Failed to parse jsonc text: ValueExpected at offset 6",
		);
	});

	it("jsonc can reject trailing commas", () => {
		const codec = jsoncCodec({ allowTrailingComma: false });
		expect(() => codec.parse('{"a": 1,}')).toThrow();
	});

	it("hjson", () => {
		const text = "{\n  # comment\n  name: demo\n  count: 3\n}";
		expect(expectRight(parseAll(text, "hjson"))).toEqual({
			name: "demo",
			count: 3,
		});
	});

	it("toml converts dates to ISO strings", () => {
		const text = 'title = "demo"\nwhen = 1979-05-27T07:32:00Z\n\n[owner]\nname = "x"\n';
		expect(expectRight(parseAll(text, "toml"))).toEqual({
			title: "demo",
			when: "1979-05-27T07:32:00.000Z",
			owner: { name: "x" },
		});
	});

	it("keeps a __proto__ key as an own property", () => {
		const trees = [
			tomlCodec().parse('[__proto__]\npolluted = "yes"\n'),
			jsonCodec().parse('{"__proto__": {"polluted": "yes"}}'),
		];
		const nested = pipe(
			decode((s: string) => s),
			required("__proto__", field("polluted", string)),
		);
		const atRoot = pipe(
			decode((s: string) => s),
			optional("polluted", string, "--"),
		);
		for (const tree of trees) {
			expect(Object.keys(tree ?? {})).toEqual(["__proto__"]);
			expect(expectRight(decodeValue(nested, tree))).toBe("yes");
			expect(expectRight(decodeValue(atRoot, tree))).toBe("--");
		}
	});

	it("tags malformed input with the codec's format", () => {
		const error = expectLeft(parseAll("{not json", "json"));
		expect(error._tag).toBe("TextParseError");
		if (error._tag === "TextParseError") {
			expect(error.format).toBe("json");
			expect(error.message.startsWith("Failed to parse json text: ")).toBe(
				true,
			);
		}
	});
});

describe("makeTreeParser", () => {
	it("lists every registered extension", () => {
		const parser = makeTreeParser([jsonCodec(), yamlCodec()]);
		expect(parser.formats).toEqual(["json", "yaml", "yml"]);
	});

	it("matches formats case-insensitively", () => {
		const parser = makeTreeParser([jsonCodec()]);
		const result = Effect.runSync(Effect.either(parser.parse("[1]", "JSON")));
		expect(expectRight(result)).toEqual([1]);
	});

	it("fails with UnsupportedFormatError for an unknown format", () => {
		const result = Effect.runSync(
			Effect.gen(function* () {
				const parser = yield* TreeParser;
				return yield* parser.parse("<a/>", "xml");
			}).pipe(Effect.either, Effect.provide(DefaultTreeParserLayer)),
		);
		const error = expectLeft(result);
		expect(error._tag).toBe("UnsupportedFormatError");
		expect(error.format).toBe("xml");
		expect(error.message).toBe(
			"Unsupported format '.xml'. Available formats: .json, .yaml, .yml",
		);
	});

	it("says so when no codec is registered", () => {
		const parser = makeTreeParser([]);
		const error = expectLeft(
			Effect.runSync(Effect.either(parser.parse("{}", "json"))),
		);
		expect(error.message).toBe(
			"Unsupported format '.json'. No formats registered.",
		);
	});

	describe("duplicate extensions", () => {
		let warnSpy: MockInstance;

		beforeEach(() => {
			warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
		});

		afterEach(() => {
			warnSpy.mockRestore();
		});

		const upper: FormatCodec = {
			name: "json-upper",
			extensions: ["json"],
			parse: (raw) => JSON.parse(raw.toUpperCase()),
		};

		it("warns and lets the later codec win", () => {
			const parser = makeTreeParser([jsonCodec()], [upper]);
			expect(warnSpy).toHaveBeenCalledOnce();
			expect(warnSpy).toHaveBeenCalledWith(
				"Duplicate extension '.json': 'json' overwritten by 'json-upper'",
			);
			const result = Effect.runSync(
				Effect.either(parser.parse('"abc"', "json")),
			);
			expect(expectRight(result)).toBe("ABC");
		});

		it("does not warn for distinct extensions", () => {
			makeTreeParserLayer([jsonCodec(), tomlCodec(), hjsonCodec()]);
			expect(warnSpy).not.toHaveBeenCalled();
		});
	});
});

describe("decodeText", () => {
	interface Server {
		readonly host: string;
		readonly ports: ReadonlyArray<number>;
	}

	const server = pipe(
		decode(
			(host: string) =>
				(ports: ReadonlyArray<number>): Server => ({ host, ports }),
		),
		required("host", string),
		optional("ports", array(integer), [80]),
	);

	const run = <A>(
		effect: Effect.Effect<A, DecodeError | TextError, TreeParser>,
	) =>
		Effect.runSync(
			effect.pipe(Effect.either, Effect.provide(AllTextFormatsLayer)),
		);

	it("decodes every supported format into the same value", () => {
		const texts: ReadonlyArray<readonly [string, string]> = [
			["json", '{"host": "example.test", "ports": [8080]}'],
			["yaml", "host: example.test\nports: [8080]\n"],
			["json5", "{host: 'example.test', ports: [8080]}"],
			["jsonc", '{"host": "example.test", /* c */ "ports": [8080]}'],
			["toml", 'host = "example.test"\nports = [8080]\n'],
			["hjson", "{\n  host: example.test\n  ports: [8080]\n}"],
		];
		for (const [format, text] of texts) {
			const value = expectRight(run(decodeText(server, text, format)));
			expect(value).toEqual({ host: "example.test", ports: [8080] });
		}
	});

	it("applies the null rule to parsed nulls", () => {
		const value = expectRight(
			run(decodeText(server, "host: example.test\nports: ~\n", "yaml")),
		);
		expect(value.ports).toEqual([80]);
	});

	it("fails with a decode error on the parsed tree", () => {
		const error = expectLeft(
			run(decodeText(server, '{"host": "h", "ports": [1, "x"]}', "json")),
		);
		expect(error._tag).toBe("TypeMismatch");
		expect(error.message).toBe('Expected integer at $.ports[1], got string "x"');
	});

	it("fails with a parse error before decoding", () => {
		const error = expectLeft(run(decodeText(server, "host: [", "yaml")));
		expect(error._tag).toBe("TextParseError");
	});
});

describe("decodeString", () => {
	it("parses JSON and decodes it", () => {
		const decoder = pipe(decode((a: string) => a), required("a", string));
		expect(expectRight(decodeString(decoder, '{"a":"foo"}'))).toBe("foo");
	});

	it("reports malformed JSON as a TextParseError", () => {
		const result = decodeString(string, "{");
		expect(Either.isLeft(result)).toBe(true);
		const error = expectLeft(result);
		expect(error._tag).toBe("TextParseError");
	});

	it("reports decode failures unchanged", () => {
		const error = expectLeft(decodeString(integer, '"7"'));
		expect(error.message).toBe('Expected integer at $, got string "7"');
	});
});

import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { decodeUtf8, detectFormat, isJsonValue, parseDocument, readSource } from "../../src/parsing/document.js";
import { SchemaParseError } from "../../src/errors.js";

describe("parseDocument", () => {
	it("parses JSON by default", () => {
		expect(parseDocument('{"name": "a", "tags": [1, true, null]}')).toEqual({ name: "a", tags: [1, true, null] });
	});

	it("strips a leading byte order mark", () => {
		expect(parseDocument('\uFEFF{"name": "a"}')).toEqual({ name: "a" });
	});

	it("parses YAML", () => {
		expect(parseDocument("name: a\nport: 8080\n", { format: "yaml" })).toEqual({ name: "a", port: 8080 });
	});

	it("keeps YAML timestamps as strings", () => {
		expect(parseDocument("released: 2024-01-02\n", { format: "yaml" })).toEqual({ released: "2024-01-02" });
	});

	it("parses empty YAML as null", () => {
		expect(parseDocument("", { format: "yaml" })).toBeNull();
	});

	it("rejects malformed JSON with SchemaParseError", () => {
		expect(() => parseDocument("not json", { sourcePath: "/tmp/schema.json" })).toThrow(SchemaParseError);
	});

	it("names the source in the error", () => {
		let caught: unknown;
		try {
			parseDocument("{", { sourcePath: "/tmp/schema.json" });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(SchemaParseError);
		expect(caught).toMatchObject({
			code: "PARSE_ERROR",
			filePath: "/tmp/schema.json",
			message: expect.stringMatching(/^Failed to parse \/tmp\/schema\.json as JSON: /),
		});
	});

	it("rejects malformed YAML", () => {
		expect(() => parseDocument("foo:\n  bar: [\n", { format: "yaml" })).toThrow(SchemaParseError);
	});

	it("rejects a YAML anchor that contains its own alias", () => {
		let caught: unknown;
		try {
			parseDocument("&a [ *a ]", { format: "yaml" });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(SchemaParseError);
		expect(caught).toMatchObject({ message: "document contains values that cannot be represented as JSON" });
	});

	it("accepts a YAML alias reused across branches", () => {
		expect(parseDocument("base: &b { type: string }\nname: *b\ntitle: *b\n", { format: "yaml" })).toEqual({
			base: { type: "string" },
			name: { type: "string" },
			title: { type: "string" },
		});
	});
});

describe("detectFormat", () => {
	it("detects YAML extensions", () => {
		expect(detectFormat("config.yml")).toBe("yaml");
		expect(detectFormat("config.YAML")).toBe("yaml");
	});

	it("defaults to JSON", () => {
		expect(detectFormat("config.json")).toBe("json");
		expect(detectFormat("config")).toBe("json");
	});
});

describe("isJsonValue", () => {
	it("accepts plain JSON values", () => {
		expect(isJsonValue({ a: [1, "b", null, { c: false }] })).toBe(true);
	});

	it("rejects values JSON cannot represent", () => {
		expect(isJsonValue(undefined)).toBe(false);
		expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
		expect(isJsonValue(new Date(0))).toBe(false);
		expect(isJsonValue({ a: () => 1 })).toBe(false);
	});

	it("rejects cyclic graphs", () => {
		const cyclic: Record<string, unknown> = {};
		cyclic["self"] = { parent: cyclic };

		expect(isJsonValue(cyclic)).toBe(false);
	});

	it("accepts an object shared by two branches", () => {
		const shared = { type: "string" };

		expect(isJsonValue({ a: shared, b: [shared] })).toBe(true);
	});
});

describe("decodeUtf8", () => {
	it("decodes valid UTF-8", () => {
		expect(decodeUtf8(Buffer.from('{"name":"caf\u00e9"}', "utf-8"))).toBe('{"name":"caf\u00e9"}');
	});

	it("keeps a byte order mark for the parser to strip", () => {
		expect(decodeUtf8(Buffer.from([0xef, 0xbb, 0xbf, 0x31]))).toBe("\uFEFF1");
	});

	it("rejects invalid byte sequences with SchemaParseError", () => {
		let caught: unknown;
		try {
			decodeUtf8(Buffer.from([0x7b, 0xff, 0x7d]), "/tmp/config.json");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(SchemaParseError);
		expect(caught).toMatchObject({
			code: "PARSE_ERROR",
			filePath: "/tmp/config.json",
			message: expect.stringMatching(/^\/tmp\/config\.json is not valid UTF-8: /),
		});
	});
});

describe("readSource", () => {
	it("returns a buffer as is", async () => {
		const bytes = new TextEncoder().encode('{"a":1}');

		expect(await readSource(bytes)).toBe(bytes);
	});

	it("collects a stream of chunks", async () => {
		const stream = Readable.from([Buffer.from('{"na'), 'me":', Buffer.from('"a"}')]);

		expect(decodeUtf8(await readSource(stream))).toBe('{"name":"a"}');
	});

	it("keeps a multi-byte character split across chunks", async () => {
		const stream = Readable.from([Buffer.from([0x22, 0xc3]), Buffer.from([0xa9, 0x22])]);

		expect(decodeUtf8(await readSource(stream))).toBe('"\u00e9"');
	});
});

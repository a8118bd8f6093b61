/**
 * JSON Parser Tests
 */

import { describe, expect, it } from "vitest";
import {
	Cursor,
	getJsonPath,
	type JsonValue,
	JsonValueKind,
	ParserErrorCode,
	parseJson,
	readJson,
	type Spanned,
	sliceSpan,
} from "../src/index";
import { bytes, text, unwrap, unwrapError } from "./helpers";

type Plain = null | boolean | number | string | Plain[] | { [key: string]: Plain };

function toPlain(value: JsonValue): Plain {
	switch (value.kind) {
		case JsonValueKind.NULL:
			return null;
		case JsonValueKind.BOOL:
		case JsonValueKind.NUMBER:
		case JsonValueKind.STRING:
			return value.value;
		case JsonValueKind.ARRAY:
			return value.items.map((item) => toPlain(item.value));
		case JsonValueKind.OBJECT: {
			const result: { [key: string]: Plain } = {};
			for (const entry of value.entries) {
				result[entry.key.value] = toPlain(entry.value.value);
			}
			return result;
		}
	}
}

function* walk(node: Spanned<JsonValue>): Generator<Spanned<JsonValue>> {
	yield node;
	if (node.value.kind === JsonValueKind.ARRAY) {
		for (const item of node.value.items) {
			yield* walk(item);
		}
	} else if (node.value.kind === JsonValueKind.OBJECT) {
		for (const entry of node.value.entries) {
			yield* walk(entry.value);
		}
	}
}

describe("parseJson", () => {
	describe("Values", () => {
		it("should span every key and value", () => {
			const root = unwrap(parseJson(bytes('{"a": [1, true]}')));

			expect(root.span).toEqual({ end: 16, start: 0 });
			if (root.value.kind !== JsonValueKind.OBJECT) {
				throw new Error("expected an object");
			}
			const [entry] = root.value.entries;
			expect(entry.key).toEqual({ span: { end: 4, start: 1 }, value: "a" });
			expect(entry.value.span).toEqual({ end: 15, start: 6 });
			if (entry.value.value.kind !== JsonValueKind.ARRAY) {
				throw new Error("expected an array");
			}
			expect(entry.value.value.items).toEqual([
				{ span: { end: 8, start: 7 }, value: { kind: JsonValueKind.NUMBER, raw: "1", value: 1 } },
				{ span: { end: 14, start: 10 }, value: { kind: JsonValueKind.BOOL, value: true } },
			]);
		});

		it("should leave surrounding whitespace out of value spans", () => {
			const root = unwrap(parseJson(bytes("  [ 1 ]  ")));
			expect(root.span).toEqual({ end: 7, start: 2 });
			if (root.value.kind !== JsonValueKind.ARRAY) {
				throw new Error("expected an array");
			}
			expect(root.value.items[0].span).toEqual({ end: 5, start: 4 });
		});

		it("should parse keywords", () => {
			expect(unwrap(parseJson(bytes("null"))).value).toEqual({ kind: JsonValueKind.NULL });
			expect(unwrap(parseJson(bytes("false"))).value).toEqual({ kind: JsonValueKind.BOOL, value: false });
		});

		it("should parse empty containers", () => {
			expect(unwrap(parseJson(bytes("[ ]")))).toEqual({
				span: { end: 3, start: 0 },
				value: { items: [], kind: JsonValueKind.ARRAY },
			});
			expect(unwrap(parseJson(bytes("{}")))).toEqual({
				span: { end: 2, start: 0 },
				value: { entries: [], kind: JsonValueKind.OBJECT },
			});
		});

		it("should keep duplicate keys in order", () => {
			const root = unwrap(parseJson(bytes('{"k":1,"k":2}')));
			if (root.value.kind !== JsonValueKind.OBJECT) {
				throw new Error("expected an object");
			}
			expect(root.value.entries.map((entry) => toPlain(entry.value.value))).toEqual([1, 2]);
		});
	});

	describe("Numbers", () => {
		it("should keep the raw numeral and its value", () => {
			expect(unwrap(parseJson(bytes("-0.5e+3")))).toEqual({
				span: { end: 7, start: 0 },
				value: { kind: JsonValueKind.NUMBER, raw: "-0.5e+3", value: -500 },
			});
		});

		it("should parse integers and exponents", () => {
			expect(toPlain(unwrap(parseJson(bytes("[0, 42, 1E2, 7e-1]"))).value)).toEqual([0, 42, 100, 0.7]);
		});

		it("should reject a digit after a leading zero", () => {
			const error = unwrapError(parseJson(bytes("01")));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(1);
			expect(error.expected).toBe("'.', exponent or end of number");
		});

		it("should reject a leading zero even when trailing data is allowed", () => {
			const cursor = new Cursor(bytes("-01"));
			const error = unwrapError(readJson(cursor, { allowTrailingData: true }));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(2);
			expect(cursor.offset).toBe(0);
		});

		it("should accept zero followed by a fraction or in a list", () => {
			expect(toPlain(unwrap(parseJson(bytes("[0, 0.25, 0e1]"))).value)).toEqual([0, 0.25, 0]);
		});

		it("should require digits after a decimal point", () => {
			const error = unwrapError(parseJson(bytes("1.")));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_EOF);
			expect(error.offset).toBe(2);
		});

		it("should require digits after a minus sign", () => {
			const error = unwrapError(parseJson(bytes("-x")));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(1);
			expect(error.expected).toBe("digit");
		});
	});

	describe("Strings", () => {
		it("should decode escapes while spanning the raw text", () => {
			const root = unwrap(parseJson(bytes('"a\\n"')));
			expect(root).toEqual({ span: { end: 5, start: 0 }, value: { kind: JsonValueKind.STRING, value: "a\n" } });
		});

		it("should decode every simple escape", () => {
			const root = unwrap(parseJson(bytes('"\\"\\\\\\/\\b\\f\\r\\t"')));
			expect(toPlain(root.value)).toBe('"\\/\b\f\r\t');
		});

		it("should decode unicode escapes and surrogate pairs", () => {
			expect(toPlain(unwrap(parseJson(bytes('"\\u00e9"'))).value)).toBe("é");

			const emoji = unwrap(parseJson(bytes('"\\ud83d\\ude00"')));
			expect(toPlain(emoji.value)).toBe("😀");
			expect(emoji.span).toEqual({ end: 14, start: 0 });
		});

		it("should span multi-byte UTF-8 by bytes", () => {
			const root = unwrap(parseJson(bytes('"héllo"')));
			expect(toPlain(root.value)).toBe("héllo");
			expect(root.span).toEqual({ end: 8, start: 0 });
		});

		it("should fail UNEXPECTED_EOF on an unterminated string", () => {
			const error = unwrapError(parseJson(bytes('"abc')));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_EOF);
			expect(error.offset).toBe(4);
		});

		it("should reject unknown escapes", () => {
			const error = unwrapError(parseJson(bytes('"a\\qb"')));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(3);
			expect(error.expected).toBe("escape character");
		});

		it("should reject bad hex in unicode escapes", () => {
			const error = unwrapError(parseJson(bytes('"\\u12G4"')));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(5);
			expect(error.expected).toBe("hex digit");
		});

		it("should reject raw control characters", () => {
			const error = unwrapError(parseJson(bytes('"a\tb"')));
			expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
			expect(error.offset).toBe(2);
		});
	});

	describe("Structure errors", () => {
		const cases: [string, ParserErrorCode, number, string | undefined][] = [
			["[1 2]", ParserErrorCode.UNEXPECTED_TOKEN, 3, "',' or ']'"],
			['{"a" 1}', ParserErrorCode.UNEXPECTED_TOKEN, 5, "':'"],
			["[1,]", ParserErrorCode.UNEXPECTED_TOKEN, 3, "JSON value"],
			['{"a":1,}', ParserErrorCode.UNEXPECTED_TOKEN, 7, "string key"],
			["[1, 2", ParserErrorCode.UNEXPECTED_EOF, 5, "',' or ']'"],
			["{", ParserErrorCode.UNEXPECTED_EOF, 1, "string key"],
			["tru", ParserErrorCode.UNEXPECTED_EOF, 3, '"true"'],
			["trux", ParserErrorCode.UNEXPECTED_TOKEN, 3, '"true"'],
			["@", ParserErrorCode.UNEXPECTED_TOKEN, 0, "JSON value"],
			["", ParserErrorCode.UNEXPECTED_EOF, 0, "JSON value"],
		];

		for (const [input, code, offset, expected] of cases) {
			it(`should reject ${JSON.stringify(input)} at byte ${offset}`, () => {
				const error = unwrapError(parseJson(bytes(input)));
				expect(error.code).toBe(code);
				expect(error.offset).toBe(offset);
				expect(error.expected).toBe(expected);
			});
		}
	});

	describe("Trailing data", () => {
		it("should fail TrailingData at the first byte after the value", () => {
			const error = unwrapError(parseJson(bytes("{} x")));
			expect(error.code).toBe(ParserErrorCode.TRAILING_DATA);
			expect(error.offset).toBe(3);
		});

		it("should leave trailing data unconsumed when allowed", () => {
			const cursor = new Cursor(bytes("{} x"));
			const root = unwrap(readJson(cursor, { allowTrailingData: true }));
			expect(root.span).toEqual({ end: 2, start: 0 });
			expect(cursor.offset).toBe(2);
		});

		it("should not move the cursor on failure", () => {
			const cursor = new Cursor(bytes('xx{"a": [1, }'), 2);
			unwrapError(readJson(cursor));
			expect(cursor.offset).toBe(2);
		});
	});

	describe("Nesting depth", () => {
		it("should fail at the bracket that goes too deep", () => {
			const error = unwrapError(parseJson(bytes("[[[]]]"), { maxDepth: 2 }));
			expect(error.code).toBe(ParserErrorCode.NESTING_TOO_DEEP);
			expect(error.offset).toBe(2);
			expect(unwrap(parseJson(bytes("[[]]"), { maxDepth: 2 })).span).toEqual({ end: 4, start: 0 });
		});

		it("should stop adversarial nesting at the default depth", () => {
			const input = bytes(`${"[".repeat(200)}${"]".repeat(200)}`);
			const error = unwrapError(parseJson(input));
			expect(error.code).toBe(ParserErrorCode.NESTING_TOO_DEEP);
			expect(error.offset).toBe(128);
		});
	});

	describe("Round trip", () => {
		it("should reproduce every value from its span", () => {
			const source = '{\n  "name": "spanwise",\n  "tags": ["a\\"b", 1.5e3, false],\n  "nested": {"x": null, "y": [ ]}\n}';
			const buffer = bytes(source);
			const root = unwrap(parseJson(buffer));

			expect(text(sliceSpan(buffer, root.span))).toBe(source);
			for (const node of walk(root)) {
				expect(JSON.parse(text(sliceSpan(buffer, node.span)))).toEqual(toPlain(node.value));
			}
		});
	});
});

describe("getJsonPath", () => {
	const root = unwrap(parseJson(bytes('{"items":[{"name":"x"}]}')));

	it("should find nested values by dotted path", () => {
		const found = getJsonPath(root, "items.0.name");
		expect(found).toEqual({ span: { end: 21, start: 18 }, value: { kind: JsonValueKind.STRING, value: "x" } });
	});

	it("should accept a segment list", () => {
		expect(getJsonPath(root, ["items", 0, "name"])?.span).toEqual({ end: 21, start: 18 });
	});

	it("should return the root for an empty path", () => {
		expect(getJsonPath(root, "")).toBe(root);
	});

	it("should return undefined for missing segments", () => {
		expect(getJsonPath(root, "items.1")).toBeUndefined();
		expect(getJsonPath(root, "items.0.name.x")).toBeUndefined();
		expect(getJsonPath(root, "missing")).toBeUndefined();
	});
});

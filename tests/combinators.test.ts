/**
 * Combinator tests
 */

import { describe, expect, it } from "vitest";
import {
	alternation,
	byte,
	Cursor,
	isDigit,
	literal,
	map,
	optional,
	ParserErrorCode,
	repeat,
	sequence,
	takeWhile1,
} from "../src/index";
import { bytes, text, unwrap, unwrapError } from "./helpers";

describe("sequence", () => {
	const keyValue = sequence(literal("ab"), byte(0x3a), takeWhile1(isDigit, "digit"));

	it("should span everything the parts consumed", () => {
		const cursor = new Cursor(bytes("ab:12x"));
		const result = unwrap(keyValue(cursor));
		expect(result.span).toEqual({ end: 5, start: 0 });
		const [key, colon, digits] = result.value;
		expect(key.span).toEqual({ end: 2, start: 0 });
		expect(colon.value).toBe(0x3a);
		expect(text(digits.value)).toBe("12");
		expect(cursor.offset).toBe(5);
	});

	it("should restore the cursor when a later part fails", () => {
		const cursor = new Cursor(bytes("ab;12"));
		const error = unwrapError(keyValue(cursor));
		expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
		expect(error.offset).toBe(2);
		expect(cursor.offset).toBe(0);
	});
});

describe("optional", () => {
	const minus = optional(literal("-"));

	it("should return null without consuming when absent", () => {
		const cursor = new Cursor(bytes("5"));
		expect(unwrap(minus(cursor))).toBeNull();
		expect(cursor.offset).toBe(0);
	});

	it("should span the match when present", () => {
		const cursor = new Cursor(bytes("-5"));
		expect(unwrap(minus(cursor))?.span).toEqual({ end: 1, start: 0 });
		expect(cursor.offset).toBe(1);
	});
});

describe("repeat", () => {
	const digit = byte(isDigit, "digit");

	it("should match greedily up to the maximum", () => {
		const cursor = new Cursor(bytes("12345"));
		const result = unwrap(repeat(digit, 2, 4)(cursor));
		expect(result.value.map((d) => d.value)).toEqual([0x31, 0x32, 0x33, 0x34]);
		expect(result.span).toEqual({ end: 4, start: 0 });
	});

	it("should fail TOO_FEW_REPETITIONS below the minimum and not consume", () => {
		const cursor = new Cursor(bytes("1a"));
		const error = unwrapError(repeat(digit, 2)(cursor));
		expect(error.code).toBe(ParserErrorCode.TOO_FEW_REPETITIONS);
		expect(error.offset).toBe(1);
		expect(error.expected).toBe("digit");
		expect(error.details).toMatchObject({ matched: 1, min: 2 });
		expect(cursor.offset).toBe(0);
	});

	it("should give an empty span at the start offset for zero repetitions", () => {
		const cursor = new Cursor(bytes("abc"), 1);
		const result = unwrap(repeat(digit)(cursor));
		expect(result.value).toEqual([]);
		expect(result.span).toEqual({ end: 1, start: 1 });
	});

	it("should stop after a match that consumes nothing", () => {
		const cursor = new Cursor(bytes("yy"));
		const result = unwrap(repeat(optional(literal("x")))(cursor));
		expect(result.value).toEqual([null]);
		expect(result.span).toEqual({ end: 0, start: 0 });
	});
});

describe("alternation", () => {
	it("should return the first branch that matches", () => {
		const method = alternation(literal("GET"), literal("GEM"));
		const cursor = new Cursor(bytes("GEM /"));
		const result = unwrap(method(cursor));
		expect(text(result.value.value)).toBe("GEM");
		expect(result.span).toEqual({ end: 3, start: 0 });
	});

	it("should report the error that got furthest", () => {
		const choice = alternation(
			map(sequence(literal("ab"), literal("cd")), () => "abcd"),
			map(literal("z"), () => "z")
		);
		const cursor = new Cursor(bytes("abcX"));
		const error = unwrapError(choice(cursor));
		expect(error.offset).toBe(3);
		expect(error.expected).toBe('"cd"');
		expect(cursor.offset).toBe(0);
	});

	it("should prefer the later branch when errors tie", () => {
		const method = alternation(literal("GET"), literal("GEM"));
		const error = unwrapError(method(new Cursor(bytes("GEX"))));
		expect(error.offset).toBe(2);
		expect(error.expected).toBe('"GEM"');
	});

	it("should fail when there are no branches", () => {
		const error = unwrapError(alternation()(new Cursor(bytes("a"))));
		expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
		expect(error.offset).toBe(0);
	});
});

describe("map and takeWhile1", () => {
	const number = map(takeWhile1(isDigit, "digit"), (run) => Number(text(run.value)));

	it("should transform the matched value", () => {
		expect(unwrap(number(new Cursor(bytes("204 No Content"))))).toBe(204);
	});

	it("should fail UNEXPECTED_TOKEN on an empty run", () => {
		const error = unwrapError(number(new Cursor(bytes("x1"))));
		expect(error.code).toBe(ParserErrorCode.UNEXPECTED_TOKEN);
		expect(error.expected).toBe("digit");
	});

	it("should fail UNEXPECTED_EOF at end of input", () => {
		const error = unwrapError(number(new Cursor(bytes("12"), 2)));
		expect(error.code).toBe(ParserErrorCode.UNEXPECTED_EOF);
		expect(error.offset).toBe(2);
	});
});

/**
 * JSON Parser
 * Recursive descent producing a spanned value tree: every key and value keeps the byte range it came from
 */

import { alternation, byte, map, type Matcher, optional, sequence, takeWhile1 } from "./combinators";
import { Cursor, decodeText } from "./cursor";
import {
	type BytePredicate,
	createError,
	fail,
	isDigit,
	isHexDigit,
	isJsonWhitespace,
	isNonZeroDigit,
	ok,
} from "./errors";
import { type Span, type Spanned, spanned } from "./span";
import {
	type JsonEntry,
	type JsonParserOptions,
	type JsonValue,
	JsonValueKind,
	type ParserError,
	ParserErrorCode,
	type Result,
} from "./types";

/**
 * Default JSON parser options
 */
export const DEFAULT_JSON_OPTIONS: Readonly<Required<JsonParserOptions>> = Object.freeze({
	allowTrailingData: false,
	maxDepth: 128,
});

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;
const COLON = 0x3a;
const MINUS = 0x2d;
const DOT = 0x2e;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const LOWER_U = 0x75;

const SIMPLE_ESCAPES = new Map<number, string>([
	[0x22, '"'],
	[0x5c, "\\"],
	[0x2f, "/"],
	[0x62, "\b"],
	[0x66, "\f"],
	[0x6e, "\n"],
	[0x72, "\r"],
	[0x74, "\t"],
]);

const isEscapeChar: BytePredicate = (b) => b === LOWER_U || SIMPLE_ESCAPES.has(b);
const isPlainStringByte: BytePredicate = (b) => b >= 0x20 && b !== QUOTE && b !== BACKSLASH;
const isExponentMarker: BytePredicate = (b) => b === 0x65 || b === 0x45;
const isSign: BytePredicate = (b) => b === 0x2b || b === MINUS;

const digits = takeWhile1(isDigit, "digit");
const moreDigits: Matcher<Spanned<Uint8Array>> = (cursor) => ok(cursor.takeWhile(isDigit));

/**
 * A lone '0'; a digit right after it is an error rather than the start of trailing data
 */
const zero: Matcher<Span> = (cursor) => {
	const matched = cursor.expectByte(0x30);
	if (!matched.ok) {
		return matched;
	}

	const next = cursor.peekByte();
	if (next !== undefined && isDigit(next)) {
		const error = createError(ParserErrorCode.UNEXPECTED_TOKEN, cursor.offset, "'.', exponent or end of number");
		cursor.restore(matched.value.span.start);
		return fail(error);
	}
	return ok(matched.value.span);
};

const integer: Matcher<Spanned<Span>> = alternation(
	zero,
	map(sequence(byte(isNonZeroDigit, "digit"), moreDigits), (run) => run.span)
);

/**
 * Runs `matcher` only when the next byte announces it; once announced it must match
 */
function announced<T>(marker: BytePredicate, matcher: Matcher<T>): Matcher<T | null> {
	return (cursor) => {
		const next = cursor.peekByte();
		return next !== undefined && marker(next) ? matcher(cursor) : ok(null);
	};
}

const numeral = sequence(
	optional(byte(MINUS)),
	integer,
	announced((b) => b === DOT, sequence(byte(DOT), digits)),
	announced(isExponentMarker, sequence(byte(isExponentMarker), optional(byte(isSign, "sign")), digits))
);

const hexDigit = byte(isHexDigit, "hex digit");
const hexQuad = sequence(hexDigit, hexDigit, hexDigit, hexDigit);

function skipWhitespace(cursor: Cursor): void {
	cursor.takeWhile(isJsonWhitespace);
}

/**
 * Moves past a byte already checked with peekByte()
 */
function step(cursor: Cursor): void {
	cursor.restore(cursor.offset + 1);
}

/**
 * Error at the cursor: UNEXPECTED_EOF at end of input, otherwise UNEXPECTED_TOKEN
 */
function unexpectedError(cursor: Cursor, expected: string): ParserError {
	const code = cursor.isAtEnd() ? ParserErrorCode.UNEXPECTED_EOF : ParserErrorCode.UNEXPECTED_TOKEN;
	return createError(code, cursor.offset, expected);
}

/**
 * Restores the cursor and fails with an error found further in
 */
function rewind<T>(cursor: Cursor, start: number, error: ParserError): Result<T> {
	cursor.restore(start);
	return fail(error);
}

function readNumber(cursor: Cursor): Result<Spanned<JsonValue>> {
	const result = numeral(cursor);
	if (!result.ok) {
		return result;
	}

	const span = result.value.span;
	const raw = cursor.text(span);
	return ok(spanned({ kind: JsonValueKind.NUMBER, raw, value: Number(raw) }, span));
}

/**
 * Reads a quoted string
 * The value is unescaped; the span covers the raw text including both quotes
 */
export function readJsonString(cursor: Cursor): Result<Spanned<string>> {
	const start = cursor.snapshot();
	const open = cursor.expectByte(QUOTE, "string");
	if (!open.ok) {
		return open;
	}

	let value = "";
	for (;;) {
		// Copy the run of plain bytes up to the next quote, backslash or control byte
		value += decodeText(cursor.takeWhile(isPlainStringByte)).value;

		const next = cursor.peekByte();
		if (next === QUOTE) {
			step(cursor);
			return ok(spanned(value, { end: cursor.offset, start }));
		}
		if (next !== BACKSLASH) {
			return rewind(cursor, start, unexpectedError(cursor, "string character or '\"'"));
		}

		step(cursor);
		const escape = cursor.expectByte(isEscapeChar, "escape character");
		if (!escape.ok) {
			return rewind(cursor, start, escape.error);
		}

		if (escape.value.value !== LOWER_U) {
			value += SIMPLE_ESCAPES.get(escape.value.value) ?? "";
			continue;
		}

		// Surrogate pairs combine as consecutive UTF-16 code units
		const quad = hexQuad(cursor);
		if (!quad.ok) {
			return rewind(cursor, start, quad.error);
		}
		value += String.fromCharCode(Number.parseInt(cursor.text(quad.value.span), 16));
	}
}

function readKeyword(cursor: Cursor, keyword: "null" | "true" | "false"): Result<Spanned<JsonValue>> {
	const matched = cursor.expectLiteral(keyword);
	if (!matched.ok) {
		return matched;
	}

	const value: JsonValue =
		keyword === "null"
			? { kind: JsonValueKind.NULL }
			: { kind: JsonValueKind.BOOL, value: keyword === "true" };
	return ok(spanned(value, matched.value));
}

function readArray(
	cursor: Cursor,
	depth: number,
	options: Required<JsonParserOptions>
): Result<Spanned<JsonValue>> {
	const start = cursor.snapshot();
	// depth counts containers already open around this one
	if (depth >= options.maxDepth) {
		return fail(
			createError(ParserErrorCode.NESTING_TOO_DEEP, start, undefined, { maxDepth: options.maxDepth })
		);
	}

	step(cursor);
	skipWhitespace(cursor);

	const items: Spanned<JsonValue>[] = [];
	if (cursor.peekByte() === CLOSE_BRACKET) {
		step(cursor);
		return ok(spanned({ items, kind: JsonValueKind.ARRAY }, { end: cursor.offset, start }));
	}

	for (;;) {
		const item = readValue(cursor, depth + 1, options);
		if (!item.ok) {
			return rewind(cursor, start, item.error);
		}
		items.push(item.value);
		skipWhitespace(cursor);

		const next = cursor.peekByte();
		if (next === COMMA) {
			// A trailing comma falls through to readValue and fails there
			step(cursor);
			skipWhitespace(cursor);
			continue;
		}
		if (next === CLOSE_BRACKET) {
			step(cursor);
			return ok(spanned({ items, kind: JsonValueKind.ARRAY }, { end: cursor.offset, start }));
		}
		return rewind(cursor, start, unexpectedError(cursor, "',' or ']'"));
	}
}

function readObject(
	cursor: Cursor,
	depth: number,
	options: Required<JsonParserOptions>
): Result<Spanned<JsonValue>> {
	const start = cursor.snapshot();
	if (depth >= options.maxDepth) {
		return fail(
			createError(ParserErrorCode.NESTING_TOO_DEEP, start, undefined, { maxDepth: options.maxDepth })
		);
	}

	step(cursor);
	skipWhitespace(cursor);

	const entries: JsonEntry[] = [];
	if (cursor.peekByte() === CLOSE_BRACE) {
		step(cursor);
		return ok(spanned({ entries, kind: JsonValueKind.OBJECT }, { end: cursor.offset, start }));
	}

	for (;;) {
		if (cursor.peekByte() !== QUOTE) {
			return rewind(cursor, start, unexpectedError(cursor, "string key"));
		}
		const key = readJsonString(cursor);
		if (!key.ok) {
			return rewind(cursor, start, key.error);
		}

		skipWhitespace(cursor);
		const colon = cursor.expectByte(COLON);
		if (!colon.ok) {
			return rewind(cursor, start, colon.error);
		}
		skipWhitespace(cursor);

		const value = readValue(cursor, depth + 1, options);
		if (!value.ok) {
			return rewind(cursor, start, value.error);
		}
		entries.push({ key: key.value, value: value.value });
		skipWhitespace(cursor);

		const next = cursor.peekByte();
		if (next === COMMA) {
			step(cursor);
			skipWhitespace(cursor);
			continue;
		}
		if (next === CLOSE_BRACE) {
			step(cursor);
			return ok(spanned({ entries, kind: JsonValueKind.OBJECT }, { end: cursor.offset, start }));
		}
		return rewind(cursor, start, unexpectedError(cursor, "',' or '}'"));
	}
}

function readValue(
	cursor: Cursor,
	depth: number,
	options: Required<JsonParserOptions>
): Result<Spanned<JsonValue>> {
	const next = cursor.peekByte();

	switch (next) {
		case OPEN_BRACE:
			return readObject(cursor, depth, options);
		case OPEN_BRACKET:
			return readArray(cursor, depth, options);
		case QUOTE: {
			const text = readJsonString(cursor);
			return text.ok
				? ok(spanned({ kind: JsonValueKind.STRING, value: text.value.value }, text.value.span))
				: text;
		}
		case 0x6e:
			return readKeyword(cursor, "null");
		case 0x74:
			return readKeyword(cursor, "true");
		case 0x66:
			return readKeyword(cursor, "false");
	}

	if (next === MINUS || (next !== undefined && isDigit(next))) {
		return readNumber(cursor);
	}

	return fail(unexpectedError(cursor, "JSON value"));
}

/**
 * Reads one JSON value starting at the cursor's offset
 * Leading whitespace is skipped and left out of the span. Unless allowTrailingData is set,
 * anything but whitespace after the value fails TRAILING_DATA at its first byte.
 * @param cursor - Cursor at the start of the document
 * @param options - Depth limit and trailing-data policy
 */
export function readJson(cursor: Cursor, options: JsonParserOptions = {}): Result<Spanned<JsonValue>> {
	const resolved: Required<JsonParserOptions> = { ...DEFAULT_JSON_OPTIONS, ...options };
	const start = cursor.snapshot();

	skipWhitespace(cursor);
	const value = readValue(cursor, 0, resolved);
	if (!value.ok) {
		return rewind(cursor, start, value.error);
	}

	// Only whitespace may follow the top-level value
	if (!resolved.allowTrailingData) {
		skipWhitespace(cursor);
		if (!cursor.isAtEnd()) {
			return rewind(cursor, start, createError(ParserErrorCode.TRAILING_DATA, cursor.offset));
		}
	}

	return value;
}

/**
 * Parses a JSON document
 * @param buffer - UTF-8 input
 * @param options - Depth limit and trailing-data policy
 */
export function parseJson(buffer: Uint8Array, options: JsonParserOptions = {}): Result<Spanned<JsonValue>> {
	return readJson(new Cursor(buffer), options);
}

/**
 * Looks up a nested value by path
 * Numeric segments index arrays; other segments match object keys (first match wins for duplicates)
 * @param root - The parsed document
 * @param path - Dot-separated ("items.0.name") or segment list; empty for the root itself
 * @returns The spanned node, or undefined if any segment is missing
 */
export function getJsonPath(
	root: Spanned<JsonValue>,
	path: string | readonly (string | number)[]
): Spanned<JsonValue> | undefined {
	const segments = typeof path === "string" ? (path === "" ? [] : path.split(".")) : path;
	let node: Spanned<JsonValue> | undefined = root;

	for (const segment of segments) {
		if (node === undefined) {
			return undefined;
		}
		const current: JsonValue = node.value;

		if (current.kind === JsonValueKind.ARRAY) {
			const index = typeof segment === "number" ? segment : /^\d+$/.test(segment) ? Number(segment) : -1;
			node = index >= 0 ? current.items[index] : undefined;
		} else if (current.kind === JsonValueKind.OBJECT) {
			const key = String(segment);
			node = current.entries.find((entry) => entry.key.value === key)?.value;
		} else {
			return undefined;
		}
	}

	return node;
}

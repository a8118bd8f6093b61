/**
 * HTTP Request Line Parser
 * Parses the first line of HTTP requests: METHOD SP REQUEST-TARGET SP HTTP-VERSION CRLF
 */

import { byte, literal, type Matcher, sequence, takeWhile1 } from "./combinators";
import { type Cursor, decodeText } from "./cursor";
import { isDigit, isTokenChar, isVisibleOrObsText, ok } from "./errors";
import { CRLF } from "./headers";
import { type Spanned, spanned } from "./span";
import type { RequestLine, Result } from "./types";

const SP = 0x20;
const DOT = 0x2e;

const versionSyntax = sequence(
	literal("HTTP/"),
	byte(isDigit, "digit"),
	byte(DOT),
	byte(isDigit, "digit")
);

/**
 * Matcher for `"HTTP/" DIGIT "." DIGIT`
 * Shared by request and status lines
 */
export const httpVersion: Matcher<Spanned<string>> = (cursor) => {
	const result = versionSyntax(cursor);
	return result.ok ? ok(spanned(cursor.text(result.value.span), result.value.span)) : result;
};

const requestLineSyntax = sequence(
	takeWhile1(isTokenChar, "method token"),
	byte(SP),
	takeWhile1(isVisibleOrObsText, "request target"),
	byte(SP),
	httpVersion,
	literal(CRLF)
);

/**
 * Reads an HTTP request line
 * @param cursor - Cursor at the first byte of the method
 * @returns The line components, spanned over the whole line including CRLF
 */
export function readRequestLine(cursor: Cursor): Result<Spanned<RequestLine>> {
	const result = requestLineSyntax(cursor);
	if (!result.ok) {
		return result;
	}

	const [method, , target, , version] = result.value.value;
	return ok(
		spanned(
			{
				method: decodeText(method),
				target: decodeText(target),
				version,
			},
			result.value.span
		)
	);
}

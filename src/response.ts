/**
 * HTTP Response Status Line Parser
 * Parses the first line of HTTP responses: HTTP-VERSION SP STATUS-CODE [SP REASON-PHRASE] CRLF
 */

import { byte, literal, type Matcher, optional, sequence } from "./combinators";
import { type Cursor, decodeText } from "./cursor";
import { createError, fail, isDigit, isFieldValueChar, isValidStatusCode, ok } from "./errors";
import { CRLF } from "./headers";
import { httpVersion } from "./request";
import { type Spanned, spanned } from "./span";
import { ParserErrorCode, type Result, type StatusLine } from "./types";

const SP = 0x20;

const statusDigits = sequence(
	byte(isDigit, "digit"),
	byte(isDigit, "digit"),
	byte(isDigit, "digit")
);

const reasonPhrase: Matcher<Spanned<Uint8Array>> = (cursor) => ok(cursor.takeWhile(isFieldValueChar));

const statusLineSyntax = sequence(
	httpVersion,
	byte(SP),
	statusDigits,
	optional(sequence(byte(SP), reasonPhrase)),
	literal(CRLF)
);

/**
 * Reads an HTTP status line
 * A missing reason phrase yields an empty reason spanned right after the status code
 * @param cursor - Cursor at the first byte of the version
 * @returns The line components, spanned over the whole line including CRLF
 */
export function readStatusLine(cursor: Cursor): Result<Spanned<StatusLine>> {
	const start = cursor.snapshot();
	const result = statusLineSyntax(cursor);
	if (!result.ok) {
		return result;
	}

	const [version, , digits, reasonPart] = result.value.value;
	const [hundreds, tens, units] = digits.value;
	const code = (hundreds.value - 0x30) * 100 + (tens.value - 0x30) * 10 + (units.value - 0x30);

	if (!isValidStatusCode(code)) {
		cursor.restore(start);
		return fail(createError(ParserErrorCode.INVALID_STATUS_CODE, digits.span.start, "100-999", { code }));
	}

	const reason =
		reasonPart === null
			? spanned("", { end: digits.span.end, start: digits.span.end })
			: decodeText(reasonPart.value.value[1]);

	return ok(
		spanned(
			{
				reason,
				status: spanned(code, digits.span),
				version,
			},
			result.value.span
		)
	);
}

/**
 * Whether a status code forbids a message body (1xx, 204, 304)
 * @param status - The status code
 */
export function statusHasNoBody(status: number): boolean {
	return (status >= 100 && status < 200) || status === 204 || status === 304;
}

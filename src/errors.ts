/**
 * Error handling utilities for the span parser
 * Provides consistent error creation, result helpers and byte validation
 */

import { type ParserError, ParserErrorCode, type ParserState, type Result } from "./types";

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<ParserErrorCode, string> = {
	[ParserErrorCode.UNEXPECTED_EOF]: "Unexpected end of input",
	[ParserErrorCode.UNEXPECTED_TOKEN]: "Unexpected token",
	[ParserErrorCode.DELIMITER_NOT_FOUND]: "Delimiter not found",
	[ParserErrorCode.TOO_FEW_REPETITIONS]: "Too few repetitions",
	[ParserErrorCode.INVALID_RANGE]: "Invalid byte range",
	[ParserErrorCode.NON_CONTIGUOUS]: "Spans are neither overlapping nor adjacent",
	[ParserErrorCode.MALFORMED_HEADER_NAME]: "Malformed header name",
	[ParserErrorCode.AMBIGUOUS_FRAMING]: "Both Content-Length and chunked Transfer-Encoding are present",
	[ParserErrorCode.INVALID_CHUNK_SIZE]: "Invalid chunk size in chunked transfer encoding",
	[ParserErrorCode.TRAILING_DATA]: "Unexpected data after the end of the value",
	[ParserErrorCode.INVALID_CONTENT_LENGTH]: "Invalid Content-Length header",
	[ParserErrorCode.INVALID_STATUS_CODE]: "Invalid HTTP status code",
	[ParserErrorCode.UNSUPPORTED_TRANSFER_ENCODING]: "Unsupported Transfer-Encoding header value",
	[ParserErrorCode.UNKNOWN_BODY_LENGTH]:
		"Response body length cannot be determined without a read-to-close framing context",
	[ParserErrorCode.TOO_MANY_HEADERS]: "Too many HTTP headers",
	[ParserErrorCode.TOO_MANY_CHUNKS]: "Too many chunks in chunked transfer encoding",
	[ParserErrorCode.NESTING_TOO_DEEP]: "Maximum nesting depth exceeded",
};

/**
 * Creates a parser error with the given code and details
 * @param code - The error code
 * @param offset - Byte offset where the error was detected
 * @param expected - Optional description of what the grammar wanted
 * @param details - Optional additional error details
 * @returns A ParserError object
 */
export function createError(
	code: ParserErrorCode,
	offset: number,
	expected?: string,
	details?: unknown
): ParserError {
	return {
		code,
		details,
		expected,
		message: ERROR_MESSAGES[code],
		offset,
	};
}

/**
 * Wraps a successful value
 */
export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

/**
 * Wraps a failure
 */
export function fail<T>(error: ParserError): Result<T> {
	return { error, ok: false };
}

/**
 * Tags an error with the grammar phase it came from, keeping an inner phase if already set
 * @param error - The error to tag
 * @param state - The phase being parsed
 * @returns The tagged error
 */
export function withState(error: ParserError, state: ParserState): ParserError {
	return error.state === undefined ? { ...error, state } : error;
}

/**
 * Picks the error that got furthest into the input
 * Ties go to the later error
 */
export function furthestError(a: ParserError, b: ParserError): ParserError {
	return b.offset >= a.offset ? b : a;
}

/**
 * Formats an error for display
 * @param error - The error to format
 * @returns e.g. `Unexpected token at byte 12 (expected ':')`
 */
export function formatError(error: ParserError): string {
	const expectation = error.expected ? ` (expected ${error.expected})` : "";
	return `${error.message} at byte ${error.offset}${expectation}`;
}

/**
 * Predicate over a single byte
 */
export type BytePredicate = (byte: number) => boolean;

// Token separators per RFC 7230: "(" ")" "<" ">" "@" "," ";" ":" "\" <"> "/" "[" "]" "?" "=" "{" "}"
const SEPARATOR_BYTES = new Set([
	0x28, 0x29, 0x3c, 0x3e, 0x40, 0x2c, 0x3b, 0x3a, 0x5c, 0x22, 0x2f, 0x5b, 0x5d, 0x3f, 0x3d, 0x7b,
	0x7d,
]);

export function isDigit(byte: number): boolean {
	return byte >= 0x30 && byte <= 0x39;
}

export function isNonZeroDigit(byte: number): boolean {
	return byte >= 0x31 && byte <= 0x39;
}

export function isHexDigit(byte: number): boolean {
	return isDigit(byte) || (byte >= 0x41 && byte <= 0x46) || (byte >= 0x61 && byte <= 0x66);
}

/**
 * Checks a byte against the RFC token charset
 * Token characters: any visible US-ASCII except separators
 */
export function isTokenChar(byte: number): boolean {
	return byte > 0x20 && byte < 0x7f && !SEPARATOR_BYTES.has(byte);
}

/**
 * Optional whitespace in HTTP (SP / HTAB)
 */
export function isOws(byte: number): boolean {
	return byte === 0x20 || byte === 0x09;
}

/**
 * Insignificant whitespace in JSON
 */
export function isJsonWhitespace(byte: number): boolean {
	return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/**
 * Visible US-ASCII or obs-text (0x80-0xFF)
 */
export function isVisibleOrObsText(byte: number): boolean {
	return (byte > 0x20 && byte < 0x7f) || byte >= 0x80;
}

/**
 * Bytes allowed inside a header value or reason phrase: HTAB, SP, VCHAR, obs-text
 */
export function isFieldValueChar(byte: number): boolean {
	return isOws(byte) || isVisibleOrObsText(byte);
}

/**
 * Validates HTTP status code
 * @param statusCode - The status code to validate
 * @returns true if valid 3-digit status code
 */
export function isValidStatusCode(statusCode: number): boolean {
	return statusCode >= 100 && statusCode <= 999;
}

/**
 * Parses Content-Length header value
 * @param value - The Content-Length header value (without surrounding whitespace)
 * @returns The parsed number or null if invalid
 */
export function parseContentLength(value: string): number | null {
	if (!/^[0-9]+$/.test(value)) {
		return null;
	}

	const length = Number(value);
	if (!Number.isSafeInteger(length)) {
		return null;
	}

	return length;
}

/**
 * Parses chunk size from a hex string
 * @param hex - The hex digits of a chunk size line
 * @returns The parsed chunk size or null if invalid
 */
export function parseChunkSize(hex: string): number | null {
	if (!/^[0-9a-fA-F]+$/.test(hex)) {
		return null;
	}

	const size = parseInt(hex, 16);
	if (!Number.isSafeInteger(size)) {
		return null;
	}

	return size;
}

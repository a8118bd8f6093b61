/**
 * HTTP/1.x Parser
 * Parses complete requests and responses from an in-memory buffer into spanned trees
 */

import { readBody, readChunkedBody } from "./body";
import { Cursor } from "./cursor";
import { fail, ok, withState } from "./errors";
import { readHeaderBlock } from "./headers";
import { readRequestLine } from "./request";
import { readStatusLine } from "./response";
import { type Spanned, spanned } from "./span";
import {
	type ChunkedBody,
	type FramingHint,
	type HttpParserOptions,
	ParserState,
	type Request,
	type Response,
	type Result,
} from "./types";

/**
 * Default parser options
 */
export const DEFAULT_OPTIONS: Readonly<Required<HttpParserOptions>> = Object.freeze({
	maxChunks: 10000,
	maxHeaders: 256,
});

const NO_READ_TO_CLOSE: FramingHint = { readToClose: false };

function resolveOptions(options: HttpParserOptions): Required<HttpParserOptions> {
	return { ...DEFAULT_OPTIONS, ...options };
}

/**
 * Reads one request starting at the cursor's offset
 * Spans are absolute within the cursor's buffer; on failure the cursor does not move
 * @param cursor - Cursor at the first byte of the request line
 * @param options - Parser limits
 */
export function readRequest(cursor: Cursor, options: HttpParserOptions = {}): Result<Spanned<Request>> {
	const resolved = resolveOptions(options);
	const start = cursor.snapshot();

	const line = readRequestLine(cursor);
	if (!line.ok) {
		return fail(withState(line.error, ParserState.REQUEST_LINE));
	}

	const headers = readHeaderBlock(cursor, resolved.maxHeaders);
	if (!headers.ok) {
		cursor.restore(start);
		return fail(withState(headers.error, ParserState.HEADERS));
	}

	const body = readBody(cursor, headers.value.value, { type: "request" }, resolved);
	if (!body.ok) {
		cursor.restore(start);
		return body;
	}

	return ok(
		spanned(
			{
				...line.value.value,
				body: body.value,
				headers: headers.value.value,
			},
			{ end: cursor.offset, start }
		)
	);
}

/**
 * Reads one response starting at the cursor's offset
 * @param cursor - Cursor at the first byte of the status line
 * @param hint - Whether the body may run to the end of the buffer, and the request method
 * @param options - Parser limits
 */
export function readResponse(
	cursor: Cursor,
	hint: FramingHint = NO_READ_TO_CLOSE,
	options: HttpParserOptions = {}
): Result<Spanned<Response>> {
	const resolved = resolveOptions(options);
	const start = cursor.snapshot();

	const line = readStatusLine(cursor);
	if (!line.ok) {
		return fail(withState(line.error, ParserState.STATUS_LINE));
	}

	const headers = readHeaderBlock(cursor, resolved.maxHeaders);
	if (!headers.ok) {
		cursor.restore(start);
		return fail(withState(headers.error, ParserState.HEADERS));
	}

	const context = { hint, status: line.value.value.status.value, type: "response" } as const;
	const body = readBody(cursor, headers.value.value, context, resolved);
	if (!body.ok) {
		cursor.restore(start);
		return body;
	}

	return ok(
		spanned(
			{
				...line.value.value,
				body: body.value,
				headers: headers.value.value,
			},
			{ end: cursor.offset, start }
		)
	);
}

/**
 * Parses an HTTP request from the start of a buffer
 * Bytes after the message are left unparsed; the top-level span says where it ended
 * @param buffer - The input
 * @param options - Parser limits
 */
export function parseHttpRequest(
	buffer: Uint8Array,
	options: HttpParserOptions = {}
): Result<Spanned<Request>> {
	return readRequest(new Cursor(buffer), options);
}

/**
 * Parses an HTTP response from the start of a buffer
 * @param buffer - The input
 * @param hint - Framing context; without readToClose an unframed body fails UNKNOWN_BODY_LENGTH
 * @param options - Parser limits
 */
export function parseHttpResponse(
	buffer: Uint8Array,
	hint: FramingHint = NO_READ_TO_CLOSE,
	options: HttpParserOptions = {}
): Result<Spanned<Response>> {
	return readResponse(new Cursor(buffer), hint, options);
}

/**
 * Parses a chunked body on its own, starting at its first size line
 * @param buffer - The input
 * @param options - Parser limits
 */
export function parseChunkedBody(
	buffer: Uint8Array,
	options: HttpParserOptions = {}
): Result<Spanned<ChunkedBody>> {
	return readChunkedBody(new Cursor(buffer), resolveOptions(options));
}

/**
 * HTTP/1.x parser bound to a set of options
 */
export class HttpParser {
	private readonly options: Required<HttpParserOptions>;

	/**
	 * Creates a new HttpParser instance
	 * @param options - Optional parser configuration
	 */
	constructor(options: HttpParserOptions = {}) {
		this.options = resolveOptions(options);
	}

	/**
	 * Parses a single request
	 * @param buffer - The input
	 */
	parseRequest(buffer: Uint8Array): Result<Spanned<Request>> {
		return parseHttpRequest(buffer, this.options);
	}

	/**
	 * Parses a single response
	 * @param buffer - The input
	 * @param hint - Framing context
	 */
	parseResponse(buffer: Uint8Array, hint: FramingHint = NO_READ_TO_CLOSE): Result<Spanned<Response>> {
		return parseHttpResponse(buffer, hint, this.options);
	}

	/**
	 * Parses pipelined requests sent back to back
	 * Every request must be complete; the first failure is returned with its absolute offset
	 * @param buffer - The input
	 * @returns The requests in order
	 */
	parseRequests(buffer: Uint8Array): Result<Spanned<Request>[]> {
		const cursor = new Cursor(buffer);
		const requests: Spanned<Request>[] = [];

		while (!cursor.isAtEnd()) {
			const request = readRequest(cursor, this.options);
			if (!request.ok) {
				return request;
			}
			requests.push(request.value);
		}

		return ok(requests);
	}

	/**
	 * Returns the effective options
	 */
	getOptions(): Readonly<Required<HttpParserOptions>> {
		return { ...this.options };
	}
}

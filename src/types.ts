/**
 * Core type definitions for the span-tracking parser
 * Every parsed element pairs its value with the byte range it came from
 */

import type { Span, Spanned } from "./span";

/**
 * Parsed HTTP request line components
 */
export interface RequestLine {
	/** The method token (GET, POST, etc.) */
	method: Spanned<string>;
	/** The request target (path, absolute URL, authority or asterisk) */
	target: Spanned<string>;
	/** The HTTP version string */
	version: Spanned<string>;
}

/**
 * Parsed HTTP response status line components
 */
export interface StatusLine {
	/** The HTTP version string */
	version: Spanned<string>;
	/** The numeric status code (200, 404, 500, etc.) */
	status: Spanned<number>;
	/** The reason phrase, possibly empty */
	reason: Spanned<string>;
}

/**
 * A single header field, name and value spanned independently
 */
export interface HeaderField {
	/** The field name as written (compare case-insensitively) */
	name: Spanned<string>;
	/** The field value without surrounding optional whitespace */
	value: Spanned<string>;
}

/**
 * Body framing discriminator
 */
export enum BodyKind {
	/** No body (request without framing headers, 1xx/204/304, HEAD) */
	EMPTY = "empty",
	/** Exactly Content-Length bytes */
	CONTENT_LENGTH = "content-length",
	/** Chunked transfer encoding */
	CHUNKED = "chunked",
	/** Everything up to the end of the buffer (connection close) */
	TO_END = "to-end",
}

/**
 * One chunk of a chunked body
 * The spanned chunk covers size-line + data + CRLF
 */
export interface Chunk {
	/** Decoded chunk size */
	size: number;
	/** The hex digits of the size line */
	sizeSpan: Span;
	/** Chunk extensions after the size, recorded but not interpreted */
	extensions: Span | null;
	/** The chunk payload */
	data: Span;
}

export interface EmptyBody {
	kind: BodyKind.EMPTY;
}

export interface ContentLengthBody {
	kind: BodyKind.CONTENT_LENGTH;
	length: number;
}

export interface ChunkedBody {
	kind: BodyKind.CHUNKED;
	/** Every chunk including the terminal zero-size chunk */
	chunks: Spanned<Chunk>[];
	/** Trailer fields after the terminal chunk */
	trailers: Spanned<HeaderField>[];
}

export interface ToEndBody {
	kind: BodyKind.TO_END;
}

export type Body = EmptyBody | ContentLengthBody | ChunkedBody | ToEndBody;

/**
 * Parsed HTTP request
 */
export interface Request extends RequestLine {
	/** Header fields in wire order */
	headers: Spanned<HeaderField>[];
	/** Message body */
	body: Spanned<Body>;
}

/**
 * Parsed HTTP response
 */
export interface Response extends StatusLine {
	/** Header fields in wire order */
	headers: Spanned<HeaderField>[];
	/** Message body */
	body: Spanned<Body>;
}

/**
 * Context needed to frame a response body
 */
export interface FramingHint {
	/** Whether the body may extend to the end of the buffer (connection closed) */
	readToClose: boolean;
	/** Method of the request this response answers; HEAD responses carry no body */
	requestMethod?: string;
}

/**
 * JSON value discriminator
 */
export enum JsonValueKind {
	NULL = "null",
	BOOL = "bool",
	NUMBER = "number",
	STRING = "string",
	ARRAY = "array",
	OBJECT = "object",
}

export interface JsonNull {
	kind: JsonValueKind.NULL;
}

export interface JsonBool {
	kind: JsonValueKind.BOOL;
	value: boolean;
}

export interface JsonNumber {
	kind: JsonValueKind.NUMBER;
	/** Parsed numeric value */
	value: number;
	/** The numeral exactly as written */
	raw: string;
}

export interface JsonString {
	kind: JsonValueKind.STRING;
	/** Unescaped value; the span covers the raw quoted text */
	value: string;
}

export interface JsonArray {
	kind: JsonValueKind.ARRAY;
	items: Spanned<JsonValue>[];
}

export interface JsonEntry {
	key: Spanned<string>;
	value: Spanned<JsonValue>;
}

export interface JsonObject {
	kind: JsonValueKind.OBJECT;
	/** Entries in source order, duplicates preserved */
	entries: JsonEntry[];
}

export type JsonValue = JsonNull | JsonBool | JsonNumber | JsonString | JsonArray | JsonObject;

/**
 * HTTP parser configuration options
 */
export interface HttpParserOptions {
	/** Maximum allowed header (or trailer) fields (default: 256) */
	maxHeaders?: number;
	/** Maximum number of chunks for chunked encoding (default: 10000) */
	maxChunks?: number;
}

/**
 * JSON parser configuration options
 */
export interface JsonParserOptions {
	/** Maximum array/object nesting depth (default: 128) */
	maxDepth?: number;
	/** Whether content after the top-level value is left unconsumed instead of failing (default: false) */
	allowTrailingData?: boolean;
}

/**
 * Grammar phase an HTTP error was raised in
 */
export enum ParserState {
	/** Parsing request line */
	REQUEST_LINE = "request_line",
	/** Parsing status line (response) */
	STATUS_LINE = "status_line",
	/** Parsing headers */
	HEADERS = "headers",
	/** Selecting and reading the body */
	BODY = "body",
	/** Parsing chunk size line */
	BODY_CHUNKED_SIZE = "body_chunked_size",
	/** Parsing chunk data */
	BODY_CHUNKED_DATA = "body_chunked_data",
	/** Parsing chunk trailer */
	BODY_CHUNKED_TRAILER = "body_chunked_trailer",
}

/**
 * Parser error codes
 */
export enum ParserErrorCode {
	/** Input ended before the grammar was satisfied */
	UNEXPECTED_EOF = "UNEXPECTED_EOF",
	/** A byte did not match what the grammar expected */
	UNEXPECTED_TOKEN = "UNEXPECTED_TOKEN",
	/** A delimiter was not found in the searched range */
	DELIMITER_NOT_FOUND = "DELIMITER_NOT_FOUND",
	/** A repetition matched fewer times than its minimum */
	TOO_FEW_REPETITIONS = "TOO_FEW_REPETITIONS",
	/** A span was built with start > end */
	INVALID_RANGE = "INVALID_RANGE",
	/** Two spans neither overlap nor touch */
	NON_CONTIGUOUS = "NON_CONTIGUOUS",
	/** Header name is empty or contains non-token bytes */
	MALFORMED_HEADER_NAME = "MALFORMED_HEADER_NAME",
	/** Both Content-Length and chunked Transfer-Encoding are present */
	AMBIGUOUS_FRAMING = "AMBIGUOUS_FRAMING",
	/** Invalid chunk size in chunked transfer encoding */
	INVALID_CHUNK_SIZE = "INVALID_CHUNK_SIZE",
	/** Content after a complete top-level value */
	TRAILING_DATA = "TRAILING_DATA",
	/** Invalid content length */
	INVALID_CONTENT_LENGTH = "INVALID_CONTENT_LENGTH",
	/** Invalid status code */
	INVALID_STATUS_CODE = "INVALID_STATUS_CODE",
	/** Transfer-Encoding other than chunked */
	UNSUPPORTED_TRANSFER_ENCODING = "UNSUPPORTED_TRANSFER_ENCODING",
	/** Response body length cannot be determined */
	UNKNOWN_BODY_LENGTH = "UNKNOWN_BODY_LENGTH",
	/** Too many headers */
	TOO_MANY_HEADERS = "TOO_MANY_HEADERS",
	/** Too many chunks */
	TOO_MANY_CHUNKS = "TOO_MANY_CHUNKS",
	/** JSON nesting deeper than allowed */
	NESTING_TOO_DEEP = "NESTING_TOO_DEEP",
}

/**
 * Parser error with detailed information
 */
export interface ParserError {
	/** Error code */
	code: ParserErrorCode;
	/** Human-readable error message */
	message: string;
	/** Byte offset in the input where the failure was detected */
	offset: number;
	/** What the grammar wanted at `offset` */
	expected?: string;
	/** HTTP grammar phase when the error occurred */
	state?: ParserState;
	/** Additional error details */
	details?: unknown;
}

export type HttpParseError = ParserError;

export type JsonParseError = ParserError;

/**
 * Outcome of every matcher, combinator and entry point
 */
export type Result<T, E = ParserError> = { ok: true; value: T } | { ok: false; error: E };

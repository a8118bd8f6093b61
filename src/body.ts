/**
 * HTTP Message Body Framing
 * Selects the body framing from the header block and reads the body bytes,
 * including the chunked transfer-coding state machine
 */

import type { Cursor } from "./cursor";
import {
	createError,
	fail,
	isFieldValueChar,
	isHexDigit,
	isOws,
	ok,
	parseChunkSize,
	parseContentLength,
	withState,
} from "./errors";
import { CRLF, readHeaderBlock, SpannedHeaders } from "./headers";
import { statusHasNoBody } from "./response";
import { type Span, type Spanned, sliceSpan, spanned, spanLength } from "./span";
import {
	type Body,
	BodyKind,
	type Chunk,
	type ChunkedBody,
	type FramingHint,
	type HeaderField,
	type HttpParserOptions,
	type ParserError,
	ParserErrorCode,
	ParserState,
	type Result,
} from "./types";

const CR = 0x0d;
const SEMICOLON = 0x3b;

/**
 * States of the chunked body reader
 */
export enum ChunkedState {
	/** Reading a hex size line */
	CHUNK_SIZE = "chunk_size",
	/** Reading chunk payload and its CRLF */
	CHUNK_DATA = "chunk_data",
	/** Reading trailer fields after the zero-size chunk */
	TRAILER = "trailer",
	DONE = "done",
}

interface ChunkSizeLine {
	/** Offset of the first hex digit */
	start: number;
	size: number;
	sizeSpan: Span;
	extensions: Span | null;
}

type ChunkedMachine =
	| { state: ChunkedState.CHUNK_SIZE }
	| { state: ChunkedState.CHUNK_DATA; line: ChunkSizeLine }
	| { state: ChunkedState.TRAILER }
	| { state: ChunkedState.DONE };

/**
 * What the message the body belongs to says about framing
 */
export type MessageContext =
	| { type: "request" }
	| { type: "response"; status: number; hint: FramingHint };

type Framing =
	| { type: "length"; length: number }
	| { type: "chunked" }
	| { type: "none" };

/**
 * Reads `1*HEXDIG [ chunk-ext ] CRLF`
 * Extensions start at the first `;` or whitespace after the digits and are kept as a span
 */
function readChunkSizeLine(cursor: Cursor): Result<ChunkSizeLine> {
	const start = cursor.snapshot();
	const digits = cursor.takeWhile(isHexDigit);

	if (digits.value.length === 0) {
		const code = cursor.isAtEnd() ? ParserErrorCode.UNEXPECTED_EOF : ParserErrorCode.INVALID_CHUNK_SIZE;
		return fail(createError(code, start, "chunk size"));
	}

	const size = parseChunkSize(cursor.text(digits.span));
	if (size === null) {
		cursor.restore(start);
		return fail(createError(ParserErrorCode.INVALID_CHUNK_SIZE, start, "chunk size", { tooLarge: true }));
	}

	// Extensions begin at ';' or at whitespace before it; anything else but CR ends the size badly
	let extensions: Span | null = null;
	const next = cursor.peekByte();
	if (next === SEMICOLON || (next !== undefined && isOws(next))) {
		extensions = cursor.takeWhile(isFieldValueChar).span;
	} else if (next !== undefined && next !== CR) {
		const offset = cursor.offset;
		cursor.restore(start);
		return fail(createError(ParserErrorCode.INVALID_CHUNK_SIZE, offset, "chunk size"));
	}

	const end = cursor.expectLiteral(CRLF);
	if (!end.ok) {
		cursor.restore(start);
		return end;
	}

	return ok({ extensions, size, sizeSpan: digits.span, start });
}

function toChunk(line: ChunkSizeLine, data: Span): Chunk {
	return { data, extensions: line.extensions, size: line.size, sizeSpan: line.sizeSpan };
}

/**
 * Reads a chunked body
 * Each chunk is spanned over its size line, data and CRLF; the zero-size chunk over its size line only.
 * The body span runs through the CRLF that ends the trailer section.
 * @param cursor - Cursor at the first size line
 * @param options - Limits on chunk and trailer counts (the zero-size chunk counts toward maxChunks)
 */
export function readChunkedBody(
	cursor: Cursor,
	options: Required<HttpParserOptions>
): Result<Spanned<ChunkedBody>> {
	const start = cursor.snapshot();
	const chunks: Spanned<Chunk>[] = [];
	let trailers: Spanned<HeaderField>[] = [];
	let machine: ChunkedMachine = { state: ChunkedState.CHUNK_SIZE };

	const abort = (error: ParserError, state: ParserState): Result<Spanned<ChunkedBody>> => {
		cursor.restore(start);
		return fail(withState(error, state));
	};

	while (machine.state !== ChunkedState.DONE) {
		switch (machine.state) {
			case ChunkedState.CHUNK_SIZE: {
				if (chunks.length >= options.maxChunks) {
					return abort(
						createError(ParserErrorCode.TOO_MANY_CHUNKS, cursor.offset, undefined, {
							maxChunks: options.maxChunks,
						}),
						ParserState.BODY_CHUNKED_SIZE
					);
				}

				const line = readChunkSizeLine(cursor);
				if (!line.ok) {
					return abort(line.error, ParserState.BODY_CHUNKED_SIZE);
				}

				// Last chunk: no data, trailers follow
				if (line.value.size === 0) {
					const data = { end: cursor.offset, start: cursor.offset };
					chunks.push(spanned(toChunk(line.value, data), { end: cursor.offset, start: line.value.start }));
					machine = { state: ChunkedState.TRAILER };
				} else {
					machine = { line: line.value, state: ChunkedState.CHUNK_DATA };
				}
				break;
			}

			case ChunkedState.CHUNK_DATA: {
				const data = cursor.take(machine.line.size);
				if (!data.ok) {
					return abort(data.error, ParserState.BODY_CHUNKED_DATA);
				}

				const end = cursor.expectLiteral(CRLF);
				if (!end.ok) {
					return abort(end.error, ParserState.BODY_CHUNKED_DATA);
				}

				chunks.push(
					spanned(toChunk(machine.line, data.value.span), {
						end: cursor.offset,
						start: machine.line.start,
					})
				);
				machine = { state: ChunkedState.CHUNK_SIZE };
				break;
			}

			case ChunkedState.TRAILER: {
				// Trailers share the header grammar; the block consumes the final CRLF
				const block = readHeaderBlock(cursor, options.maxHeaders);
				if (!block.ok) {
					return abort(block.error, ParserState.BODY_CHUNKED_TRAILER);
				}
				trailers = block.value.value;
				machine = { state: ChunkedState.DONE };
				break;
			}
		}
	}

	return ok(spanned({ chunks, kind: BodyKind.CHUNKED, trailers }, { end: cursor.offset, start }));
}

/**
 * Works out framing from Content-Length and Transfer-Encoding
 * Content-Length alongside a chunked Transfer-Encoding fails AMBIGUOUS_FRAMING at the later of the two fields
 */
function determineFraming(headers: SpannedHeaders): Result<Framing> {
	const lengthFields = headers.fields("content-length");
	const encodingFields = headers.fields("transfer-encoding");

	const chunkedField = encodingFields.find((field) =>
		splitCodings(field.value.value.value).includes("chunked")
	);
	if (lengthFields.length > 0 && chunkedField) {
		const offset = Math.max(lengthFields[0].span.start, chunkedField.span.start);
		return fail(
			createError(ParserErrorCode.AMBIGUOUS_FRAMING, offset, undefined, {
				contentLength: lengthFields[0].span,
				transferEncoding: chunkedField.span,
			})
		);
	}

	// Repeated Content-Length values must agree
	if (lengthFields.length > 0) {
		let length: number | null = null;
		for (const field of lengthFields) {
			const value = field.value.value;
			const parsed = parseContentLength(value.value);
			if (parsed === null || (length !== null && parsed !== length)) {
				return fail(
					createError(ParserErrorCode.INVALID_CONTENT_LENGTH, value.span.start, "decimal length", {
						value: value.value,
					})
				);
			}
			length = parsed;
		}
		return ok({ length: length ?? 0, type: "length" });
	}

	if (encodingFields.length > 0) {
		// Only a final chunked coding delimits the body
		const codings = encodingFields.flatMap((field) => splitCodings(field.value.value.value));
		if (codings[codings.length - 1] !== "chunked") {
			const value = encodingFields[0].value.value;
			return fail(
				createError(ParserErrorCode.UNSUPPORTED_TRANSFER_ENCODING, value.span.start, "chunked", {
					codings,
				})
			);
		}
		return ok({ type: "chunked" });
	}

	return ok({ type: "none" });
}

function splitCodings(value: string): string[] {
	return value
		.split(",")
		.map((coding) => coding.trim().toLowerCase())
		.filter((coding) => coding.length > 0);
}

/**
 * Reads the body that follows a header block
 *
 * Responses with status 1xx, 204 or 304, and responses to HEAD, never carry a body: they are
 * EMPTY before framing headers are looked at, so Content-Length next to a chunked
 * Transfer-Encoding is not reported as AMBIGUOUS_FRAMING on them. Every other message fails
 * AMBIGUOUS_FRAMING for that combination.
 * @param cursor - Cursor just past the empty line ending the headers
 * @param headers - The message's header fields
 * @param context - Request, or response with its status and framing hint
 * @param options - Parser limits
 * @returns The spanned body; an empty body is spanned at the cursor offset
 */
export function readBody(
	cursor: Cursor,
	headers: readonly Spanned<HeaderField>[],
	context: MessageContext,
	options: Required<HttpParserOptions>
): Result<Spanned<Body>> {
	const here = { end: cursor.offset, start: cursor.offset };

	if (
		context.type === "response" &&
		(statusHasNoBody(context.status) || context.hint.requestMethod === "HEAD")
	) {
		return ok(spanned({ kind: BodyKind.EMPTY }, here));
	}

	const framing = determineFraming(new SpannedHeaders(headers));
	if (!framing.ok) {
		return fail(withState(framing.error, ParserState.BODY));
	}

	switch (framing.value.type) {
		case "length": {
			const length = framing.value.length;
			const bytes = cursor.take(length);
			if (!bytes.ok) {
				return fail(withState(bytes.error, ParserState.BODY));
			}
			return ok(spanned({ kind: BodyKind.CONTENT_LENGTH, length }, bytes.value.span));
		}

		case "chunked":
			return readChunkedBody(cursor, options);

		case "none": {
			if (context.type === "request") {
				return ok(spanned({ kind: BodyKind.EMPTY }, here));
			}
			if (!context.hint.readToClose) {
				return fail(
					withState(createError(ParserErrorCode.UNKNOWN_BODY_LENGTH, cursor.offset), ParserState.BODY)
				);
			}
			const rest = cursor.take(cursor.remaining);
			if (!rest.ok) {
				return fail(withState(rest.error, ParserState.BODY));
			}
			return ok(spanned({ kind: BodyKind.TO_END }, rest.value.span));
		}
	}
}

/**
 * Payload bytes of a parsed body
 * Views the buffer directly except for chunked bodies, whose chunk data is concatenated
 * @param buffer - The buffer the message was parsed from
 * @param body - The spanned body
 */
export function bodyBytes(buffer: Uint8Array, body: Spanned<Body>): Uint8Array {
	if (body.value.kind !== BodyKind.CHUNKED) {
		return sliceSpan(buffer, body.span);
	}

	const chunks = body.value.chunks;
	const total = chunks.reduce((sum, chunk) => sum + spanLength(chunk.value.data), 0);
	const payload = new Uint8Array(total);
	let offset = 0;
	for (const chunk of chunks) {
		payload.set(sliceSpan(buffer, chunk.value.data), offset);
		offset += spanLength(chunk.value.data);
	}
	return payload;
}

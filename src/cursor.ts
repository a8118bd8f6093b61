/**
 * Byte Cursor
 * Position-tracking view over an input buffer with all-or-nothing matchers
 */

import { type BytePredicate, createError, fail, ok } from "./errors";
import { type Span, type Spanned, sliceSpan, spanned } from "./span";
import { type ParserError, ParserErrorCode, type Result } from "./types";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: false });

/**
 * Converts a literal to bytes; strings are encoded as UTF-8
 */
export function toBytes(literal: Uint8Array | string): Uint8Array {
	return typeof literal === "string" ? encoder.encode(literal) : literal;
}

/**
 * Decodes spanned bytes as UTF-8, keeping the span
 * Invalid sequences become U+FFFD
 */
export function decodeText(input: Spanned<Uint8Array>): Spanned<string> {
	return spanned(decoder.decode(input.value), input.span);
}

/**
 * Renders a byte for error expectations
 */
function describeByte(byte: number): string {
	if (byte >= 0x20 && byte < 0x7f) {
		return `'${String.fromCharCode(byte)}'`;
	}
	return `0x${byte.toString(16).padStart(2, "0")}`;
}

/**
 * Read-only cursor over a byte buffer
 *
 * Successful matches advance the offset; a failed match leaves it where it was.
 * Combinators rely on that to backtrack with a plain snapshot/restore of the offset.
 */
export class Cursor {
	readonly buffer: Uint8Array;
	private position: number;

	/**
	 * Creates a new cursor
	 * @param buffer - The input; never modified
	 * @param offset - Starting position (default: 0)
	 */
	constructor(buffer: Uint8Array, offset: number = 0) {
		if (!Number.isSafeInteger(offset) || offset < 0 || offset > buffer.length) {
			throw new RangeError(`Cursor offset ${offset} is outside the buffer (0..${buffer.length})`);
		}
		this.buffer = buffer;
		this.position = offset;
	}

	/**
	 * Current byte offset
	 */
	get offset(): number {
		return this.position;
	}

	/**
	 * Bytes left after the current offset
	 */
	get remaining(): number {
		return this.buffer.length - this.position;
	}

	isAtEnd(): boolean {
		return this.position >= this.buffer.length;
	}

	/**
	 * Captures the offset for a later restore
	 */
	snapshot(): number {
		return this.position;
	}

	/**
	 * Moves back to a snapshot taken on this cursor
	 * @param offset - A value previously returned by snapshot()
	 */
	restore(offset: number): void {
		if (!Number.isSafeInteger(offset) || offset < 0 || offset > this.buffer.length) {
			throw new RangeError(`Cannot restore cursor to ${offset}`);
		}
		this.position = offset;
	}

	/**
	 * Next byte, or undefined at end of input
	 */
	peekByte(): number | undefined {
		return this.position < this.buffer.length ? this.buffer[this.position] : undefined;
	}

	/**
	 * Next `n` bytes without advancing
	 * @param n - Number of bytes
	 * @returns A view of the bytes, INVALID_RANGE for a count that is not a non-negative integer, or UNEXPECTED_EOF
	 */
	peek(n: number): Result<Uint8Array> {
		const invalid = this.checkCount(n);
		if (invalid !== null) {
			return fail(invalid);
		}
		if (n > this.remaining) {
			return fail(createError(ParserErrorCode.UNEXPECTED_EOF, this.buffer.length, `${n} bytes`));
		}
		return ok(this.buffer.subarray(this.position, this.position + n));
	}

	/**
	 * Consumes exactly `n` bytes
	 * @param n - Number of bytes
	 * @returns The consumed bytes and their span, INVALID_RANGE, or UNEXPECTED_EOF
	 */
	take(n: number): Result<Spanned<Uint8Array>> {
		const invalid = this.checkCount(n);
		if (invalid !== null) {
			return fail(invalid);
		}
		if (n > this.remaining) {
			return fail(createError(ParserErrorCode.UNEXPECTED_EOF, this.buffer.length, `${n} bytes`));
		}
		return ok(this.advanceTo(this.position + n));
	}

	/**
	 * Consumes one byte that equals `match` or satisfies it
	 * @param match - A byte value or a byte-set predicate
	 * @param expected - Description used in the error
	 * @returns The byte and its span
	 */
	expectByte(match: number | BytePredicate, expected?: string): Result<Spanned<number>> {
		const byte = this.peekByte();
		const description = expected ?? (typeof match === "number" ? describeByte(match) : "byte");

		if (byte === undefined) {
			return fail(createError(ParserErrorCode.UNEXPECTED_EOF, this.position, description));
		}

		const matches = typeof match === "number" ? byte === match : match(byte);
		if (!matches) {
			return fail(createError(ParserErrorCode.UNEXPECTED_TOKEN, this.position, description));
		}

		const start = this.position;
		this.position += 1;
		return ok(spanned(byte, { end: this.position, start }));
	}

	/**
	 * Consumes an exact byte sequence
	 * Fails UNEXPECTED_TOKEN at the first mismatching byte, or UNEXPECTED_EOF if the
	 * input ends while the available prefix still matches
	 * @param literal - Bytes, or a string encoded as UTF-8
	 * @returns The span of the literal
	 */
	expectLiteral(literal: Uint8Array | string): Result<Span> {
		const bytes = toBytes(literal);
		const expected = typeof literal === "string" ? JSON.stringify(literal) : undefined;

		for (let i = 0; i < bytes.length; i++) {
			const at = this.position + i;
			if (at >= this.buffer.length) {
				return fail(createError(ParserErrorCode.UNEXPECTED_EOF, at, expected));
			}
			if (this.buffer[at] !== bytes[i]) {
				return fail(createError(ParserErrorCode.UNEXPECTED_TOKEN, at, expected));
			}
		}

		return ok(this.advanceTo(this.position + bytes.length).span);
	}

	/**
	 * Consumes bytes up to, not including, the first occurrence of `delimiter`
	 * @param delimiter - Bytes, or a string encoded as UTF-8
	 * @param limit - Optional maximum number of bytes to search before the delimiter
	 * @returns The consumed bytes, or DELIMITER_NOT_FOUND at the offset where the search stopped
	 */
	takeUntil(delimiter: Uint8Array | string, limit?: number): Result<Spanned<Uint8Array>> {
		const needle = toBytes(delimiter);
		const expected = typeof delimiter === "string" ? JSON.stringify(delimiter) : undefined;
		const searchEnd =
			limit === undefined
				? this.buffer.length
				: Math.min(this.buffer.length, this.position + limit + needle.length);

		for (let i = this.position; i + needle.length <= searchEnd; i++) {
			let found = true;
			for (let j = 0; j < needle.length; j++) {
				if (this.buffer[i + j] !== needle[j]) {
					found = false;
					break;
				}
			}
			if (found) {
				return ok(this.advanceTo(i));
			}
		}

		return fail(createError(ParserErrorCode.DELIMITER_NOT_FOUND, searchEnd, expected));
	}

	/**
	 * Consumes bytes while `predicate` holds; may consume nothing
	 * @param predicate - Byte-set predicate
	 * @returns The consumed bytes and their (possibly empty) span
	 */
	takeWhile(predicate: BytePredicate): Spanned<Uint8Array> {
		let end = this.position;
		while (end < this.buffer.length && predicate(this.buffer[end])) {
			end++;
		}
		return this.advanceTo(end);
	}

	/**
	 * Bytes covered by a span of this cursor's buffer, without copying
	 */
	slice(span: Span): Uint8Array {
		return sliceSpan(this.buffer, span);
	}

	/**
	 * Decodes the bytes of a span as UTF-8
	 */
	text(span: Span): string {
		return decoder.decode(this.slice(span));
	}

	// Byte counts must keep the offset whole and non-decreasing
	private checkCount(n: number): ParserError | null {
		if (Number.isSafeInteger(n) && n >= 0) {
			return null;
		}
		return createError(ParserErrorCode.INVALID_RANGE, this.position, "non-negative byte count", { count: n });
	}

	private advanceTo(end: number): Spanned<Uint8Array> {
		const start = this.position;
		this.position = end;
		return spanned(this.buffer.subarray(start, end), { end, start });
	}
}

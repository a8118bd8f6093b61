/**
 * HTTP Header Fields
 * Spanned header-field grammar and case-insensitive access that preserves original case
 */

import { literal, type Matcher, sequence } from "./combinators";
import { type Cursor, decodeText } from "./cursor";
import { createError, fail, isFieldValueChar, isOws, isTokenChar, ok } from "./errors";
import { type Spanned, spanned } from "./span";
import { type HeaderField, ParserErrorCode, type Result } from "./types";

export const CRLF = "\r\n";

const CR = 0x0d;
const COLON = 0x3a;

/**
 * Header name token, ended by the colon
 * An empty name or a non-token byte before the colon fails MALFORMED_HEADER_NAME at that byte
 */
const headerName: Matcher<Spanned<Uint8Array>> = (cursor) => {
	const start = cursor.snapshot();
	const name = cursor.takeWhile(isTokenChar);
	const stop = cursor.offset;
	const next = cursor.peekByte();
	cursor.restore(start);

	if (next === undefined) {
		return fail(createError(ParserErrorCode.UNEXPECTED_EOF, stop, "header name"));
	}
	if (next !== COLON || name.value.length === 0) {
		return fail(createError(ParserErrorCode.MALFORMED_HEADER_NAME, stop, "header name token"));
	}

	cursor.restore(stop);
	return ok(name);
};

const colon: Matcher<Spanned<Uint8Array>> = literal(":");

const ows: Matcher<Spanned<Uint8Array>> = (cursor) => ok(cursor.takeWhile(isOws));

/**
 * Field value; trailing whitespace is consumed but left out of the span
 */
const fieldValue: Matcher<Spanned<Uint8Array>> = (cursor) => {
	const raw = cursor.takeWhile(isFieldValueChar);
	let end = raw.span.end;
	while (end > raw.span.start && isOws(cursor.buffer[end - 1])) {
		end--;
	}
	const span = { end, start: raw.span.start };
	return ok(spanned(cursor.slice(span), span));
};

const headerLine = sequence(headerName, colon, ows, fieldValue, literal(CRLF));

/**
 * Reads one `token ":" OWS value OWS CRLF` line
 * @param cursor - Cursor at the first byte of the name
 * @returns The field, spanned over the whole line including CRLF
 */
export function readHeaderField(cursor: Cursor): Result<Spanned<HeaderField>> {
	const result = headerLine(cursor);
	if (!result.ok) {
		return result;
	}

	const [name, , , value] = result.value.value;
	return ok(spanned({ name: decodeText(name), value: decodeText(value) }, result.value.span));
}

/**
 * Reads header fields up to and including the empty line that ends the block
 * Shared by message headers and chunked trailers
 * @param cursor - Cursor at the first header line (or the terminating CRLF)
 * @param maxHeaders - Maximum number of fields allowed
 * @returns The fields in wire order; the span covers every line and the terminator
 */
export function readHeaderBlock(
	cursor: Cursor,
	maxHeaders: number
): Result<Spanned<Spanned<HeaderField>[]>> {
	const start = cursor.snapshot();
	const fields: Spanned<HeaderField>[] = [];

	while (cursor.peekByte() !== CR) {
		if (fields.length >= maxHeaders) {
			const error = createError(ParserErrorCode.TOO_MANY_HEADERS, cursor.offset, undefined, {
				maxHeaders,
			});
			cursor.restore(start);
			return fail(error);
		}

		const field = readHeaderField(cursor);
		if (!field.ok) {
			cursor.restore(start);
			return field;
		}
		fields.push(field.value);
	}

	const end = cursor.expectLiteral(CRLF);
	if (!end.ok) {
		cursor.restore(start);
		return end;
	}

	return ok(spanned(fields, { end: cursor.offset, start }));
}

/**
 * Read-only lookup by name over spanned header fields
 * Repeated names (Set-Cookie and the like) keep one entry per line; fields() returns them with their spans
 */
export class SpannedHeaders implements Iterable<[string, string]> {
	private readonly list: Spanned<HeaderField>[];
	private readonly lowerCaseMap: Map<string, Spanned<HeaderField>[]>;

	/**
	 * Creates a new SpannedHeaders view
	 * @param fields - Parsed fields in wire order
	 */
	constructor(fields: readonly Spanned<HeaderField>[] = []) {
		this.list = [...fields];
		this.lowerCaseMap = new Map();

		for (const field of fields) {
			const lowerName = field.value.name.value.toLowerCase();
			const existing = this.lowerCaseMap.get(lowerName);
			if (existing) {
				existing.push(field);
			} else {
				this.lowerCaseMap.set(lowerName, [field]);
			}
		}
	}

	/**
	 * Decoded value of the fields named `name`, joined with ", " when the name repeats
	 * @param name - Field name, matched without regard to case
	 * @returns undefined when no field has that name
	 */
	get(name: string): string | undefined {
		const matches = this.lowerCaseMap.get(name.toLowerCase());
		if (!matches) {
			return undefined;
		}
		return matches.map((field) => field.value.value.value).join(", ");
	}

	/**
	 * Decoded value of each field named `name`, one entry per field line
	 * @param name - Field name, matched without regard to case
	 */
	getAll(name: string): string[] {
		return this.fields(name).map((field) => field.value.value.value);
	}

	/**
	 * Spanned field lines named `name`, in wire order
	 * @param name - Field name, matched without regard to case
	 */
	fields(name: string): Spanned<HeaderField>[] {
		return [...(this.lowerCaseMap.get(name.toLowerCase()) ?? [])];
	}

	/**
	 * Whether any field line carries this name
	 */
	has(name: string): boolean {
		return this.lowerCaseMap.has(name.toLowerCase());
	}

	/**
	 * Distinct field names, spelled as on the first line that used each one
	 */
	names(): string[] {
		return Array.from(this.lowerCaseMap.values(), (matches) => matches[0].value.name.value);
	}

	/**
	 * [name, value] pairs for every field line, in wire order
	 */
	entries(): IterableIterator<[string, string]> {
		return this[Symbol.iterator]();
	}

	[Symbol.iterator](): IterableIterator<[string, string]> {
		const entries = this.list.map((field): [string, string] => [
			field.value.name.value,
			field.value.value.value,
		]);
		return entries[Symbol.iterator]();
	}

	/**
	 * Count of distinct names
	 */
	get size(): number {
		return this.lowerCaseMap.size;
	}

	/**
	 * Count of field lines, repeated names included
	 */
	get totalEntries(): number {
		return this.list.length;
	}

	/**
	 * Plain record keyed by lowercased name; spans are dropped and repeated values joined with ", "
	 */
	toObject(): Record<string, string> {
		const result: Record<string, string> = {};
		for (const [lowerName, matches] of this.lowerCaseMap) {
			result[lowerName] = matches.map((field) => field.value.value.value).join(", ");
		}
		return result;
	}

	/**
	 * Returns the spanned fields in wire order
	 */
	toArray(): Spanned<HeaderField>[] {
		return [...this.list];
	}
}

/**
 * Span primitives
 * Half-open byte ranges [start, end) over a buffer the caller owns
 */

import { createError, fail, ok } from "./errors";
import { ParserErrorCode, type Result } from "./types";

/**
 * A half-open byte range
 * Spans hold no reference to the buffer; combine one with the original buffer to get bytes
 */
export interface Span {
	readonly start: number;
	readonly end: number;
}

/**
 * A value paired with the exact bytes it was parsed from
 */
export interface Spanned<T> {
	readonly value: T;
	readonly span: Span;
}

/**
 * Builds a span after checking its bounds
 * @param start - Inclusive start offset
 * @param end - Exclusive end offset
 * @returns The span, or INVALID_RANGE if start > end or a bound is not a non-negative integer
 */
export function createSpan(start: number, end: number): Result<Span> {
	if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0 || start > end) {
		return fail(createError(ParserErrorCode.INVALID_RANGE, start, undefined, { end, start }));
	}
	return ok({ end, start });
}

export function spanLength(span: Span): number {
	return span.end - span.start;
}

export function isEmptySpan(span: Span): boolean {
	return span.start === span.end;
}

/**
 * Whether `inner` lies within `outer`
 * An empty span is contained wherever its position falls inside the outer bounds
 */
export function spanContains(outer: Span, inner: Span): boolean {
	return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Whether two spans share no byte
 */
export function spansDisjoint(a: Span, b: Span): boolean {
	if (isEmptySpan(a) || isEmptySpan(b)) {
		return true;
	}
	return a.end <= b.start || b.end <= a.start;
}

/**
 * Smallest span covering both inputs
 * Union requires overlap or adjacency, else NON_CONTIGUOUS
 * @param a - First span
 * @param b - Second span
 * @returns The covering span
 */
export function spanUnion(a: Span, b: Span): Result<Span> {
	if (a.end < b.start || b.end < a.start) {
		const gapStart = Math.min(a.end, b.end);
		return fail(createError(ParserErrorCode.NON_CONTIGUOUS, gapStart, undefined, { a, b }));
	}
	return ok({ end: Math.max(a.end, b.end), start: Math.min(a.start, b.start) });
}

/**
 * Shifts a span, for spans computed against a sub-buffer of a larger one
 * @param span - The span to shift
 * @param delta - Offset of the sub-buffer within the larger buffer
 */
export function offsetSpan(span: Span, delta: number): Span {
	return { end: span.end + delta, start: span.start + delta };
}

/**
 * Bytes a span covers, without copying
 * @param buffer - The buffer the span was produced from
 * @param span - The span to view
 */
export function sliceSpan(buffer: Uint8Array, span: Span): Uint8Array {
	return buffer.subarray(span.start, span.end);
}

export function spanned<T>(value: T, span: Span): Spanned<T> {
	return { span, value };
}

/**
 * Transforms the value, keeping the span
 */
export function mapSpanned<T, U>(input: Spanned<T>, fn: (value: T) => U): Spanned<U> {
	return { span: input.span, value: fn(input.value) };
}

/**
 * Whether `inner` was parsed from bytes within `outer`
 */
export function spannedContains(outer: Spanned<unknown>, inner: Spanned<unknown>): boolean {
	return spanContains(outer.span, inner.span);
}

/**
 * Parsing Combinators
 * Sequencing, optional, repetition and alternation over a Cursor.
 * Each combinator wraps its result as Spanned covering exactly the consumed range
 * and leaves the cursor untouched when it fails.
 */

import type { Cursor } from "./cursor";
import { type BytePredicate, createError, fail, furthestError, ok } from "./errors";
import { type Spanned, spanned } from "./span";
import { type ParserError, ParserErrorCode, type Result } from "./types";

/**
 * A parser over a cursor
 */
export type Matcher<T> = (cursor: Cursor) => Result<T>;

/**
 * Runs matchers in order
 * On failure the cursor goes back to where the sequence started
 */
export function sequence<A, B>(a: Matcher<A>, b: Matcher<B>): Matcher<Spanned<[A, B]>>;
export function sequence<A, B, C>(
	a: Matcher<A>,
	b: Matcher<B>,
	c: Matcher<C>
): Matcher<Spanned<[A, B, C]>>;
export function sequence<A, B, C, D>(
	a: Matcher<A>,
	b: Matcher<B>,
	c: Matcher<C>,
	d: Matcher<D>
): Matcher<Spanned<[A, B, C, D]>>;
export function sequence<A, B, C, D, E>(
	a: Matcher<A>,
	b: Matcher<B>,
	c: Matcher<C>,
	d: Matcher<D>,
	e: Matcher<E>
): Matcher<Spanned<[A, B, C, D, E]>>;
export function sequence<A, B, C, D, E, F>(
	a: Matcher<A>,
	b: Matcher<B>,
	c: Matcher<C>,
	d: Matcher<D>,
	e: Matcher<E>,
	f: Matcher<F>
): Matcher<Spanned<[A, B, C, D, E, F]>>;
export function sequence(...matchers: Matcher<unknown>[]): Matcher<Spanned<unknown[]>>;
export function sequence(...matchers: Matcher<unknown>[]): Matcher<Spanned<unknown[]>> {
	return (cursor) => {
		const start = cursor.snapshot();
		const values: unknown[] = [];

		for (const matcher of matchers) {
			const result = matcher(cursor);
			if (!result.ok) {
				cursor.restore(start);
				return result;
			}
			values.push(result.value);
		}

		return ok(spanned(values, { end: cursor.offset, start }));
	};
}

/**
 * Tries a matcher; absence is not an error
 * @returns null without consuming when `matcher` fails
 */
export function optional<T>(matcher: Matcher<T>): Matcher<Spanned<T> | null> {
	return (cursor) => {
		const start = cursor.snapshot();
		const result = matcher(cursor);

		if (!result.ok) {
			cursor.restore(start);
			return ok(null);
		}

		return ok(spanned(result.value, { end: cursor.offset, start }));
	};
}

/**
 * Applies a matcher greedily between `min` and `max` times
 * Stops early on a match that consumes nothing, since repeating it would never progress
 * @param matcher - The repeated matcher
 * @param min - Minimum repetitions, else TOO_FEW_REPETITIONS
 * @param max - Maximum repetitions (default: unbounded)
 */
export function repeat<T>(
	matcher: Matcher<T>,
	min: number = 0,
	max: number = Number.POSITIVE_INFINITY
): Matcher<Spanned<T[]>> {
	return (cursor) => {
		const start = cursor.snapshot();
		const values: T[] = [];
		let lastError: ParserError | null = null;

		while (values.length < max) {
			const before = cursor.snapshot();
			const result = matcher(cursor);

			if (!result.ok) {
				cursor.restore(before);
				lastError = result.error;
				break;
			}

			values.push(result.value);
			if (cursor.offset === before) {
				break;
			}
		}

		if (values.length < min) {
			const offset = lastError?.offset ?? cursor.offset;
			cursor.restore(start);
			return fail(
				createError(ParserErrorCode.TOO_FEW_REPETITIONS, offset, lastError?.expected, {
					cause: lastError,
					matched: values.length,
					min,
				})
			);
		}

		return ok(spanned(values, { end: cursor.offset, start }));
	};
}

/**
 * Tries matchers in declaration order; the first success wins
 * When all fail, reports the error that reached the furthest offset
 */
export function alternation<T>(...matchers: Matcher<T>[]): Matcher<Spanned<T>> {
	return (cursor) => {
		const start = cursor.snapshot();
		let error: ParserError | null = null;

		for (const matcher of matchers) {
			const result = matcher(cursor);
			if (result.ok) {
				return ok(spanned(result.value, { end: cursor.offset, start }));
			}
			cursor.restore(start);
			error = error === null ? result.error : furthestError(error, result.error);
		}

		return fail(
			error ?? createError(ParserErrorCode.UNEXPECTED_TOKEN, start, "one of no alternatives")
		);
	};
}

/**
 * Transforms a matcher's value
 */
export function map<T, U>(matcher: Matcher<T>, fn: (value: T) => U): Matcher<U> {
	return (cursor) => {
		const result = matcher(cursor);
		return result.ok ? ok(fn(result.value)) : result;
	};
}

/**
 * Matcher for a single byte or byte set
 */
export function byte(match: number | BytePredicate, expected?: string): Matcher<Spanned<number>> {
	return (cursor) => cursor.expectByte(match, expected);
}

/**
 * Matcher for an exact byte sequence; the value is the literal's span
 */
export function literal(text: Uint8Array | string): Matcher<Spanned<Uint8Array>> {
	return (cursor) => {
		const result = cursor.expectLiteral(text);
		return result.ok ? ok(spanned(cursor.slice(result.value), result.value)) : result;
	};
}

/**
 * Matcher for a non-empty run of bytes from a set
 * @param predicate - Byte-set predicate
 * @param expected - Description used when the run is empty
 */
export function takeWhile1(predicate: BytePredicate, expected: string): Matcher<Spanned<Uint8Array>> {
	return (cursor) => {
		if (cursor.isAtEnd()) {
			return fail(createError(ParserErrorCode.UNEXPECTED_EOF, cursor.offset, expected));
		}
		const run = cursor.takeWhile(predicate);
		if (run.value.length === 0) {
			return fail(createError(ParserErrorCode.UNEXPECTED_TOKEN, cursor.offset, expected));
		}
		return ok(run);
	};
}

/**
 * Shared test helpers
 */

import { formatError, type ParserError, type Result } from "../src/index";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
	return encoder.encode(text);
}

export function text(data: Uint8Array): string {
	return decoder.decode(data);
}

/**
 * Returns the value of a successful result, failing the test otherwise
 */
export function unwrap<T>(result: Result<T>): T {
	if (!result.ok) {
		throw new Error(`Expected success, got ${formatError(result.error)}`);
	}
	return result.value;
}

/**
 * Returns the error of a failed result, failing the test otherwise
 */
export function unwrapError<T>(result: Result<T>): ParserError {
	if (result.ok) {
		throw new Error("Expected failure, got success");
	}
	return result.error;
}

/**
 * Deterministic LCG so randomized failures reproduce
 * @returns A generator of numbers in [0, 1)
 */
export function seededRandom(seed: number): () => number {
	let state = seed;
	return () => {
		state = (Math.imul(state, 1103515245) + 12345) >>> 0;
		return state / 4294967296;
	};
}

/**
 * combine / flatCombine — fold several independent Results into one.
 *
 * Inputs are scanned in argument order and the first failure wins; the
 * transform only runs once every input has succeeded. Fixed arities (2..5)
 * keep each payload's type; the array form takes any number of results
 * sharing one success type.
 */

import { success } from "./result.js";
import type { Result } from "./result.js";

type ErasedTransform<U> = (...values: unknown[]) => U;

interface Combination<F, U> {
	readonly results: readonly Result<unknown, F>[];
	readonly apply: (values: unknown[]) => U;
}

/** Scan `results` in order: return the first failure, or hand every value to `onAllSucceeded`. */
function collect<F, R>(
	results: readonly Result<unknown, F>[],
	onAllSucceeded: (values: unknown[]) => Result<R, F>,
): Result<R, F> {
	const values: unknown[] = [];
	for (const result of results) {
		if (!result.ok) return result;
		values.push(result.value);
	}
	return onAllSucceeded(values);
}

/**
 * Split the arguments of either call shape into the ordered inputs and a
 * transform taking the collected values. Fixed arities get the values spread
 * back positionally; the array form gets the array itself.
 */
function unpack<F, U>(
	first: Result<unknown, F> | readonly Result<unknown, F>[],
	rest: readonly (Result<unknown, F> | ErasedTransform<U>)[],
): Combination<F, U> {
	const transform = rest[rest.length - 1];
	if (typeof transform !== "function") {
		throw new TypeError("combine expects a transform as its last argument");
	}
	if ("ok" in first) {
		const others = rest
			.slice(0, -1)
			.filter((arg): arg is Result<unknown, F> => typeof arg !== "function");
		return { results: [first, ...others], apply: (values) => transform(...values) };
	}
	return { results: first, apply: (values) => transform(values) };
}

// ── combine ──────────────────────────────────────────────────────────

/** Combine two results with a plain transform. */
export function combine<T1, T2, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	transform: (v1: T1, v2: T2) => R,
): Result<R, F>;
export function combine<T1, T2, T3, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	transform: (v1: T1, v2: T2, v3: T3) => R,
): Result<R, F>;
export function combine<T1, T2, T3, T4, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	r4: Result<T4, F>,
	transform: (v1: T1, v2: T2, v3: T3, v4: T4) => R,
): Result<R, F>;
export function combine<T1, T2, T3, T4, T5, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	r4: Result<T4, F>,
	r5: Result<T5, F>,
	transform: (v1: T1, v2: T2, v3: T3, v4: T4, v5: T5) => R,
): Result<R, F>;
/** Combine any number of same-typed results; `transform` receives the values in input order. */
export function combine<T, R, F>(
	results: readonly Result<T, F>[],
	transform: (values: T[]) => R,
): Result<R, F>;
export function combine<F>(
	first: Result<unknown, F> | readonly Result<unknown, F>[],
	...rest: (Result<unknown, F> | ErasedTransform<unknown>)[]
): Result<unknown, F> {
	const { results, apply } = unpack(first, rest);
	return collect(results, (values) => success(apply(values)));
}

// ── flatCombine ──────────────────────────────────────────────────────

/** Combine two results with a transform that may itself fail. */
export function flatCombine<T1, T2, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	transform: (v1: T1, v2: T2) => Result<R, F>,
): Result<R, F>;
export function flatCombine<T1, T2, T3, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	transform: (v1: T1, v2: T2, v3: T3) => Result<R, F>,
): Result<R, F>;
export function flatCombine<T1, T2, T3, T4, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	r4: Result<T4, F>,
	transform: (v1: T1, v2: T2, v3: T3, v4: T4) => Result<R, F>,
): Result<R, F>;
export function flatCombine<T1, T2, T3, T4, T5, R, F>(
	r1: Result<T1, F>,
	r2: Result<T2, F>,
	r3: Result<T3, F>,
	r4: Result<T4, F>,
	r5: Result<T5, F>,
	transform: (v1: T1, v2: T2, v3: T3, v4: T4, v5: T5) => Result<R, F>,
): Result<R, F>;
export function flatCombine<T, R, F>(
	results: readonly Result<T, F>[],
	transform: (values: T[]) => Result<R, F>,
): Result<R, F>;
export function flatCombine<F>(
	first: Result<unknown, F> | readonly Result<unknown, F>[],
	...rest: (Result<unknown, F> | ErasedTransform<Result<unknown, F>>)[]
): Result<unknown, F> {
	const { results, apply } = unpack(first, rest);
	return collect(results, apply);
}

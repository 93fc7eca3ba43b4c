/**
 * Result<T, F> — success or failure as a value, with a caller-chosen failure type.
 *
 * Expected failures are modelled as data instead of thrown exceptions.
 * Use success()/failure() factories and the combinators for safe chaining.
 */

import { isDeepStrictEqual } from "node:util";
import { UnwrapError } from "./errors.js";

/** Success variant carrying the value of a completed computation. */
export interface Success<T> {
	readonly ok: true;
	readonly value: T;
}

/** Failure variant carrying a modelled failure payload. */
export interface Failure<F> {
	readonly ok: false;
	readonly failure: F;
}

/** Discriminated union for fallible operations -- exactly one variant is ever inhabited. */
export type Result<T, F> = Success<T> | Failure<F>;

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function success<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given failure payload. */
export function failure<F>(value: F): Result<never, F> {
	return { ok: false, failure: value };
}

// ── Queries ──────────────────────────────────────────────────────────

/** Type guard: narrows a Result to its success variant. */
export function isSuccess<T, F>(result: Result<T, F>): result is Success<T> {
	return result.ok;
}

/** Type guard: narrows a Result to its failure variant. */
export function isFailure<T, F>(result: Result<T, F>): result is Failure<F> {
	return !result.ok;
}

/** The success value, or null for a failure. */
export function getOrNull<T, F>(result: Result<T, F>): T | null {
	return result.ok ? result.value : null;
}

/** The failure payload, or null for a success. */
export function failureOrNull<T, F>(result: Result<T, F>): F | null {
	return result.ok ? null : result.failure;
}

// ── Side-effect hooks ────────────────────────────────────────────────

/** Run `action` with the value if this is a success. Returns the same result. */
export function onSuccess<T, F>(result: Result<T, F>, action: (value: T) => void): Result<T, F> {
	if (result.ok) action(result.value);
	return result;
}

/** Run `action` with the failure payload if this is a failure. Returns the same result. */
export function onFailure<T, F>(result: Result<T, F>, action: (failure: F) => void): Result<T, F> {
	if (!result.ok) action(result.failure);
	return result;
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving failures untouched. */
export function map<T, F, R>(result: Result<T, F>, transform: (value: T) => R): Result<R, F> {
	return result.ok ? success(transform(result.value)) : result;
}

/** Transform the failure payload of a Result, leaving successes untouched. */
export function mapFailure<T, F, R>(result: Result<T, F>, transform: (failure: F) => R): Result<T, R> {
	return result.ok ? result : failure(transform(result.failure));
}

/** Chain a fallible operation on the success value; short-circuits on failure. */
export function flatMap<T, F, R>(
	result: Result<T, F>,
	transform: (value: T) => Result<R, F>,
): Result<R, F> {
	return result.ok ? transform(result.value) : result;
}

/** Chain a fallible operation on the failure payload; successes pass through. */
export function flatMapFailure<T, F, R>(
	result: Result<T, F>,
	transform: (failure: F) => Result<T, R>,
): Result<T, R> {
	return result.ok ? result : transform(result.failure);
}

/** Turn a failure into a success using `transform`. */
export function recover<T, F>(result: Result<T, F>, transform: (failure: F) => T): Result<T, F> {
	return result.ok ? result : success(transform(result.failure));
}

/**
 * Recover from a failure with a `transform` that may itself fail.
 * The transform's result is returned as is; successes pass through.
 */
export function flatRecover<T, F>(
	result: Result<T, F>,
	transform: (failure: F) => Result<T, F>,
): Result<T, F> {
	return result.ok ? result : transform(result.failure);
}

// ── Elimination ──────────────────────────────────────────────────────

/** Collapse both variants into one value. */
export function fold<T, F, R>(
	result: Result<T, F>,
	onSuccessValue: (value: T) => R,
	onFailureValue: (failure: F) => R,
): R {
	return result.ok ? onSuccessValue(result.value) : onFailureValue(result.failure);
}

/** Extract the success value or compute a fallback from the failure. */
export function getOrElse<T, F>(result: Result<T, F>, fallback: (failure: F) => T): T {
	return result.ok ? result.value : fallback(result.failure);
}

/**
 * Extract the success value or throw an {@link UnwrapError} carrying the failure as `cause`.
 * Use at system boundaries only.
 */
export function getOrThrow<T, F>(result: Result<T, F>): T {
	if (result.ok) return result.value;
	throw new UnwrapError("Called getOrThrow on a failure", { cause: result.failure });
}

/**
 * Structural equality: same variant and equal payloads under `eq`.
 * By default payloads are compared by value, so nested results and plain
 * objects with the same contents are equal.
 */
export function equals<T, F>(
	a: Result<T, F>,
	b: Result<T, F>,
	eq: (x: T | F, y: T | F) => boolean = isDeepStrictEqual,
): boolean {
	if (a.ok && b.ok) return eq(a.value, b.value);
	if (!a.ok && !b.ok) return eq(a.failure, b.failure);
	return false;
}

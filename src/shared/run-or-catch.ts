import { failure, success } from "./result.js";
import type { Result } from "./result.js";

/**
 * Run `block` and capture what it throws as a failure.
 *
 * The thrown value is kept exactly as thrown (no wrapping into Error), so the
 * failure type is `unknown`. This is the only place the library converts
 * exceptions into results; every other combinator lets them propagate.
 *
 * @example
 * ```ts
 * const parsed = runOrCatch((): unknown => JSON.parse(raw));
 * ```
 */
export function runOrCatch<T>(block: () => T): Result<T, unknown> {
	try {
		return success(block());
	} catch (e) {
		return failure(e);
	}
}

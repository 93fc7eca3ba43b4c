/**
 * ResultOfError hierarchy — the errors this library itself throws.
 *
 * Modelled failures travel inside Failure values; these classes only cover
 * boundary misuse (unwrapping a failure) and invalid configuration.
 */

/** Options for constructing ResultOfError subclasses with optional cause chain. */
interface ResultOfErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all errors raised by the library. */
export class ResultOfError extends Error {
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(message: string, code: string, context: Record<string, unknown> = {}) {
		super(message);
		this.name = "ResultOfError";
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Thrown when a failure is unwrapped as if it were a success; `cause` holds the failure payload. */
export class UnwrapError extends ResultOfError {
	constructor(message: string, context: Record<string, unknown> & ResultOfErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "UNWRAP_FAILURE", rest);
		this.name = "UnwrapError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends ResultOfError {
	constructor(message: string, context: Record<string, unknown> & ResultOfErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for UnwrapError. */
export function isUnwrapError(e: unknown): e is UnwrapError {
	return e instanceof UnwrapError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

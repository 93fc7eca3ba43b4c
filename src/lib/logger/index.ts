/**
 * Logger wrapper — structured logging backed by pino.
 *
 * The result core never logs. Callers wire a Logger into a pipeline through
 * `logFailure`, which plugs straight into `onFailure`.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly name?: string | undefined;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

/** A log call: a bare message, or structured fields plus a message. */
export interface LogFn {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
}

/** Structured logger interface. */
export interface Logger {
	readonly info: LogFn;
	readonly warn: LogFn;
	readonly error: LogFn;
	readonly debug: LogFn;
	child(bindings: Record<string, unknown>): Logger;
}

/** Levels `logFailure` may write at. */
export type FailureLogLevel = "debug" | "info" | "warn" | "error";

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = keyof Omit<Logger, "child">;

function forward(pinoLogger: pino.Logger, method: LogMethod): LogFn {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[method](msgOrObj);
		} else {
			pinoLogger[method](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		debug: forward(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "billing" });
 * logger.info({ invoiceId: "inv-1" }, "Invoice parsed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

// ── Result integration ──────────────────────────────────────────────

/**
 * Build an `onFailure` action that logs the failure payload.
 *
 * Error payloads go under `err` so pino's error serializer picks them up;
 * anything else goes under `failure`.
 *
 * @example
 * ```ts
 * onFailure(loadSettings(), logFailure(logger, "settings rejected"));
 * ```
 */
export function logFailure(
	logger: Logger,
	msg: string,
	level: FailureLogLevel = "warn",
): (failure: unknown) => void {
	return (failure: unknown): void => {
		const payload = failure instanceof Error ? { err: failure } : { failure };
		logger[level](payload, msg);
	};
}

/**
 * Library configuration.
 *
 * Only the ambient logging setup is configurable; the result core has no
 * knobs. Environment overrides are validated before use.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface LibraryConfig {
	/** Minimum level written by loggers built from this config */
	readonly logLevel: LogLevel;
	/** Logger name attached to every line */
	readonly logName: string;
}

export const DEFAULT_CONFIG: LibraryConfig = {
	logLevel: "info",
	logName: "result-of",
};

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

const logLevelSchema = z.enum(LOG_LEVELS);

/** Mutable builder shape for constructing Partial<LibraryConfig>. */
interface MutableLibraryConfig {
	logLevel?: LogLevel;
	logName?: string;
}

/**
 * Reads config values from environment variables.
 * Supported: RESULT_OF_LOG_LEVEL, RESULT_OF_LOG_NAME.
 * @throws ConfigError if RESULT_OF_LOG_LEVEL is not a known level
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<LibraryConfig> {
	const result: MutableLibraryConfig = {};

	const rawLevel = env.RESULT_OF_LOG_LEVEL;
	const level = rawLevel?.trim().toLowerCase();
	if (level) {
		const parsed = validate(logLevelSchema, level);
		if (!parsed.ok) {
			throw new ConfigError(
				`Invalid RESULT_OF_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
				{ cause: parsed.failure },
			);
		}
		result.logLevel = parsed.value;
	}

	const rawName = env.RESULT_OF_LOG_NAME?.trim();
	if (rawName) {
		result.logName = rawName;
	}

	return result;
}

/** Defaults merged with environment overrides. */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): LibraryConfig {
	return { ...DEFAULT_CONFIG, ...configFromEnv(env) };
}

// ── Result core ──────────────────────────────────────────────────────
export {
	type Result,
	type Success,
	type Failure,
	success,
	failure,
	isSuccess,
	isFailure,
	getOrNull,
	failureOrNull,
	onSuccess,
	onFailure,
	map,
	mapFailure,
	flatMap,
	flatMapFailure,
	recover,
	flatRecover,
	fold,
	getOrElse,
	getOrThrow,
	equals,
	combine,
	flatCombine,
	runOrCatch,
	ResultOfError,
	UnwrapError,
	ConfigError,
	isUnwrapError,
	isConfigError,
	type LibraryConfig,
	DEFAULT_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Logging ──────────────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogFn,
	type LogLevel,
	type FailureLogLevel,
	createLogger,
	logFailure,
} from "./lib/logger/index.js";

// ── Validation ───────────────────────────────────────────────────────
export {
	type ValidationIssue,
	ValidationError,
	validate,
	z,
} from "./lib/validation/index.js";

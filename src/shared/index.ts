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
} from "./result.js";

export { combine, flatCombine } from "./combine.js";
export { runOrCatch } from "./run-or-catch.js";

export {
	ResultOfError,
	UnwrapError,
	ConfigError,
	isUnwrapError,
	isConfigError,
} from "./errors.js";

export { type LibraryConfig, DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./config.js";

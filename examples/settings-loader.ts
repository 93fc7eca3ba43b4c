/**
 * Settings Loader — reads three independent settings and combines them.
 *
 * Each setting can fail on its own with a typed reason; the first failure
 * wins and the combined settings are only built once all three parse.
 * Run: npx tsx examples/settings-loader.ts
 */

import {
	type Result,
	combine,
	createLogger,
	failure,
	flatMap,
	fold,
	logFailure,
	onFailure,
	resolveConfig,
	success,
} from "../src/index.js";

// ── Failure model ─────────────────────────────────────────────────────

type SettingFailure =
	| { readonly kind: "missing"; readonly key: string }
	| { readonly kind: "malformed"; readonly key: string; readonly raw: string };

interface Settings {
	readonly port: number;
	readonly host: string;
	readonly verbose: boolean;
}

// ── Readers ───────────────────────────────────────────────────────────

const source: Record<string, string> = {
	PORT: "8080",
	HOST: "localhost",
	VERBOSE: "yes",
};

function read(key: string): Result<string, SettingFailure> {
	const raw = source[key];
	return raw === undefined ? failure({ kind: "missing", key }) : success(raw);
}

function readPort(): Result<number, SettingFailure> {
	return flatMap(read("PORT"), (raw): Result<number, SettingFailure> => {
		const port = Number(raw);
		if (Number.isInteger(port) && port > 0) return success(port);
		return failure({ kind: "malformed", key: "PORT", raw });
	});
}

function readFlag(key: string): Result<boolean, SettingFailure> {
	return flatMap(read(key), (raw): Result<boolean, SettingFailure> => {
		if (raw === "yes" || raw === "true") return success(true);
		if (raw === "no" || raw === "false") return success(false);
		return failure({ kind: "malformed", key, raw });
	});
}

// ── Main ──────────────────────────────────────────────────────────────

const config = resolveConfig();
const logger = createLogger({ level: config.logLevel, name: config.logName });

const settings = combine(
	readPort(),
	read("HOST"),
	readFlag("VERBOSE"),
	(port, host, verbose): Settings => ({ port, host, verbose }),
);

onFailure(settings, logFailure(logger, "settings rejected"));

logger.info(
	fold(
		settings,
		(s) => `listening on ${s.host}:${s.port}${s.verbose ? " (verbose)" : ""}`,
		(f) => `cannot start: ${f.kind} ${f.key}`,
	),
);

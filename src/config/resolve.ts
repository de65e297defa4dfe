// =============================================================================
// SETTINGS RESOLUTION — flag > environment > config file > default
// =============================================================================

import { StreamkeepError } from "../error/index.js";
import { isLogLevel } from "../logger/levels.js";
import type { ConnectionOptions, LogFormat, LogLevel } from "../types/index.js";
import { describeUrlProblem, type FileConfig, isLogFormat } from "./validate.js";

export const ENV_PREFIX = "STREAMKEEP_";

export const DEFAULTS = {
	insecure: false,
	timeout: 30_000,
	logLevel: "info" as const,
	logFormat: "pretty" as const,
};

/** Values taken from command-line flags; anything unset falls through. */
export interface FlagSettings {
	url?: string;
	username?: string;
	password?: string;
	insecure?: boolean;
	timeout?: number;
	logLevel?: LogLevel;
	logFormat?: LogFormat;
}

export interface ResolvedSettings {
	connection: Required<ConnectionOptions>;
	logLevel: LogLevel;
	logFormat: LogFormat;
}

export type ResolveResult =
	| { ok: true; settings: ResolvedSettings }
	| { ok: false; missing: string[] };

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
	const value = env[`${ENV_PREFIX}${name}`];
	return value === undefined || value.trim() === "" ? undefined : value;
}

export function parseBoolean(value: string, name: string): boolean {
	const normalized = value.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(normalized)) return true;
	if (["0", "false", "no", "off"].includes(normalized)) return false;
	throw StreamkeepError.invalidConfig(`${ENV_PREFIX}${name} must be a boolean, got "${value}"`);
}

/** Read the STREAMKEEP_* variables into the same shape as the flags. */
export function readEnvSettings(env: Env): FlagSettings {
	const settings: FlagSettings = {};

	const url = envValue(env, "URL");
	if (url !== undefined) {
		const problem = describeUrlProblem(url);
		if (problem) {
			throw StreamkeepError.invalidConfig(`${ENV_PREFIX}URL ${problem}`);
		}
		settings.url = url;
	}

	const username = envValue(env, "USERNAME");
	if (username !== undefined) settings.username = username;

	const password = envValue(env, "PASSWORD");
	if (password !== undefined) settings.password = password;

	const insecure = envValue(env, "INSECURE");
	if (insecure !== undefined) settings.insecure = parseBoolean(insecure, "INSECURE");

	const timeout = envValue(env, "TIMEOUT");
	if (timeout !== undefined) {
		const parsed = Number(timeout);
		if (!Number.isInteger(parsed) || parsed <= 0) {
			throw StreamkeepError.invalidConfig(
				`${ENV_PREFIX}TIMEOUT must be a positive integer (ms), got "${timeout}"`,
			);
		}
		settings.timeout = parsed;
	}

	const logLevel = envValue(env, "LOG_LEVEL");
	if (logLevel !== undefined) {
		if (!isLogLevel(logLevel)) {
			throw StreamkeepError.invalidConfig(`${ENV_PREFIX}LOG_LEVEL is not a log level: "${logLevel}"`);
		}
		settings.logLevel = logLevel;
	}

	const logFormat = envValue(env, "LOG_FORMAT");
	if (logFormat !== undefined) {
		if (!isLogFormat(logFormat)) {
			throw StreamkeepError.invalidConfig(
				`${ENV_PREFIX}LOG_FORMAT must be "pretty" or "json", got "${logFormat}"`,
			);
		}
		settings.logFormat = logFormat;
	}

	return settings;
}

/**
 * Merge the three sources. Endpoint and credentials have no default: when
 * any of them is missing everywhere, the result lists the flags to pass.
 */
export function resolveSettings(flags: FlagSettings, env: Env, file: FileConfig): ResolveResult {
	const fromEnv = readEnvSettings(env);

	const url = flags.url ?? fromEnv.url ?? file.url;
	const username = flags.username ?? fromEnv.username ?? file.username;
	const password = flags.password ?? fromEnv.password ?? file.password;

	if (url === undefined || username === undefined || password === undefined) {
		const missing: string[] = [];
		if (url === undefined) missing.push("--url");
		if (username === undefined) missing.push("--username");
		if (password === undefined) missing.push("--password");
		return { ok: false, missing };
	}

	return {
		ok: true,
		settings: {
			connection: {
				url,
				username,
				password,
				insecure: flags.insecure ?? fromEnv.insecure ?? file.insecure ?? DEFAULTS.insecure,
				timeout: flags.timeout ?? fromEnv.timeout ?? file.timeout ?? DEFAULTS.timeout,
			},
			logLevel: flags.logLevel ?? fromEnv.logLevel ?? file.logLevel ?? DEFAULTS.logLevel,
			logFormat: flags.logFormat ?? fromEnv.logFormat ?? file.logFormat ?? DEFAULTS.logFormat,
		},
	};
}

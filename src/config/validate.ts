// =============================================================================
// CONFIG FILE VALIDATION
// =============================================================================
// Lightweight runtime validator for the config file. Unknown keys are ignored
// so that a shared file can carry settings for other tools.

import { StreamkeepError } from "../error/index.js";
import type { LogFormat, LogLevel } from "../types/index.js";
import { isLogLevel, LOG_LEVELS } from "../logger/levels.js";

export const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

export interface FileConfig {
	url?: string;
	username?: string;
	password?: string;
	insecure?: boolean;
	timeout?: number;
	logLevel?: LogLevel;
	logFormat?: LogFormat;
}

export function isLogFormat(value: unknown): value is LogFormat {
	return value === "pretty" || value === "json";
}

/**
 * Why a cluster URL cannot be used, or `undefined` when it can. Credentials
 * belong in username/password: fetch refuses URLs that carry user-info.
 */
export function describeUrlProblem(value: string): string | undefined {
	let url: URL;
	try {
		url = new URL(value);
	} catch {
		return "is not a valid URL";
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		return "must use http:// or https://";
	}
	if (url.username !== "" || url.password !== "") {
		return "must not embed credentials; pass the username and password separately";
	}
	return undefined;
}

export function isPositiveInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Validate a loaded config object and keep only the keys we understand.
 * Throws INVALID_CONFIG naming the first offending key.
 *
 * @example
 * ```ts
 * validateFileConfig({ url: "https://localhost:9200", logLevel: "debug" }, "streamkeep.config.json");
 * ```
 */
export function validateFileConfig(config: unknown, source: string): FileConfig {
	if (config === undefined || config === null) return {};
	if (typeof config !== "object" || Array.isArray(config)) {
		throw StreamkeepError.invalidConfig(`${source}: config must be an object`);
	}

	const fail = (key: string, expected: string, value: unknown): never => {
		throw StreamkeepError.invalidConfig(
			`${source}: option "${key}" expected ${expected}, got ${JSON.stringify(value)}`,
		);
	};

	const result: FileConfig = {};
	const entries = new Map<string, unknown>(Object.entries(config));

	for (const key of ["url", "username", "password"] as const) {
		const value = entries.get(key);
		if (value === undefined || value === null) continue;
		if (typeof value !== "string" || value.length === 0) fail(key, "a non-empty string", value);
		else result[key] = value;
	}
	const urlProblem = result.url === undefined ? undefined : describeUrlProblem(result.url);
	if (urlProblem) {
		// The value is not echoed: it may hold a password.
		throw StreamkeepError.invalidConfig(`${source}: option "url" ${urlProblem}`);
	}

	const insecure = entries.get("insecure");
	if (insecure !== undefined && insecure !== null) {
		if (typeof insecure !== "boolean") fail("insecure", "a boolean", insecure);
		else result.insecure = insecure;
	}

	const timeout = entries.get("timeout");
	if (timeout !== undefined && timeout !== null) {
		if (!isPositiveInteger(timeout)) fail("timeout", "a positive integer (ms)", timeout);
		else result.timeout = timeout;
	}

	const logLevel = entries.get("logLevel");
	if (logLevel !== undefined && logLevel !== null) {
		if (!isLogLevel(logLevel)) fail("logLevel", `one of ${LOG_LEVELS.join(", ")}`, logLevel);
		else result.logLevel = logLevel;
	}

	const logFormat = entries.get("logFormat");
	if (logFormat !== undefined && logFormat !== null) {
		if (!isLogFormat(logFormat)) fail("logFormat", `one of ${LOG_FORMATS.join(", ")}`, logFormat);
		else result.logFormat = logFormat;
	}

	return result;
}

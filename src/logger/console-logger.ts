// =============================================================================
// CONSOLE LOGGER — One readable line per event, data as key=value pairs
// =============================================================================
//   2026-01-15T00:00:00.000Z INFO  [streamkeep]: Deleted index .ds-logs-000001 index=.ds-logs-000001

import pc from "picocolors";
import type { LogLevel, StreamkeepLogger } from "../types/index.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { maskCredentials, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Tag shown before each message. Default: `"streamkeep"` */
	prefix?: string;
	/** Whether to start lines with an ISO timestamp. Default: `true` */
	timestamps?: boolean;
	/** Line sink. Default: `process.stderr` for warn/error, `process.stdout` otherwise. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel) {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/** `value` as it appears after `key=`: bare when it has no spaces, JSON otherwise. */
export function formatValue(value: unknown): string {
	if (typeof value === "string") {
		return value === "" || /\s|"/.test(value) ? JSON.stringify(value) : value;
	}
	if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
		return value.map(formatValue).join(",");
	}
	return JSON.stringify(value) ?? String(value);
}

export function formatData(data: Record<string, unknown> | undefined): string {
	if (!data) return "";
	return Object.entries(data)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatValue(value)}`)
		.join(" ");
}

/**
 * Create a line-oriented logger for terminals. Colors follow picocolors'
 * detection (off for pipes and under `NO_COLOR`).
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: "debug" });
 * const admin = createDataStreamAdmin({ connection, logger });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): StreamkeepLogger {
	const { level = "info", prefix = "streamkeep", timestamps = true, write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const head = LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5)));
		const fields = formatData(redactData(data));
		let line = `${head} [${prefix}]: ${maskCredentials(message)}`;
		if (timestamps) line = `${pc.dim(new Date().toISOString())} ${line}`;
		if (fields) line = `${line} ${pc.dim(fields)}`;

		write(line, lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

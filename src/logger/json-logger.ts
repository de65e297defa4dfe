// =============================================================================
// JSON LOGGER — One JSON object per line, for cron jobs and log shippers
// =============================================================================

import type { LogLevel, StreamkeepLogger } from "../types/index.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { maskCredentials, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"streamkeep"` */
	service?: string;
	/** Line sink. Default: `process.stderr` for warn/error, `process.stdout` otherwise. */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel) {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/**
 * Create a structured JSON logger implementing `StreamkeepLogger`.
 *
 * @example
 * ```ts
 * const logger = createJsonLogger({ level: "debug", service: "retention-cron" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): StreamkeepLogger {
	const { level = "info", service = "streamkeep", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message: maskCredentials(message),
			...redactData(data),
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

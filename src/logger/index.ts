import type { LogFormat, LogLevel, StreamkeepLogger } from "../types/index.js";
import { createConsoleLogger } from "./console-logger.js";
import { createJsonLogger } from "./json-logger.js";

export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	formatData,
	formatValue,
} from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, LOG_LEVELS } from "./levels.js";
export { maskCredentials, redactData } from "./redact.js";

/** Pick the logger implementation for a `--log-format` value. */
export function createLogger(format: LogFormat, level: LogLevel): StreamkeepLogger {
	return format === "json" ? createJsonLogger({ level }) : createConsoleLogger({ level });
}

// =============================================================================
// SHARED TYPES
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

/**
 * Logger accepted by the administrator and the CLI. Anything with these four
 * methods works, so callers can forward to pino, winston, or a test spy.
 */
export interface StreamkeepLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

/** Connection parameters for one cluster. Immutable once handed to the admin. */
export interface ConnectionOptions {
	/** Cluster endpoint, e.g. "https://search.internal:9200" */
	url: string;
	username: string;
	password: string;
	/** Skip TLS certificate verification. Default: `false` */
	insecure?: boolean;
	/** Per-request timeout in milliseconds. Default: 30000 */
	timeout?: number;
}

import { ERROR_CODES, type ErrorCode } from "./codes.js";

export { ERROR_CODES, type ErrorCode, type RawErrorCode } from "./codes.js";

export interface StreamkeepErrorOptions {
	cause?: unknown;
	/** HTTP status returned by the cluster, when there was a response. */
	status?: number;
	transient?: boolean;
	details?: Record<string, unknown>;
}

export class StreamkeepError extends Error {
	readonly code: ErrorCode;
	readonly status?: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether running the same command again later may succeed.
	 *
	 * - `true`: cluster unreachable, timed out, or answered with a 5xx.
	 * - `false`: the cluster refused the request, or the input is invalid.
	 */
	readonly transient: boolean;

	constructor(code: ErrorCode, message: string, options?: StreamkeepErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status;
		this.transient = options?.transient ?? ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "StreamkeepError";
	}

	/**
	 * Create a StreamkeepError from a typed error code.
	 * Uses the default message and transient flag from ERROR_CODES.
	 */
	static fromCode(
		code: ErrorCode,
		options?: { message?: string } & StreamkeepErrorOptions,
	): StreamkeepError {
		return new StreamkeepError(code, options?.message ?? ERROR_CODES[code].message, options);
	}

	static connectionFailed(
		message: string = ERROR_CODES.CONNECTION_FAILED.message,
		options?: StreamkeepErrorOptions,
	) {
		return new StreamkeepError("CONNECTION_FAILED", message, options);
	}

	static requestTimeout(message: string = ERROR_CODES.REQUEST_TIMEOUT.message, cause?: unknown) {
		return new StreamkeepError("REQUEST_TIMEOUT", message, { cause });
	}

	/** 5xx answers are transient; anything else the cluster refused is not. */
	static storeError(message: string, status: number, details?: Record<string, unknown>) {
		return new StreamkeepError("STORE_ERROR", message, {
			status,
			details,
			transient: status >= 500,
		});
	}

	static invalidResponse(
		message: string = ERROR_CODES.INVALID_RESPONSE.message,
		details?: Record<string, unknown>,
	) {
		return new StreamkeepError("INVALID_RESPONSE", message, { details });
	}

	static invalidArgument(message: string = ERROR_CODES.INVALID_ARGUMENT.message, cause?: unknown) {
		return new StreamkeepError("INVALID_ARGUMENT", message, { cause });
	}

	static invalidConfig(message: string = ERROR_CODES.INVALID_CONFIG.message, cause?: unknown) {
		return new StreamkeepError("INVALID_CONFIG", message, { cause });
	}
}

export function isStreamkeepError(error: unknown): error is StreamkeepError {
	return error instanceof StreamkeepError;
}

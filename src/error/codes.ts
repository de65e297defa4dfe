// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with default messages. Every failure the CLI can
// surface maps to exactly one of these.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether the condition may clear up on its own (cluster unreachable,
	 * overloaded node). Deterministic failures such as a rejected template or
	 * a malformed argument are `false`.
	 */
	transient?: boolean;
};

export const ERROR_CODES = {
	// Transport-level failures, raised before the cluster answered.
	CONNECTION_FAILED: { message: "Could not connect to the cluster", transient: true },
	REQUEST_TIMEOUT: { message: "Request to the cluster timed out", transient: true },

	// The cluster answered, but not the way we needed.
	STORE_ERROR: { message: "Cluster rejected the request", transient: false },
	INVALID_RESPONSE: { message: "Unexpected response from the cluster", transient: false },

	// Local input problems.
	INVALID_ARGUMENT: { message: "Invalid argument", transient: false },
	INVALID_CONFIG: { message: "Invalid configuration", transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type ErrorCode = keyof typeof ERROR_CODES;

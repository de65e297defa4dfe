// =============================================================================
// CLIENT TYPES
// =============================================================================

import type { RequestInit, Response } from "undici";

/** Subset of `fetch` the client relies on. Tests pass an in-process fake. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE";

export interface FetchClientOptions {
	/** Cluster endpoint (e.g., "https://localhost:9200"). Trailing slashes are ignored. */
	baseURL: string;
	username: string;
	password: string;

	/** Timeout in milliseconds (default: 30000) */
	timeout?: number;

	/** Disable TLS certificate verification (default: false) */
	insecure?: boolean;

	/** Custom fetch implementation (default: undici's fetch) */
	fetch?: FetchFn;
}

/** A response whose status was not checked. Non-JSON bodies come back as `null`. */
export interface StoreResponse {
	status: number;
	ok: boolean;
	body: unknown;
}

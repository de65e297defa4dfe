// =============================================================================
// FETCH WRAPPER — Basic auth, timeout, TLS opt-out, error mapping
// =============================================================================

import { Agent, type RequestInit, type Response, fetch as undiciFetch } from "undici";
import { StreamkeepError } from "../error/index.js";
import type { FetchClientOptions, FetchFn, HttpMethod, StoreResponse } from "./types.js";

/**
 * Thin client over the cluster's REST API. The verb helpers throw STORE_ERROR
 * on any non-2xx status and resolve to the parsed JSON body, which callers
 * narrow themselves.
 */
export interface FetchClient {
	/** Send a request and hand back the raw status. Only transport failures throw. */
	send(method: HttpMethod, path: string, body?: unknown): Promise<StoreResponse>;
	get(path: string): Promise<unknown>;
	post(path: string, body?: unknown): Promise<unknown>;
	put(path: string, body?: unknown): Promise<unknown>;
	del(path: string): Promise<unknown>;
	/** Release the insecure-TLS connection pool, if one was created. */
	close(): Promise<void>;
}

export function basicAuthHeader(username: string, password: string): string {
	return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

/**
 * Read `error.type` and `error.reason` out of a cluster error body.
 * Older clusters send `error` as a plain string.
 */
export function describeClusterError(body: unknown): { type?: string; reason?: string } {
	if (!body || typeof body !== "object" || !("error" in body)) return {};
	const { error } = body;
	if (typeof error === "string") return { reason: error };
	if (!error || typeof error !== "object") return {};
	return {
		type: "type" in error && typeof error.type === "string" ? error.type : undefined,
		reason: "reason" in error && typeof error.reason === "string" ? error.reason : undefined,
	};
}

function isTimeout(error: unknown): boolean {
	return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/** undici reports every network failure as "fetch failed"; the cause says what happened. */
function transportReason(error: unknown): string {
	if (!(error instanceof Error)) return String(error);
	if (error.cause instanceof Error) return `${error.message} (${error.cause.message})`;
	return error.message;
}

export function createFetchClient(options: FetchClientOptions): FetchClient {
	const fetchFn: FetchFn = options.fetch ?? undiciFetch;
	const timeout = options.timeout ?? 30_000;
	const base = options.baseURL.replace(/\/+$/, "");
	const baseHeaders: Record<string, string> = {
		Accept: "application/json",
		Authorization: basicAuthHeader(options.username, options.password),
	};
	const dispatcher = options.insecure
		? new Agent({ connect: { rejectUnauthorized: false } })
		: undefined;

	async function send(method: HttpMethod, path: string, body?: unknown): Promise<StoreResponse> {
		const url = `${base}${path}`;

		const init: RequestInit = {
			method,
			headers: { ...baseHeaders },
			signal: AbortSignal.timeout(timeout),
		};
		if (dispatcher) {
			init.dispatcher = dispatcher;
		}
		if (body !== undefined) {
			init.headers = { ...baseHeaders, "Content-Type": "application/json" };
			init.body = JSON.stringify(body);
		}

		// The timeout signal also covers reading the body.
		let response: Response;
		let text: string;
		try {
			response = await fetchFn(url, init);
			text = await response.text();
		} catch (error) {
			if (isTimeout(error)) {
				throw StreamkeepError.requestTimeout(
					`${method} ${path} timed out after ${timeout}ms`,
					error,
				);
			}
			throw StreamkeepError.connectionFailed(`${method} ${path} failed: ${transportReason(error)}`, {
				cause: error,
			});
		}

		let parsed: unknown = null;
		if (text.length > 0) {
			try {
				parsed = JSON.parse(text);
			} catch {
				// Not JSON (proxy error pages and the like); keep null.
				parsed = null;
			}
		}

		return { status: response.status, ok: response.ok, body: parsed };
	}

	async function request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
		const response = await send(method, path, body);
		if (!response.ok) {
			throw toStoreError(method, path, response);
		}
		return response.body;
	}

	return {
		send,
		get: (path) => request("GET", path),
		post: (path, body) => request("POST", path, body),
		put: (path, body) => request("PUT", path, body),
		del: (path) => request("DELETE", path),
		async close() {
			await dispatcher?.close();
		},
	};
}

/** Build the STORE_ERROR raised for a non-2xx response. */
export function toStoreError(
	method: HttpMethod,
	path: string,
	response: StoreResponse,
): StreamkeepError {
	const { type, reason } = describeClusterError(response.body);
	const suffix = type ? `: ${type}${reason ? ` (${reason})` : ""}` : reason ? `: ${reason}` : "";
	return StreamkeepError.storeError(
		`${method} ${path} failed with HTTP ${response.status}${suffix}`,
		response.status,
		{
			method,
			path,
			...(type !== undefined && { type }),
			...(reason !== undefined && { reason }),
		},
	);
}

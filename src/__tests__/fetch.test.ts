import { Agent, type RequestInit, Response } from "undici";
import { describe, expect, it, vi } from "vitest";
import { basicAuthHeader, createFetchClient, describeClusterError } from "../client/fetch.js";
import type { FetchFn } from "../client/types.js";
import { StreamkeepError } from "../error/index.js";

const AUTH = "Basic YWRtaW46dGVzdC1zZWNyZXQ=";

function respondWith(status: number, body: string | null) {
	return vi.fn<FetchFn>(async () => new Response(body, { status }));
}

function client(fetch: FetchFn, overrides: { insecure?: boolean; baseURL?: string } = {}) {
	return createFetchClient({
		baseURL: overrides.baseURL ?? "https://localhost:9200",
		username: "admin",
		password: "test-secret",
		insecure: overrides.insecure,
		fetch,
	});
}

function lastInit(fetch: ReturnType<typeof respondWith>): RequestInit {
	const init = fetch.mock.calls.at(-1)?.[1];
	if (!init) throw new Error("fetch was not called");
	return init;
}

describe("basicAuthHeader", () => {
	it("base64-encodes username:password", () => {
		expect(basicAuthHeader("admin", "test-secret")).toBe(AUTH);
	});
});

describe("describeClusterError", () => {
	it("reads type and reason from an error object", () => {
		expect(
			describeClusterError({
				error: { type: "security_exception", reason: "missing authentication credentials" },
				status: 401,
			}),
		).toEqual({ type: "security_exception", reason: "missing authentication credentials" });
	});

	it("reads a plain string error as the reason", () => {
		expect(describeClusterError({ error: "Unauthorized" })).toEqual({ reason: "Unauthorized" });
	});

	it("returns nothing for bodies without an error", () => {
		expect(describeClusterError(null)).toEqual({});
		expect(describeClusterError({ acknowledged: true })).toEqual({});
	});
});

describe("createFetchClient", () => {
	it("joins the base URL and path, dropping trailing slashes", async () => {
		const fetch = respondWith(200, "{}");
		await client(fetch, { baseURL: "https://localhost:9200//" }).get("/_cluster/health");

		expect(fetch.mock.calls[0]?.[0]).toBe("https://localhost:9200/_cluster/health");
	});

	it("sends basic auth and no body on GET", async () => {
		const fetch = respondWith(200, "{}");
		await client(fetch).get("/_data_stream/logs");

		const init = lastInit(fetch);
		expect(init.method).toBe("GET");
		expect(init.headers).toEqual({ Accept: "application/json", Authorization: AUTH });
		expect(init.body).toBeUndefined();
	});

	it("JSON-encodes bodies and sets the content type", async () => {
		const fetch = respondWith(200, '{"acknowledged":true}');
		const result = await client(fetch).put("/_index_template/logs-template", { priority: 100 });

		const init = lastInit(fetch);
		expect(init.method).toBe("PUT");
		expect(init.headers).toEqual({
			Accept: "application/json",
			Authorization: AUTH,
			"Content-Type": "application/json",
		});
		expect(init.body).toBe('{"priority":100}');
		expect(result).toEqual({ acknowledged: true });
	});

	it("uses the default TLS settings unless insecure is set", async () => {
		const fetch = respondWith(200, "{}");
		await client(fetch).get("/");
		expect(lastInit(fetch).dispatcher).toBeUndefined();
	});

	it("routes through a non-verifying agent when insecure", async () => {
		const fetch = respondWith(200, "{}");
		const http = client(fetch, { insecure: true });
		await http.get("/");

		expect(lastInit(fetch).dispatcher).toBeInstanceOf(Agent);
		await http.close();
	});

	it("attaches a timeout signal", async () => {
		const fetch = respondWith(200, "{}");
		await client(fetch).get("/");
		expect(lastInit(fetch).signal).toBeDefined();
	});

	describe("send", () => {
		it("returns non-2xx responses without throwing", async () => {
			const fetch = respondWith(404, '{"error":{"type":"index_not_found_exception"},"status":404}');
			const response = await client(fetch).send("GET", "/_data_stream/logs");

			expect(response).toEqual({
				status: 404,
				ok: false,
				body: { error: { type: "index_not_found_exception" }, status: 404 },
			});
		});

		it("keeps non-JSON bodies as null", async () => {
			const fetch = respondWith(502, "<html>Bad Gateway</html>");
			const response = await client(fetch).send("GET", "/_cluster/health");
			expect(response.body).toBeNull();
		});

		it("treats an empty body as null", async () => {
			const fetch = respondWith(200, null);
			const response = await client(fetch).send("DELETE", "/.ds-logs-000001");
			expect(response).toEqual({ status: 200, ok: true, body: null });
		});
	});

	describe("error mapping", () => {
		it("throws STORE_ERROR with the cluster's type and reason", async () => {
			const fetch = respondWith(
				403,
				JSON.stringify({
					error: { type: "security_exception", reason: "no permissions for [indices:admin/delete]" },
					status: 403,
				}),
			);

			const error = await client(fetch)
				.del("/.ds-logs-000001")
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(StreamkeepError);
			expect(error).toMatchObject({
				code: "STORE_ERROR",
				status: 403,
				transient: false,
				message:
					"DELETE /.ds-logs-000001 failed with HTTP 403: security_exception (no permissions for [indices:admin/delete])",
				details: {
					method: "DELETE",
					path: "/.ds-logs-000001",
					type: "security_exception",
					reason: "no permissions for [indices:admin/delete]",
				},
			});
		});

		it("describes errors without a body by status alone", async () => {
			const fetch = respondWith(503, "");
			await expect(client(fetch).post("/logs/_rollover")).rejects.toMatchObject({
				code: "STORE_ERROR",
				status: 503,
				transient: true,
				message: "POST /logs/_rollover failed with HTTP 503",
			});
		});

		it("maps transport failures to CONNECTION_FAILED with the underlying cause", async () => {
			const cause = new Error("connect ECONNREFUSED 127.0.0.1:9200");
			const fetch = vi.fn<FetchFn>(async () => {
				throw new TypeError("fetch failed", { cause });
			});

			await expect(client(fetch).get("/_cluster/health")).rejects.toMatchObject({
				code: "CONNECTION_FAILED",
				message: "GET /_cluster/health failed: fetch failed (connect ECONNREFUSED 127.0.0.1:9200)",
			});
		});

		it("maps timeouts to REQUEST_TIMEOUT", async () => {
			const fetch = vi.fn<FetchFn>(async () => {
				const error = new Error("The operation was aborted due to timeout");
				error.name = "TimeoutError";
				throw error;
			});
			const http = createFetchClient({
				baseURL: "https://localhost:9200",
				username: "admin",
				password: "test-secret",
				timeout: 250,
				fetch,
			});

			await expect(http.get("/_cluster/health")).rejects.toMatchObject({
				code: "REQUEST_TIMEOUT",
				message: "GET /_cluster/health timed out after 250ms",
			});
		});

		it("maps a timeout while reading the body to REQUEST_TIMEOUT", async () => {
			const fetch = vi.fn<FetchFn>(async () => {
				const response = new Response('{"data_streams":[]}', { status: 200 });
				const aborted = new Error("The operation was aborted due to timeout");
				aborted.name = "TimeoutError";
				vi.spyOn(response, "text").mockRejectedValue(aborted);
				return response;
			});
			const http = createFetchClient({
				baseURL: "https://localhost:9200",
				username: "admin",
				password: "test-secret",
				timeout: 250,
				fetch,
			});

			await expect(http.get("/_data_stream/logs")).rejects.toMatchObject({
				code: "REQUEST_TIMEOUT",
				message: "GET /_data_stream/logs timed out after 250ms",
			});
		});

		it("maps a dropped connection while reading the body to CONNECTION_FAILED", async () => {
			const fetch = vi.fn<FetchFn>(async () => {
				const response = new Response("{}", { status: 200 });
				vi.spyOn(response, "text").mockRejectedValue(new TypeError("terminated"));
				return response;
			});

			await expect(client(fetch).get("/_data_stream/logs")).rejects.toMatchObject({
				code: "CONNECTION_FAILED",
				message: "GET /_data_stream/logs failed: terminated",
			});
		});
	});
});

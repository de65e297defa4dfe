// =============================================================================
// FAKE CLUSTER — in-process stand-in for the cluster's management API
// =============================================================================
// Handed to the client as its `fetch` implementation. Keeps just enough state
// (templates, data streams, backing indices) for the admin operations, and
// records every request for assertions.

import { Headers, type RequestInit, Response } from "undici";
import { vi } from "vitest";
import type { FetchFn } from "../client/types.js";
import type { StreamkeepLogger } from "../types/index.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Fixed "now" for age calculations: 2026-01-15T00:00:00Z. */
export const NOW = Date.UTC(2026, 0, 15);

export interface RecordedRequest {
	method: string;
	path: string;
	authorization: string | null;
	contentType: string | null;
	body: unknown;
	insecure: boolean;
}

interface Override {
	method: string;
	path: string;
	status: number;
	body: unknown;
}

export interface FakeIndex {
	name: string;
	createdAt: number;
}

function json(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});
}

function notFound(resource: string): Response {
	return json(404, {
		error: {
			type: "index_not_found_exception",
			reason: `no such index [${resource}]`,
		},
		status: 404,
	});
}

export function createFakeCluster(options: { now?: () => number } = {}) {
	const now = options.now ?? (() => NOW);
	const requests: RecordedRequest[] = [];
	const overrides: Override[] = [];
	const templates = new Map<string, unknown>();
	const streams = new Map<string, string[]>();
	const indices = new Map<string, number>();

	function addStream(name: string, backing: FakeIndex[]) {
		streams.set(name, backing.map((index) => index.name));
		for (const index of backing) indices.set(index.name, index.createdAt);
	}

	function nextGeneration(name: string): string {
		const generation = (streams.get(name)?.length ?? 0) + 1;
		return `.ds-${name}-${String(generation).padStart(6, "0")}`;
	}

	/** Answer `method path` with a fixed response from now on. */
	function respond(method: string, path: string, status: number, body: unknown) {
		overrides.push({ method, path, status, body });
	}

	function route(method: string, segments: string[], body: unknown): Response {
		const [first, second] = segments;

		if (method === "GET" && first === "_cluster" && second === "health") {
			return json(200, { cluster_name: "test-cluster", status: "green" });
		}

		if (first === "_index_template" && second && method === "PUT") {
			templates.set(second, body);
			return json(200, { acknowledged: true });
		}

		if (first === "_data_stream" && second) {
			const backing = streams.get(second);
			if (method === "GET") {
				if (!backing) return notFound(second);
				return json(200, {
					data_streams: [
						{
							name: second,
							timestamp_field: { name: "@timestamp" },
							indices: backing.map((index_name) => ({ index_name, index_uuid: `uuid-${index_name}` })),
							generation: backing.length,
							status: "GREEN",
							template: `${second}-template`,
						},
					],
				});
			}
			if (method === "PUT") {
				if (backing) {
					return json(400, {
						error: {
							type: "resource_already_exists_exception",
							reason: `data_stream [${second}] already exists`,
						},
						status: 400,
					});
				}
				const index = nextGeneration(second);
				addStream(second, [{ name: index, createdAt: now() }]);
				return json(200, { acknowledged: true });
			}
		}

		if (first && second === "_rollover" && method === "POST") {
			const backing = streams.get(first);
			if (!backing) return notFound(first);
			const oldIndex = backing[backing.length - 1];
			const newIndex = nextGeneration(first);
			backing.push(newIndex);
			indices.set(newIndex, now());
			return json(200, {
				acknowledged: true,
				shards_acknowledged: true,
				old_index: oldIndex,
				new_index: newIndex,
				rolled_over: true,
				dry_run: false,
			});
		}

		if (first && segments.length === 1) {
			const createdAt = indices.get(first);
			if (createdAt === undefined) return notFound(first);
			if (method === "GET") {
				return json(200, {
					[first]: {
						aliases: {},
						settings: {
							index: {
								creation_date: String(createdAt),
								number_of_shards: "1",
								provided_name: first,
							},
						},
					},
				});
			}
			if (method === "DELETE") {
				indices.delete(first);
				for (const backing of streams.values()) {
					const position = backing.indexOf(first);
					if (position >= 0) backing.splice(position, 1);
				}
				return json(200, { acknowledged: true });
			}
		}

		return json(405, { error: { type: "unsupported_operation", reason: `${method} not routed` } });
	}

	const fetch = vi.fn<FetchFn>(async (url: string, init: RequestInit) => {
		const method = init.method ?? "GET";
		const { pathname } = new URL(url);
		const headers = new Headers(init.headers);
		const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : undefined;

		requests.push({
			method,
			path: pathname,
			authorization: headers.get("authorization"),
			contentType: headers.get("content-type"),
			body,
			insecure: init.dispatcher !== undefined,
		});

		const override = overrides.find((o) => o.method === method && o.path === pathname);
		if (override) return json(override.status, override.body);

		const segments = pathname.split("/").filter(Boolean).map(decodeURIComponent);
		return route(method, segments, body);
	});

	return {
		fetch,
		requests,
		templates,
		streams,
		indices,
		addStream,
		respond,
		/** "METHOD /path" for every request so far. */
		calls: () => requests.map((r) => `${r.method} ${r.path}`),
	};
}

export type FakeCluster = ReturnType<typeof createFakeCluster>;

export function createTestLogger() {
	return {
		debug: vi.fn<StreamkeepLogger["debug"]>(),
		info: vi.fn<StreamkeepLogger["info"]>(),
		warn: vi.fn<StreamkeepLogger["warn"]>(),
		error: vi.fn<StreamkeepLogger["error"]>(),
	} satisfies StreamkeepLogger;
}

/** Messages passed to one logger method, in call order. */
export function messages(method: { mock: { calls: unknown[][] } }): unknown[] {
	return method.mock.calls.map((call) => call[0]);
}

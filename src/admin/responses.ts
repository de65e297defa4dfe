// =============================================================================
// RESPONSE READERS — Narrow cluster JSON into the fields we act on
// =============================================================================

import { StreamkeepError } from "../error/index.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `GET /_data_stream/<name>` → names of the current backing indices, in cluster order. */
export function readBackingIndexNames(body: unknown, dataStream: string): string[] {
	const streams = isRecord(body) ? body.data_streams : undefined;
	const stream: unknown = Array.isArray(streams) ? streams[0] : undefined;
	const indices = isRecord(stream) ? stream.indices : undefined;
	if (!Array.isArray(indices)) {
		throw StreamkeepError.invalidResponse(
			`Data stream ${dataStream} descriptor has no indices list`,
			{ dataStream },
		);
	}

	const entries: unknown[] = indices;
	return entries.map((entry, position) => {
		const name = isRecord(entry) ? entry.index_name : undefined;
		if (typeof name !== "string" || name.length === 0) {
			throw StreamkeepError.invalidResponse(
				`Data stream ${dataStream} has a backing index without a name`,
				{ dataStream, position },
			);
		}
		return name;
	});
}

/**
 * `GET /<index>` → `settings.index.creation_date` in epoch milliseconds.
 * The cluster serialises it as a string; numbers are accepted too.
 */
export function readCreationDate(body: unknown, index: string): number {
	const entry = isRecord(body) ? body[index] : undefined;
	const settings = isRecord(entry) ? entry.settings : undefined;
	const indexSettings = isRecord(settings) ? settings.index : undefined;
	const raw = isRecord(indexSettings) ? indexSettings.creation_date : undefined;

	const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw StreamkeepError.invalidResponse(`Index ${index} has no usable creation_date`, {
			index,
			creationDate: raw ?? null,
		});
	}
	return value;
}

/** Optional `old_index` / `new_index` from a rollover answer. */
export function readRolloverIndices(body: unknown): { oldIndex?: string; newIndex?: string } {
	if (!isRecord(body)) return {};
	const { old_index: oldIndex, new_index: newIndex } = body;
	return {
		...(typeof oldIndex === "string" && { oldIndex }),
		...(typeof newIndex === "string" && { newIndex }),
	};
}

/** Optional cluster name and health colour from `/_cluster/health`. */
export function readClusterHealth(body: unknown): Record<string, unknown> {
	if (!isRecord(body)) return {};
	const { cluster_name: cluster, status: health } = body;
	return {
		...(typeof cluster === "string" && { cluster }),
		...(typeof health === "string" && { health }),
	};
}

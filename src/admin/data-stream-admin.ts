// =============================================================================
// DATA STREAM ADMIN — create, roll over and prune data streams
// =============================================================================
// Every operation is one or two REST calls against the cluster's management
// API. Failures the cluster reports propagate as StreamkeepError; the only
// conditions handled here are "stream already exists" on create and "stream
// does not exist" on rollover/clean.

import { createFetchClient, describeClusterError, toStoreError } from "../client/fetch.js";
import { StreamkeepError } from "../error/index.js";
import { createConsoleLogger } from "../logger/console-logger.js";
import {
	readBackingIndexNames,
	readClusterHealth,
	readCreationDate,
	readRolloverIndices,
} from "./responses.js";
import type {
	BackingIndex,
	CleanOptions,
	CleanResult,
	CreateResult,
	DataStreamAdmin,
	DataStreamAdminOptions,
	RolloverResult,
} from "./types.js";

export const TEMPLATE_PRIORITY = 100;

const SECONDS_PER_DAY = 24 * 60 * 60;

export function templateName(dataStream: string): string {
	return `${dataStream}-template`;
}

/** Body of the composable index template backing a data stream. */
export function templateBody(dataStream: string) {
	return {
		index_patterns: dataStream,
		data_stream: {},
		priority: TEMPLATE_PRIORITY,
	};
}

/**
 * An index is expired once it is strictly older than the retention window.
 * An index exactly `retentionDays` old is kept.
 */
export function isExpired(createdAt: number, now: number, retentionDays: number): boolean {
	return now - createdAt > retentionDays * SECONDS_PER_DAY * 1000;
}

function segment(value: string): string {
	return encodeURIComponent(value);
}

export function createDataStreamAdmin(options: DataStreamAdminOptions): DataStreamAdmin {
	const { connection } = options;
	const logger = options.logger ?? createConsoleLogger();
	const now = options.now ?? Date.now;
	const http = createFetchClient({
		baseURL: connection.url,
		username: connection.username,
		password: connection.password,
		timeout: connection.timeout,
		insecure: connection.insecure,
		fetch: options.fetch,
	});

	async function checkConnection(): Promise<void> {
		const path = "/_cluster/health";
		const response = await http.send("GET", path);
		if (!response.ok) {
			const { type, reason } = describeClusterError(response.body);
			throw StreamkeepError.connectionFailed(
				`Cluster health check failed with HTTP ${response.status}${type ? `: ${type}` : ""}`,
				{
					status: response.status,
					transient: response.status >= 500,
					details: {
						path,
						...(type !== undefined && { type }),
						...(reason !== undefined && { reason }),
					},
				},
			);
		}
		logger.info("Connection to cluster successful", readClusterHealth(response.body));
	}

	async function exists(name: string): Promise<boolean> {
		const response = await http.send("GET", `/_data_stream/${segment(name)}`);
		// Anything but 200 reads as "absent", including auth and server errors.
		return response.status === 200;
	}

	async function create(name: string): Promise<CreateResult> {
		const template = templateName(name);
		await http.put(`/_index_template/${segment(template)}`, templateBody(name));
		logger.info(`Created index template ${template}`, { template, dataStream: name });

		const path = `/_data_stream/${segment(name)}`;
		const response = await http.send("PUT", path);
		if (response.status === 400) {
			const { type } = describeClusterError(response.body);
			if (type === "resource_already_exists_exception") {
				logger.info(`Data stream ${name} already exists`, { dataStream: name });
				return "already_exists";
			}
		}
		if (!response.ok) {
			throw toStoreError("PUT", path, response);
		}

		logger.info(`Created data stream ${name}`, { dataStream: name });
		return "created";
	}

	async function rollover(name: string): Promise<RolloverResult> {
		if (!(await exists(name))) {
			logger.error(`Data stream ${name} does not exist`, { dataStream: name });
			return { status: "not_found" };
		}

		const body = await http.post(`/${segment(name)}/_rollover`);
		const indices = readRolloverIndices(body);
		logger.info(`Rolled over data stream ${name}`, { dataStream: name, ...indices });
		return { status: "rolled_over", ...indices };
	}

	async function deleteIndex(index: string): Promise<void> {
		await http.del(`/${segment(index)}`);
		logger.info(`Deleted index ${index}`, { index });
	}

	async function listBackingIndices(name: string): Promise<BackingIndex[]> {
		const descriptor = await http.get(`/_data_stream/${segment(name)}`);
		const names = readBackingIndexNames(descriptor, name);
		logger.info(`Found indices ${names.join(", ") || "(none)"} for data stream ${name}`, {
			dataStream: name,
			indices: names,
		});

		// One request at a time; the cluster sees at most one settings lookup in flight.
		const indices: BackingIndex[] = [];
		for (const index of names) {
			const settings = await http.get(`/${segment(index)}`);
			indices.push({ name: index, createdAt: readCreationDate(settings, index) });
		}
		return indices;
	}

	async function cleanOldIndices(
		name: string,
		retentionDays: number,
		cleanOptions: CleanOptions = {},
	): Promise<CleanResult> {
		if (!Number.isInteger(retentionDays) || retentionDays < 0) {
			throw StreamkeepError.invalidArgument(
				`Retention period must be a non-negative whole number of days, got ${retentionDays}`,
			);
		}

		if (!(await exists(name))) {
			logger.error(`Data stream ${name} does not exist`, { dataStream: name });
			return { status: "not_found" };
		}

		const indices = await listBackingIndices(name);
		const deleted: string[] = [];
		const retained: string[] = [];

		for (const index of indices) {
			const at = now();
			if (!isExpired(index.createdAt, at, retentionDays)) {
				retained.push(index.name);
				continue;
			}

			const ageSeconds = Math.floor((at - index.createdAt) / 1000);
			if (cleanOptions.dryRun) {
				logger.info(`Would delete index ${index.name}, age: ${ageSeconds} seconds`, {
					index: index.name,
					ageSeconds,
				});
			} else {
				logger.info(`Deleting index ${index.name}, age: ${ageSeconds} seconds`, {
					index: index.name,
					ageSeconds,
				});
				await deleteIndex(index.name);
			}
			deleted.push(index.name);
		}

		logger.info(`Finished cleaning data stream ${name}`, {
			dataStream: name,
			deleted: deleted.length,
			retained: retained.length,
			...(cleanOptions.dryRun && { dryRun: true }),
		});
		return { status: "cleaned", deleted, retained };
	}

	return {
		checkConnection,
		exists,
		create,
		rollover,
		deleteIndex,
		cleanOldIndices,
		close: () => http.close(),
	};
}

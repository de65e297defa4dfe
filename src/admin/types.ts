// =============================================================================
// ADMIN TYPES
// =============================================================================

import type { FetchFn } from "../client/types.js";
import type { ConnectionOptions, StreamkeepLogger } from "../types/index.js";

export interface DataStreamAdminOptions {
	connection: ConnectionOptions;
	/** Where progress and soft failures are reported. Default: console logger */
	logger?: StreamkeepLogger;
	/** Custom fetch implementation (default: undici's fetch) */
	fetch?: FetchFn;
	/** Clock used for index ages, epoch milliseconds. Default: `Date.now` */
	now?: () => number;
}

export type CreateResult = "created" | "already_exists";

export type RolloverResult =
	| { status: "rolled_over"; oldIndex?: string; newIndex?: string }
	| { status: "not_found" };

export interface CleanOptions {
	/** Report what would be deleted without deleting it. */
	dryRun?: boolean;
}

export type CleanResult =
	| { status: "not_found" }
	| { status: "cleaned"; deleted: string[]; retained: string[] };

/** A backing index and when the cluster created it. */
export interface BackingIndex {
	name: string;
	/** Epoch milliseconds, from `settings.index.creation_date`. */
	createdAt: number;
}

export interface DataStreamAdmin {
	/** Probe `/_cluster/health`. Throws CONNECTION_FAILED unless the cluster answers 2xx. */
	checkConnection(): Promise<void>;
	/** `true` only when the cluster answers 200; any other status counts as absent. */
	exists(name: string): Promise<boolean>;
	/** Upsert `<name>-template`, then create the stream. Existing streams are a no-op. */
	create(name: string): Promise<CreateResult>;
	rollover(name: string): Promise<RolloverResult>;
	deleteIndex(index: string): Promise<void>;
	/** Delete backing indices strictly older than `retentionDays` days. */
	cleanOldIndices(name: string, retentionDays: number, options?: CleanOptions): Promise<CleanResult>;
	close(): Promise<void>;
}

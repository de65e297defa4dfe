// =============================================================================
// ACTION RUNNER — settings → logger → admin → health check → action
// =============================================================================
// Shared by every subcommand. Usage problems are reported through commander
// before anything touches the network.

import * as p from "@clack/prompts";
import { type Command, Option } from "commander";
import pc from "picocolors";
import { createDataStreamAdmin } from "../../admin/data-stream-admin.js";
import type { DataStreamAdmin, DataStreamAdminOptions } from "../../admin/types.js";
import type { FetchFn } from "../../client/types.js";
import { getConfig } from "../../config/get-config.js";
import { type FlagSettings, resolveSettings } from "../../config/resolve.js";
import { createLogger } from "../../logger/index.js";
import type { LogFormat, LogLevel, StreamkeepLogger } from "../../types/index.js";
import { parseTimeout, parseUrl } from "./parsers.js";

export interface ProgramDeps {
	/** Environment to read STREAMKEEP_* variables from. Default: `process.env` */
	env?: Record<string, string | undefined>;
	loadConfig?: typeof getConfig;
	createAdmin?: (options: DataStreamAdminOptions) => DataStreamAdmin;
	createLogger?: (format: LogFormat, level: LogLevel) => StreamkeepLogger;
	fetch?: FetchFn;
	/** Frame actions with clack intro/outro lines. Default: stdout is a TTY */
	interactive?: boolean;
}

/** Options every subcommand sees once global and local flags are merged. */
type CommandOptions = FlagSettings & {
	cwd: string;
	config?: string;
};

export function addConnectionOptions(command: Command): Command {
	return command
		.addOption(new Option("--url <url>", "Cluster URL (or set STREAMKEEP_URL)").argParser(parseUrl))
		.addOption(new Option("--username <username>", "Cluster username (or set STREAMKEEP_USERNAME)"))
		.addOption(new Option("--password <password>", "Cluster password (or set STREAMKEEP_PASSWORD)"))
		.addOption(
			new Option("--insecure", "Skip TLS certificate verification (or set STREAMKEEP_INSECURE)"),
		)
		.addOption(
			new Option("--timeout <ms>", "Per-request timeout in milliseconds (default: 30000)").argParser(
				parseTimeout,
			),
		);
}

/**
 * Resolve settings, build the admin, verify connectivity, then run `action`.
 * `action` returns the line shown as the outro.
 */
export async function runAction(
	command: Command,
	deps: ProgramDeps,
	title: string,
	action: (admin: DataStreamAdmin, logger: StreamkeepLogger) => Promise<string>,
): Promise<void> {
	const options = command.optsWithGlobals<CommandOptions>();
	const load = deps.loadConfig ?? getConfig;
	const { config } = await load({ cwd: options.cwd, configPath: options.config });

	const resolved = resolveSettings(options, deps.env ?? process.env, config);
	if (!resolved.ok) {
		return command.error(`error: missing required option(s): ${resolved.missing.join(", ")}`, {
			code: "streamkeep.missingConnectionOption",
		});
	}
	const { settings } = resolved;

	const logger = (deps.createLogger ?? createLogger)(settings.logFormat, settings.logLevel);
	const admin = (deps.createAdmin ?? createDataStreamAdmin)({
		connection: settings.connection,
		logger,
		fetch: deps.fetch,
	});

	const interactive = deps.interactive ?? process.stdout.isTTY === true;
	const framed = interactive && settings.logFormat === "pretty";
	if (framed) p.intro(pc.bgCyan(pc.black(` streamkeep ${title} `)));

	try {
		if (settings.connection.insecure) {
			logger.warn("TLS certificate verification is disabled", {
				url: new URL(settings.connection.url).origin,
			});
		}
		await admin.checkConnection();
		const summary = await action(admin, logger);
		if (framed) p.outro(summary);
	} finally {
		await admin.close();
	}
}

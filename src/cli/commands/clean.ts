// =============================================================================
// CLEAN COMMAND — Delete backing indices past the retention period
// =============================================================================

import { Command } from "commander";
import { parseRetentionPeriod } from "../utils/parsers.js";
import { addConnectionOptions, type ProgramDeps, runAction } from "../utils/run-action.js";

interface CleanCommandOptions {
	dataStream: string;
	retentionPeriod: number;
	dryRun?: boolean;
}

export function cleanDataStreamCommand(deps: ProgramDeps): Command {
	return addConnectionOptions(
		new Command("clean")
			.description("Delete backing indices older than the retention period")
			.requiredOption("--data-stream <name>", "Name of the data stream")
			.requiredOption(
				"--retention-period <days>",
				"Retention period in days; older backing indices are deleted",
				parseRetentionPeriod,
			)
			.option("--dry-run", "List the indices that would be deleted without deleting them"),
	).action(async (options: CleanCommandOptions, command: Command) => {
		await runAction(command, deps, "clean", async (admin) => {
			const result = await admin.cleanOldIndices(options.dataStream, options.retentionPeriod, {
				dryRun: options.dryRun,
			});
			if (result.status === "not_found") {
				return `Nothing to clean: ${options.dataStream} does not exist`;
			}
			const verb = options.dryRun ? "Would delete" : "Deleted";
			return `${verb} ${result.deleted.length} of ${result.deleted.length + result.retained.length} backing indices`;
		});
	});
}

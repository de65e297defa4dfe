import { Command } from "commander";
import { addConnectionOptions, type ProgramDeps, runAction } from "../utils/run-action.js";

export function rolloverDataStreamCommand(deps: ProgramDeps): Command {
	return addConnectionOptions(
		new Command("rollover")
			.description("Roll a data stream over to a new backing index")
			.requiredOption("--data-stream <name>", "Name of the data stream"),
	).action(async (options: { dataStream: string }, command: Command) => {
		await runAction(command, deps, "rollover", async (admin) => {
			const result = await admin.rollover(options.dataStream);
			if (result.status === "not_found") {
				// Already logged as an error; exit status stays 0 so batch jobs carry on.
				return `Nothing to roll over: ${options.dataStream} does not exist`;
			}
			return result.newIndex
				? `Rolled over ${options.dataStream} to ${result.newIndex}`
				: `Rolled over ${options.dataStream}`;
		});
	});
}

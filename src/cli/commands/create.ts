import { Command } from "commander";
import { addConnectionOptions, type ProgramDeps, runAction } from "../utils/run-action.js";

export function createDataStreamCommand(deps: ProgramDeps): Command {
	return addConnectionOptions(
		new Command("create")
			.description("Create a data stream and its index template (no-op if it already exists)")
			.requiredOption("--data-stream <name>", "Name of the data stream"),
	).action(async (options: { dataStream: string }, command: Command) => {
		await runAction(command, deps, "create", async (admin) => {
			const result = await admin.create(options.dataStream);
			return result === "created"
				? `Created data stream ${options.dataStream}`
				: `Data stream ${options.dataStream} already exists`;
		});
	});
}

import { Command, type OutputConfiguration, Option } from "commander";
import { LOG_LEVELS } from "../logger/levels.js";
import { LOG_FORMATS } from "../config/validate.js";
import { cleanDataStreamCommand } from "./commands/clean.js";
import { createDataStreamCommand } from "./commands/create.js";
import { rolloverDataStreamCommand } from "./commands/rollover.js";
import type { ProgramDeps } from "./utils/run-action.js";

export interface BuildProgramOptions extends ProgramDeps {
	version?: string;
	/** Override where commander writes help and usage errors. */
	output?: OutputConfiguration;
}

/**
 * Build the `streamkeep` command tree. Parsing errors surface as thrown
 * CommanderError values (exitOverride) instead of calling process.exit.
 */
export function buildProgram(options: BuildProgramOptions = {}): Command {
	const { version = "0.0.0", output, ...deps } = options;

	const program = new Command()
		.name("streamkeep")
		.description("Create, roll over and prune data streams on an OpenSearch cluster")
		.version(version, "-v, --version")
		.option("--cwd <dir>", "Working directory used to find the config file", process.cwd())
		.option("-c, --config <path>", "Path to a streamkeep config file")
		.addOption(
			new Option("--log-level <level>", "Minimum log level (or set STREAMKEEP_LOG_LEVEL)").choices(
				LOG_LEVELS,
			),
		)
		.addOption(
			new Option("--log-format <format>", "Log output format (or set STREAMKEEP_LOG_FORMAT)").choices(
				LOG_FORMATS,
			),
		)
		.showHelpAfterError()
		.exitOverride();

	if (output) program.configureOutput(output);

	for (const command of [
		createDataStreamCommand(deps),
		rolloverDataStreamCommand(deps),
		cleanDataStreamCommand(deps),
	]) {
		program.addCommand(command.copyInheritedSettings(program));
	}

	return program;
}

#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { CommanderError } from "commander";
import pc from "picocolors";
import { isStreamkeepError } from "../error/index.js";
import { buildProgram } from "./program.js";
import { sanitizeErrorMessage } from "./utils/parsers.js";

process.on("SIGINT", () => process.exit(130));
process.on("SIGTERM", () => process.exit(143));

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../../package.json"), "utf-8"));
		if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		process.stderr.write(`streamkeep: could not read package version: ${String(error)}\n`);
	}
	return "0.0.0";
}

const program = buildProgram({ version: readVersion(), env: process.env });

try {
	await program.parseAsync();
} catch (error) {
	// Help, --version and usage errors were already printed by commander.
	if (error instanceof CommanderError) {
		process.exit(error.exitCode);
	}

	const message = error instanceof Error ? error.message : String(error);
	const code = isStreamkeepError(error) ? pc.dim(` [${error.code}]`) : "";
	console.error(`${pc.red(sanitizeErrorMessage(message))}${code}`);
	process.exit(1);
}

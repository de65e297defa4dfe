// =============================================================================
// Config loader — c12 (UnJS) for runtime TS/JS/JSON config files
// =============================================================================

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "c12";
import { StreamkeepError } from "../error/index.js";
import { possibleConfigPaths } from "./config-paths.js";
import { type FileConfig, validateFileConfig } from "./validate.js";

export interface LoadedFileConfig {
	config: FileConfig;
	/** Absolute path of the file that was loaded, or null when none was found. */
	configFile: string | null;
}

/**
 * Find the config file path without loading it.
 * An explicit path is resolved against `cwd` unless it exists as given.
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}

/**
 * Load and validate the streamkeep config file.
 *
 * Resolution order:
 * 1. If `configPath` is provided (--config flag), it must exist.
 * 2. Otherwise, scan `possibleConfigPaths` from `cwd`; no file is fine.
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<LoadedFileConfig> {
	const configFile = findConfigFile(cwd, configPath);
	if (!configFile) {
		if (configPath) {
			throw StreamkeepError.invalidConfig(`Config file not found: ${configPath}`);
		}
		return { config: {}, configFile: null };
	}

	let loaded: unknown;
	try {
		const { config } = await loadConfig<Record<string, unknown>>({
			configFile,
			cwd,
			rcFile: false,
			packageJson: false,
			globalRc: false,
			dotenv: false,
		});
		loaded = config;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw StreamkeepError.invalidConfig(
			`Failed to load config from ${configFile}: ${message}`,
			error,
		);
	}

	return { config: validateFileConfig(loaded, configFile), configFile };
}

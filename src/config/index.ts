export { possibleConfigPaths } from "./config-paths.js";
export { findConfigFile, getConfig, type LoadedFileConfig } from "./get-config.js";
export {
	DEFAULTS,
	ENV_PREFIX,
	type FlagSettings,
	parseBoolean,
	readEnvSettings,
	type ResolvedSettings,
	type ResolveResult,
	resolveSettings,
} from "./resolve.js";
export {
	describeUrlProblem,
	type FileConfig,
	LOG_FORMATS,
	validateFileConfig,
} from "./validate.js";

// =============================================================================
// Config file discovery paths
// =============================================================================
// Candidate file paths probed (in order) when no --config flag is given.

const baseNames = ["streamkeep.config"];

const extensions = [".ts", ".mts", ".js", ".mjs", ".json"];

const directoryPrefixes = [
	"", // working directory
	".config/",
	"config/",
];

export const possibleConfigPaths: string[] = [];

for (const dir of directoryPrefixes) {
	for (const base of baseNames) {
		for (const ext of extensions) {
			possibleConfigPaths.push(`${dir}${base}${ext}`);
		}
	}
}

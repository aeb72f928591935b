import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export interface CliOptions {
	help: false;
	inputPaths: string[];
	outputDir: string;
	logLevel: LogLevel;
}

export type CliCommand = CliOptions | { help: true };

export const HELP = `
Save Mod-List Extractor - reads the mod list of a save file

Usage:
  save-modlist --input-path <save.rws> --output-dir <dir>

Options:
  -i, --input-path <file>   save file to read (repeat for several saves)
  -o, --output-dir <dir>    existing directory for the .rml and .csv files
  -v, --verbose             log skipped save elements too
  -q, --quiet               log errors only
  -h, --help                show this help

Example:
  node dist/cli.js --input-path Colony.rws --output-dir ./modlists
  → ./modlists/Colony.rml, ./modlists/Colony.csv
`;

const VALUE_FLAGS: Record<string, "input" | "output"> = {
	"-i": "input",
	"--input-path": "input",
	"-o": "output",
	"--output-dir": "output"
};

export function parseCliArgs(argv: readonly string[]): CliCommand {
	const inputPaths: string[] = [];
	let outputDir: string | undefined;
	let verbose = false;
	let quiet = false;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "-h" || arg === "--help") return { help: true };
		if (arg === "-v" || arg === "--verbose") {
			verbose = true;
			continue;
		}
		if (arg === "-q" || arg === "--quiet") {
			quiet = true;
			continue;
		}

		const eq = arg.indexOf("=");
		const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
		const target = VALUE_FLAGS[flag];
		if (!target) throw new ConfigError(`Unknown argument: ${arg}`);

		let value: string | undefined;
		if (flag !== arg) {
			value = arg.slice(eq + 1);
		} else {
			value = argv[i + 1];
			i++;
		}
		if (value === undefined || value === "" || value.startsWith("-")) {
			throw new ConfigError(`Missing value for ${flag}`);
		}
		if (target === "input") inputPaths.push(value);
		else outputDir = value;
	}

	if (verbose && quiet) throw new ConfigError("--verbose and --quiet cannot be combined");
	if (inputPaths.length === 0) throw new ConfigError("Missing --input-path");
	if (outputDir === undefined) throw new ConfigError("Missing --output-dir");

	return {
		help: false,
		inputPaths,
		outputDir,
		logLevel: verbose ? "debug" : quiet ? "error" : "info"
	};
}

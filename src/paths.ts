import { existsSync, statSync } from "node:fs";
import { join, parse } from "node:path";
import { ConfigError, NotFoundError } from "./errors.js";
import type { ModListOutputPaths } from "./modlist/types.js";

export const MODLIST_EXTENSION = ".rml";
export const CSV_EXTENSION = ".csv";

/** `<outputDir>/<stem>.rml` and `<outputDir>/<stem>.csv` for a save at `inputPath` */
export function prepareOutputPaths(inputPath: string, outputDir: string): ModListOutputPaths {
	if (!existsSync(inputPath)) {
		throw new NotFoundError(inputPath, `Save file not found: ${inputPath}`);
	}
	if (!existsSync(outputDir) || !statSync(outputDir).isDirectory()) {
		throw new ConfigError(`Output path is not a directory: ${outputDir}`, outputDir);
	}
	const stem = parse(inputPath).name;
	return {
		rmlPath: join(outputDir, stem + MODLIST_EXTENSION),
		csvPath: join(outputDir, stem + CSV_EXTENSION)
	};
}

import { silentLogger } from "./logger.js";
import type { LoggerOptions } from "./logger.js";
import { writeCsv } from "./modlist/csv-writer.js";
import { writeModList } from "./modlist/rml-writer.js";
import type { ExtractionResult, ModListOutputPaths } from "./modlist/types.js";
import { extractModsFromSave } from "./save/save-reader.js";

/**
 * Save → .rml + .csv. Nothing is written when extraction fails; a failing
 * writer does not keep the other one from running.
 */
export function convertSave(inputPath: string, outputs: ModListOutputPaths, options: LoggerOptions = {}): ExtractionResult {
	const logger = options.logger ?? silentLogger;
	const result = extractModsFromSave(inputPath, { logger });

	const writers: Array<() => void> = [
		() => writeModList(result.gameVersion, result.records, outputs.rmlPath, { logger }),
		() => writeCsv(result.records, outputs.csvPath, { logger })
	];
	const failures: unknown[] = [];
	for (const write of writers) {
		try {
			write();
		} catch (err) {
			failures.push(err);
		}
	}

	if (failures.length === 1) throw failures[0];
	if (failures.length > 1) {
		throw new AggregateError(failures, `Failed to write mod list outputs for ${inputPath}`);
	}
	return result;
}

/**
 * Save Mod-List Extractor
 *
 * Reads the game version and mod list from a save file's meta block and
 * writes it back out as an importable mod list (.rml) and a CSV export.
 *
 * @example
 * ```ts
 * import { extractModsFromSave, writeModList, writeCsv } from 'save-modlist-extractor';
 *
 * const { gameVersion, records } = extractModsFromSave('Colony.rws');
 * writeModList(gameVersion, records, 'Colony.rml');
 * writeCsv(records, 'Colony.csv');
 * ```
 */

export { createModRecord, sameModRecord } from "./modlist/types.js";
export type { ModRecord, ExtractionResult, ModListOutputPaths } from "./modlist/types.js";
export { MalformedInputError, StructureError, NotFoundError, ConfigError } from "./errors.js";
export { parseSave, extractModsFromSave } from "./save/save-reader.js";
export type { SaveReaderOptions } from "./save/save-reader.js";
export { buildModListXml, writeModList } from "./modlist/rml-writer.js";
export type { ModListWriterOptions } from "./modlist/rml-writer.js";
export { buildModCsv, sortModsById, writeCsv } from "./modlist/csv-writer.js";
export type { CsvWriterOptions } from "./modlist/csv-writer.js";
export { prepareOutputPaths, MODLIST_EXTENSION, CSV_EXTENSION } from "./paths.js";
export { convertSave } from "./convert.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./logger.js";

import { writeFileSync } from "node:fs";
import { silentLogger } from "../logger.js";
import type { LoggerOptions } from "../logger.js";
import type { ModRecord } from "./types.js";

export interface CsvWriterOptions extends LoggerOptions {
	/** Row terminator, defaults to "\r\n" */
	eol?: string;
}

const DELIMITER = ";";
const HEADER = ["mod_id", "mod_name", "mod_steam_id"] as const;

/** Stable, ascending by id (code unit order); the input is not modified */
export function sortModsById(records: readonly ModRecord[]): ModRecord[] {
	return [...records].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

function csvField(value: string): string {
	if (!/[;"\r\n]/.test(value)) return value;
	return `"${value.replace(/"/g, '""')}"`;
}

function csvRow(fields: readonly string[], eol: string): string {
	return fields.map(csvField).join(DELIMITER) + eol;
}

export function buildModCsv(records: readonly ModRecord[], options: CsvWriterOptions = {}): string {
	const eol = options.eol ?? "\r\n";
	let csv = csvRow(HEADER, eol);
	for (const mod of sortModsById(records)) {
		csv += csvRow([mod.id, mod.name, mod.steamId], eol);
	}
	return csv;
}

export function writeCsv(records: readonly ModRecord[], outputPath: string, options: CsvWriterOptions = {}): void {
	const logger = options.logger ?? silentLogger;
	if (records.length === 0) {
		logger.info(`No mods found, skipping csv '${outputPath}'`);
		return;
	}
	logger.info(`Writing modlist as csv to '${outputPath}'`);
	writeFileSync(outputPath, buildModCsv(records, options), "utf8");
}

import { writeFileSync } from "node:fs";
import { silentLogger } from "../logger.js";
import type { LoggerOptions } from "../logger.js";
import type { ModRecord } from "./types.js";

export interface ModListWriterOptions extends LoggerOptions {
	/** Line ending, defaults to "\n" */
	eol?: string;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const TAB = "\t";

/**
 * Builds a mod-list document in the format of the game's mod manager.
 * `modList` carries ids and names only, Steam ids live under `meta`.
 */
export function buildModListXml(gameVersion: string, records: readonly ModRecord[], options: ModListWriterOptions = {}): string {
	const eol = options.eol ?? "\n";
	const ids = records.map((m) => m.id);
	const names = records.map((m) => m.name);

	let xml = XML_DECLARATION + eol;
	xml += "<savedModList>" + eol;
	xml += `${TAB}<meta>${eol}`;
	xml += serializeText("gameVersion", gameVersion, 2, eol);
	xml += serializeList("modIds", ids, 2, eol);
	xml += serializeList(
		"modSteamIds",
		records.map((m) => m.steamId),
		2,
		eol
	);
	xml += serializeList("modNames", names, 2, eol);
	xml += `${TAB}</meta>${eol}`;
	xml += `${TAB}<modList>${eol}`;
	xml += serializeList("ids", ids, 2, eol);
	xml += serializeList("names", names, 2, eol);
	xml += `${TAB}</modList>${eol}`;
	xml += "</savedModList>" + eol;
	return xml;
}

/** Writes nothing for an empty mod list, an empty list file would mislead the importer */
export function writeModList(gameVersion: string, records: readonly ModRecord[], outputPath: string, options: ModListWriterOptions = {}): void {
	const logger = options.logger ?? silentLogger;
	if (records.length === 0) {
		logger.info(`No mods found, skipping mod list '${outputPath}'`);
		return;
	}
	logger.info(`Writing modlist as rml to '${outputPath}'`);
	writeFileSync(outputPath, buildModListXml(gameVersion, records, options), "utf8");
}

function serializeText(tag: string, text: string, indent: number, eol: string): string {
	const spacing = TAB.repeat(indent);
	if (text === "") return `${spacing}<${tag} />${eol}`;
	return `${spacing}<${tag}>${escapeXml(text)}</${tag}>${eol}`;
}

function serializeList(tag: string, items: readonly string[], indent: number, eol: string): string {
	const spacing = TAB.repeat(indent);
	if (items.length === 0) return `${spacing}<${tag} />${eol}`;
	let xml = `${spacing}<${tag}>${eol}`;
	for (const item of items) {
		xml += serializeText("li", item, indent + 1, eol);
	}
	xml += `${spacing}</${tag}>${eol}`;
	return xml;
}

const TEXT_ESCAPES: Record<string, string> = {
	"<": "&lt;",
	">": "&gt;",
	"&": "&amp;",
	'"': "&quot;"
};

/** Element text for the mod list; apostrophes are left as they are */
export function escapeXml(text: string): string {
	return text.replace(/[<>&"]/g, (c) => TEXT_ESCAPES[c] ?? c);
}

import { readFileSync } from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedInputError, StructureError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { LoggerOptions } from "../logger.js";
import { createModRecord } from "../modlist/types.js";
import type { ExtractionResult, ModRecord } from "../modlist/types.js";

/**
 * Ordered parser output: one key holding the tag's children
 * (`{ li: [{ "#text": "x" }] }`) or a text node (`{ "#text": "x" }`).
 */
type OrderedNode = Record<string, unknown>;

const TEXT_KEY = "#text";
const ATTRIBUTES_KEY = ":@";

export interface SaveReaderOptions extends LoggerOptions {
	/** Name used in error messages, defaults to "input" */
	source?: string;
}

function parseXml(xml: string, source: string): OrderedNode[] {
	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		throw new MalformedInputError(source, validation.err);
	}
	const parser = new XMLParser({
		preserveOrder: true,
		ignoreAttributes: true,
		// Steam ids like "0001" must stay text
		parseTagValue: false,
		// values are copied as written, whitespace included
		trimValues: false,
		// &#233; and &#x4E2D; references
		htmlEntities: true
	});
	const doc: unknown = parser.parse(xml);
	return Array.isArray(doc) ? doc.filter(isOrderedNode) : [];
}

function isOrderedNode(value: unknown): value is OrderedNode {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tagOf(node: OrderedNode): string | undefined {
	return Object.keys(node).find((k) => k !== ATTRIBUTES_KEY && k !== TEXT_KEY);
}

function childrenOf(node: OrderedNode, tag: string): OrderedNode[] {
	const value = node[tag];
	return Array.isArray(value) ? value.filter(isOrderedNode) : [];
}

function childElements(node: OrderedNode, tag: string): { tag: string; node: OrderedNode }[] {
	const result: { tag: string; node: OrderedNode }[] = [];
	for (const child of childrenOf(node, tag)) {
		const childTag = tagOf(child);
		if (childTag !== undefined) result.push({ tag: childTag, node: child });
	}
	return result;
}

function textOf(node: OrderedNode, tag: string): string | undefined {
	for (const child of childrenOf(node, tag)) {
		const text = child[TEXT_KEY];
		if (typeof text === "string") return text;
	}
	return undefined;
}

function listItems(node: OrderedNode, tag: string): string[] {
	return childElements(node, tag).map((item) => textOf(item.node, item.tag) ?? "");
}

function findRoot(doc: OrderedNode[]): { tag: string; node: OrderedNode } | undefined {
	for (const node of doc) {
		const tag = tagOf(node);
		// "?xml" and other processing instructions
		if (tag !== undefined && !tag.startsWith("?")) return { tag, node };
	}
	return undefined;
}

/**
 * Reads the game version and the mod list from the `meta` block of a save.
 *
 * `meta` must be a direct child of the root element. Inside it,
 * `gameVersion`, `modIds`, `modSteamIds` and `modNames` are read; a repeated
 * tag replaces the earlier one. The three lists are zipped by position.
 */
export function parseSave(xml: string, options: SaveReaderOptions = {}): ExtractionResult {
	const logger = options.logger ?? silentLogger;
	const source = options.source ?? "input";
	const root = findRoot(parseXml(xml, source));
	const meta = root ? childElements(root.node, root.tag).find((c) => c.tag === "meta") : undefined;
	if (!meta) {
		throw new StructureError(`Invalid save: missing <meta> element in ${source}. Is this really a save file?`);
	}

	let gameVersion: string | undefined;
	let ids: string[] = [];
	let steamIds: string[] = [];
	let names: string[] = [];

	for (const child of childElements(meta.node, meta.tag)) {
		switch (child.tag) {
			case "gameVersion":
				gameVersion = textOf(child.node, child.tag);
				break;
			case "modIds":
				ids = listItems(child.node, child.tag);
				break;
			case "modSteamIds":
				steamIds = listItems(child.node, child.tag);
				break;
			case "modNames":
				names = listItems(child.node, child.tag);
				break;
			default:
				logger.debug(`Skipping child: ${child.tag}`);
		}
	}

	if (!gameVersion) {
		throw new StructureError(`Invalid save: game version is empty in ${source}`);
	}
	if (ids.length !== steamIds.length || ids.length !== names.length) {
		throw new StructureError(
			`Invalid save: mismatched mod attribute counts in ${source}: ` +
				`${ids.length} ids, ${steamIds.length} Steam ids, ${names.length} names`
		);
	}

	const records: ModRecord[] = ids.map((id, i) => createModRecord(id, steamIds[i] ?? "", names[i] ?? ""));
	logger.info(`Game version from save is ${gameVersion}`);
	logger.info(`Loaded ${records.length} mods from save`);
	return { gameVersion, records };
}

export function extractModsFromSave(savePath: string, options: SaveReaderOptions = {}): ExtractionResult {
	(options.logger ?? silentLogger).info(`Loading mods from save file at ${savePath}`);
	const xml = readFileSync(savePath, "utf8");
	return parseSave(xml, { source: savePath, ...options });
}

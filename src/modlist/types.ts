/**
 * Mod list types shared by the save reader and the writers
 */

/** One installed mod as recorded in a save's meta block */
export interface ModRecord {
	/** Package id, e.g. "brrainz.harmony" */
	readonly id: string;
	/** Steam Workshop id as text, empty for mods not from the Workshop */
	readonly steamId: string;
	readonly name: string;
}

export interface ExtractionResult {
	readonly gameVersion: string;
	/** Order of the save's modIds list */
	readonly records: readonly ModRecord[];
}

export interface ModListOutputPaths {
	rmlPath: string;
	csvPath: string;
}

export function createModRecord(id: string, steamId: string, name: string): ModRecord {
	return Object.freeze({ id, steamId, name });
}

export function sameModRecord(a: ModRecord, b: ModRecord): boolean {
	return a.id === b.id && a.steamId === b.steamId && a.name === b.name;
}

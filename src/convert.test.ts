import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { convertSave } from "./convert.js";
import { StructureError } from "./errors.js";
import { prepareOutputPaths } from "./paths.js";

const SAMPLE_PATH = fileURLToPath(new URL("../fixtures/sample.rws", import.meta.url));

const EXPECTED_RML = [
	'<?xml version="1.0" encoding="utf-8"?>',
	"<savedModList>",
	"\t<meta>",
	"\t\t<gameVersion>1.4.3704 rev898</gameVersion>",
	"\t\t<modIds>",
	"\t\t\t<li>brrainz.harmony</li>",
	"\t\t\t<li>ludeon.rimworld</li>",
	"\t\t\t<li>test.fishing &amp; boats</li>",
	"\t\t\t<li>aaa.local</li>",
	"\t\t</modIds>",
	"\t\t<modSteamIds>",
	"\t\t\t<li>2009463077</li>",
	"\t\t\t<li>0</li>",
	"\t\t\t<li>0001</li>",
	"\t\t\t<li />",
	"\t\t</modSteamIds>",
	"\t\t<modNames>",
	"\t\t\t<li>Harmony</li>",
	"\t\t\t<li>Core</li>",
	"\t\t\t<li>Fishing; &quot;Deluxe&quot;</li>",
	"\t\t\t<li>Local Mod</li>",
	"\t\t</modNames>",
	"\t</meta>",
	"\t<modList>",
	"\t\t<ids>",
	"\t\t\t<li>brrainz.harmony</li>",
	"\t\t\t<li>ludeon.rimworld</li>",
	"\t\t\t<li>test.fishing &amp; boats</li>",
	"\t\t\t<li>aaa.local</li>",
	"\t\t</ids>",
	"\t\t<names>",
	"\t\t\t<li>Harmony</li>",
	"\t\t\t<li>Core</li>",
	"\t\t\t<li>Fishing; &quot;Deluxe&quot;</li>",
	"\t\t\t<li>Local Mod</li>",
	"\t\t</names>",
	"\t</modList>",
	"</savedModList>",
	""
].join("\n");

const EXPECTED_CSV =
	"mod_id;mod_name;mod_steam_id\r\n" +
	"aaa.local;Local Mod;\r\n" +
	"brrainz.harmony;Harmony;2009463077\r\n" +
	"ludeon.rimworld;Core;0\r\n" +
	'test.fishing & boats;"Fishing; ""Deluxe""";0001\r\n';

describe("convertSave", () => {
	let dir: string;
	let outDir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "convert-"));
		outDir = join(dir, "output_dir");
		mkdirSync(outDir);
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("writes both outputs for the sample save", () => {
		const outputs = prepareOutputPaths(SAMPLE_PATH, outDir);
		const result = convertSave(SAMPLE_PATH, outputs);

		expect(outputs).toEqual({ rmlPath: join(outDir, "sample.rml"), csvPath: join(outDir, "sample.csv") });
		expect(result.records).toHaveLength(4);
		expect(readFileSync(outputs.rmlPath, "utf8")).toBe(EXPECTED_RML);
		expect(readFileSync(outputs.csvPath, "utf8")).toBe(EXPECTED_CSV);
	});

	it("produces identical files when run twice", () => {
		const outputs = prepareOutputPaths(SAMPLE_PATH, outDir);
		convertSave(SAMPLE_PATH, outputs);
		const rml = readFileSync(outputs.rmlPath);
		const csv = readFileSync(outputs.csvPath);
		convertSave(SAMPLE_PATH, outputs);
		expect(readFileSync(outputs.rmlPath).equals(rml)).toBe(true);
		expect(readFileSync(outputs.csvPath).equals(csv)).toBe(true);
	});

	it("writes nothing when extraction fails", () => {
		const input = join(dir, "broken.rws");
		writeFileSync(input, "<savegame><world /></savegame>");
		const outputs = prepareOutputPaths(input, outDir);
		expect(() => convertSave(input, outputs)).toThrow(StructureError);
		expect(existsSync(outputs.rmlPath)).toBe(false);
		expect(existsSync(outputs.csvPath)).toBe(false);
	});

	it("writes nothing for a save without mods", () => {
		const input = join(dir, "vanilla.rws");
		writeFileSync(input, "<savegame><meta><gameVersion>1.4.3704 rev898</gameVersion></meta></savegame>");
		const outputs = prepareOutputPaths(input, outDir);
		expect(convertSave(input, outputs)).toEqual({ gameVersion: "1.4.3704 rev898", records: [] });
		expect(existsSync(outputs.rmlPath)).toBe(false);
		expect(existsSync(outputs.csvPath)).toBe(false);
	});

	it("still writes the csv when the mod list cannot be written", () => {
		const outputs = { rmlPath: join(dir, "no-such-dir", "sample.rml"), csvPath: join(outDir, "sample.csv") };
		expect(() => convertSave(SAMPLE_PATH, outputs)).toThrow();
		expect(readFileSync(outputs.csvPath, "utf8")).toBe(EXPECTED_CSV);
	});

	it("reports both failures when neither output can be written", () => {
		const outputs = { rmlPath: join(dir, "no-such-dir", "sample.rml"), csvPath: join(dir, "no-such-dir", "sample.csv") };
		expect(() => convertSave(SAMPLE_PATH, outputs)).toThrow(AggregateError);
	});
});

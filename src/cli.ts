#!/usr/bin/env node
/**
 * CLI for the save mod-list extractor
 * Usage:
 *   save-modlist --input-path <save.rws> --output-dir <dir>
 */

import { parseCliArgs, HELP } from "./cli-args.js";
import type { CliCommand } from "./cli-args.js";
import { convertSave } from "./convert.js";
import { createConsoleLogger } from "./logger.js";
import { prepareOutputPaths } from "./paths.js";

const args = process.argv.slice(2);

let command: CliCommand;
try {
	command = parseCliArgs(args);
} catch (err) {
	console.error("Error:", err instanceof Error ? err.message : err);
	console.error(HELP);
	process.exit(1);
}

if (command.help) {
	console.log(HELP);
	process.exit(0);
}

const logger = createConsoleLogger(command.logLevel);
let failed = 0;

for (const inputPath of command.inputPaths) {
	try {
		const outputs = prepareOutputPaths(inputPath, command.outputDir);
		const { records } = convertSave(inputPath, outputs, { logger });
		logger.info(`Done: ${inputPath} (${records.length} mods)`);
	} catch (err) {
		failed++;
		logger.error(`Error: ${inputPath}: ${err instanceof Error ? err.message : String(err)}`);
	}
}

process.exit(failed > 0 ? 1 : 0);

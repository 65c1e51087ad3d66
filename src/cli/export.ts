/**
 * Export Command
 *
 * Converts a run results document into the normalized CSV table.
 *
 * Usage: bench-normalize <results.json> [--out <table.csv>]
 *
 * @module src/cli/export
 */

import type { Writable } from "node:stream";
import { loadConfig } from "../config";
import { NormalizedFormat } from "../format/normalized";
import { FileTableSink, StreamTableSink } from "../format/sinks";
import type { TableSink } from "../format/types";
import { createLogger, type Logger } from "../logger";
import { loadRunResults } from "../results/loader";

export const USAGE = "Usage: bench-normalize <results.json> [--out <table.csv>]";

export interface ExportOptions {
	readonly inputFile: string;
	/** Write to stdout when absent */
	readonly outFile?: string;
}

/**
 * Parse command-line arguments.
 *
 * @param argv - Arguments after the script name
 * @throws Error with usage text when arguments are invalid
 */
export function parseExportArgs(argv: readonly string[]): ExportOptions {
	let inputFile: string | undefined;
	let outFile: string | undefined;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];

		if (arg === "--out" || arg === "-o") {
			const value = argv[i + 1];
			if (value === undefined || value.startsWith("-")) {
				throw new Error(`Missing value for ${arg}\n${USAGE}`);
			}
			outFile = value;
			i++;
		} else if (arg !== undefined && arg.startsWith("-")) {
			throw new Error(`Unknown option: ${arg}\n${USAGE}`);
		} else if (inputFile === undefined) {
			inputFile = arg;
		} else {
			throw new Error(`Unexpected argument: ${arg}\n${USAGE}`);
		}
	}

	if (inputFile === undefined) {
		throw new Error(`Missing results file\n${USAGE}`);
	}

	return { inputFile, outFile };
}

/**
 * Load a results document and write its normalized table.
 *
 * @returns Number of runs exported
 */
export async function runExport(
	options: ExportOptions,
	logger: Logger,
	stdout: Writable = process.stdout,
): Promise<number> {
	const runs = await loadRunResults(options.inputFile);
	if (runs.length === 0) {
		logger.warn(`No runs in ${options.inputFile}; nothing to export`);
		return 0;
	}

	const sink: TableSink =
		options.outFile !== undefined ? new FileTableSink(options.outFile) : new StreamTableSink(stdout);

	await new NormalizedFormat(sink).writeOut(runs);
	await sink.close();

	logger.info(`Exported ${runs.length} runs${options.outFile ? ` to ${options.outFile}` : ""}`);
	return runs.length;
}

/**
 * Command entry point.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
	let logger = createLogger();

	try {
		const config = loadConfig();
		logger = createLogger(config.logLevel);
		await runExport(parseExportArgs(argv), logger);
		return 0;
	} catch (error) {
		logger.error(error instanceof Error ? error.message : String(error));
		return 1;
	}
}


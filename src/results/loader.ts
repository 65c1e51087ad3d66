/**
 * Run Results Loader
 *
 * Reads a run results document from disk, validates it and converts each
 * entry into a RunResult.
 *
 * @module src/results/loader
 */

import { readFile } from "node:fs/promises";
import type { RunResult } from "../../types/results";
import {
	formatRunResultsErrors,
	validateRunResultsFile,
	type ResultEntry,
	type RunEntry,
	type RunResultsFile,
} from "../../types/run-results-file";
import { modeFromLabel, UnknownModeError } from "./modes";
import { ParameterSet } from "./params";
import { createRunResult } from "./run";
import { MeasuredResult } from "./scalar";

/**
 * Error thrown when a run results document cannot be loaded
 */
export class RunResultsLoadError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
		cause?: Error,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "RunResultsLoadError";
	}
}

function toMeasuredResult(
	label: string,
	entry: ResultEntry,
	role: "PRIMARY" | "SECONDARY",
): MeasuredResult {
	return new MeasuredResult({
		label,
		role,
		sampleCount: entry.sample_count,
		score: entry.score,
		scoreError: entry.score_error ?? Number.NaN,
		unit: entry.unit,
		policy: entry.policy ?? null,
	});
}

function toRunResult(entry: RunEntry): RunResult {
	const params = new ParameterSet(modeFromLabel(entry.mode), entry.params);
	const primary = toMeasuredResult(entry.benchmark, entry.primary, "PRIMARY");
	const secondaries = Object.entries(entry.secondary).map(([label, result]) =>
		toMeasuredResult(label, result, "SECONDARY"),
	);

	return createRunResult(params, primary, secondaries);
}

/**
 * Convert a validated document into RunResults, preserving run order.
 *
 * @param file - Validated run results document
 * @param filePath - Source path, used in error messages
 * @throws RunResultsLoadError if a run names an unknown mode
 */
export function toRunResults(file: RunResultsFile, filePath = "<memory>"): RunResult[] {
	return file.runs.map((entry, index) => {
		try {
			return toRunResult(entry);
		} catch (error) {
			if (error instanceof UnknownModeError) {
				throw new RunResultsLoadError(
					`Invalid run results:\n${formatRunResultsErrors([
						{ path: `runs.${index}.mode`, message: error.message },
					])}`,
					filePath,
					error,
				);
			}
			throw error;
		}
	});
}

/**
 * Validate already-parsed JSON and convert it into RunResults.
 *
 * @param json - Parsed run results document
 * @param filePath - Source path, used in error messages
 * @throws RunResultsLoadError if validation fails
 */
export function parseRunResults(json: unknown, filePath = "<memory>"): RunResult[] {
	const result = validateRunResultsFile(json);

	if (!result.success) {
		throw new RunResultsLoadError(
			`Invalid run results:\n${formatRunResultsErrors(result.errors)}`,
			filePath,
		);
	}

	return toRunResults(result.data, filePath);
}

/**
 * Load and parse a run results document
 *
 * @param filePath - Path to the JSON document
 * @returns RunResults in document order
 * @throws RunResultsLoadError if reading, parsing or validation fails
 */
export async function loadRunResults(filePath: string): Promise<RunResult[]> {
	try {
		const text = await readFile(filePath, "utf-8");
		const json: unknown = JSON.parse(text);
		return parseRunResults(json, filePath);
	} catch (error) {
		if (error instanceof RunResultsLoadError) {
			throw error;
		}
		throw new RunResultsLoadError(
			`Failed to load run results: ${error instanceof Error ? error.message : String(error)}`,
			filePath,
			error instanceof Error ? error : undefined,
		);
	}
}

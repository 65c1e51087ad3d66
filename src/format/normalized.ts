/**
 * Normalized Table Builder
 *
 * Flattens run results into one table: one row per metric per run, one
 * column per parameter observed anywhere in the collection, and a
 * placeholder row wherever a run lacks a secondary metric that another
 * run reports.
 *
 * @module src/format/normalized
 */

import type { RunResult } from "../../types/results";
import {
	missingOutcome,
	outcomeMetricCells,
	outcomeMetricName,
	primaryOutcome,
	secondaryOutcome,
	trimPunctuation,
	type Outcome,
} from "./outcome";
import type { NormalizedTable, ResultFormat, TableSink } from "./types";

// =============================================================================
// Constants
// =============================================================================

const TEST_COLUMN = "Test";

/** Columns following the parameter columns, one per `outcomeMetricCells` cell */
export const METRIC_COLUMNS = [
	"Metric",
	"Sample Size",
	"Statistic Type",
	"Statistic Value",
	"Statistical Margin of Error",
	"Units",
] as const;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown when a run does not declare a parameter that other runs in
 * the same collection declare.
 */
export class InconsistentParametersError extends Error {
	constructor(
		public readonly testName: string,
		public readonly missingParameters: readonly string[],
	) {
		super(
			`Run "${testName}" is missing parameter(s) declared by other runs: ${missingParameters.join(", ")}`,
		);
		this.name = "InconsistentParametersError";
	}
}

// =============================================================================
// Helper Functions
// =============================================================================

function byCodeUnit(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Union of parameter names across all runs, sorted.
 */
export function collectParameterNames(runs: readonly RunResult[]): string[] {
	const names = new Set<string>();
	for (const run of runs) {
		for (const key of run.params.keys()) {
			names.add(key);
		}
	}
	return Array.from(names).sort(byCodeUnit);
}

/**
 * Union of trimmed secondary metric labels across all runs, sorted.
 * Labels are read from the results, not the map keys, so the union matches
 * the names written as rows.
 */
export function collectSecondaryMetricNames(runs: readonly RunResult[]): string[] {
	const names = new Set<string>();
	for (const run of runs) {
		for (const result of run.secondaries.values()) {
			names.add(trimPunctuation(result.label));
		}
	}
	return Array.from(names).sort(byCodeUnit);
}

function parameterValues(run: RunResult, parameterNames: readonly string[]): string[] {
	const values: string[] = [];
	const missing: string[] = [];

	for (const name of parameterNames) {
		const value = run.params.get(name);
		if (value === undefined) {
			missing.push(name);
		} else {
			values.push(value);
		}
	}

	if (missing.length > 0) {
		throw new InconsistentParametersError(run.primary.label, missing);
	}

	return values;
}

/**
 * Outcomes of one run: its primary, its secondaries, then a placeholder
 * for every union name this run did not report.
 */
function runOutcomes(run: RunResult, secondaryMetricNames: readonly string[]): Outcome[] {
	const outcomes: Outcome[] = [primaryOutcome(run)];
	const written = new Set<string>();

	const secondaries = Array.from(run.secondaries.values()).sort((a, b) =>
		byCodeUnit(trimPunctuation(a.label), trimPunctuation(b.label)),
	);
	for (const result of secondaries) {
		const outcome = secondaryOutcome(run, result);
		const name = outcomeMetricName(outcome);
		// Two labels differing only by decoration collapse to one row.
		if (written.has(name)) continue;
		written.add(name);
		outcomes.push(outcome);
	}

	for (const name of secondaryMetricNames) {
		if (!written.has(name)) {
			outcomes.push(missingOutcome(run, name));
		}
	}

	return outcomes;
}

// =============================================================================
// Table Builder
// =============================================================================

/**
 * Build the normalized table for a collection of runs.
 *
 * @param runs - Run results in output order
 * @returns Header and rows; both empty when there are no runs
 * @throws InconsistentParametersError if a run lacks a parameter another run declares
 */
export function normalize(runs: readonly RunResult[]): NormalizedTable {
	if (runs.length === 0) {
		return { header: [], rows: [] };
	}

	const parameterNames = collectParameterNames(runs);
	const secondaryMetricNames = collectSecondaryMetricNames(runs);

	const rows: string[][] = [];
	for (const run of runs) {
		const testName = run.primary.label;
		const params = parameterValues(run, parameterNames);

		for (const outcome of runOutcomes(run, secondaryMetricNames)) {
			rows.push([testName, ...params, ...outcomeMetricCells(outcome)]);
		}
	}

	return {
		header: [TEST_COLUMN, ...parameterNames, ...METRIC_COLUMNS],
		rows,
	};
}

// =============================================================================
// NormalizedFormat
// =============================================================================

/**
 * Result format writing the normalized table to a sink.
 * Nothing is written for an empty run collection.
 */
export class NormalizedFormat implements ResultFormat {
	constructor(private readonly sink: TableSink) {}

	async writeOut(runs: readonly RunResult[]): Promise<void> {
		const table = normalize(runs);
		if (table.header.length === 0) {
			return;
		}

		await this.sink.writeRecord(table.header);
		for (const row of table.rows) {
			await this.sink.writeRecord(row);
		}
	}
}

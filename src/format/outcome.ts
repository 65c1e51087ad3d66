/**
 * Outcomes
 *
 * Row-ready projections of one (RunResult, metric) pair. An outcome is
 * built per export and discarded once its row is emitted.
 *
 * @module src/format/outcome
 */

import type { Result, ResultRole, RunResult } from "../../types/results";

// =============================================================================
// Types
// =============================================================================

export interface PrimaryOutcome {
	readonly kind: "primary";
	readonly run: RunResult;
	readonly result: Result;
}

export interface SecondaryOutcome {
	readonly kind: "secondary";
	readonly run: RunResult;
	readonly result: Result;
}

/**
 * Placeholder for a secondary metric that other runs report but this run does not.
 */
export interface MissingOutcome {
	readonly kind: "missing";
	readonly run: RunResult;
	readonly metricName: string;
}

export type Outcome = PrimaryOutcome | SecondaryOutcome | MissingOutcome;

// =============================================================================
// Constants
// =============================================================================

/** Rendered for an undefined score error */
export const NOT_AVAILABLE = "NA";

/** Unit and statistic type of a missing outcome */
export const NONE = "none";

// =============================================================================
// Constructors
// =============================================================================

export function primaryOutcome(run: RunResult): PrimaryOutcome {
	return { kind: "primary", run, result: run.primary };
}

export function secondaryOutcome(run: RunResult, result: Result): SecondaryOutcome {
	return { kind: "secondary", run, result };
}

export function missingOutcome(run: RunResult, metricName: string): MissingOutcome {
	return { kind: "missing", run, metricName };
}

// =============================================================================
// Cell Rendering
// =============================================================================

const LEADING_NON_LETTERS = /^[^a-zA-Z]+/;

/**
 * Strip leading non-letter characters from a metric label.
 * Profilers decorate labels with markers ("·gc.alloc.rate"); stripping them
 * yields stable column values and sort order.
 *
 * @example
 * trimPunctuation("··gc.alloc"); // "gc.alloc"
 * trimPunctuation("a··b");       // "a··b"
 */
export function trimPunctuation(label: string): string {
	return label.replace(LEADING_NON_LETTERS, "");
}

/**
 * Render a number for a table cell. NaN becomes "NA" so that an undefined
 * value is never read as a measured zero.
 */
export function formatNumber(value: number): string {
	return Number.isNaN(value) ? NOT_AVAILABLE : String(value);
}

function readPolicy(result: Result): string {
	try {
		return result.policy ?? "";
	} catch {
		// Result implementations without a usable policy still export.
		return "";
	}
}

export function outcomeRole(outcome: Outcome): ResultRole {
	switch (outcome.kind) {
		case "primary":
			return "PRIMARY";
		case "secondary":
			return outcome.result.role;
		case "missing":
			return "OMITTED";
	}
}

export function outcomeMetricName(outcome: Outcome): string {
	switch (outcome.kind) {
		case "primary":
			return outcome.run.params.mode.longLabel;
		case "secondary":
			return trimPunctuation(outcome.result.label);
		case "missing":
			return outcome.metricName;
	}
}

/**
 * Metric columns of an outcome: metric name, sample size, statistic type,
 * statistic value, margin of error, units.
 */
export function outcomeMetricCells(outcome: Outcome): string[] {
	const metricName = outcomeMetricName(outcome);

	if (outcome.kind === "missing") {
		return [metricName, "0", NONE, "0", NOT_AVAILABLE, NONE];
	}

	const { result } = outcome;
	return [
		metricName,
		String(result.sampleCount),
		readPolicy(result),
		formatNumber(result.score),
		formatNumber(result.scoreError),
		result.unit,
	];
}

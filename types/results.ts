/**
 * Core Result Types
 *
 * Shared type contracts for benchmark run results:
 * - Execution engines produce these (RunResult, Result)
 * - The table normalizer consumes them
 * - Profilers emit Result observations alongside measurements
 *
 * @module types/results
 */

// =============================================================================
// Aggregation Policy
// =============================================================================

/**
 * How multiple same-labeled observations are to be combined by a later
 * aggregation step. Carried as metadata only; nothing in this package
 * reduces observations.
 */
export type AggregationPolicy = "AVG" | "SUM" | "MAX" | "MIN";

export const AGGREGATION_POLICIES = ["AVG", "SUM", "MAX", "MIN"] as const satisfies readonly AggregationPolicy[];

// =============================================================================
// Result Role
// =============================================================================

/**
 * Position of a result within its run.
 * OMITTED is reserved for placeholder rows synthesized during export.
 */
export type ResultRole = "PRIMARY" | "SECONDARY" | "OMITTED";

// =============================================================================
// RunMode - What the primary metric represents
// =============================================================================

/**
 * A benchmark run mode with both of its textual forms.
 *
 * @example
 * const mode: RunMode = {
 *   shortLabel: "thrpt",
 *   longLabel: "Throughput, ops/time"
 * };
 */
export interface RunMode {
	/** Compact label used in configuration files */
	readonly shortLabel: string;

	/** Descriptive label used in exported tables */
	readonly longLabel: string;
}

// =============================================================================
// BenchmarkParams - Parameter Set of one measured configuration
// =============================================================================

/**
 * Named parameter values plus the run mode of one measured configuration.
 */
export interface BenchmarkParams {
	/** Run mode of the primary metric */
	readonly mode: RunMode;

	/** Parameter names in insertion order */
	keys(): readonly string[];

	/** Value for a parameter, or undefined when this run does not declare it */
	get(name: string): string | undefined;

	has(name: string): boolean;
}

// =============================================================================
// Result - A single metric
// =============================================================================

/**
 * A metric with already-computed statistics.
 *
 * Every implementation exposes its aggregation policy through `policy`;
 * implementations that cannot report one return null.
 */
export interface Result {
	readonly label: string;

	readonly role: ResultRole;

	/** Number of samples behind the score (non-negative integer) */
	readonly sampleCount: number;

	readonly score: number;

	/** NaN when undefined, e.g. for single-sample results */
	readonly scoreError: number;

	readonly unit: string;

	readonly policy: AggregationPolicy | null;
}

// =============================================================================
// RunResult - One measured configuration
// =============================================================================

/**
 * Results of one measured configuration: its parameters, the primary
 * metric, and any secondary metrics keyed by label.
 */
export interface RunResult {
	readonly params: BenchmarkParams;

	readonly primary: Result;

	/** Secondary metrics keyed by label. Keys are unique; order carries no meaning. */
	readonly secondaries: ReadonlyMap<string, Result>;
}

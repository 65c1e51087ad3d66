/**
 * Results Module Public API
 *
 * Exports result implementations, run modes and the run results loader.
 *
 * @module src/results
 */

// Export types
export type {
	AggregationPolicy,
	BenchmarkParams,
	Result,
	ResultRole,
	RunMode,
	RunResult,
} from "../../types/results";
export type { MeasuredResultInit } from "./scalar";

// Export result implementations
export { MeasuredResult, ScalarResult } from "./scalar";
export { ParameterSet } from "./params";
export { createRunResult } from "./run";

// Export run modes
export {
	ALL_MODES,
	AVERAGE_TIME,
	modeFromLabel,
	RUN_MODES,
	SAMPLE_TIME,
	SINGLE_SHOT_TIME,
	THROUGHPUT,
	UnknownModeError,
} from "./modes";

// Export loader functions
export { loadRunResults, parseRunResults, RunResultsLoadError, toRunResults } from "./loader";

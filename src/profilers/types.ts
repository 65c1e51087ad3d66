/**
 * Profiler Types
 *
 * Contract between an iteration driver and the profilers it hosts.
 *
 * @module src/profilers/types
 */

import type { BenchmarkParams, Result } from "../../types/results";

// =============================================================================
// Iteration Types
// =============================================================================

/**
 * Metadata of one iteration. Profilers may log it; none depend on it.
 */
export interface IterationParams {
	/** Warmup iterations are discarded by the aggregation step */
	readonly type: "warmup" | "measurement";

	/** 1-based iteration number within its type */
	readonly count: number;

	/** Planned iteration duration in milliseconds */
	readonly timeMs: number;
}

/**
 * Results measured by one iteration.
 */
export interface IterationResult {
	readonly primary: Result;
	readonly secondaries: readonly Result[];
}

// =============================================================================
// Profiler Interface
// =============================================================================

/**
 * Profiler running inside the benchmark process, bracketing each iteration.
 */
export interface InternalProfiler {
	/** Human-readable description shown in profiler listings */
	getDescription(): string;

	/**
	 * Called immediately before the iteration body starts.
	 */
	beforeIteration(benchmarkParams: BenchmarkParams, iterationParams: IterationParams): void;

	/**
	 * Called after the iteration body returns or throws.
	 *
	 * @returns Observations to merge into the iteration's secondary results
	 */
	afterIteration(
		benchmarkParams: BenchmarkParams,
		iterationParams: IterationParams,
		result: IterationResult | undefined,
	): Result[];
}

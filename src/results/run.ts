/**
 * RunResult Construction
 *
 * @module src/results/run
 */

import type { BenchmarkParams, Result, RunResult } from "../../types/results";

/**
 * Build a RunResult from its parts.
 * Secondary results are keyed by their own label; a later result with the
 * same label replaces an earlier one.
 *
 * @param params - Parameter set of the measured configuration
 * @param primary - Primary metric
 * @param secondaries - Secondary metrics, in any order
 */
export function createRunResult(
	params: BenchmarkParams,
	primary: Result,
	secondaries: Iterable<Result> = [],
): RunResult {
	const byLabel = new Map<string, Result>();
	for (const result of secondaries) {
		byLabel.set(result.label, result);
	}

	return {
		params,
		primary,
		secondaries: byLabel,
	};
}

/**
 * Profiled Iterations
 *
 * Brackets an iteration body with the before/after hooks of a set of
 * profilers.
 *
 * @module src/profilers/iteration
 */

import type { BenchmarkParams, Result } from "../../types/results";
import type { InternalProfiler, IterationParams, IterationResult } from "./types";

export interface ProfiledIteration {
	readonly result: IterationResult;

	/** Observations from all profilers, in profiler order */
	readonly profilerResults: readonly Result[];
}

interface StopOutcome {
	readonly results: Result[];
	readonly errors: unknown[];
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Stop every profiler in reverse order. A profiler that fails to stop does
 * not keep the others running.
 */
function stopProfilers(
	profilers: readonly InternalProfiler[],
	benchmarkParams: BenchmarkParams,
	iterationParams: IterationParams,
	result: IterationResult | undefined,
): StopOutcome {
	const collected: Result[][] = profilers.map(() => []);
	const errors: unknown[] = [];

	for (let i = profilers.length - 1; i >= 0; i--) {
		const profiler = profilers[i];
		if (profiler === undefined) continue;
		try {
			collected[i] = profiler.afterIteration(benchmarkParams, iterationParams, result);
		} catch (error) {
			errors.push(error);
		}
	}

	return { results: collected.flat(), errors };
}

/**
 * Throw the first error alone, or all of them as an AggregateError led by the first.
 */
function raise(errors: readonly unknown[]): never {
	const [first] = errors;
	if (errors.length === 1) {
		throw first;
	}
	throw new AggregateError(
		errors,
		`Iteration failed with ${errors.length} errors: ${errorMessage(first)}`,
	);
}

/**
 * Run one iteration under the given profilers.
 *
 * Profilers start in order and stop in reverse order. Every started
 * profiler is stopped, even if the body, another profiler's start or
 * another profiler's stop throws. The first failure is re-thrown; when
 * stopping fails as well, all failures are thrown together as an
 * AggregateError, the first failure leading.
 *
 * @example
 * ```typescript
 * const { result, profilerResults } = await runIteration(
 *   [new HeapSampler()],
 *   params,
 *   { type: "measurement", count: 1, timeMs: 1000 },
 *   async () => measure(),
 * );
 * ```
 */
export async function runIteration(
	profilers: readonly InternalProfiler[],
	benchmarkParams: BenchmarkParams,
	iterationParams: IterationParams,
	body: () => Promise<IterationResult>,
): Promise<ProfiledIteration> {
	const started: InternalProfiler[] = [];
	try {
		for (const profiler of profilers) {
			profiler.beforeIteration(benchmarkParams, iterationParams);
			started.push(profiler);
		}
	} catch (error) {
		const { errors } = stopProfilers(started, benchmarkParams, iterationParams, undefined);
		raise([error, ...errors]);
	}

	let result: IterationResult;
	try {
		result = await body();
	} catch (error) {
		const { errors } = stopProfilers(started, benchmarkParams, iterationParams, undefined);
		raise([error, ...errors]);
	}

	const stopped = stopProfilers(started, benchmarkParams, iterationParams, result);
	if (stopped.errors.length > 0) {
		raise(stopped.errors);
	}

	return { result, profilerResults: stopped.results };
}

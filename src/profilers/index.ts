/**
 * Profilers Module Public API
 *
 * @module src/profilers
 */

export type { InternalProfiler, IterationParams, IterationResult } from "./types";
export type { CancelTask, FixedRateScheduler } from "./scheduler";
export { scheduleAtFixedRate } from "./scheduler";
export type { HeapSamplerOptions } from "./heap-sampler";
export {
	createHeapSampler,
	DEFAULT_INITIAL_DELAY_MS,
	DEFAULT_SAMPLING_PERIOD_MS,
	HEAP_AVG_LABEL,
	HEAP_MAX_LABEL,
	HEAP_UNIT,
	HeapSampler,
	readV8HeapUsage,
} from "./heap-sampler";
export type { ProfiledIteration } from "./iteration";
export { runIteration } from "./iteration";

/**
 * Heap Sampler
 *
 * Samples live heap usage at a fixed rate while a measurement iteration
 * runs and reports every sample as a pair of scalar observations.
 *
 * Samples are not reduced here: each one is emitted once tagged AVG
 * ("Heap-Avg") and once tagged MAX ("Heap-Max"), and the result
 * aggregation step combines them.
 *
 * @module src/profilers/heap-sampler
 */

import type { Config } from "../config";
import { createLogger, type Logger } from "../logger";
import { ScalarResult } from "../results/scalar";
import { scheduleAtFixedRate, type CancelTask, type FixedRateScheduler } from "./scheduler";
import type { InternalProfiler, IterationParams } from "./types";
import type { BenchmarkParams } from "../../types/results";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_SAMPLING_PERIOD_MS = 100;
export const DEFAULT_INITIAL_DELAY_MS = 10;

export const HEAP_AVG_LABEL = "Heap-Avg";
export const HEAP_MAX_LABEL = "Heap-Max";
export const HEAP_UNIT = "bytes";

// =============================================================================
// Types
// =============================================================================

export interface HeapSamplerOptions {
	/** Interval between samples (default: 100ms) */
	readonly periodMs?: number;

	/** Delay before the first sample (default: 10ms) */
	readonly initialDelayMs?: number;

	/** Current live heap in bytes (default: V8 heap used) */
	readonly readHeapUsage?: () => number;

	readonly schedule?: FixedRateScheduler;

	readonly logger?: Logger;
}

type SamplerState =
	| { readonly status: "idle" }
	| {
			readonly status: "sampling";
			readonly samples: number[];
			readonly cancel: CancelTask;
	  };

/**
 * Live heap as reported by V8: heap allocated minus heap free.
 */
export function readV8HeapUsage(): number {
	return process.memoryUsage().heapUsed;
}

// =============================================================================
// HeapSampler
// =============================================================================

export class HeapSampler implements InternalProfiler {
	private state: SamplerState = { status: "idle" };
	private readonly periodMs: number;
	private readonly initialDelayMs: number;
	private readonly readHeapUsage: () => number;
	private readonly schedule: FixedRateScheduler;
	private readonly logger: Logger;

	constructor(options: HeapSamplerOptions = {}) {
		const periodMs = options.periodMs ?? DEFAULT_SAMPLING_PERIOD_MS;
		const initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
		if (!Number.isFinite(periodMs) || periodMs <= 0) {
			throw new RangeError(`Sampling period must be a positive number of ms, got ${periodMs}`);
		}
		if (!Number.isFinite(initialDelayMs) || initialDelayMs < 0) {
			throw new RangeError(
				`Initial sampling delay must be a non-negative number of ms, got ${initialDelayMs}`,
			);
		}
		this.periodMs = periodMs;
		this.initialDelayMs = initialDelayMs;
		this.readHeapUsage = options.readHeapUsage ?? readV8HeapUsage;
		this.schedule = options.schedule ?? scheduleAtFixedRate;
		this.logger = options.logger ?? createLogger();
	}

	getDescription(): string {
		return "Naive heap size sampler";
	}

	get isSampling(): boolean {
		return this.state.status === "sampling";
	}

	/**
	 * Start sampling into a fresh buffer. A sampler left running by a
	 * previous iteration is stopped and its samples dropped.
	 *
	 * If the timer cannot be armed the iteration still runs; it just gets
	 * no heap data.
	 */
	beforeIteration(_benchmarkParams: BenchmarkParams, iterationParams: IterationParams): void {
		const stale = this.stop();
		if (stale.length > 0) {
			this.logger.debug(`Discarded ${stale.length} heap samples from an unfinished iteration`);
		}

		const samples: number[] = [];
		try {
			const cancel = this.schedule(
				() => this.sample(samples),
				this.initialDelayMs,
				this.periodMs,
			);
			this.state = { status: "sampling", samples, cancel };
		} catch (error) {
			this.logger.warn(
				`Heap sampling disabled for ${iterationParams.type} iteration ${iterationParams.count}: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
	}

	/**
	 * Stop sampling and convert the samples into observations, two per
	 * sample in sample order. Returns an empty array if sampling never started.
	 */
	afterIteration(): ScalarResult[] {
		const samples = this.stop();

		return samples.flatMap((bytes) => [
			new ScalarResult(HEAP_AVG_LABEL, bytes, HEAP_UNIT, "AVG"),
			new ScalarResult(HEAP_MAX_LABEL, bytes, HEAP_UNIT, "MAX"),
		]);
	}

	/**
	 * Cancel the timer and hand back the samples collected so far.
	 * A no-op returning an empty array when idle.
	 */
	stop(): readonly number[] {
		if (this.state.status === "idle") {
			return [];
		}

		const { samples, cancel } = this.state;
		cancel();
		this.state = { status: "idle" };
		return samples;
	}

	private sample(samples: number[]): void {
		try {
			samples.push(this.readHeapUsage());
		} catch (error) {
			this.logger.warn(
				`Heap sample skipped: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
}

/**
 * Create a heap sampler using configured timing.
 */
export function createHeapSampler(
	config: Pick<Config, "heapPeriodMs" | "heapInitialDelayMs" | "logLevel">,
	options: Omit<HeapSamplerOptions, "periodMs" | "initialDelayMs"> = {},
): HeapSampler {
	return new HeapSampler({
		...options,
		periodMs: config.heapPeriodMs,
		initialDelayMs: config.heapInitialDelayMs,
		logger: options.logger ?? createLogger(config.logLevel),
	});
}

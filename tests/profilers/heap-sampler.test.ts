/**
 * Heap Sampler Tests
 *
 * Sampling cadence, lifecycle and failure handling, driven by fake timers
 * and an injected heap reader.
 *
 * @module tests/profilers/heap-sampler.test.ts
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { Logger } from "../../src/logger";
import { createHeapSampler, HeapSampler, readV8HeapUsage } from "../../src/profilers/heap-sampler";
import type { IterationParams } from "../../src/profilers/types";
import { THROUGHPUT } from "../../src/results/modes";
import { ParameterSet } from "../../src/results/params";

const benchmarkParams = new ParameterSet(THROUGHPUT, { size: "10" });
const iteration: IterationParams = { type: "measurement", count: 1, timeMs: 350 };

function silentLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Heap reader returning 1000, 2000, 3000, ... */
function countingHeap() {
	let calls = 0;
	return vi.fn(() => {
		calls++;
		return calls * 1000;
	});
}

beforeEach(() => {
	vi.useFakeTimers();
});

afterEach(() => {
	vi.useRealTimers();
});

// =============================================================================
// Sampling
// =============================================================================

describe("HeapSampler sampling", () => {
	test("collects one sample per period after the initial delay", () => {
		const readHeapUsage = countingHeap();
		const sampler = new HeapSampler({ readHeapUsage, logger: silentLogger() });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(350);
		const results = sampler.afterIteration();

		// t = 10, 110, 210, 310
		expect(readHeapUsage).toHaveBeenCalledTimes(4);
		expect(results).toHaveLength(8);
		expect(results.map((r) => [r.label, r.score, r.policy])).toEqual([
			["Heap-Avg", 1000, "AVG"],
			["Heap-Max", 1000, "MAX"],
			["Heap-Avg", 2000, "AVG"],
			["Heap-Max", 2000, "MAX"],
			["Heap-Avg", 3000, "AVG"],
			["Heap-Max", 3000, "MAX"],
			["Heap-Avg", 4000, "AVG"],
			["Heap-Max", 4000, "MAX"],
		]);
		for (const result of results) {
			expect(result.unit).toBe("bytes");
			expect(result.role).toBe("SECONDARY");
			expect(result.sampleCount).toBe(1);
		}
	});

	test("sample count follows floor((D - I) / P) + 1", () => {
		for (const duration of [10, 99, 110, 509, 1000]) {
			const readHeapUsage = countingHeap();
			const sampler = new HeapSampler({ readHeapUsage, logger: silentLogger() });

			sampler.beforeIteration(benchmarkParams, iteration);
			vi.advanceTimersByTime(duration);
			sampler.stop();

			expect(readHeapUsage).toHaveBeenCalledTimes(Math.floor((duration - 10) / 100) + 1);
		}
	});

	test("records nothing before the initial delay", () => {
		const sampler = new HeapSampler({ readHeapUsage: countingHeap(), logger: silentLogger() });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(9);

		expect(sampler.afterIteration()).toEqual([]);
	});

	test("records nothing after the iteration ends", () => {
		const readHeapUsage = countingHeap();
		const sampler = new HeapSampler({ readHeapUsage, logger: silentLogger() });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(150);
		sampler.afterIteration();
		vi.advanceTimersByTime(1000);

		expect(readHeapUsage).toHaveBeenCalledTimes(2);
		expect(sampler.isSampling).toBe(false);
		expect(vi.getTimerCount()).toBe(0);
	});
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("HeapSampler lifecycle", () => {
	test("starts every iteration with a fresh buffer", () => {
		const sampler = new HeapSampler({ readHeapUsage: countingHeap(), logger: silentLogger() });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(150);
		expect(sampler.afterIteration().map((r) => r.score)).toEqual([1000, 1000, 2000, 2000]);

		sampler.beforeIteration(benchmarkParams, { ...iteration, count: 2 });
		vi.advanceTimersByTime(50);
		expect(sampler.afterIteration().map((r) => r.score)).toEqual([3000, 3000]);
	});

	test("drops samples of an iteration that never ended", () => {
		const sampler = new HeapSampler({ readHeapUsage: countingHeap(), logger: silentLogger() });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(120);
		sampler.beforeIteration(benchmarkParams, { ...iteration, count: 2 });
		vi.advanceTimersByTime(20);

		expect(sampler.afterIteration().map((r) => r.score)).toEqual([3000, 3000]);
	});

	test("ending an idle sampler returns no observations", () => {
		const sampler = new HeapSampler({ readHeapUsage: countingHeap(), logger: silentLogger() });

		expect(sampler.afterIteration()).toEqual([]);
		expect(sampler.stop()).toEqual([]);
		expect(sampler.isSampling).toBe(false);
	});

	test("describes itself", () => {
		expect(new HeapSampler().getDescription()).toBe("Naive heap size sampler");
	});
});

// =============================================================================
// Failures
// =============================================================================

describe("HeapSampler failures", () => {
	test("runs without heap data when the timer cannot be created", () => {
		const logger = silentLogger();
		const sampler = new HeapSampler({
			readHeapUsage: countingHeap(),
			logger,
			schedule: () => {
				throw new Error("timer limit reached");
			},
		});

		expect(() => sampler.beforeIteration(benchmarkParams, iteration)).not.toThrow();
		expect(sampler.isSampling).toBe(false);
		expect(sampler.afterIteration()).toEqual([]);
		expect(logger.warn).toHaveBeenCalledWith(
			"Heap sampling disabled for measurement iteration 1: timer limit reached",
		);
	});

	test("rejects a sampling period that is not positive", () => {
		for (const periodMs of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
			expect(() => new HeapSampler({ periodMs, logger: silentLogger() })).toThrow(RangeError);
		}
	});

	test("rejects a negative or non-finite initial delay", () => {
		for (const initialDelayMs of [-1, Number.NaN]) {
			expect(() => new HeapSampler({ initialDelayMs, logger: silentLogger() })).toThrow(
				RangeError,
			);
		}
		expect(new HeapSampler({ initialDelayMs: 0, logger: silentLogger() }).isSampling).toBe(false);
	});

	test("skips a sample whose heap reading fails", () => {
		const logger = silentLogger();
		const readHeapUsage = vi
			.fn<[], number>()
			.mockReturnValueOnce(100)
			.mockImplementationOnce(() => {
				throw new Error("heap unavailable");
			})
			.mockReturnValue(300);
		const sampler = new HeapSampler({ readHeapUsage, logger });

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(350);

		expect(sampler.afterIteration().map((r) => r.score)).toEqual([100, 100, 300, 300, 300, 300]);
		expect(logger.warn).toHaveBeenCalledWith("Heap sample skipped: heap unavailable");
	});
});

// =============================================================================
// Construction
// =============================================================================

describe("createHeapSampler", () => {
	test("uses configured timing", () => {
		const readHeapUsage = countingHeap();
		const sampler = createHeapSampler(
			{ heapPeriodMs: 50, heapInitialDelayMs: 5, logLevel: "silent" },
			{ readHeapUsage },
		);

		sampler.beforeIteration(benchmarkParams, iteration);
		vi.advanceTimersByTime(120);
		sampler.stop();

		// t = 5, 55, 105
		expect(readHeapUsage).toHaveBeenCalledTimes(3);
	});
});

describe("readV8HeapUsage", () => {
	test("reports a positive byte count", () => {
		expect(readV8HeapUsage()).toBeGreaterThan(0);
	});
});

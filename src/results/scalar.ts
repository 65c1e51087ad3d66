/**
 * Scalar Results
 *
 * Concrete Result implementations for the values this package produces
 * and loads.
 *
 * @module src/results/scalar
 */

import type { AggregationPolicy, Result, ResultRole } from "../../types/results";

// =============================================================================
// ScalarResult - A single observation
// =============================================================================

/**
 * One observation of a metric. Has a single sample and no score error.
 *
 * @example
 * ```typescript
 * const heap = new ScalarResult("Heap-Max", 52_428_800, "bytes", "MAX");
 * ```
 */
export class ScalarResult implements Result {
	readonly sampleCount = 1;
	readonly scoreError = Number.NaN;

	constructor(
		readonly label: string,
		readonly score: number,
		readonly unit: string,
		readonly policy: AggregationPolicy | null,
		readonly role: ResultRole = "SECONDARY",
	) {}
}

// =============================================================================
// MeasuredResult - A result with precomputed statistics
// =============================================================================

/**
 * Fields of a result whose statistics were computed by the execution engine.
 */
export interface MeasuredResultInit {
	readonly label: string;
	readonly role: ResultRole;
	readonly sampleCount: number;
	readonly score: number;
	/** Omit or pass NaN when the engine reported no error bound */
	readonly scoreError?: number;
	readonly unit: string;
	readonly policy?: AggregationPolicy | null;
}

/**
 * A result carrying statistics computed elsewhere.
 */
export class MeasuredResult implements Result {
	readonly label: string;
	readonly role: ResultRole;
	readonly sampleCount: number;
	readonly score: number;
	readonly scoreError: number;
	readonly unit: string;
	readonly policy: AggregationPolicy | null;

	constructor(init: MeasuredResultInit) {
		if (!Number.isInteger(init.sampleCount) || init.sampleCount < 0) {
			throw new RangeError(
				`Sample count for "${init.label}" must be a non-negative integer, got ${init.sampleCount}`,
			);
		}
		this.label = init.label;
		this.role = init.role;
		this.sampleCount = init.sampleCount;
		this.score = init.score;
		this.scoreError = init.scoreError ?? Number.NaN;
		this.unit = init.unit;
		this.policy = init.policy ?? null;
	}
}

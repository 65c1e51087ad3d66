/**
 * Run Modes
 *
 * Built-in benchmark run modes and label lookup.
 *
 * @module src/results/modes
 */

import type { RunMode } from "../../types/results";

// =============================================================================
// Built-in Modes
// =============================================================================

export const THROUGHPUT: RunMode = {
	shortLabel: "thrpt",
	longLabel: "Throughput, ops/time",
};

export const AVERAGE_TIME: RunMode = {
	shortLabel: "avgt",
	longLabel: "Average time, time/op",
};

export const SAMPLE_TIME: RunMode = {
	shortLabel: "sample",
	longLabel: "Sampling time",
};

export const SINGLE_SHOT_TIME: RunMode = {
	shortLabel: "ss",
	longLabel: "Single shot invocation time",
};

export const ALL_MODES: RunMode = {
	shortLabel: "all",
	longLabel: "All benchmark modes",
};

export const RUN_MODES: readonly RunMode[] = [
	THROUGHPUT,
	AVERAGE_TIME,
	SAMPLE_TIME,
	SINGLE_SHOT_TIME,
	ALL_MODES,
];

// =============================================================================
// Lookup
// =============================================================================

/**
 * Error thrown when a mode label matches no known run mode
 */
export class UnknownModeError extends Error {
	constructor(public readonly label: string) {
		super(
			`Unknown run mode "${label}". Known modes: ${RUN_MODES.map((m) => m.shortLabel).join(", ")}`,
		);
		this.name = "UnknownModeError";
	}
}

/**
 * Resolve a run mode from either its short or long label.
 *
 * @param label - Short label ("thrpt") or long label ("Throughput, ops/time")
 * @throws UnknownModeError if no mode matches
 */
export function modeFromLabel(label: string): RunMode {
	const mode = RUN_MODES.find((m) => m.shortLabel === label || m.longLabel === label);
	if (!mode) {
		throw new UnknownModeError(label);
	}
	return mode;
}

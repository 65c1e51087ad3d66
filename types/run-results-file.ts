/**
 * Run Results File Types and Schema
 *
 * Defines the JSON document an execution engine writes for a finished
 * benchmark session, and validation helpers for it.
 *
 * @module types/run-results-file
 */

import { z } from "zod";
import { AGGREGATION_POLICIES } from "./results";

// =============================================================================
// Result Entry Schema
// =============================================================================

/**
 * A single metric as written by the execution engine
 */
export const ResultEntrySchema = z.object({
	score: z.number(),
	/** null when the engine could not bound the error (single-sample metrics) */
	score_error: z.number().nullable().optional(),
	sample_count: z.number().int().nonnegative().optional().default(1),
	unit: z.string(),
	/** How repeated observations of this metric combine downstream */
	policy: z.enum(AGGREGATION_POLICIES).optional(),
});

// =============================================================================
// Run Entry Schema
// =============================================================================

/**
 * Parameter values are stored as strings; numbers and booleans are accepted
 * and converted.
 */
const ParamValueSchema = z
	.union([z.string(), z.number(), z.boolean()])
	.transform((value) => String(value));

/**
 * One measured configuration
 */
export const RunEntrySchema = z.object({
	/** Benchmark identifier, used as the primary metric label */
	benchmark: z.string().min(1),
	/** Run mode, short ("thrpt") or long ("Throughput, ops/time") label */
	mode: z.string().min(1),
	params: z.record(ParamValueSchema).optional().default({}),
	primary: ResultEntrySchema,
	/** Secondary metrics keyed by label */
	secondary: z.record(ResultEntrySchema).optional().default({}),
});

/**
 * Complete run results document
 */
export const RunResultsFileSchema = z.object({
	version: z.literal(1),
	runs: z.array(RunEntrySchema),
});

// =============================================================================
// Type Exports
// =============================================================================

export type ResultEntry = z.infer<typeof ResultEntrySchema>;
export type RunEntry = z.infer<typeof RunEntrySchema>;
export type RunResultsFile = z.infer<typeof RunResultsFileSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export interface RunResultsValidationIssue {
	path: string;
	message: string;
}

/**
 * Validation result for a run results document
 */
export type RunResultsValidationResult =
	| { success: true; data: RunResultsFile }
	| { success: false; errors: RunResultsValidationIssue[] };

/**
 * Validate a run results document
 *
 * @param json - The parsed JSON to validate
 * @returns Validation result with typed data or errors
 */
export function validateRunResultsFile(json: unknown): RunResultsValidationResult {
	const result = RunResultsFileSchema.safeParse(json);

	if (result.success) {
		return { success: true, data: result.data };
	}

	return {
		success: false,
		errors: result.error.issues.map((err) => ({
			path: err.path.join("."),
			message: err.message,
		})),
	};
}

/**
 * Format validation errors for display
 *
 * @param errors - Array of validation errors
 * @returns Formatted error message
 */
export function formatRunResultsErrors(errors: readonly RunResultsValidationIssue[]): string {
	return errors.map((err) => `  - ${err.path}: ${err.message}`).join("\n");
}

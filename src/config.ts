/**
 * Configuration
 *
 * Settings read from the environment, validated once at startup.
 *
 * @module src/config
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

// =============================================================================
// Schema
// =============================================================================

const ConfigSchema = z.object({
	BENCH_NORMALIZE_HEAP_PERIOD_MS: z.coerce.number().int().positive().optional().default(100),
	BENCH_NORMALIZE_HEAP_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().optional().default(10),
	BENCH_NORMALIZE_LOG_LEVEL: z.enum(LOG_LEVELS).optional().default("info"),
});

export interface Config {
	/** Interval between heap samples (ms) */
	readonly heapPeriodMs: number;
	/** Delay before the first heap sample (ms) */
	readonly heapInitialDelayMs: number;
	readonly logLevel: LogLevel;
}

/**
 * Error thrown when an environment setting is invalid
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly issues: readonly string[],
	) {
		super(message);
		this.name = "ConfigError";
	}
}

// =============================================================================
// Loading
// =============================================================================

function blankToUndefined(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Read configuration from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @throws ConfigError if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = ConfigSchema.safeParse({
		BENCH_NORMALIZE_HEAP_PERIOD_MS: blankToUndefined(env.BENCH_NORMALIZE_HEAP_PERIOD_MS),
		BENCH_NORMALIZE_HEAP_INITIAL_DELAY_MS: blankToUndefined(env.BENCH_NORMALIZE_HEAP_INITIAL_DELAY_MS),
		BENCH_NORMALIZE_LOG_LEVEL: blankToUndefined(env.BENCH_NORMALIZE_LOG_LEVEL),
	});

	if (!result.success) {
		const issues = result.error.issues.map((err) => `  - ${err.path.join(".")}: ${err.message}`);
		throw new ConfigError(`Invalid configuration:\n${issues.join("\n")}`, issues);
	}

	return {
		heapPeriodMs: result.data.BENCH_NORMALIZE_HEAP_PERIOD_MS,
		heapInitialDelayMs: result.data.BENCH_NORMALIZE_HEAP_INITIAL_DELAY_MS,
		logLevel: result.data.BENCH_NORMALIZE_LOG_LEVEL,
	};
}

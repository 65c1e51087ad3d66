/**
 * Console Logger
 *
 * Leveled wrapper over console. Diagnostics go to stderr so that CSV
 * written to stdout stays clean.
 *
 * @module src/logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

const SEVERITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

/**
 * Create a logger that drops messages below `level`.
 *
 * @param level - Minimum level to emit
 * @param scope - Prefix shown before each message
 */
export function createLogger(level: LogLevel = "info", scope = "bench-normalize"): Logger {
	const enabled = (messageLevel: LogLevel) => SEVERITY[messageLevel] >= SEVERITY[level];
	const prefix = `[${scope}]`;

	return {
		debug(message, ...details) {
			if (enabled("debug")) console.error(prefix, message, ...details);
		},
		info(message, ...details) {
			if (enabled("info")) console.error(prefix, message, ...details);
		},
		warn(message, ...details) {
			if (enabled("warn")) console.warn(prefix, message, ...details);
		},
		error(message, ...details) {
			if (enabled("error")) console.error(prefix, message, ...details);
		},
	};
}

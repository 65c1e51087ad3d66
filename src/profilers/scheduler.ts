/**
 * Fixed-Rate Scheduling
 *
 * @module src/profilers/scheduler
 */

/** Cancels a scheduled task. Safe to call more than once. */
export type CancelTask = () => void;

/**
 * Runs `task` after `initialDelayMs`, then every `periodMs`, until cancelled.
 */
export type FixedRateScheduler = (
	task: () => void,
	initialDelayMs: number,
	periodMs: number,
) => CancelTask;

/**
 * Event-loop scheduler with unref'd timers. Cancellation is synchronous:
 * once it returns, the task will not run again.
 */
export const scheduleAtFixedRate: FixedRateScheduler = (task, initialDelayMs, periodMs) => {
	let interval: NodeJS.Timeout | undefined;

	const initial = setTimeout(() => {
		interval = setInterval(task, periodMs);
		interval.unref();
		task();
	}, initialDelayMs);
	initial.unref();

	return () => {
		clearTimeout(initial);
		if (interval !== undefined) {
			clearInterval(interval);
			interval = undefined;
		}
	};
};

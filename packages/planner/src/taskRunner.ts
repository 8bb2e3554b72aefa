import { setImmediate as deferred } from "node:timers/promises";
import { TaskTimeoutError } from "@replenish/core";

/** A unit of planning work; runs to completion once started. */
export type PlanningTask<T> = () => T | Promise<T>;

export interface TaskRunner {
	run<T>(label: string, task: PlanningTask<T>): Promise<T>;
}

/**
 * Runs each task on a later turn of the event loop so sibling dispatches
 * are all queued before the first one starts. Tasks run one after another
 * on the calling thread.
 */
export class DeferredTaskRunner implements TaskRunner {
	async run<T>(_label: string, task: PlanningTask<T>): Promise<T> {
		await deferred();
		return task();
	}
}

/**
 * Reject with TaskTimeoutError when `work` has not settled within
 * `timeoutMs`. The work itself is not cancelled.
 */
export const withTimeout = async <T>(
	label: string,
	work: Promise<T>,
	timeoutMs: number | null | undefined
): Promise<T> => {
	if (timeoutMs === null || timeoutMs === undefined) {
		return work;
	}
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TaskTimeoutError(label, timeoutMs)), timeoutMs);
	});
	try {
		return await Promise.race([work, timeout]);
	} finally {
		clearTimeout(timer);
	}
};

/**
 * Wrap `task` so it is held to a deadline counted from now: it is not
 * started once the deadline has passed, and a result that arrives late is
 * replaced by TaskTimeoutError. Runners that execute on the calling thread
 * cannot be interrupted by a timer, so this is what bounds them.
 */
export const withDeadline = <T>(
	label: string,
	task: PlanningTask<T>,
	timeoutMs: number,
	now: () => number = Date.now
): PlanningTask<T> => {
	const deadline = now() + timeoutMs;
	return async (): Promise<T> => {
		if (now() > deadline) {
			throw new TaskTimeoutError(label, timeoutMs);
		}
		const value = await task();
		if (now() > deadline) {
			throw new TaskTimeoutError(label, timeoutMs);
		}
		return value;
	};
};

/** Run `task` through `runner`, bounded by `timeoutMs` when one is given. */
export const dispatchTask = <T>(
	label: string,
	runner: TaskRunner,
	task: PlanningTask<T>,
	timeoutMs: number | null | undefined
): Promise<T> => {
	if (timeoutMs === null || timeoutMs === undefined) {
		return runner.run(label, task);
	}
	return withTimeout(label, runner.run(label, withDeadline(label, task, timeoutMs)), timeoutMs);
};

/**
 * Dispatch keyed tasks through `runner` and collect every settlement by key.
 * A rejection is handed to `onError`; it never cancels siblings.
 */
export const settleKeyed = async <T>(
	entries: readonly (readonly [string, PlanningTask<T>])[],
	runner: TaskRunner,
	timeoutMs: number | null | undefined,
	onError: (key: string, error: unknown) => T
): Promise<Record<string, T>> => {
	const settled = await Promise.allSettled(
		entries.map(([key, task]) => dispatchTask(key, runner, task, timeoutMs))
	);
	return Object.fromEntries(
		settled.map((outcome, index) => {
			const key = entries[index][0];
			return [
				key,
				outcome.status === "fulfilled" ? outcome.value : onError(key, outcome.reason),
			];
		})
	);
};

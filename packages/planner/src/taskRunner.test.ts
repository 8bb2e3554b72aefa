import { describe, expect, it } from "vitest";
import { TaskTimeoutError } from "@replenish/core";
import { DeferredTaskRunner, settleKeyed, withDeadline, withTimeout } from "./taskRunner";
import type { TaskRunner } from "./taskRunner";

describe("DeferredTaskRunner", () => {
	it("starts tasks only after every sibling is queued", async () => {
		const runner = new DeferredTaskRunner();
		const order: string[] = [];
		const first = runner.run("a", () => {
			order.push("a");
			return 1;
		});
		order.push("queued");
		const second = runner.run("b", () => {
			order.push("b");
			return 2;
		});
		expect(await Promise.all([first, second])).toEqual([1, 2]);
		expect(order).toEqual(["queued", "a", "b"]);
	});
});

describe("withTimeout", () => {
	it("passes through work that settles in time", async () => {
		await expect(withTimeout("quick", Promise.resolve(5), 1_000)).resolves.toBe(5);
	});

	it("rejects when the work outlives the limit", async () => {
		const never = new Promise<number>(() => undefined);
		await expect(withTimeout("slow", never, 10)).rejects.toThrowError(TaskTimeoutError);
		await expect(withTimeout("slow", never, 10)).rejects.toThrowError(
			'Task "slow" timed out after 10ms'
		);
	});

	it("waits indefinitely without a limit", async () => {
		await expect(withTimeout("open", Promise.resolve("done"), null)).resolves.toBe("done");
	});
});

describe("withDeadline", () => {
	it("does not start a task whose deadline has passed", async () => {
		let clock = 0;
		let runs = 0;
		const task = withDeadline("late", () => (runs += 1), 50, () => clock);
		clock = 51;
		await expect(task()).rejects.toThrowError('Task "late" timed out after 50ms');
		expect(runs).toBe(0);
	});

	it("replaces a result that arrives after the deadline", async () => {
		let clock = 0;
		const task = withDeadline(
			"slow",
			() => {
				clock = 80;
				return "done";
			},
			50,
			() => clock
		);
		await expect(task()).rejects.toThrowError(TaskTimeoutError);
	});

	it("passes a result through within the deadline", async () => {
		const clock = 10;
		const task = withDeadline("quick", () => "done", 50, () => clock);
		await expect(task()).resolves.toBe("done");
	});
});

describe("settleKeyed", () => {
	it("keeps siblings when one task fails", async () => {
		const results = await settleKeyed<string>(
			[
				["ok", () => "fine"],
				[
					"bad",
					() => {
						throw new Error("boom");
					},
				],
			],
			new DeferredTaskRunner(),
			null,
			(key, error) => `${key}: ${error instanceof Error ? error.message : "?"}`
		);
		expect(results).toEqual({ ok: "fine", bad: "bad: boom" });
	});

	it("keeps keys that name object properties", async () => {
		const results = await settleKeyed<number>(
			[
				["__proto__", () => 1],
				["toString", () => 2],
			],
			new DeferredTaskRunner(),
			null,
			() => 0
		);
		expect(Object.keys(results)).toEqual(["__proto__", "toString"]);
		expect(results["__proto__"]).toBe(1);
		expect(Object.getPrototypeOf(results)).toBe(Object.prototype);
	});

	it("times out tasks that overrun on the deferred runner", async () => {
		const started: string[] = [];
		const busy = (key: string) => () => {
			started.push(key);
			const end = Date.now() + 60;
			let spins = 0;
			while (Date.now() < end) {
				spins += 1;
			}
			return spins > 0 ? "done" : "idle";
		};
		const results = await settleKeyed<string>(
			[
				["a", busy("a")],
				["b", busy("b")],
			],
			new DeferredTaskRunner(),
			20,
			(_, error) => (error instanceof TaskTimeoutError ? error.kind : "other")
		);
		expect(results).toEqual({ a: "TaskTimeout", b: "TaskTimeout" });
		// b's deadline passed while a was running, so it never started.
		expect(started).toEqual(["a"]);
	});

	it("reports a timed-out task by key", async () => {
		const stalled: TaskRunner = {
			run: <T>() => new Promise<T>(() => undefined),
		};
		const results = await settleKeyed<string>(
			[["stuck", () => "never"]],
			stalled,
			5,
			(_, error) => (error instanceof TaskTimeoutError ? error.kind : "other")
		);
		expect(results).toEqual({ stuck: "TaskTimeout" });
	});
});

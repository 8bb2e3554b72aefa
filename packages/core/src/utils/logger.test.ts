import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, sanitizeValue } from "./logger";

describe("logger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes error events as JSON lines with the module name", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const logger = createLogger("forecast-engine");

		logger.error("model_fit_failed", { model: "arima", reason: "singular" });

		expect(spy).toHaveBeenCalledTimes(1);
		const payload = JSON.parse(String(spy.mock.calls[0][0]));
		expect(payload.level).toBe("error");
		expect(payload.module).toBe("forecast-engine");
		expect(payload.event).toBe("model_fit_failed");
		expect(payload.model).toBe("arima");
		expect(typeof payload.ts).toBe("string");
	});

	it("drops events below the configured level", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		createLogger("forecast-engine").info("forecast_generated", {});
		expect(spy).not.toHaveBeenCalled();
	});

	describe("sanitizeValue", () => {
		it("flattens errors, dates and non-finite numbers", () => {
			const result = sanitizeValue(
				{
					error: new Error("bad"),
					at: new Date("2024-01-01T00:00:00.000Z"),
					ratio: Number.POSITIVE_INFINITY,
				},
				new WeakSet()
			);
			expect(result).toMatchObject({
				error: { name: "Error", message: "bad" },
				at: "2024-01-01T00:00:00.000Z",
				ratio: "Infinity",
			});
		});

		it("keeps keys that name object properties", () => {
			const outcomes = Object.fromEntries([["__proto__", "ok"]]);
			expect(JSON.stringify(sanitizeValue({ outcomes }, new WeakSet()))).toBe(
				'{"outcomes":{"__proto__":"ok"}}'
			);
		});

		it("marks circular references", () => {
			const node: Record<string, unknown> = { name: "root" };
			node.self = node;
			expect(sanitizeValue(node, new WeakSet())).toEqual({
				name: "root",
				self: "[circular]",
			});
		});
	});
});

import { describe, expect, it } from "vitest";
import { demandValues, ValidationError } from "@replenish/core";
import { applyScenario, runScenarios, runScenariosAsync, scenarioMultiplier } from "./scenarios";
import { dailySeries, weeklyDemand } from "./__tests__/series";

const series = dailySeries(weeklyDemand(60));

describe("scenarioMultiplier", () => {
	it("compounds lift and seasonality", () => {
		expect(scenarioMultiplier({ name: "plain" })).toBe(1);
		expect(scenarioMultiplier({ name: "promo", promotionLiftPct: 0.5, seasonalityFactor: 2 })).toBe(3);
	});

	it("rejects a lift below -100% and a negative factor", () => {
		expect(() => scenarioMultiplier({ name: "x", promotionLiftPct: -1.5 })).toThrowError(
			ValidationError
		);
		expect(() => scenarioMultiplier({ name: "x", seasonalityFactor: -1 })).toThrowError(
			ValidationError
		);
	});
});

describe("applyScenario", () => {
	it("scales every period and leaves the input untouched", () => {
		const scaled = applyScenario(dailySeries([10, 20]), { name: "half", seasonalityFactor: 0.5 });
		expect(demandValues(scaled)).toEqual([5, 10]);
	});
});

describe("runScenarios", () => {
	it("measures a promotion against the unmodified series", () => {
		const results = runScenarios(series, [
			{ name: "baseline" },
			{ name: "promo", promotionLiftPct: 0.2 },
		]);
		const baseline = results.baseline;
		const promo = results.promo;
		if (baseline.status !== "ok" || promo.status !== "ok") {
			throw new Error("scenario planning failed");
		}
		expect(baseline.impact).toEqual({
			salesChange: 0,
			forecastMeanChange: 0,
			reorderPointChange: 0,
		});
		expect(promo.impact.salesChange).toBe(0.2);
		expect(promo.impact.forecastMeanChange).toBeCloseTo(0.2, 5);
		expect(promo.impact.reorderPointChange).toBeGreaterThan(0);
		expect(promo.forecast.model).toBe("additive");
		expect(promo.forecast.forecast).toHaveLength(30);
		expect(promo.inventoryPolicy.leadTimeDays).toBe(7);
		expect(promo.inventoryPolicy.serviceLevel).toBe(0.95);
	});

	it("keeps a failing scenario to itself", () => {
		const results = runScenarios(series, [
			{ name: "gone", seasonalityFactor: 0 },
			{ name: "dip", seasonalityFactor: 0.9 },
		]);
		expect(results.gone).toMatchObject({ status: "error", error: { kind: "ValidationError" } });
		expect(results.dip.status).toBe("ok");
	});

	it("reports a model history floor per scenario", () => {
		const results = runScenarios(dailySeries(weeklyDemand(25)), [{ name: "promo", promotionLiftPct: 0.1 }], {
			modelId: "boosted_trees",
		});
		expect(results.promo).toMatchObject({ status: "error", error: { kind: "InsufficientHistory" } });
	});

	it("keeps a scenario named after an object property", () => {
		const results = runScenarios(series, [{ name: "__proto__", promotionLiftPct: 0.2 }]);
		expect(Object.keys(results)).toEqual(["__proto__"]);
		const promo = results["__proto__"];
		expect(promo.status === "ok" && promo.impact.salesChange).toBe(0.2);
	});

	it("rejects duplicate names", () => {
		expect(() => runScenarios(series, [{ name: "a" }, { name: "a" }])).toThrowError(
			'Duplicate scenario name: "a"'
		);
	});
});

describe("runScenariosAsync", () => {
	it("matches the synchronous outcome keys", async () => {
		const results = await runScenariosAsync(series, [
			{ name: "promo", promotionLiftPct: 0.2 },
			{ name: "bad", promotionLiftPct: -3 },
		]);
		expect(Object.keys(results)).toEqual(["promo", "bad"]);
		expect(results.promo.status === "ok" && results.promo.impact.salesChange).toBe(0.2);
		expect(results.bad.status).toBe("error");
	});
});

import { describe, expect, it } from "vitest";
import { ValidationError } from "@replenish/core";
import { InventoryOptimizer, optimizeInventory } from "./inventoryOptimizer";
import { DEFAULT_INVENTORY_CONFIG } from "./types";
import { forecastOf, history } from "./__tests__/demand";

const steady = history(new Array<number>(100).fill(50));

describe("optimizeInventory", () => {
	it("plans a steady daily history", () => {
		const policy = optimizeInventory(steady, 7, 0.95);
		expect(policy).toMatchObject({
			source: "history",
			avgDailyDemand: 50,
			leadTimePeriods: 7,
			zScore: 1.65,
			safetyStock: 0,
			reorderPoint: 350,
			eoq: 4272,
			currentInventory: null,
			recommendedMaxInventory: 350,
			stockoutRiskPct: 1,
			overstockGapUnits: 0,
			daysOfStock: null,
		});
	});

	it("simulates the trajectory with one order in flight at a time", () => {
		const policy = optimizeInventory(steady, 7, 0.95);
		expect(policy.inventoryLevels.slice(0, 8)).toEqual([300, 250, 200, 150, 100, 50, 0, 4222]);
		expect(policy.inventoryLevels[85]).toBe(322);
		expect(policy.inventoryLevels[92]).toBe(4244);
		expect(policy.inventoryLevels[99]).toBe(3894);
		expect(policy.stockoutRisk.filter((value) => value > 0)).toEqual([1]);
	});

	it("prices the trajectory and recommends from it", () => {
		const policy = optimizeInventory(steady, 7, 0.95);
		expect(policy.costBreakdown).toEqual({
			holding: 427.94,
			stockout: 25,
			overstock: 465,
			total: 917.94,
			costPerUnit: 0.1836,
		});
		expect(
			policy.recommendations.map((item) => [item.severity, item.estimatedSavings])
		).toEqual([
			["warning", 64.19],
			["info", 183.59],
		]);
		expect(policy.performance.stockoutPeriods).toBe(2);
		expect(policy.performance.fillRatePct).toBe(98);
		expect(policy.performance.serviceLevelPct).toBeCloseTo(98.44, 8);
	});

	it("measures on-hand stock against the policy", () => {
		const short = optimizeInventory(steady, 7, 0.95, {}, 200);
		expect(short.stockoutRiskPct).toBe(42.86);
		expect(short.daysOfStock).toBe(4);
		expect(short.overstockGapUnits).toBe(0);

		const long = optimizeInventory(steady, 7, 0.95, {}, 500);
		expect(long.stockoutRiskPct).toBe(0);
		expect(long.overstockGapUnits).toBe(150);
		expect(long.daysOfStock).toBe(10);
	});

	it("plans against a forecast", () => {
		const policy = optimizeInventory(forecastOf([10, 20]), 4, 0.95);
		expect(policy.source).toBe("forecast");
		expect(policy.reorderPoint).toBe(76.5);
		expect(policy.safetyStock).toBe(16.5);
		expect(policy.inventoryLevels).toEqual([66.5, 46.5]);
	});

	it("applies cost overrides", () => {
		const base = optimizeInventory(steady, 7, 0.95);
		const dearHolding = optimizeInventory(steady, 7, 0.95, { holdingCostRate: 0.8 });
		expect(dearHolding.eoq).toBe(2136);
		expect(dearHolding.eoq).toBeLessThan(base.eoq);
	});

	it("validates its inputs", () => {
		expect(() => optimizeInventory(steady, 0.5, 0.95)).toThrowError(ValidationError);
		expect(() => optimizeInventory(steady, 7, 1)).toThrowError(ValidationError);
		expect(() => optimizeInventory(steady, 7, 0.95, { holdingCostRate: 0 })).toThrowError(
			"Holding cost rate must be positive, got 0"
		);
		expect(() => optimizeInventory(steady, 7, 0.95, { orderingCost: 0 })).toThrowError(
			ValidationError
		);
		expect(() => optimizeInventory(steady, 7, 0.95, {}, -1)).toThrowError(ValidationError);
		expect(() => optimizeInventory(history([0, 0, 0]), 7, 0.95)).toThrowError(ValidationError);
	});
});

describe("InventoryOptimizer", () => {
	it("uses configured thresholds and triggers", () => {
		const optimizer = new InventoryOptimizer({
			...DEFAULT_INVENTORY_CONFIG,
			thresholds: { ...DEFAULT_INVENTORY_CONFIG.thresholds, overstockWarning: 100, overstockCritical: 200 },
			triggers: { ...DEFAULT_INVENTORY_CONFIG.triggers, costRatio: 100 },
		});
		const policy = optimizer.optimize(steady, 7, 0.95);
		expect(policy.overstockRisk.every((value) => value === 0)).toBe(true);
		expect(policy.costBreakdown.overstock).toBe(0);
		expect(policy.recommendations).toEqual([]);
	});
});

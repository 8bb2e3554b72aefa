import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { InventorySimulation } from "./simulation";

describe("InventorySimulation", () => {
	it("reorders at the reorder point and receives after the lead time", () => {
		const simulation = new InventorySimulation({
			reorderPoint: 20,
			orderQuantity: 50,
			leadTimePeriods: 2,
		});
		const levels = simulation.run([10, 10, 10, 10]);
		// Order placed in period 0 lands at the start of period 2.
		expect(levels).toEqual([10, 0, 40, 30]);
		expect(simulation.snapshot()).toEqual({
			period: 4,
			level: 30,
			pendingQuantity: 0,
			arrivalPeriod: null,
			ordersPlaced: 1,
			unmetDemand: 0,
		});
	});

	it("floors the level and tracks unmet demand", () => {
		const simulation = new InventorySimulation({
			reorderPoint: 5,
			orderQuantity: 10,
			leadTimePeriods: 3,
		});
		const first = simulation.step(8);
		expect(first).toMatchObject({ period: 0, level: 0, arrivalPeriod: 3, unmetDemand: 3 });
		simulation.step(4);
		expect(simulation.snapshot().unmetDemand).toBe(7);
		expect(simulation.trajectory()).toEqual([0, 0]);
	});

	it("never records a negative level", () => {
		fc.assert(
			fc.property(
				fc.array(fc.double({ min: 0, max: 500, noNaN: true }), { minLength: 1, maxLength: 120 }),
				fc.double({ min: 0, max: 1000, noNaN: true }),
				fc.double({ min: 1, max: 2000, noNaN: true }),
				fc.integer({ min: 1, max: 30 }),
				(demand, reorderPoint, orderQuantity, leadTimePeriods) => {
					const levels = new InventorySimulation({
						reorderPoint,
						orderQuantity,
						leadTimePeriods,
					}).run(demand);
					expect(levels).toHaveLength(demand.length);
					expect(levels.every((level) => level >= 0)).toBe(true);
				}
			)
		);
	});
});

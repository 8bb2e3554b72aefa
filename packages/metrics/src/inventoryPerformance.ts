import { mean, safeDivide, sum, ValidationError } from "@replenish/core";
import type { InventoryPerformance } from "./metricsSchema";

/**
 * Service metrics of a simulated inventory trajectory against the demand it
 * had to cover. A period is a stockout when demand exceeds the level.
 */
export const inventoryPerformance = (
	levels: readonly number[],
	demand: readonly number[]
): InventoryPerformance => {
	if (!levels.length || levels.length !== demand.length) {
		throw new ValidationError(
			`Inventory levels and demand must be non-empty and aligned (got ${levels.length} and ${demand.length})`
		);
	}
	const fulfilled = sum(levels.map((level, index) => Math.min(level, demand[index])));
	const totalDemand = sum(demand);
	const avgInventory = mean(levels);
	const stockoutPeriods = demand.filter((value, index) => value > levels[index]).length;
	const serviceRatio = safeDivide(fulfilled, totalDemand);

	return {
		serviceLevelPct: serviceRatio === null ? null : serviceRatio * 100,
		inventoryTurnover: avgInventory > 0 ? totalDemand / avgInventory : 0,
		fillRatePct: (1 - stockoutPeriods / levels.length) * 100,
		avgInventory,
		stockoutPeriods,
	};
};

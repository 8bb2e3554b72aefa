import { mean, round, safeDivide, sum } from "@replenish/core";
import { severePeriods } from "./risk";
import type { CostBreakdown, CostParams } from "./types";

export const costBreakdown = (
	levels: readonly number[],
	demand: readonly number[],
	stockoutRisk: readonly number[],
	overstockRisk: readonly number[],
	costs: CostParams
): CostBreakdown => {
	const meanDemand = mean(demand);
	const holding = mean(levels) * costs.holdingCostRate;
	const stockout = severePeriods(stockoutRisk) * meanDemand * costs.stockoutCostRate;
	const overstock = severePeriods(overstockRisk) * meanDemand * costs.spoilageRate;
	const total = holding + stockout + overstock;
	const perUnit = safeDivide(total, sum(demand));

	return {
		holding: round(holding),
		stockout: round(stockout),
		overstock: round(overstock),
		total: round(total),
		costPerUnit: perUnit === null ? null : round(perUnit, 4),
	};
};

import {
	mean,
	PERIOD_DAYS,
	round,
	standardDeviation,
	sum,
	ValidationError,
} from "@replenish/core";
import type { ForecastResult, Frequency } from "@replenish/core";
import type { CostParams, DemandSource } from "./types";

export interface DemandProfile {
	source: "forecast" | "history";
	frequency: Frequency;
	demand: number[];
	meanDemand: number;
	leadTimePeriods: number;
	/** Standard deviation of demand over the lead-time window */
	sigma: number;
	leadTimeDemand: number;
}

export interface PolicyLevels {
	avgDailyDemand: number;
	safetyStock: number;
	reorderPoint: number;
	eoq: number;
}

export const isForecastResult = (input: DemandSource): input is ForecastResult =>
	"forecast" in input;

export const leadTimePeriods = (leadTimeDays: number, frequency: Frequency): number =>
	Math.ceil(leadTimeDays / PERIOD_DAYS[frequency]);

/**
 * Demand the policy covers. A forecast contributes its first lead-time
 * periods (padded with its mean when the horizon is shorter); raw history
 * contributes its overall variability and mean rate.
 */
export const demandProfile = (
	input: DemandSource,
	leadTimeDays: number
): DemandProfile => {
	const forecastInput = isForecastResult(input);
	const demand = forecastInput
		? [...input.forecast]
		: input.points.map((point) => point.demand);
	if (!demand.length) {
		throw new ValidationError("Demand to plan against is empty");
	}
	const meanDemand = mean(demand);
	if (meanDemand <= 0) {
		throw new ValidationError("Mean demand is zero; no replenishment policy applies");
	}

	const periods = leadTimePeriods(leadTimeDays, input.frequency);
	if (!forecastInput) {
		return {
			source: "history",
			frequency: input.frequency,
			demand,
			meanDemand,
			leadTimePeriods: periods,
			sigma: standardDeviation(demand),
			leadTimeDemand: meanDemand * periods,
		};
	}

	const window = demand.slice(0, periods);
	return {
		source: "forecast",
		frequency: input.frequency,
		demand,
		meanDemand,
		leadTimePeriods: periods,
		sigma: standardDeviation(window),
		leadTimeDemand: sum(window) + (periods - window.length) * meanDemand,
	};
};

/**
 * Safety stock, reorder point and economic order quantity, rounded to two
 * decimals. EOQ annualises the mean daily rate over 365 days.
 */
export const policyLevels = (
	profile: DemandProfile,
	zScore: number,
	costs: Pick<CostParams, "holdingCostRate" | "orderingCost">
): PolicyLevels => {
	const avgDailyDemand = profile.meanDemand / PERIOD_DAYS[profile.frequency];
	const safetyStock = Math.max(
		zScore * profile.sigma * Math.sqrt(profile.leadTimePeriods),
		0
	);
	const annualDemand = avgDailyDemand * 365;
	const eoq = Math.sqrt(
		(2 * annualDemand * costs.orderingCost) / costs.holdingCostRate
	);

	return {
		avgDailyDemand: round(avgDailyDemand, 4),
		safetyStock: round(safetyStock),
		reorderPoint: round(profile.leadTimeDemand + safetyStock),
		eoq: round(eoq),
	};
};

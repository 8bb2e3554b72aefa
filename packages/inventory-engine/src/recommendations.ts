import { mean, round } from "@replenish/core";
import type { CostBreakdown, Recommendation, RecommendationTriggers } from "./types";

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

export const buildRecommendations = (
	stockoutRisk: readonly number[],
	overstockRisk: readonly number[],
	costs: CostBreakdown,
	triggers: RecommendationTriggers
): Recommendation[] => {
	const recommendations: Recommendation[] = [];

	const avgStockout = mean(stockoutRisk);
	if (avgStockout > triggers.stockoutRisk) {
		recommendations.push({
			severity: "critical",
			title: "High stockout risk",
			description: `Average stockout risk is ${percent(avgStockout)}. Safety stock does not cover lead-time variability.`,
			action: "Increase safety stock by 20%",
			estimatedSavings: round(costs.stockout * 0.5),
		});
	}

	const avgOverstock = mean(overstockRisk);
	if (avgOverstock > triggers.overstockRisk) {
		recommendations.push({
			severity: "warning",
			title: "High overstock risk",
			description: `Average overstock risk is ${percent(avgOverstock)}. Orders arrive well ahead of demand.`,
			action: "Reduce order quantity by 15%",
			estimatedSavings: round(costs.holding * 0.15),
		});
	}

	if (costs.total > mean([costs.holding, costs.stockout]) * triggers.costRatio) {
		recommendations.push({
			severity: "info",
			title: "Cost optimization opportunity",
			description: "Total inventory cost is high relative to holding and stockout cost. Review the ordering policy.",
			action: "Adopt dynamic reorder points based on demand variability",
			estimatedSavings: round(costs.total * 0.2),
		});
	}

	return recommendations;
};

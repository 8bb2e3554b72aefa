import { describe, expect, it } from "vitest";
import { costBreakdown } from "./costs";
import { buildRecommendations } from "./recommendations";
import { DEFAULT_INVENTORY_CONFIG } from "./types";

const { costs, triggers } = DEFAULT_INVENTORY_CONFIG;

describe("costBreakdown", () => {
	it("charges holding, stockout and spoilage terms", () => {
		const breakdown = costBreakdown([100, 0, 500, 200], [50, 50, 50, 50], [0, 1, 0, 0.5], [0, 0, 1, 0.5], costs);
		// holding 200 * 0.2, stockout 1 * 50 * 0.5, overstock 1 * 50 * 0.1
		expect(breakdown).toEqual({
			holding: 40,
			stockout: 25,
			overstock: 5,
			total: 70,
			costPerUnit: 0.35,
		});
	});

	it("leaves cost per unit undefined without demand", () => {
		expect(costBreakdown([10], [0], [0], [1], costs).costPerUnit).toBeNull();
	});
});

describe("buildRecommendations", () => {
	it("flags stockout risk above the trigger as critical", () => {
		const breakdown = { holding: 10, stockout: 90, overstock: 0, total: 100, costPerUnit: 1 };
		const recommendations = buildRecommendations([1, 1, 0], [0, 0, 0], breakdown, triggers);
		expect(recommendations).toHaveLength(1);
		expect(recommendations[0]).toMatchObject({
			severity: "critical",
			action: "Increase safety stock by 20%",
			estimatedSavings: 45,
		});
		expect(recommendations[0].description).toContain("66.7%");
	});

	it("adds a cost note when total dwarfs holding and stockout", () => {
		const breakdown = { holding: 10, stockout: 0, overstock: 90, total: 100, costPerUnit: 1 };
		const recommendations = buildRecommendations([0, 0], [1, 0.5], breakdown, triggers);
		expect(recommendations.map((item) => item.severity)).toEqual(["warning", "info"]);
		expect(recommendations.map((item) => item.estimatedSavings)).toEqual([1.5, 20]);
	});

	it("stays quiet for a balanced policy", () => {
		const breakdown = { holding: 10, stockout: 10, overstock: 0, total: 20, costPerUnit: 1 };
		expect(buildRecommendations([0, 0], [0, 0], breakdown, triggers)).toEqual([]);
	});
});

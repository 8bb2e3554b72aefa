import { DEFAULT_PLANNER_CONFIG } from "@replenish/core";
import type { ForecastResult, TimeSeries } from "@replenish/core";
import type { InventoryPerformance } from "@replenish/metrics";

/** A forecast, or raw history standing in for one. */
export type DemandSource = ForecastResult | TimeSeries;

export interface CostParams {
	/** Holding cost per unit of average inventory */
	holdingCostRate: number;
	orderingCost: number;
	stockoutCostRate: number;
	/** Obsolescence and spoilage charge on overstocked periods */
	spoilageRate: number;
}

/** Multiples of period demand that grade a recorded inventory level. */
export interface RiskThresholds {
	stockoutCritical: number;
	stockoutWarning: number;
	overstockWarning: number;
	overstockCritical: number;
}

export interface RecommendationTriggers {
	stockoutRisk: number;
	overstockRisk: number;
	costRatio: number;
}

export interface InventoryEngineConfig {
	costs: CostParams;
	thresholds: RiskThresholds;
	triggers: RecommendationTriggers;
}

export const DEFAULT_INVENTORY_CONFIG: InventoryEngineConfig = {
	costs: DEFAULT_PLANNER_CONFIG.inventory.costs,
	thresholds: DEFAULT_PLANNER_CONFIG.inventory.thresholds,
	triggers: DEFAULT_PLANNER_CONFIG.inventory.triggers,
};

export type RecommendationSeverity = "critical" | "warning" | "info";

export interface Recommendation {
	severity: RecommendationSeverity;
	title: string;
	description: string;
	action: string;
	estimatedSavings: number;
}

export interface CostBreakdown {
	holding: number;
	stockout: number;
	overstock: number;
	total: number;
	/** null when the simulated demand sums to zero */
	costPerUnit: number | null;
}

export interface InventoryPolicy {
	source: "forecast" | "history";
	avgDailyDemand: number;
	leadTimeDays: number;
	leadTimePeriods: number;
	serviceLevel: number;
	zScore: number;
	safetyStock: number;
	reorderPoint: number;
	eoq: number;
	currentInventory: number | null;
	recommendedMaxInventory: number;
	stockoutRiskPct: number;
	overstockGapUnits: number;
	daysOfStock: number | null;
	inventoryLevels: number[];
	stockoutRisk: number[];
	overstockRisk: number[];
	costBreakdown: CostBreakdown;
	performance: InventoryPerformance;
	recommendations: Recommendation[];
}

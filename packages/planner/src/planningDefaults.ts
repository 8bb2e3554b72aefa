import type { PlannerConfig } from "@replenish/core";
import { parseMemberModelIds } from "@replenish/forecasting";
import type { ForecastOptions } from "@replenish/forecasting";
import type { InventoryEngineConfig } from "@replenish/inventory-engine";

export interface PlanningDefaults {
	horizon: number;
	confidenceLevel: number;
	mapeZeroThreshold: number;
	leadTimeDays: number;
	serviceLevel: number;
	forecastOptions: ForecastOptions;
	inventory: InventoryEngineConfig;
	timeoutMs: number | null;
}

/**
 * Call defaults derived from a planner profile
 * @throws UnsupportedModelError for an unknown configured ensemble member
 */
export const planningDefaults = (config: PlannerConfig): PlanningDefaults => ({
	horizon: config.forecast.horizon,
	confidenceLevel: config.forecast.confidenceLevel,
	mapeZeroThreshold: config.backtest.mapeZeroThreshold,
	leadTimeDays: config.inventory.leadTimeDays,
	serviceLevel: config.inventory.serviceLevel,
	forecastOptions: {
		includeSeasonality: config.forecast.includeSeasonality,
		seed: config.forecast.seed,
		intervalSpreadFactor: config.forecast.intervalSpreadFactor,
		ensembleMembers: parseMemberModelIds(config.forecast.ensembleMembers),
	},
	inventory: {
		costs: config.inventory.costs,
		thresholds: config.inventory.thresholds,
		triggers: config.inventory.triggers,
	},
	timeoutMs: config.tasks.timeoutMs,
});

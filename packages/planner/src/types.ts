import type { BacktestResult } from "@replenish/backtest-core";
import type { ErrorPayload, ForecastResult } from "@replenish/core";
import type { ForecastOptions } from "@replenish/forecasting";
import type { CostParams, InventoryPolicy, OptimizeOptions } from "@replenish/inventory-engine";
import type { FitMetrics } from "@replenish/metrics";
import type { TaskRunner } from "./taskRunner";

export interface ErrorEntry {
	status: "error";
	error: ErrorPayload;
}

export interface ComparisonSuccess {
	status: "ok";
	forecast: ForecastResult;
	/** In-sample fit quality; null when the model reports no historical fit */
	fitMetrics: FitMetrics | null;
	backtest?: BacktestResult;
	/** Set instead of `backtest` when the refit on the training slice failed */
	backtestError?: ErrorPayload;
}

export type ComparisonEntry = ComparisonSuccess | ErrorEntry;

export interface CompareOptions {
	confidenceLevel?: number;
	withBacktest?: boolean;
	testWindow?: number;
	mapeZeroThreshold?: number;
	forecastOptions?: ForecastOptions;
}

export interface Scenario {
	name: string;
	/** 0.2 lifts every period's demand by 20% */
	promotionLiftPct?: number;
	seasonalityFactor?: number;
}

export interface ScenarioImpact {
	/** Relative change of mean historical demand */
	salesChange: number | null;
	/** Relative change of mean forecast; null when the baseline did not forecast */
	forecastMeanChange: number | null;
	/** Reorder point minus the baseline's, in units */
	reorderPointChange: number | null;
}

export interface ScenarioSuccess {
	status: "ok";
	scenario: Scenario;
	forecast: ForecastResult;
	inventoryPolicy: InventoryPolicy;
	impact: ScenarioImpact;
}

export type ScenarioOutcome = ScenarioSuccess | ErrorEntry;

export interface ScenarioOptions {
	modelId?: string;
	horizon?: number;
	confidenceLevel?: number;
	leadTimeDays?: number;
	serviceLevel?: number;
	costParams?: Partial<CostParams>;
	currentInventory?: number | null;
	inventoryOptions?: OptimizeOptions;
	forecastOptions?: ForecastOptions;
}

export interface AsyncDispatchOptions {
	runner?: TaskRunner;
	/** Per-item limit counted from dispatch; null or undefined waits indefinitely */
	timeoutMs?: number | null;
}

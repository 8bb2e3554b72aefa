import { createLogger, mean, round, ValidationError } from "@replenish/core";
import { inventoryPerformance } from "@replenish/metrics";
import { costBreakdown } from "./costs";
import { demandProfile, policyLevels } from "./policy";
import { buildRecommendations } from "./recommendations";
import { overstockSeverity, stockoutSeverity } from "./risk";
import { zScoreFor } from "./serviceLevel";
import { InventorySimulation } from "./simulation";
import { DEFAULT_INVENTORY_CONFIG } from "./types";
import type {
	CostParams,
	DemandSource,
	InventoryEngineConfig,
	InventoryPolicy,
	RecommendationTriggers,
	RiskThresholds,
} from "./types";

const logger = createLogger("inventory");

export class InventoryOptimizer {
	constructor(
		private readonly config: InventoryEngineConfig = DEFAULT_INVENTORY_CONFIG
	) {
		this.validateCosts(config.costs);
	}

	/**
	 * Derive a replenishment policy for `input` and grade it by simulating the
	 * demand it covers.
	 * @throws ValidationError for a bad lead time, service level, current
	 * inventory, or demand that is empty or averages zero
	 */
	optimize(
		input: DemandSource,
		leadTimeDays: number,
		serviceLevel: number,
		currentInventory: number | null = null
	): InventoryPolicy {
		if (!Number.isFinite(leadTimeDays) || leadTimeDays < 1) {
			throw new ValidationError(`Lead time must be at least 1 day, got ${leadTimeDays}`);
		}
		if (
			currentInventory !== null &&
			!(Number.isFinite(currentInventory) && currentInventory >= 0)
		) {
			throw new ValidationError(
				`Current inventory must be a non-negative number, got ${currentInventory}`
			);
		}
		const zScore = zScoreFor(serviceLevel);
		const profile = demandProfile(input, leadTimeDays);
		const levels = policyLevels(profile, zScore, this.config.costs);

		const inventoryLevels = new InventorySimulation({
			reorderPoint: levels.reorderPoint,
			orderQuantity: levels.eoq,
			leadTimePeriods: profile.leadTimePeriods,
		}).run(profile.demand);
		const stockoutRisk = stockoutSeverity(
			inventoryLevels,
			profile.demand,
			this.config.thresholds
		);
		const overstockRisk = overstockSeverity(
			inventoryLevels,
			profile.demand,
			this.config.thresholds
		);
		const costs = costBreakdown(
			inventoryLevels,
			profile.demand,
			stockoutRisk,
			overstockRisk,
			this.config.costs
		);
		const recommendedMaxInventory = round(levels.reorderPoint + levels.safetyStock);

		const policy: InventoryPolicy = {
			source: profile.source,
			avgDailyDemand: levels.avgDailyDemand,
			leadTimeDays,
			leadTimePeriods: profile.leadTimePeriods,
			serviceLevel,
			zScore,
			safetyStock: levels.safetyStock,
			reorderPoint: levels.reorderPoint,
			eoq: levels.eoq,
			currentInventory,
			recommendedMaxInventory,
			stockoutRiskPct: this.stockoutRiskPct(
				levels.reorderPoint,
				currentInventory,
				stockoutRisk
			),
			overstockGapUnits:
				currentInventory === null
					? 0
					: round(Math.max(currentInventory - recommendedMaxInventory, 0)),
			daysOfStock:
				currentInventory === null || levels.avgDailyDemand <= 0
					? null
					: round(currentInventory / levels.avgDailyDemand, 1),
			inventoryLevels,
			stockoutRisk,
			overstockRisk,
			costBreakdown: costs,
			performance: inventoryPerformance(inventoryLevels, profile.demand),
			recommendations: buildRecommendations(
				stockoutRisk,
				overstockRisk,
				costs,
				this.config.triggers
			),
		};

		logger.info("inventory_policy", {
			source: policy.source,
			safetyStock: policy.safetyStock,
			reorderPoint: policy.reorderPoint,
			eoq: policy.eoq,
			stockoutRiskPct: policy.stockoutRiskPct,
			costBreakdown: policy.costBreakdown,
			recommendationCount: policy.recommendations.length,
		});
		return policy;
	}

	// On-hand shortfall against the reorder point when stock is known,
	// otherwise the simulated stockout severity.
	private stockoutRiskPct(
		reorderPoint: number,
		currentInventory: number | null,
		stockoutRisk: readonly number[]
	): number {
		if (currentInventory === null) {
			return round(mean(stockoutRisk) * 100);
		}
		if (reorderPoint <= 0) {
			return 0;
		}
		return round(
			Math.max(((reorderPoint - currentInventory) / reorderPoint) * 100, 0)
		);
	}

	private validateCosts(costs: CostParams): void {
		if (!(costs.holdingCostRate > 0)) {
			throw new ValidationError(
				`Holding cost rate must be positive, got ${costs.holdingCostRate}`
			);
		}
		if (!(costs.orderingCost > 0)) {
			throw new ValidationError(
				`Ordering cost must be positive, got ${costs.orderingCost}`
			);
		}
		if (!(costs.stockoutCostRate >= 0) || !(costs.spoilageRate >= 0)) {
			throw new ValidationError("Stockout and spoilage rates must not be negative");
		}
	}
}

export interface OptimizeOptions {
	thresholds?: Partial<RiskThresholds>;
	triggers?: Partial<RecommendationTriggers>;
}

/**
 * One-shot policy for a forecast or a raw history. Cost parameters left
 * out take the defaults (holding 0.2, ordering 100, stockout 0.5, spoilage 0.1).
 */
export const optimizeInventory = (
	input: DemandSource,
	leadTimeDays: number,
	serviceLevel: number,
	costParams: Partial<CostParams> = {},
	currentInventory: number | null = null,
	options: OptimizeOptions = {}
): InventoryPolicy =>
	new InventoryOptimizer({
		costs: { ...DEFAULT_INVENTORY_CONFIG.costs, ...costParams },
		thresholds: { ...DEFAULT_INVENTORY_CONFIG.thresholds, ...options.thresholds },
		triggers: { ...DEFAULT_INVENTORY_CONFIG.triggers, ...options.triggers },
	}).optimize(input, leadTimeDays, serviceLevel, currentInventory);

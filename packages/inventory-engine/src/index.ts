export * from "./types";
export { zScoreFor } from "./serviceLevel";
export { demandProfile, isForecastResult, leadTimePeriods, policyLevels } from "./policy";
export type { DemandProfile, PolicyLevels } from "./policy";
export { InventorySimulation } from "./simulation";
export type { ReplenishmentRule, SimulationSnapshot } from "./simulation";
export { overstockSeverity, severePeriods, stockoutSeverity } from "./risk";
export { costBreakdown } from "./costs";
export { buildRecommendations } from "./recommendations";
export { InventoryOptimizer, optimizeInventory } from "./inventoryOptimizer";
export type { OptimizeOptions } from "./inventoryOptimizer";

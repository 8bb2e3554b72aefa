export * from "./metricsSchema";
export * from "./accuracy";
export { inventoryPerformance } from "./inventoryPerformance";

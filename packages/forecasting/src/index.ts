export * from "./types";
export * from "./modelIds";
export * from "./intervals";
export { createStrategy } from "./registry";
export {
	forecast,
	refit,
	resolveForecastOptions,
	validateForecastRequest,
} from "./forecastEngine";
export { featureVector } from "./strategies/boostedTreesStrategy";

import type { ForecastOptions, ModelId } from "@replenish/forecasting";
import type { PercentageErrors } from "@replenish/metrics";

export interface BacktestOptions {
	/** Confidence level passed to the model while refitting; default 0.95 */
	confidenceLevel?: number;
	mapeZeroThreshold?: number;
	forecastOptions?: ForecastOptions;
}

export interface BacktestResult {
	model: ModelId;
	testWindowLength: number;
	trainingLength: number;
	baselineMetric: PercentageErrors;
	modelMetric: PercentageErrors;
	/** baseline - model per metric; negative when the model is worse */
	improvement: PercentageErrors;
	rmse: number;
	mae: number;
	heldOutActuals: {
		dates: readonly string[];
		values: readonly number[];
	};
	heldOutForecast: readonly number[];
	baselineForecast: readonly number[];
}

import { SEASONAL_CYCLE, seriesDates } from "@replenish/core";
import { fitArima, forecastArima } from "@replenish/models-quant";
import type { ForecastStrategy } from "../types";

export const MIN_HISTORY = 20;
export const MIN_FIT_HISTORY = 3;

/**
 * ARIMA(1,1,1) on the demand history. `sarima` always adds the seasonal terms
 * and needs two full cycles; `arima` adds them only when seasonality is
 * requested and more than two cycles exist.
 */
export const createArimaStrategy = (id: "arima" | "sarima"): ForecastStrategy => ({
	id,
	minHistory: (series) =>
		id === "sarima"
			? Math.max(MIN_HISTORY, 2 * SEASONAL_CYCLE[series.frequency])
			: MIN_HISTORY,
	minFitHistory: (series) =>
		id === "sarima" ? 2 * SEASONAL_CYCLE[series.frequency] : MIN_FIT_HISTORY,
	run: (context) => {
		const cycle = SEASONAL_CYCLE[context.series.frequency];
		const seasonal =
			id === "sarima" ||
			(context.options.includeSeasonality && context.values.length > 2 * cycle);
		const model = fitArima(context.values, {
			seasonalPeriod: seasonal ? cycle : null,
			ridge: context.options.tuning.arima?.ridge,
		});
		const result = forecastArima(model, context.horizon, context.z);
		return {
			forecast: result.mean,
			lower: result.lower,
			upper: result.upper,
			historicalFit: { dates: seriesDates(context.series), values: model.fitted },
		};
	},
});

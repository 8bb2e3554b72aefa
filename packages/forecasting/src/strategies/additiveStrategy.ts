import { daysBetween, seriesDates } from "@replenish/core";
import { fitAdditive, forecastAdditive } from "@replenish/models-quant";
import type { ForecastStrategy } from "../types";
import { MIN_FIT_HISTORY, MIN_HISTORY } from "./arimaStrategy";

export const additiveStrategy: ForecastStrategy = {
	id: "additive",
	minHistory: () => MIN_HISTORY,
	minFitHistory: () => MIN_FIT_HISTORY,
	run: (context) => {
		const dates = seriesDates(context.series);
		const origin = dates[0];
		const model = fitAdditive(
			dates.map((date) => daysBetween(origin, date)),
			context.values,
			{
				...context.options.tuning.additive,
				includeSeasonality: context.options.includeSeasonality,
			}
		);
		const result = forecastAdditive(
			model,
			context.futureDates.map((date) => daysBetween(origin, date)),
			context.z
		);
		return {
			forecast: result.mean,
			lower: result.lower,
			upper: result.upper,
			historicalFit: { dates, values: model.fitted },
		};
	},
};

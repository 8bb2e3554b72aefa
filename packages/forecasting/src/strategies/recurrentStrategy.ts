import { RecurrentForecaster } from "@replenish/models-quant";
import type { ForecastStrategy } from "../types";
import { MIN_FIT_HISTORY, MIN_HISTORY } from "./arimaStrategy";

/** No interval of its own and no in-sample fit. */
export const recurrentStrategy: ForecastStrategy = {
	id: "recurrent",
	minHistory: () => MIN_HISTORY,
	minFitHistory: () => MIN_FIT_HISTORY,
	run: (context) => {
		const model = RecurrentForecaster.train(context.values, {
			...context.options.tuning.recurrent,
			seed: context.options.seed,
		});
		return {
			forecast: model.forecast(context.values, context.horizon),
			lower: null,
			upper: null,
			historicalFit: null,
		};
	},
};

import {
	createLogger,
	demandValues,
	InsufficientHistoryError,
	roundOrNull,
	seriesDates,
} from "@replenish/core";
import type { TimeSeries } from "@replenish/core";
import { parseModelId, refit } from "@replenish/forecasting";
import { improvement, mae, percentageErrors, rmse } from "@replenish/metrics";
import { MIN_BACKTEST_HISTORY, resolveTestWindow, splitSeries } from "./split";
import type { BacktestOptions, BacktestResult } from "./types";

const logger = createLogger("backtest");

/**
 * Refit `modelId` on all but the last `testWindow` periods and score its
 * forecast of the held-out window against a repeat-last-value baseline.
 * @throws UnsupportedModelError for an unknown model id
 * @throws InsufficientHistoryError below 20 observations, or when the training
 * slice is too short for the model to be fitted
 * @throws ModelFitError when the refit fails
 */
export const backtest = (
	series: TimeSeries,
	modelId: string,
	testWindow?: number,
	options: BacktestOptions = {}
): BacktestResult => {
	const id = parseModelId(modelId);
	const length = series.points.length;
	if (length < MIN_BACKTEST_HISTORY) {
		throw new InsufficientHistoryError(id, MIN_BACKTEST_HISTORY, length);
	}

	const window = resolveTestWindow(length, testWindow);
	const { train, test } = splitSeries(series, window);
	const result = refit(
		train,
		id,
		window,
		options.confidenceLevel ?? 0.95,
		options.forecastOptions
	);

	const actual = demandValues(test);
	const trainValues = demandValues(train);
	const baseline = new Array<number>(window).fill(trainValues[trainValues.length - 1]);
	const metricOptions = { mapeZeroThreshold: options.mapeZeroThreshold };
	const baselineMetric = percentageErrors(actual, baseline, metricOptions);
	const modelMetric = percentageErrors(actual, result.forecast, metricOptions);

	const outcome: BacktestResult = {
		model: id,
		testWindowLength: window,
		trainingLength: trainValues.length,
		baselineMetric,
		modelMetric,
		improvement: {
			mape: improvement(baselineMetric.mape, modelMetric.mape),
			wape: improvement(baselineMetric.wape, modelMetric.wape),
		},
		rmse: rmse(actual, result.forecast),
		mae: mae(actual, result.forecast),
		heldOutActuals: { dates: seriesDates(test), values: actual },
		heldOutForecast: result.forecast,
		baselineForecast: baseline,
	};

	logger.info("backtest_completed", {
		model: id,
		testWindowLength: window,
		baselineMetric: {
			mape: roundOrNull(baselineMetric.mape),
			wape: roundOrNull(baselineMetric.wape),
		},
		modelMetric: {
			mape: roundOrNull(modelMetric.mape),
			wape: roundOrNull(modelMetric.wape),
		},
		rmse: outcome.rmse,
		mae: outcome.mae,
	});
	return outcome;
};

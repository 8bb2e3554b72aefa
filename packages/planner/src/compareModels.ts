import { backtest } from "@replenish/backtest-core";
import { createLogger, toErrorPayload } from "@replenish/core";
import type { ForecastResult, TimeSeries } from "@replenish/core";
import { forecast } from "@replenish/forecasting";
import { fitMetrics } from "@replenish/metrics";
import type { FitMetrics } from "@replenish/metrics";
import { DeferredTaskRunner, settleKeyed } from "./taskRunner";
import type {
	AsyncDispatchOptions,
	CompareOptions,
	ComparisonEntry,
	ComparisonSuccess,
	ErrorEntry,
} from "./types";

const logger = createLogger("planner");

export const errorEntry = (error: unknown): ErrorEntry => ({
	status: "error",
	error: toErrorPayload(error),
});

/** Fit metrics of a forecast's in-sample fit against the demand on the same dates. */
export const historicalFitMetrics = (
	series: TimeSeries,
	result: ForecastResult,
	mapeZeroThreshold?: number
): FitMetrics | null => {
	const fit = result.historicalFit;
	if (!fit || !fit.values.length) {
		return null;
	}
	const byDate = new Map(series.points.map((point) => [point.date, point.demand]));
	const actual: number[] = [];
	const fitted: number[] = [];
	fit.dates.forEach((date, index) => {
		const demand = byDate.get(date);
		if (demand !== undefined) {
			actual.push(demand);
			fitted.push(fit.values[index]);
		}
	});
	return actual.length ? fitMetrics(actual, fitted, { mapeZeroThreshold }) : null;
};

export const compareOne = (
	series: TimeSeries,
	modelId: string,
	horizon: number,
	options: CompareOptions = {}
): ComparisonEntry => {
	let result: ForecastResult;
	try {
		result = forecast(
			series,
			modelId,
			horizon,
			options.confidenceLevel ?? 0.95,
			options.forecastOptions
		);
	} catch (error) {
		return errorEntry(error);
	}

	const entry: ComparisonSuccess = {
		status: "ok",
		forecast: result,
		fitMetrics: historicalFitMetrics(series, result, options.mapeZeroThreshold),
	};
	if (!options.withBacktest) {
		return entry;
	}
	try {
		entry.backtest = backtest(series, modelId, options.testWindow, {
			confidenceLevel: options.confidenceLevel,
			mapeZeroThreshold: options.mapeZeroThreshold,
			forecastOptions: options.forecastOptions,
		});
	} catch (error) {
		entry.backtestError = toErrorPayload(error);
	}
	return entry;
};

const logComparison = (results: Record<string, ComparisonEntry>): void => {
	logger.info("model_comparison", {
		outcomes: Object.fromEntries(
			Object.entries(results).map(([id, entry]) => [
				id,
				entry.status === "ok" ? "ok" : entry.error.kind,
			])
		),
	});
};

/**
 * Forecast `series` with every model in `modelIds`, keyed by the id as given.
 * A failing model becomes an error entry; the others still run.
 */
export const compareModels = (
	series: TimeSeries,
	modelIds: readonly string[],
	horizon: number,
	options: CompareOptions = {}
): Record<string, ComparisonEntry> => {
	// fromEntries defines own keys, so an id such as "__proto__" is kept.
	const results: Record<string, ComparisonEntry> = Object.fromEntries(
		modelIds.map((id) => [id, compareOne(series, id, horizon, options)])
	);
	logComparison(results);
	return results;
};

/** `compareModels` with each model dispatched as its own task. */
export const compareModelsAsync = async (
	series: TimeSeries,
	modelIds: readonly string[],
	horizon: number,
	options: CompareOptions & AsyncDispatchOptions = {}
): Promise<Record<string, ComparisonEntry>> => {
	const results = await settleKeyed<ComparisonEntry>(
		modelIds.map((id) => [id, () => compareOne(series, id, horizon, options)] as const),
		options.runner ?? new DeferredTaskRunner(),
		options.timeoutMs,
		(_, error) => errorEntry(error)
	);
	logComparison(results);
	return results;
};

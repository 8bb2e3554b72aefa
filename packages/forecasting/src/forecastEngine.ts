import {
	createLogger,
	demandValues,
	describeError,
	futureDates,
	InsufficientHistoryError,
	isPlanningError,
	lastDate,
	mean,
	ModelFitError,
	round,
	twoSidedZ,
	ValidationError,
} from "@replenish/core";
import type { ForecastResult, TimeSeries } from "@replenish/core";
import { defaultBands, DEFAULT_SPREAD_FACTOR, orderBounds, spreadInterval } from "./intervals";
import { DEFAULT_ENSEMBLE_MEMBERS, parseModelId } from "./modelIds";
import type { ModelId } from "./modelIds";
import { createStrategy } from "./registry";
import type {
	ForecastOptions,
	ResolvedForecastOptions,
	StrategyContext,
	StrategyOutput,
} from "./types";

const logger = createLogger("forecasting");

export const resolveForecastOptions = (
	options: ForecastOptions = {}
): ResolvedForecastOptions => ({
	includeSeasonality: options.includeSeasonality ?? true,
	seed: options.seed ?? 42,
	intervalSpreadFactor: options.intervalSpreadFactor ?? DEFAULT_SPREAD_FACTOR,
	ensembleMembers: options.ensembleMembers ?? DEFAULT_ENSEMBLE_MEMBERS,
	tuning: options.tuning ?? {},
});

export const validateForecastRequest = (
	horizon: number,
	confidenceLevel: number
): void => {
	if (!Number.isInteger(horizon) || horizon < 1) {
		throw new ValidationError(`Horizon must be a positive integer, got ${horizon}`);
	}
	if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
		throw new ValidationError(
			`Confidence level must be between 0 and 1 (exclusive), got ${confidenceLevel}`
		);
	}
};

const assertUsable = (id: ModelId, output: StrategyOutput, horizon: number): void => {
	const sequences = [output.forecast, output.lower ?? [], output.upper ?? []];
	if (output.forecast.length !== horizon) {
		throw new ModelFitError(
			id,
			`produced ${output.forecast.length} values for a horizon of ${horizon}`
		);
	}
	if (sequences.some((values) => values.some((value) => !Number.isFinite(value)))) {
		throw new ModelFitError(id, "produced non-finite values");
	}
};

const finalize = (
	id: ModelId,
	context: StrategyContext,
	output: StrategyOutput
): ForecastResult => {
	const clipped = output.forecast.map((value) => Math.max(value, 0));
	const interval =
		output.lower && output.upper
			? { lower: output.lower, upper: output.upper }
			: spreadInterval(clipped, context.z, context.options.intervalSpreadFactor);
	const bounds = orderBounds(clipped, interval.lower, interval.upper);
	const fit = output.historicalFit;

	return Object.freeze({
		model: id,
		frequency: context.series.frequency,
		dates: Object.freeze([...context.futureDates]),
		forecast: Object.freeze(bounds.forecast),
		lower: Object.freeze(bounds.lower),
		upper: Object.freeze(bounds.upper),
		confidenceLevel: context.confidenceLevel,
		bands: defaultBands(bounds.forecast, context.options.intervalSpreadFactor),
		historicalFit: fit
			? Object.freeze({
					dates: Object.freeze([...fit.dates]),
					values: Object.freeze([...fit.values]),
				})
			: null,
		...(output.members ? { members: Object.freeze([...output.members]) } : {}),
		...(output.skipped
			? {
					skipped: Object.freeze(
						output.skipped.map((failure) => Object.freeze({ ...failure }))
					),
				}
			: {}),
	});
};

/**
 * `request` applies the general history floor; `fit` only what the model
 * needs to be estimated at all, as when refitting on a training slice.
 */
type HistoryFloor = "request" | "fit";

const runForecast = (
	series: TimeSeries,
	id: ModelId,
	horizon: number,
	confidenceLevel: number,
	options: ResolvedForecastOptions,
	floor: HistoryFloor
): ForecastResult => {
	const strategy = createStrategy(id, (member, context) =>
		runForecast(
			context.series,
			member,
			context.horizon,
			context.confidenceLevel,
			context.options,
			floor
		)
	);
	const required =
		floor === "fit" ? strategy.minFitHistory(series) : strategy.minHistory(series);
	const actual = series.points.length;
	const last = lastDate(series);
	if (actual < required || last === null) {
		throw new InsufficientHistoryError(id, required, actual);
	}

	const context: StrategyContext = {
		series,
		values: demandValues(series),
		horizon,
		confidenceLevel,
		z: twoSidedZ(confidenceLevel),
		futureDates: futureDates(last, series.frequency, horizon),
		options,
	};

	let output: StrategyOutput;
	try {
		output = strategy.run(context);
	} catch (error) {
		if (isPlanningError(error)) {
			throw error;
		}
		throw new ModelFitError(id, describeError(error), error);
	}
	assertUsable(id, output, horizon);

	const result = finalize(id, context, output);
	logger.info("forecast_generated", {
		model: id,
		horizon,
		confidenceLevel,
		meanForecast: round(mean(result.forecast)),
		firstDate: result.dates[0],
		lastDate: result.dates[result.dates.length - 1],
		members: result.members,
	});
	return result;
};

/**
 * Forecast `horizon` periods past the end of `series`.
 * @param modelId - Model id or alias, case-insensitive
 * @throws ValidationError for a bad horizon or confidence level
 * @throws UnsupportedModelError for an unknown model id
 * @throws InsufficientHistoryError when the series is shorter than the model's floor
 * @throws ModelFitError when the model fails numerically
 */
export const forecast = (
	series: TimeSeries,
	modelId: string,
	horizon: number,
	confidenceLevel: number,
	options: ForecastOptions = {}
): ForecastResult => {
	validateForecastRequest(horizon, confidenceLevel);
	const id = parseModelId(modelId);
	return runForecast(
		series,
		id,
		horizon,
		confidenceLevel,
		resolveForecastOptions(options),
		"request"
	);
};

/**
 * Like {@link forecast}, but held only to the model's own fitting limits
 * (two seasonal cycles for `sarima`, the warm-up plus training rows for
 * `boosted_trees`). Used to refit on a backtest's training slice.
 */
export const refit = (
	series: TimeSeries,
	modelId: string,
	horizon: number,
	confidenceLevel: number,
	options: ForecastOptions = {}
): ForecastResult => {
	validateForecastRequest(horizon, confidenceLevel);
	const id = parseModelId(modelId);
	return runForecast(
		series,
		id,
		horizon,
		confidenceLevel,
		resolveForecastOptions(options),
		"fit"
	);
};

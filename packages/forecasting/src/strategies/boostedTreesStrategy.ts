import { seriesDates, standardDeviation } from "@replenish/core";
import { calendarFeatures, FIRST_COMPLETE_INDEX, lagFeatures } from "@replenish/data";
import type { LagFeatures } from "@replenish/data";
import { GradientBoostedTrees } from "@replenish/models-quant";
import type { ForecastStrategy } from "../types";

/** Rows before the first complete feature row are dropped; 30 must remain. */
export const MIN_TRAINING_ROWS = 30;

const LAG_KEYS = [
	"lag1",
	"lag7",
	"lag14",
	"lag30",
	"rollingMean7",
	"rollingStd7",
	"rollingMean30",
	"rollingStd30",
] as const satisfies readonly (keyof LagFeatures)[];

/**
 * Feature vector for `index` from the values before it: lags, rolling
 * statistics, day of week and month. Null while any lag is unavailable.
 */
export const featureVector = (
	date: string,
	values: readonly number[],
	index: number
): number[] | null => {
	const lags = lagFeatures(values, index);
	const vector: number[] = [];
	for (const key of LAG_KEYS) {
		const value = lags[key];
		if (value === null) {
			return null;
		}
		vector.push(value);
	}
	const calendar = calendarFeatures(date);
	vector.push(calendar.dayOfWeek, calendar.month);
	return vector;
};

export const boostedTreesStrategy: ForecastStrategy = {
	id: "boosted_trees",
	minHistory: () => FIRST_COMPLETE_INDEX + MIN_TRAINING_ROWS,
	minFitHistory: () => FIRST_COMPLETE_INDEX + MIN_TRAINING_ROWS,
	run: (context) => {
		const dates = seriesDates(context.series);
		const rows: number[][] = [];
		const targets: number[] = [];
		const fitDates: string[] = [];
		dates.forEach((date, index) => {
			const vector = featureVector(date, context.values, index);
			if (vector) {
				rows.push(vector);
				targets.push(context.values[index]);
				fitDates.push(date);
			}
		});

		const model = GradientBoostedTrees.train(rows, targets, {
			...context.options.tuning.boostedTrees,
			seed: context.options.seed,
		});
		const fitted = rows.map((row) => model.predict(row));
		const residualStd = standardDeviation(
			fitted.map((value, index) => targets[index] - value)
		);
		const band =
			(residualStd > 0 ? residualStd : 0.1 * standardDeviation(targets)) * context.z;

		// One inference per step; later lags see earlier predictions.
		const extended = [...context.values];
		const forecast: number[] = [];
		for (const date of context.futureDates) {
			const vector = featureVector(date, extended, extended.length);
			if (!vector) {
				throw new Error(`features unavailable for ${date}`);
			}
			const prediction = model.predict(vector);
			forecast.push(prediction);
			extended.push(Math.max(prediction, 0));
		}

		return {
			forecast,
			lower: forecast.map((value) => value - band),
			upper: forecast.map((value) => value + band),
			historicalFit: { dates: fitDates, values: fitted },
		};
	},
};

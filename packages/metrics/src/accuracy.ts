import { mean, safeDivide, sum, ValidationError } from "@replenish/core";
import type {
	AccuracyOptions,
	AccuracyReport,
	FitMetrics,
	PercentageErrors,
} from "./metricsSchema";

const assertAligned = (actual: readonly number[], predicted: readonly number[]): void => {
	if (!actual.length || actual.length !== predicted.length) {
		throw new ValidationError(
			`Actual and predicted values must be non-empty and aligned (got ${actual.length} and ${predicted.length})`
		);
	}
};

const absoluteErrors = (
	actual: readonly number[],
	predicted: readonly number[]
): number[] => actual.map((value, index) => Math.abs(value - predicted[index]));

/**
 * Mean absolute percentage error in percent. Periods whose |actual| is at or
 * below the threshold (default 0, so only exact zeros) are masked; null when
 * every period is masked.
 */
export const mape = (
	actual: readonly number[],
	predicted: readonly number[],
	options: AccuracyOptions = {}
): number | null => {
	assertAligned(actual, predicted);
	const threshold = options.mapeZeroThreshold ?? 0;
	const ratios: number[] = [];
	actual.forEach((value, index) => {
		if (Math.abs(value) > threshold) {
			ratios.push(Math.abs((value - predicted[index]) / value));
		}
	});
	return ratios.length ? mean(ratios) * 100 : null;
};

/** Σ|error| / Σ|actual| in percent; null when Σ|actual| is zero. */
export const wape = (
	actual: readonly number[],
	predicted: readonly number[]
): number | null => {
	assertAligned(actual, predicted);
	const ratio = safeDivide(
		sum(absoluteErrors(actual, predicted)),
		sum(actual.map(Math.abs))
	);
	return ratio === null ? null : ratio * 100;
};

export const mae = (actual: readonly number[], predicted: readonly number[]): number => {
	assertAligned(actual, predicted);
	return mean(absoluteErrors(actual, predicted));
};

export const rmse = (actual: readonly number[], predicted: readonly number[]): number => {
	assertAligned(actual, predicted);
	return Math.sqrt(mean(actual.map((value, index) => (value - predicted[index]) ** 2)));
};

/** Coefficient of determination; null for a constant actual series. */
export const r2 = (actual: readonly number[], predicted: readonly number[]): number | null => {
	assertAligned(actual, predicted);
	const center = mean(actual);
	const residual = sum(actual.map((value, index) => (value - predicted[index]) ** 2));
	const total = sum(actual.map((value) => (value - center) ** 2));
	const ratio = safeDivide(residual, total);
	return ratio === null ? null : 1 - ratio;
};

export const bias = (actual: readonly number[], predicted: readonly number[]): number => {
	assertAligned(actual, predicted);
	return mean(predicted.map((value, index) => value - actual[index]));
};

export const percentageErrors = (
	actual: readonly number[],
	predicted: readonly number[],
	options: AccuracyOptions = {}
): PercentageErrors => ({
	mape: mape(actual, predicted, options),
	wape: wape(actual, predicted),
});

export const accuracyReport = (
	actual: readonly number[],
	predicted: readonly number[],
	options: AccuracyOptions = {}
): AccuracyReport => ({
	...percentageErrors(actual, predicted, options),
	rmse: rmse(actual, predicted),
	mae: mae(actual, predicted),
});

/** In-sample fit quality of a model's historical fit against the observed series. */
export const fitMetrics = (
	actual: readonly number[],
	fitted: readonly number[],
	options: AccuracyOptions = {}
): FitMetrics => {
	const percentage = mape(actual, fitted, options);
	return {
		mae: mae(actual, fitted),
		rmse: rmse(actual, fitted),
		mape: percentage,
		r2: r2(actual, fitted),
		bias: bias(actual, fitted),
		accuracy: percentage === null ? null : Math.max(0, 100 - percentage),
	};
};

/** `baseline - model`, kept as-is when negative; null when either side is. */
export const improvement = (
	baseline: number | null,
	model: number | null
): number | null => (baseline === null || model === null ? null : baseline - model);

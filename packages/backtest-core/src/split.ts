import { sliceSeries, ValidationError } from "@replenish/core";
import type { TimeSeries } from "@replenish/core";

export const MIN_BACKTEST_HISTORY = 20;
const MIN_WINDOW = 7;
const DEFAULT_WINDOW = 14;
const DEFAULT_WINDOW_SHARE = 0.2;

/**
 * Held-out window length: the request or max(14, ⌊0.2n⌋), clamped to
 * [7, n - 7]; a non-positive result falls back to max(7, ⌊n/3⌋).
 */
export const resolveTestWindow = (length: number, requested?: number): number => {
	if (
		requested !== undefined &&
		(!Number.isInteger(requested) || requested < 1)
	) {
		throw new ValidationError(`Test window must be a positive integer, got ${requested}`);
	}
	const proposed =
		requested ?? Math.max(DEFAULT_WINDOW, Math.floor(DEFAULT_WINDOW_SHARE * length));
	const window = Math.min(Math.max(proposed, MIN_WINDOW), length - MIN_WINDOW);
	return window > 0 ? window : Math.max(MIN_WINDOW, Math.floor(length / 3));
};

export interface SeriesSplit {
	train: TimeSeries;
	test: TimeSeries;
}

export const splitSeries = (series: TimeSeries, testWindow: number): SeriesSplit => {
	const cut = series.points.length - testWindow;
	if (cut <= 0) {
		throw new ValidationError(
			`Test window of ${testWindow} leaves no training data in ${series.points.length} observations`
		);
	}
	return {
		train: sliceSeries(series, 0, cut),
		test: sliceSeries(series, cut),
	};
};

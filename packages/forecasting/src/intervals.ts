import { standardDeviation } from "@replenish/core";
import type { IntervalBand } from "@replenish/core";

export const DEFAULT_SPREAD_FACTOR = 0.1;

export const BAND_Z = {
	"95": 1.96,
	"80": 1.28,
} as const;

/** Symmetric band of ±z·σ, where σ is a share of the forecast's own spread. */
export const spreadInterval = (
	forecast: readonly number[],
	z: number,
	spreadFactor: number = DEFAULT_SPREAD_FACTOR
): { lower: number[]; upper: number[] } => {
	const sigma = spreadFactor * standardDeviation(forecast);
	return {
		lower: forecast.map((value) => Math.max(value - z * sigma, 0)),
		upper: forecast.map((value) => value + z * sigma),
	};
};

export const defaultBands = (
	forecast: readonly number[],
	spreadFactor: number = DEFAULT_SPREAD_FACTOR
): { "95": IntervalBand; "80": IntervalBand } => {
	const wide = spreadInterval(forecast, BAND_Z["95"], spreadFactor);
	const narrow = spreadInterval(forecast, BAND_Z["80"], spreadFactor);
	return {
		"95": Object.freeze({
			lower: Object.freeze(wide.lower),
			upper: Object.freeze(wide.upper),
		}),
		"80": Object.freeze({
			lower: Object.freeze(narrow.lower),
			upper: Object.freeze(narrow.upper),
		}),
	};
};

/**
 * Clip at zero and order the bounds around the point forecast:
 * lower = min(lower, forecast), upper = max(upper, forecast).
 */
export const orderBounds = (
	forecast: readonly number[],
	lower: readonly number[],
	upper: readonly number[]
): { forecast: number[]; lower: number[]; upper: number[] } => {
	const clipped = forecast.map((value) => Math.max(value, 0));
	return {
		forecast: clipped,
		lower: clipped.map((value, index) => Math.min(Math.max(lower[index], 0), value)),
		upper: clipped.map((value, index) => Math.max(upper[index], value)),
	};
};

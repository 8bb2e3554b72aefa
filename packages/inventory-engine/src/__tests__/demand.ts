import { createSeries, futureDates } from "@replenish/core";
import type { ForecastResult, Frequency, TimeSeries } from "@replenish/core";

export const history = (
	values: readonly number[],
	frequency: Frequency = "D"
): TimeSeries => {
	const dates = ["2024-01-01", ...futureDates("2024-01-01", frequency, values.length - 1)];
	return createSeries(
		frequency,
		values.map((demand, index) => ({ date: dates[index], demand }))
	);
};

export const forecastOf = (
	values: readonly number[],
	frequency: Frequency = "D"
): ForecastResult => {
	const band = {
		lower: values.map((value) => value * 0.9),
		upper: values.map((value) => value * 1.1),
	};
	return {
		model: "additive",
		frequency,
		dates: futureDates("2024-12-31", frequency, values.length),
		forecast: values,
		lower: band.lower,
		upper: band.upper,
		confidenceLevel: 0.95,
		bands: { "95": band, "80": band },
		historicalFit: null,
	};
};

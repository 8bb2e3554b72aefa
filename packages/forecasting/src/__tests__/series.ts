import { createSeries, futureDates } from "@replenish/core";
import type { Frequency, TimeSeries } from "@replenish/core";

export const buildSeries = (
	values: readonly number[],
	frequency: Frequency = "D",
	start = "2024-01-01"
): TimeSeries => {
	const dates = [start, ...futureDates(start, frequency, values.length - 1)];
	return createSeries(
		frequency,
		values.map((demand, index) => ({ date: dates[index], demand }))
	);
};

/** Trend plus a weekly bump and a small deterministic wobble. */
export const seasonalDemand = (length: number): number[] =>
	Array.from(
		{ length },
		(_, t) => 40 + 0.2 * t + (t % 7 === 5 ? 12 : 0) + ((t * 37) % 11) - 5
	);

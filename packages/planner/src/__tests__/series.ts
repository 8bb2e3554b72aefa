import { createSeries, futureDates } from "@replenish/core";
import type { RawTable, TimeSeries } from "@replenish/core";

export const dailyDates = (length: number, start = "2024-01-01"): string[] => [
	start,
	...futureDates(start, "D", length - 1),
];

/** Mild trend with a weekly bump, always positive. */
export const weeklyDemand = (length: number): number[] =>
	Array.from({ length }, (_, t) => 30 + 0.1 * t + (t % 7 === 4 ? 10 : 0) + (t % 3));

export const dailySeries = (values: readonly number[]): TimeSeries => {
	const dates = dailyDates(values.length);
	return createSeries(
		"D",
		values.map((demand, index) => ({ date: dates[index], demand }))
	);
};

export const salesTable = (values: readonly number[], stock?: number): RawTable => {
	const dates = dailyDates(values.length);
	return {
		columns: ["date", "sales", "stock"],
		rows: values.map((sales, index) => ({
			date: dates[index],
			sales,
			stock: index === values.length - 1 && stock !== undefined ? stock : null,
		})),
	};
};

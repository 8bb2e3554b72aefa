import { demandValues, parseDay } from "@replenish/core";
import type { TimeSeries } from "@replenish/core";
import { lagValue, trailingMean, trailingStd } from "@replenish/indicators";
import { getDate, getDay, getISOWeek, getMonth, getQuarter, getYear } from "date-fns";

export interface CalendarFeatures {
	year: number;
	/** 1-12 */
	month: number;
	/** ISO week number */
	week: number;
	/** Monday = 0 ... Sunday = 6 */
	dayOfWeek: number;
	quarter: number;
	isWeekend: boolean;
	dayOfMonth: number;
}

export interface LagFeatures {
	lag1: number | null;
	lag7: number | null;
	lag14: number | null;
	lag30: number | null;
	rollingMean7: number | null;
	rollingStd7: number | null;
	rollingMean30: number | null;
	rollingStd30: number | null;
}

export interface FeatureRow extends CalendarFeatures, LagFeatures {
	date: string;
	demand: number;
}

export const LAG_PERIODS = [1, 7, 14, 30] as const;

/** First index at which every lag and rolling window is populated. */
export const FIRST_COMPLETE_INDEX = 30;

export const calendarFeatures = (date: string): CalendarFeatures => {
	const day = parseDay(date);
	const dayOfWeek = (getDay(day) + 6) % 7;
	return {
		year: getYear(day),
		month: getMonth(day) + 1,
		week: getISOWeek(day),
		dayOfWeek,
		quarter: getQuarter(day),
		isWeekend: dayOfWeek >= 5,
		dayOfMonth: getDate(day),
	};
};

/** Lag and rolling features for `index`, built only from values before it. */
export const lagFeatures = (
	values: readonly number[],
	index: number
): LagFeatures => ({
	lag1: lagValue(values, index, 1),
	lag7: lagValue(values, index, 7),
	lag14: lagValue(values, index, 14),
	lag30: lagValue(values, index, 30),
	rollingMean7: trailingMean(values, index, 7),
	rollingStd7: trailingStd(values, index, 7),
	rollingMean30: trailingMean(values, index, 30),
	rollingStd30: trailingStd(values, index, 30),
});

export const augmentSeries = (series: TimeSeries): FeatureRow[] => {
	const values = demandValues(series);
	return series.points.map((point, index) => ({
		date: point.date,
		demand: point.demand,
		...calendarFeatures(point.date),
		...lagFeatures(values, index),
	}));
};

export const isCompleteRow = (features: LagFeatures): boolean =>
	Object.values(features).every((value) => value !== null);

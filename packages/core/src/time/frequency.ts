import {
	addDays,
	addMonths,
	addWeeks,
	differenceInCalendarDays,
	format,
	isValid,
	parseISO,
	startOfDay,
	startOfMonth,
} from "date-fns";
import type { Frequency } from "../types";

export const FREQUENCIES = ["D", "W", "M"] as const satisfies readonly Frequency[];

/** Average calendar days covered by one period. */
export const PERIOD_DAYS: Record<Frequency, number> = {
	D: 1,
	W: 7,
	M: 30.4375,
};

/** Periods in one seasonal cycle (week of days, year of weeks, year of months). */
export const SEASONAL_CYCLE: Record<Frequency, number> = {
	D: 7,
	W: 52,
	M: 12,
};

export const DAY_FORMAT = "yyyy-MM-dd";

export const isFrequency = (value: unknown): value is Frequency =>
	typeof value === "string" &&
	(FREQUENCIES as readonly string[]).includes(value);

export const formatDay = (date: Date): string => format(date, DAY_FORMAT);

/**
 * Parse a yyyy-MM-dd string into a local-midnight Date
 * @throws Error if the string is not a valid calendar date
 */
export const parseDay = (value: string): Date => {
	const parsed = parseISO(value);
	if (!isValid(parsed)) {
		throw new Error(`Invalid calendar date: "${value}"`);
	}
	return startOfDay(parsed);
};

/**
 * Shift a date by a number of periods
 * @param date - Anchor date
 * @param frequency - Period size
 * @param periods - Whole periods to add (may be negative)
 */
export const addPeriods = (
	date: Date,
	frequency: Frequency,
	periods: number
): Date => {
	switch (frequency) {
		case "D":
			return addDays(date, periods);
		case "W":
			return addWeeks(date, periods);
		case "M":
			return addMonths(date, periods);
	}
};

/**
 * Infer the sampling frequency from the median gap between ascending dates.
 * Gaps of one day or less are daily, 6-8 days weekly, 28-31 days monthly;
 * anything else falls back to daily.
 */
export const inferFrequency = (dates: readonly Date[]): Frequency => {
	if (dates.length < 2) {
		return "D";
	}
	const gaps: number[] = [];
	for (let i = 1; i < dates.length; i += 1) {
		gaps.push(differenceInCalendarDays(dates[i], dates[i - 1]));
	}
	gaps.sort((a, b) => a - b);
	const mid = Math.floor(gaps.length / 2);
	const medianGap =
		gaps.length % 2 === 0 ? (gaps[mid - 1] + gaps[mid]) / 2 : gaps[mid];
	if (medianGap <= 1) {
		return "D";
	}
	if (medianGap >= 6 && medianGap <= 8) {
		return "W";
	}
	if (medianGap >= 28 && medianGap <= 31) {
		return "M";
	}
	return "D";
};

/**
 * Snap a date onto the frequency grid. Weeks are anchored on `anchor`,
 * months on the first day of the month.
 */
export const snapToGrid = (
	date: Date,
	frequency: Frequency,
	anchor: Date
): Date => {
	const day = startOfDay(date);
	switch (frequency) {
		case "D":
			return day;
		case "W": {
			const offset = differenceInCalendarDays(day, startOfDay(anchor));
			return addDays(startOfDay(anchor), Math.floor(offset / 7) * 7);
		}
		case "M":
			return startOfMonth(day);
	}
};

/** Every grid date from `start` to `end` inclusive. */
export const dateRange = (
	start: Date,
	end: Date,
	frequency: Frequency
): Date[] => {
	const dates: Date[] = [];
	for (
		let step = 0, current = start;
		current.getTime() <= end.getTime();
		step += 1, current = addPeriods(start, frequency, step)
	) {
		dates.push(current);
	}
	return dates;
};

/** The `horizon` grid dates that follow `lastDate`. */
export const futureDates = (
	lastDate: string,
	frequency: Frequency,
	horizon: number
): string[] => {
	const anchor = parseDay(lastDate);
	return Array.from({ length: horizon }, (_, index) =>
		formatDay(addPeriods(anchor, frequency, index + 1))
	);
};

/** Whole calendar days between two yyyy-MM-dd dates. */
export const daysBetween = (from: string, to: string): number =>
	differenceInCalendarDays(parseDay(to), parseDay(from));

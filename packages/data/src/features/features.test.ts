import { describe, expect, it } from "vitest";
import { createSeries } from "@replenish/core";
import {
	FIRST_COMPLETE_INDEX,
	augmentSeries,
	calendarFeatures,
	isCompleteRow,
	lagFeatures,
} from "./features";

const dailySeries = (count: number) =>
	createSeries(
		"D",
		Array.from({ length: count }, (_, index) => ({
			date: `2024-01-${String(index + 1).padStart(2, "0")}`,
			demand: index + 1,
		}))
	);

describe("calendarFeatures", () => {
	it("derives calendar fields with Monday as day zero", () => {
		expect(calendarFeatures("2024-01-06")).toEqual({
			year: 2024,
			month: 1,
			week: 1,
			dayOfWeek: 5,
			quarter: 1,
			isWeekend: true,
			dayOfMonth: 6,
		});
		expect(calendarFeatures("2024-04-01").dayOfWeek).toBe(0);
		expect(calendarFeatures("2024-04-01").quarter).toBe(2);
	});
});

describe("lagFeatures", () => {
	const values = Array.from({ length: 40 }, (_, index) => index);

	it("only looks at values before the index", () => {
		const features = lagFeatures(values, 10);
		expect(features.lag1).toBe(9);
		expect(features.lag7).toBe(3);
		expect(features.lag14).toBeNull();
		expect(features.rollingMean7).toBe(6);
		expect(features.rollingMean30).toBeNull();
	});

	it("is complete from index thirty", () => {
		expect(isCompleteRow(lagFeatures(values, FIRST_COMPLETE_INDEX - 1))).toBe(false);
		const features = lagFeatures(values, FIRST_COMPLETE_INDEX);
		expect(isCompleteRow(features)).toBe(true);
		expect(features.lag30).toBe(0);
		expect(features.rollingMean30).toBe(14.5);
	});

	it("is unchanged by values after the index", () => {
		const altered = [...values.slice(0, 11), 999, 999];
		expect(lagFeatures(altered, 11)).toEqual(lagFeatures(values, 11));
	});
});

describe("augmentSeries", () => {
	it("builds one row per point", () => {
		const rows = augmentSeries(dailySeries(31));
		expect(rows).toHaveLength(31);
		expect(rows[0].lag1).toBeNull();
		expect(rows[30].demand).toBe(31);
		expect(rows[30].lag30).toBe(1);
		expect(rows[30].dayOfMonth).toBe(31);
	});
});

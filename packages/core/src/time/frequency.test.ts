import { describe, expect, it } from "vitest";
import {
	addPeriods,
	dateRange,
	daysBetween,
	formatDay,
	futureDates,
	inferFrequency,
	isFrequency,
	parseDay,
	snapToGrid,
} from "./frequency";

const days = (...values: string[]): Date[] => values.map(parseDay);

describe("frequency utilities", () => {
	describe("parseDay / formatDay", () => {
		it("round-trips calendar dates", () => {
			expect(formatDay(parseDay("2024-02-29"))).toBe("2024-02-29");
		});

		it("throws on invalid dates", () => {
			expect(() => parseDay("2024-13-01")).toThrow("Invalid calendar date");
		});
	});

	describe("isFrequency", () => {
		it("accepts only known codes", () => {
			expect(isFrequency("W")).toBe(true);
			expect(isFrequency("Q")).toBe(false);
			expect(isFrequency(7)).toBe(false);
		});
	});

	describe("inferFrequency", () => {
		it("detects daily data", () => {
			expect(
				inferFrequency(days("2024-01-01", "2024-01-02", "2024-01-03"))
			).toBe("D");
		});

		it("detects weekly data through the median gap", () => {
			expect(
				inferFrequency(
					days("2024-01-01", "2024-01-08", "2024-01-15", "2024-01-29")
				)
			).toBe("W");
		});

		it("detects monthly data", () => {
			expect(
				inferFrequency(days("2024-01-01", "2024-02-01", "2024-03-01"))
			).toBe("M");
		});

		it("falls back to daily for irregular gaps", () => {
			expect(
				inferFrequency(days("2024-01-01", "2024-01-04", "2024-01-07"))
			).toBe("D");
		});

		it("treats a single date as daily", () => {
			expect(inferFrequency(days("2024-01-01"))).toBe("D");
		});
	});

	describe("snapToGrid", () => {
		it("anchors weeks on the first observation", () => {
			const anchor = parseDay("2024-01-03");
			expect(formatDay(snapToGrid(parseDay("2024-01-12"), "W", anchor))).toBe(
				"2024-01-10"
			);
		});

		it("moves monthly dates to the first of the month", () => {
			const anchor = parseDay("2024-01-15");
			expect(formatDay(snapToGrid(parseDay("2024-03-20"), "M", anchor))).toBe(
				"2024-03-01"
			);
		});
	});

	describe("ranges", () => {
		it("enumerates every grid date inclusively", () => {
			const range = dateRange(
				parseDay("2024-01-30"),
				parseDay("2024-02-02"),
				"D"
			).map(formatDay);
			expect(range).toEqual([
				"2024-01-30",
				"2024-01-31",
				"2024-02-01",
				"2024-02-02",
			]);
		});

		it("produces future dates after the last observation", () => {
			expect(futureDates("2024-01-29", "W", 2)).toEqual([
				"2024-02-05",
				"2024-02-12",
			]);
			expect(futureDates("2024-11-01", "M", 3)).toEqual([
				"2024-12-01",
				"2025-01-01",
				"2025-02-01",
			]);
		});

		it("shifts by whole periods", () => {
			expect(formatDay(addPeriods(parseDay("2024-01-01"), "D", -1))).toBe(
				"2023-12-31"
			);
			expect(daysBetween("2024-01-01", "2024-03-01")).toBe(60);
		});
	});
});

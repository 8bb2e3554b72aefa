import { describe, expect, it } from "vitest";
import { demandValues, parseDay, seriesDates, ValidationError } from "@replenish/core";
import { canonicalize, coerceNumber, fillMissing } from "./canonicalize";

const days = (...values: (string | null)[]): (Date | null)[] =>
	values.map((value) => (value ? parseDay(value) : null));

describe("canonicalize", () => {
	describe("ordering and duplicates", () => {
		it("sorts rows ascending and keeps the first same-date row", () => {
			const result = canonicalize({
				dates: days("2024-01-03", "2024-01-01", "2024-01-02", "2024-01-01"),
				demand: [30, 10, 20, 99],
				demandColumn: "sales",
			});

			expect(seriesDates(result.series)).toEqual([
				"2024-01-01",
				"2024-01-02",
				"2024-01-03",
			]);
			expect(demandValues(result.series)).toEqual([10, 20, 30]);
			expect(result.stats.duplicateRows).toBe(1);
			expect(result.series.frequency).toBe("D");
		});
	});

	describe("gap filling", () => {
		it("reindexes onto a continuous calendar and zero-fills", () => {
			const result = canonicalize({
				dates: days("2024-01-01", "2024-01-02", "2024-01-05"),
				demand: [4, 6, 8],
				demandColumn: "sales",
			});

			expect(seriesDates(result.series)).toEqual([
				"2024-01-01",
				"2024-01-02",
				"2024-01-03",
				"2024-01-04",
				"2024-01-05",
			]);
			expect(demandValues(result.series)).toEqual([4, 6, 0, 0, 8]);
			expect(result.stats.filledPeriods).toBe(2);
		});

		it("snaps weekly data onto a grid anchored at the first date", () => {
			const result = canonicalize({
				dates: days("2024-01-01", "2024-01-08", "2024-01-16", "2024-01-29"),
				demand: [1, 2, 3, 4],
				demandColumn: "sales",
			});

			expect(result.series.frequency).toBe("W");
			expect(seriesDates(result.series)).toEqual([
				"2024-01-01",
				"2024-01-08",
				"2024-01-15",
				"2024-01-22",
				"2024-01-29",
			]);
			expect(demandValues(result.series)).toEqual([1, 2, 3, 0, 4]);
		});
	});

	describe("demand coercion", () => {
		it("fills missing demand and clips negatives", () => {
			const result = canonicalize({
				dates: days("2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04"),
				demand: ["n/a", "5", -3, null],
				demandColumn: "sales",
			});

			expect(demandValues(result.series)).toEqual([5, 5, 0, 0]);
			expect(result.stats.clippedNegatives).toBe(2);
		});

		it("drops rows without a date", () => {
			const result = canonicalize({
				dates: days("2024-01-01", null, "2024-01-02"),
				demand: [1, 2, 3],
				demandColumn: "sales",
			});

			expect(demandValues(result.series)).toEqual([1, 3]);
			expect(result.stats.droppedRows).toBe(1);
			expect(result.stats.inputRows).toBe(3);
		});

		it("aligns inventory with the canonical dates", () => {
			const result = canonicalize({
				dates: days("2024-01-01", "2024-01-03"),
				demand: [1, 2],
				inventory: [50, "40"],
				demandColumn: "sales",
			});

			expect(result.inventory).toEqual([50, null, 40]);
		});
	});

	describe("validation", () => {
		it("rejects an empty table", () => {
			expect(() =>
				canonicalize({ dates: [], demand: [], demandColumn: "sales" })
			).toThrowError(ValidationError);
		});

		it("rejects all-negative demand", () => {
			expect(() =>
				canonicalize({
					dates: days("2024-01-01", "2024-01-02"),
					demand: [-1, -2],
					demandColumn: "sales",
				})
			).toThrowError(/only negative values/);
		});

		it("rejects demand without numbers", () => {
			expect(() =>
				canonicalize({
					dates: days("2024-01-01"),
					demand: ["lots"],
					demandColumn: "sales",
				})
			).toThrowError(/no numeric values/);
		});
	});
});

describe("coerceNumber", () => {
	it("accepts numbers and numeric text", () => {
		expect(coerceNumber(3)).toBe(3);
		expect(coerceNumber(" 1,250.5 ")).toBe(1250.5);
		expect(coerceNumber("")).toBeNull();
		expect(coerceNumber("abc")).toBeNull();
		expect(coerceNumber(Number.NaN)).toBeNull();
		expect(coerceNumber(true)).toBeNull();
	});
});

describe("fillMissing", () => {
	it("fills forward, then backward, then with zero", () => {
		expect(fillMissing([null, 2, null, 5, null])).toEqual([2, 2, 2, 5, 5]);
		expect(fillMissing([null, null])).toEqual([0, 0]);
	});
});

import { describe, expect, it } from "vitest";
import { demandValues, seriesDates, ValidationError } from "@replenish/core";
import type { RawTable } from "@replenish/core";
import { prepare } from "./prepare";

const rows = (entries: [string, unknown, unknown?][]): RawTable => ({
	columns: ["date", "sales", "inventory"],
	rows: entries.map(([date, sales, inventory]) => ({ date, sales, inventory })),
});

describe("prepare", () => {
	it("produces a contiguous ascending series and the mapping", () => {
		const result = prepare(
			rows([
				["2024-01-04", 8, 20],
				["2024-01-01", 5, 30],
				["2024-01-02", 6, null],
				["2024-01-01", 9, 1],
			])
		);

		expect(seriesDates(result.series)).toEqual([
			"2024-01-01",
			"2024-01-02",
			"2024-01-03",
			"2024-01-04",
		]);
		expect(demandValues(result.series)).toEqual([5, 6, 0, 8]);
		expect(result.mapping).toEqual({
			date: "date",
			demand: "sales",
			inventory: "inventory",
			sources: { date: "keyword", demand: "keyword", inventory: "keyword" },
			dateStrategy: "default",
			dateParseRate: 1,
		});
		expect(result.inventory).toEqual([30, null, null, 20]);
		expect(result.latestInventory).toBe(20);
		expect(result.stats).toEqual({
			inputRows: 4,
			droppedRows: 0,
			duplicateRows: 1,
			clippedNegatives: 0,
			filledPeriods: 1,
		});
	});

	it("rejects an empty table", () => {
		expect(() => prepare({ columns: ["date", "sales"], rows: [] })).toThrowError(
			ValidationError
		);
	});

	it("names the date column when too few dates parse", () => {
		expect(() =>
			prepare({
				columns: ["date", "sales"],
				rows: [
					{ date: "2024-01-01", sales: 1 },
					{ date: "soon", sales: 2 },
					{ date: "later", sales: 3 },
				],
			})
		).toThrowError(/Column "date" could not be parsed/);
	});

	it("rejects all-negative demand", () => {
		expect(() =>
			prepare(
				rows([
					["2024-01-01", -4],
					["2024-01-02", -1],
				])
			)
		).toThrowError(/only negative values/);
	});
});

import { describe, expect, it } from "vitest";
import type { RawTable } from "@replenish/core";
import { ValidationError } from "@replenish/core";
import { detectColumns, numericShare } from "./detectColumns";

const table = (columns: string[], rows: unknown[][]): RawTable => ({
	columns,
	rows: rows.map((values) =>
		Object.fromEntries(columns.map((column, index) => [column, values[index]]))
	),
});

describe("detectColumns", () => {
	describe("keyword matches", () => {
		it("maps date, demand and inventory by name", () => {
			const input = table(
				["Order Date", "Units Sold", "Stock Level"],
				[
					["2024-01-01", 5, 40],
					["2024-01-02", 7, 33],
				]
			);
			expect(detectColumns(input)).toEqual({
				date: "Order Date",
				demand: "Units Sold",
				inventory: "Stock Level",
				sources: { date: "keyword", demand: "keyword", inventory: "keyword" },
			});
		});

		it("skips name matches whose values do not parse", () => {
			const input = table(
				["update_note", "date", "sales"],
				[
					["checked", "2024-01-01", 5],
					["pending", "2024-01-02", 6],
				]
			);
			expect(detectColumns(input).date).toBe("date");
		});

		it("prefers a numeric demand match over a text one", () => {
			const input = table(
				["day", "sales_channel", "sales_units"],
				[
					["2024-01-01", "web", 5],
					["2024-01-02", "store", 6],
				]
			);
			expect(detectColumns(input).demand).toBe("sales_units");
		});
	});

	describe("type-based fallback", () => {
		it("detects columns by content when names do not help", () => {
			const input = table(
				["label", "when", "delta", "amount"],
				[
					["a", new Date(2024, 0, 1), -2, 5],
					["b", new Date(2024, 0, 2), 3, 6],
				]
			);
			const detected = detectColumns(input);
			expect(detected.date).toBe("when");
			expect(detected.demand).toBe("amount");
			expect(detected.sources).toEqual({
				date: "type",
				demand: "type",
				inventory: null,
			});
			expect(detected.inventory).toBeNull();
		});

		it("uses the first numeric column when all have negatives", () => {
			const input = table(
				["x", "a", "b"],
				[
					["2024-01-01", -1, -5],
					["2024-01-02", 4, 2],
				]
			);
			expect(detectColumns(input).demand).toBe("a");
		});
	});

	describe("overrides", () => {
		it("honours explicit column names", () => {
			const input = table(
				["date", "sales", "returns"],
				[["2024-01-01", 5, 1]]
			);
			const detected = detectColumns(input, { demandColumn: "returns" });
			expect(detected.demand).toBe("returns");
			expect(detected.sources.demand).toBe("override");
		});

		it("rejects unknown override columns", () => {
			const input = table(["date", "sales"], [["2024-01-01", 5]]);
			expect(() => detectColumns(input, { dateColumn: "when" })).toThrowError(
				/Column "when" not found/
			);
		});
	});

	describe("failures", () => {
		it("throws when no date column exists", () => {
			const input = table(["sku", "sales"], [["a", 5]]);
			expect(() => detectColumns(input)).toThrowError(ValidationError);
		});

		it("throws when no demand column exists", () => {
			const input = table(["date", "note"], [["2024-01-01", "x"]]);
			expect(() => detectColumns(input)).toThrowError(/No demand column/);
		});
	});
});

describe("numericShare", () => {
	it("ignores blanks", () => {
		expect(numericShare([1, "2", "", null, "x"])).toBeCloseTo(2 / 3, 10);
		expect(numericShare([])).toBe(0);
	});
});

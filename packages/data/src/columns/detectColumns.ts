import { ValidationError } from "@replenish/core";
import type { RawTable } from "@replenish/core";
import { detectDateStrategy } from "../dates/parseDates";
import type { ColumnSource, PrepareOptions } from "../types";
import { coerceNumber } from "../reconcile/canonicalize";
import { DATE_KEYWORDS, DEMAND_KEYWORDS, INVENTORY_KEYWORDS } from "./keywords";

export interface DetectedColumns {
	date: string;
	demand: string;
	inventory: string | null;
	sources: {
		date: ColumnSource;
		demand: ColumnSource;
		inventory: ColumnSource | null;
	};
}

interface Detection {
	column: string;
	source: ColumnSource;
}

const MIN_TYPE_SHARE = 0.8;
const DEFAULT_SAMPLE_SIZE = 100;

const isBlank = (value: unknown): boolean =>
	value === null ||
	value === undefined ||
	(typeof value === "string" && value.trim() === "");

const sampleColumn = (
	table: RawTable,
	column: string,
	sampleSize: number
): unknown[] => table.rows.slice(0, sampleSize).map((row) => row[column]);

/** Share of non-blank sampled values that coerce to a finite number. */
export const numericShare = (values: readonly unknown[]): number => {
	const present = values.filter((value) => !isBlank(value));
	if (!present.length) {
		return 0;
	}
	return present.filter((value) => coerceNumber(value) !== null).length / present.length;
};

export const dateShare = (values: readonly unknown[]): number =>
	values.length ? detectDateStrategy(values).successRate : 0;

const nameMatches = (
	columns: readonly string[],
	keyword: string,
	excluded: ReadonlySet<string>
): string[] =>
	columns.filter(
		(column) => !excluded.has(column) && column.toLowerCase().includes(keyword)
	);

const resolveOverride = (
	table: RawTable,
	column: string | undefined
): Detection | null => {
	if (column === undefined) {
		return null;
	}
	if (!table.columns.includes(column)) {
		throw new ValidationError(`Column "${column}" not found in input`, column);
	}
	return { column, source: "override" };
};

const detectDateColumn = (table: RawTable, sampleSize: number): Detection => {
	const sampled = (column: string): unknown[] =>
		sampleColumn(table, column, sampleSize);
	const named: string[] = [];
	for (const keyword of DATE_KEYWORDS) {
		for (const column of nameMatches(table.columns, keyword, new Set(named))) {
			named.push(column);
			if (dateShare(sampled(column)) >= MIN_TYPE_SHARE) {
				return { column, source: "keyword" };
			}
		}
	}
	for (const column of table.columns) {
		const values = sampled(column).filter((value) => !isBlank(value));
		const allNative =
			values.length > 0 && values.every((value) => value instanceof Date);
		if (allNative || dateShare(sampled(column)) >= MIN_TYPE_SHARE) {
			return { column, source: "type" };
		}
	}
	if (named.length) {
		return { column: named[0], source: "keyword" };
	}
	throw new ValidationError("No date column found in input");
};

const detectDemandColumn = (
	table: RawTable,
	sampleSize: number,
	excluded: ReadonlySet<string>
): Detection => {
	const sampled = (column: string): unknown[] =>
		sampleColumn(table, column, sampleSize);
	const named: string[] = [];
	for (const keyword of DEMAND_KEYWORDS) {
		for (const column of nameMatches(table.columns, keyword, excluded)) {
			if (named.includes(column)) {
				continue;
			}
			named.push(column);
			if (numericShare(sampled(column)) >= MIN_TYPE_SHARE) {
				return { column, source: "keyword" };
			}
		}
	}
	const numeric = table.columns.filter(
		(column) =>
			!excluded.has(column) && numericShare(sampled(column)) >= MIN_TYPE_SHARE
	);
	const nonNegative = numeric.find((column) =>
		sampled(column).every((value) => {
			const parsed = coerceNumber(value);
			return parsed === null || parsed >= 0;
		})
	);
	const typed = nonNegative ?? numeric[0];
	if (typed !== undefined) {
		return { column: typed, source: "type" };
	}
	if (named.length) {
		return { column: named[0], source: "keyword" };
	}
	throw new ValidationError("No demand column found in input");
};

const detectInventoryColumn = (
	table: RawTable,
	sampleSize: number,
	excluded: ReadonlySet<string>
): Detection | null => {
	for (const keyword of INVENTORY_KEYWORDS) {
		for (const column of nameMatches(table.columns, keyword, excluded)) {
			if (numericShare(sampleColumn(table, column, sampleSize)) >= MIN_TYPE_SHARE) {
				return { column, source: "keyword" };
			}
		}
	}
	return null;
};

/**
 * Assign date, demand and optional inventory roles to table columns.
 * Explicit overrides win; otherwise keyword matches whose sampled values parse
 * as the target type, then type-based detection, in original column order.
 * @throws ValidationError when no date or demand column can be found
 */
export const detectColumns = (
	table: RawTable,
	options: PrepareOptions = {}
): DetectedColumns => {
	const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
	const date =
		resolveOverride(table, options.dateColumn) ??
		detectDateColumn(table, sampleSize);
	const demand =
		resolveOverride(table, options.demandColumn) ??
		detectDemandColumn(table, sampleSize, new Set([date.column]));
	if (demand.column === date.column) {
		throw new ValidationError(
			`Column "${date.column}" cannot be both the date and the demand column`,
			date.column
		);
	}
	const inventory =
		resolveOverride(table, options.inventoryColumn) ??
		detectInventoryColumn(
			table,
			sampleSize,
			new Set([date.column, demand.column])
		);

	return {
		date: date.column,
		demand: demand.column,
		inventory: inventory?.column ?? null,
		sources: {
			date: date.source,
			demand: demand.source,
			inventory: inventory?.source ?? null,
		},
	};
};

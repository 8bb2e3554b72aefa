import {
	createLogger,
	createSeries,
	dateRange,
	formatDay,
	inferFrequency,
	snapToGrid,
	ValidationError,
} from "@replenish/core";
import type { DemandPoint, TimeSeries } from "@replenish/core";
import { startOfDay } from "date-fns";
import type { CanonicalizationStats } from "../types";

const logger = createLogger("data-prep");

export interface CanonicalizeInput {
	/** Parsed dates per input row, null where parsing failed */
	dates: readonly (Date | null)[];
	demand: readonly unknown[];
	inventory?: readonly unknown[] | null;
	demandColumn: string;
}

export interface CanonicalizeResult {
	series: TimeSeries;
	inventory: (number | null)[];
	stats: CanonicalizationStats;
}

interface ParsedRow {
	day: Date;
	demand: number | null;
	inventory: number | null;
}

/** Finite number from a cell, accepting numeric text with thousands separators. */
export const coerceNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string") {
		const text = value.trim().replace(/,/g, "");
		if (!text.length) {
			return null;
		}
		const parsed = Number(text);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

/** Forward fill, then backward fill, then zero. */
export const fillMissing = (values: readonly (number | null)[]): number[] => {
	const forward: (number | null)[] = [];
	let last: number | null = null;
	for (const value of values) {
		last = value ?? last;
		forward.push(last);
	}
	const filled: number[] = new Array(values.length).fill(0);
	let next: number | null = null;
	for (let i = forward.length - 1; i >= 0; i -= 1) {
		next = forward[i] ?? next;
		filled[i] = next ?? 0;
	}
	return filled;
};

/**
 * Turn parsed rows into a gap-free series: rows without a date are dropped,
 * demand is filled and clipped at zero, rows are sorted, same-date rows keep
 * the first occurrence and missing periods are zero-filled.
 * @throws ValidationError for empty input or demand without usable values
 */
export const canonicalize = (input: CanonicalizeInput): CanonicalizeResult => {
	const { dates, demand, inventory, demandColumn } = input;
	if (!dates.length) {
		throw new ValidationError("Input table is empty");
	}

	const rows: ParsedRow[] = [];
	dates.forEach((date, index) => {
		if (!date) {
			return;
		}
		rows.push({
			day: startOfDay(date),
			demand: coerceNumber(demand[index]),
			inventory: inventory ? coerceNumber(inventory[index]) : null,
		});
	});
	if (!rows.length) {
		throw new ValidationError("No rows with a parseable date");
	}

	const observed = rows
		.map((row) => row.demand)
		.filter((value): value is number => value !== null);
	if (!observed.length) {
		throw new ValidationError(
			`Demand column "${demandColumn}" contains no numeric values`,
			demandColumn
		);
	}
	if (observed.every((value) => value < 0)) {
		throw new ValidationError(
			`Demand column "${demandColumn}" contains only negative values`,
			demandColumn
		);
	}

	rows.sort((a, b) => a.day.getTime() - b.day.getTime());
	const filledDemand = fillMissing(rows.map((row) => row.demand));
	const clippedNegatives = filledDemand.filter((value) => value < 0).length;

	const distinctDays = rows
		.map((row) => row.day)
		.filter(
			(day, index, all) => index === 0 || day.getTime() !== all[index - 1].getTime()
		);
	const frequency = inferFrequency(distinctDays);
	const anchor = rows[0].day;

	const byDate = new Map<string, { demand: number; inventory: number | null }>();
	let duplicateRows = 0;
	rows.forEach((row, index) => {
		const key = formatDay(snapToGrid(row.day, frequency, anchor));
		if (byDate.has(key)) {
			duplicateRows += 1;
			return;
		}
		byDate.set(key, {
			demand: Math.max(filledDemand[index], 0),
			inventory: row.inventory,
		});
	});

	const first = snapToGrid(rows[0].day, frequency, anchor);
	const last = snapToGrid(rows[rows.length - 1].day, frequency, anchor);
	const points: DemandPoint[] = [];
	const alignedInventory: (number | null)[] = [];
	let filledPeriods = 0;
	for (const day of dateRange(first, last, frequency)) {
		const key = formatDay(day);
		const entry = byDate.get(key);
		if (!entry) {
			filledPeriods += 1;
		}
		points.push({ date: key, demand: entry?.demand ?? 0 });
		alignedInventory.push(entry?.inventory ?? null);
	}

	const stats: CanonicalizationStats = {
		inputRows: dates.length,
		droppedRows: dates.length - rows.length,
		duplicateRows,
		clippedNegatives,
		filledPeriods,
	};
	logger.debug("series_canonicalized", { frequency, points: points.length, ...stats });

	return {
		series: createSeries(frequency, points),
		inventory: alignedInventory,
		stats,
	};
};

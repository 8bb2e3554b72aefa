import { createLogger, ValidationError } from "@replenish/core";
import type { RawTable } from "@replenish/core";
import { detectColumns } from "../columns/detectColumns";
import { parseDateColumn } from "../dates/parseDates";
import { canonicalize } from "../reconcile/canonicalize";
import type { PrepareOptions, PreparedSeries } from "../types";

const logger = createLogger("data-prep");

const latestValue = (values: readonly (number | null)[]): number | null => {
	for (let i = values.length - 1; i >= 0; i -= 1) {
		const value = values[i];
		if (value !== null) {
			return value;
		}
	}
	return null;
};

/**
 * Turn a decoded table into a canonical demand series plus the column mapping
 * that produced it.
 * @throws ValidationError for empty tables, missing or unparseable columns and
 * demand without usable values
 */
export const prepare = (
	table: RawTable,
	options: PrepareOptions = {}
): PreparedSeries => {
	if (!table.rows.length || !table.columns.length) {
		throw new ValidationError("Input table is empty");
	}

	const columns = detectColumns(table, options);
	const dateOutcome = parseDateColumn(
		table.rows.map((row) => row[columns.date]),
		columns.date
	);
	const inventoryColumn = columns.inventory;
	const result = canonicalize({
		dates: dateOutcome.dates,
		demand: table.rows.map((row) => row[columns.demand]),
		inventory:
			inventoryColumn === null
				? null
				: table.rows.map((row) => row[inventoryColumn]),
		demandColumn: columns.demand,
	});

	const prepared: PreparedSeries = {
		series: result.series,
		mapping: {
			...columns,
			dateStrategy: dateOutcome.strategy,
			dateParseRate: dateOutcome.successRate,
		},
		inventory: Object.freeze(result.inventory),
		latestInventory: latestValue(result.inventory),
		stats: result.stats,
	};

	logger.info("series_prepared", {
		date: columns.date,
		demand: columns.demand,
		inventory: columns.inventory,
		dateStrategy: dateOutcome.strategy,
		frequency: result.series.frequency,
		points: result.series.points.length,
	});
	return prepared;
};

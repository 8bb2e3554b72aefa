import type { TimeSeries } from "@replenish/core";

export type ColumnSource = "override" | "keyword" | "type";

export type DateStrategyId =
	| "default"
	| "dayfirst"
	| "yyyy-MM-dd"
	| "dd-MM-yyyy"
	| "MM-dd-yyyy"
	| "dd/MM/yyyy"
	| "MM/dd/yyyy"
	| "yyyy/MM/dd"
	| "excel_serial";

export interface ColumnMapping {
	date: string;
	demand: string;
	inventory: string | null;
	sources: {
		date: ColumnSource;
		demand: ColumnSource;
		inventory: ColumnSource | null;
	};
	dateStrategy: DateStrategyId;
	/** Share of rows whose date parsed, 0..1 */
	dateParseRate: number;
}

export interface PrepareOptions {
	dateColumn?: string;
	demandColumn?: string;
	inventoryColumn?: string;
	/** Rows inspected during column detection */
	sampleSize?: number;
}

export interface CanonicalizationStats {
	inputRows: number;
	droppedRows: number;
	duplicateRows: number;
	clippedNegatives: number;
	filledPeriods: number;
}

export interface PreparedSeries {
	series: TimeSeries;
	mapping: ColumnMapping;
	/** On-hand inventory aligned with `series.points`, null where unknown */
	inventory: readonly (number | null)[];
	latestInventory: number | null;
	stats: CanonicalizationStats;
}

export type Frequency = "D" | "W" | "M";

export interface DemandPoint {
	/** Calendar date formatted as yyyy-MM-dd */
	date: string;
	demand: number;
}

/**
 * Canonical demand history. Dates are unique, ascending and contiguous at
 * `frequency`; demand is never negative. Instances are frozen.
 */
export interface TimeSeries {
	readonly frequency: Frequency;
	readonly points: readonly DemandPoint[];
}

/** Already-decoded tabular input, one record per row keyed by column name. */
export interface RawTable {
	columns: string[];
	rows: Record<string, unknown>[];
}

export interface IntervalBand {
	lower: readonly number[];
	upper: readonly number[];
}

export interface HistoricalFit {
	dates: readonly string[];
	values: readonly number[];
}

export interface ForecastResult {
	model: string;
	frequency: Frequency;
	dates: readonly string[];
	forecast: readonly number[];
	lower: readonly number[];
	upper: readonly number[];
	confidenceLevel: number;
	bands: {
		"95": IntervalBand;
		"80": IntervalBand;
	};
	historicalFit: HistoricalFit | null;
	/** Ensemble only: members that produced a forecast */
	members?: readonly string[];
	/** Ensemble only: members that failed, with the reason */
	skipped?: readonly { model: string; kind: string; message: string }[];
}

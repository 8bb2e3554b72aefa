/** Percentage errors; null when the denominator is undefined for the window. */
export interface PercentageErrors {
	mape: number | null;
	wape: number | null;
}

export interface AccuracyOptions {
	/** Actuals with |value| at or below this are left out of MAPE */
	mapeZeroThreshold?: number;
}

export interface AccuracyReport extends PercentageErrors {
	rmse: number;
	mae: number;
}

export interface FitMetrics {
	mae: number;
	rmse: number;
	mape: number | null;
	r2: number | null;
	/** Mean of fitted minus actual; positive means over-forecasting */
	bias: number;
	/** max(0, 100 - MAPE) */
	accuracy: number | null;
}

export interface InventoryPerformance {
	/** Share of demand fulfilled from stock, in percent */
	serviceLevelPct: number | null;
	inventoryTurnover: number;
	/** Share of periods without a stockout, in percent */
	fillRatePct: number;
	avgInventory: number;
	stockoutPeriods: number;
}

import type { RiskThresholds } from "./types";

// Severity grades, not probabilities.
const FULL = 1;
const PARTIAL = 0.5;

export const stockoutSeverity = (
	levels: readonly number[],
	demand: readonly number[],
	thresholds: Pick<RiskThresholds, "stockoutCritical" | "stockoutWarning">
): number[] =>
	levels.map((level, index) => {
		if (level < demand[index] * thresholds.stockoutCritical) {
			return FULL;
		}
		if (level < demand[index] * thresholds.stockoutWarning) {
			return PARTIAL;
		}
		return 0;
	});

export const overstockSeverity = (
	levels: readonly number[],
	demand: readonly number[],
	thresholds: Pick<RiskThresholds, "overstockWarning" | "overstockCritical">
): number[] =>
	levels.map((level, index) => {
		if (level > demand[index] * thresholds.overstockCritical) {
			return FULL;
		}
		if (level > demand[index] * thresholds.overstockWarning) {
			return PARTIAL;
		}
		return 0;
	});

/** Periods graded above half severity. */
export const severePeriods = (risk: readonly number[]): number =>
	risk.filter((value) => value > PARTIAL).length;

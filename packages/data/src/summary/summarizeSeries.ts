import {
	demandValues,
	mean,
	parseDay,
	round,
	roundOrNull,
	safeDivide,
	sampleStandardDeviation,
	sum,
} from "@replenish/core";
import type { TimeSeries } from "@replenish/core";
import { format, getMonth } from "date-fns";

export type TrendDirection = "increasing" | "decreasing" | "stable";

export interface MonthProfile {
	/** 1-12 */
	month: number;
	name: string;
	meanDemand: number;
}

export interface InventoryChallenges {
	stockoutPeriods: number;
	overstockPeriods: number;
	observedPeriods: number;
}

export interface SeriesSummary {
	periods: number;
	startDate: string | null;
	endDate: string | null;
	totalDemand: number;
	meanDemand: number;
	stdDemand: number;
	coefficientOfVariation: number | null;
	zeroDemandShare: number;
	peakMonth: MonthProfile | null;
	troughMonth: MonthProfile | null;
	trend: {
		direction: TrendDirection;
		changePct: number | null;
	};
	inventory: InventoryChallenges | null;
}

const TREND_WINDOW = 30;
const TREND_TOLERANCE = 0.05;
const STOCKOUT_COVER = 0.1;
const OVERSTOCK_COVER = 2;

const monthProfiles = (series: TimeSeries): MonthProfile[] => {
	const buckets = new Map<number, { total: number; count: number; name: string }>();
	for (const point of series.points) {
		const day = parseDay(point.date);
		const month = getMonth(day) + 1;
		const bucket = buckets.get(month) ?? {
			total: 0,
			count: 0,
			name: format(day, "MMMM"),
		};
		bucket.total += point.demand;
		bucket.count += 1;
		buckets.set(month, bucket);
	}
	return [...buckets.entries()]
		.sort(([a], [b]) => a - b)
		.map(([month, bucket]) => ({
			month,
			name: bucket.name,
			meanDemand: round(bucket.total / bucket.count),
		}));
};

const trendOf = (values: readonly number[]): SeriesSummary["trend"] => {
	if (values.length < 2) {
		return { direction: "stable", changePct: null };
	}
	const window = Math.min(TREND_WINDOW, Math.floor(values.length / 2));
	const head = mean(values.slice(0, window));
	const tail = mean(values.slice(values.length - window));
	const change = safeDivide(tail - head, head);
	let direction: TrendDirection = "stable";
	if (change === null) {
		direction = tail > 0 ? "increasing" : "stable";
	} else if (change > TREND_TOLERANCE) {
		direction = "increasing";
	} else if (change < -TREND_TOLERANCE) {
		direction = "decreasing";
	}
	return { direction, changePct: roundOrNull(change === null ? null : change * 100) };
};

const inventoryChallenges = (
	values: readonly number[],
	inventory: readonly (number | null)[]
): InventoryChallenges | null => {
	let stockoutPeriods = 0;
	let overstockPeriods = 0;
	let observedPeriods = 0;
	values.forEach((demand, index) => {
		const onHand = inventory[index];
		if (onHand === null || onHand === undefined) {
			return;
		}
		observedPeriods += 1;
		if (demand > 0 && onHand <= STOCKOUT_COVER * demand) {
			stockoutPeriods += 1;
		}
		if (demand > 0 ? onHand >= OVERSTOCK_COVER * demand : onHand > 0) {
			overstockPeriods += 1;
		}
	});
	return observedPeriods ? { stockoutPeriods, overstockPeriods, observedPeriods } : null;
};

/** Descriptive statistics and demand insights for a prepared series. */
export const summarizeSeries = (
	series: TimeSeries,
	inventory: readonly (number | null)[] = []
): SeriesSummary => {
	const values = demandValues(series);
	const avg = mean(values);
	const std = sampleStandardDeviation(values);
	const months = monthProfiles(series);
	const byDemand = [...months].sort((a, b) => b.meanDemand - a.meanDemand);

	return {
		periods: values.length,
		startDate: series.points[0]?.date ?? null,
		endDate: series.points[series.points.length - 1]?.date ?? null,
		totalDemand: round(sum(values)),
		meanDemand: round(avg),
		stdDemand: round(std),
		coefficientOfVariation: roundOrNull(safeDivide(std, avg), 4),
		zeroDemandShare: values.length
			? round(values.filter((value) => value === 0).length / values.length, 4)
			: 0,
		peakMonth: months.length >= 2 ? byDemand[0] : null,
		troughMonth: months.length >= 2 ? byDemand[byDemand.length - 1] : null,
		trend: trendOf(values),
		inventory: inventoryChallenges(values, inventory),
	};
};

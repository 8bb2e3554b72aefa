export * from "./types";
export { prepare } from "./prepare/prepare";
export { detectColumns, numericShare, dateShare } from "./columns/detectColumns";
export type { DetectedColumns } from "./columns/detectColumns";
export { DATE_KEYWORDS, DEMAND_KEYWORDS, INVENTORY_KEYWORDS } from "./columns/keywords";
export {
	detectDateStrategy,
	looksLikeSerialDates,
	parseDateColumn,
	requiredDateSuccessRate,
} from "./dates/parseDates";
export type { DateParseOutcome } from "./dates/parseDates";
export { canonicalize, coerceNumber, fillMissing } from "./reconcile/canonicalize";
export type { CanonicalizeInput, CanonicalizeResult } from "./reconcile/canonicalize";
export {
	FIRST_COMPLETE_INDEX,
	LAG_PERIODS,
	augmentSeries,
	calendarFeatures,
	isCompleteRow,
	lagFeatures,
} from "./features/features";
export type { CalendarFeatures, FeatureRow, LagFeatures } from "./features/features";
export { summarizeSeries } from "./summary/summarizeSeries";
export type {
	InventoryChallenges,
	MonthProfile,
	SeriesSummary,
	TrendDirection,
} from "./summary/summarizeSeries";

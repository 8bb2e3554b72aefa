// Matched as lower-case substrings of column names, in priority order.
export const DATE_KEYWORDS = [
	"date",
	"day",
	"timestamp",
	"time",
	"period",
	"week",
	"month",
] as const;

export const DEMAND_KEYWORDS = [
	"demand",
	"sales",
	"sold",
	"quantity",
	"qty",
	"units",
	"volume",
	"orders",
	"consumption",
	"usage",
] as const;

export const INVENTORY_KEYWORDS = [
	"inventory",
	"on_hand",
	"onhand",
	"on hand",
	"stock",
	"available",
] as const;

import { addDays, isValid, parse, parseISO, startOfDay } from "date-fns";
import { ValidationError } from "@replenish/core";
import type { DateStrategyId } from "../types";

export interface DateParseOutcome {
	strategy: DateStrategyId;
	dates: (Date | null)[];
	/** Parsed rows over all rows; blanks count as failures */
	successRate: number;
}

interface DateStrategy {
	id: DateStrategyId;
	parse: (value: unknown) => Date | null;
}

const REFERENCE_DATE = new Date(2000, 0, 1);
const EXCEL_EPOCH = new Date(1899, 11, 30);
const SERIAL_MIN = 20_000;
const SERIAL_MAX = 60_000;
const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;

const MONTH_FIRST_FORMATS = [
	"MM/dd/yyyy",
	"MM-dd-yyyy",
	"MM/dd/yy",
	"yyyy/MM/dd",
	"yyyy.MM.dd",
	"MMM d, yyyy",
	"MMMM d, yyyy",
	"d MMM yyyy",
];

const DAY_FIRST_FORMATS = [
	"dd/MM/yyyy",
	"dd-MM-yyyy",
	"dd.MM.yyyy",
	"dd/MM/yy",
	"yyyy/MM/dd",
	"d MMM yyyy",
	"d MMMM yyyy",
];

const EXPLICIT_FORMATS = [
	"yyyy-MM-dd",
	"dd-MM-yyyy",
	"MM-dd-yyyy",
	"dd/MM/yyyy",
	"MM/dd/yyyy",
	"yyyy/MM/dd",
] as const satisfies readonly DateStrategyId[];

const nativeDate = (value: unknown): Date | null =>
	value instanceof Date && isValid(value) ? startOfDay(value) : null;

/** Non-numeric text, trimmed; numbers are left to the serial heuristic. */
const dateText = (value: unknown): string | null => {
	if (typeof value !== "string") {
		return null;
	}
	const text = value.trim();
	return text.length && !NUMERIC_TEXT.test(text) ? text : null;
};

const parseWithFormats = (
	text: string,
	formats: readonly string[]
): Date | null => {
	for (const pattern of formats) {
		const parsed = parse(text, pattern, REFERENCE_DATE);
		if (isValid(parsed)) {
			return startOfDay(parsed);
		}
	}
	return null;
};

const lenient =
	(formats: readonly string[]) =>
	(value: unknown): Date | null => {
		const native = nativeDate(value);
		if (native) {
			return native;
		}
		const text = dateText(value);
		if (!text) {
			return null;
		}
		const iso = parseISO(text);
		return isValid(iso) ? startOfDay(iso) : parseWithFormats(text, formats);
	};

const strict =
	(pattern: string) =>
	(value: unknown): Date | null => {
		const native = nativeDate(value);
		if (native) {
			return native;
		}
		const text = dateText(value);
		return text ? parseWithFormats(text, [pattern]) : null;
	};

const serialNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && NUMERIC_TEXT.test(value.trim())) {
		return Number(value.trim());
	}
	return null;
};

const parseSerial = (value: unknown): Date | null => {
	const serial = serialNumber(value);
	if (serial === null || serial < SERIAL_MIN || serial > SERIAL_MAX) {
		return null;
	}
	return addDays(EXCEL_EPOCH, Math.floor(serial));
};

const isBlank = (value: unknown): boolean =>
	value === null ||
	value === undefined ||
	(typeof value === "string" && value.trim() === "");

/**
 * A column is treated as spreadsheet day counts when most non-blank values are
 * numeric and most of those fall in the plausible serial range.
 */
export const looksLikeSerialDates = (values: readonly unknown[]): boolean => {
	const present = values.filter((value) => !isBlank(value));
	const numeric = present
		.map(serialNumber)
		.filter((value): value is number => value !== null);
	if (!present.length || numeric.length <= present.length / 2) {
		return false;
	}
	const inRange = numeric.filter(
		(value) => value >= SERIAL_MIN && value <= SERIAL_MAX
	);
	return inRange.length > numeric.length / 2;
};

const STRATEGIES: DateStrategy[] = [
	{ id: "default", parse: lenient(MONTH_FIRST_FORMATS) },
	{ id: "dayfirst", parse: lenient(DAY_FIRST_FORMATS) },
	...EXPLICIT_FORMATS.map((pattern) => ({ id: pattern, parse: strict(pattern) })),
];

const SERIAL_STRATEGY: DateStrategy = { id: "excel_serial", parse: parseSerial };

const runStrategy = (
	strategy: DateStrategy,
	values: readonly unknown[]
): DateParseOutcome => {
	const dates = values.map((value) => strategy.parse(value));
	const parsed = dates.filter((date) => date !== null).length;
	return {
		strategy: strategy.id,
		dates,
		successRate: values.length ? parsed / values.length : 0,
	};
};

/** Tries every strategy and keeps the first one with the highest success rate. */
export const detectDateStrategy = (
	values: readonly unknown[]
): DateParseOutcome => {
	const candidates = looksLikeSerialDates(values)
		? [...STRATEGIES, SERIAL_STRATEGY]
		: STRATEGIES;
	let best = runStrategy(candidates[0], values);
	for (const strategy of candidates.slice(1)) {
		const outcome = runStrategy(strategy, values);
		if (outcome.successRate > best.successRate) {
			best = outcome;
		}
	}
	return best;
};

export const requiredDateSuccessRate = (rowCount: number): number =>
	rowCount >= 30 ? 0.8 : 0.5;

/**
 * Parse a full date column
 * @throws ValidationError naming the column when too few rows parse
 */
export const parseDateColumn = (
	values: readonly unknown[],
	column: string
): DateParseOutcome => {
	const outcome = detectDateStrategy(values);
	const required = requiredDateSuccessRate(values.length);
	if (outcome.successRate < required) {
		throw new ValidationError(
			`Column "${column}" could not be parsed as dates: best strategy "${outcome.strategy}" parsed ${(
				outcome.successRate * 100
			).toFixed(1)}% of rows, ${required * 100}% required`,
			column
		);
	}
	return outcome;
};

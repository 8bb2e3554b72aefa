import { rollingStd, sma } from "./sma";

/**
 * Window statistics over the `period` values strictly before `index`, so a
 * feature row never sees the value it is used to predict.
 */
export const trailingMean = (
	values: readonly number[],
	index: number,
	period: number
): number | null => sma(values.slice(0, Math.max(index, 0)), period);

export const trailingStd = (
	values: readonly number[],
	index: number,
	period: number
): number | null => rollingStd(values.slice(0, Math.max(index, 0)), period);

/** Value `lag` steps before `index`, or null before the start. */
export const lagValue = (
	values: readonly number[],
	index: number,
	lag: number
): number | null => {
	const position = index - lag;
	return position >= 0 && position < values.length ? values[position] : null;
};

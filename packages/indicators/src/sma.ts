/** Mean of the last `period` values, or null when there are fewer. */
export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return sum / period;
}

/** Sample standard deviation of the last `period` values (needs period >= 2). */
export function rollingStd(
	values: readonly number[],
	period: number
): number | null {
	if (period < 2 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const mean = window.reduce((acc, value) => acc + value, 0) / period;
	const squares = window.reduce((acc, value) => acc + (value - mean) ** 2, 0);
	return Math.sqrt(squares / (period - 1));
}

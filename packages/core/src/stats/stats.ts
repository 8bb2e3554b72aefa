export const sum = (values: readonly number[]): number =>
	values.reduce((acc, value) => acc + value, 0);

export const mean = (values: readonly number[]): number =>
	values.length ? sum(values) / values.length : 0;

/** Population standard deviation (divides by n). */
export const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const avg = mean(values);
	const variance =
		values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / values.length;
	return Math.sqrt(variance);
};

/** Sample standard deviation (divides by n - 1). */
export const sampleStandardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const avg = mean(values);
	const variance =
		values.reduce((acc, value) => acc + (value - avg) ** 2, 0) /
		(values.length - 1);
	return Math.sqrt(variance);
};

export const median = (values: readonly number[]): number | null => {
	if (!values.length) {
		return null;
	}
	const sorted = [...values].sort((a, b) => a - b);
	const mid = Math.floor(sorted.length / 2);
	return sorted.length % 2 === 0
		? (sorted[mid - 1] + sorted[mid]) / 2
		: sorted[mid];
};

/** Ratio with a zero-denominator guard: returns null instead of Infinity/NaN. */
export const safeDivide = (
	numerator: number,
	denominator: number
): number | null => {
	if (denominator === 0 || !Number.isFinite(denominator)) {
		return null;
	}
	return numerator / denominator;
};

export const round = (value: number, digits = 2): number =>
	parseFloat(value.toFixed(digits));

export const roundOrNull = (value: number | null, digits = 2): number | null =>
	value === null ? null : round(value, digits);

export const clamp = (value: number, min: number, max: number): number =>
	Math.min(Math.max(value, min), max);

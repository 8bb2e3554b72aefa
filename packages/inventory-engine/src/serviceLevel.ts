import { normalQuantile, ValidationError } from "@replenish/core";

const Z_TABLE = new Map<number, number>([
	[0.9, 1.28],
	[0.95, 1.65],
	[0.99, 2.33],
]);

/**
 * One-sided z-score for a cycle service level. The common levels use the
 * tabulated two-decimal values; anything else uses the normal quantile.
 */
export const zScoreFor = (serviceLevel: number): number => {
	if (!(serviceLevel > 0 && serviceLevel < 1)) {
		throw new ValidationError(
			`Service level must be between 0 and 1 (exclusive), got ${serviceLevel}`
		);
	}
	return Z_TABLE.get(serviceLevel) ?? normalQuantile(serviceLevel);
};

import { z } from "zod";
import { ValidationError } from "@replenish/core";

const probability = z.number().gt(0).lt(1);
const horizon = z.number().int().positive();

export const forecastRequestSchema = z.object({
	model: z.string().min(1),
	horizon: horizon.optional(),
	confidenceLevel: probability.optional(),
});

export const backtestRequestSchema = z.object({
	model: z.string().min(1),
	testWindow: z.number().int().positive().optional(),
});

export const compareRequestSchema = z.object({
	models: z.array(z.string().min(1)).min(1).default(["additive", "arima", "boosted_trees"]),
	horizon: horizon.optional(),
	withBacktest: z.boolean().default(false),
	testWindow: z.number().int().positive().optional(),
});

const costsSchema = z
	.object({
		holdingCostRate: z.number().positive(),
		orderingCost: z.number().positive(),
		stockoutCostRate: z.number().min(0),
		spoilageRate: z.number().min(0),
	})
	.partial();

const inventoryInputs = {
	model: z.string().min(1).default("additive"),
	horizon: horizon.optional(),
	leadTimeDays: z.number().min(1).optional(),
	serviceLevel: probability.optional(),
	costs: costsSchema.optional(),
	currentInventory: z.number().min(0).nullable().optional(),
};

export const optimizeRequestSchema = z.object({
	...inventoryInputs,
	/** Plan against a fresh forecast, or against the raw history */
	source: z.enum(["forecast", "history"]).default("forecast"),
});

export const scenarioRequestSchema = z.object({
	...inventoryInputs,
	scenarios: z
		.array(
			z.object({
				name: z.string().min(1),
				promotionLiftPct: z.number().min(-1).optional(),
				seasonalityFactor: z.number().min(0).optional(),
			})
		)
		.min(1),
});

export type ForecastRequest = z.input<typeof forecastRequestSchema>;
export type BacktestRequest = z.input<typeof backtestRequestSchema>;
export type CompareRequest = z.input<typeof compareRequestSchema>;
export type OptimizeRequest = z.input<typeof optimizeRequestSchema>;
export type ScenarioRequest = z.input<typeof scenarioRequestSchema>;

/**
 * Validate a request body
 * @throws ValidationError naming every invalid field
 */
export const parseRequest = <S extends z.ZodTypeAny>(
	label: string,
	schema: S,
	input: unknown
): z.output<S> => {
	const result = schema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ValidationError(`Invalid ${label} request: ${issues}`);
	}
	return result.data;
};

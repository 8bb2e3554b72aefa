import { UnsupportedModelError } from "@replenish/core";

export const MODEL_IDS = [
	"arima",
	"sarima",
	"additive",
	"boosted_trees",
	"recurrent",
	"ensemble",
] as const;

export type ModelId = (typeof MODEL_IDS)[number];

/** Models an ensemble may combine. */
export type MemberModelId = Exclude<ModelId, "ensemble">;

export const DEFAULT_ENSEMBLE_MEMBERS: readonly MemberModelId[] = [
	"arima",
	"additive",
	"boosted_trees",
];

const MODEL_ALIASES = new Map<string, ModelId>([
	["prophet", "additive"],
	["xgboost", "boosted_trees"],
	["lstm", "recurrent"],
	["seasonal_arima", "sarima"],
]);

export const isModelId = (value: unknown): value is ModelId =>
	typeof value === "string" && MODEL_IDS.some((id) => id === value);

export const isMemberModelId = (value: unknown): value is MemberModelId =>
	isModelId(value) && value !== "ensemble";

/** Canonical id for a user-supplied name or alias, or null when unknown. */
export const resolveModelId = (value: string): ModelId | null => {
	const normalized = value.trim().toLowerCase();
	if (isModelId(normalized)) {
		return normalized;
	}
	return MODEL_ALIASES.get(normalized) ?? null;
};

/**
 * Parse a model identifier (case-insensitive, aliases accepted)
 * @throws UnsupportedModelError listing the available ids
 */
export const parseModelId = (value: string): ModelId => {
	const resolved = resolveModelId(value);
	if (!resolved) {
		throw new UnsupportedModelError(value, MODEL_IDS);
	}
	return resolved;
};

/**
 * Parse configured ensemble members
 * @throws UnsupportedModelError for unknown ids or a nested ensemble
 */
export const parseMemberModelIds = (values: readonly string[]): MemberModelId[] =>
	values.map((value) => {
		const resolved = resolveModelId(value);
		if (!isMemberModelId(resolved)) {
			throw new UnsupportedModelError(
				value,
				MODEL_IDS.filter((id) => id !== "ensemble")
			);
		}
		return resolved;
	});

import { UnsupportedModelError } from "@replenish/core";
import { MODEL_IDS } from "./modelIds";
import type { ModelId } from "./modelIds";
import type { ForecastStrategy, MemberRunner } from "./types";
import { additiveStrategy } from "./strategies/additiveStrategy";
import { createArimaStrategy } from "./strategies/arimaStrategy";
import { boostedTreesStrategy } from "./strategies/boostedTreesStrategy";
import { createEnsembleStrategy } from "./strategies/ensembleStrategy";
import { recurrentStrategy } from "./strategies/recurrentStrategy";

/** Strategy for a canonical model id; the switch is exhaustive over ModelId. */
export const createStrategy = (
	id: ModelId,
	runMember: MemberRunner
): ForecastStrategy => {
	switch (id) {
		case "arima":
		case "sarima":
			return createArimaStrategy(id);
		case "additive":
			return additiveStrategy;
		case "boosted_trees":
			return boostedTreesStrategy;
		case "recurrent":
			return recurrentStrategy;
		case "ensemble":
			return createEnsembleStrategy(runMember);
		default: {
			const unreachable: never = id;
			throw new UnsupportedModelError(String(unreachable), MODEL_IDS);
		}
	}
};

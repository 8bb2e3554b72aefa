import { createLogger, mean, ModelFitError, toErrorPayload } from "@replenish/core";
import type { ForecastResult } from "@replenish/core";
import type { ForecastStrategy, MemberFailure, MemberRunner } from "../types";
import { MIN_FIT_HISTORY, MIN_HISTORY } from "./arimaStrategy";

const logger = createLogger("forecasting");

/**
 * Runs each member and combines the survivors: mean of the point forecasts,
 * minimum of the lower bounds, maximum of the upper bounds.
 */
export const createEnsembleStrategy = (runMember: MemberRunner): ForecastStrategy => ({
	id: "ensemble",
	minHistory: () => MIN_HISTORY,
	minFitHistory: () => MIN_FIT_HISTORY,
	run: (context) => {
		const results: ForecastResult[] = [];
		const skipped: MemberFailure[] = [];
		for (const member of context.options.ensembleMembers) {
			try {
				results.push(runMember(member, context));
			} catch (error) {
				const payload = toErrorPayload(error);
				skipped.push({ model: member, ...payload });
				logger.warn("ensemble_member_skipped", { model: member, ...payload });
			}
		}

		if (!results.length) {
			throw new ModelFitError(
				"ensemble",
				`every member failed (${skipped
					.map((failure) => `${failure.model}: ${failure.message}`)
					.join("; ")})`
			);
		}

		const perDate = (pick: (result: ForecastResult) => readonly number[]) =>
			context.futureDates.map((_, index) => results.map((result) => pick(result)[index]));

		return {
			forecast: perDate((result) => result.forecast).map(mean),
			lower: perDate((result) => result.lower).map((values) => Math.min(...values)),
			upper: perDate((result) => result.upper).map((values) => Math.max(...values)),
			historicalFit: null,
			members: results.map((result) => result.model),
			skipped,
		};
	},
});

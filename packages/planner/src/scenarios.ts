import {
	createLogger,
	demandValues,
	mapDemand,
	mean,
	round,
	safeDivide,
	toErrorPayload,
	ValidationError,
} from "@replenish/core";
import type { ForecastResult, TimeSeries } from "@replenish/core";
import { forecast } from "@replenish/forecasting";
import { optimizeInventory } from "@replenish/inventory-engine";
import type { InventoryPolicy } from "@replenish/inventory-engine";
import { errorEntry } from "./compareModels";
import { DeferredTaskRunner, settleKeyed } from "./taskRunner";
import type {
	AsyncDispatchOptions,
	Scenario,
	ScenarioImpact,
	ScenarioOptions,
	ScenarioOutcome,
} from "./types";

const logger = createLogger("planner");

export const SCENARIO_DEFAULTS = {
	modelId: "additive",
	horizon: 30,
	confidenceLevel: 0.95,
	leadTimeDays: 7,
	serviceLevel: 0.95,
} as const;

interface PlannedDemand {
	forecast: ForecastResult;
	policy: InventoryPolicy;
}

interface Baseline {
	meanDemand: number;
	planned: PlannedDemand | null;
}

/** Demand multiplier of a scenario: (1 + lift) × seasonality factor. */
export const scenarioMultiplier = (scenario: Scenario): number => {
	const lift = scenario.promotionLiftPct ?? 0;
	const factor = scenario.seasonalityFactor ?? 1;
	if (!Number.isFinite(lift) || lift < -1) {
		throw new ValidationError(
			`Scenario "${scenario.name}": promotion lift must be at least -1, got ${lift}`
		);
	}
	if (!Number.isFinite(factor) || factor < 0) {
		throw new ValidationError(
			`Scenario "${scenario.name}": seasonality factor must not be negative, got ${factor}`
		);
	}
	return (1 + lift) * factor;
};

export const applyScenario = (series: TimeSeries, scenario: Scenario): TimeSeries => {
	const multiplier = scenarioMultiplier(scenario);
	return mapDemand(series, (demand) => demand * multiplier);
};

const plan = (series: TimeSeries, options: ScenarioOptions): PlannedDemand => {
	const result = forecast(
		series,
		options.modelId ?? SCENARIO_DEFAULTS.modelId,
		options.horizon ?? SCENARIO_DEFAULTS.horizon,
		options.confidenceLevel ?? SCENARIO_DEFAULTS.confidenceLevel,
		options.forecastOptions
	);
	const policy = optimizeInventory(
		result,
		options.leadTimeDays ?? SCENARIO_DEFAULTS.leadTimeDays,
		options.serviceLevel ?? SCENARIO_DEFAULTS.serviceLevel,
		options.costParams,
		options.currentInventory ?? null,
		options.inventoryOptions
	);
	return { forecast: result, policy };
};

const relativeChange = (next: number, base: number): number | null => {
	const ratio = safeDivide(next - base, base);
	return ratio === null ? null : round(ratio, 6);
};

/** Plans the unmodified series once; impacts are measured against it. */
const planBaseline = (series: TimeSeries, options: ScenarioOptions): Baseline => {
	const meanDemand = mean(demandValues(series));
	try {
		return { meanDemand, planned: plan(series, options) };
	} catch (error) {
		logger.warn("scenario_baseline_failed", { error: toErrorPayload(error) });
		return { meanDemand, planned: null };
	}
};

const measureImpact = (
	scenarioSeries: TimeSeries,
	planned: PlannedDemand,
	baseline: Baseline
): ScenarioImpact => {
	const base = baseline.planned;
	return {
		salesChange: relativeChange(mean(demandValues(scenarioSeries)), baseline.meanDemand),
		forecastMeanChange: base
			? relativeChange(mean(planned.forecast.forecast), mean(base.forecast.forecast))
			: null,
		reorderPointChange: base
			? round(planned.policy.reorderPoint - base.policy.reorderPoint)
			: null,
	};
};

const runOne = (
	series: TimeSeries,
	scenario: Scenario,
	baseline: Baseline,
	options: ScenarioOptions
): ScenarioOutcome => {
	try {
		const scenarioSeries = applyScenario(series, scenario);
		const planned = plan(scenarioSeries, options);
		return {
			status: "ok",
			scenario: { ...scenario },
			forecast: planned.forecast,
			inventoryPolicy: planned.policy,
			impact: measureImpact(scenarioSeries, planned, baseline),
		};
	} catch (error) {
		return errorEntry(error);
	}
};

const assertUniqueNames = (scenarios: readonly Scenario[]): void => {
	const seen = new Set<string>();
	for (const scenario of scenarios) {
		if (!scenario.name.trim()) {
			throw new ValidationError("Scenario names must not be empty");
		}
		if (seen.has(scenario.name)) {
			throw new ValidationError(`Duplicate scenario name: "${scenario.name}"`);
		}
		seen.add(scenario.name);
	}
};

const logScenarios = (results: Record<string, ScenarioOutcome>): void => {
	logger.info("scenario_analysis", {
		outcomes: Object.fromEntries(
			Object.entries(results).map(([name, outcome]) => [
				name,
				outcome.status === "ok" ? "ok" : outcome.error.kind,
			])
		),
	});
};

/**
 * Forecast and plan inventory for each demand scenario, keyed by scenario
 * name. Failures stay with their scenario.
 * @throws ValidationError for empty or duplicate scenario names
 */
export const runScenarios = (
	series: TimeSeries,
	scenarios: readonly Scenario[],
	options: ScenarioOptions = {}
): Record<string, ScenarioOutcome> => {
	assertUniqueNames(scenarios);
	const baseline = planBaseline(series, options);
	const results: Record<string, ScenarioOutcome> = Object.fromEntries(
		scenarios.map((scenario) => [scenario.name, runOne(series, scenario, baseline, options)])
	);
	logScenarios(results);
	return results;
};

export const runScenariosAsync = async (
	series: TimeSeries,
	scenarios: readonly Scenario[],
	options: ScenarioOptions & AsyncDispatchOptions = {}
): Promise<Record<string, ScenarioOutcome>> => {
	assertUniqueNames(scenarios);
	const runner = options.runner ?? new DeferredTaskRunner();
	const baseline = await runner.run("baseline", () => planBaseline(series, options));
	const results = await settleKeyed<ScenarioOutcome>(
		scenarios.map(
			(scenario) => [scenario.name, () => runOne(series, scenario, baseline, options)] as const
		),
		runner,
		options.timeoutMs,
		(_, error) => errorEntry(error)
	);
	logScenarios(results);
	return results;
};

import { backtest } from "@replenish/backtest-core";
import type { BacktestResult } from "@replenish/backtest-core";
import {
	createLogger,
	DEFAULT_PLANNER_CONFIG,
	SessionNotFoundError,
} from "@replenish/core";
import type { ForecastResult, PlannerConfig, RawTable } from "@replenish/core";
import { prepare, summarizeSeries } from "@replenish/data";
import type {
	CanonicalizationStats,
	ColumnMapping,
	PrepareOptions,
	PreparedSeries,
	SeriesSummary,
} from "@replenish/data";
import { forecast } from "@replenish/forecasting";
import { InventoryOptimizer } from "@replenish/inventory-engine";
import type { InventoryPolicy } from "@replenish/inventory-engine";
import { InMemorySessionStore } from "@replenish/persistence";
import type { SessionStore } from "@replenish/persistence";
import { compareModelsAsync } from "./compareModels";
import { planningDefaults } from "./planningDefaults";
import {
	backtestRequestSchema,
	compareRequestSchema,
	forecastRequestSchema,
	optimizeRequestSchema,
	parseRequest,
	scenarioRequestSchema,
} from "./requests";
import type {
	BacktestRequest,
	CompareRequest,
	ForecastRequest,
	OptimizeRequest,
	ScenarioRequest,
} from "./requests";
import { runScenariosAsync } from "./scenarios";
import { DeferredTaskRunner, dispatchTask } from "./taskRunner";
import type { PlanningTask, TaskRunner } from "./taskRunner";
import type { ComparisonEntry, ScenarioOutcome } from "./types";

const logger = createLogger("planner");

export interface PlanningSession {
	prepared: PreparedSeries;
	summary: SeriesSummary;
}

export interface UploadReceipt {
	sessionId: string;
	expiresAt: number;
	mapping: ColumnMapping;
	stats: CanonicalizationStats;
	summary: SeriesSummary;
}

export interface PlanningServiceOptions {
	store?: SessionStore<PlanningSession>;
	config?: PlannerConfig;
	runner?: TaskRunner;
}

export interface PlanningService {
	upload(table: RawTable, options?: PrepareOptions): Promise<UploadReceipt>;
	summary(sessionId: string): Promise<SeriesSummary>;
	forecast(sessionId: string, request: ForecastRequest): Promise<ForecastResult>;
	backtest(sessionId: string, request: BacktestRequest): Promise<BacktestResult>;
	compare(
		sessionId: string,
		request?: CompareRequest
	): Promise<Record<string, ComparisonEntry>>;
	optimize(sessionId: string, request?: OptimizeRequest): Promise<InventoryPolicy>;
	scenarios(
		sessionId: string,
		request: ScenarioRequest
	): Promise<Record<string, ScenarioOutcome>>;
	close(sessionId: string): Promise<boolean>;
}

/**
 * Session-bound entry point over the planning core. Uploaded tables are
 * prepared once and kept in `store`; every later call names its session.
 */
export const createPlanningService = (
	options: PlanningServiceOptions = {}
): PlanningService => {
	const config = options.config ?? DEFAULT_PLANNER_CONFIG;
	const defaults = planningDefaults(config);
	const store =
		options.store ??
		new InMemorySessionStore<PlanningSession>({ ttlMs: config.sessions.ttlMs });
	const runner = options.runner ?? new DeferredTaskRunner();
	const optimizer = new InventoryOptimizer(defaults.inventory);

	const dispatch = <T>(label: string, task: PlanningTask<T>): Promise<T> =>
		dispatchTask(label, runner, task, defaults.timeoutMs);

	const load = async (sessionId: string): Promise<PlanningSession> => {
		const record = await store.get(sessionId);
		if (!record) {
			throw new SessionNotFoundError(sessionId);
		}
		return record.data;
	};

	return {
		async upload(table, prepareOptions) {
			const prepared = await dispatch("prepare", () => prepare(table, prepareOptions));
			const summary = summarizeSeries(prepared.series, prepared.inventory);
			const record = await store.create({ prepared, summary });
			logger.info("session_uploaded", {
				sessionId: record.id,
				periods: prepared.series.points.length,
				frequency: prepared.series.frequency,
			});
			return {
				sessionId: record.id,
				expiresAt: record.expiresAt,
				mapping: prepared.mapping,
				stats: prepared.stats,
				summary,
			};
		},

		async summary(sessionId) {
			return (await load(sessionId)).summary;
		},

		async forecast(sessionId, request) {
			const body = parseRequest("forecast", forecastRequestSchema, request);
			const { prepared } = await load(sessionId);
			return dispatch(body.model, () =>
				forecast(
					prepared.series,
					body.model,
					body.horizon ?? defaults.horizon,
					body.confidenceLevel ?? defaults.confidenceLevel,
					defaults.forecastOptions
				)
			);
		},

		async backtest(sessionId, request) {
			const body = parseRequest("backtest", backtestRequestSchema, request);
			const { prepared } = await load(sessionId);
			return dispatch(body.model, () =>
				backtest(prepared.series, body.model, body.testWindow, {
					confidenceLevel: defaults.confidenceLevel,
					mapeZeroThreshold: defaults.mapeZeroThreshold,
					forecastOptions: defaults.forecastOptions,
				})
			);
		},

		async compare(sessionId, request = {}) {
			const body = parseRequest("compare", compareRequestSchema, request);
			const { prepared } = await load(sessionId);
			return compareModelsAsync(prepared.series, body.models, body.horizon ?? defaults.horizon, {
				confidenceLevel: defaults.confidenceLevel,
				withBacktest: body.withBacktest,
				testWindow: body.testWindow,
				mapeZeroThreshold: defaults.mapeZeroThreshold,
				forecastOptions: defaults.forecastOptions,
				runner,
				timeoutMs: defaults.timeoutMs,
			});
		},

		async optimize(sessionId, request = {}) {
			const body = parseRequest("optimize", optimizeRequestSchema, request);
			const { prepared } = await load(sessionId);
			const costs = { ...defaults.inventory.costs, ...body.costs };
			const policyOptimizer = body.costs
				? new InventoryOptimizer({ ...defaults.inventory, costs })
				: optimizer;
			const currentInventory =
				body.currentInventory === undefined
					? prepared.latestInventory
					: body.currentInventory;
			return dispatch("optimize", () => {
				const demand =
					body.source === "history"
						? prepared.series
						: forecast(
								prepared.series,
								body.model,
								body.horizon ?? defaults.horizon,
								defaults.confidenceLevel,
								defaults.forecastOptions
							);
				return policyOptimizer.optimize(
					demand,
					body.leadTimeDays ?? defaults.leadTimeDays,
					body.serviceLevel ?? defaults.serviceLevel,
					currentInventory
				);
			});
		},

		async scenarios(sessionId, request) {
			const body = parseRequest("scenarios", scenarioRequestSchema, request);
			const { prepared } = await load(sessionId);
			return runScenariosAsync(prepared.series, body.scenarios, {
				modelId: body.model,
				horizon: body.horizon ?? defaults.horizon,
				confidenceLevel: defaults.confidenceLevel,
				leadTimeDays: body.leadTimeDays ?? defaults.leadTimeDays,
				serviceLevel: body.serviceLevel ?? defaults.serviceLevel,
				costParams: { ...defaults.inventory.costs, ...body.costs },
				currentInventory:
					body.currentInventory === undefined
						? prepared.latestInventory
						: body.currentInventory,
				inventoryOptions: {
					thresholds: defaults.inventory.thresholds,
					triggers: defaults.inventory.triggers,
				},
				forecastOptions: defaults.forecastOptions,
				runner,
				timeoutMs: defaults.timeoutMs,
			});
		},

		async close(sessionId) {
			return store.delete(sessionId);
		},
	};
};

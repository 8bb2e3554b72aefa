export * from "./types";
export {
	DeferredTaskRunner,
	dispatchTask,
	settleKeyed,
	withDeadline,
	withTimeout,
} from "./taskRunner";
export type { PlanningTask, TaskRunner } from "./taskRunner";
export {
	compareModels,
	compareModelsAsync,
	compareOne,
	historicalFitMetrics,
} from "./compareModels";
export {
	applyScenario,
	runScenarios,
	runScenariosAsync,
	SCENARIO_DEFAULTS,
	scenarioMultiplier,
} from "./scenarios";
export { planningDefaults } from "./planningDefaults";
export type { PlanningDefaults } from "./planningDefaults";
export * from "./requests";
export { createPlanningService } from "./planningService";
export type {
	PlanningService,
	PlanningServiceOptions,
	PlanningSession,
	UploadReceipt,
} from "./planningService";

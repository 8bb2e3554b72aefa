import type { ForecastResult, TimeSeries } from "@replenish/core";
import type {
	AdditiveOptions,
	BoostingOptions,
	RecurrentOptions,
} from "@replenish/models-quant";
import type { MemberModelId, ModelId } from "./modelIds";

export interface ModelTuning {
	arima?: { ridge?: number };
	additive?: Pick<
		AdditiveOptions,
		"maxChangepoints" | "changepointRange" | "changepointPenalty" | "seasonalityPenalty"
	>;
	boostedTrees?: Omit<BoostingOptions, "seed">;
	recurrent?: Omit<RecurrentOptions, "seed">;
}

export interface ForecastOptions {
	includeSeasonality?: boolean;
	seed?: number;
	/** σ of the default interval as a share of the forecast's own spread */
	intervalSpreadFactor?: number;
	ensembleMembers?: readonly MemberModelId[];
	tuning?: ModelTuning;
}

export type ResolvedForecastOptions = Required<Omit<ForecastOptions, "tuning">> & {
	tuning: ModelTuning;
};

export interface StrategyContext {
	series: TimeSeries;
	values: readonly number[];
	horizon: number;
	confidenceLevel: number;
	/** Two-sided normal quantile for `confidenceLevel` */
	z: number;
	futureDates: readonly string[];
	options: ResolvedForecastOptions;
}

export interface MemberFailure {
	model: string;
	kind: string;
	message: string;
}

export interface StrategyOutput {
	forecast: number[];
	/** null when the model has no interval of its own */
	lower: number[] | null;
	upper: number[] | null;
	historicalFit: { dates: string[]; values: number[] } | null;
	members?: string[];
	skipped?: MemberFailure[];
}

export interface ForecastStrategy {
	readonly id: ModelId;
	/** Shortest history a forecast request may use */
	minHistory(series: TimeSeries): number;
	/** Shortest history the model itself can be fitted on */
	minFitHistory(series: TimeSeries): number;
	run(context: StrategyContext): StrategyOutput;
}

/** Runs one member model to completion; used by the ensemble. */
export type MemberRunner = (
	modelId: MemberModelId,
	context: StrategyContext
) => ForecastResult;

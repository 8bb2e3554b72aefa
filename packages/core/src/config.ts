import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { loadEnvFiles, readNumericEnvVar, readOptionalEnvVar } from "./env";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
	envOverrides?: string[];
}

const CONFIG_META_SYMBOL = Symbol.for("replenish.config.meta");

const configMetadataSchema = z.object({
	path: z.string().optional(),
	source: z.enum(["file", "embedded", "merged"]),
	profile: z.string().optional(),
	envOverrides: z.array(z.string()).optional(),
});

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const parsed = configMetadataSchema.safeParse(
		Reflect.get(config, CONFIG_META_SYMBOL)
	);
	return parsed.success ? parsed.data : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config) ?? {};
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

const probability = z.number().gt(0).lt(1);

export const plannerConfigSchema = z.object({
	forecast: z.object({
		horizon: z.number().int().positive(),
		confidenceLevel: probability,
		seed: z.number().int(),
		includeSeasonality: z.boolean(),
		intervalSpreadFactor: z.number().positive(),
		ensembleMembers: z.array(z.string().min(1)).min(1),
	}),
	backtest: z.object({
		mapeZeroThreshold: z.number().min(0),
	}),
	inventory: z.object({
		leadTimeDays: z.number().min(1),
		serviceLevel: probability,
		costs: z.object({
			holdingCostRate: z.number().positive(),
			orderingCost: z.number().positive(),
			stockoutCostRate: z.number().min(0),
			spoilageRate: z.number().min(0),
		}),
		thresholds: z
			.object({
				stockoutCritical: z.number().min(0),
				stockoutWarning: z.number().min(0),
				overstockWarning: z.number().positive(),
				overstockCritical: z.number().positive(),
			})
			.refine((value) => value.stockoutCritical <= value.stockoutWarning, {
				message: "stockoutCritical must not exceed stockoutWarning",
			})
			.refine((value) => value.overstockWarning <= value.overstockCritical, {
				message: "overstockWarning must not exceed overstockCritical",
			}),
		triggers: z.object({
			stockoutRisk: z.number().min(0).max(1),
			overstockRisk: z.number().min(0).max(1),
			costRatio: z.number().positive(),
		}),
	}),
	sessions: z.object({
		ttlMs: z.number().int().positive(),
	}),
	tasks: z.object({
		timeoutMs: z.number().int().positive().nullable(),
	}),
});

export type PlannerConfig = z.infer<typeof plannerConfigSchema>;

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
	forecast: {
		horizon: 30,
		confidenceLevel: 0.95,
		seed: 42,
		includeSeasonality: true,
		intervalSpreadFactor: 0.1,
		ensembleMembers: ["arima", "additive", "boosted_trees"],
	},
	backtest: {
		mapeZeroThreshold: 0,
	},
	inventory: {
		leadTimeDays: 7,
		serviceLevel: 0.95,
		costs: {
			holdingCostRate: 0.2,
			orderingCost: 100,
			stockoutCostRate: 0.5,
			spoilageRate: 0.1,
		},
		thresholds: {
			stockoutCritical: 0.1,
			stockoutWarning: 0.2,
			overstockWarning: 2,
			overstockCritical: 3,
		},
		triggers: {
			stockoutRisk: 0.3,
			overstockRisk: 0.3,
			costRatio: 3,
		},
	},
	sessions: {
		ttlMs: 3_600_000,
	},
	tasks: {
		timeoutMs: null,
	},
};

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return (
		typeof parsed === "object" && parsed !== null && "workspaces" in parsed
	);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Planner config not found: ${filePath}`);
	}
	return JSON.parse(fs.readFileSync(filePath, "utf-8"));
};

const formatIssues = (error: z.ZodError): string =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");

interface EnvOverride {
	key: string;
	apply: (config: PlannerConfig, value: number) => void;
}

const ENV_OVERRIDES: EnvOverride[] = [
	{
		key: "REPLENISH_DEFAULT_HORIZON",
		apply: (config, value) => {
			config.forecast.horizon = value;
		},
	},
	{
		key: "REPLENISH_CONFIDENCE_LEVEL",
		apply: (config, value) => {
			config.forecast.confidenceLevel = value;
		},
	},
	{
		key: "REPLENISH_LEAD_TIME_DAYS",
		apply: (config, value) => {
			config.inventory.leadTimeDays = value;
		},
	},
	{
		key: "REPLENISH_SERVICE_LEVEL",
		apply: (config, value) => {
			config.inventory.serviceLevel = value;
		},
	},
	{
		key: "REPLENISH_SESSION_TTL_MS",
		apply: (config, value) => {
			config.sessions.ttlMs = value;
		},
	},
	{
		key: "REPLENISH_TASK_TIMEOUT_MS",
		apply: (config, value) => {
			config.tasks.timeoutMs = value;
		},
	},
];

/**
 * Load the planner profile from `<configDir>/planner/<profile>.json`, apply
 * environment overrides and validate the result.
 * @throws Error naming every invalid field
 */
export const loadPlannerConfig = (
	options: ConfigLoadOptions = {}
): PlannerConfig => {
	const workspaceRoot = findWorkspaceRoot();
	loadEnvFiles(workspaceRoot, options.envPath);

	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const profile =
		options.profile ?? readOptionalEnvVar("REPLENISH_PLANNER_PROFILE") ?? "default";
	const profilePath = path.join(configDir, "planner", `${profile}.json`);

	const fileResult = plannerConfigSchema.safeParse(readJsonFile(profilePath));
	if (!fileResult.success) {
		throw new Error(
			`Invalid planner config at ${profilePath}: ${formatIssues(fileResult.error)}`
		);
	}

	const config = fileResult.data;
	const applied: string[] = [];
	for (const override of ENV_OVERRIDES) {
		const value = readNumericEnvVar(override.key);
		if (value !== undefined) {
			override.apply(config, value);
			applied.push(override.key);
		}
	}

	const finalResult = plannerConfigSchema.safeParse(config);
	if (!finalResult.success) {
		throw new Error(
			`Invalid planner config after environment overrides (${applied.join(", ")}): ${formatIssues(finalResult.error)}`
		);
	}

	return withConfigMetadata(finalResult.data, {
		source: applied.length ? "merged" : "file",
		path: profilePath,
		profile,
		envOverrides: applied,
	});
};

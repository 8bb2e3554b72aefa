export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitizeValue(base, new WeakSet())));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export function debug(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "debug", event, module: moduleName, ...data });
}

export function info(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "info", event, module: moduleName, ...data });
}

export function warn(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "warn", event, module: moduleName, ...data });
}

export function error(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "error", event, module: moduleName, ...data });
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object>
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone = Object.fromEntries(
			Object.entries(value).map(([key, nested]) => [key, sanitizeValue(nested, seen)])
		);
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "forecast_generated": {
				printForecast(rest);
				break;
			}
			case "backtest_completed": {
				printBacktest(rest);
				break;
			}
			case "inventory_policy": {
				printInventoryPolicy(rest);
				break;
			}
			case "model_comparison":
			case "scenario_analysis": {
				printKeyedOutcomes(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const numberField = (
	source: Record<string, unknown>,
	key: string
): number | null => {
	const value = source[key];
	return typeof value === "number" ? value : null;
};

const textField = (source: Record<string, unknown>, key: string): string => {
	const value = source[key];
	return value === undefined || value === null ? "-" : String(value);
};

const recordField = (
	source: Record<string, unknown>,
	key: string
): Record<string, unknown> => {
	const value = source[key];
	if (value && typeof value === "object" && !Array.isArray(value)) {
		return Object.fromEntries(Object.entries(value));
	}
	return {};
};

const printForecast = (rest: Record<string, unknown>): void => {
	console.table([
		{
			model: textField(rest, "model"),
			horizon: numberField(rest, "horizon"),
			confidence: numberField(rest, "confidenceLevel"),
			meanForecast: numberField(rest, "meanForecast"),
			first: textField(rest, "firstDate"),
			last: textField(rest, "lastDate"),
		},
	]);
};

const printBacktest = (rest: Record<string, unknown>): void => {
	const baseline = recordField(rest, "baselineMetric");
	const model = recordField(rest, "modelMetric");
	console.table([
		{
			model: textField(rest, "model"),
			window: numberField(rest, "testWindowLength"),
			baselineMape: numberField(baseline, "mape"),
			modelMape: numberField(model, "mape"),
			baselineWape: numberField(baseline, "wape"),
			modelWape: numberField(model, "wape"),
			rmse: numberField(rest, "rmse"),
			mae: numberField(rest, "mae"),
		},
	]);
};

const printInventoryPolicy = (rest: Record<string, unknown>): void => {
	const costs = recordField(rest, "costBreakdown");
	console.table([
		{
			safetyStock: numberField(rest, "safetyStock"),
			reorderPoint: numberField(rest, "reorderPoint"),
			eoq: numberField(rest, "eoq"),
			stockoutRiskPct: numberField(rest, "stockoutRiskPct"),
			totalCost: numberField(costs, "total"),
			recommendations: numberField(rest, "recommendationCount"),
		},
	]);
};

const printKeyedOutcomes = (rest: Record<string, unknown>): void => {
	const outcomes = recordField(rest, "outcomes");
	const rows = Object.entries(outcomes).map(([name, status]) => ({
		name,
		status: String(status),
	}));
	if (rows.length > 0) {
		console.table(rows);
	}
};

import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Load .env files from `projectRoot`. An explicit file or REPLENISH_ENV_FILE is
 * read before the conventional names; each file is read at most once.
 */
export function loadEnvFiles(
	projectRoot: string,
	explicitFile?: string
): string[] {
	const candidates = filterUnique(
		[explicitFile, process.env.REPLENISH_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

export const getEnvVar = (key: string, fallback?: string): string => {
	const value = process.env[key];
	if (value !== undefined && value !== "") {
		return value;
	}
	if (fallback !== undefined) {
		return fallback;
	}
	throw new Error(`Missing required environment variable: ${key}`);
};

export const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

/**
 * Read an optional numeric environment variable
 * @throws Error if the variable is set but not a finite number
 */
export const readNumericEnvVar = (key: string): number | undefined => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`Environment variable ${key} must be numeric, got "${raw}"`);
	}
	return value;
};

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}

export type PlanningErrorKind =
	| "ValidationError"
	| "UnsupportedModel"
	| "InsufficientHistory"
	| "ModelFitError"
	| "SessionNotFound"
	| "TaskTimeout"
	| "UnexpectedError";

export interface ErrorPayload {
	kind: PlanningErrorKind;
	message: string;
}

export class PlanningError extends Error {
	readonly kind: PlanningErrorKind;

	constructor(kind: PlanningErrorKind, message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.kind = kind;
		this.name = new.target.name;
	}
}

export class ValidationError extends PlanningError {
	readonly column: string | null;

	constructor(message: string, column: string | null = null) {
		super("ValidationError", message);
		this.column = column;
	}
}

export class UnsupportedModelError extends PlanningError {
	constructor(
		readonly modelId: string,
		available: readonly string[]
	) {
		super(
			"UnsupportedModel",
			`Unsupported model id: "${modelId}". Available model ids: ${available.join(", ")}`
		);
	}
}

export class InsufficientHistoryError extends PlanningError {
	constructor(
		readonly modelId: string,
		readonly required: number,
		readonly actual: number
	) {
		super(
			"InsufficientHistory",
			`Model "${modelId}" needs at least ${required} observations, got ${actual}`
		);
	}
}

export class ModelFitError extends PlanningError {
	constructor(
		readonly modelId: string,
		reason: string,
		cause?: unknown
	) {
		super("ModelFitError", `Model "${modelId}" failed to fit: ${reason}`, cause);
	}
}

export class SessionNotFoundError extends PlanningError {
	constructor(readonly sessionId: string) {
		super("SessionNotFound", `Session not found or expired: ${sessionId}`);
	}
}

export class TaskTimeoutError extends PlanningError {
	constructor(
		readonly label: string,
		readonly timeoutMs: number
	) {
		super("TaskTimeout", `Task "${label}" timed out after ${timeoutMs}ms`);
	}
}

export const isPlanningError = (value: unknown): value is PlanningError =>
	value instanceof PlanningError;

export const describeError = (error: unknown): string => {
	if (error instanceof Error) {
		return error.message;
	}
	return typeof error === "string" ? error : "unknown error";
};

/** Flattens any thrown value into a keyed error entry. */
export const toErrorPayload = (error: unknown): ErrorPayload => {
	if (isPlanningError(error)) {
		return { kind: error.kind, message: error.message };
	}
	return { kind: "UnexpectedError", message: describeError(error) };
};

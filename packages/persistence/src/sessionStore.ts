export interface SessionRecord<T> {
	id: string;
	data: T;
	/** Epoch milliseconds */
	createdAt: number;
	expiresAt: number;
}

/** Create / read / expire lifecycle for session-keyed data. */
export interface SessionStore<T> {
	create(data: T): Promise<SessionRecord<T>>;
	/** Resolves null for unknown or expired ids. */
	get(id: string): Promise<SessionRecord<T> | null>;
	delete(id: string): Promise<boolean>;
	/** Drops every expired session and resolves how many went. */
	purgeExpired(): Promise<number>;
}

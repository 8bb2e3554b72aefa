import { randomUUID } from "node:crypto";
import { createLogger, DEFAULT_PLANNER_CONFIG, ValidationError } from "@replenish/core";
import type { SessionRecord, SessionStore } from "./sessionStore";

const logger = createLogger("persistence");

export interface InMemorySessionStoreOptions {
	ttlMs?: number;
	now?: () => number;
	createId?: () => string;
}

export class InMemorySessionStore<T> implements SessionStore<T> {
	private readonly sessions = new Map<string, SessionRecord<T>>();
	private readonly ttlMs: number;
	private readonly now: () => number;
	private readonly createId: () => string;

	constructor(options: InMemorySessionStoreOptions = {}) {
		this.ttlMs = options.ttlMs ?? DEFAULT_PLANNER_CONFIG.sessions.ttlMs;
		if (!(this.ttlMs > 0)) {
			throw new ValidationError(`Session TTL must be positive, got ${this.ttlMs}`);
		}
		this.now = options.now ?? Date.now;
		this.createId = options.createId ?? randomUUID;
	}

	get size(): number {
		return this.sessions.size;
	}

	/** Sweeps expired sessions before storing the new one. */
	async create(data: T): Promise<SessionRecord<T>> {
		await this.purgeExpired();
		const createdAt = this.now();
		const record: SessionRecord<T> = {
			id: this.createId(),
			data,
			createdAt,
			expiresAt: createdAt + this.ttlMs,
		};
		this.sessions.set(record.id, record);
		logger.debug("session_created", { sessionId: record.id, expiresAt: record.expiresAt });
		return record;
	}

	async get(id: string): Promise<SessionRecord<T> | null> {
		const record = this.sessions.get(id);
		if (!record) {
			return null;
		}
		if (this.isExpired(record)) {
			this.sessions.delete(id);
			logger.debug("session_expired", { sessionId: id });
			return null;
		}
		return record;
	}

	async delete(id: string): Promise<boolean> {
		return this.sessions.delete(id);
	}

	async purgeExpired(): Promise<number> {
		let purged = 0;
		for (const [id, record] of this.sessions) {
			if (this.isExpired(record)) {
				this.sessions.delete(id);
				purged += 1;
			}
		}
		if (purged > 0) {
			logger.debug("sessions_purged", { purged, remaining: this.sessions.size });
		}
		return purged;
	}

	private isExpired(record: SessionRecord<T>): boolean {
		return this.now() >= record.expiresAt;
	}
}

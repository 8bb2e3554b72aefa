/**
 * Session storage for prepared planning inputs. Backends implement
 * `SessionStore`; the in-memory store covers single-process hosts and tests.
 */
export * from "./sessionStore";
export { InMemorySessionStore } from "./inMemorySessionStore";
export type { InMemorySessionStoreOptions } from "./inMemorySessionStore";

import { SessionAlreadyExistsError } from "../../errors/index.js";
import { describeSessionKey } from "../../session/types.js";
import type { Session, SessionSummary } from "../../session/types.js";
import type { SessionStore, StorageProvider } from "../interfaces.js";
import { appendTurn, missingSession, newSession, sessionStoreKey, summarize } from "../session-helpers.js";

// ── Session Store ──

export function createInMemorySessionStore(): SessionStore {
  const store = new Map<string, Session>();

  return {
    async get(key) {
      const session = store.get(sessionStoreKey(key));
      return session ? structuredClone(session) : null;
    },

    async create(key, initialState) {
      const id = sessionStoreKey(key);
      if (store.has(id)) throw new SessionAlreadyExistsError(describeSessionKey(key));
      const session = newSession(key, initialState);
      store.set(id, session);
      return structuredClone(session);
    },

    async append(key, turn) {
      const session = store.get(sessionStoreKey(key));
      if (!session) throw missingSession(key);
      return structuredClone(appendTurn(session, turn));
    },

    async mutateState(key, patch) {
      const session = store.get(sessionStoreKey(key));
      if (!session) throw missingSession(key);
      session.state = structuredClone(patch(structuredClone(session.state)));
      session.updatedAt = new Date().toISOString();
      return structuredClone(session.state);
    },

    async list(appName, userId) {
      const summaries: SessionSummary[] = [];
      for (const session of store.values()) {
        if (session.key.appName === appName && session.key.userId === userId) {
          summaries.push(summarize(session));
        }
      }
      return summaries;
    },

    async delete(key) {
      return store.delete(sessionStoreKey(key));
    },
  };
}

// ── Combined Provider ──

/**
 * Creates a fully in-memory StorageProvider.
 * All data lives in process memory and is lost on restart.
 * Ideal for testing, development, and demos where disk persistence isn't needed.
 */
export function createMemoryStorage(): StorageProvider {
  return {
    sessions: createInMemorySessionStore(),
  };
}

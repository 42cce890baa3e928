import type { NewTurn, Session, SessionKey, SessionState, SessionSummary, Turn } from "../session/types.js";

/**
 * Stores per-(app, user, session) conversation history and state.
 *
 * Return `null` from `get()` when a session is not found (do not throw).
 * `create()` must reject with `SessionAlreadyExistsError` when the key is taken.
 * `append()` assigns the next sequence number (starting at 1) and the timestamp.
 *
 * Implementations are not required to guard `get()` followed by `create()`
 * against races; `getOrCreateSession()` does that with a per-key lock.
 *
 * @example
 * ```ts
 * class PostgresSessionStore implements SessionStore {
 *   async get(key: SessionKey) {
 *     const row = await db.query("SELECT * FROM sessions WHERE app = $1 AND user_id = $2 AND id = $3", [...]);
 *     return row ? deserialize(row) : null;
 *   }
 *   // ...
 * }
 * ```
 */
export interface SessionStore {
  /** Get a session by key. Returns `null` if not found. */
  get(key: SessionKey): Promise<Session | null>;
  /** Create a new session with the given initial state. */
  create(key: SessionKey, initialState: SessionState): Promise<Session>;
  /** Append a turn to an existing session's history. */
  append(key: SessionKey, turn: NewTurn): Promise<Turn>;
  /** Replace the session state with the result of `patch(current)`. */
  mutateState(key: SessionKey, patch: (state: SessionState) => SessionState): Promise<SessionState>;
  /** List a user's sessions within an app as lightweight summaries. */
  list(appName: string, userId: string): Promise<SessionSummary[]>;
  /** Delete a session. Returns `true` if it existed. */
  delete(key: SessionKey): Promise<boolean>;
}

/**
 * Aggregates the stores the engine needs.
 *
 * Use `createMemoryStorage()` for tests and demos or `createFileStorage()`
 * for JSON files on disk, or implement `SessionStore` against your own database.
 */
export interface StorageProvider {
  sessions: SessionStore;
}

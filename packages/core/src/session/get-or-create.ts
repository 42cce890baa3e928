import { SessionAlreadyExistsError } from "../errors/index.js";
import type { SessionStore } from "../storage/interfaces.js";
import { KeyedLock } from "./keyed-lock.js";
import type { Session, SessionKey, SessionState } from "./types.js";
import { sessionStoreKey } from "../storage/session-helpers.js";

export interface GetOrCreateResult {
  session: Session;
  created: boolean;
}

/**
 * Loads a session, creating it with `initialState` when absent.
 *
 * The lookup and the create run under a per-key lock, so concurrent callers in
 * this process never both create. A `SessionAlreadyExistsError` from the store
 * (another process won) falls back to reading the existing session. An
 * existing session's state is never reinitialised.
 */
export async function getOrCreateSession(
  store: SessionStore,
  key: SessionKey,
  initialState: SessionState,
  lock: KeyedLock,
): Promise<GetOrCreateResult> {
  return lock.run(sessionStoreKey(key), async () => {
    const existing = await store.get(key);
    if (existing) return { session: existing, created: false };

    try {
      return { session: await store.create(key, initialState), created: true };
    } catch (err: unknown) {
      if (!(err instanceof SessionAlreadyExistsError)) throw err;
      const session = await store.get(key);
      if (!session) throw err;
      return { session, created: false };
    }
  });
}

import { NotFoundError } from "../errors/index.js";
import { describeSessionKey } from "../session/types.js";
import type { NewTurn, Session, SessionKey, SessionState, SessionSummary, Turn } from "../session/types.js";

export function sessionStoreKey(key: SessionKey): string {
  return JSON.stringify([key.appName, key.userId, key.sessionId]);
}

export function newSession(key: SessionKey, initialState: SessionState): Session {
  const now = new Date().toISOString();
  return { key: { ...key }, state: structuredClone(initialState), history: [], createdAt: now, updatedAt: now };
}

export function appendTurn(session: Session, turn: NewTurn): Turn {
  const last = session.history[session.history.length - 1];
  const entry: Turn = {
    seq: (last?.seq ?? 0) + 1,
    actor: turn.actor,
    payload: turn.payload,
    timestamp: new Date().toISOString(),
  };
  session.history.push(entry);
  session.updatedAt = entry.timestamp;
  return entry;
}

export function summarize(session: Session): SessionSummary {
  return {
    sessionId: session.key.sessionId,
    userId: session.key.userId,
    turnCount: session.history.length,
    updatedAt: session.updatedAt,
  };
}

export function missingSession(key: SessionKey): NotFoundError {
  return new NotFoundError(`Session not found: ${describeSessionKey(key)}`);
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Mutable key/value state shared by every agent in a session */
export type SessionState = Record<string, JsonValue>;

/** Composite session identity */
export interface SessionKey {
  appName: string;
  userId: string;
  sessionId: string;
}

/** Error detail recorded when a tool call or delegation is rejected or fails */
export interface ObservationError {
  code: string;
  message: string;
}

export type TurnPayload =
  | { type: "text"; text: string }
  | { type: "tool-call"; callId: string; toolName: string; args: Record<string, unknown> }
  | { type: "tool-result"; callId: string; toolName: string; result?: unknown; error?: ObservationError }
  | { type: "delegation"; callId: string; target: string; error?: ObservationError }
  | { type: "agent-result"; callId: string; agent: string; text: string };

/** Who produced a turn: the user, or the name of an agent node */
export type Actor = "user" | (string & {});

/** A single entry in a session's append-only history */
export interface Turn {
  seq: number;
  actor: Actor;
  payload: TurnPayload;
  timestamp: string;
}

export type NewTurn = Omit<Turn, "seq" | "timestamp">;

export interface Session {
  key: SessionKey;
  state: SessionState;
  history: Turn[];
  createdAt: string;
  updatedAt: string;
}

/** Lightweight session summary for listing */
export interface SessionSummary {
  sessionId: string;
  userId: string;
  turnCount: number;
  updatedAt: string;
}

export function describeSessionKey(key: SessionKey): string {
  return `${key.appName}/${key.userId}/${key.sessionId}`;
}

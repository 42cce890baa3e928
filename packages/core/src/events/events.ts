import type { ObservationError } from "../session/types.js";

/** Event names emitted by a turn, also used as SSE event names */
export const TURN_EVENTS = {
  TEXT: "text",
  TOOL_STARTED: "toolStarted",
  TOOL_FINISHED: "toolFinished",
  DELEGATED: "delegated",
  RETURNED: "returned",
  ERROR: "error",
} as const;

export type TurnEventName = (typeof TURN_EVENTS)[keyof typeof TURN_EVENTS];

/** Final user-visible response. Always the last event of a successful turn. */
export interface TextEvent {
  type: typeof TURN_EVENTS.TEXT;
  agent: string;
  content: string;
}

export interface ToolStartedEvent {
  type: typeof TURN_EVENTS.TOOL_STARTED;
  agent: string;
  name: string;
  callId: string;
  args: Record<string, unknown>;
}

export type ToolFinishedEvent =
  | { type: typeof TURN_EVENTS.TOOL_FINISHED; agent: string; name: string; callId: string; ok: true; result: unknown }
  | { type: typeof TURN_EVENTS.TOOL_FINISHED; agent: string; name: string; callId: string; ok: false; error: ObservationError };

export interface DelegatedEvent {
  type: typeof TURN_EVENTS.DELEGATED;
  from: string;
  to: string;
}

/** A child yielded its result back to its parent */
export interface ReturnedEvent {
  type: typeof TURN_EVENTS.RETURNED;
  from: string;
  to: string;
}

/** Fatal failure. Always the last event of a failed turn. */
export interface ErrorEvent {
  type: typeof TURN_EVENTS.ERROR;
  code: string;
  message: string;
}

export type TurnEvent =
  | TextEvent
  | ToolStartedEvent
  | ToolFinishedEvent
  | DelegatedEvent
  | ReturnedEvent
  | ErrorEvent;

export type TerminalEvent = TextEvent | ErrorEvent;

export function isTerminalEvent(event: TurnEvent): event is TerminalEvent {
  return event.type === TURN_EVENTS.TEXT || event.type === TURN_EVENTS.ERROR;
}

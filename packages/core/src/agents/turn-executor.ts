import { EngineError, ERROR_CODES, errorMessage } from "../errors/index.js";
import { TURN_EVENTS, isTerminalEvent } from "../events/events.js";
import type { TurnEvent } from "../events/events.js";
import { getOrCreateSession } from "../session/get-or-create.js";
import { describeSessionKey } from "../session/types.js";
import type { SessionKey } from "../session/types.js";
import { sessionStoreKey } from "../storage/session-helpers.js";
import type { EngineContext, TurnInput, TurnOptions } from "../types.js";
import { routeTurn } from "./router.js";

/** Throws a `RangeError` unless `maxSteps` is a positive integer */
export function assertMaxSteps(maxSteps: number): void {
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`);
  }
}

/**
 * Runs one user turn and yields its events in order.
 *
 * The stream is lazy: nothing happens until the first event is pulled, and
 * work advances only as the consumer pulls. Turns on the same session queue
 * behind each other; different sessions run concurrently. The last event is
 * always exactly one `text` or `error`, and history appended before a failure
 * is kept.
 */
export async function* executeTurn(
  ctx: EngineContext,
  input: TurnInput,
  options: TurnOptions = {},
): AsyncGenerator<TurnEvent, void> {
  const maxSteps = options.maxSteps ?? ctx.maxSteps;
  assertMaxSteps(maxSteps);
  const key: SessionKey = { appName: ctx.appName, userId: input.userId, sessionId: input.sessionId };
  const release = await ctx.turnLock.acquire(sessionStoreKey(key));

  try {
    const { session, created } = await getOrCreateSession(
      ctx.storage.sessions,
      key,
      { name: input.userId, role: input.role ?? ctx.defaultRole },
      ctx.sessionLock,
    );
    if (created) console.log(`[engine] Created session ${describeSessionKey(key)}`);

    const userTurn = await ctx.storage.sessions.append(key, {
      actor: "user",
      payload: { type: "text", text: input.message },
    });

    yield* routeTurn({
      root: ctx.root,
      oracle: ctx.oracle,
      registry: ctx.registry,
      store: ctx.storage.sessions,
      key,
      history: [...session.history, userTurn],
      state: session.state,
      maxSteps,
      generateId: ctx.generateId,
      abortSignal: options.abortSignal,
    });
  } catch (err: unknown) {
    const code = err instanceof EngineError ? err.code : ERROR_CODES.INTERNAL;
    console.error(`[engine] Turn failed for ${describeSessionKey(key)} (${code}):`, errorMessage(err));
    yield { type: TURN_EVENTS.ERROR, code, message: errorMessage(err) };
  } finally {
    release();
  }
}

export interface CollectedTurn {
  /** Final text, or `null` when the turn ended with an error */
  response: string | null;
  events: TurnEvent[];
}

/** Drains a turn's event stream into memory */
export async function collectTurn(events: AsyncIterable<TurnEvent>): Promise<CollectedTurn> {
  const collected: TurnEvent[] = [];
  let response: string | null = null;
  for await (const event of events) {
    collected.push(event);
    if (isTerminalEvent(event) && event.type === TURN_EVENTS.TEXT) response = event.content;
  }
  return { response, events: collected };
}

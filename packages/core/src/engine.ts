import { buildCapabilityRegistry, validateHierarchy } from "./agents/agent-node.js";
import { assertMaxSteps, executeTurn } from "./agents/turn-executor.js";
import type { TurnEvent } from "./events/events.js";
import { KeyedLock } from "./session/keyed-lock.js";
import type { SessionKey } from "./session/types.js";
import { createMemoryStorage } from "./storage/in-memory/index.js";
import { sessionStoreKey } from "./storage/session-helpers.js";
import type { EngineConfig, EngineContext, TurnInput, TurnOptions } from "./types.js";
import { DEFAULTS } from "./utils/constants.js";

export interface Engine extends EngineContext {
  /** Starts a turn. Returns a lazy event stream; see `executeTurn`. */
  runTurn(input: TurnInput, options?: TurnOptions): AsyncGenerator<TurnEvent, void>;
  /** Deletes a session once any turn running on it has finished. False when absent. */
  deleteSession(key: SessionKey): Promise<boolean>;
}

export function generateCallId() {
  return `call_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Builds an engine around one agent hierarchy.
 *
 * Validates the hierarchy and registers every capability it references, so a
 * misconfigured tree fails here with `InvalidHierarchyError` rather than on
 * the first turn.
 *
 * @example
 * ```ts
 * const engine = createEngine({ root: coordinator, oracle: createAiOracle({ model }) });
 * for await (const event of engine.runTurn({ userId: "u1", sessionId: "s1", message: "Hi" })) {
 *   console.log(event);
 * }
 * ```
 */
export function createEngine(config: EngineConfig): Engine {
  if (config.maxSteps !== undefined) assertMaxSteps(config.maxSteps);
  validateHierarchy(config.root);

  const ctx: EngineContext = {
    root: config.root,
    oracle: config.oracle,
    registry: buildCapabilityRegistry(config.root),
    storage: config.storage ?? createMemoryStorage(),
    appName: config.appName ?? DEFAULTS.APP_NAME,
    maxSteps: config.maxSteps ?? DEFAULTS.MAX_STEPS,
    defaultRole: config.defaultRole ?? DEFAULTS.ROLE,
    generateId: config.generateId ?? generateCallId,
    turnLock: new KeyedLock(),
    sessionLock: new KeyedLock(),
  };

  return {
    ...ctx,
    runTurn: (input, options) => executeTurn(ctx, input, options),
    deleteSession: (key) => ctx.turnLock.run(sessionStoreKey(key), () => ctx.storage.sessions.delete(key)),
  };
}

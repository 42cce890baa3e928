import type { AgentNode } from "./agents/agent-node.js";
import type { DecisionOracle } from "./agents/oracle.js";
import type { CapabilityRegistry } from "./registry/capability-registry.js";
import type { KeyedLock } from "./session/keyed-lock.js";
import type { StorageProvider } from "./storage/interfaces.js";

/** Engine configuration. Only the hierarchy and the oracle are required. */
export interface EngineConfig {
  /** Root of the agent hierarchy; validated when the engine is created */
  root: AgentNode;
  oracle: DecisionOracle;
  /** Storage provider. Defaults to in-memory (ephemeral) if omitted. */
  storage?: StorageProvider;
  /** Application name, the first part of every session key (default: "research") */
  appName?: string;
  /** Oracle invocations allowed per turn (default: 10) */
  maxSteps?: number;
  /** Role given to new sessions when the request names none (default: "investigator") */
  defaultRole?: string;
  /** Id generator for tool calls and delegations */
  generateId?: () => string;
}

/** Internal context shared by the turn executor and the transport adapters. */
export interface EngineContext {
  root: AgentNode;
  oracle: DecisionOracle;
  registry: CapabilityRegistry;
  storage: StorageProvider;
  appName: string;
  maxSteps: number;
  defaultRole: string;
  generateId: () => string;
  /** Serialises turns per session */
  turnLock: KeyedLock;
  /** Guards get-then-create per session */
  sessionLock: KeyedLock;
}

/** One user message addressed to a session */
export interface TurnInput {
  userId: string;
  sessionId: string;
  message: string;
  /** Only used when the session is created by this turn */
  role?: string;
}

export interface TurnOptions {
  /** Overrides the engine's step limit for this turn */
  maxSteps?: number;
  abortSignal?: AbortSignal;
}

// ── Core types ──
export type { EngineConfig, EngineContext, TurnInput, TurnOptions } from "./types.js";

// ── Engine ──
export { createEngine, generateCallId } from "./engine.js";
export type { Engine } from "./engine.js";
export { executeTurn, collectTurn } from "./agents/turn-executor.js";
export type { CollectedTurn } from "./agents/turn-executor.js";
export { routeTurn } from "./agents/router.js";
export type { RouterContext } from "./agents/router.js";

// ── Agents ──
export {
  defineAgent,
  walkHierarchy,
  validateHierarchy,
  buildCapabilityRegistry,
  describeHierarchy,
} from "./agents/agent-node.js";
export type { AgentNode, AgentConfig, AgentDescriptor } from "./agents/agent-node.js";
export type { Decision, DecisionOracle, OracleRequest, ChildSummary } from "./agents/oracle.js";
export {
  createAiOracle,
  renderSystemPrompt,
  renderHistory,
  buildToolSet,
  describeCapability,
  fillPlaceholders,
} from "./agents/ai-oracle.js";
export type { AiOracleOptions } from "./agents/ai-oracle.js";

// ── Registry ──
export { CapabilityRegistry, defineCapability, toObservationError } from "./registry/capability-registry.js";
export type {
  Capability,
  CapabilityContext,
  CapabilityOutcome,
  SideEffect,
  ValidationResult,
} from "./registry/capability-registry.js";

// ── Events ──
export { TURN_EVENTS, isTerminalEvent } from "./events/events.js";
export type {
  TurnEvent,
  TurnEventName,
  TerminalEvent,
  TextEvent,
  ToolStartedEvent,
  ToolFinishedEvent,
  DelegatedEvent,
  ReturnedEvent,
  ErrorEvent,
} from "./events/events.js";

// ── Errors ──
export {
  ERROR_CODES,
  EngineError,
  InvalidToolArgumentsError,
  UnknownToolError,
  UnknownDelegationTargetError,
  StepLimitExceededError,
  SessionAlreadyExistsError,
  OracleUnavailableError,
  InvalidHierarchyError,
  AbortedError,
  CapabilityError,
  NotFoundError,
  ConflictError,
  TransientError,
  isTransientError,
  isAbortError,
  errorMessage,
} from "./errors/index.js";
export type { ErrorCode, CapabilityErrorKind } from "./errors/index.js";

// ── Constants ──
export { TOOL_NAMES, DEFAULTS } from "./utils/constants.js";

// ── Sessions ──
export { KeyedLock } from "./session/keyed-lock.js";
export { getOrCreateSession } from "./session/get-or-create.js";
export type { GetOrCreateResult } from "./session/get-or-create.js";
export { describeSessionKey } from "./session/types.js";
export type {
  JsonValue,
  SessionState,
  SessionKey,
  Session,
  SessionSummary,
  Turn,
  NewTurn,
  TurnPayload,
  Actor,
  ObservationError,
} from "./session/types.js";

// ── Streaming ──
export { createSSEStream, streamTurnEvents, formatSSE } from "./streaming/sse-writer.js";
export type { SSEWriter, SSEMessage } from "./streaming/sse-writer.js";

// ── Storage ──
export type { StorageProvider, SessionStore } from "./storage/interfaces.js";
export { createFileStorage } from "./storage/file-storage/index.js";
export type { FileStorageOptions } from "./storage/file-storage/index.js";
export { createMemoryStorage, createInMemorySessionStore } from "./storage/in-memory/index.js";

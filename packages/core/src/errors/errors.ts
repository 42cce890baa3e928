/** Error codes surfaced to oracles as observations or to callers as terminal `error` events */
export const ERROR_CODES = {
  INVALID_TOOL_ARGUMENTS: "InvalidToolArguments",
  UNKNOWN_TOOL: "UnknownTool",
  UNKNOWN_DELEGATION_TARGET: "UnknownDelegationTarget",
  CAPABILITY_NOT_FOUND: "CapabilityNotFound",
  CAPABILITY_CONFLICT: "CapabilityConflict",
  CAPABILITY_TRANSIENT: "CapabilityTransient",
  CAPABILITY_FAILED: "CapabilityFailed",
  STEP_LIMIT_EXCEEDED: "StepLimitExceeded",
  SESSION_ALREADY_EXISTS: "SessionAlreadyExists",
  ORACLE_UNAVAILABLE: "OracleUnavailable",
  INVALID_HIERARCHY: "InvalidHierarchy",
  ABORTED: "Aborted",
  INTERNAL: "InternalError",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class for every error the engine raises on purpose */
export class EngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class InvalidToolArgumentsError extends EngineError {
  readonly issues: string[];

  constructor(toolName: string, issues: string[]) {
    super(ERROR_CODES.INVALID_TOOL_ARGUMENTS, `Invalid arguments for "${toolName}": ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class UnknownToolError extends EngineError {
  constructor(agent: string, toolName: string) {
    super(ERROR_CODES.UNKNOWN_TOOL, `Agent "${agent}" has no tool named "${toolName}"`);
  }
}

export class UnknownDelegationTargetError extends EngineError {
  constructor(agent: string, target: string, children: string[]) {
    const available = children.length > 0 ? children.join(", ") : "none";
    super(
      ERROR_CODES.UNKNOWN_DELEGATION_TARGET,
      `Agent "${agent}" cannot delegate to "${target}". Available agents: ${available}`,
    );
  }
}

export class StepLimitExceededError extends EngineError {
  constructor(maxSteps: number) {
    super(ERROR_CODES.STEP_LIMIT_EXCEEDED, `Turn exceeded the step limit of ${maxSteps}`);
  }
}

export class SessionAlreadyExistsError extends EngineError {
  constructor(description: string) {
    super(ERROR_CODES.SESSION_ALREADY_EXISTS, `Session already exists: ${description}`);
  }
}

export class OracleUnavailableError extends EngineError {
  constructor(agent: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_CODES.ORACLE_UNAVAILABLE, `Decision oracle failed for "${agent}": ${detail}`, { cause });
  }
}

export class InvalidHierarchyError extends EngineError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_HIERARCHY, message);
  }
}

export class AbortedError extends EngineError {
  constructor() {
    super(ERROR_CODES.ABORTED, "Turn was aborted");
  }
}

// ── Capability failure classes ──
// Thrown by capability implementations (or the stores behind them) so the
// registry can report a precise class back to the oracle.

export type CapabilityErrorKind = "not_found" | "conflict" | "transient";

const KIND_TO_CODE: Record<CapabilityErrorKind, ErrorCode> = {
  not_found: ERROR_CODES.CAPABILITY_NOT_FOUND,
  conflict: ERROR_CODES.CAPABILITY_CONFLICT,
  transient: ERROR_CODES.CAPABILITY_TRANSIENT,
};

export class CapabilityError extends EngineError {
  readonly kind: CapabilityErrorKind;

  constructor(kind: CapabilityErrorKind, message: string, options?: { cause?: unknown }) {
    super(KIND_TO_CODE[kind], message, options);
    this.kind = kind;
  }
}

export class NotFoundError extends CapabilityError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ConflictError extends CapabilityError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class TransientError extends CapabilityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient", message, options);
  }
}

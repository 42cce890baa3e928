import type { Capability } from "../registry/capability-registry.js";
import type { SessionState, Turn } from "../session/types.js";

/** What the oracle wants the active agent to do next */
export type Decision =
  | { kind: "text"; text: string }
  | {
      kind: "tool-call";
      toolName: string;
      args: Record<string, unknown>;
      callId?: string;
      /** Set when the model's input could not be parsed; `args` is then empty */
      inputError?: string;
    }
  | { kind: "delegate"; agent: string; callId?: string };

export interface ChildSummary {
  name: string;
  description: string;
}

export interface OracleRequest {
  agent: string;
  policy: string;
  /** Only the active agent's own tools; nothing is inherited from ancestors */
  tools: readonly Capability[];
  children: readonly ChildSummary[];
  state: Readonly<SessionState>;
  history: readonly Turn[];
  abortSignal?: AbortSignal;
}

/**
 * The reasoning service behind every agent. Treated as fallible and
 * non-deterministic; any rejection ends the turn with `OracleUnavailable`.
 */
export interface DecisionOracle {
  decide(request: OracleRequest): Promise<Decision>;
}

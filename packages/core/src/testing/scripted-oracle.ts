import type { Decision, DecisionOracle, OracleRequest } from "../agents/oracle.js";

/** A fixed decision, or a function of what the agent was shown */
export type ScriptStep = Decision | ((request: OracleRequest) => Decision | Promise<Decision>);

export function say(text: string): Decision {
  return { kind: "text", text };
}

export function callTool(toolName: string, args: Record<string, unknown> = {}, callId?: string): Decision {
  return { kind: "tool-call", toolName, args, ...(callId !== undefined && { callId }) };
}

export function delegateTo(agent: string, callId?: string): Decision {
  return { kind: "delegate", agent, ...(callId !== undefined && { callId }) };
}

/**
 * Deterministic oracle for tests. Each agent answers from its own queue of
 * steps; running out of steps rejects, which the engine reports as
 * `OracleUnavailable`. Every request is kept with a snapshot of its history.
 */
export class ScriptedOracle implements DecisionOracle {
  readonly requests: OracleRequest[] = [];
  private queues = new Map<string, ScriptStep[]>();

  constructor(script: Record<string, ScriptStep[]> = {}) {
    for (const [agent, steps] of Object.entries(script)) this.queues.set(agent, [...steps]);
  }

  requestsFor(agent: string): OracleRequest[] {
    return this.requests.filter((r) => r.agent === agent);
  }

  async decide(request: OracleRequest): Promise<Decision> {
    this.requests.push({ ...request, state: { ...request.state }, history: [...request.history] });
    const step = this.queues.get(request.agent)?.shift();
    if (!step) throw new Error(`No scripted decision left for "${request.agent}"`);
    return typeof step === "function" ? step(request) : step;
  }
}

import {
  AbortedError,
  EngineError,
  InvalidToolArgumentsError,
  OracleUnavailableError,
  StepLimitExceededError,
  UnknownDelegationTargetError,
  UnknownToolError,
  isAbortError,
} from "../errors/index.js";
import { TURN_EVENTS } from "../events/events.js";
import type { TurnEvent } from "../events/events.js";
import type { CapabilityOutcome, CapabilityRegistry } from "../registry/capability-registry.js";
import type { SessionStore } from "../storage/interfaces.js";
import type { NewTurn, SessionKey, SessionState, Turn, TurnPayload } from "../session/types.js";
import type { AgentNode } from "./agent-node.js";
import type { Decision, DecisionOracle } from "./oracle.js";

export interface RouterContext {
  root: AgentNode;
  oracle: DecisionOracle;
  registry: CapabilityRegistry;
  store: SessionStore;
  key: SessionKey;
  /** Session history as loaded, including the user's message for this turn */
  history: readonly Turn[];
  state: SessionState;
  maxSteps: number;
  generateId: () => string;
  abortSignal?: AbortSignal;
}

/** One entry of the delegation stack; `callId` ties a child back to its parent's delegation */
interface Frame {
  node: AgentNode;
  callId: string;
}

/**
 * Drives the delegation stack for one turn.
 *
 * The top-of-stack agent is resolved repeatedly: tool calls run and the same
 * agent sees the result; a delegation pushes the child; a text response pops
 * the agent and, unless it was the root, hands the text back to the parent as
 * an `agent-result` observation. The root's text is the turn's final output.
 *
 * Rejected tool calls and delegations are recorded as error observations and
 * never end the turn. Step exhaustion, oracle failures and aborts throw.
 */
export async function* routeTurn(ctx: RouterContext): AsyncGenerator<TurnEvent, void> {
  const { oracle, registry, store, key, maxSteps, generateId, abortSignal } = ctx;
  const history: Turn[] = [...ctx.history];
  let state: SessionState = { ...ctx.state };
  const frames: Frame[] = [{ node: ctx.root, callId: generateId() }];
  let steps = 0;

  async function record(actor: string, payload: TurnPayload): Promise<void> {
    const turn: NewTurn = { actor, payload };
    history.push(await store.append(key, turn));
  }

  function checkAborted() {
    if (abortSignal?.aborted) throw new AbortedError();
  }

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const { node } = frame;
    checkAborted();
    if (steps >= maxSteps) throw new StepLimitExceededError(maxSteps);
    steps++;

    let decision: Decision;
    try {
      decision = await oracle.decide({
        agent: node.name,
        policy: node.policy,
        tools: node.tools,
        children: node.children.map((c) => ({ name: c.name, description: c.description })),
        state,
        history,
        abortSignal,
      });
    } catch (err: unknown) {
      if (isAbortError(err) || abortSignal?.aborted) throw new AbortedError();
      if (err instanceof EngineError) throw err;
      throw new OracleUnavailableError(node.name, err);
    }

    switch (decision.kind) {
      case "tool-call": {
        const { toolName, args } = decision;
        const callId = decision.callId ?? generateId();
        await record(node.name, { type: "tool-call", callId, toolName, args });

        if (!node.tools.some((t) => t.name === toolName)) {
          const err = new UnknownToolError(node.name, toolName);
          console.warn(`[router] ${err.message}`);
          await record(node.name, { type: "tool-result", callId, toolName, error: { code: err.code, message: err.message } });
          break;
        }

        if (decision.inputError !== undefined) {
          const err = new InvalidToolArgumentsError(toolName, [decision.inputError]);
          console.warn(`[router] ${node.name} → ${toolName} rejected: ${err.message}`);
          await record(node.name, { type: "tool-result", callId, toolName, error: { code: err.code, message: err.message } });
          break;
        }

        const validation = registry.validate(toolName, args);
        if (!validation.ok) {
          console.warn(`[router] ${node.name} → ${toolName} rejected: ${validation.error.message}`);
          await record(node.name, { type: "tool-result", callId, toolName, error: validation.error });
          break;
        }

        yield { type: TURN_EVENTS.TOOL_STARTED, agent: node.name, name: toolName, callId, args };
        let outcome: CapabilityOutcome;
        try {
          outcome = await registry.execute(toolName, validation.input, {
            agent: node.name,
            session: key,
            state,
            abortSignal,
          });
        } catch (err: unknown) {
          if (!isAbortError(err) && !abortSignal?.aborted) throw err;
          const aborted = new AbortedError();
          await record(node.name, { type: "tool-result", callId, toolName, error: { code: aborted.code, message: aborted.message } });
          throw aborted;
        }

        if (outcome.ok) {
          await record(node.name, { type: "tool-result", callId, toolName, result: outcome.result });
          yield { type: TURN_EVENTS.TOOL_FINISHED, agent: node.name, name: toolName, callId, ok: true, result: outcome.result };
        } else {
          console.warn(`[router] ${node.name} → ${toolName} failed (${outcome.error.code}): ${outcome.error.message}`);
          await record(node.name, { type: "tool-result", callId, toolName, error: outcome.error });
          yield { type: TURN_EVENTS.TOOL_FINISHED, agent: node.name, name: toolName, callId, ok: false, error: outcome.error };
        }
        break;
      }

      case "delegate": {
        const callId = decision.callId ?? generateId();
        const target = decision.agent;
        const child = node.children.find((c) => c.name === target);
        if (!child) {
          const err = new UnknownDelegationTargetError(node.name, target, node.children.map((c) => c.name));
          console.warn(`[router] ${err.message}`);
          await record(node.name, { type: "delegation", callId, target, error: { code: err.code, message: err.message } });
          break;
        }
        await record(node.name, { type: "delegation", callId, target: child.name });
        frames.push({ node: child, callId });
        yield { type: TURN_EVENTS.DELEGATED, from: node.name, to: child.name };
        break;
      }

      case "text": {
        const { text } = decision;
        await record(node.name, { type: "text", text });
        if (node.outputKey) {
          const outputKey = node.outputKey;
          state = await store.mutateState(key, (current) => ({ ...current, [outputKey]: text }));
        }
        frames.pop();

        const parent = frames[frames.length - 1];
        if (!parent) {
          yield { type: TURN_EVENTS.TEXT, agent: node.name, content: text };
          return;
        }
        await record(parent.node.name, { type: "agent-result", callId: frame.callId, agent: node.name, text });
        yield { type: TURN_EVENTS.RETURNED, from: node.name, to: parent.node.name };
        break;
      }
    }
  }
}

import { generateText, jsonSchema, tool, zodSchema } from "ai";
import type { LanguageModel, ModelMessage, ToolSet } from "ai";
import { errorMessage } from "../errors/index.js";
import type { Capability } from "../registry/capability-registry.js";
import type { JsonValue, SessionState, Turn } from "../session/types.js";
import { TOOL_NAMES } from "../utils/constants.js";
import type { Decision, DecisionOracle, OracleRequest } from "./oracle.js";

export interface AiOracleOptions {
  model: LanguageModel;
  /** Clock for the date line of the system prompt */
  now?: () => Date;
  temperature?: number;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function formatValue(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** Replaces `{key}` with the session state value; unknown keys are left as written */
export function fillPlaceholders(template: string, state: Readonly<SessionState>): string {
  return template.replace(PLACEHOLDER, (match, key: string) => {
    const value = state[key];
    return value === undefined ? match : formatValue(value);
  });
}

export function renderSystemPrompt(request: OracleRequest, now: Date): string {
  const sections = [fillPlaceholders(request.policy, request.state).trim()];

  const stateLines = Object.entries(request.state).map(([key, value]) => `- ${key}: ${formatValue(value)}`);
  if (stateLines.length > 0) sections.push(`## Session State\n${stateLines.join("\n")}`);

  if (request.children.length > 0) {
    const agents = request.children.map((c) => `- ${c.name}: ${c.description}`).join("\n");
    sections.push(
      `Available agents:\n${agents}\n\n` +
        `To hand the request to one of them, call \`${TOOL_NAMES.TRANSFER_TO_AGENT}\`. ` +
        "Their answer comes back to you as the tool result.",
    );
  }

  sections.push(`Current date: ${now.toISOString().slice(0, 10)}`);
  return sections.join("\n\n");
}

export function describeCapability(capability: Capability): string {
  return capability.sideEffect === "mutate"
    ? `${capability.description} (mutating: confirm with the user first)`
    : capability.description;
}

/**
 * Exposes the agent's capabilities and its delegation targets as tools. None
 * of them has `execute`: the model only proposes calls, and the capability
 * registry validates and runs them.
 */
export function buildToolSet(request: OracleRequest): ToolSet {
  const tools: ToolSet = {};
  for (const capability of request.tools) {
    tools[capability.name] = tool({
      description: describeCapability(capability),
      inputSchema: jsonSchema(zodSchema(capability.parameters).jsonSchema),
    });
  }
  if (request.children.length > 0) {
    tools[TOOL_NAMES.TRANSFER_TO_AGENT] = tool({
      description: "Transfer the request to one of the available agents and wait for its answer.",
      inputSchema: jsonSchema<{ agent: string }>({
        type: "object",
        properties: {
          agent: {
            type: "string",
            enum: request.children.map((c) => c.name),
            description: "Name of the agent to transfer to",
          },
        },
        required: ["agent"],
        additionalProperties: false,
      }),
    });
  }
  return tools;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? "null";
}

/**
 * Renders session history as model messages from `agent`'s point of view.
 *
 * The agent's own text, tool calls and results become assistant and tool
 * messages; its delegations become `transferToAgent` calls answered by the
 * child's `agent-result`. What the child did in between is left out, and
 * anything else other agents did is passed along as "For context:" user
 * messages. Tool calls left without a result by a failed turn get a
 * placeholder error result so the conversation stays well-formed.
 */
export function renderHistory(agent: string, history: readonly Turn[]): ModelMessage[] {
  const messages: ModelMessage[] = [];
  const pending = new Map<string, string>();
  let openDelegation: string | null = null;

  function settlePending() {
    for (const [toolCallId, toolName] of pending) {
      messages.push({
        role: "tool",
        content: [{ type: "tool-result", toolCallId, toolName, output: { type: "error-text", value: "No result was recorded for this call." } }],
      });
    }
    pending.clear();
    openDelegation = null;
  }

  for (const turn of history) {
    const { actor, payload } = turn;

    if (actor === "user") {
      settlePending();
      if (payload.type === "text") messages.push({ role: "user", content: payload.text });
      continue;
    }

    if (actor !== agent) {
      if (openDelegation !== null) continue;
      if (pending.size > 0) settlePending();
      messages.push({ role: "user", content: `For context: ${describeForeignTurn(actor, turn)}` });
      continue;
    }

    switch (payload.type) {
      case "text":
        settlePending();
        messages.push({ role: "assistant", content: payload.text });
        break;
      case "tool-call":
        pending.set(payload.callId, payload.toolName);
        messages.push({
          role: "assistant",
          content: [{ type: "tool-call", toolCallId: payload.callId, toolName: payload.toolName, input: payload.args }],
        });
        break;
      case "tool-result":
        pending.delete(payload.callId);
        messages.push({
          role: "tool",
          content: [{
            type: "tool-result",
            toolCallId: payload.callId,
            toolName: payload.toolName,
            output: payload.error
              ? { type: "error-text", value: `${payload.error.code}: ${payload.error.message}` }
              : { type: "text", value: stringify(payload.result) },
          }],
        });
        break;
      case "delegation":
        messages.push({
          role: "assistant",
          content: [{ type: "tool-call", toolCallId: payload.callId, toolName: TOOL_NAMES.TRANSFER_TO_AGENT, input: { agent: payload.target } }],
        });
        if (payload.error) {
          messages.push({
            role: "tool",
            content: [{
              type: "tool-result",
              toolCallId: payload.callId,
              toolName: TOOL_NAMES.TRANSFER_TO_AGENT,
              output: { type: "error-text", value: `${payload.error.code}: ${payload.error.message}` },
            }],
          });
        } else {
          pending.set(payload.callId, TOOL_NAMES.TRANSFER_TO_AGENT);
          openDelegation = payload.callId;
        }
        break;
      case "agent-result":
        pending.delete(payload.callId);
        if (openDelegation === payload.callId) openDelegation = null;
        messages.push({
          role: "tool",
          content: [{
            type: "tool-result",
            toolCallId: payload.callId,
            toolName: TOOL_NAMES.TRANSFER_TO_AGENT,
            output: { type: "text", value: `[${payload.agent}] ${payload.text}` },
          }],
        });
        break;
    }
  }

  settlePending();
  return messages;
}

function describeForeignTurn(actor: string, turn: Turn): string {
  const { payload } = turn;
  switch (payload.type) {
    case "text":
      return `[${actor}] said: ${payload.text}`;
    case "tool-call":
      return `[${actor}] called tool \`${payload.toolName}\` with parameters: ${JSON.stringify(payload.args)}`;
    case "tool-result":
      return payload.error
        ? `[${actor}] \`${payload.toolName}\` tool failed: ${payload.error.code}: ${payload.error.message}`
        : `[${actor}] \`${payload.toolName}\` tool returned result: ${stringify(payload.result)}`;
    case "delegation":
      return `[${actor}] transferred the request to \`${payload.target}\``;
    case "agent-result":
      return `[${actor}] received the answer of \`${payload.agent}\`: ${payload.text}`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decision oracle backed by an AI SDK language model.
 *
 * Each decision is a single model call. The first tool call wins:
 * `transferToAgent` becomes a delegation, anything else a tool call. Without
 * a tool call the model's text is the agent's answer.
 */
export function createAiOracle(options: AiOracleOptions): DecisionOracle {
  const { model, now = () => new Date(), temperature } = options;

  return {
    async decide(request): Promise<Decision> {
      const tools = buildToolSet(request);
      const result = await generateText({
        model,
        system: renderSystemPrompt(request, now()),
        messages: renderHistory(request.agent, request.history),
        tools: Object.keys(tools).length > 0 ? tools : undefined,
        temperature,
        abortSignal: request.abortSignal,
      });

      const [call] = result.toolCalls;
      if (call) {
        const input: unknown = call.input;
        if (call.toolName === TOOL_NAMES.TRANSFER_TO_AGENT) {
          const target = isRecord(input) && typeof input.agent === "string" ? input.agent : "";
          return { kind: "delegate", agent: target, callId: call.toolCallId };
        }
        if ("invalid" in call && call.invalid === true) {
          const reason = "error" in call ? errorMessage(call.error) : "Tool input could not be parsed";
          return { kind: "tool-call", toolName: call.toolName, args: {}, callId: call.toolCallId, inputError: reason };
        }
        return { kind: "tool-call", toolName: call.toolName, args: isRecord(input) ? input : {}, callId: call.toolCallId };
      }

      return { kind: "text", text: result.text };
    },
  };
}

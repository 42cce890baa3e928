import { InvalidHierarchyError } from "../errors/index.js";
import { CapabilityRegistry } from "../registry/capability-registry.js";
import type { Capability } from "../registry/capability-registry.js";

/**
 * A named decision-making unit. The tree of nodes is owned top-down: a node's
 * children belong to it alone, and control only returns to a parent when the
 * child yields a text response.
 */
export interface AgentNode {
  name: string;
  /** Shown to the parent's oracle when it chooses whom to delegate to */
  description: string;
  /** Instruction text handed to the decision oracle. Not interpreted by the engine. */
  policy: string;
  tools: readonly Capability[];
  children: readonly AgentNode[];
  /** Session state key that receives this node's final text */
  outputKey?: string;
}

export interface AgentConfig {
  name: string;
  description?: string;
  policy: string;
  tools?: readonly Capability[];
  children?: readonly AgentNode[];
  outputKey?: string;
}

const AGENT_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export function defineAgent(config: AgentConfig): AgentNode {
  const { name, description = "", policy, tools = [], children = [], outputKey } = config;
  return {
    name,
    description,
    policy,
    tools: [...tools],
    children: [...children],
    ...(outputKey !== undefined && { outputKey }),
  };
}

/** Depth-first, parents before children */
export function* walkHierarchy(root: AgentNode): Generator<AgentNode> {
  yield root;
  for (const child of root.children) yield* walkHierarchy(child);
}

/**
 * Checks that the hierarchy is a finite tree: every name is valid and unique,
 * no node appears under itself or an ancestor, no node is shared between two
 * parents, and tool names are unique per node.
 */
export function validateHierarchy(root: AgentNode): void {
  const names = new Set<string>();
  const seen = new Set<AgentNode>();

  function visit(node: AgentNode, ancestors: AgentNode[]) {
    if (ancestors.includes(node)) {
      const path = [...ancestors, node].map((n) => n.name).join(" → ");
      throw new InvalidHierarchyError(`Cycle in agent hierarchy: ${path}`);
    }
    if (seen.has(node)) {
      throw new InvalidHierarchyError(`Agent "${node.name}" appears under more than one parent`);
    }
    if (!AGENT_NAME.test(node.name)) {
      throw new InvalidHierarchyError(`Invalid agent name "${node.name}"`);
    }
    if (names.has(node.name)) {
      throw new InvalidHierarchyError(`Duplicate agent name "${node.name}"`);
    }
    seen.add(node);
    names.add(node.name);

    const toolNames = new Set<string>();
    for (const tool of node.tools) {
      if (toolNames.has(tool.name)) {
        throw new InvalidHierarchyError(`Agent "${node.name}" lists tool "${tool.name}" twice`);
      }
      toolNames.add(tool.name);
    }

    for (const child of node.children) visit(child, [...ancestors, node]);
  }

  visit(root, []);
}

/** Registers every capability reachable from the hierarchy */
export function buildCapabilityRegistry(root: AgentNode): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  for (const node of walkHierarchy(root)) {
    for (const tool of node.tools) {
      try {
        registry.register(tool);
      } catch (err: unknown) {
        throw new InvalidHierarchyError(
          `Agent "${node.name}": ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }
  return registry;
}

/** One agent as plain data, with its relatives by name */
export interface AgentDescriptor {
  name: string;
  description: string;
  tools: string[];
  outputKey?: string;
  parent: string | null;
  children: string[];
}

/** Flattens the hierarchy into descriptors, parents before children */
export function describeHierarchy(root: AgentNode): AgentDescriptor[] {
  const parents = new Map<string, string>();
  for (const node of walkHierarchy(root)) {
    for (const child of node.children) parents.set(child.name, node.name);
  }
  return [...walkHierarchy(root)].map((node) => ({
    name: node.name,
    description: node.description,
    tools: node.tools.map((t) => t.name),
    ...(node.outputKey !== undefined && { outputKey: node.outputKey }),
    parent: parents.get(node.name) ?? null,
    children: node.children.map((c) => c.name),
  }));
}

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { InvalidHierarchyError } from "../errors/index.js";
import { defineCapability } from "../registry/capability-registry.js";
import type { AgentNode } from "./agent-node.js";
import {
  buildCapabilityRegistry,
  defineAgent,
  describeHierarchy,
  validateHierarchy,
  walkHierarchy,
} from "./agent-node.js";

const lookup = defineCapability({
  name: "getProjectDetails",
  description: "Look up a project",
  sideEffect: "read",
  parameters: z.object({ project_id: z.string() }),
  execute: async (input) => ({ id: input.project_id }),
});

function tree() {
  const checker = defineAgent({ name: "checker", description: "Checks eligibility", policy: "check", tools: [lookup] });
  const admin = defineAgent({ name: "admin", description: "Research admin", policy: "admin", children: [checker] });
  const db = defineAgent({ name: "db", description: "Database", policy: "db", tools: [lookup] });
  return defineAgent({ name: "root", policy: "route", children: [db, admin], outputKey: "task_assignment" });
}

describe("validateHierarchy", () => {
  it("accepts a tree", () => {
    expect(() => validateHierarchy(tree())).not.toThrow();
  });

  it("rejects a node that contains itself", () => {
    const node: AgentNode = { name: "loop", description: "", policy: "", tools: [], children: [] };
    const cyclic: AgentNode = { ...node, children: [] };
    const parent: AgentNode = { ...node, name: "parent", children: [cyclic] };
    Object.assign(cyclic, { children: [parent] });

    expect(() => validateHierarchy(parent)).toThrow("Cycle in agent hierarchy: parent → loop → parent");
  });

  it("rejects duplicate names", () => {
    const a = defineAgent({ name: "worker", policy: "" });
    const b = defineAgent({ name: "worker", policy: "" });
    expect(() => validateHierarchy(defineAgent({ name: "root", policy: "", children: [a, b] }))).toThrow('Duplicate agent name "worker"');
  });

  it("rejects a node shared by two parents", () => {
    const shared = defineAgent({ name: "shared", policy: "" });
    const left = defineAgent({ name: "left", policy: "", children: [shared] });
    const right = defineAgent({ name: "right", policy: "", children: [shared] });

    expect(() => validateHierarchy(defineAgent({ name: "root", policy: "", children: [left, right] }))).toThrow(
      'Agent "shared" appears under more than one parent',
    );
  });

  it("rejects names that cannot be used as tool enum values", () => {
    expect(() => validateHierarchy(defineAgent({ name: "has space", policy: "" }))).toThrow(InvalidHierarchyError);
  });

  it("rejects a tool listed twice on one node", () => {
    expect(() => validateHierarchy(defineAgent({ name: "db", policy: "", tools: [lookup, lookup] }))).toThrow(
      'Agent "db" lists tool "getProjectDetails" twice',
    );
  });
});

describe("hierarchy helpers", () => {
  it("walks parents before children", () => {
    expect([...walkHierarchy(tree())].map((n) => n.name)).toEqual(["root", "db", "admin", "checker"]);
  });

  it("registers a capability shared by several agents once", () => {
    const registry = buildCapabilityRegistry(tree());
    expect(registry.list().map((c) => c.name)).toEqual(["getProjectDetails"]);
  });

  it("fails when two different capabilities share a name", () => {
    const impostor = defineCapability({ ...lookup, execute: async () => null });
    const root = defineAgent({
      name: "root",
      policy: "",
      tools: [lookup],
      children: [defineAgent({ name: "db", policy: "", tools: [impostor] })],
    });
    expect(() => buildCapabilityRegistry(root)).toThrow('Agent "db": Capability "getProjectDetails" is already registered');
  });

  it("describes the hierarchy as flat plain data", () => {
    expect(describeHierarchy(tree())).toEqual([
      { name: "root", description: "", tools: [], outputKey: "task_assignment", parent: null, children: ["db", "admin"] },
      { name: "db", description: "Database", tools: ["getProjectDetails"], parent: "root", children: [] },
      { name: "admin", description: "Research admin", tools: [], parent: "root", children: ["checker"] },
      { name: "checker", description: "Checks eligibility", tools: ["getProjectDetails"], parent: "admin", children: [] },
    ]);
  });
});

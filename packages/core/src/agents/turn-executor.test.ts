import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineCapability } from "../registry/capability-registry.js";
import { createMemoryStorage } from "../storage/in-memory/index.js";
import { ScriptedOracle, callTool, say } from "../testing/index.js";
import type { OracleRequest } from "./oracle.js";
import { createEngine } from "../engine.js";
import { defineAgent } from "./agent-node.js";
import { collectTurn } from "./turn-executor.js";

const key = { appName: "research", userId: "alice", sessionId: "s1" };

function lastUserText(request: OracleRequest): string {
  const turns = request.history.filter((t) => t.actor === "user");
  const last = turns[turns.length - 1];
  return last?.payload.type === "text" ? last.payload.text : "";
}

function tick() {
  return new Promise<void>((resolve) => setTimeout(resolve, 0));
}

describe("executeTurn", () => {
  it("does nothing until the stream is consumed", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("hi")] });
    const storage = createMemoryStorage();
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    const events = engine.runTurn({ ...key, message: "hello" });
    expect(await storage.sessions.get(key)).toBeNull();
    expect(oracle.requests).toHaveLength(0);

    const { response } = await collectTurn(events);
    expect(response).toBe("hi");
    expect(await storage.sessions.get(key)).not.toBeNull();
  });

  it("creates new sessions with the user's name and the default role", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("hi")] });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle });

    await collectTurn(engine.runTurn({ ...key, message: "hello" }));

    expect(oracle.requests[0].state).toEqual({ name: "alice", role: "investigator" });
  });

  it("uses the requested role only when the session is created", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("one"), say("two")] });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle });

    await collectTurn(engine.runTurn({ ...key, message: "hello", role: "research_administrator" }));
    await collectTurn(engine.runTurn({ ...key, message: "again", role: "investigator" }));

    expect(oracle.requests.map((r) => r.state.role)).toEqual(["research_administrator", "research_administrator"]);
  });

  it("carries history across turns", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("one"), say("two")] });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle });

    await collectTurn(engine.runTurn({ ...key, message: "first" }));
    await collectTurn(engine.runTurn({ ...key, message: "second" }));

    const [, second] = oracle.requests;
    expect(second.history.map((t) => t.seq)).toEqual([1, 2, 3]);
    expect(second.history.map((t) => t.actor)).toEqual(["user", "coordinator", "user"]);
  });

  it("reports oracle failures as one terminal error and keeps the history", async () => {
    const oracle = new ScriptedOracle();
    const storage = createMemoryStorage();
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    const { response, events } = await collectTurn(engine.runTurn({ ...key, message: "hello" }));

    expect(response).toBeNull();
    expect(events).toEqual([
      {
        type: "error",
        code: "OracleUnavailable",
        message: 'Decision oracle failed for "coordinator": No scripted decision left for "coordinator"',
      },
    ]);
    const session = await storage.sessions.get(key);
    expect(session?.history.map((t) => t.payload)).toEqual([{ type: "text", text: "hello" }]);
  });

  it("ends an already aborted turn with an Aborted error", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("never")] });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle });
    const controller = new AbortController();
    controller.abort();

    const { events } = await collectTurn(engine.runTurn({ ...key, message: "hello" }, { abortSignal: controller.signal }));

    expect(events).toEqual([{ type: "error", code: "Aborted", message: "Turn was aborted" }]);
    expect(oracle.requests).toHaveLength(0);
  });

  it("records an aborted capability call before ending the turn", async () => {
    const controller = new AbortController();
    const slow = defineCapability({
      name: "slowSearch",
      description: "Search slowly",
      sideEffect: "read",
      parameters: z.object({}),
      async execute() {
        controller.abort();
        const err = new Error("The operation was aborted");
        err.name = "AbortError";
        throw err;
      },
    });
    const oracle = new ScriptedOracle({ coordinator: [callTool("slowSearch", {}, "t1")] });
    const storage = createMemoryStorage();
    const engine = createEngine({
      root: defineAgent({ name: "coordinator", policy: "", tools: [slow] }),
      oracle,
      storage,
    });

    const { events } = await collectTurn(engine.runTurn({ ...key, message: "search" }, { abortSignal: controller.signal }));

    expect(events.map((e) => e.type)).toEqual(["toolStarted", "error"]);
    expect(events[1]).toEqual({ type: "error", code: "Aborted", message: "Turn was aborted" });
    const session = await storage.sessions.get(key);
    expect(session?.history[session.history.length - 1].payload).toEqual({
      type: "tool-result",
      callId: "t1",
      toolName: "slowSearch",
      error: { code: "Aborted", message: "Turn was aborted" },
    });
  });

  it("reports store failures as InternalError", async () => {
    const oracle = new ScriptedOracle({ coordinator: [say("hi")] });
    const storage = createMemoryStorage();
    storage.sessions.append = async () => {
      throw new Error("disk full");
    };
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    const { events } = await collectTurn(engine.runTurn({ ...key, message: "hello" }));

    expect(events).toEqual([{ type: "error", code: "InternalError", message: "disk full" }]);
  });

  it("runs turns on one session one after another", async () => {
    const step = async (request: OracleRequest) => {
      await tick();
      return say(`re: ${lastUserText(request)}`);
    };
    const oracle = new ScriptedOracle({ coordinator: [step, step] });
    const storage = createMemoryStorage();
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    const [a, b] = await Promise.all([
      collectTurn(engine.runTurn({ ...key, message: "one" })),
      collectTurn(engine.runTurn({ ...key, message: "two" })),
    ]);

    expect(a.response).toBe("re: one");
    expect(b.response).toBe("re: two");
    const session = await storage.sessions.get(key);
    expect(session?.history.map((t) => (t.payload.type === "text" ? t.payload.text : t.payload.type))).toEqual([
      "one",
      "re: one",
      "two",
      "re: two",
    ]);
  });

  it("lets different sessions run concurrently", async () => {
    let unblock: () => void = () => {};
    const gate = new Promise<void>((resolve) => { unblock = resolve; });
    const step = async (request: OracleRequest) => {
      if (lastUserText(request) === "slow") await gate;
      return say(lastUserText(request));
    };
    const oracle = new ScriptedOracle({ coordinator: [step, step] });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle });

    const slow = collectTurn(engine.runTurn({ ...key, message: "slow" }));
    const fast = await collectTurn(engine.runTurn({ ...key, sessionId: "s2", message: "fast" }));
    expect(fast.response).toBe("fast");

    unblock();
    expect((await slow).response).toBe("slow");
  });

  it("deletes a session only after its running turn finishes", async () => {
    let unblock: () => void = () => {};
    const gate = new Promise<void>((resolve) => { unblock = resolve; });
    let entered: () => void = () => {};
    const inOracle = new Promise<void>((resolve) => { entered = resolve; });
    const step = async () => {
      entered();
      await gate;
      return say("done");
    };
    const oracle = new ScriptedOracle({ coordinator: [step] });
    const storage = createMemoryStorage();
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    const turn = collectTurn(engine.runTurn({ ...key, message: "hello" }));
    await inOracle;
    let deleted: boolean | undefined;
    const deletion = engine.deleteSession(key).then((result) => { deleted = result; });
    await tick();
    expect(deleted).toBeUndefined();

    unblock();
    expect((await turn).events).toEqual([{ type: "text", agent: "coordinator", content: "done" }]);
    await deletion;
    expect(deleted).toBe(true);
    expect(await storage.sessions.get(key)).toBeNull();
  });

  it("rejects an invalid step limit", () => {
    const oracle = new ScriptedOracle();
    expect(() => createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, maxSteps: 0 })).toThrow(
      "maxSteps must be a positive integer, got 0",
    );
  });

  it.each([Number.NaN, 0, -1, 2.5])("rejects a per-turn step limit of %s before touching the session", async (maxSteps) => {
    const oracle = new ScriptedOracle({ coordinator: [say("never")] });
    const storage = createMemoryStorage();
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "" }), oracle, storage });

    await expect(collectTurn(engine.runTurn({ ...key, message: "hello" }, { maxSteps }))).rejects.toThrow(
      `maxSteps must be a positive integer, got ${maxSteps}`,
    );
    expect(oracle.requests).toHaveLength(0);
    expect(await storage.sessions.get(key)).toBeNull();
  });

  it("bounds a looping agent by the per-turn step limit", async () => {
    const search = defineCapability({
      name: "search",
      description: "Searches",
      sideEffect: "read",
      parameters: z.object({}),
      execute: async () => ({ hits: 0 }),
    });
    const oracle = new ScriptedOracle({ coordinator: Array.from({ length: 40 }, () => callTool("search")) });
    const engine = createEngine({ root: defineAgent({ name: "coordinator", policy: "", tools: [search] }), oracle });

    const { events } = await collectTurn(engine.runTurn({ ...key, message: "loop" }, { maxSteps: 3 }));

    expect(oracle.requests).toHaveLength(3);
    expect(events[events.length - 1]).toEqual({
      type: "error",
      code: "StepLimitExceeded",
      message: "Turn exceeded the step limit of 3",
    });
  });

  it("rejects an invalid hierarchy at construction", () => {
    const child = defineAgent({ name: "coordinator", policy: "" });
    const root = defineAgent({ name: "coordinator", policy: "", children: [child] });
    expect(() => createEngine({ root, oracle: new ScriptedOracle() })).toThrow('Duplicate agent name "coordinator"');
  });
});

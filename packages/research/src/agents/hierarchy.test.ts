import { describe, it, expect } from "vitest";
import { collectTurn, createEngine, describeHierarchy, validateHierarchy } from "@resdesk/core";
import { ScriptedOracle, callTool, delegateTo, say } from "@resdesk/core/testing";
import { createMemoryRecordStore } from "../storage/in-memory.js";
import type { RecordStore } from "../storage/interfaces.js";
import { AGENT_NAMES, TASK_ASSIGNMENT_KEY, createResearchHierarchy } from "./hierarchy.js";

const { COORDINATOR, DATABASE_MANAGER, RESEARCH_ADMINISTRATOR, FUNDING_ELIGIBILITY, FUNDING_SEARCH } = AGENT_NAMES;
const key = { userId: "alice", sessionId: "s1" };

function setup(oracle: ScriptedOracle, records: RecordStore = createMemoryRecordStore()) {
  const grants = {
    errorcode: 0,
    data: { hitCount: 1, oppHits: [{ id: "350001", title: "Soil Ecology Program", agency: "NSF" }] },
  };
  const root = createResearchHierarchy({
    records,
    funding: { fetch: async () => new Response(JSON.stringify(grants)) },
  });
  const engine = createEngine({ root, oracle });
  return { engine, records };
}

describe("createResearchHierarchy", () => {
  it("builds a valid tree rooted at the coordinator", () => {
    const root = createResearchHierarchy({ records: createMemoryRecordStore() });

    expect(() => validateHierarchy(root)).not.toThrow();
    expect(describeHierarchy(root)).toEqual([
      {
        name: COORDINATOR,
        description: expect.any(String),
        tools: [],
        outputKey: TASK_ASSIGNMENT_KEY,
        parent: null,
        children: [DATABASE_MANAGER, RESEARCH_ADMINISTRATOR],
      },
      {
        name: DATABASE_MANAGER,
        description: expect.any(String),
        tools: [
          "createProject",
          "getProjectDetails",
          "listProjects",
          "updateProject",
          "createPerson",
          "getPersonDetailsByName",
          "getPersonDetailsByEmail",
          "listPeople",
        ],
        parent: COORDINATOR,
        children: [],
      },
      {
        name: RESEARCH_ADMINISTRATOR,
        description: expect.any(String),
        tools: [],
        parent: COORDINATOR,
        children: [FUNDING_ELIGIBILITY, FUNDING_SEARCH],
      },
      {
        name: FUNDING_ELIGIBILITY,
        description: expect.any(String),
        tools: ["getProjectDetails"],
        parent: RESEARCH_ADMINISTRATOR,
        children: [],
      },
      {
        name: FUNDING_SEARCH,
        description: expect.any(String),
        tools: ["getProjectDetails", "searchFundingOpportunities"],
        parent: RESEARCH_ADMINISTRATOR,
        children: [],
      },
    ]);
  });

  it("registers each capability once even when agents share it", () => {
    const { engine } = setup(new ScriptedOracle());
    expect(engine.registry.list().map((c) => c.name)).toEqual([
      "createProject",
      "getProjectDetails",
      "listProjects",
      "updateProject",
      "createPerson",
      "getPersonDetailsByName",
      "getPersonDetailsByEmail",
      "listPeople",
      "searchFundingOpportunities",
    ]);
  });
});

describe("research assistant turns", () => {
  it("creates a project through the database manager", async () => {
    const oracle = new ScriptedOracle({
      [COORDINATOR]: [delegateTo(DATABASE_MANAGER), say("Project P1 'X' is now in the database with status Planning.")],
      [DATABASE_MANAGER]: [
        callTool("createProject", { project_id: "P1", title: "X", status: "Planning" }, "t1"),
        say("Created project P1."),
      ],
    });
    const { engine, records } = setup(oracle);

    const { response, events } = await collectTurn(
      engine.runTurn({ ...key, message: "create project P1 titled 'X' status Planning" }),
    );

    expect(response).toBe("Project P1 'X' is now in the database with status Planning.");
    expect(events).toMatchObject([
      { type: "delegated", from: COORDINATOR, to: DATABASE_MANAGER },
      { type: "toolStarted", agent: DATABASE_MANAGER, name: "createProject", callId: "t1" },
      {
        type: "toolFinished",
        agent: DATABASE_MANAGER,
        name: "createProject",
        callId: "t1",
        ok: true,
        result: { status: "success", message: "Project 'X' (ID: P1) added to the Projects database." },
      },
      { type: "returned", from: DATABASE_MANAGER, to: COORDINATOR },
      { type: "text", agent: COORDINATOR },
    ]);
    expect(await records.projects.get("P1")).toMatchObject({ id: "P1", title: "X", status: "Planning" });

    const session = await engine.storage.sessions.get({ appName: engine.appName, ...key });
    expect(session?.state[TASK_ASSIGNMENT_KEY]).toBe(response);
  });

  it("answers an empty filtered listing with text, not an error", async () => {
    const oracle = new ScriptedOracle({
      [COORDINATOR]: [delegateTo(DATABASE_MANAGER), say("There are no active projects right now.")],
      [DATABASE_MANAGER]: [callTool("listProjects", { status: "Active" }, "t1"), say("No active projects.")],
    });
    const { engine, records } = setup(oracle);
    await records.projects.create({
      id: "P1",
      title: "Soil Microbes",
      status: "Planning",
      investigator: null,
      sponsor: null,
      affiliation: null,
      description: null,
      start_date: null,
      end_date: null,
      human_subjects: "no",
      animal_subjects: "no",
      award_amount: null,
      award_number: null,
      tags: [],
    });

    const { response, events } = await collectTurn(engine.runTurn({ ...key, message: "list active projects" }));

    expect(events.some((e) => e.type === "error")).toBe(false);
    expect(events[2]).toEqual({
      type: "toolFinished",
      agent: DATABASE_MANAGER,
      name: "listProjects",
      callId: "t1",
      ok: true,
      result: { status: "no_projects", message: "No projects found with status 'Active'." },
    });
    expect(events[events.length - 1]).toEqual({
      type: "text",
      agent: COORDINATOR,
      content: "There are no active projects right now.",
    });
    expect(response).toBe("There are no active projects right now.");
  });

  it("leaves the choice between people with the same name to the user", async () => {
    const clarify = "I found two people named Ann Lee. Which one do you mean: ann.lee@example.edu or a.lee@example.edu?";
    const oracle = new ScriptedOracle({
      [COORDINATOR]: [delegateTo(DATABASE_MANAGER), say(clarify)],
      [DATABASE_MANAGER]: [callTool("getPersonDetailsByName", { name: "Ann Lee" }, "t1"), say(clarify)],
    });
    const { engine, records } = setup(oracle);
    await records.people.create({
      id: "u-1",
      name: "Ann Lee",
      email: "ann.lee@example.edu",
      affiliation: "College of Engineering",
      role: "Investigator",
    });
    await records.people.create({
      id: "u-2",
      name: "Ann Lee",
      email: "a.lee@example.edu",
      affiliation: "School of Medicine",
      role: "Investigator",
    });

    const { response, events } = await collectTurn(engine.runTurn({ ...key, message: "show me Ann Lee" }));

    expect(events.filter((e) => e.type === "toolStarted")).toHaveLength(1);
    expect(events[2]).toMatchObject({
      type: "toolFinished",
      ok: true,
      result: { status: "multiple_found", people_found: [{ id: "u-1" }, { id: "u-2" }] },
    });

    const [, afterLookup] = oracle.requestsFor(DATABASE_MANAGER);
    expect(afterLookup.history[afterLookup.history.length - 1].payload).toMatchObject({
      type: "tool-result",
      callId: "t1",
      result: { status: "multiple_found" },
    });
    expect(response).toBe(clarify);
  });

  it("searches funding through the research administrator", async () => {
    const oracle = new ScriptedOracle({
      [COORDINATOR]: [delegateTo(RESEARCH_ADMINISTRATOR), say("One NSF program fits: Soil Ecology Program.")],
      [RESEARCH_ADMINISTRATOR]: [delegateTo(FUNDING_SEARCH), say("Found the Soil Ecology Program.")],
      [FUNDING_SEARCH]: [callTool("searchFundingOpportunities", { keyword: "soil" }, "t1"), say("One match.")],
    });
    const { engine } = setup(oracle);

    const { events } = await collectTurn(engine.runTurn({ ...key, message: "find funding for soil research" }));

    expect(events.map((e) => e.type)).toEqual([
      "delegated",
      "delegated",
      "toolStarted",
      "toolFinished",
      "returned",
      "returned",
      "text",
    ]);
    expect(events[3]).toMatchObject({
      ok: true,
      result: { status: "success", total: 1, opportunities: [{ id: "350001", agency: "NSF" }] },
    });
    expect(events[4]).toEqual({ type: "returned", from: FUNDING_SEARCH, to: RESEARCH_ADMINISTRATOR });
    expect(events[5]).toEqual({ type: "returned", from: RESEARCH_ADMINISTRATOR, to: COORDINATOR });
  });

  it("greets with the session's name and role in state", async () => {
    const oracle = new ScriptedOracle({ [COORDINATOR]: [say("Welcome alice!")] });
    const { engine } = setup(oracle);

    await collectTurn(engine.runTurn({ ...key, message: "hi", role: "research_administrator" }));

    const [request] = oracle.requestsFor(COORDINATOR);
    expect(request.state).toEqual({ name: "alice", role: "research_administrator" });
    expect(request.children.map((c) => c.name)).toEqual([DATABASE_MANAGER, RESEARCH_ADMINISTRATOR]);
  });
});

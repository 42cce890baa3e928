// ── Agents ──
export { createResearchHierarchy, AGENT_NAMES, TASK_ASSIGNMENT_KEY } from "./agents/hierarchy.js";
export type { ResearchHierarchyOptions } from "./agents/hierarchy.js";
export {
  COORDINATOR_PROMPT,
  DATABASE_MANAGER_PROMPT,
  RESEARCH_ADMINISTRATOR_PROMPT,
  FUNDING_ELIGIBILITY_PROMPT,
  FUNDING_SEARCH_PROMPT,
} from "./agents/prompts.js";

// ── Capabilities ──
export { createProjectCapabilities, createProjectParameters, updateProjectParameters } from "./capabilities/projects.js";
export { createPeopleCapabilities } from "./capabilities/people.js";
export { createFundingCapabilities, GRANTS_SEARCH_URL } from "./capabilities/funding.js";
export type { FundingSearchOptions, FetchLike } from "./capabilities/funding.js";

// ── Storage ──
export { PROJECT_STATUSES, YES_NO } from "./storage/interfaces.js";
export type {
  Project,
  NewProject,
  ProjectPatch,
  ProjectStatus,
  ProjectFilter,
  ProjectStore,
  Person,
  NewPerson,
  PersonFilter,
  PersonStore,
  RecordStore,
  YesNo,
} from "./storage/interfaces.js";
export { createMemoryRecordStore, createInMemoryProjectStore, createInMemoryPersonStore } from "./storage/in-memory.js";
export { createFileRecordStore } from "./storage/file-store.js";
export type { FileRecordStoreOptions } from "./storage/file-store.js";

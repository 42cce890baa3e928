import { defineAgent } from "@resdesk/core";
import type { AgentNode } from "@resdesk/core";
import { createFundingCapabilities } from "../capabilities/funding.js";
import type { FundingSearchOptions } from "../capabilities/funding.js";
import { createPeopleCapabilities } from "../capabilities/people.js";
import { createProjectCapabilities } from "../capabilities/projects.js";
import type { RecordStore } from "../storage/interfaces.js";
import {
  COORDINATOR_PROMPT,
  DATABASE_MANAGER_PROMPT,
  FUNDING_ELIGIBILITY_PROMPT,
  FUNDING_SEARCH_PROMPT,
  RESEARCH_ADMINISTRATOR_PROMPT,
} from "./prompts.js";

export const AGENT_NAMES = {
  COORDINATOR: "main_coordinator_agent",
  DATABASE_MANAGER: "database_manager_agent",
  RESEARCH_ADMINISTRATOR: "research_administrator_agent",
  FUNDING_ELIGIBILITY: "funding_eligibility_checker_agent",
  FUNDING_SEARCH: "funding_opportunity_search_agent",
} as const;

/** Session state key that holds the coordinator's last answer */
export const TASK_ASSIGNMENT_KEY = "task_assignment";

export interface ResearchHierarchyOptions {
  records: RecordStore;
  funding?: FundingSearchOptions;
}

/**
 * Builds the research-administration hierarchy:
 *
 * ```
 * main_coordinator_agent
 * ├── database_manager_agent
 * └── research_administrator_agent
 *     ├── funding_eligibility_checker_agent
 *     └── funding_opportunity_search_agent
 * ```
 */
export function createResearchHierarchy(options: ResearchHierarchyOptions): AgentNode {
  const projects = createProjectCapabilities(options.records.projects);
  const people = createPeopleCapabilities(options.records.people);
  const funding = createFundingCapabilities(options.funding);

  const databaseManager = defineAgent({
    name: AGENT_NAMES.DATABASE_MANAGER,
    description: "Lists, creates and updates research project and people records.",
    policy: DATABASE_MANAGER_PROMPT,
    tools: [...projects.all, ...people.all],
  });

  const fundingEligibility = defineAgent({
    name: AGENT_NAMES.FUNDING_ELIGIBILITY,
    description: "Evaluates the funding eligibility of a research project against NSF review criteria.",
    policy: FUNDING_ELIGIBILITY_PROMPT,
    tools: [projects.getProjectDetails],
  });

  const fundingSearch = defineAgent({
    name: AGENT_NAMES.FUNDING_SEARCH,
    description: "Finds open funding opportunities for a research topic or project.",
    policy: FUNDING_SEARCH_PROMPT,
    tools: [projects.getProjectDetails, funding.searchFundingOpportunities],
  });

  const researchAdministrator = defineAgent({
    name: AGENT_NAMES.RESEARCH_ADMINISTRATOR,
    description: "Supports research administration tasks, including funding eligibility and opportunity search.",
    policy: RESEARCH_ADMINISTRATOR_PROMPT,
    children: [fundingEligibility, fundingSearch],
  });

  return defineAgent({
    name: AGENT_NAMES.COORDINATOR,
    description: "The research lifecycle assistant. Routes each request to the right specialist.",
    policy: COORDINATOR_PROMPT,
    children: [databaseManager, researchAdministrator],
    outputKey: TASK_ASSIGNMENT_KEY,
  });
}

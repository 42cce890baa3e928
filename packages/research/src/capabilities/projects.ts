import { NotFoundError, defineCapability } from "@resdesk/core";
import type { Capability } from "@resdesk/core";
import { z } from "zod";
import { PROJECT_STATUSES, YES_NO } from "../storage/interfaces.js";
import type { ProjectPatch, ProjectStore } from "../storage/interfaces.js";
import { definedFields } from "../storage/record-helpers.js";
import { describeFilters, limitList } from "./results.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date in YYYY-MM-DD format");

const projectFields = {
  status: z.enum(PROJECT_STATUSES).describe('Project status: "Planning", "Active", "Completed" or "On Hold"'),
  investigator: z.string().describe("Principal investigator, e.g. Tyler Johnson"),
  sponsor: z.string().describe("Funding sponsor, e.g. National Science Foundation"),
  affiliation: z.string().describe("e.g. College of Engineering"),
  description: z.string(),
  start_date: isoDate.describe("YYYY-MM-DD"),
  end_date: isoDate.describe("YYYY-MM-DD"),
  human_subjects: z.enum(YES_NO).describe('"yes" or "no"'),
  animal_subjects: z.enum(YES_NO).describe('"yes" or "no"'),
  award_amount: z.number().nonnegative().describe("Award amount in USD"),
  award_number: z.string(),
  tags: z.array(z.string()),
};

export const createProjectParameters = z.object({
  project_id: z.string().min(1).describe("Unique project id"),
  title: z.string().min(1),
  status: projectFields.status,
  investigator: projectFields.investigator.optional(),
  sponsor: projectFields.sponsor.optional(),
  affiliation: projectFields.affiliation.optional(),
  description: projectFields.description.optional(),
  start_date: projectFields.start_date.optional(),
  end_date: projectFields.end_date.optional(),
  human_subjects: projectFields.human_subjects.default("no"),
  animal_subjects: projectFields.animal_subjects.default("no"),
  award_amount: projectFields.award_amount.optional(),
  award_number: projectFields.award_number.optional(),
  tags: projectFields.tags.default([]),
});

export const updateProjectParameters = z.object({
  project_id: z.string().min(1).describe("Id of the project to update"),
  status: projectFields.status.optional(),
  investigator: projectFields.investigator.optional(),
  sponsor: projectFields.sponsor.optional(),
  affiliation: projectFields.affiliation.optional(),
  description: projectFields.description.optional(),
  start_date: projectFields.start_date.optional(),
  end_date: projectFields.end_date.optional(),
  human_subjects: projectFields.human_subjects.optional(),
  animal_subjects: projectFields.animal_subjects.optional(),
  award_amount: projectFields.award_amount.optional(),
  award_number: projectFields.award_number.optional(),
  tags: projectFields.tags.optional(),
});

export function createProjectCapabilities(store: ProjectStore) {
  const createProject = defineCapability({
    name: "createProject",
    description:
      "Add a new research project. Requires project_id, title and status; the other fields are optional.",
    sideEffect: "mutate",
    parameters: createProjectParameters,
    async execute(input) {
      const project = await store.create({
        id: input.project_id,
        title: input.title,
        status: input.status,
        investigator: input.investigator ?? null,
        sponsor: input.sponsor ?? null,
        affiliation: input.affiliation ?? null,
        description: input.description ?? null,
        start_date: input.start_date ?? null,
        end_date: input.end_date ?? null,
        human_subjects: input.human_subjects,
        animal_subjects: input.animal_subjects,
        award_amount: input.award_amount ?? null,
        award_number: input.award_number ?? null,
        tags: input.tags,
      });
      console.log(`[research] Created project ${project.id}`);
      return {
        status: "success",
        message: `Project '${project.title}' (ID: ${project.id}) added to the Projects database.`,
        project,
      };
    },
  });

  const getProjectDetails = defineCapability({
    name: "getProjectDetails",
    description: "Retrieve all details of a project by its project_id.",
    sideEffect: "read",
    parameters: z.object({ project_id: z.string().min(1) }),
    async execute({ project_id }) {
      const project = await store.get(project_id);
      if (!project) throw new NotFoundError(`Project with ID '${project_id}' not found.`);
      return { status: "success", project };
    },
  });

  const listProjects = defineCapability({
    name: "listProjects",
    description:
      "List projects, optionally filtered by status, affiliation or sponsor. " +
      "Returns at most 20 projects with the total number of matches.",
    sideEffect: "read",
    parameters: z.object({
      status: z.string().optional().describe('e.g. "Active" or "Planning"'),
      affiliation: z.string().optional().describe("e.g. College of Social Sciences"),
      sponsor: z.string().optional().describe("e.g. National Institutes of Health"),
    }),
    async execute(filter) {
      const projects = await store.list(filter);
      if (projects.length === 0) {
        const filters = describeFilters(filter);
        return {
          status: "no_projects",
          message: filters ? `No projects found with ${filters}.` : "No projects found in the database.",
        };
      }
      const { total, truncated, items } = limitList(projects);
      return { status: "success", total, truncated, projects: items };
    },
  });

  const updateProject = defineCapability({
    name: "updateProject",
    description:
      "Update fields of an existing project. Only the fields provided change; the title cannot be changed.",
    sideEffect: "mutate",
    parameters: updateProjectParameters,
    async execute({ project_id, ...fields }) {
      const patch: ProjectPatch = definedFields(fields);
      const updatedFields = Object.keys(patch);
      if (updatedFields.length === 0) {
        return { status: "info", message: "No fields provided for update." };
      }
      const project = await store.update(project_id, patch);
      console.log(`[research] Updated project ${project_id}: ${updatedFields.join(", ")}`);
      return {
        status: "success",
        message: `Project '${project_id}' updated successfully.`,
        updated_fields: updatedFields,
        project,
      };
    },
  });

  const capabilities: Capability[] = [createProject, getProjectDetails, listProjects, updateProject];
  return { createProject, getProjectDetails, listProjects, updateProject, all: capabilities };
}

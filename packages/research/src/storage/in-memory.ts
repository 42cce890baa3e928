import { ConflictError, NotFoundError } from "@resdesk/core";
import type { Person, PersonStore, Project, ProjectStore, RecordStore } from "./interfaces.js";
import { definedFields, matchesFilter } from "./record-helpers.js";

export function createInMemoryProjectStore(): ProjectStore {
  const projects = new Map<string, Project>();

  return {
    async create(project) {
      if (projects.has(project.id)) throw new ConflictError(`Project with ID '${project.id}' already exists.`);
      const record: Project = { ...project, tags: [...project.tags], created_at: new Date().toISOString() };
      projects.set(record.id, record);
      return structuredClone(record);
    },

    async get(id) {
      const project = projects.get(id);
      return project ? structuredClone(project) : null;
    },

    async list(filter = {}) {
      return [...projects.values()].filter((p) => matchesFilter(p, filter)).map((p) => structuredClone(p));
    },

    async update(id, patch) {
      const project = projects.get(id);
      if (!project) throw new NotFoundError(`Project with ID '${id}' not found.`);
      const updated: Project = { ...project, ...definedFields(patch) };
      projects.set(id, updated);
      return structuredClone(updated);
    },
  };
}

export function createInMemoryPersonStore(): PersonStore {
  const people = new Map<string, Person>();

  return {
    async create(person) {
      if (people.has(person.id)) throw new ConflictError(`Person with ID '${person.id}' already exists.`);
      const record: Person = { ...person, created_at: new Date().toISOString() };
      people.set(record.id, record);
      return { ...record };
    },

    async get(id) {
      const person = people.get(id);
      return person ? { ...person } : null;
    },

    async list(filter = {}) {
      return [...people.values()].filter((p) => matchesFilter(p, filter)).map((p) => ({ ...p }));
    },
  };
}

/**
 * Creates a fully in-memory RecordStore.
 * Records live in process memory and are lost on restart.
 */
export function createMemoryRecordStore(): RecordStore {
  return {
    projects: createInMemoryProjectStore(),
    people: createInMemoryPersonStore(),
  };
}

import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ConflictError, KeyedLock, NotFoundError, TransientError, errorMessage } from "@resdesk/core";
import { PROJECT_STATUSES, YES_NO } from "./interfaces.js";
import type { Person, PersonStore, Project, ProjectStore, RecordStore } from "./interfaces.js";
import { definedFields, matchesFilter } from "./record-helpers.js";

const projectSchema = z.object({
  id: z.string(),
  title: z.string(),
  status: z.enum(PROJECT_STATUSES),
  investigator: z.string().nullable(),
  sponsor: z.string().nullable(),
  affiliation: z.string().nullable(),
  description: z.string().nullable(),
  start_date: z.string().nullable(),
  end_date: z.string().nullable(),
  human_subjects: z.enum(YES_NO),
  animal_subjects: z.enum(YES_NO),
  award_amount: z.number().nullable(),
  award_number: z.string().nullable(),
  tags: z.array(z.string()),
  created_at: z.string(),
});

const personSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  affiliation: z.string(),
  role: z.string(),
  created_at: z.string(),
});

/**
 * One JSON file per collection, holding an object keyed by record id.
 * Writes go through a temp file and a rename, serialised per collection.
 */
function createCollection<T extends { id: string }>(path: string, schema: z.ZodType<T>) {
  const locks = new KeyedLock();
  const dir = resolve(path, "..");

  async function io<R>(action: string, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new TransientError(`Record storage failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function read(): Promise<Map<string, T>> {
    if (!existsSync(path)) return new Map();
    const raw = await io("read records", () => readFile(path, "utf-8"));
    const parsed = z.record(schema).safeParse(JSON.parse(raw));
    if (!parsed.success) throw new Error(`Malformed records file ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    return new Map(Object.entries(parsed.data));
  }

  async function write(records: Map<string, T>): Promise<void> {
    await io("write records", async () => {
      await mkdir(dir, { recursive: true });
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify(Object.fromEntries(records), null, 2));
      await rename(tmp, path);
    });
  }

  return {
    read,
    /** Read-modify-write under the collection lock */
    mutate<R>(fn: (records: Map<string, T>) => R): Promise<R> {
      return locks.run(path, async () => {
        const records = await read();
        const result = fn(records);
        await write(records);
        return result;
      });
    },
  };
}

export interface FileRecordStoreOptions {
  /** Base directory for all data files (e.g. "./data") */
  dataDir: string;
}

export function createFileRecordStore(options: FileRecordStoreOptions): RecordStore {
  const baseDir = join(resolve(options.dataDir), "records");
  const projects = createCollection<Project>(join(baseDir, "projects.json"), projectSchema);
  const people = createCollection<Person>(join(baseDir, "people.json"), personSchema);

  const projectStore: ProjectStore = {
    create(project) {
      return projects.mutate((records) => {
        if (records.has(project.id)) throw new ConflictError(`Project with ID '${project.id}' already exists.`);
        const record: Project = { ...project, created_at: new Date().toISOString() };
        records.set(record.id, record);
        return record;
      });
    },

    async get(id) {
      return (await projects.read()).get(id) ?? null;
    },

    async list(filter = {}) {
      return [...(await projects.read()).values()].filter((p) => matchesFilter(p, filter));
    },

    update(id, patch) {
      return projects.mutate((records) => {
        const project = records.get(id);
        if (!project) throw new NotFoundError(`Project with ID '${id}' not found.`);
        const updated: Project = { ...project, ...definedFields(patch) };
        records.set(id, updated);
        return updated;
      });
    },
  };

  const personStore: PersonStore = {
    create(person) {
      return people.mutate((records) => {
        if (records.has(person.id)) throw new ConflictError(`Person with ID '${person.id}' already exists.`);
        const record: Person = { ...person, created_at: new Date().toISOString() };
        records.set(record.id, record);
        return record;
      });
    },

    async get(id) {
      return (await people.read()).get(id) ?? null;
    },

    async list(filter = {}) {
      return [...(await people.read()).values()].filter((p) => matchesFilter(p, filter));
    },
  };

  return { projects: projectStore, people: personStore };
}

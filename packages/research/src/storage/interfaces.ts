export const PROJECT_STATUSES = ["Planning", "Active", "Completed", "On Hold"] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const YES_NO = ["yes", "no"] as const;
export type YesNo = (typeof YES_NO)[number];

export interface Project {
  id: string;
  title: string;
  status: ProjectStatus;
  investigator: string | null;
  sponsor: string | null;
  affiliation: string | null;
  description: string | null;
  /** YYYY-MM-DD */
  start_date: string | null;
  /** YYYY-MM-DD */
  end_date: string | null;
  human_subjects: YesNo;
  animal_subjects: YesNo;
  /** USD */
  award_amount: number | null;
  award_number: string | null;
  tags: string[];
  created_at: string;
}

export type NewProject = Omit<Project, "created_at">;

/** Fields an update may change. The id, title and creation time are fixed. */
export type ProjectPatch = Partial<Omit<Project, "id" | "title" | "created_at">>;

export interface Person {
  id: string;
  name: string;
  email: string;
  affiliation: string;
  role: string;
  created_at: string;
}

export type NewPerson = Omit<Person, "created_at">;

/** Exact-match filters; omitted fields match everything */
export interface ProjectFilter {
  status?: string;
  affiliation?: string;
  sponsor?: string;
}

export interface PersonFilter {
  name?: string;
  email?: string;
  role?: string;
  affiliation?: string;
}

/**
 * Project records keyed by id.
 *
 * `create()` rejects with `ConflictError` when the id is taken; `update()`
 * rejects with `NotFoundError` when it is unknown. Backends that lose their
 * connection should throw `TransientError`.
 */
export interface ProjectStore {
  create(project: NewProject): Promise<Project>;
  /** Returns `null` if not found. */
  get(id: string): Promise<Project | null>;
  /** Matching projects in creation order */
  list(filter?: ProjectFilter): Promise<Project[]>;
  update(id: string, patch: ProjectPatch): Promise<Project>;
}

/** Person records keyed by id. Same error contract as `ProjectStore`. */
export interface PersonStore {
  create(person: NewPerson): Promise<Person>;
  /** Returns `null` if not found. */
  get(id: string): Promise<Person | null>;
  /** Matching people in creation order */
  list(filter?: PersonFilter): Promise<Person[]>;
}

/**
 * The document store behind the research capabilities.
 *
 * Use `createMemoryRecordStore()` for tests and demos or
 * `createFileRecordStore()` for JSON files on disk, or implement both stores
 * against your own database.
 */
export interface RecordStore {
  projects: ProjectStore;
  people: PersonStore;
}

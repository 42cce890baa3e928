import { NotFoundError, defineCapability } from "@resdesk/core";
import type { Capability } from "@resdesk/core";
import { z } from "zod";
import type { Person, PersonStore } from "../storage/interfaces.js";
import { limitList } from "./results.js";

/** A single match, or the candidates when the lookup is ambiguous */
function singlePerson(people: Person[], field: "name" | "email", value: string, hint: string) {
  if (people.length === 0) throw new NotFoundError(`Person with ${field} '${value}' not found.`);
  if (people.length > 1) {
    return {
      status: "multiple_found",
      message:
        `Multiple people with the ${field} '${value}' found. ` +
        `Please provide more specific information (e.g., ${hint} or a unique ID) to identify the correct person.`,
      people_found: people,
    };
  }
  return { status: "success", person: people[0] };
}

function noPeopleMessage(role?: string, affiliation?: string): string {
  if (role && affiliation) return `No people found with role '${role}' and affiliation '${affiliation}'.`;
  if (role) return `No people found with role '${role}'.`;
  if (affiliation) return `No people found with affiliation '${affiliation}'.`;
  return "No people found in the database.";
}

export function createPeopleCapabilities(store: PersonStore) {
  const createPerson = defineCapability({
    name: "createPerson",
    description: "Add a new person with an id, name, email, affiliation and role.",
    sideEffect: "mutate",
    parameters: z.object({
      person_id: z.string().min(1),
      name: z.string().min(1).describe("Firstname Lastname"),
      email: z.string().email(),
      affiliation: z.string().min(1).describe('e.g. "College of Engineering"'),
      role: z.string().min(1).describe('e.g. "Investigator" or "Research Administrator"'),
    }),
    async execute(input) {
      const person = await store.create({
        id: input.person_id,
        name: input.name,
        email: input.email,
        affiliation: input.affiliation,
        role: input.role,
      });
      console.log(`[research] Created person ${person.id}`);
      return { status: "success", message: `Person '${person.name}' (ID: ${person.id}) added.`, person };
    },
  });

  const getPersonDetailsByName = defineCapability({
    name: "getPersonDetailsByName",
    description: "Retrieve a person by name in 'Firstname Lastname' format.",
    sideEffect: "read",
    parameters: z.object({ name: z.string().min(1) }),
    async execute({ name }) {
      return singlePerson(await store.list({ name }), "name", name, "email");
    },
  });

  const getPersonDetailsByEmail = defineCapability({
    name: "getPersonDetailsByEmail",
    description: "Retrieve a person by email address.",
    sideEffect: "read",
    parameters: z.object({ email: z.string().min(1) }),
    async execute({ email }) {
      return singlePerson(await store.list({ email }), "email", email, "name");
    },
  });

  const listPeople = defineCapability({
    name: "listPeople",
    description:
      "List people, optionally filtered by role or affiliation. " +
      "Returns at most 20 people with the total number of matches.",
    sideEffect: "read",
    parameters: z.object({
      role: z.string().optional().describe('e.g. "Investigator"'),
      affiliation: z.string().optional(),
    }),
    async execute({ role, affiliation }) {
      const people = await store.list({ role, affiliation });
      if (people.length === 0) return { status: "no_people", message: noPeopleMessage(role, affiliation) };
      const { total, truncated, items } = limitList(people);
      return { status: "success", total, truncated, people: items };
    },
  });

  const capabilities: Capability[] = [createPerson, getPersonDetailsByName, getPersonDetailsByEmail, listPeople];
  return { createPerson, getPersonDetailsByName, getPersonDetailsByEmail, listPeople, all: capabilities };
}

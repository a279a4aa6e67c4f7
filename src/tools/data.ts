// src/tools/data.ts

import {
  PeopleStore,
  personInputSchema,
  peopleFilterSchema,
} from "../data/people";
import { logger } from "../utils/logger";
import { ToolDefinition } from "./types";

/**
 * add_data / read_data backed by the people store.
 * Arguments that fail validation give the tool's failure value
 * (false / []) rather than an exception.
 */
export function createDataTools(people: PeopleStore): ToolDefinition[] {
  return [
    {
      name: "add_data",
      description:
        "Insert one person into the people table. Returns true on success, false on failure.",
      category: "write",
      input_schema: {
        type: "object",
        properties: {
          name: { type: "string", description: "Full name of the person", minLength: 1 },
          age: {
            type: "integer",
            description: "Age in whole years",
            minimum: 0,
            maximum: 150,
          },
          profession: {
            type: "string",
            description: "Job title or profession",
            minLength: 1,
          },
        },
        required: ["name", "age", "profession"],
      },
      function: (args) => {
        const parsed = personInputSchema.safeParse(args);
        if (!parsed.success) {
          logger.warn(`[add_data] Rejected input: ${parsed.error.message}`);
          return false;
        }
        return people.add(parsed.data);
      },
    },
    {
      name: "read_data",
      description:
        "Read people (id, name, age, profession) in storage order. Call with no arguments to list everyone; " +
        "combine name, profession, minAge, maxAge (inclusive) and limit to filter, e.g. minAge 31 for 'over 30'.",
      category: "read",
      input_schema: {
        type: "object",
        properties: {
          name: { type: "string", description: "Case-insensitive substring of the name" },
          profession: {
            type: "string",
            description: "Case-insensitive substring of the profession",
          },
          minAge: { type: "integer", description: "Minimum age, inclusive" },
          maxAge: { type: "integer", description: "Maximum age, inclusive" },
          limit: { type: "integer", description: "Maximum rows", minimum: 1 },
        },
      },
      function: (args) => {
        const parsed = peopleFilterSchema.safeParse(args);
        if (!parsed.success) {
          logger.warn(`[read_data] Rejected filter: ${parsed.error.message}`);
          return [];
        }
        return people.query(parsed.data);
      },
    },
  ];
}

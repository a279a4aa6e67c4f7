// src/data/people.ts

import { and, asc, count, gte, lte, sql, SQL } from "drizzle-orm";
import { z } from "zod";
import { AppDatabase } from "../db";
import { people, Person } from "../db/schema";
import { logger } from "../utils/logger";

export const personInputSchema = z.object({
  name: z.string().trim().min(1),
  age: z.number().int().min(0).max(150),
  profession: z.string().trim().min(1),
});

export const peopleFilterSchema = z.object({
  name: z.string().trim().min(1).optional(),
  profession: z.string().trim().min(1).optional(),
  minAge: z.number().int().optional(),
  maxAge: z.number().int().optional(),
  limit: z.number().int().positive().optional(),
});

export type PersonInput = z.infer<typeof personInputSchema>;
export type PeopleFilter = z.infer<typeof peopleFilterSchema>;

/**
 * Typed access to the people table. Every statement is built by drizzle
 * with bound parameters; no caller text is executed as SQL.
 */
export class PeopleStore {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Insert one person. Returns false instead of throwing when the input
   * is invalid or the insert fails.
   */
  add(input: PersonInput): boolean {
    logger.info(`📥 [add_data] Inserting ${JSON.stringify(input)}`);
    const parsed = personInputSchema.safeParse(input);
    if (!parsed.success) {
      logger.warn(`Rejected person: ${parsed.error.message}`);
      return false;
    }

    try {
      this.db.insert(people).values(parsed.data).run();
      logger.success("Inserted successfully.");
      return true;
    } catch (error) {
      logger.error("Insert error", error);
      return false;
    }
  }

  /**
   * Rows matching every given filter, in storage (id) order.
   * An empty filter reads the whole table.
   */
  query(rawFilter: PeopleFilter = {}): Person[] {
    logger.info(`📤 [read_data] Filter ${JSON.stringify(rawFilter)}`);
    const parsed = peopleFilterSchema.safeParse(rawFilter);
    if (!parsed.success) {
      logger.warn(`Rejected filter: ${parsed.error.message}`);
      return [];
    }

    const filter = parsed.data;
    try {
      const conditions: SQL[] = [];

      if (filter.name) {
        conditions.push(
          sql`instr(lower(${people.name}), ${filter.name.toLowerCase()}) > 0`,
        );
      }
      if (filter.profession) {
        conditions.push(
          sql`instr(lower(${people.profession}), ${filter.profession.toLowerCase()}) > 0`,
        );
      }
      if (filter.minAge !== undefined) {
        conditions.push(gte(people.age, filter.minAge));
      }
      if (filter.maxAge !== undefined) {
        conditions.push(lte(people.age, filter.maxAge));
      }

      const base = this.db
        .select()
        .from(people)
        .where(and(...conditions))
        .orderBy(asc(people.id));

      const rows =
        filter.limit !== undefined ? base.limit(filter.limit).all() : base.all();

      logger.success(`Retrieved ${rows.length} rows.`);
      return rows;
    } catch (error) {
      logger.error("Read error", error);
      return [];
    }
  }

  count(): number {
    const row = this.db.select({ value: count() }).from(people).get();
    return row?.value ?? 0;
  }
}

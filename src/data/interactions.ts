// src/data/interactions.ts

import { count, desc } from "drizzle-orm";
import { AppDatabase } from "../db";
import { interactions, Interaction } from "../db/schema";

export interface InteractionEntry {
  prompt: string;
  response: string;
  toolUsed: string | null;
  timeTakenSec: number;
}

/**
 * Audit log of chat turns. Rows are only ever appended.
 */
export class InteractionLog {
  constructor(private readonly db: AppDatabase) {}

  record(entry: InteractionEntry): Interaction {
    const [row] = this.db
      .insert(interactions)
      .values({
        prompt: entry.prompt,
        response: entry.response,
        toolUsed: entry.toolUsed,
        timeTakenSec: entry.timeTakenSec,
      })
      .returning()
      .all();

    if (!row) throw new Error("Interaction insert returned no row");
    return row;
  }

  /** Newest first */
  recent(limit: number = 5): Interaction[] {
    return this.db
      .select()
      .from(interactions)
      .orderBy(desc(interactions.id))
      .limit(limit)
      .all();
  }

  count(): number {
    const row = this.db.select({ value: count() }).from(interactions).get();
    return row?.value ?? 0;
  }
}

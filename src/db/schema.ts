import { sql } from "drizzle-orm";
import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";

export const people = sqliteTable("people", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  age: integer("age").notNull(),
  profession: text("profession").notNull(),
});

// Append-only: one row per chat turn
export const interactions = sqliteTable("interactions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  prompt: text("prompt").notNull(),
  response: text("response").notNull(),
  toolUsed: text("tool_used"), // null when the model answered without a tool
  timeTakenSec: real("time_taken_sec").notNull(),
  timestamp: text("timestamp")
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`), // "YYYY-MM-DD HH:MM:SS" UTC
});

export type Person = typeof people.$inferSelect;
export type Interaction = typeof interactions.$inferSelect;

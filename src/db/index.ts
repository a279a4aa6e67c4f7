import { drizzle, BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";
import { logger } from "../utils/logger";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  /** Raw connection for DDL and PRAGMA queries */
  rawDb: Database.Database;
  close(): void;
}

/**
 * Open (or create) the SQLite file shared by the tool host and the chat
 * client, and make sure both tables exist. Pass ":memory:" for tests.
 */
export function openDatabase(file: string): DatabaseHandle {
  const sqlite = new Database(file);
  initializeDatabase(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    rawDb: sqlite,
    close: () => sqlite.close(),
  };
}

/**
 * Create both tables. Safe to call multiple times — uses IF NOT EXISTS.
 */
export function initializeDatabase(rawDb: Database.Database): void {
  rawDb.exec(`
    CREATE TABLE IF NOT EXISTS people (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      age INTEGER NOT NULL,
      profession TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS interactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      prompt TEXT NOT NULL,
      response TEXT NOT NULL,
      tool_used TEXT,
      time_taken_sec REAL NOT NULL,
      timestamp DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
  `);

  // Databases written before tool tracking lack the tool_used column
  const columns = rawDb
    .prepare<[], { name: string }>("PRAGMA table_info(interactions)")
    .all();

  if (!columns.some((c) => c.name === "tool_used")) {
    rawDb.exec("ALTER TABLE interactions ADD COLUMN tool_used TEXT");
    logger.info("Added tool_used column to interactions");
  }

  logger.debug("Database initialized with people and interactions tables");
}

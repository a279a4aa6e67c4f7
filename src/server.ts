// src/server.ts — Data-Access Tool Host

import * as dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { PeopleStore } from "./data/people";
import { loadAllTools } from "./tools/loader";
import { McpHttpServer } from "./mcp/server";
import { logger } from "./utils/logger";

async function start() {
  const config = loadConfig();

  logger.info(`🔧 Connecting to SQLite DB: ${config.dbPath}`);
  const database = openDatabase(config.dbPath);
  logger.success("✅ Tables are ready.");

  const people = new PeopleStore(database.db);
  const registry = loadAllTools(people, { readOnly: config.mcp.readOnly });

  const server = new McpHttpServer(registry, {
    host: config.mcp.host,
    port: config.mcp.port,
  });
  await server.start();

  const shutdown = async () => {
    logger.warn("Shutting down...");
    try {
      await server.shutdown();
    } finally {
      database.close();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

start().catch((err: unknown) => {
  logger.error("Fatal error:", err);
  process.exit(1);
});

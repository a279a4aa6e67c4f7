// src/client.ts — Tool-Invoking Agent and chat UI

import * as dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { InteractionLog } from "./data/interactions";
import { createLLMProvider } from "./agent/llmProvider";
import { McpToolClient } from "./agent/mcpClient";
import { AgentOrchestrator } from "./agent/orchestrator";
import { ApiServer } from "./api/server";
import { logger } from "./utils/logger";

async function start() {
  logger.info("🚀 Starting SQLite agent...");
  const config = loadConfig();

  // Same store as the tool host; this process only appends interactions
  const database = openDatabase(config.dbPath);
  const interactions = new InteractionLog(database.db);

  const llm = createLLMProvider(config.ollama);
  const toolClient = new McpToolClient(config.mcpServerUrl);

  const agent = new AgentOrchestrator(llm, toolClient, interactions);
  await agent.initialize();
  logger.success("✅ Agent ready.");

  const apiServer = new ApiServer(agent, interactions, {
    host: config.chat.host,
    port: config.chat.port,
    apiToken: config.chat.apiToken,
  });
  await apiServer.start();

  const shutdown = async () => {
    logger.warn("Shutting down...");
    try {
      await apiServer.shutdown();
      await toolClient.disconnect();
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

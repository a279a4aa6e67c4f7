// src/config.ts

import { logger } from "./utils/logger";

export interface AppConfig {
  dbPath: string;
  mcp: {
    host: string;
    port: number;
    /** Registers the write tools disabled */
    readOnly: boolean;
  };
  mcpServerUrl: string;
  ollama: {
    /** LLM_PROVIDER; only "ollama" is supported */
    provider: string;
    host: string;
    model: string;
    timeoutMs: number;
  };
  chat: {
    host: string;
    port: number;
    apiToken: string | null;
  };
}

export const DEFAULT_CONFIG: AppConfig = {
  dbPath: "demo.db",
  mcp: { host: "127.0.0.1", port: 8000, readOnly: false },
  mcpServerUrl: "http://127.0.0.1:8000/mcp",
  ollama: {
    provider: "ollama",
    host: "http://127.0.0.1:11434",
    model: "granite3.1-moe",
    timeoutMs: 300_000,
  },
  chat: { host: "127.0.0.1", port: 7860, apiToken: null },
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    logger.warn(`Ignoring ${key}="${raw}" (not a non-negative integer), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the runtime configuration from environment variables.
 * Entry points call dotenv first, so values from .env are visible here.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const mcpHost = readString(env, "MCP_HOST", DEFAULT_CONFIG.mcp.host);
  const mcpPort = readInt(env, "MCP_PORT", DEFAULT_CONFIG.mcp.port);

  return {
    dbPath: readString(env, "DB_PATH", DEFAULT_CONFIG.dbPath),
    mcp: {
      host: mcpHost,
      port: mcpPort,
      readOnly: env.MCP_READ_ONLY === "true",
    },
    mcpServerUrl: readString(
      env,
      "MCP_SERVER_URL",
      `http://${mcpHost}:${mcpPort}/mcp`,
    ),
    ollama: {
      provider: readString(env, "LLM_PROVIDER", DEFAULT_CONFIG.ollama.provider),
      host: readString(env, "OLLAMA_HOST", DEFAULT_CONFIG.ollama.host),
      model: readString(env, "OLLAMA_MODEL", DEFAULT_CONFIG.ollama.model),
      timeoutMs: readInt(
        env,
        "OLLAMA_TIMEOUT_MS",
        DEFAULT_CONFIG.ollama.timeoutMs,
      ),
    },
    chat: {
      host: readString(env, "CHAT_HOST", DEFAULT_CONFIG.chat.host),
      port: readInt(env, "CHAT_PORT", DEFAULT_CONFIG.chat.port),
      apiToken: env.API_TOKEN?.trim() || null,
    },
  };
}

// src/__tests__/config.test.ts

import { DEFAULT_CONFIG, loadConfig } from "../config";

describe("loadConfig", () => {
  it("should use the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should read overrides", () => {
    const config = loadConfig({
      DB_PATH: "/tmp/people.db",
      MCP_PORT: "9100",
      MCP_READ_ONLY: "true",
      OLLAMA_MODEL: "llama3.1",
      CHAT_PORT: "8080",
      API_TOKEN: " test-secret ",
    });

    expect(config.dbPath).toBe("/tmp/people.db");
    expect(config.mcp).toEqual({ host: "127.0.0.1", port: 9100, readOnly: true });
    expect(config.ollama.model).toBe("llama3.1");
    expect(config.chat).toEqual({ host: "127.0.0.1", port: 8080, apiToken: "test-secret" });
  });

  it("should derive the tool host URL from its host and port", () => {
    expect(loadConfig({ MCP_HOST: "localhost", MCP_PORT: "8123" }).mcpServerUrl).toBe(
      "http://localhost:8123/mcp",
    );
    expect(
      loadConfig({ MCP_PORT: "8123", MCP_SERVER_URL: "http://tools:9000/mcp" }).mcpServerUrl,
    ).toBe("http://tools:9000/mcp");
  });

  it("should fall back on invalid numbers", () => {
    const config = loadConfig({ MCP_PORT: "eighty", OLLAMA_TIMEOUT_MS: "-5" });

    expect(config.mcp.port).toBe(8000);
    expect(config.ollama.timeoutMs).toBe(300_000);
  });
});

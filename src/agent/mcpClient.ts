/**
 * MCP tool client for the chat agent.
 *
 * Wraps the @modelcontextprotocol/sdk Client for the single SQLite tool
 * host. Connects lazily on first use over streamable HTTP; tests hand in
 * an in-memory transport instead.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { logger } from "../utils/logger";

/** A tool as the model sees it: JSON-schema parameters */
export interface AgentTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolClient {
  listTools(): Promise<AgentTool[]>;
  /** Text of the tool result; rejects when the tool reports an error */
  callTool(name: string, args: Record<string, unknown>): Promise<string>;
}

export class McpToolClient implements ToolClient {
  private client: Client;
  private connected = false;

  constructor(
    private readonly url: string,
    private readonly transportFactory?: () => Transport,
  ) {
    this.client = new Client(
      { name: "sqlite-agent", version: "1.0.0" },
      { capabilities: {} },
    );
  }

  private createTransport(): Transport {
    if (this.transportFactory) return this.transportFactory();
    return new StreamableHTTPClientTransport(new URL(this.url));
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    const transport = this.createTransport();
    transport.onerror = (err) => {
      logger.error("[MCP] Transport error", err);
    };

    await this.client.connect(transport);
    this.connected = true;
    logger.info(`[MCP] Connected to ${this.url}`);
  }

  async listTools(): Promise<AgentTool[]> {
    await this.connect();
    const { tools } = await this.client.listTools();

    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? "",
      parameters: { ...tool.inputSchema },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    await this.connect();
    const raw = await this.client.callTool({ name, arguments: args });

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Tool '${name}' returned an unrecognised result`);
    }

    const text = extractText(parsed.data.content);
    if (parsed.data.isError) {
      throw new Error(text || `Tool '${name}' failed`);
    }
    return text;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
    logger.info("[MCP] Disconnected");
  }
}

function extractText(content: ReadonlyArray<{ type: string }>): string {
  const parts: string[] = [];
  for (const item of content) {
    if (item.type === "text" && "text" in item && typeof item.text === "string") {
      parts.push(item.text);
    }
  }
  return parts.join("\n");
}

// src/mcp/server.ts

import * as http from "http";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { ToolDefinition } from "../tools/types";
import { ToolRegistry } from "../tools/registry";
import { describeError, logger } from "../utils/logger";

export const SERVER_NAME = "SQLiteMCPServer";
export const SERVER_VERSION = "1.0.0";
export const MCP_PATH = "/mcp";

const INSTRUCTIONS =
  "Tools: add_data(name, age, profession) inserts a person; read_data(name?, profession?, minAge?, maxAge?, limit?) lists people.";

function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

/**
 * Run a registry tool and wrap its return value as an MCP result.
 * A throwing tool becomes an error result; it never escapes to the transport.
 */
export async function runTool(
  tool: ToolDefinition,
  args: Record<string, unknown>,
): Promise<CallToolResult> {
  try {
    const result = await tool.function(args);
    return textResult(result === undefined ? "null" : JSON.stringify(result));
  } catch (error) {
    logger.error(`Error executing ${tool.name}`, error);
    return textResult(`Error executing ${tool.name}: ${describeError(error)}`, true);
  }
}

/**
 * Build an MCP server advertising every enabled registry tool.
 * Arguments are handed to the tool as sent; the tools validate them
 * and answer false / [] for bad input.
 */
export function createMcpServer(registry: ToolRegistry): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: INSTRUCTIONS },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    const tool = registry.getTool(name);

    if (!tool || !registry.isEnabled(name)) {
      logger.warn(`[MCP] Call to unknown or disabled tool '${name}'`);
      return textResult(`Unknown tool: ${name}`, true);
    }

    logger.info(`🔧 [${name}] called with ${JSON.stringify(args)}`);
    return runTool(tool, args);
  });

  return server;
}

export interface McpHttpServerOptions {
  host: string;
  port: number;
}

/**
 * Streamable-HTTP endpoint for the tool host. Runs stateless: every POST
 * gets its own server and transport, so no session survives a request.
 */
export class McpHttpServer {
  private httpServer: http.Server;
  private startTime = Date.now();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly options: McpHttpServerOptions,
  ) {
    this.httpServer = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((error: unknown) => {
        logger.error(`[MCP] ${req.method} ${req.url} failed`, error);
        if (!res.headersSent) {
          sendJsonRpcError(res, 500, -32603, "Internal server error");
        }
      });
    });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off("error", reject);
        logger.success(
          `🚀 SQLite MCP server on http://${this.options.host}:${this.getPort()}${MCP_PATH}`,
        );
        resolve();
      });
    });
  }

  /** Actual port, useful when started on port 0 */
  getPort(): number {
    const address = this.httpServer.address();
    return address && typeof address === "object"
      ? address.port
      : this.options.port;
  }

  private async handleHttp(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const pathname = (req.url || "/").split("?")[0];
    logger.debug(`[MCP] ${req.method} ${pathname}`);

    if (pathname === "/health" && req.method === "GET") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(
        JSON.stringify({
          status: "ok",
          uptime: Math.floor((Date.now() - this.startTime) / 1000),
          tools: this.registry.getDefinitions().map((t) => t.name),
          disabled: this.registry.list({ enabled: false }).map((t) => t.name),
        }),
      );
      return;
    }

    if (pathname !== MCP_PATH) {
      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Not found" }));
      return;
    }

    if (req.method !== "POST") {
      // Stateless mode has no server-initiated stream and no session to delete
      sendJsonRpcError(res, 405, -32000, "Method not allowed.");
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(await readBody(req));
    } catch {
      sendJsonRpcError(res, 400, -32700, "Parse error");
      return;
    }

    const server = createMcpServer(this.registry);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      transport
        .close()
        .then(() => server.close())
        .catch((error: unknown) =>
          logger.warn(`[MCP] Error closing request transport: ${describeError(error)}`),
        );
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  async shutdown(): Promise<void> {
    await new Promise<void>((resolve, reject) =>
      this.httpServer.close((err) => (err ? reject(err) : resolve())),
    );
    logger.info("MCP server shut down");
  }
}

function sendJsonRpcError(
  res: http.ServerResponse,
  status: number,
  code: number,
  message: string,
): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk) => (body += chunk));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

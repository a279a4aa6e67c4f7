// src/api/server.ts

import * as http from "http";
import * as fs from "fs";
import * as path from "path";
import { WebSocketServer, WebSocket } from "ws";
import { ChatAgent } from "../agent/orchestrator";
import { InteractionLog } from "../data/interactions";
import { isAuthenticated, unauthorizedResponse } from "./auth";
import { describeError, logger } from "../utils/logger";
import { isRecord } from "../utils/guards";

const DEFAULT_PUBLIC_DIR = path.join(process.cwd(), "public");
const MIME_TYPES: Record<string, string> = {
  ".html": "text/html",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
};

export interface ApiServerOptions {
  host?: string;
  port?: number;
  apiToken?: string | null;
  publicDir?: string;
}

class BadRequestError extends Error {}

export class ApiServer {
  private httpServer: http.Server;
  private wss: WebSocketServer;
  private host: string;
  private port: number;
  private apiToken: string | null;
  private publicDir: string;
  private startTime = Date.now();

  constructor(
    private readonly agent: ChatAgent,
    private readonly interactions: InteractionLog,
    options: ApiServerOptions = {},
  ) {
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port ?? 7860;
    this.apiToken = options.apiToken ?? null;
    this.publicDir = options.publicDir ?? DEFAULT_PUBLIC_DIR;

    this.httpServer = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((error: unknown) => {
        logger.error(`[API] ${req.method} ${req.url} failed`, error);
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: describeError(error) }));
        }
      });
    });

    this.wss = new WebSocketServer({ server: this.httpServer });
    this.wss.on("connection", (ws, req) => this.handleWsConnection(ws, req));
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(this.port, this.host, () => {
        this.httpServer.off("error", reject);
        const base = `http://${this.host}:${this.getPort()}`;
        logger.success(`🌐 Chat UI running at ${base}`);
        logger.info(`   API: ${base}/api/health`);
        resolve();
      });
    });
  }

  /** Actual port, useful when started on port 0 */
  getPort(): number {
    const address = this.httpServer.address();
    return address && typeof address === "object" ? address.port : this.port;
  }

  // ─── HTTP REQUEST HANDLER ─────────────────────────────────────

  private async handleHttp(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    const [pathname, query = ""] = (req.url || "/").split("?");

    logger.debug(`[API] ${req.method} ${pathname}`);

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization",
    );

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (pathname.startsWith("/api/")) {
      if (!isAuthenticated(req, this.apiToken)) {
        res.writeHead(401, { "Content-Type": "application/json" });
        res.end(unauthorizedResponse());
        return;
      }
      await this.handleApiRoute(req, res, pathname, new URLSearchParams(query));
      return;
    }

    this.serveStatic(res, pathname);
  }

  // ─── API ROUTES ───────────────────────────────────────────────

  private async handleApiRoute(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    pathname: string,
    params: URLSearchParams,
  ): Promise<void> {
    const json = (data: unknown, status = 200) => {
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(data));
    };

    try {
      // GET /api/health
      if (pathname === "/api/health" && req.method === "GET") {
        json({
          status: "ok",
          uptime: Math.floor((Date.now() - this.startTime) / 1000),
        });
        return;
      }

      // POST /api/chat — run one turn
      if (pathname === "/api/chat" && req.method === "POST") {
        const body = await this.readJson(req);
        const message =
          typeof body.message === "string" ? body.message.trim() : "";

        if (!message) {
          json({ error: "Missing 'message' field" }, 400);
          return;
        }

        const turn = await this.agent.handleUserMessage(message);
        json({
          response: turn.reply,
          toolUsed: turn.toolUsed,
          durationSec: turn.durationSec,
        });
        return;
      }

      // POST /api/reset — Clear Chat
      if (pathname === "/api/reset" && req.method === "POST") {
        this.agent.reset();
        json({ success: true });
        return;
      }

      // GET /api/interactions?limit=5
      if (pathname === "/api/interactions" && req.method === "GET") {
        const limit = parseLimit(params.get("limit"));
        json({ interactions: this.interactions.recent(limit) });
        return;
      }

      // GET /api/stats
      if (pathname === "/api/stats" && req.method === "GET") {
        json({
          uptime: Math.floor((Date.now() - this.startTime) / 1000),
          agent: this.agent.getStats(),
        });
        return;
      }

      json({ error: "Not found" }, 404);
    } catch (error) {
      if (error instanceof BadRequestError) {
        json({ error: error.message }, 400);
        return;
      }
      logger.error(`API error on ${pathname}`, error);
      json({ error: describeError(error) }, 500);
    }
  }

  // ─── WEBSOCKET HANDLER ────────────────────────────────────────

  private handleWsConnection(ws: WebSocket, req: http.IncomingMessage): void {
    if (!isAuthenticated(req, this.apiToken)) {
      ws.close(4001, "Unauthorized");
      return;
    }

    logger.info("WebChat client connected");

    ws.on("message", (data) => {
      this.handleWsMessage(ws, data.toString()).catch((error: unknown) => {
        ws.send(
          JSON.stringify({ type: "error", message: describeError(error) }),
        );
      });
    });

    ws.on("close", () => {
      logger.info("WebChat client disconnected");
    });

    ws.send(
      JSON.stringify({
        type: "connected",
        message: "Connected to SQLite agent",
        timestamp: new Date().toISOString(),
      }),
    );
  }

  private async handleWsMessage(ws: WebSocket, raw: string): Promise<void> {
    const msg: unknown = JSON.parse(raw);
    if (!isRecord(msg)) {
      throw new Error("Messages must be JSON objects");
    }

    if (msg.type === "chat" && typeof msg.message === "string") {
      ws.send(JSON.stringify({ type: "typing", active: true }));

      const turn = await this.agent.handleUserMessage(msg.message);

      ws.send(
        JSON.stringify({
          type: "response",
          message: turn.reply,
          toolUsed: turn.toolUsed,
          durationSec: turn.durationSec,
          timestamp: new Date().toISOString(),
        }),
      );
      return;
    }

    if (msg.type === "reset") {
      this.agent.reset();
      ws.send(JSON.stringify({ type: "reset" }));
      return;
    }

    if (msg.type === "ping") {
      ws.send(JSON.stringify({ type: "pong" }));
    }
  }

  // ─── STATIC FILE SERVER ───────────────────────────────────────

  private serveStatic(res: http.ServerResponse, pathname: string): void {
    if (pathname === "/") pathname = "/index.html";

    const filePath = resolvePublicPath(this.publicDir, pathname);
    if (!filePath) {
      res.writeHead(403);
      res.end("Forbidden");
      return;
    }

    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      res.writeHead(404);
      res.end("Not found");
      return;
    }

    const ext = path.extname(filePath);
    const contentType = MIME_TYPES[ext] || "application/octet-stream";

    res.writeHead(200, { "Content-Type": contentType });
    res.end(fs.readFileSync(filePath));
  }

  // ─── HELPERS ──────────────────────────────────────────────────

  private readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      let body = "";
      req.on("data", (chunk) => (body += chunk));
      req.on("end", () => resolve(body));
      req.on("error", reject);
    });
  }

  private async readJson(
    req: http.IncomingMessage,
  ): Promise<Record<string, unknown>> {
    const body = await this.readBody(req);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new BadRequestError("Body must be valid JSON");
    }
    if (!isRecord(parsed)) {
      throw new BadRequestError("Body must be a JSON object");
    }
    return parsed;
  }

  async shutdown(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    this.wss.close();
    await new Promise<void>((resolve, reject) =>
      this.httpServer.close((err) => (err ? reject(err) : resolve())),
    );
    logger.info("API server shut down");
  }
}

/**
 * Map a URL path onto a file inside publicDir, or null when it escapes it
 * (including into sibling directories that share the prefix).
 */
export function resolvePublicPath(
  publicDir: string,
  pathname: string,
): string | null {
  const root = path.resolve(publicDir);
  const filePath = path.join(root, pathname);
  return filePath.startsWith(root + path.sep) ? filePath : null;
}

export function parseLimit(raw: string | null, fallback = 5): number {
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) return fallback;
  return Math.min(value, 100);
}

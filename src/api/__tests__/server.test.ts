// src/api/__tests__/server.test.ts

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ApiServer, parseLimit, resolvePublicPath } from "../server";
import { AgentStats, ChatAgent, TurnResult } from "../../agent/orchestrator";
import { InteractionLog } from "../../data/interactions";
import { openDatabase, DatabaseHandle } from "../../db";

class EchoAgent implements ChatAgent {
  resets = 0;
  messages: string[] = [];

  async handleUserMessage(message: string): Promise<TurnResult> {
    this.messages.push(message);
    return { reply: `echo: ${message}`, toolUsed: null, durationSec: 0.01 };
  }

  reset(): void {
    this.resets++;
  }

  getStats(): AgentStats {
    return { model: "ollama/test", tools: ["add_data", "read_data"], historyMessages: 0, interactions: 0 };
  }
}

describe("parseLimit", () => {
  it("should fall back on missing or invalid values and cap large ones", () => {
    expect(parseLimit(null)).toBe(5);
    expect(parseLimit("abc")).toBe(5);
    expect(parseLimit("0")).toBe(5);
    expect(parseLimit("3")).toBe(3);
    expect(parseLimit("5000")).toBe(100);
  });
});

describe("resolvePublicPath", () => {
  const root = path.resolve("/srv/app/public");

  it("should map paths inside the public directory", () => {
    expect(resolvePublicPath(root, "/index.html")).toBe(path.join(root, "index.html"));
    expect(resolvePublicPath(root, "/css/../app.css")).toBe(path.join(root, "app.css"));
  });

  it("should refuse paths that leave it", () => {
    expect(resolvePublicPath(root, "/../secret.txt")).toBeNull();
    expect(resolvePublicPath(root, "/../public2/x.html")).toBeNull();
    expect(resolvePublicPath(root, "/..")).toBeNull();
  });
});

describe("ApiServer", () => {
  let handle: DatabaseHandle;
  let interactions: InteractionLog;
  let agent: EchoAgent;
  let server: ApiServer;
  let publicDir: string;
  let base: string;

  const startServer = async (apiToken: string | null = null) => {
    server = new ApiServer(agent, interactions, {
      host: "127.0.0.1",
      port: 0,
      apiToken,
      publicDir,
    });
    await server.start();
    base = `http://127.0.0.1:${server.getPort()}`;
  };

  beforeEach(() => {
    handle = openDatabase(":memory:");
    interactions = new InteractionLog(handle.db);
    agent = new EchoAgent();
    publicDir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-ui-"));
    fs.writeFileSync(path.join(publicDir, "index.html"), "<h1>chat</h1>");
  });

  afterEach(async () => {
    await server.shutdown();
    handle.close();
    fs.rmSync(publicDir, { recursive: true, force: true });
  });

  const postJson = (route: string, body: string, headers: Record<string, string> = {}) =>
    fetch(`${base}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body,
    });

  describe("without a token", () => {
    beforeEach(() => startServer());

    it("should run a chat turn", async () => {
      const res = await postJson("/api/chat", JSON.stringify({ message: "  hi  " }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        response: "echo: hi",
        toolUsed: null,
        durationSec: 0.01,
      });
      expect(agent.messages).toEqual(["hi"]);
    });

    it("should reject a missing message", async () => {
      const res = await postJson("/api/chat", JSON.stringify({ message: "   " }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing 'message' field" });
    });

    it("should reject a body that is not JSON", async () => {
      const res = await postJson("/api/chat", "{nope");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Body must be valid JSON" });
    });

    it("should reset the conversation", async () => {
      const res = await postJson("/api/reset", "");

      expect(await res.json()).toEqual({ success: true });
      expect(agent.resets).toBe(1);
    });

    it("should list recent interactions newest first", async () => {
      for (const prompt of ["one", "two", "three"]) {
        interactions.record({ prompt, response: "ok", toolUsed: null, timeTakenSec: 0.5 });
      }

      const res = await fetch(`${base}/api/interactions?limit=2`);
      const body: unknown = await res.json();

      expect(body).toEqual({
        interactions: [
          expect.objectContaining({ id: 3, prompt: "three" }),
          expect.objectContaining({ id: 2, prompt: "two" }),
        ],
      });
    });

    it("should report agent stats", async () => {
      const res = await fetch(`${base}/api/stats`);

      expect(await res.json()).toEqual({
        uptime: expect.any(Number),
        agent: {
          model: "ollama/test",
          tools: ["add_data", "read_data"],
          historyMessages: 0,
          interactions: 0,
        },
      });
    });

    it("should return 404 for unknown API routes", async () => {
      const res = await fetch(`${base}/api/nothing`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });

    it("should serve the chat page", async () => {
      const res = await fetch(`${base}/`);

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/html");
      expect(await res.text()).toBe("<h1>chat</h1>");
    });

    it("should return 404 for missing static files", async () => {
      const res = await fetch(`${base}/missing.css`);

      expect(res.status).toBe(404);
    });
  });

  describe("with a token", () => {
    beforeEach(() => startServer("test-secret"));

    it("should refuse API calls without the token", async () => {
      const res = await fetch(`${base}/api/health`);

      expect(res.status).toBe(401);
    });

    it("should accept a bearer token", async () => {
      const res = await fetch(`${base}/api/health`, {
        headers: { Authorization: "Bearer test-secret" },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", uptime: expect.any(Number) });
    });

    it("should accept the token as a query parameter", async () => {
      const res = await fetch(`${base}/api/health?token=test-secret`);

      expect(res.status).toBe(200);
    });

    it("should keep the chat page public", async () => {
      const res = await fetch(`${base}/index.html`);

      expect(res.status).toBe(200);
    });
  });
});

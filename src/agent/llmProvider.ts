// src/agent/llmProvider.ts

// LLM provider abstraction for the chat agent.
// The orchestrator only sees LLMResponse, never a provider's wire format.

import axios, { AxiosInstance } from "axios";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AgentTool } from "./mcpClient";
import { describeError, logger } from "../utils/logger";
import { isRecord } from "../utils/guards";

// ─── Shared Types ──────────────────────────────────────────────

export interface ToolCall {
  name: string;
  input: Record<string, unknown>;
  id: string;
}

export interface ChatMessage {
  role: "user" | "assistant" | "tool";
  content: string;
  /** Calls the assistant made in this message */
  toolCalls?: ToolCall[];
  /** For role "tool": the tool that produced this result */
  toolName?: string;
}

export interface LLMResponse {
  /** "text" = final assistant reply, "tool_use" = model wants to call tools */
  type: "text" | "tool_use";
  text: string | null;
  toolCalls: ToolCall[];
}

export interface LLMCompletionOptions {
  temperature?: number;
  system?: string;
}

export interface LLMProviderInfo {
  model: string;
  provider: "ollama";
  supports_tools: boolean;
}

// ─── Provider Interface ────────────────────────────────────────

export interface LLMProvider {
  complete(
    messages: ChatMessage[],
    tools?: AgentTool[],
    options?: LLMCompletionOptions,
  ): Promise<LLMResponse>;

  getModelInfo(): LLMProviderInfo;
}

// ─── Ollama Provider ───────────────────────────────────────────

const OLLAMA_DEFAULT_HOST = "http://127.0.0.1:11434";
const OLLAMA_DEFAULT_MODEL = "granite3.1-moe";

const ollamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string().nullish(),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
          }),
        }),
      )
      .nullish(),
  }),
});

interface OllamaMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  tool_calls?: Array<{
    function: { name: string; arguments: Record<string, unknown> };
  }>;
  tool_name?: string;
}

export interface OllamaProviderOptions {
  host?: string;
  model?: string;
  timeoutMs?: number;
  retryDelayMs?: number;
  /** Injected HTTP client (tests) */
  http?: Pick<AxiosInstance, "post">;
}

export class OllamaProvider implements LLMProvider {
  private http: Pick<AxiosInstance, "post">;
  private model: string;
  private maxRetries = 3;
  private retryDelay: number;

  constructor(options: OllamaProviderOptions = {}) {
    this.model = options.model || OLLAMA_DEFAULT_MODEL;
    this.retryDelay = options.retryDelayMs ?? 1000;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.host || OLLAMA_DEFAULT_HOST,
        timeout: options.timeoutMs ?? 300_000,
      });
  }

  async complete(
    messages: ChatMessage[],
    tools?: AgentTool[],
    options?: LLMCompletionOptions,
  ): Promise<LLMResponse> {
    const payload: Record<string, unknown> = {
      model: this.model,
      messages: this.buildChatMessages(messages, options?.system),
      stream: false,
    };
    if (options?.temperature !== undefined) {
      payload.options = { temperature: options.temperature };
    }
    if (tools && tools.length > 0) {
      payload.tools = tools.map((t) => ({
        type: "function",
        function: {
          name: t.name,
          description: t.description,
          parameters: t.parameters,
        },
      }));
    }

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const resp = await this.http.post("/api/chat", payload);
        return this.normalizeResponse(resp.data);
      } catch (error) {
        const status = axios.isAxiosError(error)
          ? error.response?.status
          : undefined;
        const isRate = status === 429;
        const isServer = status !== undefined && status >= 500 && status < 600;

        if ((isRate || isServer) && attempt < this.maxRetries - 1) {
          const wait = isRate
            ? this.retryDelay * Math.pow(2, attempt)
            : this.retryDelay;
          logger.warn(`Ollama returned ${status}, retrying in ${wait}ms`);
          await new Promise((r) => setTimeout(r, wait));
          continue;
        }
        throw error;
      }
    }
    throw new Error("Max retries exceeded");
  }

  private normalizeResponse(data: unknown): LLMResponse {
    const parsed = ollamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response: ${parsed.error.message}`);
    }

    const msg = parsed.data.message;
    const text = msg.content ? msg.content : null;

    const toolCalls: ToolCall[] = (msg.tool_calls ?? []).map((call) => ({
      name: call.function.name,
      input: parseArguments(call.function.name, call.function.arguments),
      id: uuidv4(),
    }));

    if (toolCalls.length > 0) {
      return { type: "tool_use", text, toolCalls };
    }
    return { type: "text", text, toolCalls: [] };
  }

  private buildChatMessages(
    messages: ChatMessage[],
    system?: string,
  ): OllamaMessage[] {
    const out: OllamaMessage[] = [];

    if (system && system.trim()) {
      out.push({ role: "system", content: system });
    }

    for (const m of messages) {
      const entry: OllamaMessage = { role: m.role, content: m.content };
      if (m.toolCalls && m.toolCalls.length > 0) {
        entry.tool_calls = m.toolCalls.map((c) => ({
          function: { name: c.name, arguments: c.input },
        }));
      }
      if (m.role === "tool" && m.toolName) {
        entry.tool_name = m.toolName;
      }
      out.push(entry);
    }

    return out;
  }

  getModelInfo(): LLMProviderInfo {
    return {
      model: this.model,
      provider: "ollama",
      supports_tools: true,
    };
  }
}

/**
 * Ollama sends arguments as an object; some models emit a JSON string instead.
 * Anything else is an error, so a garbled call never runs with no arguments.
 */
function parseArguments(
  name: string,
  raw: Record<string, unknown> | string | undefined,
): Record<string, unknown> {
  if (raw === undefined) return {};
  if (typeof raw !== "string") return raw;
  if (!raw.trim()) return {};

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Model sent unreadable arguments for '${name}': ${describeError(error)}`,
    );
  }
  if (!isRecord(value)) {
    throw new Error(`Model sent non-object arguments for '${name}': ${raw}`);
  }
  return value;
}

// ─── Factory ───────────────────────────────────────────────────

/**
 * Create the LLM provider. Only a local Ollama server is supported.
 */
export function createLLMProvider(settings: {
  provider?: string;
  host?: string;
  model?: string;
  timeoutMs?: number;
}): LLMProvider {
  const provider = settings.provider || "ollama";

  if (provider !== "ollama") {
    throw new Error(
      `\n\n❌ LLM Configuration Error!\n` +
        `   LLM_PROVIDER="${provider}" is not supported.\n\n` +
        `   Supported values: "ollama"\n`,
    );
  }

  return new OllamaProvider({
    host: settings.host,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  });
}

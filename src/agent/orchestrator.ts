// src/agent/orchestrator.ts

import { ChatMessage, LLMProvider } from "./llmProvider";
import { AgentTool, ToolClient } from "./mcpClient";
import { InteractionLog } from "../data/interactions";
import { describeError, logger } from "../utils/logger";

export const SYSTEM_PROMPT =
  "You are an assistant. Use the tools to read/write the people database.";
export const EMPTY_REPLY = "⚠️ (empty response)";

export interface TurnResult {
  reply: string;
  /** Tool invoked during the turn, null if the model answered directly */
  toolUsed: string | null;
  durationSec: number;
}

export interface AgentStats {
  model: string;
  tools: string[];
  historyMessages: number;
  interactions: number;
}

/** What the chat API needs from an agent */
export interface ChatAgent {
  handleUserMessage(message: string): Promise<TurnResult>;
  reset(): void;
  getStats(): AgentStats;
}

export interface AgentOrchestratorOptions {
  systemPrompt?: string;
  maxHistory?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

/**
 * Remove <think>…</think> reasoning blocks some local models emit.
 */
export function cleanResponse(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>\s*/g, "").trim();
}

export class AgentOrchestrator implements ChatAgent {
  private tools: AgentTool[] = [];
  private history: ChatMessage[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private systemPrompt: string;
  private maxHistory: number;
  private now: () => number;

  constructor(
    private readonly llm: LLMProvider,
    private readonly toolClient: ToolClient,
    private readonly interactions: InteractionLog,
    options: AgentOrchestratorOptions = {},
  ) {
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.maxHistory = options.maxHistory ?? 20;
    this.now = options.now ?? Date.now;

    const info = this.llm.getModelInfo();
    logger.info(`LLM initialized: ${info.provider}/${info.model}`);
  }

  /**
   * Fetch the tool descriptors from the tool host.
   */
  async initialize(): Promise<void> {
    logger.info("🔵 Fetching tools…");
    this.tools = await this.toolClient.listTools();
    logger.info(
      `🔵 Loaded ${this.tools.length} tools: ${this.tools.map((t) => t.name).join(", ")}`,
    );
  }

  /**
   * Run one chat turn. Turns never overlap: a call made while another turn
   * is running waits for it. Never rejects; failures become the reply.
   */
  handleUserMessage(message: string): Promise<TurnResult> {
    const run = this.queue.then(
      () => this.runTurn(message),
      () => this.runTurn(message),
    );
    this.queue = run;
    return run;
  }

  private async runTurn(message: string): Promise<TurnResult> {
    logger.info(`🟢 USER: ${message}`);
    const started = this.now();
    const turn: { toolUsed: string | null } = { toolUsed: null };

    let reply: string;
    try {
      const raw = await this.converse(message, turn);
      logger.debug(`🟣 RAW RESPONSE: ${JSON.stringify(raw)}`);
      reply = cleanResponse(raw) || EMPTY_REPLY;
      this.remember({ role: "user", content: message });
      this.remember({ role: "assistant", content: reply });
    } catch (error) {
      logger.error("Turn failed", error);
      reply = `⚠️ [ERROR] ${describeError(error)}`;
    }

    const durationSec = Math.round(this.now() - started) / 1000;
    logger.info(`🟣 CLEANED RESPONSE: ${JSON.stringify(reply)}`);

    try {
      this.interactions.record({
        prompt: message,
        response: reply,
        toolUsed: turn.toolUsed,
        timeTakenSec: durationSec,
      });
      logger.info(`[DB] Logged interaction in ${durationSec} sec`);
    } catch (error) {
      logger.error("[DB ERROR] Failed to log interaction", error);
    }

    return { reply, toolUsed: turn.toolUsed, durationSec };
  }

  /**
   * Ask the model; if it asks for a tool, run the first call only, hand
   * the result back and ask again without tools for the final wording.
   */
  private async converse(
    message: string,
    turn: { toolUsed: string | null },
  ): Promise<string> {
    const conversation: ChatMessage[] = [
      ...this.history,
      { role: "user", content: message },
    ];

    const first = await this.llm.complete(conversation, this.tools, {
      system: this.systemPrompt,
    });

    if (first.type !== "tool_use" || first.toolCalls.length === 0) {
      return first.text ?? "";
    }

    const [call, ...ignored] = first.toolCalls;
    if (ignored.length > 0) {
      logger.warn(
        `Model requested ${first.toolCalls.length} tool calls; only '${call.name}' runs this turn`,
      );
    }

    turn.toolUsed = call.name;
    logger.info(`🔧 ToolCall → ${call.name} ${JSON.stringify(call.input)}`);
    const result = await this.toolClient.callTool(call.name, call.input);
    logger.info(
      `Tool '${call.name}' result: ${result.substring(0, 120)}${result.length > 120 ? "..." : ""}`,
    );

    conversation.push({
      role: "assistant",
      content: first.text ?? "",
      toolCalls: [call],
    });
    conversation.push({ role: "tool", content: result, toolName: call.name });

    const second = await this.llm.complete(conversation, undefined, {
      system: this.systemPrompt,
    });
    return second.text ?? "";
  }

  private remember(message: ChatMessage): void {
    this.history.push(message);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }
  }

  /** Forget the conversation (Clear Chat). The interaction log is kept. */
  reset(): void {
    this.history = [];
    logger.info("Conversation history cleared");
  }

  getStats(): AgentStats {
    const info = this.llm.getModelInfo();
    return {
      model: `${info.provider}/${info.model}`,
      tools: this.tools.map((t) => t.name),
      historyMessages: this.history.length,
      interactions: this.interactions.count(),
    };
  }
}

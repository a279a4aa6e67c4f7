// src/agent/__tests__/llmProvider.test.ts

import { AxiosError, AxiosHeaders } from "axios";
import { OllamaProvider, createLLMProvider } from "../llmProvider";
import { AgentTool } from "../mcpClient";

const serverError = (status: number) =>
  new AxiosError("request failed", "ERR_BAD_RESPONSE", undefined, undefined, {
    data: {},
    status,
    statusText: "error",
    headers: {},
    config: { headers: new AxiosHeaders() },
  });

const readTool: AgentTool = {
  name: "read_data",
  description: "Read people",
  parameters: { type: "object", properties: {} },
};

describe("OllamaProvider", () => {
  it("should send model, system prompt, messages and tools to /api/chat", async () => {
    const post = jest.fn().mockResolvedValue({
      data: { message: { role: "assistant", content: "Hello!" } },
    });
    const provider = new OllamaProvider({ model: "test-model", http: { post } });

    const response = await provider.complete(
      [{ role: "user", content: "hi" }],
      [readTool],
      { system: "Be brief." },
    );

    expect(response).toEqual({ type: "text", text: "Hello!", toolCalls: [] });
    expect(post).toHaveBeenCalledWith("/api/chat", {
      model: "test-model",
      stream: false,
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "hi" },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "read_data",
            description: "Read people",
            parameters: { type: "object", properties: {} },
          },
        },
      ],
    });
  });

  it("should normalise tool calls with object or string arguments", async () => {
    const post = jest.fn().mockResolvedValue({
      data: {
        message: {
          role: "assistant",
          content: "",
          tool_calls: [
            { function: { name: "read_data", arguments: { minAge: 31 } } },
            { function: { name: "read_data", arguments: '{"name":"Bob"}' } },
            { function: { name: "read_data", arguments: "" } },
          ],
        },
      },
    });
    const provider = new OllamaProvider({ http: { post } });

    const response = await provider.complete([{ role: "user", content: "q" }]);

    expect(response.type).toBe("tool_use");
    expect(response.text).toBeNull();
    expect(response.toolCalls.map((c) => c.input)).toEqual([
      { minAge: 31 },
      { name: "Bob" },
      {},
    ]);
    expect(response.toolCalls[0].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("should fail on tool arguments that are not a JSON object", async () => {
    const reply = (args: string) => ({
      data: {
        message: {
          role: "assistant",
          content: "",
          tool_calls: [{ function: { name: "read_data", arguments: args } }],
        },
      },
    });
    const post = jest
      .fn()
      .mockResolvedValueOnce(reply("minAge=31"))
      .mockResolvedValueOnce(reply("[31]"));
    const provider = new OllamaProvider({ http: { post } });

    await expect(
      provider.complete([{ role: "user", content: "who is over 30" }]),
    ).rejects.toThrow("Model sent unreadable arguments for 'read_data'");
    await expect(
      provider.complete([{ role: "user", content: "who is over 30" }]),
    ).rejects.toThrow("Model sent non-object arguments for 'read_data': [31]");
    expect(post).toHaveBeenCalledTimes(2);
  });

  it("should map tool turns back into Ollama's message format", async () => {
    const post = jest.fn().mockResolvedValue({
      data: { message: { role: "assistant", content: "Bob is 42." } },
    });
    const provider = new OllamaProvider({ http: { post } });

    await provider.complete([
      { role: "user", content: "who is over 30" },
      {
        role: "assistant",
        content: "",
        toolCalls: [{ id: "call-1", name: "read_data", input: { minAge: 31 } }],
      },
      { role: "tool", content: "[]", toolName: "read_data" },
    ]);

    expect(post.mock.calls[0][1].messages).toEqual([
      { role: "user", content: "who is over 30" },
      {
        role: "assistant",
        content: "",
        tool_calls: [{ function: { name: "read_data", arguments: { minAge: 31 } } }],
      },
      { role: "tool", content: "[]", tool_name: "read_data" },
    ]);
    expect(post.mock.calls[0][1].tools).toBeUndefined();
  });

  it("should retry on server errors", async () => {
    const post = jest
      .fn()
      .mockRejectedValueOnce(serverError(503))
      .mockResolvedValueOnce({
        data: { message: { role: "assistant", content: "ok" } },
      });
    const provider = new OllamaProvider({ http: { post }, retryDelayMs: 0 });

    const response = await provider.complete([{ role: "user", content: "q" }]);

    expect(response.text).toBe("ok");
    expect(post).toHaveBeenCalledTimes(2);
  });

  it("should not retry client errors", async () => {
    const post = jest.fn().mockRejectedValue(serverError(404));
    const provider = new OllamaProvider({ http: { post }, retryDelayMs: 0 });

    await expect(
      provider.complete([{ role: "user", content: "q" }]),
    ).rejects.toThrow("request failed");
    expect(post).toHaveBeenCalledTimes(1);
  });

  it("should reject responses without a message", async () => {
    const post = jest.fn().mockResolvedValue({ data: { error: "model not found" } });
    const provider = new OllamaProvider({ http: { post } });

    await expect(
      provider.complete([{ role: "user", content: "q" }]),
    ).rejects.toThrow("Unexpected Ollama response");
  });
});

describe("createLLMProvider", () => {
  it("should build an Ollama provider with the configured model", () => {
    const provider = createLLMProvider({ provider: "ollama", model: "granite3.1-moe" });
    expect(provider.getModelInfo()).toEqual({
      model: "granite3.1-moe",
      provider: "ollama",
      supports_tools: true,
    });
  });

  it("should reject unsupported providers", () => {
    expect(() => createLLMProvider({ provider: "openai" })).toThrow(
      'LLM_PROVIDER="openai" is not supported',
    );
  });
});

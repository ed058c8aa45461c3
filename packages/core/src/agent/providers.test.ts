import { describe, expect, it, vi } from "vitest";
import { AgentError } from "../infra/errors.js";
import { createOpenAICompatibleProvider } from "./providers.js";
import type { AgentTool } from "./types.js";

function stubFetch(payload: unknown) {
  const fetchMock = vi.fn(
    async (_url: string, _init: RequestInit) =>
      new Response(JSON.stringify(payload), {
        status: 200,
        headers: { "Content-Type": "application/json" },
      }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const provider = createOpenAICompatibleProvider({
  name: "openrouter",
  apiKey: "test-key",
  baseUrl: "http://provider.test/api/v1/",
});

const echoTool: AgentTool = {
  name: "file_list",
  description: "List files",
  parameters: { type: "object", properties: {} },
  execute: async () => "",
};

describe("createOpenAICompatibleProvider", () => {
  it("posts a chat completion request and maps the reply", async () => {
    const fetchMock = stubFetch({
      choices: [{ message: { content: "hi there" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
    });

    const response = await provider.complete({
      model: "test/model",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hello" },
      ],
      maxTokens: 100,
    });

    expect(response).toEqual({
      message: { role: "assistant", content: "hi there" },
      usage: { promptTokens: 3, completionTokens: 2, totalTokens: 5 },
      finishReason: "stop",
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://provider.test/api/v1/chat/completions");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-key");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test/model",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hello" },
      ],
      max_tokens: 100,
    });
  });

  it("sends tools and parses tool calls", async () => {
    const fetchMock = stubFetch({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              { id: "call_1", type: "function", function: { name: "file_list", arguments: "{}" } },
            ],
          },
          finish_reason: "tool_calls",
        },
      ],
    });

    const response = await provider.complete({
      model: "test/model",
      messages: [{ role: "user", content: "what files?" }],
      tools: [echoTool],
    });

    expect(response.finishReason).toBe("tool_calls");
    expect(response.message).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [{ id: "call_1", name: "file_list", arguments: "{}" }],
    });

    const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1].body));
    expect(body.tools).toEqual([
      {
        type: "function",
        function: {
          name: "file_list",
          description: "List files",
          parameters: { type: "object", properties: {} },
        },
      },
    ]);
  });

  it("formats tool results and assistant tool calls for the wire", async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: "done" } }] });

    await provider.complete({
      model: "test/model",
      messages: [
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "call_1", name: "file_list", arguments: "{}" }],
        },
        { role: "tool", content: "file\ta.txt (1 bytes)", toolCallId: "call_1" },
      ],
    });

    const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1].body));
    expect(body.messages).toEqual([
      {
        role: "assistant",
        content: "",
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "file_list", arguments: "{}" } },
        ],
      },
      { role: "tool", content: "file\ta.txt (1 bytes)", tool_call_id: "call_1" },
    ]);
  });

  it("rejects responses without choices", async () => {
    stubFetch({ choices: [] });
    await expect(
      provider.complete({ model: "m", messages: [{ role: "user", content: "x" }] }),
    ).rejects.toThrow("No completion choice returned from provider");
  });

  it("rejects malformed responses", async () => {
    stubFetch({ choices: "nope" });
    await expect(
      provider.complete({ model: "m", messages: [{ role: "user", content: "x" }] }),
    ).rejects.toBeInstanceOf(AgentError);
  });
});

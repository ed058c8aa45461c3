import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ChatMessageRecord } from "../sessions/types.js";
import type { AIProvider } from "./providers.js";
import { AgentRuntime, MAX_ROUNDS_REPLY } from "./runtime.js";
import type { CompletionRequest, CompletionResponse } from "./types.js";

function mockProvider(responses: CompletionResponse[]) {
  const requests: CompletionRequest[] = [];
  const provider: AIProvider = {
    name: "mock",
    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      // Snapshot: the runtime keeps appending to the same array.
      requests.push({ ...request, messages: [...request.messages] });
      const response = responses[requests.length - 1];
      if (!response) {
        throw new Error(`No more mock responses (call ${requests.length})`);
      }
      return response;
    },
  };
  return { provider, requests };
}

function record(role: "user" | "assistant", content: string): ChatMessageRecord {
  return { message_id: content, role, content, timestamp: "2026-01-01T00:00:00.000Z", metadata: {} };
}

describe("AgentRuntime", () => {
  let ws: string;

  beforeEach(() => {
    ws = mkdtempSync(join(tmpdir(), "tidewire-runtime-"));
  });

  afterEach(() => {
    rmSync(ws, { recursive: true, force: true });
  });

  it("sends system prompt, history and the new message", async () => {
    const { provider, requests } = mockProvider([
      { message: { role: "assistant", content: "Hello, human!" }, finishReason: "stop" },
    ]);
    const runtime = new AgentRuntime(provider, { model: "test-model", systemPrompt: "be nice" });

    const reply = await runtime.invoke({
      message: "and now?",
      sessionKey: "telegram:42",
      workspaceDir: ws,
      history: [record("user", "earlier"), record("assistant", "noted")],
    });

    expect(reply).toBe("Hello, human!");
    expect(requests[0]?.model).toBe("test-model");
    expect(requests[0]?.messages).toEqual([
      { role: "system", content: "be nice" },
      { role: "user", content: "earlier" },
      { role: "assistant", content: "noted" },
      { role: "user", content: "and now?" },
    ]);
    expect(requests[0]?.tools?.map((t) => t.name)).toEqual(["file_read", "file_write", "file_list"]);
  });

  it("runs tool calls against the workspace and loops", async () => {
    const { provider, requests } = mockProvider([
      {
        message: {
          role: "assistant",
          content: "",
          toolCalls: [
            {
              id: "call_1",
              name: "file_write",
              arguments: JSON.stringify({ path: "memo.txt", content: "remember" }),
            },
          ],
        },
        finishReason: "tool_calls",
      },
      { message: { role: "assistant", content: "Saved it." }, finishReason: "stop" },
    ]);
    const runtime = new AgentRuntime(provider, { model: "test-model" });

    const reply = await runtime.invoke({
      message: "remember this",
      sessionKey: "telegram:42",
      workspaceDir: ws,
      history: [],
    });

    expect(reply).toBe("Saved it.");
    expect(readFileSync(join(ws, "memo.txt"), "utf-8")).toBe("remember");
    expect(requests[1]?.messages.at(-1)).toEqual({
      role: "tool",
      content: "Wrote 8 bytes to memo.txt",
      toolCallId: "call_1",
    });
  });

  it("returns the max-rounds reply when the model never stops", async () => {
    const toolRound: CompletionResponse = {
      message: {
        role: "assistant",
        content: "",
        toolCalls: [{ id: "c", name: "file_list", arguments: "{}" }],
      },
      finishReason: "tool_calls",
    };
    const { provider, requests } = mockProvider([toolRound, toolRound]);
    const runtime = new AgentRuntime(provider, { model: "m", maxToolRounds: 2 });

    const reply = await runtime.invoke({
      message: "loop",
      sessionKey: "telegram:42",
      workspaceDir: ws,
      history: [],
    });

    expect(reply).toBe(MAX_ROUNDS_REPLY);
    expect(requests).toHaveLength(2);
  });

  it("uses a custom tool factory", async () => {
    const { provider, requests } = mockProvider([
      { message: { role: "assistant", content: "" }, finishReason: "stop" },
    ]);
    const runtime = new AgentRuntime(provider, { model: "m" }, { tools: () => [] });

    const reply = await runtime.invoke({
      message: "hi",
      sessionKey: "telegram:42",
      workspaceDir: ws,
      history: [],
    });

    expect(reply).toBe("");
    expect(requests[0]?.tools).toBeUndefined();
  });

  it("propagates provider failures", async () => {
    const { provider } = mockProvider([]);
    const runtime = new AgentRuntime(provider, { model: "m" });
    await expect(
      runtime.invoke({ message: "hi", sessionKey: "telegram:42", workspaceDir: ws, history: [] }),
    ).rejects.toThrow("No more mock responses (call 1)");
  });
});

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DeliveryError, MemoryObjectStore, SessionOrchestrator } from "@tidewire/core";
import { Api } from "grammy";
import { afterEach, describe, expect, it } from "vitest";
import { createTelegramChannel, setTelegramWebhook, splitMessage } from "./index.js";

interface ApiCall {
  method: string;
  payload: unknown;
}

function recordingApi(options?: { fail?: string }) {
  const calls: ApiCall[] = [];
  const api = new Api("test-token");
  api.config.use(async (_prev, method, payload) => {
    calls.push({ method, payload });
    if (options?.fail) {
      return { ok: false, error_code: 400, description: options.fail };
    }
    return { ok: true, result: true as never };
  });
  return { api, calls };
}

describe("createTelegramChannel", () => {
  it("sends replies through the Bot API", async () => {
    const { api, calls } = recordingApi();
    const channel = createTelegramChannel({ api });

    await channel.sendMessage("42", "hi there");

    expect(calls).toEqual([{ method: "sendMessage", payload: { chat_id: "42", text: "hi there" } }]);
  });

  it("splits long replies", async () => {
    const { api, calls } = recordingApi();
    const channel = createTelegramChannel({ api });

    await channel.sendMessage("42", "a".repeat(5000));

    expect(calls).toHaveLength(2);
  });

  it("wraps Bot API failures in DeliveryError", async () => {
    const { api } = recordingApi({ fail: "Bad Request: chat not found" });
    const channel = createTelegramChannel({ api });

    const err = await channel.sendMessage("42", "hi").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DeliveryError);
    expect(err instanceof Error ? err.message : "").toContain("chat not found");
  });

  it("is unconfigured without a token", async () => {
    const channel = createTelegramChannel();
    expect(channel.isConfigured()).toBe(false);
    await expect(channel.sendMessage("42", "hi")).rejects.toThrow(
      "Telegram bot token is not configured",
    );
  });

  it("builds a client from the token", () => {
    expect(createTelegramChannel({ token: "test-token" }).isConfigured()).toBe(true);
  });

  it("parses updates", () => {
    const channel = createTelegramChannel();
    expect(channel.id).toBe("telegram");
    expect(
      channel.parseUpdate({
        message: { message_id: 1, chat: { id: 42, type: "private" }, from: { id: 7 }, text: "hey" },
      })?.text,
    ).toBe("hey");
  });
});

describe("Telegram channel in the session pipeline", () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it("answers a bare update with no message_id", async () => {
    root = mkdtempSync(join(tmpdir(), "tidewire-tg-"));
    const { api, calls } = recordingApi();
    const orchestrator = new SessionOrchestrator({
      channel: createTelegramChannel({ api }),
      agent: { name: "fake", invoke: async () => "hi there" },
      store: new MemoryObjectStore(),
      workspaceRoot: root,
      allowFrom: ["7"],
    });

    const result = await orchestrator.handleUpdate({
      message: { chat: { id: 42, type: "private" }, from: { id: 7 }, text: "hello" },
    });

    expect(result).toEqual({ ok: true, handled: true, response: "hi there" });
    expect(calls).toEqual([{ method: "sendMessage", payload: { chat_id: "42", text: "hi there" } }]);
    expect(
      (await orchestrator.history.recent("telegram:42")).map((m) => [m.role, m.content]),
    ).toEqual([
      ["user", "hello"],
      ["assistant", "hi there"],
    ]);
  });
});

describe("setTelegramWebhook", () => {
  it("registers the URL with the secret token", async () => {
    const { api, calls } = recordingApi();

    await setTelegramWebhook({
      token: "test-token",
      url: "https://example.test/api/webhook/telegram",
      secret: "test-secret",
      api,
    });

    expect(calls).toEqual([
      {
        method: "setWebhook",
        payload: {
          url: "https://example.test/api/webhook/telegram",
          allowed_updates: ["message", "edited_message"],
          secret_token: "test-secret",
        },
      },
    ]);
  });
});

describe("splitMessage", () => {
  it("keeps short messages whole", () => {
    expect(splitMessage("hello")).toEqual(["hello"]);
  });

  it("prefers line breaks when splitting", () => {
    expect(splitMessage("aaaa\nbbbb\ncc", 10)).toEqual(["aaaa\nbbbb", "cc"]);
  });

  it("hard-splits lines longer than the limit", () => {
    expect(splitMessage("abcdefgh", 3)).toEqual(["abc", "def", "gh"]);
  });

  it("does not cut through a surrogate pair", () => {
    const chunks = splitMessage("ab\u{1F600}cd", 3);
    expect(chunks).toEqual(["ab", "\u{1F600}c", "d"]);
    expect(chunks.join("")).toBe("ab\u{1F600}cd");
  });
});

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ChannelAdapter } from "../channels/types.js";
import { parseConfig } from "../config/loader.js";
import { createGateway, type Gateway } from "./factory.js";
import { handleHealthRequest, handleWebhookRequest } from "./handlers.js";
import { LazyGateway } from "./lazy.js";

function channel(configured = true): ChannelAdapter {
  return {
    id: "telegram",
    parseUpdate: () => undefined,
    sendMessage: async () => {},
    isConfigured: () => configured,
  };
}

describe("HTTP handlers", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "tidewire-handlers-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function lazy(options?: { configured?: boolean }): LazyGateway<Gateway> {
    const config = parseConfig({
      agent: { apiKey: "test-key" },
      telegram: { token: "test-token" },
      storage: { backend: "memory" },
      workspace: { root },
    });
    return new LazyGateway(() =>
      createGateway(config, {
        channel: () => channel(options?.configured),
        agent: { name: "fake", invoke: async () => "ok" },
      }),
    );
  }

  const failing = () =>
    new LazyGateway<Gateway>(async () => {
      throw new Error("GCS_BUCKET_NAME is required for persistent storage.");
    });

  it("rejects bodies that are not JSON", async () => {
    expect(await handleWebhookRequest(lazy(), "{oops")).toEqual({
      statusCode: 400,
      headers: { "Content-Type": "application/json" },
      body: '{"ok":false,"error":"Invalid JSON"}',
    });
  });

  it("returns the orchestrator result", async () => {
    const result = await handleWebhookRequest(lazy(), JSON.stringify({ update_id: 1 }));
    expect(result.statusCode).toBe(200);
    expect(result.body).toBe('{"ok":true,"handled":false}');
  });

  it("hides initialization failures behind a 500", async () => {
    const result = await handleWebhookRequest(failing(), "{}");
    expect(result.statusCode).toBe(500);
    expect(result.body).toBe('{"ok":false,"error":"Internal server error"}');
  });

  it("reports a healthy gateway", async () => {
    const result = await handleHealthRequest(lazy());
    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.body)).toEqual({
      status: "healthy",
      checks: { config: true, workspace: true, storage: true, agent: true, channel: true },
    });
  });

  it("reports a degraded gateway with 503", async () => {
    const result = await handleHealthRequest(lazy({ configured: false }));
    expect(result.statusCode).toBe(503);
    expect(JSON.parse(result.body)).toMatchObject({
      status: "degraded",
      checks: { channel: false },
    });
  });

  it("reports initialization failures as unhealthy", async () => {
    const result = await handleHealthRequest(failing());
    expect(result.statusCode).toBe(503);
    expect(JSON.parse(result.body)).toEqual({
      status: "unhealthy",
      error: "GCS_BUCKET_NAME is required for persistent storage.",
    });
  });
});

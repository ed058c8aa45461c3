import { describe, expect, it } from "vitest";
import { StorageError } from "../infra/errors.js";
import { MemoryObjectStore } from "../storage/memory.js";
import type { ObjectStore } from "../storage/types.js";
import { SessionRecordStore } from "./store.js";

function clock(...isoTimes: string[]) {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)] ?? 0);
}

describe("SessionRecordStore", () => {
  it("returns undefined for an unknown session", async () => {
    const sessions = new SessionRecordStore(new MemoryObjectStore());
    expect(await sessions.get("telegram:1")).toBeUndefined();
  });

  it("creates a record with equal timestamps", async () => {
    const store = new MemoryObjectStore();
    const sessions = new SessionRecordStore(store, { now: clock("2026-01-01T00:00:00.000Z") });

    const record = await sessions.upsert("telegram:1", "7", { chat_type: "private" });

    expect(record).toEqual({
      session_key: "telegram:1",
      user_id: "7",
      created_at: "2026-01-01T00:00:00.000Z",
      updated_at: "2026-01-01T00:00:00.000Z",
      metadata: { chat_type: "private" },
    });
    expect(store.contentTypeOf("sessions/telegram_1/session.json")).toBe("application/json");
    expect(await sessions.get("telegram:1")).toEqual(record);
  });

  it("keeps created_at, bumps updated_at and merges metadata", async () => {
    const sessions = new SessionRecordStore(new MemoryObjectStore(), {
      now: clock("2026-01-01T00:00:00.000Z", "2026-01-02T00:00:00.000Z"),
    });

    await sessions.upsert("telegram:1", "7", { a: 1, b: 2 });
    const updated = await sessions.upsert("telegram:1", "8", { b: 3 });

    expect(updated.created_at).toBe("2026-01-01T00:00:00.000Z");
    expect(updated.updated_at).toBe("2026-01-02T00:00:00.000Z");
    expect(updated.user_id).toBe("8");
    expect(updated.metadata).toEqual({ a: 1, b: 3 });
  });

  it("treats a malformed document as absent", async () => {
    const store = new MemoryObjectStore();
    await store.put("sessions/telegram_1/session.json", "{not json");
    const sessions = new SessionRecordStore(store);
    expect(await sessions.get("telegram:1")).toBeUndefined();

    await store.put("sessions/telegram_1/session.json", JSON.stringify({ session_key: 5 }));
    expect(await sessions.get("telegram:1")).toBeUndefined();
  });

  it("propagates write failures", async () => {
    const failing: ObjectStore = {
      kind: "failing",
      get: async () => undefined,
      put: async (path) => {
        throw new StorageError("disk full", path);
      },
      list: async () => [],
      delete: async () => false,
      healthCheck: async () => false,
    };
    const sessions = new SessionRecordStore(failing);
    await expect(sessions.upsert("telegram:1", "7")).rejects.toThrow("disk full");
  });
});

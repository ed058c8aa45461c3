import type { Logger } from "tslog";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { SESSION_FILE, sessionObjectPath } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";
import { type Clock, type SessionRecord, SessionRecordSchema, systemClock } from "./types.js";

/**
 * Reads and writes the per-session `session.json` document.
 */
export class SessionRecordStore {
  private readonly store: ObjectStore;
  private readonly logger: Logger<unknown>;
  private readonly now: Clock;

  constructor(
    store: ObjectStore,
    options?: { logger?: Logger<unknown>; now?: Clock },
  ) {
    this.store = store;
    this.logger = options?.logger ?? createLogger("session-store");
    this.now = options?.now ?? systemClock;
  }

  /**
   * Load a session record. Read, parse and shape errors are logged and
   * reported as "no session yet".
   */
  async get(sessionKey: string): Promise<SessionRecord | undefined> {
    const path = sessionObjectPath(sessionKey, SESSION_FILE);
    try {
      const data = await this.store.get(path);
      if (!data) return undefined;

      const raw: unknown = JSON.parse(data.toString("utf-8"));
      const result = SessionRecordSchema.safeParse(raw);
      if (!result.success) {
        this.logger.warn(`Ignoring malformed session record at ${path}`);
        return undefined;
      }
      return result.data;
    } catch (err) {
      this.logger.error(`Error getting session ${sessionKey}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  /**
   * Create the record, or bump `updated_at`, replace `user_id` and
   * shallow-merge `metadata` into the existing one. Writes the whole
   * document back; write errors propagate.
   */
  async upsert(
    sessionKey: string,
    userId: string,
    metadata?: Record<string, unknown>,
  ): Promise<SessionRecord> {
    const existing = await this.get(sessionKey);
    const now = this.now().toISOString();

    const record: SessionRecord = existing
      ? {
          ...existing,
          user_id: userId,
          updated_at: now,
          metadata: { ...existing.metadata, ...metadata },
        }
      : {
          session_key: sessionKey,
          user_id: userId,
          created_at: now,
          updated_at: now,
          metadata: { ...metadata },
        };

    await this.store.put(
      sessionObjectPath(sessionKey, SESSION_FILE),
      JSON.stringify(record, null, 2),
      "application/json",
    );
    this.logger.info(`${existing ? "Resumed" : "Created"} session ${sessionKey}`);
    return record;
  }
}

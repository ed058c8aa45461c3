import { randomUUID } from "node:crypto";
import type { Logger } from "tslog";
import { CHAT_HISTORY_FILE } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";
import { AppendOnlyLog } from "./append-log.js";
import {
  type ChatMessageRecord,
  ChatMessageRecordSchema,
  type Clock,
  type MessageRole,
  systemClock,
} from "./types.js";

export interface SaveChatMessage {
  /** Caller-supplied unique token; a UUID is generated when absent. */
  messageId?: string;
  role: MessageRole;
  content: string;
  metadata?: Record<string, unknown>;
}

/**
 * Per-session chat transcript (`chat_history.jsonl`).
 */
export class ChatHistory {
  private readonly log: AppendOnlyLog<ChatMessageRecord>;
  private readonly now: Clock;

  constructor(
    store: ObjectStore,
    options?: { logger?: Logger<unknown>; now?: Clock },
  ) {
    this.log = new AppendOnlyLog(store, CHAT_HISTORY_FILE, ChatMessageRecordSchema, {
      logger: options?.logger,
    });
    this.now = options?.now ?? systemClock;
  }

  /**
   * Append a message. Returns the stored record, or undefined when the
   * append failed (already logged).
   */
  async save(
    sessionKey: string,
    message: SaveChatMessage,
  ): Promise<ChatMessageRecord | undefined> {
    const record: ChatMessageRecord = {
      message_id: message.messageId ?? randomUUID(),
      role: message.role,
      content: message.content,
      timestamp: this.now().toISOString(),
      metadata: { ...message.metadata },
    };
    const stored = await this.log.append(sessionKey, record);
    return stored ? record : undefined;
  }

  /**
   * The last `limit` messages in chronological order, or all of them.
   */
  async recent(sessionKey: string, limit?: number): Promise<ChatMessageRecord[]> {
    return this.log.read(sessionKey, { limit });
  }
}

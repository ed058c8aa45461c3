import { randomUUID } from "node:crypto";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "tslog";
import type { AgentInvoker } from "../agent/types.js";
import type { ChannelAdapter, InboundMessage } from "../channels/types.js";
import { DEFAULT_HISTORY_CONTEXT_LIMIT } from "../config/defaults.js";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { AgentActions, FILE_OPERATION_ACTION } from "../sessions/actions.js";
import { ChatHistory } from "../sessions/history.js";
import { SessionRecordStore } from "../sessions/store.js";
import { type Clock, systemClock } from "../sessions/types.js";
import { buildSessionKey, sanitizeSessionKey } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";
import { copyTree, listFiles } from "../workspace/files.js";
import { WorkspaceSynchronizer } from "../workspace/sync.js";

export const FALLBACK_REPLY = "I received your message but couldn't generate a response.";
export const NOT_ALLOWED_ERROR = "User not allowed";

export type WebhookResult =
  | { ok: true; handled: boolean; response?: string; error?: string }
  | { ok: false; error: string };

export interface SessionOrchestratorOptions {
  channel: ChannelAdapter;
  agent: AgentInvoker;
  store: ObjectStore;
  /** Local root; session workspaces and agent working dirs live under it. */
  workspaceRoot: string;
  /** Sender ids allowed to talk to the agent. Empty allows everyone. */
  allowFrom?: string[];
  historyLimit?: number;
  logger?: Logger<unknown>;
  now?: Clock;
}

/**
 * Runs one webhook update through the session pipeline:
 * parse, authorize, sync in, invoke the agent, sync out, reply.
 *
 * Nothing is held between invocations except the collaborators; every
 * piece of session state is re-read from the object store.
 */
export class SessionOrchestrator {
  readonly sessions: SessionRecordStore;
  readonly history: ChatHistory;
  readonly actions: AgentActions;
  readonly sync: WorkspaceSynchronizer;
  private readonly channel: ChannelAdapter;
  private readonly agent: AgentInvoker;
  private readonly workspaceRoot: string;
  private readonly allowFrom: ReadonlySet<string>;
  private readonly historyLimit: number;
  private readonly logger: Logger<unknown>;

  constructor(options: SessionOrchestratorOptions) {
    this.channel = options.channel;
    this.agent = options.agent;
    this.workspaceRoot = options.workspaceRoot;
    this.allowFrom = new Set(options.allowFrom ?? []);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_CONTEXT_LIMIT;
    this.logger = options.logger ?? createLogger("orchestrator");

    const shared = { logger: this.logger, now: options.now ?? systemClock };
    this.sessions = new SessionRecordStore(options.store, shared);
    this.history = new ChatHistory(options.store, shared);
    this.actions = new AgentActions(options.store, shared);
    this.sync = new WorkspaceSynchronizer(options.store, { logger: this.logger });
  }

  async handleUpdate(raw: unknown): Promise<WebhookResult> {
    try {
      const message = this.channel.parseUpdate(raw);
      if (!message) {
        return { ok: true, handled: false };
      }

      if (this.allowFrom.size > 0 && !this.allowFrom.has(message.senderId)) {
        this.logger.warn(`Rejected message from user ${message.senderId}`);
        return { ok: true, handled: false, error: NOT_ALLOWED_ERROR };
      }

      const response = await this.process(message);
      return { ok: true, handled: true, response };
    } catch (err) {
      this.logger.error(`Error processing ${this.channel.id} update: ${errorMessage(err)}`, err);
      return { ok: false, error: errorMessage(err) };
    }
  }

  private async process(message: InboundMessage): Promise<string> {
    const sessionKey = buildSessionKey(message.channel, message.chatId);
    const safeKey = sanitizeSessionKey(sessionKey);

    await this.sessions.upsert(sessionKey, message.senderId, { chat_type: message.chatType });

    const sessionDir = join(this.workspaceRoot, "sessions", safeKey);
    await mkdir(sessionDir, { recursive: true });
    await this.sync.pullToLocal(sessionDir, sessionKey);

    const history = await this.history.recent(sessionKey, this.historyLimit);

    const agentDir = join(this.workspaceRoot, "agent", `${safeKey}-${randomUUID()}`);
    await mkdir(agentDir, { recursive: true });

    let reply: string;
    try {
      await copyTree(sessionDir, agentDir);

      await this.history.save(sessionKey, {
        role: "user",
        content: message.text,
        metadata: message.metadata,
      });

      reply = await this.agent.invoke({
        message: message.text,
        sessionKey,
        workspaceDir: agentDir,
        history,
      });

      if (reply.trim()) {
        await this.history.save(sessionKey, { role: "assistant", content: reply });
      }

      await copyTree(agentDir, sessionDir);
    } finally {
      await rm(agentDir, { recursive: true, force: true });
    }

    await this.syncOut(sessionDir, sessionKey);

    const text = reply.trim() ? reply : FALLBACK_REPLY;
    await this.deliver(message.chatId, text);
    return text;
  }

  private async syncOut(sessionDir: string, sessionKey: string): Promise<void> {
    try {
      await this.sync.pushToRemote(sessionDir, sessionKey);
    } catch (err) {
      this.logger.error(`Failed to push workspace for ${sessionKey}: ${errorMessage(err)}`);
    }

    const files = await listFiles(sessionDir);
    if (files.length > 0) {
      await this.actions.save(sessionKey, FILE_OPERATION_ACTION, {
        files_count: files.length,
        workspace: sessionDir,
      });
    }
  }

  private async deliver(chatId: string, text: string): Promise<void> {
    try {
      await this.channel.sendMessage(chatId, text);
    } catch (err) {
      this.logger.error(`Failed to deliver reply to chat ${chatId}: ${errorMessage(err)}`);
    }
  }
}

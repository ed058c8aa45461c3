import { randomUUID } from "node:crypto";
import type { Logger } from "tslog";
import { AGENT_ACTIONS_FILE } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";
import { AppendOnlyLog } from "./append-log.js";
import {
  type AgentActionRecord,
  AgentActionRecordSchema,
  type Clock,
  systemClock,
} from "./types.js";

export const FILE_OPERATION_ACTION = "file_operation";

/**
 * Per-session audit trail of agent side effects (`agent_actions.jsonl`).
 * Kept separate from the chat transcript.
 */
export class AgentActions {
  private readonly log: AppendOnlyLog<AgentActionRecord>;
  private readonly now: Clock;

  constructor(
    store: ObjectStore,
    options?: { logger?: Logger<unknown>; now?: Clock },
  ) {
    this.log = new AppendOnlyLog(store, AGENT_ACTIONS_FILE, AgentActionRecordSchema, {
      logger: options?.logger,
    });
    this.now = options?.now ?? systemClock;
  }

  /**
   * Record an action. Returns its generated id, or "" when the append
   * failed.
   */
  async save(
    sessionKey: string,
    actionType: string,
    actionData: Record<string, unknown>,
    metadata?: Record<string, unknown>,
  ): Promise<string> {
    const record: AgentActionRecord = {
      action_id: randomUUID(),
      action_type: actionType,
      action_data: actionData,
      timestamp: this.now().toISOString(),
      metadata: { ...metadata },
    };
    const stored = await this.log.append(sessionKey, record);
    return stored ? record.action_id : "";
  }

  async list(
    sessionKey: string,
    options?: { actionType?: string; limit?: number },
  ): Promise<AgentActionRecord[]> {
    const actionType = options?.actionType;
    return this.log.read(sessionKey, {
      limit: options?.limit,
      ...(actionType !== undefined && {
        filter: (record: AgentActionRecord) => record.action_type === actionType,
      }),
    });
  }
}

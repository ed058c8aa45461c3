import { z } from "zod";

const JsonObjectSchema = z.record(z.unknown());

export const SessionRecordSchema = z.object({
  session_key: z.string(),
  user_id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  metadata: JsonObjectSchema.default({}),
});

export const MessageRoleSchema = z.enum(["user", "assistant"]);

export const ChatMessageRecordSchema = z.object({
  message_id: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  timestamp: z.string(),
  metadata: JsonObjectSchema.default({}),
});

export const AgentActionRecordSchema = z.object({
  action_id: z.string(),
  action_type: z.string(),
  action_data: JsonObjectSchema.default({}),
  timestamp: z.string(),
  metadata: JsonObjectSchema.default({}),
});

/** `session.json`: one full document per session, rewritten on every upsert. */
export type SessionRecord = z.infer<typeof SessionRecordSchema>;
export type MessageRole = z.infer<typeof MessageRoleSchema>;
/** One line of `chat_history.jsonl`. */
export type ChatMessageRecord = z.infer<typeof ChatMessageRecordSchema>;
/** One line of `agent_actions.jsonl`. */
export type AgentActionRecord = z.infer<typeof AgentActionRecordSchema>;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

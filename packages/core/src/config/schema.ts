import { z } from "zod";
import { LOG_LEVELS } from "../infra/logger.js";
import {
  DEFAULT_AGENT_BASE_URL,
  DEFAULT_AGENT_MODEL,
  DEFAULT_DELIVERY_TIMEOUT_SECONDS,
  DEFAULT_HISTORY_CONTEXT_LIMIT,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_PORT,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_WORKSPACE_ROOT,
} from "./defaults.js";

export const AgentConfigSchema = z.object({
  provider: z.string().min(1).default("openrouter"),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_AGENT_BASE_URL),
  model: z.string().min(1).default(DEFAULT_AGENT_MODEL),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  maxToolRounds: z.coerce.number().int().positive().default(10),
  maxTokens: z.coerce.number().int().positive().optional(),
  temperature: z.coerce.number().min(0).max(2).optional(),
});

export const TelegramConfigSchema = z.object({
  token: z.string().min(1).optional(),
  /** Telegram user ids allowed to talk to the bot. Empty means everyone. */
  allowFrom: z.array(z.string().min(1)).default([]),
  webhookSecret: z.string().min(1).optional(),
});

export const StorageConfigSchema = z.object({
  backend: z.enum(["gcs", "local", "memory"]).default("gcs"),
  bucket: z.string().min(1).optional(),
  projectId: z.string().min(1).optional(),
  localDir: z.string().min(1).optional(),
});

export const WorkspaceConfigSchema = z.object({
  root: z.string().min(1).default(DEFAULT_WORKSPACE_ROOT),
});

export const HistoryConfigSchema = z.object({
  contextLimit: z.coerce.number().int().positive().default(DEFAULT_HISTORY_CONTEXT_LIMIT),
});

export const DeliveryConfigSchema = z.object({
  timeoutSeconds: z.coerce.number().positive().default(DEFAULT_DELIVERY_TIMEOUT_SECONDS),
});

export const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
});

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  maxBodyBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
});

export const GatewayConfigSchema = z.object({
  agent: AgentConfigSchema.default({}),
  telegram: TelegramConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  workspace: WorkspaceConfigSchema.default({}),
  history: HistoryConfigSchema.default({}),
  delivery: DeliveryConfigSchema.default({}),
  logging: LoggingSchema.default({}),
  server: ServerConfigSchema.default({}),
});

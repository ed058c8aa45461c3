import type { z } from "zod";
import type {
  AgentConfigSchema,
  GatewayConfigSchema,
  StorageConfigSchema,
  TelegramConfigSchema,
} from "./schema.js";

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

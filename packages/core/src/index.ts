// Config
export {
  AgentConfigSchema,
  GatewayConfigSchema,
  StorageConfigSchema,
  TelegramConfigSchema,
} from "./config/schema.js";
export type {
  AgentConfig,
  GatewayConfig,
  StorageConfig,
  TelegramConfig,
} from "./config/types.js";
export * from "./config/defaults.js";
export { loadConfigFromEnv, parseConfig, parseList } from "./config/loader.js";
export {
  assertValidConfig,
  ConfigValidationError,
  validateConfig,
} from "./config/validation.js";

// Infrastructure
export { createLogger, resolveLogLevel, LOG_LEVELS } from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export {
  AgentError,
  AppError,
  AuthError,
  ConfigError,
  DeliveryError,
  errorMessage,
  StorageError,
} from "./infra/errors.js";

// Storage
export type { ObjectStore } from "./storage/types.js";
export { MemoryObjectStore } from "./storage/memory.js";
export { LocalObjectStore } from "./storage/local.js";
export { GcsObjectStore } from "./storage/gcs.js";
export type { GcsObjectStoreOptions } from "./storage/gcs.js";
export * from "./storage/paths.js";

// Sessions
export { SessionRecordStore } from "./sessions/store.js";
export { AppendOnlyLog } from "./sessions/append-log.js";
export type { ReadOptions } from "./sessions/append-log.js";
export { ChatHistory } from "./sessions/history.js";
export type { SaveChatMessage } from "./sessions/history.js";
export { AgentActions, FILE_OPERATION_ACTION } from "./sessions/actions.js";
export {
  AgentActionRecordSchema,
  ChatMessageRecordSchema,
  SessionRecordSchema,
  systemClock,
} from "./sessions/types.js";
export type {
  AgentActionRecord,
  ChatMessageRecord,
  Clock,
  MessageRole,
  SessionRecord,
} from "./sessions/types.js";

// Workspace
export { WorkspaceSynchronizer } from "./workspace/sync.js";
export { copyTree, listFiles, resolveInside } from "./workspace/files.js";

// Agent
export type {
  AgentInvoker,
  AgentRequest,
  AgentTool,
  CompletionRequest,
  CompletionResponse,
  Message,
  ToolCall,
  ToolResult,
} from "./agent/types.js";
export { createOpenAICompatibleProvider } from "./agent/providers.js";
export type { AIProvider, OpenAICompatibleProviderOptions } from "./agent/providers.js";
export { AgentRuntime, MAX_ROUNDS_REPLY } from "./agent/runtime.js";
export type { AgentRuntimeConfig, ToolFactory } from "./agent/runtime.js";
export { ToolRegistry } from "./agent/tools.js";
export { createWorkspaceTools, resolveWorkspacePath } from "./agent/workspace-tools.js";
export { fetchWithRetry, ProviderHttpError, withRetry } from "./agent/retry.js";
export type { RetryOptions } from "./agent/retry.js";

// Channels
export type { ChannelAdapter, InboundMessage } from "./channels/types.js";

// Gateway
export {
  FALLBACK_REPLY,
  NOT_ALLOWED_ERROR,
  SessionOrchestrator,
} from "./gateway/orchestrator.js";
export type { SessionOrchestratorOptions, WebhookResult } from "./gateway/orchestrator.js";
export { LazyGateway } from "./gateway/lazy.js";
export { createGateway, createObjectStore } from "./gateway/factory.js";
export type { ChannelFactory, CreateGatewayOptions, Gateway } from "./gateway/factory.js";
export { checkHealth } from "./gateway/health.js";
export type { HealthCheckName, HealthReport } from "./gateway/health.js";
export { handleHealthRequest, handleWebhookRequest } from "./gateway/handlers.js";
export type { HttpResult } from "./gateway/handlers.js";
export { createGatewayHttpServer, secretMatches } from "./gateway/server-http.js";
export type { HttpServerOptions } from "./gateway/server-http.js";

import { mkdir } from "node:fs/promises";
import type { Logger } from "tslog";
import { createOpenAICompatibleProvider } from "../agent/providers.js";
import { AgentRuntime } from "../agent/runtime.js";
import type { AgentInvoker } from "../agent/types.js";
import type { ChannelAdapter } from "../channels/types.js";
import type { GatewayConfig, StorageConfig } from "../config/types.js";
import { assertValidConfig } from "../config/validation.js";
import { ConfigError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { Clock } from "../sessions/types.js";
import { GcsObjectStore } from "../storage/gcs.js";
import { LocalObjectStore } from "../storage/local.js";
import { MemoryObjectStore } from "../storage/memory.js";
import type { ObjectStore } from "../storage/types.js";
import { SessionOrchestrator } from "./orchestrator.js";

/**
 * Everything one warm process needs to serve webhooks.
 */
export interface Gateway {
  config: GatewayConfig;
  store: ObjectStore;
  channel: ChannelAdapter;
  agent: AgentInvoker;
  orchestrator: SessionOrchestrator;
}

export type ChannelFactory = (config: GatewayConfig) => ChannelAdapter;

export interface CreateGatewayOptions {
  channel: ChannelFactory;
  /** Replaces the default model-backed agent. */
  agent?: AgentInvoker;
  /** Replaces the store built from `config.storage`. */
  store?: ObjectStore;
  logger?: Logger<unknown>;
  now?: Clock;
}

export function createObjectStore(config: StorageConfig, logger?: Logger<unknown>): ObjectStore {
  switch (config.backend) {
    case "gcs":
      if (!config.bucket) {
        throw new ConfigError("GCS_BUCKET_NAME is required for persistent storage.");
      }
      return GcsObjectStore.fromOptions({
        bucketName: config.bucket,
        projectId: config.projectId,
        logger,
      });
    case "local":
      if (!config.localDir) {
        throw new ConfigError("LOCAL_STORAGE_DIR is required when STORAGE_BACKEND is local.");
      }
      return new LocalObjectStore(config.localDir);
    case "memory":
      return new MemoryObjectStore();
  }
}

function createAgent(config: GatewayConfig, logger: Logger<unknown>): AgentInvoker {
  const { apiKey } = config.agent;
  if (!apiKey) {
    throw new ConfigError("No LLM provider configured. Set OPENROUTER_API_KEY.");
  }
  const provider = createOpenAICompatibleProvider({
    name: config.agent.provider,
    apiKey,
    baseUrl: config.agent.baseUrl,
  });
  return new AgentRuntime(
    provider,
    {
      model: config.agent.model,
      systemPrompt: config.agent.systemPrompt,
      maxToolRounds: config.agent.maxToolRounds,
      maxTokens: config.agent.maxTokens,
      temperature: config.agent.temperature,
    },
    { logger: logger.getSubLogger({ name: "agent" }) },
  );
}

/**
 * Validate the config and wire the collaborators together. Throws
 * ConfigValidationError listing every missing setting.
 */
export async function createGateway(
  config: GatewayConfig,
  options: CreateGatewayOptions,
): Promise<Gateway> {
  assertValidConfig(config);
  const logger = options.logger ?? createLogger("gateway", { level: config.logging.level });

  const store = options.store ?? createObjectStore(config.storage, logger.getSubLogger({ name: "storage" }));
  if (store instanceof GcsObjectStore) {
    await store.ensureBucket();
  }

  await mkdir(config.workspace.root, { recursive: true });

  const channel = options.channel(config);
  const agent = options.agent ?? createAgent(config, logger);
  const orchestrator = new SessionOrchestrator({
    channel,
    agent,
    store,
    workspaceRoot: config.workspace.root,
    allowFrom: config.telegram.allowFrom,
    historyLimit: config.history.contextLimit,
    logger: logger.getSubLogger({ name: "orchestrator" }),
    now: options.now,
  });

  logger.info(
    `Gateway ready: storage=${store.kind} agent=${agent.name} channel=${channel.id}`,
  );
  return { config, store, channel, agent, orchestrator };
}

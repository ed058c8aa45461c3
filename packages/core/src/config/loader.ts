import { ConfigError } from "../infra/errors.js";
import { GatewayConfigSchema } from "./schema.js";
import type { GatewayConfig } from "./types.js";

type Env = Record<string, string | undefined>;

/**
 * Parse a config object through the schema, filling defaults.
 * Throws ConfigError listing every schema issue.
 */
export function parseConfig(input: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Build the gateway config from environment variables. Blank values count
 * as unset. Cross-field requirements are checked separately by
 * validateConfig.
 */
export function loadConfigFromEnv(env: Env = process.env): GatewayConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  return parseConfig({
    agent: {
      provider: read("AGENT_PROVIDER"),
      apiKey: read("OPENROUTER_API_KEY"),
      baseUrl: read("OPENROUTER_API_BASE"),
      model: read("AGENT_MODEL"),
      systemPrompt: read("AGENT_SYSTEM_PROMPT"),
      maxToolRounds: read("AGENT_MAX_TOOL_ROUNDS"),
      maxTokens: read("AGENT_MAX_TOKENS"),
      temperature: read("AGENT_TEMPERATURE"),
    },
    telegram: {
      token: read("TELEGRAM_BOT_TOKEN"),
      allowFrom: parseList(read("TELEGRAM_ALLOWED_USERS")),
      webhookSecret: read("TELEGRAM_WEBHOOK_SECRET"),
    },
    storage: {
      backend: read("STORAGE_BACKEND")?.toLowerCase(),
      bucket: read("GCS_BUCKET_NAME"),
      projectId: read("GCP_PROJECT_ID"),
      localDir: read("LOCAL_STORAGE_DIR"),
    },
    workspace: {
      root: read("WORKSPACE_DIR"),
    },
    history: {
      contextLimit: read("HISTORY_CONTEXT_LIMIT"),
    },
    delivery: {
      timeoutSeconds: read("DELIVERY_TIMEOUT_SECONDS"),
    },
    logging: {
      level: read("LOG_LEVEL")?.toLowerCase(),
    },
    server: {
      port: read("PORT"),
      maxBodyBytes: read("MAX_BODY_BYTES"),
    },
  });
}

/**
 * Split a comma-separated list, trimming entries and dropping blanks.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

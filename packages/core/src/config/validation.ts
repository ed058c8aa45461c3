import { ConfigError } from "../infra/errors.js";
import type { GatewayConfig } from "./types.js";

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly errors: string[],
  ) {
    super(`Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

const TELEGRAM_USER_ID_RE = /^\d+$/;

/**
 * Cross-field requirements the schema cannot express on its own.
 * Pure: returns every violation, empty when the config is usable.
 */
export function validateConfig(config: GatewayConfig): string[] {
  const errors: string[] = [];

  if (!config.agent.apiKey) {
    errors.push("No LLM provider configured. Set OPENROUTER_API_KEY.");
  }

  if (!config.telegram.token) {
    errors.push("No channel configured. Set TELEGRAM_BOT_TOKEN.");
  }

  for (const userId of config.telegram.allowFrom) {
    if (!TELEGRAM_USER_ID_RE.test(userId)) {
      errors.push(`Invalid Telegram user id in TELEGRAM_ALLOWED_USERS: "${userId}".`);
    }
  }

  if (config.storage.backend === "gcs" && !config.storage.bucket) {
    errors.push("GCS_BUCKET_NAME is required for persistent storage.");
  }

  if (config.storage.backend === "local" && !config.storage.localDir) {
    errors.push("LOCAL_STORAGE_DIR is required when STORAGE_BACKEND is local.");
  }

  return errors;
}

/**
 * Throw ConfigValidationError when validateConfig reports anything.
 */
export function assertValidConfig(config: GatewayConfig): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

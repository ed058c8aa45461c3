export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant talking to a user over Telegram. Keep replies short and direct. " +
  "You have a private workspace directory: use the file tools to read notes you saved earlier " +
  "and to save anything worth remembering for later conversations.";

export const DEFAULT_AGENT_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_AGENT_MODEL = "anthropic/claude-opus-4-5";
export const DEFAULT_WORKSPACE_ROOT = "/tmp/tidewire";
export const DEFAULT_HISTORY_CONTEXT_LIMIT = 50;
export const DEFAULT_DELIVERY_TIMEOUT_SECONDS = 10;
export const DEFAULT_PORT = 8080;
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

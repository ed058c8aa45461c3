export const SESSIONS_ROOT = "sessions";

export const SESSION_FILE = "session.json";
export const CHAT_HISTORY_FILE = "chat_history.jsonl";
export const AGENT_ACTIONS_FILE = "agent_actions.jsonl";
export const FILES_DIR = "files";

/**
 * Build the composite session key for a chat, e.g. `telegram:123456789`.
 */
export function buildSessionKey(channel: string, chatId: string | number): string {
  return `${channel}:${chatId}`;
}

/**
 * Path- and directory-safe form of a session key.
 */
export function sanitizeSessionKey(sessionKey: string): string {
  return sessionKey.replaceAll(":", "_");
}

export function sessionPrefix(sessionKey: string): string {
  return `${SESSIONS_ROOT}/${sanitizeSessionKey(sessionKey)}`;
}

export function sessionObjectPath(sessionKey: string, name: string): string {
  return `${sessionPrefix(sessionKey)}/${name}`;
}

/** Prefix of a session's workspace files, with trailing slash. */
export function sessionFilesPrefix(sessionKey: string): string {
  return `${sessionPrefix(sessionKey)}/${FILES_DIR}/`;
}

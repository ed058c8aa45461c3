import { Logger } from "tslog";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Level used when a component creates its own logger: LOG_LEVEL if it names
 * a known level, otherwise "info".
 */
export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

export function createLogger(
  name: string,
  options?: { level?: LogLevel; redact?: boolean },
): Logger<unknown> {
  const level = options?.level ?? resolveLogLevel();
  const shouldRedact = options?.redact !== false;

  return new Logger({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: process.env.NODE_ENV === "production" ? "json" : "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: [
        "token",
        "password",
        "secret",
        "apiKey",
        "api_key",
        "webhookSecret",
        "privateKey",
        "credential",
        "authorization",
      ],
      maskPlaceholder: "[REDACTED]",
    }),
  });
}

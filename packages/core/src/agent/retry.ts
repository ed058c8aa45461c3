import { AgentError } from "../infra/errors.js";

/**
 * Retry with exponential backoff for transient provider failures.
 */

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  retryableStatusCodes: ReadonlySet<number>;
  retryableErrorCodes: ReadonlySet<string>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  retryableStatusCodes: new Set([429, 502, 503]),
  retryableErrorCodes: new Set([
    "ECONNRESET",
    "ETIMEDOUT",
    "ECONNREFUSED",
    "UND_ERR_CONNECT_TIMEOUT",
    "UND_ERR_SOCKET",
  ]),
};

/**
 * Non-2xx response from the provider.
 */
export class ProviderHttpError extends AgentError {
  constructor(
    public readonly status: number,
    public readonly responseBody: string,
    public readonly retryable: boolean,
    public readonly retryAfterMs?: number,
  ) {
    super(`Provider returned ${status}: ${responseBody}`);
    this.name = "ProviderHttpError";
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return errorCode(err.cause);
  return undefined;
}

function isRetryable(err: unknown, options: RetryOptions): boolean {
  if (err instanceof ProviderHttpError) return err.retryable;
  const code = errorCode(err);
  return code !== undefined && options.retryableErrorCodes.has(code);
}

function delayFor(err: unknown, attempt: number, options: RetryOptions): number {
  if (err instanceof ProviderHttpError && err.retryAfterMs !== undefined) {
    return Math.min(err.retryAfterMs, options.maxDelayMs);
  }
  return Math.min(options.initialDelayMs * 2 ** attempt, options.maxDelayMs);
}

/**
 * Run `fn`, retrying transient errors up to `maxRetries` times.
 * Anything else propagates on first failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= opts.maxRetries || !isRetryable(err, opts)) throw err;
      const delay = delayFor(err, attempt, opts);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * `fetch` that turns non-2xx responses into ProviderHttpError and retries
 * the transient ones.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: Partial<RetryOptions>,
): Promise<Response> {
  const statusCodes = options?.retryableStatusCodes ?? DEFAULT_RETRY_OPTIONS.retryableStatusCodes;

  return withRetry(async () => {
    const response = await fetch(url, init);
    if (response.ok) return response;

    const body = await response.text();
    const retryAfter = response.headers.get("retry-after");
    throw new ProviderHttpError(
      response.status,
      body,
      statusCodes.has(response.status),
      retryAfter ? parseRetryAfter(retryAfter) : undefined,
    );
  }, options);
}

export function parseRetryAfter(value: string): number | undefined {
  const seconds = Number.parseInt(value, 10);
  if (!Number.isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const ms = date - Date.now();
    return ms > 0 ? ms : undefined;
  }

  return undefined;
}

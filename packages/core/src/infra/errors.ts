export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 500, cause);
    this.name = "ConfigError";
  }
}

export class AuthError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTH_ERROR", 401, cause);
    this.name = "AuthError";
  }
}

/**
 * An object-store operation failed. `path` is the object (or prefix) involved.
 */
export class StorageError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, "STORAGE_ERROR", 502, cause);
    this.name = "StorageError";
  }
}

export class AgentError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "AGENT_ERROR", 502, cause);
    this.name = "AgentError";
  }
}

export class DeliveryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "DELIVERY_ERROR", 502, cause);
    this.name = "DeliveryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { createHash, timingSafeEqual } from "node:crypto";
import {
  createServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { Logger } from "tslog";
import { DEFAULT_MAX_BODY_BYTES } from "../config/defaults.js";
import { AuthError, errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { Gateway } from "./factory.js";
import { handleHealthRequest, handleWebhookRequest, type HttpResult } from "./handlers.js";
import type { LazyGateway } from "./lazy.js";

/**
 * Express-free HTTP server for the webhook and health routes, with
 * security headers on every response.
 */

export const WEBHOOK_PATHS: ReadonlySet<string> = new Set(["/api/webhook/telegram", "/api/webhook"]);
export const HEALTH_PATH = "/api/health";
export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

export interface HttpServerOptions {
  gateway: LazyGateway<Gateway>;
  maxBodyBytes?: number;
  /** When set, webhook requests must echo it in the secret-token header. */
  webhookSecret?: string;
  logger?: Logger<unknown>;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Payload exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Constant-time comparison. Both sides are hashed first so their lengths
 * do not leak through timing.
 */
export function secretMatches(provided: string | undefined, expected: string): boolean {
  if (provided === undefined) return false;
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > maxBytes) {
      req.resume();
      reject(new PayloadTooLargeError(maxBytes));
      return;
    }

    const chunks: Buffer[] = [];
    let total = 0;
    let exceeded = false;

    req.on("data", (chunk: Buffer) => {
      if (exceeded) return;
      total += chunk.length;
      if (total > maxBytes) {
        exceeded = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!exceeded) resolve(Buffer.concat(chunks).toString("utf-8"));
    });
    req.on("error", reject);
  });
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function send(res: ServerResponse, result: HttpResult): void {
  res.writeHead(result.statusCode, result.headers);
  res.end(result.body);
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  send(res, {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  });
}

export function createGatewayHttpServer(options: HttpServerOptions): HttpServer {
  const logger = options.logger ?? createLogger("http");
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = req.url?.split("?")[0] ?? "/";

    if (WEBHOOK_PATHS.has(path)) {
      if (req.method !== "POST") {
        sendJson(res, 405, { ok: false, error: "Method not allowed" });
        return;
      }
      if (
        options.webhookSecret !== undefined &&
        !secretMatches(headerValue(req, SECRET_HEADER), options.webhookSecret)
      ) {
        throw new AuthError("Missing or wrong secret token");
      }

      let body: string;
      try {
        body = await readBody(req, maxBodyBytes);
      } catch (err) {
        if (err instanceof PayloadTooLargeError) {
          sendJson(res, 413, { ok: false, error: "Payload too large" });
          return;
        }
        throw err;
      }
      send(res, await handleWebhookRequest(options.gateway, body, logger));
      return;
    }

    if (req.method === "GET" && path === HEALTH_PATH) {
      send(res, await handleHealthRequest(options.gateway));
      return;
    }

    if (req.method === "GET" && path === "/") {
      sendJson(res, 200, {
        name: "tidewire",
        status: "running",
        ready: options.gateway.isReady(),
      });
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  };

  return createServer((req, res) => {
    applySecurityHeaders(res);
    route(req, res).catch((err: unknown) => {
      if (err instanceof AuthError) {
        logger.warn(`Rejected ${req.method} ${req.url}: ${err.message}`);
        sendJson(res, err.statusCode, { ok: false, error: "Unauthorized" });
        return;
      }
      logger.error(`Unhandled error on ${req.method} ${req.url}: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { ok: false, error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });
}

function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-XSS-Protection", "0");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  res.setHeader("Permissions-Policy", "camera=(), microphone=(), geolocation=()");
  res.setHeader("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
}

import type { Logger } from "tslog";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { Gateway } from "./factory.js";
import { checkHealth } from "./health.js";
import type { LazyGateway } from "./lazy.js";

/**
 * Framework-free request handlers, shared by the Node server and any
 * serverless wrapper.
 */

export interface HttpResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const JSON_HEADERS = { "Content-Type": "application/json" };

function json(statusCode: number, payload: unknown): HttpResult {
  return { statusCode, headers: { ...JSON_HEADERS }, body: JSON.stringify(payload) };
}

export async function handleWebhookRequest(
  gateway: LazyGateway<Gateway>,
  body: string,
  logger: Logger<unknown> = createLogger("webhook"),
): Promise<HttpResult> {
  let update: unknown;
  try {
    update = JSON.parse(body);
  } catch {
    return json(400, { ok: false, error: "Invalid JSON" });
  }

  try {
    const { orchestrator } = await gateway.get();
    return json(200, await orchestrator.handleUpdate(update));
  } catch (err) {
    logger.error(`Webhook handling failed: ${errorMessage(err)}`, err);
    return json(500, { ok: false, error: "Internal server error" });
  }
}

export async function handleHealthRequest(gateway: LazyGateway<Gateway>): Promise<HttpResult> {
  let instance: Gateway;
  try {
    instance = await gateway.get();
  } catch (err) {
    return json(503, { status: "unhealthy", error: errorMessage(err) });
  }

  const report = await checkHealth(instance);
  return json(report.status === "healthy" ? 200 : 503, report);
}

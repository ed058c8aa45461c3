import { existsSync } from "node:fs";
import { validateConfig } from "../config/validation.js";
import type { Gateway } from "./factory.js";

export type HealthCheckName = "config" | "workspace" | "storage" | "agent" | "channel";

export interface HealthReport {
  status: "healthy" | "degraded";
  checks: Record<HealthCheckName, boolean>;
}

export async function checkHealth(gateway: Gateway): Promise<HealthReport> {
  let storage: boolean;
  try {
    storage = await gateway.store.healthCheck();
  } catch {
    storage = false;
  }

  const checks: Record<HealthCheckName, boolean> = {
    config: validateConfig(gateway.config).length === 0,
    workspace: existsSync(gateway.config.workspace.root),
    storage,
    agent: Boolean(gateway.config.agent.apiKey),
    channel: gateway.channel.isConfigured(),
  };

  const healthy = Object.values(checks).every(Boolean);
  return { status: healthy ? "healthy" : "degraded", checks };
}

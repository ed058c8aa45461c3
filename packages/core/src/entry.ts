#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import type { ChannelFactory } from "./gateway/factory.js";

const program = new Command();

program
  .name("tidewire")
  .description("Tidewire: Telegram to agent gateway with object-store sessions")
  .version("0.1.0");

async function loadTelegramChannel(): Promise<ChannelFactory> {
  const { createTelegramChannel } = await import("@tidewire/telegram");
  return (config) =>
    createTelegramChannel({
      token: config.telegram.token,
      timeoutSeconds: config.delivery.timeoutSeconds,
    });
}

// --- tidewire start ---
program
  .command("start")
  .description("Start the webhook server")
  .option("-p, --port <number>", "Override PORT")
  .action(async (options: { port?: string }) => {
    const { loadConfigFromEnv } = await import("./config/loader.js");
    const { createGateway } = await import("./gateway/factory.js");
    const { LazyGateway } = await import("./gateway/lazy.js");
    const { createGatewayHttpServer } = await import("./gateway/server-http.js");
    const { createLogger } = await import("./infra/logger.js");

    const config = loadConfigFromEnv();
    const log = createLogger("tidewire", { level: config.logging.level });
    const port = options.port ? Number.parseInt(options.port, 10) : config.server.port;
    const channel = await loadTelegramChannel();

    // Initialization is deferred to the first request and retried after a failure.
    const gateway = new LazyGateway(() =>
      createGateway(config, { channel, logger: log.getSubLogger({ name: "gateway" }) }),
    );

    const server = createGatewayHttpServer({
      gateway,
      maxBodyBytes: config.server.maxBodyBytes,
      webhookSecret: config.telegram.webhookSecret,
      logger: log.getSubLogger({ name: "http" }),
    });

    server.listen(port, () => {
      log.info(`Tidewire listening on port ${port}`);
    });

    const shutdown = () => {
      log.info("Shutting down...");
      server.close(() => process.exit(0));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

// --- tidewire check-config ---
program
  .command("check-config")
  .description("Validate the environment configuration")
  .action(async () => {
    const { loadConfigFromEnv } = await import("./config/loader.js");
    const { validateConfig } = await import("./config/validation.js");

    const config = loadConfigFromEnv();
    const errors = validateConfig(config);
    if (errors.length > 0) {
      console.error("Configuration problems:");
      for (const error of errors) console.error(`  - ${error}`);
      process.exit(1);
    }
    console.log(
      `Configuration OK (storage: ${config.storage.backend}, model: ${config.agent.model})`,
    );
  });

// --- tidewire set-webhook ---
program
  .command("set-webhook <url>")
  .description("Register the webhook URL with Telegram")
  .action(async (url: string) => {
    const { loadConfigFromEnv } = await import("./config/loader.js");
    const { setTelegramWebhook } = await import("@tidewire/telegram");

    const config = loadConfigFromEnv();
    if (!config.telegram.token) {
      console.error("TELEGRAM_BOT_TOKEN is not set");
      process.exit(1);
    }
    await setTelegramWebhook({
      token: config.telegram.token,
      url,
      secret: config.telegram.webhookSecret,
    });
    console.log(`Webhook set to ${url}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});

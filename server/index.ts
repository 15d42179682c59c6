/**
 * Process entry point.
 *
 * WEBHOOK_URL set → Express receives updates on /webhook.
 * Otherwise the bot long-polls and Express only serves the status routes.
 */

import express from "express";
import { loadConfig } from "./config/env";
import { registerRoutes, type RunMode } from "./routes";
import { createServices } from "./services";
import { createBot } from "./telegram/bot";
import { logError } from "./utils/errorHandler";
import { logInfo } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const mode: RunMode = config.webhookUrl ? "webhook" : "polling";

  const { handlers } = createServices(config);
  const bot = createBot(config, handlers);

  const app = express();
  const server = registerRoutes(app, bot, mode);

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  logInfo(`[Server] Listening on port ${config.port} (${mode} mode)`);

  if (config.webhookUrl) {
    await bot.init();
    await bot.api.setWebhook(`${config.webhookUrl}/webhook`);
    logInfo(`[Telegram] Webhook set to ${config.webhookUrl}/webhook`);
  } else {
    void bot.start({
      onStart: (me) => logInfo(`[Telegram] Polling as @${me.username}`),
    }).catch((error: unknown) => {
      logError("Telegram", error);
      process.exit(1);
    });
  }

  const shutdown = async (signal: string): Promise<void> => {
    logInfo(`[Server] ${signal} received, shutting down`);
    if (bot.isRunning()) {
      await bot.stop();
    }
    server.close(() => process.exit(0));
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logError("Shutdown", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logError("Startup", error);
  process.exit(1);
});

/**
 * Service entry point: health server, Telegram polling and the daily schedule
 */

import type { Server } from "http";
import { loadAppConfig } from "./config/env";
import { ConfigError } from "./lib/errors";
import { logger } from "./lib/logger";
import { buildPipelineFromConfig } from "./lib/pipeline/build";
import { DailyScheduler } from "./lib/schedule/daily";
import { DigestBot } from "./lib/telegram/bot";
import { TelegramClient } from "./lib/telegram/client";
import { APP_VERSION, createHealthApp } from "./server/health";

async function main(): Promise<void> {
  const config = loadAppConfig();
  const { service } = buildPipelineFromConfig(config);

  const app = createHealthApp({
    version: APP_VERSION,
    botTokenConfigured: config.telegram.botToken !== undefined,
    channelConfigured: config.telegram.channelConfigured,
  });
  const server: Server = app.listen(config.port, () => {
    logger.info(`Health server listening on port ${config.port}`);
  });

  let bot: DigestBot | null = null;
  let scheduler: DailyScheduler | null = null;
  let polling: Promise<void> = Promise.resolve();

  if (config.telegram.botToken) {
    const activeBot = new DigestBot({
      api: new TelegramClient(config.telegram.botToken),
      generator: service,
      language: config.language,
      channelId: config.telegram.channelId,
      schedule: config.schedule,
      maxArticles: config.digest.maxArticles,
    });
    bot = activeBot;

    scheduler = new DailyScheduler(config.schedule.time, config.schedule.timeZone, async () => {
      await activeBot.sendDailyDigest();
    });
    scheduler.start();

    polling = activeBot.start();
  } else {
    logger.warn("TELEGRAM_BOT_TOKEN not set; running health server only");
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    scheduler?.stop();
    bot?.stop();
    server.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await polling;
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    for (const issue of error.issues) {
      logger.error(`Config: ${issue}`);
    }
  } else {
    logger.error("Fatal error", error);
  }
  process.exitCode = 1;
});

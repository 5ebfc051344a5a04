#!/usr/bin/env tsx
/**
 * Generate one digest from the configured sources
 *
 * Usage:
 *   npm run digest            # print the digest to stdout
 *   npm run digest -- --send  # post it to TELEGRAM_CHANNEL_ID
 *
 * Environment variables:
 *   - TELEGRAM_BOT_TOKEN (required with --send)
 *   - OPENAI_API_KEY (optional, enables LLM ranking and summaries)
 */

import { loadAppConfig } from "../src/config/env";
import { MESSAGES } from "../src/config/messages";
import { logger } from "../src/lib/logger";
import { buildPipelineFromConfig } from "../src/lib/pipeline/build";
import { outcomeMessage } from "../src/lib/pipeline/digest";
import { DigestBot } from "../src/lib/telegram/bot";
import { TelegramClient } from "../src/lib/telegram/client";

async function main(): Promise<number> {
  const send = process.argv.includes("--send");
  const config = loadAppConfig();
  const { service } = buildPipelineFromConfig(config);

  if (!send) {
    const startTime = Date.now();
    const outcome = await service.generate();
    console.log(outcomeMessage(outcome, MESSAGES[config.language]));
    logger.info(`Digest ${outcome.status} in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
    return 0;
  }

  if (!config.telegram.botToken) {
    logger.error("TELEGRAM_BOT_TOKEN is required with --send");
    return 1;
  }

  const bot = new DigestBot({
    api: new TelegramClient(config.telegram.botToken),
    generator: service,
    language: config.language,
    channelId: config.telegram.channelId,
    schedule: config.schedule,
    maxArticles: config.digest.maxArticles,
  });

  return (await bot.sendDailyDigest()) ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error("Digest run failed", error);
    process.exitCode = 1;
  });

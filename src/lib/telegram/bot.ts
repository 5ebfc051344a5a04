/**
 * Telegram bot: chat commands, long polling and channel delivery of the digest
 */

import { Language } from "../model";
import { formatStatus, Messages, MESSAGES } from "../../config/messages";
import { DigestOutcome, outcomeMessage } from "../pipeline/digest";
import { backoffDelay, formatDelay, sleep } from "../backoff";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { BotApi, ChatId, TelegramUpdate } from "./client";

const log = createLogger("bot");

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface DigestGenerator {
  generate(options?: { signal?: AbortSignal }): Promise<DigestOutcome>;
}

export interface DigestBotOptions {
  api: BotApi;
  generator: DigestGenerator;
  language: Language;
  channelId: string;
  schedule: { time: string; timeZone: string };
  maxArticles: number;
  pollTimeoutSeconds?: number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export type BotCommand = "start" | "help" | "status" | "digest";

const COMMANDS: readonly BotCommand[] = ["start", "help", "status", "digest"];

function isBotCommand(value: string): value is BotCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * "/digest@my_bot now" → "digest"; null for plain text and unknown commands
 */
export function parseCommand(text: string): BotCommand | null {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i);
  if (!match) return null;
  const command = match[1].toLowerCase();
  return isBotCommand(command) ? command : null;
}

/**
 * Split text into chunks of at most `limit` characters, breaking on line
 * boundaries. Lines longer than the limit are cut into pieces.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let current: string | null = null;

  for (const line of text.split("\n")) {
    const pieces: string[] = [];
    for (let offset = 0; offset < line.length; offset += limit) {
      pieces.push(line.slice(offset, offset + limit));
    }
    if (pieces.length === 0) pieces.push("");

    for (const piece of pieces) {
      const candidate: string = current === null ? piece : `${current}\n${piece}`;
      if (candidate.length <= limit) {
        current = candidate;
      } else {
        if (current !== null) chunks.push(current);
        current = piece;
      }
    }
  }

  if (current !== null) chunks.push(current);
  return chunks;
}

export class DigestBot {
  private readonly messages: Messages;
  private readonly pollTimeoutSeconds: number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private controller: AbortController | null = null;

  constructor(private readonly options: DigestBotOptions) {
    this.messages = MESSAGES[options.language];
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 30;
    this.wait = options.wait ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.controller !== null;
  }

  private async send(chatId: ChatId, text: string): Promise<void> {
    for (const chunk of splitMessage(text)) {
      await this.options.api.sendMessage(chatId, chunk, { parseMode: "Markdown", disableWebPagePreview: true });
    }
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (!message?.text) return;

    const command = parseCommand(message.text);
    if (!command) return;

    log.info(`Received /${command} from chat ${message.chat.id}`);
    await this.handleCommand(message.chat.id, command);
  }

  async handleCommand(chatId: ChatId, command: BotCommand): Promise<void> {
    switch (command) {
      case "start":
        await this.send(chatId, this.messages.welcome);
        return;
      case "help":
        await this.send(chatId, this.messages.help);
        return;
      case "status":
        await this.send(chatId, await this.statusText());
        return;
      case "digest":
        await this.digestCommand(chatId);
        return;
    }
  }

  private async statusText(): Promise<string> {
    try {
      const me = await this.options.api.getMe();
      return formatStatus(this.options.language, {
        botName: me.first_name,
        username: me.username,
        botId: me.id,
        channelId: this.options.channelId,
        schedule: this.options.schedule.time,
        timeZone: this.options.schedule.timeZone,
        maxArticles: this.options.maxArticles,
        checkedAt: this.now().toISOString(),
      });
    } catch (error) {
      log.error("Error getting bot status", error);
      return this.messages.statusFailed;
    }
  }

  private async digestCommand(chatId: ChatId): Promise<void> {
    const { api, generator } = this.options;
    const progress = await api.sendMessage(chatId, this.messages.generating);

    let text: string;
    try {
      const outcome = await generator.generate({ signal: this.controller?.signal });
      text = outcomeMessage(outcome, this.messages);
    } catch (error) {
      log.error("Error generating digest", error);
      await api.editMessageText(chatId, progress.message_id, this.messages.generationFailed);
      return;
    }

    await api.deleteMessage(chatId, progress.message_id);
    await this.send(chatId, text);
  }

  /**
   * Generate a digest and post it to the configured channel.
   * Returns false when generation or delivery failed.
   */
  async sendDailyDigest(signal?: AbortSignal): Promise<boolean> {
    log.info("Sending daily digest...");

    try {
      const outcome = await this.options.generator.generate({ signal });
      if (outcome.status !== "ready") {
        log.warn(`Daily digest has no news (${outcome.status})`);
      }
      await this.send(this.options.channelId, outcomeMessage(outcome, this.messages));
      log.info("Daily digest sent successfully");
      return true;
    } catch (error) {
      log.error(`Failed to send daily digest: ${errorMessage(error)}`, error);
      return false;
    }
  }

  /**
   * Long-poll for updates until stop() is called.
   * A failing update is logged and does not end the loop.
   */
  async start(): Promise<void> {
    if (this.controller) return;

    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;
    let offset: number | undefined;
    let failures = 0;

    log.info("Bot polling started");

    try {
      while (!signal.aborted) {
        let updates: TelegramUpdate[];
        try {
          updates = await this.options.api.getUpdates(offset, this.pollTimeoutSeconds, signal);
          failures = 0;
        } catch (error) {
          if (signal.aborted) break;
          failures++;
          const delay = backoffDelay(failures);
          log.error(`Polling failed, retrying in ${formatDelay(delay)}`, error);
          try {
            await this.wait(delay, signal);
          } catch (waitError) {
            if (signal.aborted) break;
            throw waitError;
          }
          continue;
        }

        for (const update of updates) {
          offset = update.update_id + 1;
          try {
            await this.handleUpdate(update);
          } catch (error) {
            log.error(`Failed to handle update ${update.update_id}`, error);
          }
        }
      }
    } finally {
      this.controller = null;
      log.info("Bot polling stopped");
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}

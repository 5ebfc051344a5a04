/**
 * Telegram Bot API client
 *
 * Thin fetch wrapper; every response is validated against the `{ ok, result }` envelope.
 */

import { z } from "zod";
import { TelegramApiError } from "../errors";
import { logger } from "../logger";

const userSchema = z.object({
  id: z.number(),
  first_name: z.string(),
  username: z.string().optional(),
});

const chatSchema = z.object({
  id: z.number(),
  type: z.string(),
});

const messageSchema = z.object({
  message_id: z.number(),
  chat: chatSchema,
  text: z.string().optional(),
  from: userSchema.optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown(),
  error_code: z.number().optional(),
  description: z.string().optional(),
});

export type TelegramUser = z.infer<typeof userSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

export type ChatId = number | string;

export interface SendMessageOptions {
  parseMode?: "Markdown" | "MarkdownV2" | "HTML";
  disableWebPagePreview?: boolean;
}

/**
 * Operations the bot needs; the concrete client talks to api.telegram.org
 */
export interface BotApi {
  getMe(): Promise<TelegramUser>;
  getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
  sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<TelegramMessage>;
  editMessageText(chatId: ChatId, messageId: number, text: string): Promise<void>;
  deleteMessage(chatId: ChatId, messageId: number): Promise<void>;
}

export class TelegramClient implements BotApi {
  private readonly baseUrl: string;

  constructor(
    private readonly token: string,
    baseUrl = "https://api.telegram.org"
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
  }

  private async call<T extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    resultSchema: T,
    signal?: AbortSignal
  ): Promise<z.infer<T>> {
    const response = await fetch(`${this.baseUrl}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(params),
      signal,
    });

    const envelope = envelopeSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new TelegramApiError(method, response.status, `Unexpected response: ${envelope.error.message}`);
    }

    const body = envelope.data;
    if (!body.ok) {
      throw new TelegramApiError(method, body.error_code ?? response.status, body.description ?? response.statusText);
    }

    const result = resultSchema.safeParse(body.result);
    if (!result.success) {
      throw new TelegramApiError(method, response.status, `Unexpected result: ${result.error.message}`);
    }

    logger.debug(`Telegram ${method} succeeded`);
    return result.data;
  }

  getMe(): Promise<TelegramUser> {
    return this.call("getMe", {}, userSchema);
  }

  getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const params: Record<string, unknown> = { timeout: timeoutSeconds, allowed_updates: ["message"] };
    if (offset !== undefined) params.offset = offset;
    return this.call("getUpdates", params, z.array(updateSchema), signal);
  }

  sendMessage(chatId: ChatId, text: string, options: SendMessageOptions = {}): Promise<TelegramMessage> {
    return this.call(
      "sendMessage",
      {
        chat_id: chatId,
        text,
        parse_mode: options.parseMode,
        disable_web_page_preview: options.disableWebPagePreview,
      },
      messageSchema
    );
  }

  async editMessageText(chatId: ChatId, messageId: number, text: string): Promise<void> {
    // Returns the edited message, or true for inline messages
    await this.call("editMessageText", { chat_id: chatId, message_id: messageId, text }, z.union([messageSchema, z.boolean()]));
  }

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    await this.call("deleteMessage", { chat_id: chatId, message_id: messageId }, z.boolean());
  }
}

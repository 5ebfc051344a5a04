import { describe, it, expect, vi } from "vitest";
import { DigestBot, DigestGenerator, parseCommand, splitMessage } from "../../../src/lib/telegram/bot";
import { BotApi, ChatId, SendMessageOptions, TelegramMessage, TelegramUpdate } from "../../../src/lib/telegram/client";
import { DigestOutcome } from "../../../src/lib/pipeline/digest";
import { MESSAGES } from "../../../src/config/messages";

class FakeBotApi implements BotApi {
  readonly calls: string[] = [];
  readonly sent: Array<{ chatId: ChatId; text: string; options?: SendMessageOptions }> = [];
  readonly offsets: Array<number | undefined> = [];
  readonly updates: Array<() => TelegramUpdate[] | Error> = [];
  readonly failingChats = new Set<ChatId>();
  meError: Error | null = null;
  onIdle: () => void = () => undefined;
  private nextMessageId = 100;

  async getMe() {
    if (this.meError) throw this.meError;
    return { id: 42, first_name: "Agri Digest", username: "agri_test_bot" };
  }

  async getUpdates(offset: number | undefined): Promise<TelegramUpdate[]> {
    this.offsets.push(offset);
    const next = this.updates.shift();
    if (!next) {
      this.onIdle();
      return [];
    }
    const result = next();
    if (result instanceof Error) throw result;
    return result;
  }

  async sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<TelegramMessage> {
    if (this.failingChats.has(chatId)) throw new Error("chat not found");
    this.sent.push({ chatId, text, options });
    this.calls.push(`send:${chatId}`);
    return { message_id: this.nextMessageId++, chat: { id: 7, type: "private" }, text };
  }

  async editMessageText(_chatId: ChatId, messageId: number, text: string): Promise<void> {
    this.calls.push(`edit:${messageId}:${text}`);
  }

  async deleteMessage(_chatId: ChatId, messageId: number): Promise<void> {
    this.calls.push(`delete:${messageId}`);
  }
}

const messages = MESSAGES.en;
const MARKDOWN = { parseMode: "Markdown", disableWebPagePreview: true };

function generatorOf(result: DigestOutcome | Error): DigestGenerator {
  return {
    generate: async () => {
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

function createBot(api: FakeBotApi, generator: DigestGenerator = generatorOf({ status: "no-articles" })) {
  return new DigestBot({
    api,
    generator,
    language: "en",
    channelId: "@test_channel",
    schedule: { time: "08:00", timeZone: "UTC" },
    maxArticles: 8,
    now: () => new Date("2026-10-19T08:00:00Z"),
  });
}

const commandUpdate = (updateId: number, chatId: number, text: string): TelegramUpdate => ({
  update_id: updateId,
  message: { message_id: updateId, chat: { id: chatId, type: "private" }, text },
});

const ready: DigestOutcome = { status: "ready", text: "🌾 Digest body", articles: [], strategy: "heuristic" };

describe("parseCommand", () => {
  it("should recognize known commands with an optional bot mention", () => {
    expect(parseCommand("/digest")).toBe("digest");
    expect(parseCommand("/Digest@agri_test_bot now")).toBe("digest");
    expect(parseCommand("  /help")).toBe("help");
  });

  it("should ignore plain text and unknown commands", () => {
    expect(parseCommand("hello")).toBeNull();
    expect(parseCommand("/unknown")).toBeNull();
    expect(parseCommand("/digesting")).toBeNull();
  });
});

describe("splitMessage", () => {
  it("should return short messages unchanged", () => {
    expect(splitMessage("short", 10)).toEqual(["short"]);
  });

  it("should split on line boundaries", () => {
    expect(splitMessage("aaaa\nbbbb\ncccc", 10)).toEqual(["aaaa\nbbbb", "cccc"]);
  });

  it("should cut lines longer than the limit", () => {
    expect(splitMessage("x".repeat(25), 10)).toEqual(["x".repeat(10), "x".repeat(10), "x".repeat(5)]);
  });

  it("should keep every chunk within the Telegram limit", () => {
    const text = Array.from({ length: 300 }, (_, i) => `Line ${i}: ${"news ".repeat(5)}`).join("\n");
    const chunks = splitMessage(text);
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.length <= 4096)).toBe(true);
    expect(chunks.join("\n")).toBe(text);
  });
});

describe("DigestBot", () => {
  describe("commands", () => {
    it("should answer /start with the welcome text", async () => {
      const api = new FakeBotApi();
      await createBot(api).handleUpdate(commandUpdate(1, 7, "/start"));
      expect(api.sent).toEqual([{ chatId: 7, text: messages.welcome, options: MARKDOWN }]);
    });

    it("should ignore messages that are not commands", async () => {
      const api = new FakeBotApi();
      await createBot(api).handleUpdate(commandUpdate(1, 7, "good morning"));
      expect(api.sent).toEqual([]);
    });

    it("should report status", async () => {
      const api = new FakeBotApi();
      await createBot(api).handleCommand(7, "status");
      expect(api.sent[0].text).toBe(
        [
          "🤖 **Bot Status**",
          "",
          "• Name: Agri Digest",
          "• Username: @agri_test_bot",
          "• ID: 42",
          "• Channel: @test_channel",
          "• Schedule: 08:00 (UTC)",
          "• Max Articles: 8",
          "• Checked: 2026-10-19T08:00:00.000Z",
        ].join("\n")
      );
    });

    it("should report a status failure", async () => {
      const api = new FakeBotApi();
      api.meError = new Error("Unauthorized");
      await createBot(api).handleCommand(7, "status");
      expect(api.sent[0].text).toBe(messages.statusFailed);
    });

    it("should replace the progress message with the digest", async () => {
      const api = new FakeBotApi();
      await createBot(api, generatorOf(ready)).handleCommand(7, "digest");

      expect(api.calls).toEqual(["send:7", "delete:100", "send:7"]);
      expect(api.sent[0].text).toBe(messages.generating);
      expect(api.sent[1]).toEqual({ chatId: 7, text: "🌾 Digest body", options: MARKDOWN });
    });

    it("should reply with the no-news text for empty outcomes", async () => {
      const api = new FakeBotApi();
      await createBot(api, generatorOf({ status: "no-relevant", fetched: 3 })).handleCommand(7, "digest");
      expect(api.sent[1].text).toBe(messages.noRelevant);
    });

    it("should edit the progress message when generation fails", async () => {
      const api = new FakeBotApi();
      await createBot(api, generatorOf(new Error("boom"))).handleCommand(7, "digest");
      expect(api.calls).toEqual(["send:7", `edit:100:${messages.generationFailed}`]);
    });
  });

  describe("sendDailyDigest", () => {
    it("should post the digest to the channel", async () => {
      const api = new FakeBotApi();
      expect(await createBot(api, generatorOf(ready)).sendDailyDigest()).toBe(true);
      expect(api.sent).toEqual([{ chatId: "@test_channel", text: "🌾 Digest body", options: MARKDOWN }]);
    });

    it("should split long digests into several messages", async () => {
      const api = new FakeBotApi();
      const text = Array.from({ length: 200 }, (_, i) => `**${i}. ${"headline ".repeat(4)}**`).join("\n");
      await createBot(api, generatorOf({ ...ready, text })).sendDailyDigest();
      expect(api.sent.length).toBeGreaterThan(1);
      expect(api.sent.map((m) => m.text).join("\n")).toBe(text);
    });

    it("should return false when generation fails", async () => {
      const api = new FakeBotApi();
      expect(await createBot(api, generatorOf(new Error("boom"))).sendDailyDigest()).toBe(false);
      expect(api.sent).toEqual([]);
    });
  });

  describe("polling", () => {
    it("should handle updates, advance the offset and survive a failing update", async () => {
      const api = new FakeBotApi();
      const bot = createBot(api);
      api.failingChats.add(13);
      api.updates.push(() => [commandUpdate(10, 13, "/start"), commandUpdate(11, 7, "/help")]);
      api.onIdle = () => bot.stop();

      await bot.start();

      expect(api.offsets).toEqual([undefined, 12]);
      expect(api.sent).toEqual([{ chatId: 7, text: messages.help, options: MARKDOWN }]);
      expect(bot.running).toBe(false);
    });

    it("should back off after a polling error", async () => {
      const api = new FakeBotApi();
      const wait = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
      const bot = new DigestBot({
        api,
        generator: generatorOf(ready),
        language: "en",
        channelId: "@test_channel",
        schedule: { time: "08:00", timeZone: "UTC" },
        maxArticles: 8,
        wait,
      });
      api.updates.push(() => new Error("502 Bad Gateway"));
      api.onIdle = () => bot.stop();

      await bot.start();

      expect(wait).toHaveBeenCalledTimes(1);
      expect(wait.mock.calls[0][0]).toBe(1000);
      expect(api.offsets).toEqual([undefined, undefined]);
    });
  });
});

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createSummaryPrompt,
  LlmSummarizer,
  Summarizer,
  summarizeWithTimeout,
} from "../../../src/lib/pipeline/summarize";
import { FakeCompletionClient } from "../../helpers";

describe("summarize", () => {
  const request = { title: "Wheat prices rise 15%", body: "Export demand pushed prices higher." };

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("createSummaryPrompt", () => {
    it("should include title and body", () => {
      const prompt = createSummaryPrompt(request, "en");
      expect(prompt).toContain("Title: Wheat prices rise 15%");
      expect(prompt).toContain("Content: Export demand pushed prices higher.");
    });

    it("should clip long bodies", () => {
      const prompt = createSummaryPrompt({ title: "T", body: "a".repeat(3000) }, "ru");
      expect(prompt).toContain(`Содержание: ${"a".repeat(2000)}\n`);
      expect(prompt).not.toContain("a".repeat(2001));
    });
  });

  describe("LlmSummarizer", () => {
    it("should return the trimmed model output", async () => {
      const client = new FakeCompletionClient(() => "  Prices rose on export demand.  \n");
      const result = await new LlmSummarizer(client, "en").summarize(request);
      expect(result).toEqual({ ok: true, text: "Prices rose on export demand." });
    });

    it("should fail on an empty response", async () => {
      const client = new FakeCompletionClient(() => "   ");
      expect(await new LlmSummarizer(client, "en").summarize(request)).toEqual({
        ok: false,
        reason: "empty response",
      });
    });

    it("should fail when the model call fails", async () => {
      const client = new FakeCompletionClient(() => new Error("rate limited"));
      expect(await new LlmSummarizer(client, "en").summarize(request)).toEqual({
        ok: false,
        reason: "rate limited",
      });
    });

    it("should not call the model when there is nothing to summarize", async () => {
      const client = new FakeCompletionClient(() => "unused");
      const result = await new LlmSummarizer(client, "en").summarize({ title: " ", body: "" });
      expect(result).toEqual({ ok: false, reason: "nothing to summarize" });
      expect(client.requests).toHaveLength(0);
    });
  });

  describe("summarizeWithTimeout", () => {
    it("should return the summary when it arrives in time", async () => {
      const fast: Summarizer = { summarize: async () => ({ ok: true, text: "Quick summary of the news." }) };
      expect(await summarizeWithTimeout(fast, request, 1000)).toEqual({
        ok: true,
        text: "Quick summary of the news.",
      });
    });

    it("should give up and abort the request after the timeout", async () => {
      vi.useFakeTimers();
      let received: AbortSignal | undefined;
      const slow: Summarizer = {
        summarize: (_request, signal) => {
          received = signal;
          return new Promise(() => undefined);
        },
      };

      const pending = summarizeWithTimeout(slow, request, 15000);
      await vi.advanceTimersByTimeAsync(15000);

      await expect(pending).resolves.toEqual({ ok: false, reason: "timed out after 15000ms" });
      expect(received?.aborted).toBe(true);
    });

    it("should turn a rejected request into a failure", async () => {
      const failing: Summarizer = {
        summarize: async () => {
          throw new Error("socket hang up");
        },
      };
      expect(await summarizeWithTimeout(failing, request, 1000)).toEqual({ ok: false, reason: "socket hang up" });
    });

    it("should abort the request when the parent signal fires", async () => {
      const parent = new AbortController();
      const listening: Summarizer = {
        summarize: (_request, signal) =>
          new Promise((_resolve, reject) => {
            signal?.addEventListener("abort", () => reject(new Error("aborted by caller")));
          }),
      };

      const pending = summarizeWithTimeout(listening, request, 60000, parent.signal);
      parent.abort();

      expect(await pending).toEqual({ ok: false, reason: "aborted by caller" });
    });
  });
});

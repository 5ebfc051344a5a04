import { describe, it, expect } from "vitest";
import { ArticleSource, outcomeMessage } from "../../../src/lib/pipeline/digest";
import { buildPipeline } from "../../../src/lib/pipeline/build";
import { DEFAULT_DIGEST_SETTINGS, DigestSettings } from "../../../src/config/digest";
import { MESSAGES } from "../../../src/config/messages";
import { DigestAbortedError } from "../../../src/lib/errors";
import { Article } from "../../../src/lib/model";
import {
  droneArticle,
  FakeCompletionClient,
  footballArticle,
  tariffArticle,
  wheatArticle,
} from "../../helpers";

const staticSource = (articles: Article[]): ArticleSource => ({
  fetchAll: async () => articles,
});

function createService(
  source: ArticleSource,
  options: { completion?: FakeCompletionClient; settings?: Partial<DigestSettings> } = {}
) {
  return buildPipeline({
    language: "en",
    settings: { ...DEFAULT_DIGEST_SETTINGS, ...options.settings },
    source,
    completion: options.completion ?? null,
    summarizer: null,
    now: () => new Date("2026-10-19T08:00:00Z"),
  }).service;
}

describe("DigestService", () => {
  it("should report when no articles were fetched", async () => {
    const outcome = await createService(staticSource([])).generate();
    expect(outcome).toEqual({ status: "no-articles" });
  });

  it("should report when nothing is relevant", async () => {
    const outcome = await createService(staticSource([footballArticle])).generate();
    expect(outcome).toEqual({ status: "no-relevant", fetched: 1 });
  });

  it("should never carry an article without title or summary downstream", async () => {
    const empty = { title: "", summary: "", source: "Fastmarkets", link: "https://example.com/empty" };
    expect(await createService(staticSource([empty])).generate()).toEqual({ status: "no-relevant", fetched: 1 });

    const outcome = await createService(staticSource([empty, wheatArticle])).generate();
    expect(outcome.status === "ready" && outcome.articles.map((a) => a.title)).toEqual(["Wheat prices rise 15%"]);
    expect(outcome.status === "ready" && outcome.text).not.toContain("example.com/empty");
  });

  it("should filter, rank and format relevant articles", async () => {
    const outcome = await createService(
      staticSource([droneArticle, footballArticle, tariffArticle, wheatArticle])
    ).generate();

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    expect(outcome.strategy).toBe("heuristic");
    expect(outcome.articles.map((a) => a.title)).toEqual(["Wheat prices rise 15%", "Export tariffs increased"]);
    expect(outcome.text.split("\n")[2]).toBe("📊 **2 articles** from 2 sources");
  });

  it("should drop duplicate stories before ranking", async () => {
    const copy = { ...wheatArticle, source: "APK-Inform" };
    const outcome = await createService(staticSource([wheatArticle, copy, tariffArticle])).generate();
    expect(outcome.status === "ready" && outcome.articles).toHaveLength(2);
  });

  it("should keep duplicates when deduplication is disabled", async () => {
    const copy = { ...wheatArticle, source: "APK-Inform" };
    const outcome = await createService(staticSource([wheatArticle, copy, tariffArticle]), {
      settings: { dedupe: false },
    }).generate();
    expect(outcome.status === "ready" && outcome.articles).toHaveLength(3);
  });

  it("should use the model ranking when it succeeds", async () => {
    const completion = new FakeCompletionClient(() => '{"ranked_articles": [1, 0]}');
    const outcome = await createService(staticSource([wheatArticle, tariffArticle]), { completion }).generate();

    expect(outcome.status === "ready" && outcome.strategy).toBe("openai");
    expect(outcome.status === "ready" && outcome.articles.map((a) => a.title)).toEqual([
      "Export tariffs increased",
      "Wheat prices rise 15%",
    ]);
  });

  it("should fall back to the heuristic when the model fails", async () => {
    const completion = new FakeCompletionClient(() => new Error("service unavailable"));
    const outcome = await createService(staticSource([tariffArticle, wheatArticle]), { completion }).generate();

    expect(outcome.status === "ready" && outcome.strategy).toBe("heuristic");
    expect(outcome.status === "ready" && outcome.articles[0].title).toBe("Wheat prices rise 15%");
  });

  it("should reject with DigestAbortedError when cancelled", async () => {
    const controller = new AbortController();
    const source: ArticleSource = {
      fetchAll: async () => {
        controller.abort();
        return [wheatArticle];
      },
    };

    await expect(createService(source).generate({ signal: controller.signal })).rejects.toThrow(
      new DigestAbortedError("fetching").message
    );
  });

  it("should share no state between runs", async () => {
    const service = createService(staticSource([wheatArticle]));
    const first = await service.generate();
    const second = await service.generate();
    expect(second).toEqual(first);
  });
});

describe("outcomeMessage", () => {
  const messages = MESSAGES.en;

  it("should map empty outcomes to distinct texts", () => {
    expect(outcomeMessage({ status: "no-articles" }, messages)).toBe("📰 No articles found from any sources today.");
    expect(outcomeMessage({ status: "no-relevant", fetched: 4 }, messages)).toBe(
      "🌾 No agriculture-related articles found today."
    );
  });

  it("should return the digest text when ready", () => {
    expect(outcomeMessage({ status: "ready", text: "digest", articles: [], strategy: "heuristic" }, messages)).toBe(
      "digest"
    );
  });
});

import { describe, it, expect } from "vitest";
import { ImportanceScorer, normalizeCap, rankByImportance } from "../../../src/lib/pipeline/rank";
import { loadLexicon } from "../../../src/config/lexicon";
import { DEFAULT_DIGEST_SETTINGS } from "../../../src/config/digest";
import { droneArticle, tariffArticle, wheatArticle } from "../../helpers";

describe("rank", () => {
  const lexicon = loadLexicon("en");
  const scorer = new ImportanceScorer({
    highImpact: lexicon.highImpact,
    commodities: lexicon.commodities,
    weights: DEFAULT_DIGEST_SETTINGS.weights,
    sourceCredibility: DEFAULT_DIGEST_SETTINGS.sourceCredibility,
  });

  describe("ImportanceScorer", () => {
    it("should add title keywords, commodities and source credibility", () => {
      expect(scorer.breakdown(wheatArticle)).toEqual({
        highImpact: 6,
        commodities: 2,
        source: 5,
        length: 0,
        published: 0,
        total: 13,
      });
    });

    it("should use the lower weights for summary-only keywords", () => {
      const article = { title: "Market update", summary: "Wheat exports rise on strong demand", source: "Unknown" };
      expect(scorer.breakdown(article)).toEqual({
        highImpact: 4,
        commodities: 1,
        source: 0,
        length: 0,
        published: 0,
        total: 5,
      });
    });

    it("should count a keyword in both title and summary once", () => {
      const article = { title: "Wheat prices", summary: "Wheat prices climb", source: "Unknown" };
      expect(scorer.score(article)).toBe(5);
    });

    it("should give the length bonus only above 100 characters", () => {
      const base = { title: "Notes", source: "Unknown" };
      expect(scorer.breakdown({ ...base, summary: "x".repeat(100) }).length).toBe(0);
      expect(scorer.breakdown({ ...base, summary: "x".repeat(101) }).length).toBe(1);
    });

    it("should give the published bonus only for a non-blank date", () => {
      const base = { title: "Notes", summary: "", source: "Unknown" };
      expect(scorer.breakdown({ ...base, published: "2026-10-19" }).published).toBe(1);
      expect(scorer.breakdown({ ...base, published: "   " }).published).toBe(0);
    });

    it("should match source credibility case-insensitively", () => {
      const base = { title: "Notes", summary: "" };
      expect(scorer.breakdown({ ...base, source: "FASTMARKETS Agriculture" }).source).toBe(5);
      expect(scorer.breakdown({ ...base, source: "APK News Kazakhstan" }).source).toBe(4);
      expect(scorer.breakdown({ ...base, source: "Eldala.kz" }).source).toBe(3);
    });
  });

  describe("normalizeCap", () => {
    it("should floor positive caps and zero out the rest", () => {
      expect(normalizeCap(2.7)).toBe(2);
      expect(normalizeCap(0)).toBe(0);
      expect(normalizeCap(-1)).toBe(0);
      expect(normalizeCap(Number.NaN)).toBe(0);
      expect(normalizeCap(Number.POSITIVE_INFINITY)).toBe(0);
    });
  });

  describe("rankByImportance", () => {
    it("should sort by descending score with 1-based positions", () => {
      const ranked = rankByImportance([droneArticle, wheatArticle, tariffArticle], scorer, 8);
      expect(ranked.map((a) => [a.title, a.importanceScore, a.rankPosition])).toEqual([
        ["Wheat prices rise 15%", 13, 1],
        ["Export tariffs increased", 10, 2],
        ["New drone technology launched", 4, 3],
      ]);
    });

    it("should cut to the cap", () => {
      const ranked = rankByImportance([droneArticle, wheatArticle, tariffArticle], scorer, 2);
      expect(ranked.map((a) => a.title)).toEqual(["Wheat prices rise 15%", "Export tariffs increased"]);
    });

    it("should keep input order for equal scores", () => {
      const alpha = { title: "Alpha", summary: "", source: "Unknown" };
      const beta = { title: "Beta", summary: "", source: "Unknown" };
      expect(rankByImportance([alpha, beta], scorer, 8).map((a) => a.title)).toEqual(["Alpha", "Beta"]);
      expect(rankByImportance([beta, alpha], scorer, 8).map((a) => a.title)).toEqual(["Beta", "Alpha"]);
    });

    it("should return nothing for empty input or a non-positive cap", () => {
      expect(rankByImportance([], scorer, 8)).toEqual([]);
      expect(rankByImportance([wheatArticle], scorer, 0)).toEqual([]);
    });

    it("should not mutate the input articles", () => {
      const input = [droneArticle, wheatArticle];
      rankByImportance(input, scorer, 8);
      expect(input[0]).toBe(droneArticle);
      expect("importanceScore" in droneArticle).toBe(false);
    });
  });

  describe("ImportanceScorer with the Russian lexicon", () => {
    const ru = loadLexicon("ru");
    const ruScorer = new ImportanceScorer({
      highImpact: ru.highImpact,
      commodities: ru.commodities,
      weights: DEFAULT_DIGEST_SETTINGS.weights,
      sourceCredibility: DEFAULT_DIGEST_SETTINGS.sourceCredibility,
    });

    it("should not score place names that share a prefix with price or growth words", () => {
      expect(ruScorer.breakdown({ title: "Центр Ростова", summary: "", source: "x" })).toEqual({
        highImpact: 0,
        commodities: 0,
        source: 0,
        length: 0,
        published: 0,
        total: 0,
      });
    });

    it("should score inflected price and growth words", () => {
      expect(ruScorer.breakdown({ title: "Цены на пшеницу растут", summary: "", source: "x" })).toEqual({
        highImpact: 6,
        commodities: 2,
        source: 0,
        length: 0,
        published: 0,
        total: 8,
      });
    });
  });
});

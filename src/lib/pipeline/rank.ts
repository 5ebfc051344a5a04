/**
 * Ranking pipeline
 * Additive importance score, stable descending sort, top-N cut
 */

import { Article, RankedArticle } from "../model";
import { ScoringWeights, SourceCredibility } from "../../config/digest";
import { KeywordSet } from "./keywords";
import { logger } from "../logger";

export interface ScoringConfig {
  highImpact: readonly string[];
  commodities: readonly string[];
  weights: ScoringWeights;
  sourceCredibility: readonly SourceCredibility[];
}

export interface ScoreBreakdown {
  highImpact: number;
  commodities: number;
  source: number;
  length: number;
  published: number;
  total: number;
}

export class ImportanceScorer {
  private readonly highImpact: KeywordSet;
  private readonly commodities: KeywordSet;

  constructor(private readonly config: ScoringConfig) {
    this.highImpact = new KeywordSet(config.highImpact);
    this.commodities = new KeywordSet(config.commodities);
  }

  /**
   * Title hits score higher; a keyword found in both title and summary counts once, at the title weight
   */
  private keywordPoints(set: KeywordSet, title: string, summary: string, titleWeight: number, summaryWeight: number): number {
    const inTitle = new Set(set.matched(title));
    const summaryOnly = set.matched(summary).filter((k) => !inTitle.has(k));
    return inTitle.size * titleWeight + summaryOnly.length * summaryWeight;
  }

  private sourceBonus(source: string): number {
    const normalized = source.toLowerCase();
    const entry = this.config.sourceCredibility.find(
      (e) => e.match.length > 0 && normalized.includes(e.match.toLowerCase())
    );
    return entry?.bonus ?? 0;
  }

  breakdown(article: Article): ScoreBreakdown {
    const { weights } = this.config;
    const title = article.title ?? "";
    const summary = article.summary ?? "";

    const highImpact = this.keywordPoints(this.highImpact, title, summary, weights.highImpactTitle, weights.highImpactSummary);
    const commodities = this.keywordPoints(this.commodities, title, summary, weights.commodityTitle, weights.commoditySummary);
    const source = this.sourceBonus(article.source ?? "");
    const length = summary.length > weights.substantiveSummaryLength ? weights.substantiveSummary : 0;
    const published = article.published && article.published.trim() !== "" ? weights.published : 0;

    return {
      highImpact,
      commodities,
      source,
      length,
      published,
      total: highImpact + commodities + source + length + published,
    };
  }

  score(article: Article): number {
    return this.breakdown(article).total;
  }
}

export function normalizeCap(cap: number): number {
  if (!Number.isFinite(cap) || cap <= 0) return 0;
  return Math.floor(cap);
}

/**
 * Rank articles by importance. Never throws; equal scores keep input order.
 */
export function rankByImportance<T extends Article>(
  articles: readonly T[],
  scorer: ImportanceScorer,
  cap: number
): Array<T & RankedArticle> {
  const limit = normalizeCap(cap);
  if (articles.length === 0 || limit === 0) {
    return [];
  }

  // Array.prototype.sort is stable, so ties stay in input order
  const scored = articles
    .map((article) => ({ article, score: scorer.score(article) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);

  logger.debug(`Ranked ${articles.length} articles, kept ${scored.length}`, {
    scores: scored.map((s) => s.score),
  });

  return scored.map(({ article, score }, idx) => ({
    ...article,
    importanceScore: score,
    rankPosition: idx + 1,
  }));
}

/**
 * Digest pipeline configuration
 * Caps, thresholds and scoring weights consumed by the ranking and formatting stages
 */

import { ConfigError } from "../lib/errors";
import { Lexicon } from "./lexicon";

export interface SourceCredibility {
  match: string; // Case-insensitive substring of Article.source
  bonus: number;
}

export interface ScoringWeights {
  highImpactTitle: number;
  highImpactSummary: number;
  commodityTitle: number;
  commoditySummary: number;
  substantiveSummary: number;
  substantiveSummaryLength: number; // Summary must be longer than this
  published: number;
}

export interface RelevanceThresholds {
  minKeywordMatches: number; // Across title + summary
  minTitleMatches: number;
}

export interface DigestSettings {
  maxArticles: number; // Ranker cap
  topNewsLimit: number; // Entries rendered in the "top news" section
  minSummaryLength: number; // Shortest AI summary that is shown
  summaryTimeoutMs: number;
  titleMaxLength: number;
  includeSourceLinks: boolean;
  dedupe: boolean;
  timeZone: string;
  relevance: RelevanceThresholds;
  weights: ScoringWeights;
  sourceCredibility: SourceCredibility[]; // First match wins
}

export const SOURCE_CREDIBILITY: SourceCredibility[] = [
  { match: "fastmarkets", bonus: 5 },
  { match: "apk", bonus: 4 },
  { match: "margin", bonus: 4 },
  { match: "eldala", bonus: 3 },
  { match: "amis", bonus: 3 },
];

export const DEFAULT_DIGEST_SETTINGS: DigestSettings = {
  maxArticles: 8,
  topNewsLimit: 8,
  minSummaryLength: 20,
  summaryTimeoutMs: 15_000,
  titleMaxLength: 80,
  includeSourceLinks: true,
  dedupe: true,
  timeZone: "UTC",
  relevance: {
    minKeywordMatches: 2,
    minTitleMatches: 1,
  },
  weights: {
    highImpactTitle: 3,
    highImpactSummary: 2,
    commodityTitle: 2,
    commoditySummary: 1,
    substantiveSummary: 1,
    substantiveSummaryLength: 100,
    published: 1,
  },
  sourceCredibility: SOURCE_CREDIBILITY,
};

/**
 * Startup validation. The pipeline itself tolerates degenerate values,
 * so this is only called by entry points.
 */
export function validateDigestSettings(settings: DigestSettings, lexicon: Lexicon): void {
  const issues: string[] = [];

  if (settings.maxArticles <= 0) issues.push("maxArticles must be positive");
  if (settings.topNewsLimit <= 0) issues.push("topNewsLimit must be positive");
  if (settings.summaryTimeoutMs <= 0) issues.push("summaryTimeoutMs must be positive");
  if (settings.titleMaxLength < 4) issues.push("titleMaxLength must be at least 4");

  if (lexicon.relevance.length === 0) issues.push("relevance keyword list is empty");
  if (lexicon.highImpact.length === 0) issues.push("high-impact keyword list is empty");
  if (lexicon.commodities.length === 0) issues.push("commodity keyword list is empty");
  if (lexicon.categories.length === 0) issues.push("category list is empty");

  for (const category of lexicon.categories) {
    if (category.keywords.length === 0) {
      issues.push(`category "${category.id}" has no keywords`);
    }
  }

  const ids = lexicon.categories.map((c) => c.id).concat(lexicon.fallbackCategory.id);
  if (new Set(ids).size !== ids.length) {
    issues.push("category ids must be unique");
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}

/**
 * Core data models for the Agriculture Market Digest
 */

export type Language = "ru" | "en";

/**
 * A raw news item as produced by the source fetcher.
 * Only title, summary and source are guaranteed; any of them may be empty.
 */
export interface Article {
  title: string;
  summary: string;
  source: string;
  link?: string;
  published?: string; // Free text, only presence matters
}

export interface RankedArticle extends Article {
  importanceScore: number;
  rankPosition: number; // 1-based
}

export interface CategorizedArticle extends RankedArticle {
  category: string;
}

export interface DigestEntry extends CategorizedArticle {
  aiSummary?: string;
}

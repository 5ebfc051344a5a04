/**
 * Relevance filter
 * Keeps articles that belong to the agriculture domain
 */

import { Article } from "../model";
import { RelevanceThresholds } from "../../config/digest";
import { KeywordSet } from "./keywords";
import { logger } from "../logger";

export class RelevanceFilter {
  private readonly keywords: KeywordSet;

  constructor(
    keywords: readonly string[],
    private readonly thresholds: RelevanceThresholds
  ) {
    this.keywords = new KeywordSet(keywords);
  }

  /**
   * A title hit is a stronger signal than a body hit, so it needs fewer matches
   */
  isRelevant(article: Article): boolean {
    const title = article.title ?? "";
    const summary = article.summary ?? "";

    const combinedMatches = this.keywords.count(`${title} ${summary}`);
    if (combinedMatches > 0 && combinedMatches >= this.thresholds.minKeywordMatches) {
      return true;
    }

    const titleMatches = this.keywords.count(title);
    return titleMatches > 0 && titleMatches >= this.thresholds.minTitleMatches;
  }

  filter<T extends Article>(articles: readonly T[]): T[] {
    const relevant = articles.filter((article) => this.isRelevant(article));
    logger.info(`Filtered ${relevant.length} relevant articles from ${articles.length} total`);
    return relevant;
  }
}

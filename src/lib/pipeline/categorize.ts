/**
 * Categorization pipeline
 * Assigns each article to the first matching topic in priority order
 */

import { Article } from "../model";
import { CategoryDefinition } from "../../config/lexicon";
import { KeywordSet } from "./keywords";
import { logger } from "../logger";

export interface CategoryLabel {
  id: string;
  label: string;
}

export class Categorizer {
  private readonly categories: Array<CategoryLabel & { keywords: KeywordSet }>;

  constructor(
    categories: readonly CategoryDefinition[],
    private readonly fallback: CategoryLabel
  ) {
    this.categories = categories.map((c) => ({
      id: c.id,
      label: c.label,
      keywords: new KeywordSet(c.keywords),
    }));
  }

  /**
   * Labels in priority order, catch-all last
   */
  labels(): string[] {
    return [...this.categories.map((c) => c.label), this.fallback.label];
  }

  categoryOf(article: Article): string {
    const text = `${article.title ?? ""} ${article.summary ?? ""}`;
    const match = this.categories.find((c) => c.keywords.matchesAny(text));
    return match ? match.label : this.fallback.label;
  }

  /**
   * Partition articles into buckets keyed by label.
   * Map iteration follows category priority; empty buckets are omitted.
   */
  categorize<T extends Article>(articles: readonly T[]): Map<string, Array<T & { category: string }>> {
    const buckets = new Map<string, Array<T & { category: string }>>();
    for (const label of this.labels()) {
      buckets.set(label, []);
    }

    for (const article of articles) {
      const category = this.categoryOf(article);
      buckets.get(category)?.push({ ...article, category });
    }

    for (const [label, members] of buckets) {
      if (members.length === 0) {
        buckets.delete(label);
      }
    }

    logger.debug("Categorized articles", {
      buckets: Object.fromEntries([...buckets].map(([label, members]) => [label, members.length])),
    });
    return buckets;
  }
}

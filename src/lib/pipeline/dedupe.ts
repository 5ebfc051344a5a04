/**
 * Deduplication
 * Drops repeats of the same story picked up from several sources
 */

import { Article } from "../model";
import { logger } from "../logger";

function urlKey(link: string | undefined): string | null {
  if (!link) return null;
  try {
    const url = new URL(link);
    const path = url.pathname.replace(/\/+$/, "");
    return `${url.hostname.toLowerCase().replace(/^www\./, "")}${path.toLowerCase()}`;
  } catch {
    return null;
  }
}

export function titleKey(title: string | undefined): string | null {
  if (!title) return null;
  const key = title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
  return key.length > 0 ? key : null;
}

/**
 * First occurrence wins; order is otherwise preserved
 */
export function deduplicateArticles<T extends Article>(articles: readonly T[]): T[] {
  const seenUrls = new Set<string>();
  const seenTitles = new Set<string>();
  const deduped: T[] = [];

  for (const article of articles) {
    const byUrl = urlKey(article.link);
    const byTitle = titleKey(article.title);

    if ((byUrl && seenUrls.has(byUrl)) || (byTitle && seenTitles.has(byTitle))) {
      logger.debug(`Deduplicating: "${article.title}" from ${article.source}`);
      continue;
    }

    if (byUrl) seenUrls.add(byUrl);
    if (byTitle) seenTitles.add(byTitle);
    deduped.push(article);
  }

  if (deduped.length < articles.length) {
    logger.info(`Deduplicated ${articles.length} articles → ${deduped.length}`);
  }
  return deduped;
}

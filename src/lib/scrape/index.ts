/**
 * Aggregates all configured news sources into one article list
 */

import { Article } from "../model";
import { NewsSource } from "../../config/sources";
import { ArticleSource } from "../pipeline/digest";
import { DigestAbortedError } from "../errors";
import { createLogger } from "../logger";
import { sleep } from "../backoff";
import { fetchText, HttpOptions, SCRAPING_CONFIG } from "./http";
import { PageFetcher, scrapeHtmlSource } from "./html";
import { readRssSource } from "./rss";
import { readTelegramChannel } from "./telegramChannel";

const log = createLogger("scrape");

export interface NewsScraperOptions {
  http?: HttpOptions;
  fetchPage?: PageFetcher;
  delayBetweenSourcesMs?: number;
  maxArticlesPerSource?: number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class NewsScraper implements ArticleSource {
  private readonly fetchPage: PageFetcher;
  private readonly delayMs: number;
  private readonly limit: number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly sources: readonly NewsSource[],
    options: NewsScraperOptions = {}
  ) {
    const http = options.http ?? SCRAPING_CONFIG;
    this.fetchPage = options.fetchPage ?? ((url, signal) => fetchText(url, http, signal));
    this.delayMs = options.delayBetweenSourcesMs ?? SCRAPING_CONFIG.delayBetweenSourcesMs;
    this.limit = options.maxArticlesPerSource ?? SCRAPING_CONFIG.maxArticlesPerSource;
    this.wait = options.wait ?? sleep;
  }

  async fetchSource(source: NewsSource, signal?: AbortSignal): Promise<Article[]> {
    switch (source.type) {
      case "scrape":
        return scrapeHtmlSource(source, this.fetchPage, this.limit, signal);
      case "rss":
        return readRssSource(source, this.fetchPage, this.limit, signal);
      case "telegram":
        return readTelegramChannel(source, this.fetchPage, signal);
    }
  }

  /**
   * Sources are read one after another; a failing source contributes nothing
   */
  async fetchAll(signal?: AbortSignal): Promise<Article[]> {
    const articles: Article[] = [];

    for (const [index, source] of this.sources.entries()) {
      if (signal?.aborted) throw new DigestAbortedError("fetching");

      try {
        const found = await this.fetchSource(source, signal);
        log.info(`Fetched ${found.length} articles from ${source.name}`);
        articles.push(...found);
      } catch (error) {
        if (signal?.aborted) throw new DigestAbortedError("fetching");
        log.error(`Failed to fetch ${source.name}`, error);
      }

      if (index < this.sources.length - 1 && this.delayMs > 0) {
        try {
          await this.wait(this.delayMs, signal);
        } catch (error) {
          if (signal?.aborted) throw new DigestAbortedError("fetching");
          throw error;
        }
      }
    }

    log.info(`Total articles fetched: ${articles.length}`);
    return articles;
  }
}


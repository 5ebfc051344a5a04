/**
 * Digest generation pipeline
 * fetch → dedupe → filter → rank → format, one independent run per call
 */

import { Article, RankedArticle } from "../model";
import { DigestSettings } from "../../config/digest";
import { Messages } from "../../config/messages";
import { DigestAbortedError } from "../errors";
import { deduplicateArticles } from "./dedupe";
import { RelevanceFilter } from "./filter";
import { DigestFormatter } from "./format";
import { HeuristicRanker, RankingOutcome, RankingStrategy, rankWithStrategies } from "./strategies";
import { logger } from "../logger";

export interface ArticleSource {
  fetchAll(signal?: AbortSignal): Promise<Article[]>;
}

export type DigestOutcome =
  | { status: "no-articles" }
  | { status: "no-relevant"; fetched: number }
  | { status: "ready"; text: string; articles: RankedArticle[]; strategy: string };

export interface DigestServiceDeps {
  source: ArticleSource;
  filter: RelevanceFilter;
  strategies: readonly RankingStrategy[];
  heuristic: HeuristicRanker;
  formatter: DigestFormatter;
  settings: DigestSettings;
}

function ensureActive(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new DigestAbortedError(stage);
  }
}

export class DigestService {
  constructor(private readonly deps: DigestServiceDeps) {}

  /**
   * Resolves with a complete outcome or rejects; never yields partial text
   */
  async generate(options: { signal?: AbortSignal } = {}): Promise<DigestOutcome> {
    const { signal } = options;
    const { source, filter, strategies, heuristic, formatter, settings } = this.deps;
    const startedAt = Date.now();

    logger.info("Starting digest generation...");

    const fetched = await source.fetchAll(signal);
    ensureActive(signal, "fetching");
    if (fetched.length === 0) {
      logger.warn("No articles fetched from any source");
      return { status: "no-articles" };
    }

    const unique = settings.dedupe ? deduplicateArticles(fetched) : fetched;
    const relevant = filter.filter(unique);
    if (relevant.length === 0) {
      return { status: "no-relevant", fetched: fetched.length };
    }

    let ranking: RankingOutcome;
    try {
      ranking = await rankWithStrategies(relevant, strategies, heuristic, {
        cap: settings.maxArticles,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw new DigestAbortedError("ranking");
      throw error;
    }
    ensureActive(signal, "ranking");

    if (ranking.articles.length === 0) {
      return { status: "no-relevant", fetched: fetched.length };
    }

    const text = await formatter.format(ranking.articles, signal);
    ensureActive(signal, "formatting");

    logger.info(`Generated digest with ${ranking.articles.length} articles`, {
      fetched: fetched.length,
      relevant: relevant.length,
      strategy: ranking.strategy,
      durationMs: Date.now() - startedAt,
    });

    return { status: "ready", text, articles: ranking.articles, strategy: ranking.strategy };
  }
}

/**
 * User-facing text for an outcome
 */
export function outcomeMessage(outcome: DigestOutcome, messages: Messages): string {
  switch (outcome.status) {
    case "no-articles":
      return messages.noArticles;
    case "no-relevant":
      return messages.noRelevant;
    case "ready":
      return outcome.text;
  }
}

/**
 * Ranking strategies
 * Ordered list of named rankers; the local heuristic is always the last resort
 */

import { Article, RankedArticle } from "../model";
import { errorMessage } from "../errors";
import { ImportanceScorer, rankByImportance } from "./rank";
import { logger } from "../logger";

export interface RankOptions {
  cap: number;
  signal?: AbortSignal;
}

export type StrategyResult =
  | { ok: true; articles: RankedArticle[] }
  | { ok: false; error: string };

export interface RankingStrategy {
  readonly name: string;
  rank(articles: readonly Article[], options: RankOptions): Promise<StrategyResult>;
}

export interface RankingOutcome {
  articles: RankedArticle[];
  strategy: string;
  failures: Array<{ strategy: string; error: string }>;
}

export const HEURISTIC_STRATEGY = "heuristic";

export class HeuristicRanker implements RankingStrategy {
  readonly name = HEURISTIC_STRATEGY;

  constructor(private readonly scorer: ImportanceScorer) {}

  async rank(articles: readonly Article[], options: RankOptions): Promise<StrategyResult> {
    return { ok: true, articles: rankByImportance(articles, this.scorer, options.cap) };
  }

  rankSync(articles: readonly Article[], cap: number): RankedArticle[] {
    return rankByImportance(articles, this.scorer, cap);
  }
}

/**
 * Try each strategy in order and return the first success.
 * Throws only if the signal is aborted.
 */
export async function rankWithStrategies(
  articles: readonly Article[],
  strategies: readonly RankingStrategy[],
  fallback: HeuristicRanker,
  options: RankOptions
): Promise<RankingOutcome> {
  const chain = strategies.some((s) => s.name === fallback.name)
    ? strategies
    : [...strategies, fallback];
  const failures: RankingOutcome["failures"] = [];

  for (const strategy of chain) {
    options.signal?.throwIfAborted();

    let result: StrategyResult;
    try {
      result = await strategy.rank(articles, options);
    } catch (error) {
      result = { ok: false, error: errorMessage(error) };
    }

    if (result.ok) {
      logger.info(`Ranking produced by "${strategy.name}" strategy`, {
        input: articles.length,
        output: result.articles.length,
        failed: failures.map((f) => f.strategy),
      });
      return { articles: result.articles, strategy: strategy.name, failures };
    }

    logger.warn(`Ranking strategy "${strategy.name}" failed: ${result.error}`);
    failures.push({ strategy: strategy.name, error: result.error });
  }

  // Only reachable when the chain's own heuristic entry is a different instance that failed
  logger.warn("All ranking strategies failed, using local heuristic");
  return {
    articles: fallback.rankSync(articles, options.cap),
    strategy: fallback.name,
    failures,
  };
}

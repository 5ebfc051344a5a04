/**
 * LLM-based ranking strategy
 * Asks the model to order articles by market importance and maps indices back to articles
 */

import { z } from "zod";
import { Article, Language, RankedArticle } from "../model";
import { CompletionClient } from "../llm/client";
import { errorMessage } from "../errors";
import { ImportanceScorer, normalizeCap } from "./rank";
import { RankOptions, RankingStrategy, StrategyResult } from "./strategies";
import { logger } from "../logger";

const MAX_SUMMARY_CHARS = 500;

const rankingResponseSchema = z.object({
  ranked_articles: z.array(z.number().int()),
  reasoning: z.string().optional(),
});

const SYSTEM_PROMPT: Record<Language, string> = {
  ru: "Ты - эксперт по сельскохозяйственным рынкам. Отвечай только JSON.",
  en: "You are an expert agriculture market analyst. Respond with JSON only.",
};

/**
 * Create ranking prompt for a batch of articles
 */
export function createRankingPrompt(articles: readonly Article[], language: Language): string {
  const articleTexts = articles
    .map((article, idx) => {
      const summary = (article.summary ?? "").slice(0, MAX_SUMMARY_CHARS) || "N/A";
      return `[${idx}] Title: ${article.title || "N/A"}
Source: ${article.source || "N/A"}
Summary: ${summary}`;
    })
    .join("\n\n---\n\n");

  if (language === "ru") {
    return `Проанализируй следующие статьи и ранжируй их по важности для рынка.

${articleTexts}

Критерии важности:
1. Влияние на цены товаров
2. Значимость для торговли
3. Региональная важность
4. Временная актуальность
5. Источник и достоверность

Верни JSON: {"ranked_articles": [индексы статей из квадратных скобок в порядке важности], "reasoning": "краткое объяснение"}`;
  }

  return `Analyze these articles and rank them by market importance.

${articleTexts}

Importance criteria:
1. Impact on commodity prices
2. Trade significance
3. Regional importance
4. Timeliness
5. Source credibility

Return JSON: {"ranked_articles": [article indices from the square brackets, most important first], "reasoning": "brief explanation"}`;
}

/**
 * Parse the model response into ordered article indices.
 * Out-of-range and repeated indices are dropped.
 */
export function parseRankingResponse(response: string, articleCount: number): number[] | null {
  // The model may wrap the JSON in markdown fences
  const jsonMatch = response.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }

  const parsed = rankingResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const seen = new Set<number>();
  const indices: number[] = [];
  for (const idx of parsed.data.ranked_articles) {
    if (idx >= 0 && idx < articleCount && !seen.has(idx)) {
      seen.add(idx);
      indices.push(idx);
    }
  }
  return indices;
}

export class LlmRanker implements RankingStrategy {
  readonly name = "openai";

  constructor(
    private readonly client: CompletionClient,
    private readonly scorer: ImportanceScorer,
    private readonly language: Language
  ) {}

  async rank(articles: readonly Article[], options: RankOptions): Promise<StrategyResult> {
    const limit = normalizeCap(options.cap);
    if (articles.length === 0 || limit === 0) {
      return { ok: true, articles: [] };
    }

    let response: string;
    try {
      response = await this.client.complete({
        system: SYSTEM_PROMPT[this.language],
        prompt: createRankingPrompt(articles, this.language),
        maxTokens: 800,
        json: true,
        signal: options.signal,
      });
    } catch (error) {
      return { ok: false, error: `completion failed: ${errorMessage(error)}` };
    }

    const indices = parseRankingResponse(response, articles.length);
    if (indices === null) {
      logger.debug("Unparseable ranking response", { response: response.slice(0, 200) });
      return { ok: false, error: "unparseable ranking response" };
    }
    if (indices.length === 0) {
      return { ok: false, error: "ranking response contained no valid article indices" };
    }

    const ranked: RankedArticle[] = indices.slice(0, limit).map((idx, position) => ({
      ...articles[idx],
      importanceScore: this.scorer.score(articles[idx]),
      rankPosition: position + 1,
    }));

    logger.info(`${this.client.model} ranked ${ranked.length} articles from ${articles.length} total`);
    return { ok: true, articles: ranked };
  }
}

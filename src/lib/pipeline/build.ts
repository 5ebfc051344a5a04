/**
 * Wires the pipeline stages for one language and settings combination
 */

import { Language } from "../model";
import { DigestSettings, validateDigestSettings } from "../../config/digest";
import { AppConfig } from "../../config/env";
import { NEWS_SOURCES } from "../../config/sources";
import { Lexicon, loadLexicon } from "../../config/lexicon";
import { MESSAGES } from "../../config/messages";
import { CompletionClient, createCompletionClient } from "../llm/client";
import { NewsScraper } from "../scrape";
import { logger } from "../logger";
import { Categorizer } from "./categorize";
import { ArticleSource, DigestService } from "./digest";
import { RelevanceFilter } from "./filter";
import { DigestFormatter } from "./format";
import { LlmRanker } from "./llmRank";
import { ImportanceScorer } from "./rank";
import { HeuristicRanker, RankingStrategy } from "./strategies";
import { LlmSummarizer, Summarizer } from "./summarize";

export interface PipelineOptions {
  language: Language;
  settings: DigestSettings;
  source: ArticleSource;
  completion: CompletionClient | null; // null disables LLM ranking and summaries
  lexicon?: Lexicon;
  summarizer?: Summarizer | null; // Overrides the LLM summarizer
  now?: () => Date;
}

export interface Pipeline {
  service: DigestService;
  filter: RelevanceFilter;
  scorer: ImportanceScorer;
  categorizer: Categorizer;
  formatter: DigestFormatter;
  strategies: RankingStrategy[];
}

export function buildPipeline(options: PipelineOptions): Pipeline {
  const { language, settings, completion } = options;
  const lexicon = options.lexicon ?? loadLexicon(language);

  const filter = new RelevanceFilter(lexicon.relevance, settings.relevance);
  const scorer = new ImportanceScorer({
    highImpact: lexicon.highImpact,
    commodities: lexicon.commodities,
    weights: settings.weights,
    sourceCredibility: settings.sourceCredibility,
  });
  const heuristic = new HeuristicRanker(scorer);
  const categorizer = new Categorizer(lexicon.categories, lexicon.fallbackCategory);

  const strategies: RankingStrategy[] = completion
    ? [new LlmRanker(completion, scorer, language), heuristic]
    : [heuristic];

  const summarizer =
    options.summarizer !== undefined
      ? options.summarizer
      : completion
        ? new LlmSummarizer(completion, language)
        : null;

  const formatter = new DigestFormatter({
    language,
    settings,
    messages: MESSAGES[language],
    categorizer,
    themes: lexicon.themes,
    defaultTheme: lexicon.defaultTheme,
    summarizer,
    now: options.now,
  });

  const service = new DigestService({
    source: options.source,
    filter,
    strategies,
    heuristic,
    formatter,
    settings,
  });

  return { service, filter, scorer, categorizer, formatter, strategies };
}

/**
 * Pipeline over the configured news sources, validated against the lexicon
 */
export function buildPipelineFromConfig(config: AppConfig): Pipeline {
  const lexicon = loadLexicon(config.language);
  validateDigestSettings(config.digest, lexicon);

  const completion = config.openai.enabled ? createCompletionClient(config.openai.apiKey, config.openai.model) : null;
  logger.info(
    completion
      ? `LLM ranking and summaries enabled (${completion.model})`
      : "LLM disabled, using heuristic ranking without summaries"
  );

  return buildPipeline({
    language: config.language,
    settings: config.digest,
    source: new NewsScraper(NEWS_SOURCES),
    completion,
    lexicon,
  });
}

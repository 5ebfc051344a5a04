/**
 * Digest formatting
 * Renders ranked articles, topic buckets, market themes and optional AI summaries as Telegram Markdown
 */

import { Article, DigestEntry, Language } from "../model";
import { DigestSettings } from "../../config/digest";
import { ThemeDefinition } from "../../config/lexicon";
import { Messages } from "../../config/messages";
import { DigestAbortedError } from "../errors";
import { Categorizer } from "./categorize";
import { KeywordSet } from "./keywords";
import { Summarizer, summarizeWithTimeout } from "./summarize";
import { logger } from "../logger";

const MAX_THEMES = 3;

export interface FormatterDeps {
  language: Language;
  settings: DigestSettings;
  messages: Messages;
  categorizer: Categorizer;
  themes: readonly ThemeDefinition[];
  defaultTheme: string;
  summarizer: Summarizer | null;
  now?: () => Date;
}

/**
 * Strip characters that Telegram's legacy Markdown treats as markup
 */
export function sanitizeMarkdown(text: string): string {
  return text.replace(/[*_`[\]]/g, "").replace(/\s+/g, " ").trim();
}

export function truncateTitle(title: string, maxLength: number): string {
  if (title.length <= maxLength) {
    return title;
  }
  return `${title.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function formatDigestDate(date: Date, language: Language, timeZone: string): string {
  if (language === "ru") {
    return new Intl.DateTimeFormat("ru-RU", {
      day: "2-digit",
      month: "2-digit",
      year: "numeric",
      timeZone,
    }).format(date);
  }
  return new Intl.DateTimeFormat("en-US", {
    month: "long",
    day: "numeric",
    year: "numeric",
    timeZone,
  }).format(date);
}

export class DigestFormatter {
  private readonly themes: Array<{ headline: string; keywords: KeywordSet }>;
  private readonly now: () => Date;

  constructor(private readonly deps: FormatterDeps) {
    this.themes = deps.themes.map((t) => ({ headline: t.headline, keywords: new KeywordSet(t.keywords) }));
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Theme headlines present in any article, in configured order
   */
  detectThemes(articles: readonly Article[]): string[] {
    const texts = articles.map((a) => `${a.title ?? ""} ${a.summary ?? ""}`);
    const present = this.themes
      .filter((theme) => texts.some((text) => theme.keywords.matchesAny(text)))
      .map((theme) => theme.headline);
    return present.length > 0 ? present.slice(0, MAX_THEMES) : [this.deps.defaultTheme];
  }

  private async summaryFor(article: Article, signal?: AbortSignal): Promise<string | undefined> {
    const { summarizer, settings } = this.deps;
    if (!summarizer) {
      return undefined;
    }

    const result = await summarizeWithTimeout(
      summarizer,
      { title: article.title ?? "", body: article.summary ?? "" },
      settings.summaryTimeoutMs,
      signal
    );

    if (!result.ok) {
      logger.warn(`No AI summary for "${article.title}": ${result.reason}`);
      return undefined;
    }

    const text = sanitizeMarkdown(result.text);
    if (text.length < settings.minSummaryLength) {
      logger.warn(`Discarding AI summary for "${article.title}": ${text.length} chars`);
      return undefined;
    }
    return text;
  }

  private async buildEntries(articles: readonly Article[], signal?: AbortSignal): Promise<DigestEntry[]> {
    const limit = Math.max(0, Math.floor(this.deps.settings.topNewsLimit));
    const top = articles.slice(0, limit);
    const entries: DigestEntry[] = [];

    // One external call at a time, so a slow service only delays its own entry
    for (const [idx, article] of top.entries()) {
      if (signal?.aborted) {
        throw new DigestAbortedError("formatting");
      }
      const aiSummary = await this.summaryFor(article, signal);
      entries.push({
        ...article,
        importanceScore: "importanceScore" in article && typeof article.importanceScore === "number" ? article.importanceScore : 0,
        rankPosition: idx + 1,
        category: this.deps.categorizer.categoryOf(article),
        aiSummary,
      });
    }

    if (signal?.aborted) {
      throw new DigestAbortedError("formatting");
    }
    return entries;
  }

  private renderEntry(entry: DigestEntry): string[] {
    const { messages, settings } = this.deps;
    const title = truncateTitle(sanitizeMarkdown(entry.title ?? "") || messages.untitled, settings.titleMaxLength);
    const lines = [`**${entry.rankPosition}. ${title}**`];

    const source = sanitizeMarkdown(entry.source ?? "");
    if (source) {
      lines.push(`📰 ${messages.sourceLabel}: ${source}`);
    }
    if (entry.aiSummary) {
      lines.push(entry.aiSummary);
    }
    if (settings.includeSourceLinks && entry.link) {
      lines.push(`🔗 [${messages.readMore}](${entry.link})`);
    }
    return lines;
  }

  /**
   * Render the full digest. Rejects with DigestAbortedError instead of returning partial text.
   */
  async format(articles: readonly Article[], signal?: AbortSignal): Promise<string> {
    const { messages, language, settings } = this.deps;

    const entries = await this.buildEntries(articles, signal);

    const sourceCount = new Set(articles.map((a) => (a.source ?? "").trim()).filter((s) => s.length > 0)).size;
    const date = formatDigestDate(this.now(), language, settings.timeZone);

    const lines: string[] = [
      `${messages.digestTitle} - ${date}`,
      "",
      `📊 **${articles.length} ${messages.articlesLabel}** ${messages.fromLabel} ${sourceCount} ${messages.sourcesLabel}`,
      "",
      messages.keyDevelopments,
      ...this.detectThemes(articles).map((headline) => `• ${headline}`),
      "",
    ];

    const buckets = this.deps.categorizer.categorize(articles);
    if (buckets.size > 0) {
      lines.push(messages.byTopic);
      for (const [label, members] of buckets) {
        lines.push(`• ${label}: ${members.length}`);
      }
      lines.push("");
    }

    if (entries.length > 0) {
      lines.push(messages.topNews, "");
      for (const entry of entries) {
        lines.push(...this.renderEntry(entry), "");
      }
    }

    lines.push("---", messages.footerSignature, messages.footerSchedule);

    const summarized = entries.filter((e) => e.aiSummary).length;
    logger.info(`Formatted digest with ${entries.length} entries (${summarized} AI summaries)`);
    return lines.join("\n");
  }
}

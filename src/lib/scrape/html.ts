/**
 * HTML listing scraper (cheerio)
 * Collects article links from a listing page, then optionally follows each
 * link for the first paragraphs of the article body.
 */

import * as cheerio from "cheerio";
import { Article } from "../model";
import { HtmlSource } from "../../config/sources";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("scrape:html");

export type PageFetcher = (url: string, signal?: AbortSignal) => Promise<string>;

const DEFAULT_HEADING_SELECTOR = "h1, h2, h3, h4, .title, .headline, .article-title, .news-title";

const ITEM_CONTAINER_SELECTOR = "article, li, div, section";

const CONTENT_SELECTORS = [
  ".article-content",
  ".post-content",
  ".entry-content",
  ".content",
  "article",
  ".news-content",
  ".story-body",
  "main",
];

const MIN_TITLE_LENGTH = 5;
const MIN_LINK_TEXT_LENGTH = 10;
const MIN_PARAGRAPH_LENGTH = 20;
const MIN_BLOCK_LENGTH = 50;
const MAX_CONTENT_LENGTH = 500;

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export interface ListingItem {
  title: string;
  link: string;
  summary: string;
}

/**
 * Extract up to `limit` distinct article links from a listing page
 */
export function parseListing(html: string, source: HtmlSource, limit: number): ListingItem[] {
  const $ = cheerio.load(html);
  const items: ListingItem[] = [];
  const seen = new Set<string>();

  for (const element of $(source.selectors.link).toArray()) {
    if (items.length >= limit) break;

    const $link = $(element);
    const href = $link.attr("href");
    if (!href) continue;

    let link: string;
    try {
      link = new URL(href, source.url).toString();
    } catch {
      log.debug(`Skipping malformed link ${href}`);
      continue;
    }
    if (seen.has(link)) continue;

    let title = cleanText($link.text());
    const headingSelector = source.selectors.title ?? DEFAULT_HEADING_SELECTOR;

    // Short link text: look for a heading in the surrounding markup
    let $parent = $link.parent();
    for (let level = 0; level < 3 && $parent.length > 0 && title.length < MIN_LINK_TEXT_LENGTH; level++) {
      const heading = cleanText($parent.find(headingSelector).first().text());
      if (heading.length > MIN_TITLE_LENGTH) {
        title = heading;
      }
      $parent = $parent.parent();
    }

    const summary =
      $link
        .closest(ITEM_CONTAINER_SELECTOR)
        .find(source.selectors.summary)
        .toArray()
        .map((node) => cleanText($(node).text()))
        .find((text) => text.length > MIN_PARAGRAPH_LENGTH && text !== title) ?? "";

    if (title.length <= MIN_TITLE_LENGTH) continue;

    seen.add(link);
    items.push({ title, link, summary: clip(summary, MAX_CONTENT_LENGTH) });
  }

  return items;
}

/**
 * First meaningful paragraphs of an article page, or "" when none are found
 */
export function extractArticleContent(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, nav, header, footer").remove();

  for (const selector of CONTENT_SELECTORS) {
    const $container = $(selector).first();
    if ($container.length === 0) continue;

    const paragraphs = $container
      .find("p")
      .toArray()
      .map((node) => cleanText($(node).text()))
      .filter((text) => text.length > MIN_PARAGRAPH_LENGTH);

    if (paragraphs.length > 0) {
      return clip(paragraphs.slice(0, 3).join(" "), MAX_CONTENT_LENGTH);
    }

    const block = cleanText($container.text());
    if (block.length > MIN_BLOCK_LENGTH) {
      return clip(block, MAX_CONTENT_LENGTH);
    }
  }

  return "";
}

export async function scrapeHtmlSource(
  source: HtmlSource,
  fetchPage: PageFetcher,
  limit: number,
  signal?: AbortSignal
): Promise<Article[]> {
  const listing = parseListing(await fetchPage(source.url, signal), source, limit);
  const followLinks = source.fetchFullContent ?? true;
  const articles: Article[] = [];

  for (const item of listing) {
    let summary = item.summary;

    if (followLinks) {
      try {
        const content = extractArticleContent(await fetchPage(item.link, signal));
        if (content) summary = content;
      } catch (error) {
        signal?.throwIfAborted();
        log.warn(`Could not load article body from ${item.link}: ${errorMessage(error)}`);
      }
    }

    articles.push({
      title: item.title,
      summary,
      source: source.name,
      link: item.link,
      published: "",
    });
  }

  return articles;
}

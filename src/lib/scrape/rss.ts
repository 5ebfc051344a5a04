/**
 * RSS feed reader (rss-parser)
 */

import Parser from "rss-parser";
import { Article } from "../model";
import { RssSource } from "../../config/sources";
import { cleanText, PageFetcher } from "./html";

const MAX_SUMMARY_LENGTH = 500;

const parser = new Parser();

export async function parseFeed(xml: string, sourceName: string, limit: number): Promise<Article[]> {
  const feed = await parser.parseString(xml);

  return feed.items.slice(0, limit).flatMap((item) => {
    const title = cleanText(item.title ?? "");
    if (!title) return [];

    const raw = item.contentSnippet ?? item.content ?? "";
    const summary = cleanText(raw);

    return [
      {
        title,
        summary: summary.length > MAX_SUMMARY_LENGTH ? `${summary.slice(0, MAX_SUMMARY_LENGTH)}...` : summary,
        source: sourceName,
        link: item.link,
        published: item.isoDate ?? item.pubDate ?? "",
      },
    ];
  });
}

export async function readRssSource(
  source: RssSource,
  fetchPage: PageFetcher,
  limit: number,
  signal?: AbortSignal
): Promise<Article[]> {
  const xml = await fetchPage(source.rssUrl ?? source.url, signal);
  return parseFeed(xml, source.name, limit);
}

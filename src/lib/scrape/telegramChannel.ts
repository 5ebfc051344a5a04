/**
 * Public Telegram channel reader via the t.me/s/<channel> preview page
 */

import * as cheerio from "cheerio";
import { Article } from "../model";
import { TelegramChannelSource } from "../../config/sources";
import { cleanText, PageFetcher } from "./html";

const TITLE_LENGTH = 100;

export function channelPreviewUrl(channelUsername: string): string {
  return `https://t.me/s/${channelUsername.replace(/^@/, "")}`;
}

/**
 * Posts newest first, at most `maxPosts`
 */
export function parseChannelPage(html: string, source: TelegramChannelSource): Article[] {
  const $ = cheerio.load(html);
  const posts: Article[] = [];

  for (const element of $(".tgme_widget_message_wrap").toArray()) {
    const $post = $(element);
    const text = cleanText($post.find(".tgme_widget_message_text").first().text());
    if (!text) continue;

    posts.push({
      title: text.length > TITLE_LENGTH ? `${text.slice(0, TITLE_LENGTH)}...` : text,
      summary: text,
      source: source.name,
      link: $post.find("a.tgme_widget_message_date").first().attr("href"),
      published: $post.find("time[datetime]").first().attr("datetime") ?? "",
    });
  }

  // The preview page lists oldest first
  return posts.reverse().slice(0, source.maxPosts);
}

export async function readTelegramChannel(
  source: TelegramChannelSource,
  fetchPage: PageFetcher,
  signal?: AbortSignal
): Promise<Article[]> {
  const html = await fetchPage(channelPreviewUrl(source.channelUsername), signal);
  return parseChannelPage(html, source);
}

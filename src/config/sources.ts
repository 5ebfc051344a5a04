/**
 * News source configuration
 */

export interface HtmlSelectors {
  title?: string; // Heading lookup when the link text is too short
  link: string;
  summary: string;
}

interface BaseSource {
  name: string;
  url: string;
}

export interface HtmlSource extends BaseSource {
  type: "scrape";
  selectors: HtmlSelectors;
  fetchFullContent?: boolean; // Follow each link for the article body (default true)
}

export interface RssSource extends BaseSource {
  type: "rss";
  rssUrl?: string;
}

export interface TelegramChannelSource extends BaseSource {
  type: "telegram";
  channelUsername: string;
  maxPosts: number;
}

export type NewsSource = HtmlSource | RssSource | TelegramChannelSource;

export const NEWS_SOURCES: NewsSource[] = [
  {
    name: "Fastmarkets Agriculture",
    url: "https://www.fastmarkets.com/agriculture/grains-and-oilseeds/",
    type: "scrape",
    selectors: {
      title: "h2, h3, .article-title, .headline",
      link: 'a[href*="/news/"], a[href*="/analysis/"]',
      summary: "p, .article-summary, .excerpt",
    },
  },
  {
    name: "Margin.kz",
    url: "https://margin.kz/",
    type: "scrape",
    selectors: {
      title: "h1, h2, h3, .title, .headline",
      link: 'a[href*="/news/"], a[href*="/article/"]',
      summary: "p, .summary, .excerpt, .description",
    },
  },
  {
    name: "APK-Inform",
    url: "https://www.apk-inform.com/ru/news",
    type: "scrape",
    selectors: {
      title: "h1, h2, h3, .news-title, .article-title",
      link: 'a[href*="/news/"], a[href*="/ru/news/"]',
      summary: "p, .news-summary, .article-summary",
    },
  },
  {
    name: "APK News Kazakhstan",
    url: "https://apk-news.kz/",
    type: "scrape",
    selectors: {
      title: "h1, h2, h3, .title, .headline",
      link: 'a[href*="/news/"], a[href*="/article/"]',
      summary: "p, .summary, .excerpt",
    },
  },
  {
    name: "Eldala.kz",
    url: "https://eldala.kz/",
    type: "scrape",
    selectors: {
      title: "h1, h2, h3, .title, .headline",
      link: 'a[href*="/news/"], a[href*="/article/"]',
      summary: "p, .summary, .excerpt, .description",
    },
  },
  {
    name: "Andre Sizov Telegram",
    url: "https://t.me/andre_sizov",
    type: "telegram",
    channelUsername: "andre_sizov",
    maxPosts: 10,
  },
  {
    name: "AMIS Outlook",
    url: "https://www.amis-outlook.org/home",
    type: "scrape",
    selectors: {
      title: "h1, h2, h3, .title, .headline",
      link: 'a[href*="/news/"], a[href*="/article/"]',
      summary: "p, .summary, .excerpt, .description",
    },
  },
];

/**
 * User-facing texts per digest language
 */

import { Language } from "../lib/model";

export interface Messages {
  digestTitle: string;
  articlesLabel: string;
  fromLabel: string;
  sourcesLabel: string;
  keyDevelopments: string;
  byTopic: string;
  topNews: string;
  sourceLabel: string;
  readMore: string;
  untitled: string;
  footerSignature: string;
  footerSchedule: string;
  noArticles: string;
  noRelevant: string;
  generating: string;
  generationFailed: string;
  statusFailed: string;
  welcome: string;
  help: string;
}

export const MESSAGES: Record<Language, Messages> = {
  ru: {
    digestTitle: "🌾 Дайджест сельскохозяйственного рынка",
    articlesLabel: "статей",
    fromLabel: "из",
    sourcesLabel: "источников",
    keyDevelopments: "📈 **Ключевые события дня:**",
    byTopic: "🗂 **По темам:**",
    topNews: "📰 **Основные новости:**",
    sourceLabel: "Источник",
    readMore: "Читать полностью",
    untitled: "Без заголовка",
    footerSignature: "🤖 Создано ботом Agriculture Digest",
    footerSchedule: "📅 Обновляется ежедневно с последними новостями сельскохозяйственного рынка",
    noArticles: "📰 Сегодня не удалось получить статьи ни из одного источника.",
    noRelevant: "🌾 Сегодня новостей сельского хозяйства не найдено.",
    generating: "🔄 Формирую дайджест сельскохозяйственного рынка...",
    generationFailed: "❌ Не удалось сформировать дайджест. Попробуйте позже.",
    statusFailed: "❌ Не удалось получить статус бота",
    welcome: [
      "🌾 **Добро пожаловать в Agriculture Digest Bot!**",
      "",
      "Бот собирает ежедневные новости сельскохозяйственного рынка.",
      "",
      "**Команды:**",
      "/start - приветствие",
      "/digest - сформировать дайджест сейчас",
      "/help - справка",
      "/status - состояние бота",
    ].join("\n"),
    help: [
      "📖 **Справка Agriculture Digest Bot**",
      "",
      "1. Бот собирает новости из настроенных источников",
      "2. Отбирает и ранжирует статьи по значимости для рынка",
      "3. Группирует их по темам",
      "4. Формирует дайджест с краткими описаниями и ссылками",
      "5. Публикует дайджест в канал по расписанию",
    ].join("\n"),
  },
  en: {
    digestTitle: "🌾 Agriculture Market Digest",
    articlesLabel: "articles",
    fromLabel: "from",
    sourcesLabel: "sources",
    keyDevelopments: "📈 **Key Market Developments:**",
    byTopic: "🗂 **By Topic:**",
    topNews: "📰 **Top News:**",
    sourceLabel: "Source",
    readMore: "Read more",
    untitled: "Untitled",
    footerSignature: "🤖 Generated by Agriculture Digest Bot",
    footerSchedule: "📅 Updated daily with the latest agriculture market news",
    noArticles: "📰 No articles found from any sources today.",
    noRelevant: "🌾 No agriculture-related articles found today.",
    generating: "🔄 Generating agriculture digest...",
    generationFailed: "❌ Failed to generate digest. Please try again later.",
    statusFailed: "❌ Error retrieving bot status",
    welcome: [
      "🌾 **Welcome to Agriculture Digest Bot!**",
      "",
      "This bot provides daily agriculture market news and insights.",
      "",
      "**Available Commands:**",
      "/start - Show this welcome message",
      "/digest - Generate and send current digest",
      "/help - Show help information",
      "/status - Show bot status",
    ].join("\n"),
    help: [
      "📖 **Agriculture Digest Bot Help**",
      "",
      "1. Bot scrapes agriculture news from configured sources",
      "2. Filters and ranks articles by market relevance",
      "3. Groups articles by topic",
      "4. Generates a formatted digest with summaries and links",
      "5. Sends the digest to the channel on schedule",
    ].join("\n"),
  },
};

export interface BotStatus {
  botName: string;
  username?: string;
  botId: number;
  channelId: string;
  schedule: string;
  timeZone: string;
  maxArticles: number;
  checkedAt: string;
}

export function formatStatus(language: Language, status: BotStatus): string {
  const username = status.username ? `@${status.username}` : "-";

  if (language === "ru") {
    return [
      "🤖 **Состояние бота**",
      "",
      `• Имя: ${status.botName}`,
      `• Пользователь: ${username}`,
      `• ID: ${status.botId}`,
      `• Канал: ${status.channelId}`,
      `• Расписание: ${status.schedule} (${status.timeZone})`,
      `• Максимум статей: ${status.maxArticles}`,
      `• Проверено: ${status.checkedAt}`,
    ].join("\n");
  }

  return [
    "🤖 **Bot Status**",
    "",
    `• Name: ${status.botName}`,
    `• Username: ${username}`,
    `• ID: ${status.botId}`,
    `• Channel: ${status.channelId}`,
    `• Schedule: ${status.schedule} (${status.timeZone})`,
    `• Max Articles: ${status.maxArticles}`,
    `• Checked: ${status.checkedAt}`,
  ].join("\n");
}

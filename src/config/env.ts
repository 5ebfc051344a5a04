/**
 * Application configuration loaded from the environment
 */

import * as dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "../lib/errors";
import { Language } from "../lib/model";
import { DEFAULT_DIGEST_SETTINGS, DigestSettings } from "./digest";

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((value) => (value === undefined ? fallback : ["true", "1", "yes"].includes(value)));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const DEFAULT_CHANNEL_ID = "@agriculture_digest";

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1).optional(),
  TELEGRAM_CHANNEL_ID: z.string().trim().min(1).optional(),
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  USE_OPENAI: booleanFlag(true),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  LANGUAGE: z.enum(["ru", "en"]).default("ru"),
  DIGEST_SCHEDULE: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM")
    .default("08:00"),
  DIGEST_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, "unknown IANA time zone"),
  MAX_TOTAL_ARTICLES: positiveInt(DEFAULT_DIGEST_SETTINGS.maxArticles),
  TOP_NEWS_LIMIT: positiveInt(DEFAULT_DIGEST_SETTINGS.topNewsLimit),
  MIN_SUMMARY_LENGTH: nonNegativeInt(DEFAULT_DIGEST_SETTINGS.minSummaryLength),
  SUMMARY_TIMEOUT_MS: positiveInt(DEFAULT_DIGEST_SETTINGS.summaryTimeoutMs),
  INCLUDE_SOURCE_LINKS: booleanFlag(DEFAULT_DIGEST_SETTINGS.includeSourceLinks),
  DEDUPE_ARTICLES: booleanFlag(DEFAULT_DIGEST_SETTINGS.dedupe),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
});

export interface AppConfig {
  language: Language;
  telegram: {
    botToken?: string;
    channelId: string;
    channelConfigured: boolean; // TELEGRAM_CHANNEL_ID set rather than defaulted
  };
  openai: {
    enabled: boolean;
    apiKey?: string;
    model: string;
  };
  schedule: {
    time: string;
    timeZone: string;
  };
  digest: DigestSettings;
  port: number;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the app config from an environment record.
 * Empty strings are treated as unset.
 */
export function parseAppConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    language: e.LANGUAGE,
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      channelId: e.TELEGRAM_CHANNEL_ID ?? DEFAULT_CHANNEL_ID,
      channelConfigured: e.TELEGRAM_CHANNEL_ID !== undefined,
    },
    openai: {
      enabled: e.USE_OPENAI && e.OPENAI_API_KEY !== undefined,
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
    },
    schedule: {
      time: e.DIGEST_SCHEDULE,
      timeZone: e.DIGEST_TIMEZONE,
    },
    digest: {
      ...DEFAULT_DIGEST_SETTINGS,
      maxArticles: e.MAX_TOTAL_ARTICLES,
      topNewsLimit: e.TOP_NEWS_LIMIT,
      minSummaryLength: e.MIN_SUMMARY_LENGTH,
      summaryTimeoutMs: e.SUMMARY_TIMEOUT_MS,
      includeSourceLinks: e.INCLUDE_SOURCE_LINKS,
      dedupe: e.DEDUPE_ARTICLES,
      timeZone: e.DIGEST_TIMEZONE,
    },
    port: e.PORT,
  };
}

/**
 * Load .env / .env.local and parse process.env
 */
export function loadAppConfig(): AppConfig {
  dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
  dotenv.config();
  return parseAppConfig(process.env);
}

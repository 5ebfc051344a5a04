/**
 * Keyword lexicons per digest language
 * Word lists live in ./lexicon/<language>.json so they can be edited without touching the pipeline
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { Language } from "../lib/model";

const keywordList = z.array(z.string().trim().min(1));

const categorySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  keywords: keywordList,
});

const themeSchema = z.object({
  id: z.string().min(1),
  headline: z.string().min(1),
  keywords: keywordList,
});

export const lexiconSchema = z.object({
  relevance: keywordList,
  highImpact: keywordList,
  commodities: keywordList,
  categories: z.array(categorySchema),
  fallbackCategory: z.object({
    id: z.string().min(1),
    label: z.string().min(1),
  }),
  themes: z.array(themeSchema),
  defaultTheme: z.string().min(1),
});

export type Lexicon = z.infer<typeof lexiconSchema>;
export type CategoryDefinition = z.infer<typeof categorySchema>;
export type ThemeDefinition = z.infer<typeof themeSchema>;

const cache = new Map<Language, Lexicon>();

export function parseLexicon(raw: unknown): Lexicon {
  return lexiconSchema.parse(raw);
}

/**
 * Load and validate the lexicon for a language.
 * Parsed lexicons are immutable and cached per language.
 */
export function loadLexicon(language: Language): Lexicon {
  const cached = cache.get(language);
  if (cached) {
    return cached;
  }

  const file = fileURLToPath(new URL(`./lexicon/${language}.json`, import.meta.url));
  const lexicon = parseLexicon(JSON.parse(fs.readFileSync(file, "utf-8")));
  cache.set(language, lexicon);
  return lexicon;
}

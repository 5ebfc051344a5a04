/**
 * Keyword matching shared by the relevance, scoring and categorization stages
 *
 * Entries are words or phrases. A trailing "*" on a word matches any word
 * starting with that stem ("crop*" matches "crops", "пшениц*" matches "пшеницы").
 * Matches are case-insensitive and anchored at word boundaries.
 */

const WORD_CHAR = "[\\p{L}\\p{N}]";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileKeyword(keyword: string): RegExp | null {
  const tokens = keyword.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    return null;
  }

  const body = tokens
    .map((token) =>
      token.endsWith("*") && token.length > 1
        ? `${escapeRegExp(token.slice(0, -1))}${WORD_CHAR}*`
        : escapeRegExp(token)
    )
    .join("\\s+");

  return new RegExp(`(?<!${WORD_CHAR})${body}(?!${WORD_CHAR})`, "iu");
}

export class KeywordSet {
  private readonly entries: Array<{ keyword: string; pattern: RegExp }>;

  constructor(keywords: readonly string[]) {
    const seen = new Set<string>();
    this.entries = [];
    for (const keyword of keywords) {
      const key = keyword.trim().toLowerCase();
      if (seen.has(key)) continue;
      const pattern = compileKeyword(key);
      if (!pattern) continue;
      seen.add(key);
      this.entries.push({ keyword: key, pattern });
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Keywords that occur in the text, in list order
   */
  matched(text: string): string[] {
    if (!text) return [];
    return this.entries.filter((e) => e.pattern.test(text)).map((e) => e.keyword);
  }

  /**
   * Number of distinct keywords that occur in the text
   */
  count(text: string): number {
    return this.matched(text).length;
  }

  matchesAny(text: string): boolean {
    if (!text) return false;
    return this.entries.some((e) => e.pattern.test(text));
  }
}

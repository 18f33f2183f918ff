import stopwordList from "../../data/stopwords-en.json";

export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export interface WordCount {
  word: string;
  count: number;
}

/**
 * Lower-cased alphabetic tokens of `text`, without stopwords or single letters.
 * Contractions split at the apostrophe ("don't" -> "don", "t") and both halves
 * are stopwords.
 */
export function tokenize(text: string, stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .filter((token) => token.length > 1 && !stopwords.has(token));
}

/** Most frequent words first; ties keep first-seen order. */
export function countWords(tokens: Iterable<string>, limit?: number): WordCount[] {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const ranked = [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count);

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function slugify(value: string): string {
  return value.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

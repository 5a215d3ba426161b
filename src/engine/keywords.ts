import type { KeywordCount, VideoRecord } from "../shared/record.js";
import { ENGLISH_STOPWORDS } from "./vectorize.js";

export const TOP_KEYWORDS = 15;

// Counts letters-only words across all titles. Ties keep first-seen order.
export const countKeywords = (records: readonly VideoRecord[], limit: number = TOP_KEYWORDS): KeywordCount[] => {
  const text = records
    .map((record) => record.title)
    .join(" ")
    .replace(/[^a-zA-Z\s]/g, "")
    .toLowerCase();

  const counts = new Map<string, number>();
  for (const word of text.split(/\s+/)) {
    if (word.length <= 2 || ENGLISH_STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
};

import natural from "natural";

export const MAX_FEATURES = 1000;

// English stop words as published with the natural NLP toolkit.
export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(natural.stopwords);

export type TermSpace = {
  // Alphabetical; index i names dimension i of every vector.
  readonly terms: string[];
  readonly vectors: number[][];
};

export type TermSpaceOptions = {
  maxFeatures?: number;
  stopwords?: ReadonlySet<string>;
};

export const cleanTitle = (title: string): string =>
  title
    .replace(/[^a-zA-Z0-9\s]/g, " ")
    .toLowerCase()
    .trim();

// Tokens are runs of two or more word characters; stop words drop out before bigrams form.
const extractTerms = (text: string, stopwords: ReadonlySet<string>): string[] => {
  const tokens = (text.match(/\w\w+/g) ?? []).filter((token) => !stopwords.has(token));
  const bigrams: string[] = [];
  for (let i = 0; i + 1 < tokens.length; i += 1) {
    bigrams.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return [...tokens, ...bigrams];
};

const compareTerms = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * TF-IDF over unigrams and bigrams of the cleaned texts.
 *
 * The vocabulary keeps the `maxFeatures` terms with the highest corpus
 * frequency (ties alphabetical). Weights are raw counts times the smoothed
 * idf `ln((1 + n) / (1 + df)) + 1`, and each row is scaled to unit length.
 * A text with no surviving terms maps to the zero vector.
 */
export const buildTermSpace = (texts: readonly string[], options: TermSpaceOptions = {}): TermSpace => {
  const maxFeatures = options.maxFeatures ?? MAX_FEATURES;
  const stopwords = options.stopwords ?? ENGLISH_STOPWORDS;

  const documents = texts.map((text) => {
    const counts = new Map<string, number>();
    for (const term of extractTerms(text, stopwords)) {
      counts.set(term, (counts.get(term) ?? 0) + 1);
    }
    return counts;
  });

  const corpusCounts = new Map<string, number>();
  const documentFrequency = new Map<string, number>();
  for (const counts of documents) {
    for (const [term, count] of counts) {
      corpusCounts.set(term, (corpusCounts.get(term) ?? 0) + count);
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const terms = Array.from(corpusCounts.keys())
    .sort((a, b) => (corpusCounts.get(b) ?? 0) - (corpusCounts.get(a) ?? 0) || compareTerms(a, b))
    .slice(0, maxFeatures)
    .sort(compareTerms);

  const total = documents.length;
  const idf = terms.map((term) => Math.log((1 + total) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

  const vectors = documents.map((counts) => {
    const row = terms.map((term, index) => (counts.get(term) ?? 0) * idf[index]);
    const norm = Math.sqrt(row.reduce((sum, value) => sum + value * value, 0));
    return norm > 0 ? row.map((value) => value / norm) : row;
  });

  return { terms, vectors };
};

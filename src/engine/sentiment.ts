import natural from "natural";
import { mean } from "./numbers.js";

const tokenizer = new natural.WordTokenizer();
const analyzer = new natural.SentimentAnalyzer("English", natural.PorterStemmer, "afinn");

// Mean AFINN polarity of the title's words; 0 when it has none.
export const titleSentiment = (title: string): number => {
  const tokens = tokenizer.tokenize(title.toLowerCase()) ?? [];
  if (tokens.length === 0) return 0;
  const score = analyzer.getSentiment(tokens);
  return Number.isFinite(score) ? score : 0;
};

export const averageSentiment = (titles: readonly string[]): number => mean(titles.map(titleSentiment));

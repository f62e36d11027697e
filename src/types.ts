/**
 * Shared types across the pipeline
 */
export type MarketEvent = {
  symbol: string; // uppercase ticker
  price: number;
  changePercent: number; // signed, percent units
  volume: number;
  timestamp: string; // ISO, as sent by the scanner
};

export type NewsArticle = {
  headline: string;
  summary: string;
  url: string;
  /** Provider-native unix seconds (0 when the provider omitted it) */
  publishedAt: number;
  source: string;
};

export type SentimentLabel = "positive" | "negative" | "neutral";

export type SentimentResult = {
  /** Average article score, -1..1, 3 decimals */
  score: number;
  label: SentimentLabel;
  articleCount: number;
  positiveCount: number;
  negativeCount: number;
  neutralCount: number;
  /** Up to 5 matched lexicon words, most frequent first */
  topKeywords: string[];
  /** 0..1, higher when article scores agree */
  confidence: number;
};

/** Outbound alert, snake_case on the wire */
export type NewsAlert = {
  symbol: string;
  price: number;
  change_percent: number;
  news_sentiment: number;
  news_count: number;
  news_summary: string;
  top_headlines: string[];
  timestamp: string;
};

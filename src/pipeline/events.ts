import { z } from "zod";
import type {
  MarketEvent,
  NewsAlert,
  NewsArticle,
  SentimentResult,
} from "../types.js";

export const SUMMARY_MAX_CHARS = 400;
export const MAX_HEADLINES = 3;

/** Inbound `market_events` payload as published by the scanner */
const MarketEventPayloadSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .max(10)
    .transform((s) => s.toUpperCase()),
  price: z.number().positive(),
  change_percent: z.number().finite(),
  volume: z.number().int().nonnegative(),
  timestamp: z.string().refine((s) => !Number.isNaN(Date.parse(s)), {
    message: "timestamp must be an ISO-8601 date",
  }),
});

export type ParsedEvent =
  | { ok: true; event: MarketEvent }
  | { ok: false; error: string };

export function parseMarketEvent(payload: unknown): ParsedEvent {
  const parsed = MarketEventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      error: issue
        ? `${issue.path.join(".") || "payload"}: ${issue.message}`
        : "invalid payload",
    };
  }
  const p = parsed.data;
  return {
    ok: true,
    event: {
      symbol: p.symbol,
      price: p.price,
      changePercent: p.change_percent,
      volume: p.volume,
      timestamp: p.timestamp,
    },
  };
}

const LABEL_PREFIX: Record<SentimentResult["label"], string> = {
  positive: "📈",
  negative: "📉",
  neutral: "📊",
};

/** "📈 4 positive news articles. Key topics: surge, rally, gain" */
export function buildNewsSummary(
  articleCount: number,
  sentiment: SentimentResult
): string {
  if (articleCount === 0) return "No recent news available";
  const prefix = LABEL_PREFIX[sentiment.label];
  let summary = `${prefix} ${articleCount} ${sentiment.label} news articles`;
  if (sentiment.topKeywords.length) {
    summary += `. Key topics: ${sentiment.topKeywords.slice(0, 3).join(", ")}`;
  }
  return summary.slice(0, SUMMARY_MAX_CHARS);
}

export function buildNewsAlert(
  event: MarketEvent,
  articles: NewsArticle[],
  sentiment: SentimentResult,
  at: Date
): NewsAlert {
  return {
    symbol: event.symbol,
    price: event.price,
    change_percent: event.changePercent,
    news_sentiment: sentiment.score,
    news_count: sentiment.articleCount,
    news_summary: buildNewsSummary(articles.length, sentiment),
    top_headlines: articles.slice(0, MAX_HEADLINES).map((a) => a.headline),
    timestamp: at.toISOString(),
  };
}

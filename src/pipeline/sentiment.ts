import lexiconWords from "../data/lexicon.json";
import { log } from "../logger.js";
import type { NewsArticle, SentimentLabel, SentimentResult } from "../types.js";

/**
 * Financial sentiment lexicon: ±2 for the strong tier (surge/crash class),
 * ±1 for everything else. Multi-word entries are kept as listed even though
 * single-token lookup never reaches them.
 */
export const LEXICON: ReadonlyMap<string, number> = new Map(
  Object.entries(lexiconWords)
);

export type TextScore = {
  /** -1..1 */
  score: number;
  /** matched lexicon word → occurrences, in first-seen order */
  matches: Map<string, number>;
};

const NON_LETTERS = /[^a-z\s]/g;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(NON_LETTERS, " ")
    .split(/\s+/)
    .filter(Boolean);
}

const clamp = (x: number, lo: number, hi: number) =>
  Math.max(lo, Math.min(hi, x));
const round3 = (x: number) => Math.round(x * 1000) / 1000;

/** Weighted match sum / token count × 10, clamped to [-1, 1]. */
export function scoreText(
  text: string,
  lexicon: ReadonlyMap<string, number> = LEXICON
): TextScore {
  const words = tokenize(text);
  const matches = new Map<string, number>();
  if (!words.length) return { score: 0, matches };

  let sum = 0;
  for (const w of words) {
    const weight = lexicon.get(w);
    if (weight === undefined) continue;
    sum += weight;
    matches.set(w, (matches.get(w) ?? 0) + 1);
  }
  return { score: clamp((sum / words.length) * 10, -1, 1), matches };
}

export function classifyArticleScore(score: number): SentimentLabel {
  if (score > 0.1) return "positive";
  if (score < -0.1) return "negative";
  return "neutral";
}

export function labelForAverage(avg: number): SentimentLabel {
  if (avg > 0.2) return "positive";
  if (avg < -0.2) return "negative";
  return "neutral";
}

/** Most frequent first; Array#sort is stable so ties keep first-seen order. */
export function topKeywords(counts: Map<string, number>, n = 5): string[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, n)
    .map(([word]) => word);
}

export const EMPTY_SENTIMENT: Readonly<SentimentResult> = {
  score: 0,
  label: "neutral",
  articleCount: 0,
  positiveCount: 0,
  negativeCount: 0,
  neutralCount: 0,
  topKeywords: [],
  confidence: 0,
};

export type SentimentStats = {
  analysesPerformed: number;
  totalAnalysisSeconds: number;
  averageAnalysisSeconds: number;
  vocabularySize: number;
};

export class SentimentAnalyzer {
  private analyses = 0;
  private totalMs = 0;

  constructor(
    private readonly lexicon: ReadonlyMap<string, number> = LEXICON
  ) {}

  score(text: string): TextScore {
    return scoreText(text, this.lexicon);
  }

  analyzeBatch(articles: NewsArticle[]): SentimentResult {
    if (!articles.length) return { ...EMPTY_SENTIMENT, topKeywords: [] };
    const started = performance.now();

    const scores: number[] = [];
    const keywordCounts = new Map<string, number>();
    let positiveCount = 0;
    let negativeCount = 0;
    let neutralCount = 0;

    for (const a of articles) {
      const { score, matches } = this.score(`${a.headline} ${a.summary}`);
      scores.push(score);
      for (const [w, c] of matches) {
        keywordCounts.set(w, (keywordCounts.get(w) ?? 0) + c);
      }
      const klass = classifyArticleScore(score);
      if (klass === "positive") positiveCount++;
      else if (klass === "negative") negativeCount++;
      else neutralCount++;
    }

    const avg = scores.reduce((s, x) => s + x, 0) / scores.length;
    const variance =
      scores.reduce((s, x) => s + (x - avg) ** 2, 0) / scores.length;

    const tookMs = performance.now() - started;
    this.analyses++;
    this.totalMs += tookMs;
    log.debug("[SENTIMENT] analyzed", {
      articles: articles.length,
      avg: round3(avg),
      tookMs: Math.round(tookMs * 1000) / 1000,
    });

    return {
      score: round3(avg),
      label: labelForAverage(avg),
      articleCount: articles.length,
      positiveCount,
      negativeCount,
      neutralCount,
      topKeywords: topKeywords(keywordCounts),
      confidence: round3(Math.max(0, 1 - variance)),
    };
  }

  stats(): SentimentStats {
    const totalSeconds = this.totalMs / 1000;
    return {
      analysesPerformed: this.analyses,
      totalAnalysisSeconds: round3(totalSeconds),
      averageAnalysisSeconds: round3(totalSeconds / Math.max(this.analyses, 1)),
      vocabularySize: this.lexicon.size,
    };
  }
}

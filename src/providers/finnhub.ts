import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { z } from "zod";
import { TtlCache } from "../cache/ttlCache.js";
import { log, errMessage } from "../logger.js";
import type { NewsArticle } from "../types.js";
import { RateLimiter } from "../util/rateLimiter.js";
import {
  systemClock,
  sleep,
  type Clock,
  type Sleep,
} from "../util/clock.js";

/** Articles taken per company-news response */
const COMPANY_NEWS_LIMIT = 10;
const DAY_MS = 24 * 60 * 60 * 1000;

const text = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

/** One row of /company-news or /news; missing fields default, bad types fail */
const FinnhubArticleSchema = z.object({
  headline: text,
  summary: text,
  url: text,
  datetime: z
    .number()
    .nullish()
    .transform((v) => v ?? 0),
  source: text,
});

export interface NewsSource {
  fetchCompanyNews(symbol: string, daysBack?: number): Promise<NewsArticle[]>;
  fetchMarketNews(category?: string, limit?: number): Promise<NewsArticle[]>;
  stats(): NewsSourceStats;
}

export type NewsSourceStats = {
  apiCallsMade: number;
  failedCalls: number;
  cacheHits: number;
  cacheHitRatio: number;
  cachedItems: number;
};

export type FinnhubClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  cacheTtlMs?: number;
  minIntervalMs?: number;
  clock?: Clock;
  sleep?: Sleep;
  /**
   * Transport only (tests inject one with an in-process adapter). `baseUrl`,
   * `timeoutMs` and `apiKey` are still sent with every request.
   */
  http?: AxiosInstance;
};

type NewsRequest = {
  key: string;
  what: string;
  path: string;
  params: Record<string, string | number>;
  limit: number;
};

function ymd(ms: number) {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Parse provider rows one by one; a bad row is skipped, never the batch. */
export function parseArticles(rows: unknown[], limit: number): NewsArticle[] {
  const out: NewsArticle[] = [];
  for (const row of rows.slice(0, limit)) {
    const parsed = FinnhubArticleSchema.safeParse(row);
    if (!parsed.success) {
      log.warn(
        "[FINNHUB] skip malformed article",
        parsed.error.issues[0]?.message
      );
      continue;
    }
    const d = parsed.data;
    out.push({
      headline: d.headline,
      summary: d.summary,
      url: d.url,
      publishedAt: d.datetime,
      source: d.source,
    });
  }
  return out;
}

/**
 * Finnhub news client: one shared rate gate for every outbound call, results
 * cached per (symbol, category, TTL bucket). Callers asking for a key that is
 * already being fetched share that request. Failures are logged and come back
 * as an empty list.
 */
export class FinnhubNewsClient implements NewsSource {
  private readonly http: AxiosInstance;
  private readonly request: AxiosRequestConfig;
  private readonly cache: TtlCache<NewsArticle[]>;
  private readonly inFlight = new Map<string, Promise<NewsArticle[]>>();
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly apiKey?: string;

  private apiCalls = 0;
  private failures = 0;
  private cacheHits = 0;

  constructor(opts: FinnhubClientOptions = {}) {
    const {
      apiKey,
      baseUrl = "https://finnhub.io/api/v1",
      timeoutMs = 10_000,
      cacheTtlMs = 5 * 60 * 1000,
      minIntervalMs = 1000,
      clock = systemClock,
    } = opts;

    this.apiKey = apiKey || undefined;
    this.clock = clock;
    this.cache = new TtlCache<NewsArticle[]>(cacheTtlMs, clock);
    this.limiter = new RateLimiter(minIntervalMs, clock, opts.sleep ?? sleep);
    this.http = opts.http ?? axios.create();
    this.request = {
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: {
        "X-Finnhub-Token": this.apiKey ?? "",
        "User-Agent": "news-sentiment-alerts/1.0",
      },
    };
  }

  async fetchCompanyNews(
    symbol: string,
    daysBack = 1
  ): Promise<NewsArticle[]> {
    const to = this.clock.now();
    const from = to - daysBack * DAY_MS;
    return this.cachedFetch({
      key: this.cache.key(symbol, "company_news"),
      what: `company news for ${symbol}`,
      path: "/company-news",
      params: { symbol, from: ymd(from), to: ymd(to) },
      limit: COMPANY_NEWS_LIMIT,
    });
  }

  async fetchMarketNews(
    category = "general",
    limit = 20
  ): Promise<NewsArticle[]> {
    return this.cachedFetch({
      key: this.cache.key("market", category),
      what: `market news (${category})`,
      path: "/news",
      params: { category, minId: 0 },
      limit,
    });
  }

  stats(): NewsSourceStats {
    return {
      apiCallsMade: this.apiCalls,
      failedCalls: this.failures,
      cacheHits: this.cacheHits,
      cacheHitRatio: this.cacheHits / Math.max(this.apiCalls, 1),
      cachedItems: this.cache.size(),
    };
  }

  private cachedFetch(req: NewsRequest): Promise<NewsArticle[]> {
    const cached = this.cache.get(req.key);
    if (cached) {
      this.cacheHits++;
      log.debug(`[FINNHUB] cache hit: ${req.what}`);
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(req.key);
    if (pending) {
      this.cacheHits++;
      log.debug(`[FINNHUB] joining in-flight request: ${req.what}`);
      return pending;
    }

    const fetching = this.fetchFromProvider(req).finally(() => {
      this.inFlight.delete(req.key);
    });
    this.inFlight.set(req.key, fetching);
    return fetching;
  }

  private async fetchFromProvider(req: NewsRequest): Promise<NewsArticle[]> {
    if (!this.apiKey) {
      this.failures++;
      log.warn(`[FINNHUB] FINNHUB_API_KEY missing — no ${req.what}`);
      return [];
    }

    try {
      await this.limiter.acquire();
      const { data } = await this.http.get<unknown>(req.path, {
        ...this.request,
        params: req.params,
      });
      this.apiCalls++;
      if (!Array.isArray(data)) {
        this.failures++;
        log.error(`[FINNHUB] unexpected response for ${req.what}`, {
          type: typeof data,
        });
        return [];
      }

      const articles = parseArticles(data, req.limit);
      this.cache.set(req.key, articles);
      log.info(`[FINNHUB] fetched ${articles.length} articles: ${req.what}`);
      return articles;
    } catch (err) {
      this.failures++;
      log.error(`[FINNHUB] request failed: ${req.what}`, errMessage(err));
      return [];
    }
  }
}

import { log, errMessage } from "../logger.js";
import type { EventBus } from "../bus/types.js";
import type { NewsSource, NewsSourceStats } from "../providers/finnhub.js";
import type { MarketEvent, NewsAlert } from "../types.js";
import { systemClock, type Clock } from "../util/clock.js";
import { buildNewsAlert, parseMarketEvent } from "./events.js";
import type { AdmissionGate } from "./gate.js";
import type { SentimentAnalyzer, SentimentStats } from "./sentiment.js";

export type ConsumerOptions = {
  bus: EventBus;
  news: NewsSource;
  analyzer: SentimentAnalyzer;
  gate: AdmissionGate;
  clock?: Clock;
  inputChannel?: string;
  outputChannel?: string;
  lookbackDays?: number;
};

export type ConsumerStats = {
  consumer: {
    processedEvents: number;
    publishedAlerts: number;
    lastProcessedAt: string | null;
    recentlyProcessedCount: number;
  };
  fetcher: NewsSourceStats;
  sentiment: SentimentStats;
};

/** Where a single event stopped */
export type Outcome =
  | "malformed"
  | "rejected"
  | "no_news"
  | "failed"
  | "published"
  | "publish_failed";

/**
 * market_events → gate → news → sentiment → news_alerts.
 * One event runs to completion before the next starts; a failure ends that
 * event only.
 */
export class NewsEnrichmentConsumer {
  private readonly bus: EventBus;
  private readonly news: NewsSource;
  private readonly analyzer: SentimentAnalyzer;
  private readonly gate: AdmissionGate;
  private readonly clock: Clock;
  readonly inputChannel: string;
  readonly outputChannel: string;
  private readonly lookbackDays: number;

  private processedCount = 0;
  private publishedCount = 0;
  private lastProcessedAt: string | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: ConsumerOptions) {
    this.bus = opts.bus;
    this.news = opts.news;
    this.analyzer = opts.analyzer;
    this.gate = opts.gate;
    this.clock = opts.clock ?? systemClock;
    this.inputChannel = opts.inputChannel ?? "market_events";
    this.outputChannel = opts.outputChannel ?? "news_alerts";
    this.lookbackDays = opts.lookbackDays ?? 1;
  }

  /** Enqueue one bus payload; resolves with where it ended up, never rejects */
  handle(payload: unknown): Promise<Outcome> {
    const run = this.queue.then(() => this.processSafely(payload));
    this.queue = run;
    return run;
  }

  /** Subscribe and consume until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    const subscription = await this.bus.subscribe(
      this.inputChannel,
      async (payload) => {
        await this.handle(payload);
      }
    );
    log.info(`[NEWS] consuming ${this.inputChannel} → ${this.outputChannel}`);

    await new Promise<void>((resolve) => {
      if (signal.aborted) resolve();
      else signal.addEventListener("abort", () => resolve(), { once: true });
    });

    await subscription.close();
    log.info("[NEWS] consumer stopped", this.stats().consumer);
  }

  stats(): ConsumerStats {
    return {
      consumer: {
        processedEvents: this.processedCount,
        publishedAlerts: this.publishedCount,
        lastProcessedAt: this.lastProcessedAt,
        recentlyProcessedCount: this.gate.size(),
      },
      fetcher: this.news.stats(),
      sentiment: this.analyzer.stats(),
    };
  }

  private async processSafely(payload: unknown): Promise<Outcome> {
    try {
      return await this.process(payload);
    } catch (err) {
      log.error("[NEWS] event failed", errMessage(err));
      return "failed";
    }
  }

  private async process(payload: unknown): Promise<Outcome> {
    const started = this.clock.now();

    // ---------- RECEIVED ----------
    const parsed = parseMarketEvent(payload);
    if (!parsed.ok) {
      log.warn("[NEWS] drop malformed event", parsed.error);
      return "malformed";
    }
    const event = parsed.event;

    // ---------- FILTER ----------
    const decision = this.gate.evaluate(event);
    if (!decision.admit) {
      log.debug(`[GATE] skip ${event.symbol} (${decision.reason})`, {
        changePercent: event.changePercent,
        volume: event.volume,
      });
      return "rejected";
    }
    const change = formatChange(event.changePercent);
    log.info(`[NEWS] processing ${event.symbol} (${change})`);

    // ---------- FETCH + SCORE ----------
    let alert: NewsAlert;
    try {
      const articles = await this.news.fetchCompanyNews(
        event.symbol,
        this.lookbackDays
      );
      if (!articles.length) {
        log.warn(`[NEWS] no news for ${event.symbol}`);
        return "no_news";
      }
      const sentiment = this.analyzer.analyzeBatch(articles);
      const at = new Date(this.clock.now());
      alert = buildNewsAlert(event, articles, sentiment, at);
    } catch (err) {
      log.error(
        `[NEWS] enrichment failed for ${event.symbol}`,
        errMessage(err)
      );
      return "failed";
    }

    // ---------- PUBLISH ----------
    const outcome = await this.publish(event, alert);

    // ---------- DONE ----------
    this.processedCount++;
    this.lastProcessedAt = new Date(this.clock.now()).toISOString();
    const tookMs = this.clock.now() - started;
    log.info(`[NEWS] processed ${event.symbol} in ${tookMs}ms`);
    return outcome;
  }

  private async publish(
    event: MarketEvent,
    alert: NewsAlert
  ): Promise<Outcome> {
    try {
      const receivers = await this.bus.publish(this.outputChannel, alert);
      if (receivers === 0) {
        log.info(
          `[NEWS] no subscribers on ${this.outputChannel}; alert dropped`
        );
      }
    } catch (err) {
      log.error(`[NEWS] publish failed for ${event.symbol}`, errMessage(err));
      return "publish_failed";
    }

    this.publishedCount++;
    this.gate.record(event.symbol);
    log.info(`[NEWS] alert published for ${event.symbol}`, {
      sentiment: alert.news_sentiment,
      articles: alert.news_count,
    });
    return "published";
  }
}

function formatChange(pct: number) {
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

// src/run_consumer.ts
import { cfg } from "./config.js";
import { log, errMessage } from "./logger.js";
import { RedisEventBus } from "./bus/redis.js";
import { FinnhubNewsClient } from "./providers/finnhub.js";
import { SentimentAnalyzer } from "./pipeline/sentiment.js";
import { AdmissionGate } from "./pipeline/gate.js";
import { NewsEnrichmentConsumer } from "./pipeline/consumer.js";

/* --------------- preconditions --------------- */
if (!cfg.FINNHUB_API_KEY) {
  log.warn("[BOOT] FINNHUB_API_KEY missing — every fetch comes back empty");
}
log.info("[BOOT] thresholds:", {
  MIN_CHANGE_PERCENT: cfg.MIN_CHANGE_PERCENT,
  MIN_VOLUME_THRESHOLD: cfg.MIN_VOLUME_THRESHOLD,
  DEDUP_WINDOW_SECONDS: cfg.DEDUP_WINDOW_SECONDS,
  CACHE_TTL_SECONDS: cfg.CACHE_TTL_SECONDS,
  RATE_LIMIT_INTERVAL_MS: cfg.RATE_LIMIT_INTERVAL_MS,
});

/* ---------------- boot ---------------- */
async function start() {
  const bus = await RedisEventBus.connect(cfg.REDIS_URL);

  const consumer = new NewsEnrichmentConsumer({
    bus,
    news: new FinnhubNewsClient({
      apiKey: cfg.FINNHUB_API_KEY,
      baseUrl: cfg.FINNHUB_BASE_URL,
      timeoutMs: cfg.REQUEST_TIMEOUT_MS,
      cacheTtlMs: cfg.CACHE_TTL_SECONDS * 1000,
      minIntervalMs: cfg.RATE_LIMIT_INTERVAL_MS,
    }),
    analyzer: new SentimentAnalyzer(),
    gate: new AdmissionGate({
      minChangePercent: cfg.MIN_CHANGE_PERCENT,
      minVolume: cfg.MIN_VOLUME_THRESHOLD,
      dedupWindowMs: cfg.DEDUP_WINDOW_SECONDS * 1000,
    }),
    inputChannel: cfg.MARKET_EVENTS_CHANNEL,
    outputChannel: cfg.NEWS_ALERTS_CHANNEL,
    lookbackDays: cfg.NEWS_LOOKBACK_DAYS,
  });

  const stop = new AbortController();
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.once(sig, () => {
      log.info(`[BOOT] ${sig} received, shutting down`);
      stop.abort();
    });
  }

  const statsTimer =
    cfg.STATS_LOG_SECONDS > 0
      ? setInterval(
          () => log.info("[STATS]", consumer.stats()),
          cfg.STATS_LOG_SECONDS * 1000
        )
      : undefined;

  try {
    await consumer.run(stop.signal);
  } finally {
    clearInterval(statsTimer);
    await bus.close();
  }
}

start().catch((err) => {
  log.error("[BOOT] fatal:", errMessage(err));
  process.exitCode = 1;
});

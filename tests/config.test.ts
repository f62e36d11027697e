import { ZodError } from "zod";
import { parseConfig } from "../src/config.js";

describe("parseConfig", () => {
  it("falls back to defaults", () => {
    const c = parseConfig({});
    expect(c).toMatchObject({
      REDIS_URL: "redis://localhost:6379",
      FINNHUB_BASE_URL: "https://finnhub.io/api/v1",
      MIN_CHANGE_PERCENT: 3,
      MIN_VOLUME_THRESHOLD: 50_000,
      DEDUP_WINDOW_SECONDS: 1800,
      CACHE_TTL_SECONDS: 300,
      RATE_LIMIT_INTERVAL_MS: 1000,
      REQUEST_TIMEOUT_MS: 10_000,
      NEWS_LOOKBACK_DAYS: 1,
      MARKET_EVENTS_CHANNEL: "market_events",
      NEWS_ALERTS_CHANNEL: "news_alerts",
      LOG_LEVEL: "info",
    });
    expect(c.FINNHUB_API_KEY).toBeUndefined();
  });

  it("coerces overrides from strings", () => {
    const c = parseConfig({
      MIN_CHANGE_PERCENT: "5.5",
      MIN_VOLUME_THRESHOLD: "100000",
      DEDUP_WINDOW_SECONDS: "60",
      FINNHUB_API_KEY: "test-key",
    });
    expect(c.MIN_CHANGE_PERCENT).toBe(5.5);
    expect(c.MIN_VOLUME_THRESHOLD).toBe(100_000);
    expect(c.DEDUP_WINDOW_SECONDS).toBe(60);
    expect(c.FINNHUB_API_KEY).toBe("test-key");
  });

  it("fails fast on bad values", () => {
    expect(() => parseConfig({ MIN_VOLUME_THRESHOLD: "lots" })).toThrow(
      ZodError
    );
    expect(() => parseConfig({ CACHE_TTL_SECONDS: "0" })).toThrow(ZodError);
    expect(() => parseConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});

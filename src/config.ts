import "dotenv/config";
import { z } from "zod";

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  REDIS_URL: z.string().default("redis://localhost:6379"),
  FINNHUB_API_KEY: z.string().optional(),
  FINNHUB_BASE_URL: z.string().url().default("https://finnhub.io/api/v1"),
  MIN_CHANGE_PERCENT: z.coerce.number().nonnegative().default(3),
  MIN_VOLUME_THRESHOLD: z.coerce.number().int().nonnegative().default(50_000),
  DEDUP_WINDOW_SECONDS: z.coerce.number().positive().default(1800),
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(300),
  RATE_LIMIT_INTERVAL_MS: z.coerce.number().nonnegative().default(1000),
  REQUEST_TIMEOUT_MS: z.coerce.number().positive().default(10_000),
  NEWS_LOOKBACK_DAYS: z.coerce.number().int().positive().default(1),
  MARKET_EVENTS_CHANNEL: z.string().min(1).default("market_events"),
  NEWS_ALERTS_CHANNEL: z.string().min(1).default("news_alerts"),
  STATS_LOG_SECONDS: z.coerce.number().nonnegative().default(60),
  LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("info"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return EnvSchema.parse(env);
}

export const cfg: AppConfig = parseConfig(process.env);

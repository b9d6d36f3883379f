import "dotenv/config";
import { z } from "zod";

const supportedMarketDataProviders = ["yahoo", "alphavantage", "mock"] as const;

export type MarketDataProviderName =
  (typeof supportedMarketDataProviders)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  MARKET_DATA_PROVIDER: z.enum(supportedMarketDataProviders).default("yahoo"),
  YAHOO_BASE_URL: z.string().default("https://query1.finance.yahoo.com"),
  YAHOO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ALPHA_VANTAGE_BASE_URL: z.string().default("https://www.alphavantage.co"),
  ALPHA_VANTAGE_API_KEY: z.string().default(""),
  ALPHA_VANTAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  // Alpha Vantage has no index quotes; point this at an ETF such as SPY there.
  BENCHMARK_SYMBOL: z.string().trim().min(1).default("^GSPC"),
  MAX_ASSETS: z.coerce.number().int().positive().default(5),
  CACHE_RESOLUTION_TTL_SECONDS: z.coerce.number().int().positive().default(3_600),
  CACHE_FUNDAMENTALS_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(3_600),
  CACHE_HISTORY_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CACHE_NEWS_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  DIVIDEND_YIELD_CORRECTION_THRESHOLD: z.coerce
    .number()
    .positive()
    .default(0.2),
  INSIDER_ESTIMATE_RATIO: z.coerce.number().default(0.0005),
  HIGH_LOOKBACK_OBSERVATIONS: z.coerce.number().int().positive().default(252),
  HEADLINES_PER_SYMBOL: z.coerce.number().int().nonnegative().default(3),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Resolves the configured market-data adapter so runtime wiring remains declarative and testable.
 */
export const marketDataProvider = (): MarketDataProviderName =>
  env.MARKET_DATA_PROVIDER;

/**
 * Converts second-based TTL settings once so the cache only ever sees milliseconds.
 */
export const cacheTtls = () => ({
  resolutionMs: env.CACHE_RESOLUTION_TTL_SECONDS * 1_000,
  fundamentalsMs: env.CACHE_FUNDAMENTALS_TTL_SECONDS * 1_000,
  historyMs: env.CACHE_HISTORY_TTL_SECONDS * 1_000,
  newsMs: env.CACHE_NEWS_TTL_SECONDS * 1_000,
});

export const HORIZONS = ["1mo", "3mo", "6mo", "1y", "2y", "5y", "max"] as const;

export type Horizon = (typeof HORIZONS)[number];

/**
 * Calendar-day length of each bounded horizon; `max` keeps the whole fetched history.
 */
export const HORIZON_DAYS: Record<Exclude<Horizon, "max">, number> = {
  "1mo": 30,
  "3mo": 91,
  "6mo": 182,
  "1y": 365,
  "2y": 730,
  "5y": 1826,
};

export const isHorizon = (value: string): value is Horizon =>
  HORIZONS.some((horizon) => horizon === value);

export type SymbolMatch = {
  symbol: string;
  exchange?: string;
  name?: string;
};

/**
 * One trading day. `date` is an ISO calendar date (YYYY-MM-DD).
 */
export type PriceBar = {
  date: string;
  close: number;
  volume?: number;
};

export type PriceHistory = Record<string, PriceBar[]>;

/**
 * Sparse per-symbol fundamentals. A field the provider did not supply is absent, never zero.
 * `dividendYield` is a fraction (0.0045 == 0.45%).
 */
export type FundamentalSnapshot = {
  trailingPe?: number;
  forwardPe?: number;
  trailingEps?: number;
  forwardEps?: number;
  dividendAmount?: number;
  dividendYield?: number;
  marketCap?: number;
  targetMeanPrice?: number;
};

export type DividendEvent = {
  date: string;
  amount: number;
};

export type InsiderTransaction = {
  date?: string;
  shares: number;
  transactionText: string;
};

export type NewsHeadline = {
  symbol: string;
  title: string;
  publisher?: string;
  url?: string;
  publishedAt?: Date;
};

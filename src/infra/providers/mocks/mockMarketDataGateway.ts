import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  DividendEvent,
  FundamentalSnapshot,
  InsiderTransaction,
  NewsHeadline,
  PriceBar,
  PriceHistory,
  SymbolMatch,
} from "../../../core/entities/market";
import type {
  HistoryRequest,
  MarketDataGatewayPort,
  NewsRequest,
  SymbolRequest,
  SymbolSearchRequest,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { SystemClock } from "../../system/systemPorts";
import { subtractDays, toIsoDate } from "../../../shared/utils/dateUtils";

const KNOWN_COMPANIES: Record<string, SymbolMatch> = {
  apple: { symbol: "AAPL", exchange: "NMS", name: "Apple Inc." },
  microsoft: { symbol: "MSFT", exchange: "NMS", name: "Microsoft Corporation" },
  alphabet: { symbol: "GOOGL", exchange: "NMS", name: "Alphabet Inc." },
  nvidia: { symbol: "NVDA", exchange: "NMS", name: "NVIDIA Corporation" },
  "coca-cola": { symbol: "KO", exchange: "NYQ", name: "The Coca-Cola Company" },
};

const HISTORY_DAYS = 6 * 365;

/**
 * Stable 32-bit hash of a symbol, used to seed every generated series.
 */
const seedOf = (symbol: string): number => {
  let hash = 2166136261;
  for (const char of symbol) {
    hash ^= char.charCodeAt(0);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
};

// Park-Miller generator; the same seed always yields the same sequence.
const randomSequence = (seed: number) => {
  let state = seed % 2147483647 || 1;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
};

const isWeekday = (isoDate: string): boolean => {
  const day = new Date(`${isoDate}T00:00:00.000Z`).getUTCDay();
  return day !== 0 && day !== 6;
};

/**
 * Serves deterministic synthetic market data so the whole report path runs without network access.
 * Prices are a seeded random walk over weekdays ending at the clock's current date.
 */
export class MockMarketDataGateway implements MarketDataGatewayPort {
  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  async searchSymbols(
    request: SymbolSearchRequest,
  ): Promise<Result<SymbolMatch[], AppBoundaryError>> {
    const match = KNOWN_COMPANIES[request.query.trim().toLowerCase()];
    return ok(match ? [match].slice(0, request.limit) : []);
  }

  async fetchFundamentals(
    request: SymbolRequest,
  ): Promise<Result<FundamentalSnapshot, AppBoundaryError>> {
    const price = this.bars(request.symbol).at(-1)?.close ?? 100;
    const random = randomSequence(seedOf(`${request.symbol}:fundamentals`));
    const trailingEps = Number((price / (15 + random() * 20)).toFixed(2));

    return ok({
      trailingPe: Number((price / trailingEps).toFixed(2)),
      trailingEps,
      forwardEps: Number((trailingEps * (1 + random() * 0.15)).toFixed(2)),
      dividendYield: Number((random() * 0.03).toFixed(4)),
      marketCap: Math.round(price * (1e8 + random() * 1e10)),
      targetMeanPrice: Number((price * (0.9 + random() * 0.3)).toFixed(2)),
    });
  }

  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceHistory, AppBoundaryError>> {
    const history: PriceHistory = {};
    for (const symbol of request.symbols) {
      history[symbol] = this.bars(symbol);
    }

    return ok(history);
  }

  async fetchDividends(
    request: SymbolRequest,
  ): Promise<Result<DividendEvent[], AppBoundaryError>> {
    const today = toIsoDate(this.clock.now());
    const amount = Number(
      (randomSequence(seedOf(`${request.symbol}:dividends`))() * 1.2).toFixed(2),
    );

    return ok(
      [3, 2, 1, 0].map((quarter) => ({
        date: subtractDays(today, quarter * 91 + 30),
        amount,
      })),
    );
  }

  async fetchInsiderTransactions(
    request: SymbolRequest,
  ): Promise<Result<InsiderTransaction[], AppBoundaryError>> {
    const today = toIsoDate(this.clock.now());
    const random = randomSequence(seedOf(`${request.symbol}:insider`));

    return ok([
      {
        date: subtractDays(today, 12),
        shares: Math.round(1_000 + random() * 20_000),
        transactionText: "Sale at price per share.",
      },
      {
        date: subtractDays(today, 40),
        shares: Math.round(500 + random() * 5_000),
        transactionText: "Purchase at price per share.",
      },
    ]);
  }

  async fetchNews(
    request: NewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>> {
    const now = this.clock.now();
    return ok(
      Array.from({ length: Math.min(3, request.limit) }).map((_, index) => ({
        symbol: request.symbol,
        title: `${request.symbol} mock headline ${index + 1}`,
        publisher: "mock-news-wire",
        url: `https://example.local/news/${encodeURIComponent(request.symbol)}/${index}`,
        publishedAt: new Date(now.getTime() - index * 60 * 60 * 1000),
      })),
    );
  }

  private bars(symbol: string): PriceBar[] {
    const random = randomSequence(seedOf(symbol));
    const today = toIsoDate(this.clock.now());
    const bars: PriceBar[] = [];
    let close = 50 + random() * 250;

    for (let offset = HISTORY_DAYS; offset >= 0; offset -= 1) {
      const date = subtractDays(today, offset);
      if (!isWeekday(date)) {
        continue;
      }

      close = Math.max(1, close * (1 + (random() - 0.5) * 0.04));
      bars.push({
        date,
        close: Number(close.toFixed(2)),
        volume: Math.round(1e6 + random() * 9e6),
      });
    }

    return bars;
  }
}

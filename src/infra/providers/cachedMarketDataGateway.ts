import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  DividendEvent,
  FundamentalSnapshot,
  InsiderTransaction,
  NewsHeadline,
  PriceHistory,
  SymbolMatch,
} from "../../core/entities/market";
import type {
  HistoryRequest,
  MarketDataGatewayPort,
  NewsRequest,
  SymbolRequest,
  SymbolSearchRequest,
} from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { ResultCache, cacheKey } from "../cache/resultCache";

type Cached<T> = Result<T, AppBoundaryError>;

export type CacheTtls = {
  resolutionMs: number;
  fundamentalsMs: number;
  historyMs: number;
  newsMs: number;
};

/**
 * Fronts a gateway with per-kind TTL caches. Failures are cached too, so a throttled provider
 * or an unknown name is not hammered again until its entry expires.
 */
export class CachedMarketDataGateway implements MarketDataGatewayPort {
  private readonly searches: ResultCache<Cached<SymbolMatch[]>>;
  private readonly fundamentals: ResultCache<Cached<FundamentalSnapshot>>;
  private readonly histories: ResultCache<Cached<PriceHistory>>;
  private readonly dividends: ResultCache<Cached<DividendEvent[]>>;
  private readonly insiders: ResultCache<Cached<InsiderTransaction[]>>;
  private readonly news: ResultCache<Cached<NewsHeadline[]>>;

  constructor(
    private readonly inner: MarketDataGatewayPort,
    clock: ClockPort,
    private readonly ttls: CacheTtls,
    maxEntriesPerKind = 500,
  ) {
    this.searches = new ResultCache(clock, maxEntriesPerKind);
    this.fundamentals = new ResultCache(clock, maxEntriesPerKind);
    this.histories = new ResultCache(clock, maxEntriesPerKind);
    this.dividends = new ResultCache(clock, maxEntriesPerKind);
    this.insiders = new ResultCache(clock, maxEntriesPerKind);
    this.news = new ResultCache(clock, maxEntriesPerKind);
  }

  searchSymbols(request: SymbolSearchRequest): Promise<Cached<SymbolMatch[]>> {
    return this.searches.getOrFetch(
      cacheKey("search", request.query, request.limit),
      this.ttls.resolutionMs,
      () => this.miss("search", request.query, () => this.inner.searchSymbols(request)),
    );
  }

  fetchFundamentals(
    request: SymbolRequest,
  ): Promise<Cached<FundamentalSnapshot>> {
    return this.fundamentals.getOrFetch(
      cacheKey("fundamentals", request.symbol),
      this.ttls.fundamentalsMs,
      () =>
        this.miss("fundamentals", request.symbol, () =>
          this.inner.fetchFundamentals(request),
        ),
    );
  }

  /**
   * Keys on the sorted symbol set so column order never splits one batch into two entries.
   */
  fetchHistory(request: HistoryRequest): Promise<Cached<PriceHistory>> {
    const symbols = Array.from(new Set(request.symbols)).sort();

    return this.histories.getOrFetch(
      cacheKey("history", symbols, request.horizon),
      this.ttls.historyMs,
      () =>
        this.miss("history", symbols.join(","), () =>
          this.inner.fetchHistory({ symbols, horizon: request.horizon }),
        ),
    );
  }

  fetchDividends(request: SymbolRequest): Promise<Cached<DividendEvent[]>> {
    return this.dividends.getOrFetch(
      cacheKey("dividends", request.symbol),
      this.ttls.fundamentalsMs,
      () =>
        this.miss("dividends", request.symbol, () =>
          this.inner.fetchDividends(request),
        ),
    );
  }

  fetchInsiderTransactions(
    request: SymbolRequest,
  ): Promise<Cached<InsiderTransaction[]>> {
    return this.insiders.getOrFetch(
      cacheKey("insider", request.symbol),
      this.ttls.fundamentalsMs,
      () =>
        this.miss("insider", request.symbol, () =>
          this.inner.fetchInsiderTransactions(request),
        ),
    );
  }

  fetchNews(request: NewsRequest): Promise<Cached<NewsHeadline[]>> {
    return this.news.getOrFetch(
      cacheKey("news", request.symbol, request.limit),
      this.ttls.newsMs,
      () =>
        this.miss("news", request.symbol, () => this.inner.fetchNews(request)),
    );
  }

  private async miss<T>(
    kind: string,
    subject: string,
    load: () => Promise<Cached<T>>,
  ): Promise<Cached<T>> {
    logger.debug({ kind, subject }, "Market data cache miss");
    const result = await load();

    if (result.isErr()) {
      logger.warn(
        {
          kind,
          subject,
          provider: result.error.provider,
          code: result.error.code,
          reason: result.error.message,
        },
        "Market data call failed; caching failure until expiry",
      );
    }

    return result;
  }
}

import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  DividendEvent,
  FundamentalSnapshot,
  Horizon,
  InsiderTransaction,
  NewsHeadline,
  PriceHistory,
  SymbolMatch,
} from "../entities/market";

export type SymbolSearchRequest = {
  query: string;
  limit: number;
};

export type SymbolRequest = {
  symbol: string;
};

export type HistoryRequest = {
  symbols: string[];
  horizon: Horizon;
};

export type NewsRequest = {
  symbol: string;
  limit: number;
};

/**
 * Capability over an unreliable, rate-limited market-data provider.
 * Adapters never throw: every fault comes back as an `AppBoundaryError`.
 */
export interface MarketDataGatewayPort {
  searchSymbols(
    request: SymbolSearchRequest,
  ): Promise<Result<SymbolMatch[], AppBoundaryError>>;
  fetchFundamentals(
    request: SymbolRequest,
  ): Promise<Result<FundamentalSnapshot, AppBoundaryError>>;
  /**
   * One batched call for every requested symbol. Symbols the provider had no data for are
   * absent from the returned mapping rather than failing the batch.
   */
  fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceHistory, AppBoundaryError>>;
  fetchDividends(
    request: SymbolRequest,
  ): Promise<Result<DividendEvent[], AppBoundaryError>>;
  fetchInsiderTransactions(
    request: SymbolRequest,
  ): Promise<Result<InsiderTransaction[], AppBoundaryError>>;
  fetchNews(
    request: NewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>>;
}

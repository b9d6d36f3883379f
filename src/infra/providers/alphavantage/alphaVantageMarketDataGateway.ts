import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AppBoundaryError,
  MarketDataSource,
} from "../../../core/entities/appError";
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
import { logger } from "../../../shared/logger/logger";
import { isIsoDate } from "../../../shared/utils/dateUtils";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { compactSnapshot } from "../utils/snapshotUtils";

const PROVIDER = "alphavantage";

// Alpha Vantage reports quota and key problems with HTTP 200 and one of these fields.
const envelopeSchema = z
  .object({
    Note: z.string().optional(),
    Information: z.string().optional(),
    "Error Message": z.string().optional(),
  })
  .passthrough();

const searchSchema = z.object({
  bestMatches: z
    .array(
      z.object({
        "1. symbol": z.string().optional(),
        "2. name": z.string().optional(),
        "4. region": z.string().optional(),
      }),
    )
    .default([]),
});

const overviewSchema = z.object({
  PERatio: z.string().optional(),
  ForwardPE: z.string().optional(),
  EPS: z.string().optional(),
  DividendYield: z.string().optional(),
  MarketCapitalization: z.string().optional(),
  AnalystTargetPrice: z.string().optional(),
});

const dailySeriesSchema = z.object({
  "Time Series (Daily)": z.record(
    z.object({
      "4. close": z.string(),
      "5. volume": z.string().optional(),
    }),
  ),
});

const dividendsSchema = z.object({
  data: z
    .array(
      z.object({
        ex_dividend_date: z.string().optional(),
        amount: z.string().optional(),
      }),
    )
    .default([]),
});

const insiderSchema = z.object({
  data: z
    .array(
      z.object({
        transaction_date: z.string().optional(),
        acquisition_or_disposal: z.string().optional(),
        shares: z.string().optional(),
      }),
    )
    .default([]),
});

const newsSchema = z.object({
  feed: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
        source: z.string().optional(),
        time_published: z.string().optional(),
      }),
    )
    .default([]),
});

const parseNumericValue = (raw: string | undefined): number | undefined => {
  if (!raw) {
    return undefined;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return undefined;
  }

  const parsed = Number.parseFloat(normalized);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }

  return parsed;
};

const parseAlphaVantageTimestamp = (
  value: string | undefined,
): Date | undefined => {
  const match = value
    ?.trim()
    .match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/);

  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour, minute, second] = match;
  return new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
    ),
  );
};

/**
 * Insider rows carry an A/D flag instead of prose; expand it so the reconciler's text
 * classification applies uniformly across providers.
 */
const describeInsiderFlag = (flag: string | undefined): string | undefined => {
  switch (flag?.trim().toUpperCase()) {
    case "A":
      return "Acquisition";
    case "D":
      return "Disposition";
    default:
      return undefined;
  }
};

/**
 * Adapts Alpha Vantage query functions to the market-data gateway. The API has no batch
 * history endpoint, so one gateway history call fans out per symbol.
 */
export class AlphaVantageMarketDataGateway implements MarketDataGatewayPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "ALPHA_VANTAGE_API_KEY is required when MARKET_DATA_PROVIDER is set to alphavantage.",
      );
    }
  }

  async searchSymbols(
    request: SymbolSearchRequest,
  ): Promise<Result<SymbolMatch[], AppBoundaryError>> {
    const payload = await this.query(
      { function: "SYMBOL_SEARCH", keywords: request.query },
      searchSchema,
      "search",
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.bestMatches
        .flatMap((match): SymbolMatch[] => {
          const symbol = match["1. symbol"]?.trim();
          return symbol
            ? [{ symbol, name: match["2. name"], exchange: match["4. region"] }]
            : [];
        })
        .slice(0, request.limit),
    );
  }

  async fetchFundamentals(
    request: SymbolRequest,
  ): Promise<Result<FundamentalSnapshot, AppBoundaryError>> {
    const payload = await this.query(
      { function: "OVERVIEW", symbol: request.symbol },
      overviewSchema,
      "fundamentals",
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    const overview = payload.value;
    return ok(
      compactSnapshot({
        trailingPe: parseNumericValue(overview.PERatio),
        forwardPe: parseNumericValue(overview.ForwardPE),
        trailingEps: parseNumericValue(overview.EPS),
        dividendYield: parseNumericValue(overview.DividendYield),
        marketCap: parseNumericValue(overview.MarketCapitalization),
        targetMeanPrice: parseNumericValue(overview.AnalystTargetPrice),
      }),
    );
  }

  /**
   * Symbols that fail individually are left out of the mapping; only a total failure is an error.
   */
  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceHistory, AppBoundaryError>> {
    const outputsize = request.horizon === "1mo" || request.horizon === "3mo"
      ? "compact"
      : "full";

    const results = await Promise.all(
      request.symbols.map(async (symbol) => ({
        symbol,
        result: await this.query(
          { function: "TIME_SERIES_DAILY", symbol, outputsize },
          dailySeriesSchema,
          "history",
        ),
      })),
    );

    const history: PriceHistory = {};
    const failures: AppBoundaryError[] = [];

    for (const { symbol, result } of results) {
      if (result.isErr()) {
        failures.push(result.error);
        logger.warn(
          { symbol, code: result.error.code, reason: result.error.message },
          "Alpha Vantage history failed for symbol; continuing with the rest",
        );
        continue;
      }

      const bars: PriceBar[] = Object.entries(result.value["Time Series (Daily)"])
        .flatMap(([date, row]): PriceBar[] => {
          const close = parseNumericValue(row["4. close"]);
          if (close === undefined || !isIsoDate(date)) {
            return [];
          }

          return [{ date, close, volume: parseNumericValue(row["5. volume"]) }];
        })
        .sort((left, right) => left.date.localeCompare(right.date));

      history[symbol] = bars;
    }

    const firstFailure = failures.at(0);
    if (firstFailure && failures.length === request.symbols.length) {
      return err(firstFailure);
    }

    return ok(history);
  }

  async fetchDividends(
    request: SymbolRequest,
  ): Promise<Result<DividendEvent[], AppBoundaryError>> {
    const payload = await this.query(
      { function: "DIVIDENDS", symbol: request.symbol },
      dividendsSchema,
      "dividends",
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.data
        .flatMap((row): DividendEvent[] => {
          const amount = parseNumericValue(row.amount);
          const date = row.ex_dividend_date?.trim();
          return amount !== undefined && date && isIsoDate(date)
            ? [{ date, amount }]
            : [];
        })
        .sort((left, right) => left.date.localeCompare(right.date)),
    );
  }

  async fetchInsiderTransactions(
    request: SymbolRequest,
  ): Promise<Result<InsiderTransaction[], AppBoundaryError>> {
    const payload = await this.query(
      { function: "INSIDER_TRANSACTIONS", symbol: request.symbol },
      insiderSchema,
      "insider",
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.data.flatMap((row): InsiderTransaction[] => {
        const shares = parseNumericValue(row.shares);
        const transactionText = describeInsiderFlag(row.acquisition_or_disposal);
        if (shares === undefined || !transactionText) {
          return [];
        }

        return [{ date: row.transaction_date, shares, transactionText }];
      }),
    );
  }

  async fetchNews(
    request: NewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>> {
    const payload = await this.query(
      {
        function: "NEWS_SENTIMENT",
        tickers: request.symbol,
        limit: String(request.limit),
        sort: "LATEST",
      },
      newsSchema,
      "news",
    );
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.feed
        .flatMap((item): NewsHeadline[] => {
          const title = item.title?.trim();
          if (!title) {
            return [];
          }

          return [
            {
              symbol: request.symbol,
              title,
              publisher: item.source,
              url: item.url,
              publishedAt: parseAlphaVantageTimestamp(item.time_published),
            },
          ];
        })
        .slice(0, request.limit),
    );
  }

  /**
   * Runs one query function and unwraps Alpha Vantage's in-band quota and error notices before
   * validating the payload shape.
   */
  private async query<S extends z.ZodTypeAny>(
    params: Record<string, string>,
    schema: S,
    source: MarketDataSource,
  ): Promise<Result<z.output<S>, AppBoundaryError>> {
    const url = new URL("/query", this.baseUrl);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set("apikey", this.apiKey);

    const response = await this.httpClient.getJson(
      {
        url: url.toString(),
        timeoutMs: this.timeoutMs,
        retries: 2,
        retryDelayMs: 250,
      },
      envelopeSchema,
    );

    if (response.isErr()) {
      const status = response.error.httpStatus;
      const code: AppBoundaryError["code"] =
        status === 429
          ? "rate_limited"
          : status === 401 || status === 403
            ? "auth_invalid"
            : response.error.code === "timeout"
              ? "timeout"
              : response.error.code === "transport_error"
                ? "transport_error"
                : response.error.code === "invalid_json"
                  ? "invalid_json"
                  : "provider_error";

      return err({
        source,
        code,
        provider: PROVIDER,
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: status,
        cause: response.error.cause,
      });
    }

    const envelope = response.value;
    const note = envelope.Note?.trim() || envelope.Information?.trim();
    if (note) {
      const isRateLimit = /rate|frequency|limit|calls per minute/i.test(note);

      return err({
        source,
        code: isRateLimit ? "rate_limited" : "provider_error",
        provider: PROVIDER,
        message: note,
        retryable: isRateLimit,
      });
    }

    const errorMessage = envelope["Error Message"]?.trim();
    if (errorMessage) {
      const isAuthError =
        /api key|apikey|unauthorized|authentication/i.test(errorMessage);

      return err({
        source,
        code: isAuthError ? "auth_invalid" : "not_found",
        provider: PROVIDER,
        message: errorMessage,
        retryable: false,
      });
    }

    const parsed = schema.safeParse(envelope);
    if (!parsed.success) {
      return err({
        source,
        code: "malformed_response",
        provider: PROVIDER,
        message: `Alpha Vantage ${params.function ?? "query"} payload was malformed.`,
        retryable: false,
        cause: parsed.error,
      });
    }

    return ok(parsed.data);
  }
}

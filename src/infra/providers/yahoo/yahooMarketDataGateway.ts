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
import { epochSecondsToIsoDate } from "../../../shared/utils/dateUtils";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";
import { compactSnapshot } from "../utils/snapshotUtils";

const PROVIDER = "yahoo";

// quoteSummary emits numbers either bare or as { raw, fmt }, and `{}` when unknown.
const yahooNumber = z
  .union([z.number(), z.object({ raw: z.number().optional() }).passthrough()])
  .optional()
  .transform((value) => (typeof value === "number" ? value : value?.raw));

const yahooErrorSchema = z
  .object({
    code: z.string().optional(),
    description: z.string().optional(),
  })
  .nullish();

const searchSchema = z.object({
  quotes: z
    .array(
      z.object({
        symbol: z.string().optional(),
        exchange: z.string().optional(),
        shortname: z.string().optional(),
        longname: z.string().optional(),
      }),
    )
    .default([]),
  news: z
    .array(
      z.object({
        title: z.string().optional(),
        publisher: z.string().optional(),
        link: z.string().optional(),
        providerPublishTime: z.number().optional(),
      }),
    )
    .default([]),
});

const sparkSchema = z.object({
  spark: z.object({
    result: z
      .array(
        z.object({
          symbol: z.string(),
          response: z
            .array(
              z.object({
                timestamp: z.array(z.number()).nullish(),
                indicators: z
                  .object({
                    quote: z
                      .array(
                        z.object({
                          close: z.array(z.number().nullable()).nullish(),
                        }),
                      )
                      .nullish(),
                  })
                  .nullish(),
              }),
            )
            .nullish(),
        }),
      )
      .nullish(),
    error: yahooErrorSchema,
  }),
});

const quoteSummarySchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z.object({
          summaryDetail: z
            .object({
              trailingPE: yahooNumber,
              forwardPE: yahooNumber,
              dividendYield: yahooNumber,
              marketCap: yahooNumber,
            })
            .optional(),
          defaultKeyStatistics: z
            .object({
              forwardPE: yahooNumber,
              trailingEps: yahooNumber,
              forwardEps: yahooNumber,
              lastDividendValue: yahooNumber,
            })
            .optional(),
          financialData: z
            .object({
              targetMeanPrice: yahooNumber,
            })
            .optional(),
          insiderTransactions: z
            .object({
              transactions: z
                .array(
                  z.object({
                    shares: yahooNumber,
                    transactionText: z.string().optional(),
                    startDate: yahooNumber,
                  }),
                )
                .default([]),
            })
            .optional(),
        }),
      )
      .nullish(),
    error: yahooErrorSchema,
  }),
});

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          events: z
            .object({
              dividends: z
                .record(z.object({ amount: z.number(), date: z.number() }))
                .optional(),
            })
            .nullish(),
        }),
      )
      .nullish(),
    error: yahooErrorSchema,
  }),
});

type QuoteSummary = NonNullable<
  z.output<typeof quoteSummarySchema>["quoteSummary"]["result"]
>[number];

/**
 * Adapts Yahoo Finance's public query endpoints (search, spark, quoteSummary, chart) to the
 * market-data gateway. History for all symbols comes from one spark call.
 */
export class YahooMarketDataGateway implements MarketDataGatewayPort {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async searchSymbols(
    request: SymbolSearchRequest,
  ): Promise<Result<SymbolMatch[], AppBoundaryError>> {
    const url = new URL("/v1/finance/search", this.baseUrl);
    url.searchParams.set("q", request.query);
    url.searchParams.set("quotesCount", String(request.limit));
    url.searchParams.set("newsCount", "0");

    const payload = await this.get(url, searchSchema, "search");
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.quotes
        .map((quote): SymbolMatch | null => {
          const symbol = quote.symbol?.trim();
          if (!symbol) {
            return null;
          }

          return {
            symbol,
            exchange: quote.exchange,
            name: quote.longname ?? quote.shortname,
          };
        })
        .filter((match): match is SymbolMatch => match !== null)
        .slice(0, request.limit),
    );
  }

  async fetchFundamentals(
    request: SymbolRequest,
  ): Promise<Result<FundamentalSnapshot, AppBoundaryError>> {
    const summary = await this.quoteSummary(
      request.symbol,
      ["summaryDetail", "defaultKeyStatistics", "financialData"],
      "fundamentals",
    );
    if (summary.isErr()) {
      return err(summary.error);
    }

    const { summaryDetail, defaultKeyStatistics, financialData } =
      summary.value;

    return ok(
      compactSnapshot({
        trailingPe: summaryDetail?.trailingPE,
        forwardPe: summaryDetail?.forwardPE ?? defaultKeyStatistics?.forwardPE,
        trailingEps: defaultKeyStatistics?.trailingEps,
        forwardEps: defaultKeyStatistics?.forwardEps,
        dividendAmount: defaultKeyStatistics?.lastDividendValue,
        dividendYield: summaryDetail?.dividendYield,
        marketCap: summaryDetail?.marketCap,
        targetMeanPrice: financialData?.targetMeanPrice,
      }),
    );
  }

  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceHistory, AppBoundaryError>> {
    const url = new URL("/v7/finance/spark", this.baseUrl);
    url.searchParams.set("symbols", request.symbols.join(","));
    url.searchParams.set("range", request.horizon);
    url.searchParams.set("interval", "1d");

    const payload = await this.get(url, sparkSchema, "history");
    if (payload.isErr()) {
      return err(payload.error);
    }

    const { result, error } = payload.value.spark;
    if (!result || result.length === 0) {
      return err(
        this.boundaryError(
          "history",
          error?.description ?? "Spark response carried no series.",
          "not_found",
        ),
      );
    }

    const history: PriceHistory = {};
    for (const entry of result) {
      const series = entry.response?.at(0);
      const timestamps = series?.timestamp ?? [];
      const closes = series?.indicators?.quote?.at(0)?.close ?? [];

      const bars: PriceBar[] = [];
      timestamps.forEach((timestamp, index) => {
        const close = closes[index];
        if (typeof close === "number") {
          bars.push({ date: epochSecondsToIsoDate(timestamp), close });
        }
      });

      if (bars.length > 0) {
        history[entry.symbol] = bars;
      }
    }

    return ok(history);
  }

  async fetchDividends(
    request: SymbolRequest,
  ): Promise<Result<DividendEvent[], AppBoundaryError>> {
    const url = new URL(
      `/v8/finance/chart/${encodeURIComponent(request.symbol)}`,
      this.baseUrl,
    );
    url.searchParams.set("range", "5y");
    url.searchParams.set("interval", "1mo");
    url.searchParams.set("events", "div");

    const payload = await this.get(url, chartSchema, "dividends");
    if (payload.isErr()) {
      return err(payload.error);
    }

    const { result, error } = payload.value.chart;
    const entry = result?.at(0);
    if (!entry) {
      return err(
        this.boundaryError(
          "dividends",
          error?.description ?? `No chart data for ${request.symbol}.`,
          "not_found",
        ),
      );
    }

    return ok(
      Object.values(entry.events?.dividends ?? {})
        .map((event) => ({
          date: epochSecondsToIsoDate(event.date),
          amount: event.amount,
        }))
        .sort((left, right) => left.date.localeCompare(right.date)),
    );
  }

  async fetchInsiderTransactions(
    request: SymbolRequest,
  ): Promise<Result<InsiderTransaction[], AppBoundaryError>> {
    const summary = await this.quoteSummary(
      request.symbol,
      ["insiderTransactions"],
      "insider",
    );
    if (summary.isErr()) {
      return err(summary.error);
    }

    const transactions = summary.value.insiderTransactions?.transactions ?? [];

    return ok(
      transactions.flatMap((transaction): InsiderTransaction[] => {
        if (transaction.shares === undefined || !transaction.transactionText) {
          return [];
        }

        return [
          {
            date:
              transaction.startDate === undefined
                ? undefined
                : epochSecondsToIsoDate(transaction.startDate),
            shares: transaction.shares,
            transactionText: transaction.transactionText,
          },
        ];
      }),
    );
  }

  async fetchNews(
    request: NewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>> {
    const url = new URL("/v1/finance/search", this.baseUrl);
    url.searchParams.set("q", request.symbol);
    url.searchParams.set("quotesCount", "0");
    url.searchParams.set("newsCount", String(request.limit));

    const payload = await this.get(url, searchSchema, "news");
    if (payload.isErr()) {
      return err(payload.error);
    }

    return ok(
      payload.value.news
        .flatMap((item): NewsHeadline[] => {
          const title = item.title?.trim();
          if (!title) {
            return [];
          }

          return [
            {
              symbol: request.symbol,
              title,
              publisher: item.publisher,
              url: item.link,
              publishedAt:
                item.providerPublishTime === undefined
                  ? undefined
                  : new Date(item.providerPublishTime * 1000),
            },
          ];
        })
        .slice(0, request.limit),
    );
  }

  private async quoteSummary(
    symbol: string,
    modules: string[],
    source: MarketDataSource,
  ): Promise<Result<QuoteSummary, AppBoundaryError>> {
    const url = new URL(
      `/v10/finance/quoteSummary/${encodeURIComponent(symbol)}`,
      this.baseUrl,
    );
    url.searchParams.set("modules", modules.join(","));

    const payload = await this.get(url, quoteSummarySchema, source);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const { result, error } = payload.value.quoteSummary;
    const summary = result?.at(0);
    if (!summary) {
      return err(
        this.boundaryError(
          source,
          error?.description ?? `No quote summary for ${symbol}.`,
          "not_found",
        ),
      );
    }

    return ok(summary);
  }

  private async get<S extends z.ZodTypeAny>(
    url: URL,
    schema: S,
    source: MarketDataSource,
  ): Promise<Result<z.output<S>, AppBoundaryError>> {
    const response = await this.httpClient.getJson(
      {
        url: url.toString(),
        headers: { Accept: "application/json" },
        timeoutMs: this.timeoutMs,
        retries: 2,
        retryDelayMs: 250,
      },
      schema,
    );

    if (response.isErr()) {
      return err(this.fromHttpError(response.error, source));
    }

    return ok(response.value);
  }

  private fromHttpError(
    failure: HttpClientError,
    source: MarketDataSource,
  ): AppBoundaryError {
    return {
      source,
      code: this.mapHttpCode(failure),
      provider: PROVIDER,
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(failure: HttpClientError): AppBoundaryError["code"] {
    if (failure.httpStatus === 429) {
      return "rate_limited";
    }

    if (failure.httpStatus === 401 || failure.httpStatus === 403) {
      return "auth_invalid";
    }

    if (failure.httpStatus === 404) {
      return "not_found";
    }

    switch (failure.code) {
      case "timeout":
        return "timeout";
      case "transport_error":
        return "transport_error";
      case "invalid_json":
        return "invalid_json";
      case "schema_mismatch":
        return "malformed_response";
      default:
        return "provider_error";
    }
  }

  private boundaryError(
    source: MarketDataSource,
    message: string,
    code: AppBoundaryError["code"],
  ): AppBoundaryError {
    return { source, code, provider: PROVIDER, message, retryable: false };
  }
}

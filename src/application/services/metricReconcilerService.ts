import type { Result } from "neverthrow";
import {
  toDegradationKind,
  type AppBoundaryError,
  type DegradationKind,
} from "../../core/entities/appError";
import type {
  DividendEvent,
  FundamentalSnapshot,
  InsiderTransaction,
  PriceBar,
} from "../../core/entities/market";
import type {
  DividendYieldSource,
  InsiderFlow,
  MetricRecord,
  MetricValue,
  UnavailableReason,
} from "../../core/entities/report";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

export type ReconcileRequest = {
  symbol: string;
  currentPrice: number;
  /** Aligned closes over the selected window, oldest first. */
  windowCloses: number[];
  /** Full fetched history, oldest first. */
  history: PriceBar[];
  /** Benchmark return over the same window; absent when the benchmark was degraded. */
  benchmarkReturnPct?: number;
};

export type ReconcilerSettings = {
  /** Reported yields at or above this are treated as percentages and divided by 100. */
  dividendYieldCorrectionThreshold: number;
  /** Fraction of shares outstanding used for the insider-flow estimate. */
  insiderEstimateRatio: number;
  highLookbackObservations: number;
};

export const DEFAULT_RECONCILER_SETTINGS: ReconcilerSettings = {
  dividendYieldCorrectionThreshold: 0.2,
  insiderEstimateRatio: 0.0005,
  highLookbackObservations: 252,
};

const TRADING_DAYS_PER_YEAR = 252;

const PURCHASE_PATTERN = /purchase|acquisition|buy/i;
const SALE_PATTERN = /sale|sell|sold|disposition/i;

const isPositive = (value: number | undefined): value is number =>
  value !== undefined && Number.isFinite(value) && value > 0;

const unavailable = (reason: UnavailableReason) =>
  ({ status: "unavailable", reason }) as const;

const derived = (value: number) =>
  ({ status: "available", value, source: "derived" }) as const;

export const periodReturnPct = (closes: number[]): number | undefined => {
  const first = closes.at(0);
  const last = closes.at(-1);

  if (!isPositive(first) || last === undefined) {
    return undefined;
  }

  return (last / first - 1) * 100;
};

/**
 * Annualized sample standard deviation of daily simple returns, in percent.
 */
export const annualizedVolatilityPct = (
  closes: number[],
): number | undefined => {
  const returns: number[] = [];

  for (let index = 1; index < closes.length; index += 1) {
    const previous = closes[index - 1];
    const current = closes[index];
    if (isPositive(previous) && current !== undefined) {
      returns.push(current / previous - 1);
    }
  }

  if (returns.length < 2) {
    return undefined;
  }

  const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
  const variance =
    returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) /
    (returns.length - 1);

  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
};

/**
 * Derives one metric record per symbol. Each field walks its own fallback chain, and a failed
 * upstream call only degrades the fields that read from it.
 */
export class MetricReconcilerService {
  constructor(
    private readonly gateway: MarketDataGatewayPort,
    private readonly settings: ReconcilerSettings = DEFAULT_RECONCILER_SETTINGS,
  ) {}

  async reconcile(request: ReconcileRequest): Promise<MetricRecord> {
    const { symbol, currentPrice } = request;

    const [fundamentals, dividends, insiders] = await Promise.all([
      this.gateway.fetchFundamentals({ symbol }),
      this.gateway.fetchDividends({ symbol }),
      this.gateway.fetchInsiderTransactions({ symbol }),
    ]);

    const snapshot = fundamentals.isOk() ? fundamentals.value : undefined;
    const snapshotFailure = this.failureOf(fundamentals);

    const periodReturn = periodReturnPct(request.windowCloses);
    const volatility = annualizedVolatilityPct(request.windowCloses);
    const high = this.periodHigh(request.history);

    return {
      symbol,
      currentPrice,
      trailingPe: this.priceToEarnings(
        snapshot?.trailingPe,
        snapshot?.trailingEps,
        currentPrice,
        snapshotFailure,
      ),
      forwardPe: this.priceToEarnings(
        snapshot?.forwardPe,
        snapshot?.forwardEps,
        currentPrice,
        snapshotFailure,
      ),
      dividendYield: this.dividendYield(
        snapshot,
        snapshotFailure,
        dividends,
        currentPrice,
      ),
      insiderFlow: this.insiderFlow(
        insiders,
        snapshot,
        snapshotFailure,
        currentPrice,
      ),
      periodHigh:
        high === undefined ? unavailable("insufficient_history") : derived(high),
      gapToHighPct:
        high === undefined || !isPositive(currentPrice)
          ? unavailable("insufficient_history")
          : derived((currentPrice / high - 1) * 100),
      targetUpsidePct: this.targetUpside(
        snapshot,
        snapshotFailure,
        currentPrice,
      ),
      periodReturnPct:
        periodReturn === undefined
          ? unavailable("insufficient_history")
          : derived(periodReturn),
      excessReturnPct:
        periodReturn === undefined || request.benchmarkReturnPct === undefined
          ? unavailable("data_unavailable")
          : derived(periodReturn - request.benchmarkReturnPct),
      volatilityPct:
        volatility === undefined
          ? unavailable("insufficient_history")
          : derived(volatility),
    };
  }

  private failureOf<T>(
    result: Result<T, AppBoundaryError>,
  ): DegradationKind | undefined {
    if (result.isOk()) {
      return undefined;
    }

    logger.debug(
      {
        source: result.error.source,
        code: result.error.code,
        reason: result.error.message,
      },
      "Metric input unavailable; dependent fields degrade",
    );
    return toDegradationKind(result.error);
  }

  /**
   * Reported ratio, else price over EPS. Never zero: a missing ratio is unavailable.
   */
  private priceToEarnings(
    ratio: number | undefined,
    eps: number | undefined,
    price: number,
    snapshotFailure: DegradationKind | undefined,
  ): MetricValue {
    if (snapshotFailure) {
      return unavailable(snapshotFailure);
    }

    if (isPositive(ratio)) {
      return { status: "available", value: ratio, source: "reported" };
    }

    if (isPositive(eps) && isPositive(price)) {
      return derived(price / eps);
    }

    return unavailable("not_reported");
  }

  private dividendYield(
    snapshot: FundamentalSnapshot | undefined,
    snapshotFailure: DegradationKind | undefined,
    dividends: Result<DividendEvent[], AppBoundaryError>,
    price: number,
  ): MetricValue<DividendYieldSource> {
    const reported = snapshot?.dividendYield;

    if (reported !== undefined && Number.isFinite(reported) && reported >= 0) {
      if (reported >= this.settings.dividendYieldCorrectionThreshold) {
        return {
          status: "available",
          value: reported / 100,
          source: "corrected",
        };
      }

      return { status: "available", value: reported, source: "reported" };
    }

    const lastDividend = dividends.isOk()
      ? this.latestDividend(dividends.value)
      : undefined;
    const amount = lastDividend ?? snapshot?.dividendAmount;

    if (isPositive(amount) && isPositive(price)) {
      return { status: "available", value: amount / price, source: "derived" };
    }

    const dividendFailure = this.failureOf(dividends);
    if (snapshotFailure && dividendFailure) {
      return unavailable(snapshotFailure);
    }

    return { status: "available", value: 0, source: "none" };
  }

  private latestDividend(events: DividendEvent[]): number | undefined {
    let latest: DividendEvent | undefined;

    for (const event of events) {
      if (latest === undefined || event.date >= latest.date) {
        latest = event;
      }
    }

    return latest?.amount;
  }

  /**
   * Provider feed when it has rows, otherwise a market-cap estimate that is flagged as such.
   */
  private insiderFlow(
    insiders: Result<InsiderTransaction[], AppBoundaryError>,
    snapshot: FundamentalSnapshot | undefined,
    snapshotFailure: DegradationKind | undefined,
    price: number,
  ): InsiderFlow {
    if (insiders.isOk() && insiders.value.length > 0) {
      let purchasedShares = 0;
      let soldShares = 0;
      let transactionCount = 0;

      for (const transaction of insiders.value) {
        const shares = Math.abs(transaction.shares);
        if (!Number.isFinite(shares)) {
          continue;
        }

        if (PURCHASE_PATTERN.test(transaction.transactionText)) {
          purchasedShares += shares;
          transactionCount += 1;
        } else if (SALE_PATTERN.test(transaction.transactionText)) {
          soldShares += shares;
          transactionCount += 1;
        }
      }

      return {
        status: "available",
        isEstimated: false,
        purchasedShares,
        soldShares,
        netShares: purchasedShares - soldShares,
        transactionCount,
      };
    }

    this.failureOf(insiders);

    const marketCap = snapshot?.marketCap;
    if (isPositive(marketCap) && isPositive(price)) {
      return {
        status: "available",
        isEstimated: true,
        netShares: Math.round(
          (marketCap / price) * this.settings.insiderEstimateRatio,
        ),
        basis: "market_cap",
      };
    }

    return unavailable(snapshotFailure ?? "not_reported");
  }

  private targetUpside(
    snapshot: FundamentalSnapshot | undefined,
    snapshotFailure: DegradationKind | undefined,
    price: number,
  ): MetricValue<"derived"> {
    if (snapshotFailure) {
      return unavailable(snapshotFailure);
    }

    const target = snapshot?.targetMeanPrice;
    if (!isPositive(target) || !isPositive(price)) {
      return unavailable("not_reported");
    }

    return derived((target / price - 1) * 100);
  }

  private periodHigh(history: PriceBar[]): number | undefined {
    const tail = history
      .slice(-this.settings.highLookbackObservations)
      .map((bar) => bar.close);

    if (tail.length === 0) {
      return undefined;
    }

    const high = Math.max(...tail);
    return high > 0 ? high : undefined;
  }
}

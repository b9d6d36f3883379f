import type { DegradationKind } from "./appError";
import type { Horizon, NewsHeadline } from "./market";

export type UnavailableReason =
  | DegradationKind
  | "not_reported"
  | "insufficient_history";

export type MetricValue<TSource extends string = "reported" | "derived"> =
  | { status: "available"; value: number; source: TSource }
  | { status: "unavailable"; reason: UnavailableReason };

export type DividendYieldSource = "reported" | "corrected" | "derived" | "none";

/**
 * Insider activity in shares. Provider-reported flow and the market-cap estimate share one field
 * but never one shape: consumers must branch on `isEstimated`.
 */
export type InsiderFlow =
  | {
      status: "available";
      isEstimated: false;
      purchasedShares: number;
      soldShares: number;
      netShares: number;
      transactionCount: number;
    }
  | {
      status: "available";
      isEstimated: true;
      netShares: number;
      basis: "market_cap";
    }
  | { status: "unavailable"; reason: UnavailableReason };

export type MetricRecord = {
  symbol: string;
  currentPrice: number;
  trailingPe: MetricValue;
  forwardPe: MetricValue;
  dividendYield: MetricValue<DividendYieldSource>;
  insiderFlow: InsiderFlow;
  periodHigh: MetricValue<"derived">;
  gapToHighPct: MetricValue<"derived">;
  targetUpsidePct: MetricValue<"derived">;
  periodReturnPct: MetricValue<"derived">;
  excessReturnPct: MetricValue<"derived">;
  volatilityPct: MetricValue<"derived">;
};

export type NormalizedPoint = {
  date: string;
  value: number;
};

export type NormalizedSeries = {
  symbol: string;
  points: NormalizedPoint[];
};

export type SeriesDegradationReason =
  | "no_history"
  | "empty_window"
  | "invalid_base";

export type SeriesDegradation = {
  symbol: string;
  reason: SeriesDegradationReason;
  detail?: string;
};

export type ResolutionFailureReason =
  | DegradationKind
  | "empty_input"
  | "no_match";

export type ResolutionFailure = {
  kind: "resolution_failure";
  query: string;
  reason: ResolutionFailureReason;
};

export type EmptyRequestFailure = {
  kind: "empty_request";
  message: string;
};

export type ReadyReport = {
  status: "ready";
  horizon: Horizon;
  benchmark: string;
  generatedAt: Date;
  symbols: string[];
  series: Record<string, NormalizedSeries>;
  metrics: Record<string, MetricRecord>;
  headlines: Record<string, NewsHeadline[]>;
  unresolved: ResolutionFailure[];
  degraded: SeriesDegradation[];
};

export type EmptyReport = {
  status: "empty";
  horizon: Horizon;
  generatedAt: Date;
  failure: EmptyRequestFailure;
  unresolved: ResolutionFailure[];
};

export type AnalyticsReport = ReadyReport | EmptyReport;

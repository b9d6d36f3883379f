/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "not_found";

export type MarketDataSource =
  | "search"
  | "fundamentals"
  | "history"
  | "dividends"
  | "insider"
  | "news";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: MarketDataSource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Failure kinds surfaced past the gateway boundary. Throttling and transient transport faults
 * are kept apart from missing data so callers can tell "try later" from "not there".
 */
export type DegradationKind = "provider_throttled" | "data_unavailable";

export const toDegradationKind = (error: AppBoundaryError): DegradationKind => {
  switch (error.code) {
    case "rate_limited":
    case "timeout":
    case "transport_error":
      return "provider_throttled";
    default:
      return "data_unavailable";
  }
};

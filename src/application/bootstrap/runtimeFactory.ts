import { AnalyticsFacadeService } from "../services/analyticsFacadeService";
import { MetricReconcilerService } from "../services/metricReconcilerService";
import { SymbolResolverService } from "../services/symbolResolverService";
import { TimeSeriesAlignerService } from "../services/timeSeriesAlignerService";
import {
  cacheTtls,
  env,
  marketDataProvider,
} from "../../shared/config/env";
import { AlphaVantageMarketDataGateway } from "../../infra/providers/alphavantage/alphaVantageMarketDataGateway";
import { CachedMarketDataGateway } from "../../infra/providers/cachedMarketDataGateway";
import { MockMarketDataGateway } from "../../infra/providers/mocks/mockMarketDataGateway";
import { YahooMarketDataGateway } from "../../infra/providers/yahoo/yahooMarketDataGateway";
import { SystemClock } from "../../infra/system/systemPorts";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Resolves the configured market-data adapter while preserving a mock fallback for local development.
 */
const createMarketDataGateway = (clock: ClockPort): MarketDataGatewayPort => {
  switch (marketDataProvider()) {
    case "alphavantage":
      return new AlphaVantageMarketDataGateway(
        env.ALPHA_VANTAGE_BASE_URL,
        env.ALPHA_VANTAGE_API_KEY,
        env.ALPHA_VANTAGE_TIMEOUT_MS,
      );
    case "mock":
      return new MockMarketDataGateway(clock);
    case "yahoo":
      return new YahooMarketDataGateway(
        env.YAHOO_BASE_URL,
        env.YAHOO_TIMEOUT_MS,
      );
  }
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root and one cache.
 */
export const createRuntime = () => {
  const clock = new SystemClock();

  const gateway = new CachedMarketDataGateway(
    createMarketDataGateway(clock),
    clock,
    cacheTtls(),
    env.CACHE_MAX_ENTRIES,
  );

  const resolver = new SymbolResolverService(gateway);
  const aligner = new TimeSeriesAlignerService(gateway);
  const reconciler = new MetricReconcilerService(gateway, {
    dividendYieldCorrectionThreshold: env.DIVIDEND_YIELD_CORRECTION_THRESHOLD,
    insiderEstimateRatio: env.INSIDER_ESTIMATE_RATIO,
    highLookbackObservations: env.HIGH_LOOKBACK_OBSERVATIONS,
  });

  const analyticsFacade = new AnalyticsFacadeService(
    resolver,
    aligner,
    reconciler,
    gateway,
    clock,
    {
      benchmark: env.BENCHMARK_SYMBOL,
      maxAssets: env.MAX_ASSETS,
      headlinesPerSymbol: env.HEADLINES_PER_SYMBOL,
    },
  );

  return { analyticsFacade };
};

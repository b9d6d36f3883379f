import type { Horizon, NewsHeadline } from "../../core/entities/market";
import type {
  AnalyticsReport,
  MetricRecord,
  ResolutionFailure,
} from "../../core/entities/report";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  periodReturnPct,
  type MetricReconcilerService,
} from "./metricReconcilerService";
import type { SymbolResolverService } from "./symbolResolverService";
import type { TimeSeriesAlignerService } from "./timeSeriesAlignerService";

export type ReportRequest = {
  names: string[];
  horizon: Horizon;
};

export type FacadeSettings = {
  benchmark: string;
  maxAssets: number;
  headlinesPerSymbol: number;
};

/**
 * Composes resolution, alignment and reconciliation into the read-only report handed to
 * presentation. Only an input with no resolvable asset ends without analytics.
 */
export class AnalyticsFacadeService {
  constructor(
    private readonly resolver: SymbolResolverService,
    private readonly aligner: TimeSeriesAlignerService,
    private readonly reconciler: MetricReconcilerService,
    private readonly gateway: MarketDataGatewayPort,
    private readonly clock: ClockPort,
    private readonly settings: FacadeSettings,
  ) {}

  async buildReport(request: ReportRequest): Promise<AnalyticsReport> {
    const names = request.names.slice(0, this.settings.maxAssets);
    if (request.names.length > names.length) {
      logger.warn(
        {
          maxAssets: this.settings.maxAssets,
          ignored: request.names.slice(this.settings.maxAssets),
        },
        "Too many assets requested; extra names ignored",
      );
    }

    const resolutions = await Promise.all(
      names.map((name) => this.resolver.resolve(name)),
    );

    const symbols: string[] = [];
    const unresolved: ResolutionFailure[] = [];

    for (const resolution of resolutions) {
      if (resolution.isOk()) {
        if (!symbols.includes(resolution.value)) {
          symbols.push(resolution.value);
        }
        continue;
      }

      // Blank fields are unused slots, not failed lookups.
      if (resolution.error.reason !== "empty_input") {
        unresolved.push(resolution.error);
      }
    }

    if (symbols.length === 0) {
      logger.info({ unresolved }, "No asset resolved; returning empty report");
      return {
        status: "empty",
        horizon: request.horizon,
        generatedAt: this.clock.now(),
        failure: {
          kind: "empty_request",
          message:
            unresolved.length > 0
              ? `None of the requested assets could be resolved: ${unresolved
                  .map((failure) => `'${failure.query}'`)
                  .join(", ")}.`
              : "No asset names were provided.",
        },
        unresolved,
      };
    }

    const { benchmark } = this.settings;
    const alignment = await this.aligner.align({
      symbols,
      benchmark,
      horizon: request.horizon,
    });

    const benchmarkCloses = alignment.aligned[benchmark]?.closes;
    const benchmarkReturnPct = benchmarkCloses
      ? periodReturnPct(benchmarkCloses)
      : undefined;

    const reportable = symbols.filter((symbol) => alignment.series[symbol]);

    const [records, headlines] = await Promise.all([
      Promise.all(
        reportable.map(async (symbol): Promise<MetricRecord | undefined> => {
          const aligned = alignment.aligned[symbol];
          const currentPrice = aligned?.closes.at(-1);
          if (!aligned || currentPrice === undefined) {
            return undefined;
          }

          return this.reconciler.reconcile({
            symbol,
            currentPrice,
            windowCloses: aligned.closes,
            history: aligned.history,
            benchmarkReturnPct,
          });
        }),
      ),
      Promise.all(reportable.map((symbol) => this.headlinesFor(symbol))),
    ]);

    const metrics: Record<string, MetricRecord> = {};
    for (const record of records) {
      if (record) {
        metrics[record.symbol] = record;
      }
    }

    const headlinesBySymbol: Record<string, NewsHeadline[]> = {};
    reportable.forEach((symbol, index) => {
      headlinesBySymbol[symbol] = headlines[index] ?? [];
    });

    logger.info(
      {
        symbols,
        horizon: request.horizon,
        seriesCount: Object.keys(alignment.series).length,
        degradedCount: alignment.degraded.length,
      },
      "Report built",
    );

    return {
      status: "ready",
      horizon: request.horizon,
      benchmark,
      generatedAt: this.clock.now(),
      symbols,
      series: alignment.series,
      metrics,
      headlines: headlinesBySymbol,
      unresolved,
      degraded: alignment.degraded,
    };
  }

  private async headlinesFor(symbol: string): Promise<NewsHeadline[]> {
    if (this.settings.headlinesPerSymbol === 0) {
      return [];
    }

    const news = await this.gateway.fetchNews({
      symbol,
      limit: this.settings.headlinesPerSymbol,
    });

    if (news.isErr()) {
      logger.warn(
        { symbol, code: news.error.code },
        "Headlines unavailable; continuing without them",
      );
      return [];
    }

    return news.value.slice(0, this.settings.headlinesPerSymbol);
  }
}

import type { NewsHeadline } from "../core/entities/market";
import type {
  AnalyticsReport,
  InsiderFlow,
  MetricRecord,
  MetricValue,
  ReadyReport,
  UnavailableReason,
} from "../core/entities/report";

const UNAVAILABLE = "—";

const describeReason = (reason: string): string => reason.replaceAll("_", " ");

const unavailable = (reason: UnavailableReason): string =>
  `${UNAVAILABLE} (${describeReason(reason)})`;

export const formatNumber = (value: number): string => value.toFixed(2);

/**
 * Signed percent for changes and returns: `+12.50%`, `-3.00%`.
 */
export const formatSignedPct = (value: number): string =>
  `${value > 0 ? "+" : ""}${value.toFixed(2)}%`;

export const formatMetric = <TSource extends string>(
  metric: MetricValue<TSource>,
  render: (value: number) => string = formatNumber,
): string => {
  if (metric.status === "unavailable") {
    return unavailable(metric.reason);
  }

  return metric.source === "reported"
    ? render(metric.value)
    : `${render(metric.value)} (${metric.source})`;
};

export const formatInsiderFlow = (flow: InsiderFlow): string => {
  if (flow.status === "unavailable") {
    return unavailable(flow.reason);
  }

  const net = `${flow.netShares > 0 ? "+" : ""}${flow.netShares} shares`;

  if (flow.isEstimated) {
    return `${net} (estimated from market cap)`;
  }

  return `${net} (bought ${flow.purchasedShares}, sold ${flow.soldShares} across ${flow.transactionCount} transactions)`;
};

const formatMetricRecord = (record: MetricRecord, benchmark: string): string[] => [
  `${record.symbol} @ ${formatNumber(record.currentPrice)}`,
  `- Trailing P/E: ${formatMetric(record.trailingPe)}`,
  `- Forward P/E: ${formatMetric(record.forwardPe)}`,
  `- Dividend yield: ${formatMetric(record.dividendYield, (value) => `${(value * 100).toFixed(2)}%`)}`,
  `- Insider flow: ${formatInsiderFlow(record.insiderFlow)}`,
  `- Period high: ${formatMetric(record.periodHigh)}`,
  `- Gap to high: ${formatMetric(record.gapToHighPct, formatSignedPct)}`,
  `- Target upside: ${formatMetric(record.targetUpsidePct, formatSignedPct)}`,
  `- Return: ${formatMetric(record.periodReturnPct, formatSignedPct)}`,
  `- Excess return vs ${benchmark}: ${formatMetric(record.excessReturnPct, formatSignedPct)}`,
  `- Volatility (annualized): ${formatMetric(record.volatilityPct, (value) => `${value.toFixed(2)}%`)}`,
];

const formatHeadline = (headline: NewsHeadline): string =>
  headline.publisher
    ? `- ${headline.title} (${headline.publisher})`
    : `- ${headline.title}`;

const formatReady = (report: ReadyReport): string[] => {
  const lines: string[] = [];

  lines.push("Performance (rebased to 100):");
  const seriesSymbols = Object.keys(report.series);
  if (seriesSymbols.length === 0) {
    lines.push("- none");
  }
  for (const symbol of seriesSymbols) {
    const last = report.series[symbol]?.points.at(-1);
    if (last) {
      const label = symbol === report.benchmark ? `${symbol} (benchmark)` : symbol;
      lines.push(
        `- ${label}: ${formatNumber(last.value)} (${formatSignedPct(last.value - 100)}) as of ${last.date}`,
      );
    }
  }

  for (const symbol of report.symbols) {
    const record = report.metrics[symbol];
    if (!record) {
      continue;
    }

    lines.push("");
    lines.push(...formatMetricRecord(record, report.benchmark));

    const headlines = report.headlines[symbol] ?? [];
    if (headlines.length > 0) {
      lines.push("Headlines:");
      lines.push(...headlines.map(formatHeadline));
    }
  }

  if (report.degraded.length > 0) {
    lines.push("");
    lines.push("Excluded series:");
    report.degraded.forEach((degradation) => {
      lines.push(
        `- ${degradation.symbol}: ${describeReason(degradation.reason)}${degradation.detail ? ` (${describeReason(degradation.detail)})` : ""}`,
      );
    });
  }

  return lines;
};

/**
 * Formats a report into a compact terminal view for manual inspection.
 */
export const formatReport = (report: AnalyticsReport): string => {
  const lines: string[] = [];

  lines.push(
    `Portfolio report (${report.horizon}) generated ${report.generatedAt.toISOString()}`,
  );

  if (report.status === "empty") {
    lines.push(report.failure.message);
  } else {
    lines.push(`Benchmark: ${report.benchmark}`);
    lines.push("");
    lines.push(...formatReady(report));
  }

  if (report.unresolved.length > 0) {
    lines.push("");
    lines.push("Unresolved:");
    report.unresolved.forEach((failure) => {
      lines.push(`- '${failure.query}': ${describeReason(failure.reason)}`);
    });
  }

  return lines.join("\n");
};

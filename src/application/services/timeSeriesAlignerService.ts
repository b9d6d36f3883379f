import { toDegradationKind } from "../../core/entities/appError";
import {
  HORIZON_DAYS,
  type Horizon,
  type PriceBar,
} from "../../core/entities/market";
import type {
  NormalizedSeries,
  SeriesDegradation,
} from "../../core/entities/report";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import { subtractDays } from "../../shared/utils/dateUtils";
import { logger } from "../../shared/logger/logger";

export type AlignRequest = {
  symbols: string[];
  benchmark: string;
  horizon: Horizon;
};

export type AlignedSymbol = {
  /** Forward-filled closes, one per calendar date. */
  closes: number[];
  /** Every sanitized bar fetched for the symbol, window or not. */
  history: PriceBar[];
};

export type AlignmentResult = {
  calendar: string[];
  series: Record<string, NormalizedSeries>;
  aligned: Record<string, AlignedSymbol>;
  degraded: SeriesDegradation[];
};

/**
 * Sorts by date, keeps the last bar reported for a date and drops unusable closes.
 * Zero closes survive so an invalid base is reported instead of silently skipped.
 */
export const sanitizeBars = (bars: PriceBar[]): PriceBar[] => {
  const byDate = new Map<string, PriceBar>();

  for (const bar of bars) {
    if (Number.isFinite(bar.close) && bar.close >= 0) {
      byDate.set(bar.date, bar);
    }
  }

  return Array.from(byDate.values()).sort((left, right) =>
    left.date.localeCompare(right.date),
  );
};

/**
 * Carries the last known close across calendar dates the symbol did not trade.
 * Returns null when the first calendar date has nothing to carry.
 */
export const forwardFill = (
  calendar: string[],
  bars: PriceBar[],
  seed: number | undefined,
): number[] | null => {
  const closesByDate = new Map(bars.map((bar) => [bar.date, bar.close]));
  const filled: number[] = [];
  let last = seed;

  for (const date of calendar) {
    const close = closesByDate.get(date);
    if (close !== undefined) {
      last = close;
    }

    if (last === undefined) {
      return null;
    }

    filled.push(last);
  }

  return filled;
};

const latestDate = (histories: Iterable<PriceBar[]>): string | undefined => {
  let latest: string | undefined;

  for (const bars of histories) {
    const last = bars.at(-1)?.date;
    if (last !== undefined && (latest === undefined || last > latest)) {
      latest = last;
    }
  }

  return latest;
};

const lastCloseBefore = (
  bars: PriceBar[],
  date: string,
): number | undefined => {
  let close: number | undefined;

  for (const bar of bars) {
    if (bar.date >= date) {
      break;
    }
    close = bar.close;
  }

  return close;
};

/**
 * First date on which every windowed series has a close to carry. A series priced before the
 * window opens can start at the window start; any other starts at its first in-window bar.
 */
const sharedStart = (
  windows: Map<string, PriceBar[]>,
  histories: Map<string, PriceBar[]>,
  windowStart: string | undefined,
): string | undefined => {
  let start = windowStart;

  for (const [symbol, inWindow] of windows) {
    const firstInWindow = inWindow.at(0)?.date;
    const seeded =
      windowStart !== undefined &&
      lastCloseBefore(histories.get(symbol) ?? [], windowStart) !== undefined;
    const seriesStart = seeded ? windowStart : firstInWindow;

    if (
      seriesStart !== undefined &&
      (start === undefined || seriesStart > start)
    ) {
      start = seriesStart;
    }
  }

  return start;
};

/**
 * Fetches every symbol plus the benchmark in one batch, slices the requested window, aligns all
 * series on one calendar and rebases each to 100 at the calendar's first date. The calendar opens
 * once every series is priced, so a short history narrows the window instead of being dropped.
 */
export class TimeSeriesAlignerService {
  constructor(private readonly gateway: MarketDataGatewayPort) {}

  async align(request: AlignRequest): Promise<AlignmentResult> {
    const requested = Array.from(
      new Set([...request.symbols, request.benchmark]),
    );

    // Always the full history: every horizon then shares one cached batch.
    const fetched = await this.gateway.fetchHistory({
      symbols: requested,
      horizon: "max",
    });

    if (fetched.isErr()) {
      const detail = toDegradationKind(fetched.error);
      logger.warn(
        { symbols: requested, code: fetched.error.code, detail },
        "History batch failed; every series degraded",
      );
      return {
        calendar: [],
        series: {},
        aligned: {},
        degraded: requested.map((symbol) => ({
          symbol,
          reason: "no_history",
          detail,
        })),
      };
    }

    const histories = new Map(
      requested.map((symbol) => [
        symbol,
        sanitizeBars(fetched.value[symbol] ?? []),
      ]),
    );

    const end = latestDate(histories.values());
    const windowStart =
      end === undefined || request.horizon === "max"
        ? undefined
        : subtractDays(end, HORIZON_DAYS[request.horizon]);

    const degraded: SeriesDegradation[] = [];
    const windows = new Map<string, PriceBar[]>();

    for (const symbol of requested) {
      const bars = histories.get(symbol) ?? [];
      if (bars.length === 0) {
        degraded.push({ symbol, reason: "no_history" });
        continue;
      }

      const inWindow =
        windowStart === undefined
          ? bars
          : bars.filter((bar) => bar.date >= windowStart);

      if (inWindow.length === 0) {
        degraded.push({ symbol, reason: "empty_window" });
        continue;
      }

      windows.set(symbol, inWindow);
    }

    const calendarStart = sharedStart(windows, histories, windowStart);
    const calendar = Array.from(
      new Set(
        Array.from(windows.values()).flatMap((bars) =>
          bars
            .filter(
              (bar) => calendarStart === undefined || bar.date >= calendarStart,
            )
            .map((bar) => bar.date),
        ),
      ),
    ).sort();

    const series: Record<string, NormalizedSeries> = {};
    const aligned: Record<string, AlignedSymbol> = {};

    for (const [symbol, inWindow] of windows) {
      const history = histories.get(symbol) ?? [];
      const seed =
        calendarStart === undefined
          ? undefined
          : lastCloseBefore(history, calendarStart);
      const closes = forwardFill(calendar, inWindow, seed);
      const base = closes?.at(0);

      if (!closes || base === undefined || !(base > 0)) {
        degraded.push({
          symbol,
          reason: "invalid_base",
          detail: base === 0 ? "first close is zero" : "no close at window start",
        });
        continue;
      }

      series[symbol] = {
        symbol,
        points: calendar.map((date, index) => ({
          date,
          value: ((closes[index] ?? base) / base) * 100,
        })),
      };
      aligned[symbol] = { closes, history };
    }

    if (degraded.length > 0) {
      logger.info({ degraded }, "Some series were excluded from alignment");
    }

    return { calendar, series, aligned, degraded };
  }
}

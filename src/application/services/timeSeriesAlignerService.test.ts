import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { PriceHistory } from "../../core/entities/market";
import type {
  HistoryRequest,
  MarketDataGatewayPort,
} from "../../core/ports/inboundPorts";
import {
  TimeSeriesAlignerService,
  forwardFill,
  sanitizeBars,
} from "./timeSeriesAlignerService";

const createGateway = (
  history: Result<PriceHistory, AppBoundaryError>,
) => {
  const requests: HistoryRequest[] = [];

  const gateway: MarketDataGatewayPort = {
    searchSymbols: async () => ok([]),
    fetchFundamentals: async () => ok({}),
    fetchHistory: async (request) => {
      requests.push(request);
      return history;
    },
    fetchDividends: async () => ok([]),
    fetchInsiderTransactions: async () => ok([]),
    fetchNews: async () => ok([]),
  };

  return { gateway, requests };
};

const HISTORY: PriceHistory = {
  AAPL: [
    { date: "2026-01-30", close: 95 },
    { date: "2026-02-02", close: 100 },
    { date: "2026-02-03", close: 125 },
    { date: "2026-03-02", close: 150 },
  ],
  MSFT: [
    { date: "2026-01-29", close: 200 },
    { date: "2026-02-03", close: 250 },
    { date: "2026-03-02", close: 300 },
  ],
  "^GSPC": [
    { date: "2026-02-02", close: 4000 },
    { date: "2026-03-02", close: 6000 },
  ],
};

describe("sanitizeBars", () => {
  it("sorts, keeps the last bar per date and drops unusable closes", () => {
    expect(
      sanitizeBars([
        { date: "2026-01-03", close: 11 },
        { date: "2026-01-02", close: 10 },
        { date: "2026-01-03", close: 12 },
        { date: "2026-01-04", close: Number.NaN },
        { date: "2026-01-05", close: -1 },
        { date: "2026-01-06", close: 0 },
      ]),
    ).toEqual([
      { date: "2026-01-02", close: 10 },
      { date: "2026-01-03", close: 12 },
      { date: "2026-01-06", close: 0 },
    ]);
  });
});

describe("forwardFill", () => {
  it("carries the last close over missing dates", () => {
    expect(
      forwardFill(
        ["2026-01-02", "2026-01-03", "2026-01-04"],
        [{ date: "2026-01-02", close: 10 }],
        undefined,
      ),
    ).toEqual([10, 10, 10]);
  });

  it("starts from the seed when the first date is missing", () => {
    expect(
      forwardFill(
        ["2026-01-02", "2026-01-03"],
        [{ date: "2026-01-03", close: 12 }],
        9,
      ),
    ).toEqual([9, 12]);
  });

  it("returns null when nothing can be carried into the first date", () => {
    expect(
      forwardFill(
        ["2026-01-02", "2026-01-03"],
        [{ date: "2026-01-03", close: 12 }],
        undefined,
      ),
    ).toBeNull();
  });
});

describe("TimeSeriesAlignerService", () => {
  it("fetches symbols and benchmark once at full depth", async () => {
    const { gateway, requests } = createGateway(ok(HISTORY));
    const aligner = new TimeSeriesAlignerService(gateway);

    await aligner.align({
      symbols: ["AAPL", "MSFT", "AAPL"],
      benchmark: "^GSPC",
      horizon: "1mo",
    });

    expect(requests).toEqual([
      { symbols: ["AAPL", "MSFT", "^GSPC"], horizon: "max" },
    ]);
  });

  it("rebases every series to 100 on one shared calendar", async () => {
    const { gateway } = createGateway(ok(HISTORY));
    const aligner = new TimeSeriesAlignerService(gateway);

    const result = await aligner.align({
      symbols: ["AAPL", "MSFT"],
      benchmark: "^GSPC",
      horizon: "1mo",
    });

    expect(result.calendar).toEqual(["2026-02-02", "2026-02-03", "2026-03-02"]);
    expect(result.degraded).toEqual([]);
    expect(result.series.AAPL?.points).toEqual([
      { date: "2026-02-02", value: 100 },
      { date: "2026-02-03", value: 125 },
      { date: "2026-03-02", value: 150 },
    ]);
    // MSFT did not trade on the first date; its pre-window close is carried in.
    expect(result.aligned.MSFT?.closes).toEqual([200, 250, 300]);
    expect(result.series.MSFT?.points.map((point) => point.value)).toEqual([
      100, 125, 150,
    ]);
    expect(result.series["^GSPC"]?.points.map((point) => point.value)).toEqual(
      [100, 100, 150],
    );
    expect(result.aligned.AAPL?.history).toHaveLength(4);
  });

  it("degrades missing, stale and unbased series without dropping the rest", async () => {
    const { gateway } = createGateway(
      ok({
        ...HISTORY,
        OLD: [{ date: "2025-01-02", close: 10 }],
        ZERO: [
          { date: "2026-02-02", close: 0 },
          { date: "2026-03-02", close: 5 },
        ],
        LATE: [{ date: "2026-02-03", close: 50 }],
      }),
    );
    const aligner = new TimeSeriesAlignerService(gateway);

    const result = await aligner.align({
      symbols: ["AAPL", "NONE", "OLD", "ZERO", "LATE"],
      benchmark: "^GSPC",
      horizon: "1mo",
    });

    // LATE first trades on 02-03, so the shared calendar opens there.
    expect(result.calendar).toEqual(["2026-02-03", "2026-03-02"]);
    expect(Object.keys(result.series).sort()).toEqual(["AAPL", "LATE", "^GSPC"]);
    expect(result.degraded).toEqual([
      { symbol: "NONE", reason: "no_history" },
      { symbol: "OLD", reason: "empty_window" },
      { symbol: "ZERO", reason: "invalid_base", detail: "first close is zero" },
    ]);
  });

  it("opens the max calendar at the shortest history instead of dropping it", async () => {
    const { gateway } = createGateway(
      ok({
        AAPL: [
          { date: "2021-01-04", close: 100 },
          { date: "2021-01-05", close: 150 },
        ],
        "^GSPC": [
          { date: "2020-01-02", close: 3000 },
          { date: "2021-01-04", close: 4000 },
          { date: "2021-01-05", close: 5000 },
        ],
      }),
    );
    const aligner = new TimeSeriesAlignerService(gateway);

    const result = await aligner.align({
      symbols: ["AAPL"],
      benchmark: "^GSPC",
      horizon: "max",
    });

    expect(result.calendar).toEqual(["2021-01-04", "2021-01-05"]);
    expect(result.degraded).toEqual([]);
    expect(result.series.AAPL?.points).toEqual([
      { date: "2021-01-04", value: 100 },
      { date: "2021-01-05", value: 150 },
    ]);
    expect(result.series["^GSPC"]?.points.map((point) => point.value)).toEqual(
      [100, 125],
    );
    expect(result.aligned["^GSPC"]?.history).toHaveLength(3);
  });

  it("keeps a symbol listed inside a bounded window", async () => {
    const { gateway } = createGateway(
      ok({
        NEWCO: [
          { date: "2024-06-03", close: 20 },
          { date: "2026-03-02", close: 30 },
        ],
        "^GSPC": [
          { date: "2020-01-02", close: 3000 },
          { date: "2024-06-03", close: 4000 },
          { date: "2026-03-02", close: 6000 },
        ],
      }),
    );
    const aligner = new TimeSeriesAlignerService(gateway);

    const result = await aligner.align({
      symbols: ["NEWCO"],
      benchmark: "^GSPC",
      horizon: "5y",
    });

    expect(result.calendar).toEqual(["2024-06-03", "2026-03-02"]);
    expect(result.degraded).toEqual([]);
    expect(result.series.NEWCO?.points.map((point) => point.value)).toEqual([
      100, 150,
    ]);
    expect(result.series["^GSPC"]?.points.map((point) => point.value)).toEqual(
      [100, 150],
    );
  });

  it("degrades every series when the batch fails", async () => {
    const { gateway } = createGateway(
      err({
        source: "history",
        code: "rate_limited",
        provider: "stub",
        message: "Too many requests",
        retryable: true,
      }),
    );
    const aligner = new TimeSeriesAlignerService(gateway);

    const result = await aligner.align({
      symbols: ["AAPL"],
      benchmark: "^GSPC",
      horizon: "1y",
    });

    expect(result.calendar).toEqual([]);
    expect(result.series).toEqual({});
    expect(result.degraded).toEqual([
      { symbol: "AAPL", reason: "no_history", detail: "provider_throttled" },
      { symbol: "^GSPC", reason: "no_history", detail: "provider_throttled" },
    ]);
  });
});

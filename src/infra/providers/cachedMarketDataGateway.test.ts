import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { CachedMarketDataGateway } from "./cachedMarketDataGateway";

class ManualClock implements ClockPort {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

const throttled: AppBoundaryError = {
  source: "search",
  code: "rate_limited",
  provider: "stub",
  message: "Too many requests",
  retryable: true,
  httpStatus: 429,
};

const ttls = {
  resolutionMs: 60_000,
  fundamentalsMs: 60_000,
  historyMs: 5_000,
  newsMs: 5_000,
};

const createInner = () => {
  const history: string[][] = [];
  const calls = { search: 0, history, fundamentals: 0 };

  const inner: MarketDataGatewayPort = {
    searchSymbols: async (request) => {
      calls.search += 1;
      return request.query === "throttled"
        ? err(throttled)
        : ok([{ symbol: "AAPL" }]);
    },
    fetchFundamentals: async () => {
      calls.fundamentals += 1;
      return ok({ trailingPe: 30 });
    },
    fetchHistory: async (request) => {
      calls.history.push(request.symbols);
      return ok({});
    },
    fetchDividends: async () => ok([]),
    fetchInsiderTransactions: async () => ok([]),
    fetchNews: async () => ok([]),
  };

  return { inner, calls };
};

describe("CachedMarketDataGateway", () => {
  it("serves repeat lookups from cache within the ttl", async () => {
    const clock = new ManualClock(0);
    const { inner, calls } = createInner();
    const gateway = new CachedMarketDataGateway(inner, clock, ttls);

    await gateway.searchSymbols({ query: "apple", limit: 1 });
    clock.advance(59_000);
    const second = await gateway.searchSymbols({ query: "apple", limit: 1 });

    expect(calls.search).toBe(1);
    expect(second.isOk() && second.value).toEqual([{ symbol: "AAPL" }]);
  });

  it("caches failures until they expire", async () => {
    const clock = new ManualClock(0);
    const { inner, calls } = createInner();
    const gateway = new CachedMarketDataGateway(inner, clock, ttls);

    const first = await gateway.searchSymbols({ query: "throttled", limit: 1 });
    const second = await gateway.searchSymbols({
      query: "throttled",
      limit: 1,
    });
    clock.advance(60_000);
    await gateway.searchSymbols({ query: "throttled", limit: 1 });

    expect(first.isErr()).toBe(true);
    expect(second.isErr() && second.error.code).toBe("rate_limited");
    expect(calls.search).toBe(2);
  });

  it("shares one history entry regardless of symbol order", async () => {
    const clock = new ManualClock(0);
    const { inner, calls } = createInner();
    const gateway = new CachedMarketDataGateway(inner, clock, ttls);

    await gateway.fetchHistory({ symbols: ["MSFT", "AAPL"], horizon: "max" });
    await gateway.fetchHistory({
      symbols: ["AAPL", "MSFT", "AAPL"],
      horizon: "max",
    });

    expect(calls.history).toEqual([["AAPL", "MSFT"]]);
  });

  it("keys entries per kind and per symbol", async () => {
    const clock = new ManualClock(0);
    const { inner, calls } = createInner();
    const gateway = new CachedMarketDataGateway(inner, clock, ttls);

    await gateway.fetchFundamentals({ symbol: "AAPL" });
    await gateway.fetchFundamentals({ symbol: "MSFT" });
    await gateway.fetchFundamentals({ symbol: "AAPL" });

    expect(calls.fundamentals).toBe(2);
  });
});

import { describe, expect, it } from "vitest";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { ResultCache, cacheKey } from "./resultCache";

class ManualClock implements ClockPort {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

describe("ResultCache", () => {
  it("invokes the fetch function once while the entry is live", async () => {
    const clock = new ManualClock(Date.parse("2026-03-02T10:00:00.000Z"));
    const cache = new ResultCache<string>(clock);
    let calls = 0;
    const fetch = async () => {
      calls += 1;
      return `value-${calls}`;
    };

    const first = await cache.getOrFetch("k", 60_000, fetch);
    clock.advance(59_999);
    const second = await cache.getOrFetch("k", 60_000, fetch);

    expect(first).toBe("value-1");
    expect(second).toBe("value-1");
    expect(calls).toBe(1);
  });

  it("refetches once the ttl has elapsed", async () => {
    const clock = new ManualClock(0);
    const cache = new ResultCache<string>(clock);
    let calls = 0;
    const fetch = async () => {
      calls += 1;
      return `value-${calls}`;
    };

    await cache.getOrFetch("k", 1_000, fetch);
    clock.advance(1_000);
    const refreshed = await cache.getOrFetch("k", 1_000, fetch);

    expect(refreshed).toBe("value-2");
    expect(calls).toBe(2);
  });

  it("caches failure markers like any other value", async () => {
    const clock = new ManualClock(0);
    const cache = new ResultCache<{ ok: boolean }>(clock);
    let calls = 0;
    const fetch = async () => {
      calls += 1;
      return { ok: false };
    };

    await cache.getOrFetch("bad", 5_000, fetch);
    const again = await cache.getOrFetch("bad", 5_000, fetch);

    expect(again).toEqual({ ok: false });
    expect(calls).toBe(1);
  });

  it("does not store rejected fetches", async () => {
    const cache = new ResultCache<string>(new ManualClock(0));

    await expect(
      cache.getOrFetch("k", 1_000, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const value = await cache.getOrFetch("k", 1_000, async () => "recovered");
    expect(value).toBe("recovered");
  });

  it("evicts the oldest insertion when full", async () => {
    const cache = new ResultCache<number>(new ManualClock(0), 2);

    await cache.getOrFetch("a", 10_000, async () => 1);
    await cache.getOrFetch("b", 10_000, async () => 2);
    await cache.getOrFetch("c", 10_000, async () => 3);

    expect(cache.size).toBe(2);
    const refetched = await cache.getOrFetch("a", 10_000, async () => 10);
    expect(refetched).toBe(10);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new ResultCache<number>(new ManualClock(0), 0)).toThrow(
      "maxEntries",
    );
  });
});

describe("cacheKey", () => {
  it("is stable for equal arguments and distinct across kinds", () => {
    expect(cacheKey("history", ["AAPL", "^GSPC"], "max")).toBe(
      cacheKey("history", ["AAPL", "^GSPC"], "max"),
    );
    expect(cacheKey("history", "AAPL")).not.toBe(cacheKey("fundamentals", "AAPL"));
    expect(cacheKey("search", "apple", 1).startsWith("search:")).toBe(true);
  });
});

import { afterEach, describe, expect, it } from "vitest";
import { YahooMarketDataGateway } from "./yahooMarketDataGateway";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

const respondWith = (body: unknown, status = 200): void => {
  setFetch(async () => new Response(JSON.stringify(body), { status }));
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const createGateway = () =>
  new YahooMarketDataGateway("https://query.example.test", 500);

// 2026-01-05T14:30:00Z and 2026-01-06T14:30:00Z
const MONDAY = 1767623400;
const TUESDAY = MONDAY + 86_400;

describe("YahooMarketDataGateway", () => {
  it("maps search quotes to symbol matches", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify({
          quotes: [
            { symbol: "AAPL", exchange: "NMS", shortname: "Apple Inc." },
            { exchange: "NMS" },
          ],
        }),
        { status: 200 },
      );
    });

    const result = await createGateway().searchSymbols({
      query: "apple",
      limit: 1,
    });

    expect(requestedUrl).toContain("/v1/finance/search");
    expect(requestedUrl).toContain("q=apple");
    expect(requestedUrl).toContain("quotesCount=1");
    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      { symbol: "AAPL", exchange: "NMS", name: "Apple Inc." },
    ]);
  });

  it("returns one history batch and omits symbols without bars", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify({
          spark: {
            result: [
              {
                symbol: "AAPL",
                response: [
                  {
                    timestamp: [MONDAY, TUESDAY],
                    indicators: { quote: [{ close: [180.5, null] }] },
                  },
                ],
              },
              { symbol: "ZZZZ", response: [] },
            ],
            error: null,
          },
        }),
        { status: 200 },
      );
    });

    const result = await createGateway().fetchHistory({
      symbols: ["AAPL", "ZZZZ"],
      horizon: "max",
    });

    expect(requestedUrl).toContain("symbols=AAPL%2CZZZZ");
    expect(requestedUrl).toContain("range=max");
    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      AAPL: [{ date: "2026-01-05", close: 180.5 }],
    });
  });

  it("reports an empty spark result as not found", async () => {
    respondWith({
      spark: { result: [], error: { code: "Not Found", description: "none" } },
    });

    const result = await createGateway().fetchHistory({
      symbols: ["ZZZZ"],
      horizon: "1y",
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("Expected history lookup to fail");
    }
    expect(result.error.code).toBe("not_found");
    expect(result.error.source).toBe("history");
    expect(result.error.message).toBe("none");
  });

  it("unwraps raw-valued fundamentals and drops empty fields", async () => {
    respondWith({
      quoteSummary: {
        result: [
          {
            summaryDetail: {
              trailingPE: { raw: 29.4, fmt: "29.40" },
              forwardPE: {},
              dividendYield: { raw: 0.0045 },
              marketCap: 3_000_000_000_000,
            },
            defaultKeyStatistics: {
              forwardPE: { raw: 26.1 },
              trailingEps: { raw: 6.1 },
              lastDividendValue: { raw: 0.25 },
            },
            financialData: { targetMeanPrice: { raw: 210 } },
          },
        ],
        error: null,
      },
    });

    const result = await createGateway().fetchFundamentals({ symbol: "AAPL" });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      trailingPe: 29.4,
      forwardPe: 26.1,
      trailingEps: 6.1,
      dividendAmount: 0.25,
      dividendYield: 0.0045,
      marketCap: 3_000_000_000_000,
      targetMeanPrice: 210,
    });
  });

  it("maps 429 responses to rate_limited after retries", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      return new Response("{}", { status: 429 });
    });

    const gateway = new YahooMarketDataGateway("https://query.example.test", 500);
    const result = await gateway.fetchFundamentals({ symbol: "AAPL" });

    expect(attempts).toBe(3);
    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("Expected throttled lookup to fail");
    }
    expect(result.error).toMatchObject({
      source: "fundamentals",
      code: "rate_limited",
      provider: "yahoo",
      httpStatus: 429,
      retryable: true,
    });
  });

  it("returns dividend events sorted by date", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify({
          chart: {
            result: [
              {
                events: {
                  dividends: {
                    [String(TUESDAY)]: { amount: 0.26, date: TUESDAY },
                    [String(MONDAY)]: { amount: 0.25, date: MONDAY },
                  },
                },
              },
            ],
            error: null,
          },
        }),
        { status: 200 },
      );
    });

    const result = await createGateway().fetchDividends({ symbol: "AAPL" });

    expect(requestedUrl).toContain("/v8/finance/chart/AAPL");
    expect(requestedUrl).toContain("events=div");
    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      { date: "2026-01-05", amount: 0.25 },
      { date: "2026-01-06", amount: 0.26 },
    ]);
  });

  it("keeps insider rows that carry both shares and text", async () => {
    respondWith({
      quoteSummary: {
        result: [
          {
            insiderTransactions: {
              transactions: [
                {
                  shares: { raw: 1200 },
                  transactionText: "Sale at price 180.00 per share.",
                  startDate: { raw: MONDAY },
                },
                { shares: { raw: 50 } },
              ],
            },
          },
        ],
        error: null,
      },
    });

    const result = await createGateway().fetchInsiderTransactions({
      symbol: "AAPL",
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      {
        date: "2026-01-05",
        shares: 1200,
        transactionText: "Sale at price 180.00 per share.",
      },
    ]);
  });

  it("maps news results to headlines for the symbol", async () => {
    respondWith({
      quotes: [],
      news: [
        {
          title: " Apple ships new chips ",
          publisher: "Wire",
          link: "https://news.example.test/a",
          providerPublishTime: MONDAY,
        },
        { title: "   " },
      ],
    });

    const result = await createGateway().fetchNews({ symbol: "AAPL", limit: 3 });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      {
        symbol: "AAPL",
        title: "Apple ships new chips",
        publisher: "Wire",
        url: "https://news.example.test/a",
        publishedAt: new Date(MONDAY * 1000),
      },
    ]);
  });
});

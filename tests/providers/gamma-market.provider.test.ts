import { describe, it } from "node:test";
import assert from "node:assert";
import axios, { type InternalAxiosRequestConfig } from "axios";
import { createRetryPolicy } from "../../src/lib/retry";
import { GammaMarketProvider } from "../../src/providers/gamma-market.provider";
import { GammaResolutionFeed } from "../../src/providers/gamma-resolution.feed";
import { eventSlug, parseGammaMarket, resolvedWinner } from "../../src/providers/gamma-parsing";
import { MarketDataError, NetworkError } from "../../src/errors/app.errors";

const T0 = Date.UTC(2024, 5, 1, 12, 0, 0);

const mockLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

type Route = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/** Axios instance answered in process by `route` */
const fakeHttp = (route: Route) => {
  const requests: string[] = [];
  const http = axios.create({
    baseURL: "https://gamma.test",
    adapter: async (config) => {
      requests.push(config.url ?? "");
      const { status, data } = route(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, requests };
};

const rawMarket = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  conditionId: "0xcond-btc",
  question: "Bitcoin Up or Down - June 1, 8:00AM-8:15AM ET",
  clobTokenIds: '["yes-btc", "no-btc"]',
  outcomePrices: '["0.48", "0.51"]',
  endDate: "2024-06-01T12:10:00Z",
  liquidityNum: 2500,
  volume24hr: "1200.5",
  active: true,
  closed: false,
  ...overrides,
});

describe("Gamma parsing", () => {
  it("should build the event slug from the 15-minute interval start", () => {
    assert.strictEqual(eventSlug("BTC", T0 + 7 * 60_000), "btc-updown-15m-1717243200");
  });

  it("should parse a market entry with JSON-encoded arrays", () => {
    assert.deepStrictEqual(parseGammaMarket(rawMarket(), "btc", T0), {
      marketId: "0xcond-btc",
      question: "Bitcoin Up or Down - June 1, 8:00AM-8:15AM ET",
      asset: "BTC",
      yesPrice: 0.48,
      noPrice: 0.51,
      yesLiquidity: 2500,
      noLiquidity: 2500,
      volume24h: 1200.5,
      minutesToResolution: 10,
      yesTokenId: "yes-btc",
      noTokenId: "no-btc",
    });
  });

  it("should accept plain arrays", () => {
    const snapshot = parseGammaMarket(
      rawMarket({ clobTokenIds: ["y", "n"], outcomePrices: [0.3, 0.7] }),
      "eth",
      T0,
    );
    assert.strictEqual(snapshot.yesTokenId, "y");
    assert.strictEqual(snapshot.noPrice, 0.7);
  });

  it("should name the field that failed", () => {
    const fails = (raw: unknown, message: string) =>
      assert.throws(
        () => parseGammaMarket(raw, "btc", T0),
        (err: unknown) => err instanceof MarketDataError && err.message === message,
      );
    fails("nope", "Market entry is not an object");
    fails(rawMarket({ conditionId: "" }), "Missing conditionId");
    fails(rawMarket({ closed: true }), "Market is closed");
    fails(rawMarket({ clobTokenIds: '["only-one"]' }), "Invalid clobTokenIds");
    fails(rawMarket({ outcomePrices: '["1.2", "0.1"]' }), "Invalid outcomePrices");
    fails(rawMarket({ endDate: "soon" }), "Invalid endDate");
    fails(rawMarket({ endDate: "2024-06-01T11:59:00Z" }), "Market past its end date");
  });

  it("should read the winner of a settled market", () => {
    assert.strictEqual(resolvedWinner(rawMarket({ closed: true, outcomePrices: '["1", "0"]' })), "YES");
    assert.strictEqual(resolvedWinner(rawMarket({ closed: true, outcomePrices: '["0", "1"]' })), "NO");
    assert.strictEqual(resolvedWinner(rawMarket({ closed: true, outcomePrices: '["0.6", "0.4"]' })), null);
    assert.strictEqual(resolvedWinner(rawMarket({ outcomePrices: '["1", "0"]' })), null);
  });
});

describe("GammaMarketProvider", () => {
  it("should fetch each asset's current event and drop bad entries", async () => {
    const { http, requests } = fakeHttp((config) =>
      config.url === "/events/slug/btc-updown-15m-1717243200"
        ? { status: 200, data: { markets: [rawMarket(), rawMarket({ conditionId: "" })] } }
        : { status: 404, data: { error: "not found" } },
    );
    const provider = new GammaMarketProvider({
      baseUrl: "https://gamma.test",
      assets: ["btc", "eth"],
      http,
      logger: mockLogger,
      now: () => T0,
    });

    const snapshots = await provider.fetchSnapshots();

    assert.deepStrictEqual(requests, [
      "/events/slug/btc-updown-15m-1717243200",
      "/events/slug/eth-updown-15m-1717243200",
    ]);
    assert.deepStrictEqual(
      snapshots.map((s) => s.marketId),
      ["0xcond-btc"],
    );
  });

  it("should keep healthy assets when one fails", async () => {
    const { http } = fakeHttp((config) => {
      if (config.url?.startsWith("/events/slug/eth")) {
        throw new Error("Request failed with status code 503");
      }
      return { status: 200, data: { markets: [rawMarket()] } };
    });
    const provider = new GammaMarketProvider({
      baseUrl: "https://gamma.test",
      assets: ["btc", "eth"],
      http,
      retryPolicy: createRetryPolicy({ maxAttempts: 2 }),
      logger: mockLogger,
      now: () => T0,
      sleep: async () => {},
    });

    assert.strictEqual((await provider.fetchSnapshots()).length, 1);
  });

  it("should throw when every asset fails", async () => {
    let calls = 0;
    const { http } = fakeHttp(() => {
      calls += 1;
      throw new Error("Request failed with status code 503");
    });
    const provider = new GammaMarketProvider({
      baseUrl: "https://gamma.test",
      assets: ["btc"],
      http,
      retryPolicy: createRetryPolicy({ maxAttempts: 2 }),
      logger: mockLogger,
      now: () => T0,
      sleep: async () => {},
    });

    await assert.rejects(
      provider.fetchSnapshots(),
      (err: unknown) =>
        err instanceof NetworkError &&
        err.message ===
          "Gamma market fetch failed for every asset: Error: Request failed with status code 503",
    );
    assert.strictEqual(calls, 2);
  });
});

describe("GammaResolutionFeed", () => {
  it("should report settled markets only", async () => {
    const { http } = fakeHttp((config) => {
      const id: unknown = config.params?.condition_ids;
      if (id === "m-yes") {
        return {
          status: 200,
          data: [rawMarket({ conditionId: "m-yes", closed: true, outcomePrices: '["1", "0"]' })],
        };
      }
      if (id === "m-broken") throw new Error("Request failed with status code 404");
      return { status: 200, data: [rawMarket({ conditionId: "m-open" })] };
    });
    const feed = new GammaResolutionFeed({
      baseUrl: "https://gamma.test",
      http,
      retryPolicy: createRetryPolicy({ maxAttempts: 1 }),
      logger: mockLogger,
    });

    assert.deepStrictEqual(await feed.pollResolutions(["m-yes", "m-open", "m-broken"]), [
      { marketId: "m-yes", winningSide: "YES" },
    ]);
  });

  it("should not call out without markets", async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: [] }));
    const feed = new GammaResolutionFeed({ baseUrl: "https://gamma.test", http });
    assert.deepStrictEqual(await feed.pollResolutions([]), []);
    assert.deepStrictEqual(requests, []);
  });
});

import { describe, it } from "node:test";
import assert from "node:assert";
import type { SettledTrade } from "../../src/core/types";
import { HistoricalTracker } from "../../src/ensemble/historical-tracker";

const trade = (overrides: Partial<SettledTrade>): SettledTrade => ({
  marketId: "m1",
  asset: "BTC",
  strategy: "arbitrage",
  pnl: 1,
  outcome: "win",
  settledAt: 0,
  ...overrides,
});

describe("HistoricalTracker", () => {
  it("should tally trades per strategy and per asset", () => {
    const tracker = new HistoricalTracker();
    tracker.record(trade({ pnl: 0.35 }));
    tracker.record(trade({ asset: "ETH", pnl: -2.25, outcome: "loss" }));

    assert.deepStrictEqual(tracker.strategyStats("arbitrage"), {
      trades: 2,
      wins: 1,
      losses: 1,
      totalPnl: 0.35 + -2.25,
      winRate: 0.5,
    });
    assert.deepStrictEqual(tracker.assetStats("ETH"), {
      trades: 1,
      wins: 0,
      losses: 1,
      totalPnl: -2.25,
      winRate: 0,
    });
  });

  it("should return empty stats for unseen keys", () => {
    assert.deepStrictEqual(new HistoricalTracker().strategyStats("directional"), {
      trades: 0,
      wins: 0,
      losses: 0,
      totalPnl: 0,
      winRate: 0,
    });
  });

  it("should assume a coin flip below the minimum trade count", () => {
    const tracker = new HistoricalTracker();
    tracker.record(trade({ outcome: "loss", pnl: -1 }));
    assert.ok(Math.abs(tracker.combinedWinRate("arbitrage", "BTC") - 0.5) < 1e-12);
    assert.strictEqual(tracker.confidenceMultiplier("arbitrage", "BTC"), 1);
  });

  it("should blend strategy and asset win rates 60/40", () => {
    const tracker = new HistoricalTracker({ minTrades: 2 });
    tracker.record(trade({ asset: "BTC" }));
    tracker.record(trade({ asset: "BTC", outcome: "loss", pnl: -1 }));
    tracker.record(trade({ asset: "ETH" }));
    tracker.record(trade({ asset: "ETH" }));
    // strategy 3/4, BTC 1/2
    assert.ok(Math.abs(tracker.combinedWinRate("arbitrage", "BTC") - (0.75 * 0.6 + 0.5 * 0.4)) < 1e-12);
  });

  it("should penalise a poor record once enough trades exist", () => {
    const tracker = new HistoricalTracker();
    for (let i = 0; i < 5; i++) {
      tracker.record(trade({ strategy: "directional", outcome: "loss", pnl: -1 }));
    }
    assert.strictEqual(tracker.confidenceMultiplier("directional", "BTC"), 0.8);
    assert.strictEqual(tracker.confidenceMultiplier("directional", "SOL"), 0.8);
  });

  it("should not penalise a winning record", () => {
    const tracker = new HistoricalTracker();
    for (let i = 0; i < 5; i++) tracker.record(trade({}));
    assert.strictEqual(tracker.confidenceMultiplier("arbitrage", "BTC"), 1);
  });
});

import { describe, it } from "node:test";
import assert from "node:assert";
import { PortfolioLedger, utcDay } from "../../src/core/portfolio";

const NOON = Date.UTC(2024, 5, 1, 12, 0, 0);
const NEXT_DAY = Date.UTC(2024, 5, 2, 0, 0, 1);

const recordingLogger = () => {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      info: (msg: string) => lines.push(`info ${msg}`),
      warn: (msg: string) => lines.push(`warn ${msg}`),
      error: (msg: string) => lines.push(`error ${msg}`),
      debug: () => {},
    },
  };
};

describe("PortfolioLedger", () => {
  it("should start at the configured balance", () => {
    const ledger = new PortfolioLedger({ startingBalanceUsd: 100 }, undefined, NOON);
    const state = ledger.getState(NOON);
    assert.strictEqual(state.availableBalance, 100);
    assert.strictEqual(state.totalBalance, 100);
    assert.strictEqual(state.winRateToday, 0);
    assert.strictEqual(state.day, "2024-06-01");
    assert.strictEqual(utcDay(NEXT_DAY), "2024-06-02");
  });

  it("should book fills against available balance and asset exposure", () => {
    const ledger = new PortfolioLedger({}, undefined, NOON);
    ledger.recordFill({ marketId: "m1", asset: "BTC", cost: 2.25 }, NOON);
    ledger.recordFill({ marketId: "m1", asset: "BTC", cost: 2.5 }, NOON);
    const state = ledger.getState(NOON);
    assert.strictEqual(state.tradesToday, 2);
    assert.strictEqual(state.availableBalance, 95.25);
    assert.strictEqual(state.totalBalance, 100);
    assert.deepStrictEqual(state.assetExposure, { BTC: 4.75 });
    assert.deepStrictEqual(state.openPositions, [{ marketId: "m1", asset: "BTC", cost: 4.75 }]);
  });

  it("should release exposure and realise pnl on settlement", () => {
    const ledger = new PortfolioLedger({}, undefined, NOON);
    ledger.recordFill({ marketId: "m1", asset: "BTC", cost: 2.25 }, NOON);
    assert.strictEqual(ledger.settle("m1", 2.75, NOON), "win");
    const state = ledger.getState(NOON);
    assert.strictEqual(state.availableBalance, 102.75);
    assert.strictEqual(state.totalBalance, 102.75);
    assert.strictEqual(state.dailyPnl, 2.75);
    assert.strictEqual(state.winsToday, 1);
    assert.strictEqual(state.winRateToday, 100);
    assert.deepStrictEqual(state.assetExposure, {});
    assert.deepStrictEqual(state.openPositions, []);
  });

  it("should ignore settlement of unknown markets", () => {
    const ledger = new PortfolioLedger({}, undefined, NOON);
    assert.strictEqual(ledger.settle("missing", 5, NOON), null);
    assert.strictEqual(ledger.getState(NOON).totalBalance, 100);
  });

  it("should count failed attempts separately from trades", () => {
    const ledger = new PortfolioLedger({}, undefined, NOON);
    ledger.recordFailedAttempt(NOON);
    const state = ledger.getState(NOON);
    assert.strictEqual(state.failedAttemptsToday, 1);
    assert.strictEqual(state.tradesToday, 0);
  });

  it("should reset daily counters at UTC midnight and log the summary", () => {
    const { lines, logger } = recordingLogger();
    const ledger = new PortfolioLedger({}, logger, NOON);
    ledger.recordFill({ marketId: "m1", asset: "BTC", cost: 2.25 }, NOON);
    ledger.settle("m1", -2.25, NOON);

    const state = ledger.getState(NEXT_DAY);
    assert.strictEqual(state.day, "2024-06-02");
    assert.strictEqual(state.tradesToday, 0);
    assert.strictEqual(state.lossesToday, 0);
    assert.strictEqual(state.dailyPnl, 0);
    assert.strictEqual(state.totalBalance, 97.75);
    assert.deepStrictEqual(lines, [
      "info [Portfolio] Daily summary 2024-06-01: trades=1 wins=0 losses=1 win_rate=0.0% pnl=$-2.25 roi=-2.25% balance=$100.00->$97.75 failed=0 conservative=false",
    ]);
    assert.strictEqual(ledger.rollover(NEXT_DAY), false);
  });

  it("should enter conservative mode below 20% and leave it at 50%", () => {
    const ledger = new PortfolioLedger({ startingBalanceUsd: 100 }, undefined, NOON);
    ledger.recordFill({ marketId: "m1", asset: "BTC", cost: 90 }, NOON);
    ledger.settle("m1", -85, NOON);
    assert.strictEqual(ledger.getState(NOON).conservativeMode, true);
    assert.strictEqual(ledger.requiredConfidence(55), 80);
    assert.strictEqual(ledger.requiredConfidence(90), 90);

    ledger.recordFill({ marketId: "m2", asset: "ETH", cost: 1 }, NOON);
    ledger.settle("m2", 30, NOON);
    assert.strictEqual(ledger.getState(NOON).totalBalance, 45);
    assert.strictEqual(ledger.getState(NOON).conservativeMode, true);

    ledger.recordFill({ marketId: "m3", asset: "ETH", cost: 1 }, NOON);
    ledger.settle("m3", 5, NOON);
    assert.strictEqual(ledger.getState(NOON).conservativeMode, false);
    assert.strictEqual(ledger.requiredConfidence(55), 55);
  });
});

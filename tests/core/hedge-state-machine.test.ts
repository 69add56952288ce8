import { describe, it } from "node:test";
import assert from "node:assert";
import {
  HedgeStateMachine,
  lockedPnl,
  settleLeg,
  type LegFill,
} from "../../src/core/hedge-state-machine";
import { PositionStateError } from "../../src/errors/app.errors";

const close = (actual: number, expected: number): void => {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
};

const fill = (overrides: Partial<LegFill> = {}): LegFill => ({
  side: "NO",
  price: 0.43,
  shares: 5,
  timestamp: 1_000,
  ...overrides,
});

const openNo = (machine: HedgeStateMachine, leg: Partial<LegFill> = {}) =>
  machine.openLeg1({ marketId: "m1", asset: "BTC", strategy: "flash_crash", fill: fill(leg) });

describe("HedgeStateMachine", () => {
  describe("openLeg1", () => {
    it("should move NONE to LEG1_OPEN", () => {
      const machine = new HedgeStateMachine();
      assert.strictEqual(machine.state("m1"), "NONE");
      const position = openNo(machine);
      assert.strictEqual(position.state, "LEG1_OPEN");
      assert.strictEqual(machine.state("m1"), "LEG1_OPEN");
      assert.strictEqual(machine.openCount, 1);
    });

    it("should never hold two open positions for one market", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      assert.throws(() => openNo(machine, { side: "YES" }), PositionStateError);
      assert.strictEqual(machine.openCount, 1);
      assert.strictEqual(machine.get("m1")?.leg1.side, "NO");
    });

    it("should refuse an empty fill", () => {
      const machine = new HedgeStateMachine();
      assert.throws(() => openNo(machine, { shares: 0 }), PositionStateError);
      assert.strictEqual(machine.state("m1"), "NONE");
    });
  });

  describe("hedgeOpportunity", () => {
    it("should offer the opposite side once yes + no <= threshold", () => {
      const machine = new HedgeStateMachine({ hedgeThreshold: 0.95 });
      openNo(machine);
      const intent = machine.hedgeOpportunity("m1", 0.5, 0.43);
      assert.ok(intent);
      assert.strictEqual(intent.side, "YES");
      assert.strictEqual(intent.price, 0.5);
      assert.strictEqual(intent.shares, 5);
      close(intent.priceSum, 0.93);
      close(intent.expectedProfitPerShare, 0.07);
    });

    it("should include the threshold itself", () => {
      const machine = new HedgeStateMachine({ hedgeThreshold: 0.95 });
      openNo(machine, { price: 0.4 });
      assert.ok(machine.hedgeOpportunity("m1", 0.5, 0.45));
    });

    it("should wait while the sum is above the threshold", () => {
      const machine = new HedgeStateMachine({ hedgeThreshold: 0.95 });
      openNo(machine);
      assert.strictEqual(machine.hedgeOpportunity("m1", 0.5, 0.46), null);
    });

    it("should refuse a pair that would cost $1 or more", () => {
      const machine = new HedgeStateMachine({ hedgeThreshold: 0.95 });
      openNo(machine, { price: 0.6 });
      assert.strictEqual(machine.hedgeOpportunity("m1", 0.45, 0.45), null);
    });

    it("should return null without an open position", () => {
      assert.strictEqual(new HedgeStateMachine().hedgeOpportunity("m1", 0.4, 0.4), null);
    });
  });

  describe("completeHedge", () => {
    it("should lock the profit and drop the position", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      const hedged = machine.completeHedge(
        "m1",
        fill({ side: "YES", price: 0.5, timestamp: 2_000, orderId: "o-2" }),
        0.5,
        0.43,
      );
      assert.strictEqual(hedged.state, "HEDGED");
      assert.strictEqual(hedged.leg2.orderId, "o-2");
      close(hedged.combinedCost, 0.93);
      close(hedged.expectedProfitPerShare, 0.07);
      close(hedged.lockedPnl, 0.35);
      assert.strictEqual(machine.state("m1"), "NONE");
    });

    it("should reject a second leg on the same side", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      assert.throws(
        () => machine.completeHedge("m1", fill({ side: "NO" }), 0.5, 0.43),
        PositionStateError,
      );
    });

    it("should reject a fill that breaks the sub-dollar pair and keep leg 1", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      assert.throws(
        () => machine.completeHedge("m1", fill({ side: "YES", price: 0.58 }), 0.5, 0.43),
        PositionStateError,
      );
      assert.strictEqual(machine.state("m1"), "LEG1_OPEN");
    });

    it("should settle a refused hedge fill alongside leg 1", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      machine.recordStrayLeg("m1", fill({ side: "YES", price: 0.58 }));
      assert.strictEqual(machine.state("m1"), "LEG1_OPEN");
      assert.strictEqual(machine.hedgeOpportunity("m1", 0.5, 0.4), null);

      const expired = machine.expire("m1", "YES");
      assert.ok(expired);
      assert.strictEqual(expired.strayLegs.length, 1);
      close(expired.pnl, -0.05);
    });

    it("should reject a hedge without leg 1", () => {
      assert.throws(
        () => new HedgeStateMachine().completeHedge("m1", fill({ side: "YES" }), 0.5, 0.43),
        /has no open leg 1/,
      );
    });
  });

  describe("recordPairedEntry", () => {
    it("should go straight to HEDGED without holding anything", () => {
      const machine = new HedgeStateMachine();
      const hedged = machine.recordPairedEntry({
        marketId: "m2",
        asset: "ETH",
        strategy: "arbitrage",
        yesFill: fill({ side: "YES", price: 0.5 }),
        noFill: fill({ side: "NO", price: 0.43 }),
      });
      assert.strictEqual(hedged.state, "HEDGED");
      close(hedged.lockedPnl, 0.35);
      assert.strictEqual(machine.openCount, 0);
    });

    it("should refuse a market with an open leg", () => {
      const machine = new HedgeStateMachine();
      openNo(machine);
      assert.throws(
        () =>
          machine.recordPairedEntry({
            marketId: "m1",
            asset: "BTC",
            strategy: "arbitrage",
            yesFill: fill({ side: "YES" }),
            noFill: fill(),
          }),
        PositionStateError,
      );
    });
  });

  describe("expire", () => {
    it("should settle an unhedged leg at resolution", () => {
      const machine = new HedgeStateMachine();
      openNo(machine, { side: "YES", price: 0.45 });
      const expired = machine.expire("m1", "YES");
      assert.ok(expired);
      assert.strictEqual(expired.state, "EXPIRED");
      close(expired.pnl, 2.75);
      assert.strictEqual(machine.openCount, 0);
    });

    it("should return null for markets without a position", () => {
      assert.strictEqual(new HedgeStateMachine().expire("m1", "NO"), null);
    });
  });

  describe("reservations", () => {
    it("should let one evaluation hold a market at a time", () => {
      const machine = new HedgeStateMachine();
      assert.strictEqual(machine.reserve("m1"), true);
      assert.strictEqual(machine.reserve("m1"), false);
      assert.strictEqual(machine.isReserved("m1"), true);
      machine.release("m1");
      assert.strictEqual(machine.reserve("m1"), true);
    });
  });

  describe("settlement math", () => {
    it("should pay 1 - price per share on a win and lose the stake otherwise", () => {
      close(settleLeg(fill({ side: "YES", price: 0.45 }), "YES"), 2.75);
      close(settleLeg(fill({ side: "YES", price: 0.45 }), "NO"), -2.25);
    });

    it("should lock in the smaller leg's payout", () => {
      close(
        lockedPnl(fill({ side: "YES", price: 0.5, shares: 5 }), fill({ side: "NO", price: 0.43, shares: 4 })),
        4 - (2.5 + 1.72),
      );
    });
  });
});

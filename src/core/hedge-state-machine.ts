/**
 * Hedge State Machine
 *
 * Two-leg position lifecycle, one entry per market:
 *
 *   NONE ──openLeg1──▶ LEG1_OPEN ──completeHedge──▶ HEDGED   (removed)
 *                          │
 *                          └──────expire──────────▶ EXPIRED  (removed)
 *
 * Only LEG1_OPEN positions are held. Terminal records are returned to the
 * caller for settlement and never stored. A market with an order in flight
 * is reserved so a concurrent evaluation cannot open a second leg.
 */

import { PositionStateError } from "../errors/app.errors";
import { oppositeSide, type OutcomeSide } from "./types";

// Float slack for the inclusive hedge threshold comparison
const PRICE_EPSILON = 1e-9;

export interface HedgeStateMachineConfig {
  /** Second leg fires when yes + no <= this */
  hedgeThreshold: number;
}

export const DEFAULT_HEDGE_CONFIG: HedgeStateMachineConfig = {
  hedgeThreshold: 0.95,
};

export interface LegFill {
  side: OutcomeSide;
  /** Average fill price */
  price: number;
  /** Filled shares, never the requested size */
  shares: number;
  timestamp: number;
  orderId?: string;
}

interface PositionBase {
  marketId: string;
  asset: string;
  /** What opened leg 1: "flash_crash", "ensemble", ... */
  strategy: string;
  leg1: LegFill;
}

export interface Leg1OpenPosition extends PositionBase {
  state: "LEG1_OPEN";
  /** Opposite-side fills that did not complete the pair; settled with leg 1 */
  strayLegs: LegFill[];
}

export interface HedgedPosition extends PositionBase {
  state: "HEDGED";
  leg2: LegFill;
  /** leg1.price + leg2.price, always < 1 */
  combinedCost: number;
  /** 1 - (yes + no) at the moment the hedge triggered */
  expectedProfitPerShare: number;
  /** Worst-case payout minus total cost of both legs */
  lockedPnl: number;
}

export interface ExpiredPosition extends PositionBase {
  state: "EXPIRED";
  winningSide: OutcomeSide;
  strayLegs: LegFill[];
  /** Leg 1 plus every stray leg */
  pnl: number;
}

export type Position = Leg1OpenPosition | HedgedPosition | ExpiredPosition;
export type PositionState = "NONE" | Position["state"];

export interface HedgeIntent {
  marketId: string;
  side: OutcomeSide;
  price: number;
  /** Shares to match leg 1 */
  shares: number;
  priceSum: number;
  expectedProfitPerShare: number;
}

/**
 * P&L of an unhedged leg at resolution
 */
export function settleLeg(leg: LegFill, winningSide: OutcomeSide): number {
  return leg.side === winningSide
    ? (1 - leg.price) * leg.shares
    : -leg.price * leg.shares;
}

/**
 * Worst-case P&L of a two-leg position: the smaller leg always pays out
 */
export function lockedPnl(leg1: LegFill, leg2: LegFill): number {
  const cost = leg1.price * leg1.shares + leg2.price * leg2.shares;
  return Math.min(leg1.shares, leg2.shares) - cost;
}

export class HedgeStateMachine {
  private readonly config: HedgeStateMachineConfig;
  private readonly open = new Map<string, Leg1OpenPosition>();
  private readonly inFlight = new Set<string>();

  constructor(config: Partial<HedgeStateMachineConfig> = {}) {
    this.config = { ...DEFAULT_HEDGE_CONFIG, ...config };
  }

  get hedgeThreshold(): number {
    return this.config.hedgeThreshold;
  }

  state(marketId: string): PositionState {
    return this.open.has(marketId) ? "LEG1_OPEN" : "NONE";
  }

  get(marketId: string): Leg1OpenPosition | undefined {
    return this.open.get(marketId);
  }

  openPositions(): Leg1OpenPosition[] {
    return [...this.open.values()];
  }

  get openCount(): number {
    return this.open.size;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IN-FLIGHT RESERVATION
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Claim the market for one order round trip. Fails if another evaluation
   * already holds it.
   */
  reserve(marketId: string): boolean {
    if (this.inFlight.has(marketId)) return false;
    this.inFlight.add(marketId);
    return true;
  }

  release(marketId: string): void {
    this.inFlight.delete(marketId);
  }

  isReserved(marketId: string): boolean {
    return this.inFlight.has(marketId);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TRANSITIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * NONE → LEG1_OPEN
   */
  openLeg1(params: {
    marketId: string;
    asset: string;
    strategy: string;
    fill: LegFill;
  }): Leg1OpenPosition {
    const { marketId, fill } = params;
    if (this.open.has(marketId)) {
      throw new PositionStateError(
        `Market ${marketId} already has an open position`,
        marketId,
      );
    }
    if (fill.shares <= 0) {
      throw new PositionStateError(
        `Cannot open leg 1 on ${marketId} with ${fill.shares} filled shares`,
        marketId,
      );
    }
    const position: Leg1OpenPosition = {
      state: "LEG1_OPEN",
      marketId,
      asset: params.asset,
      strategy: params.strategy,
      leg1: { ...fill },
      strayLegs: [],
    };
    this.open.set(marketId, position);
    return position;
  }

  /**
   * Hedge intent for a LEG1_OPEN market when `yes + no <= threshold` and
   * the resulting pair would cost less than $1. Null otherwise, and null for
   * a position already holding a stray leg.
   */
  hedgeOpportunity(
    marketId: string,
    yesPrice: number,
    noPrice: number,
  ): HedgeIntent | null {
    const position = this.open.get(marketId);
    if (!position || position.strayLegs.length > 0) return null;

    const priceSum = yesPrice + noPrice;
    if (priceSum > this.config.hedgeThreshold + PRICE_EPSILON) return null;

    const side = oppositeSide(position.leg1.side);
    const price = side === "YES" ? yesPrice : noPrice;
    if (price <= 0 || position.leg1.price + price >= 1) return null;

    return {
      marketId,
      side,
      price,
      shares: position.leg1.shares,
      priceSum,
      expectedProfitPerShare: Math.max(0, 1 - priceSum),
    };
  }

  /**
   * LEG1_OPEN → HEDGED. The position leaves the active set.
   */
  completeHedge(
    marketId: string,
    fill: LegFill,
    yesPrice: number,
    noPrice: number,
  ): HedgedPosition {
    const position = this.requireOpen(marketId);
    if (fill.side === position.leg1.side) {
      throw new PositionStateError(
        `Hedge leg for ${marketId} must be ${oppositeSide(position.leg1.side)}`,
        marketId,
      );
    }
    const combinedCost = position.leg1.price + fill.price;
    if (combinedCost >= 1) {
      throw new PositionStateError(
        `Hedge for ${marketId} would cost ${combinedCost.toFixed(4)} >= 1`,
        marketId,
      );
    }

    this.open.delete(marketId);
    return {
      ...position,
      state: "HEDGED",
      leg2: { ...fill },
      combinedCost,
      expectedProfitPerShare: Math.max(0, 1 - (yesPrice + noPrice)),
      lockedPnl: lockedPnl(position.leg1, fill),
    };
  }

  /**
   * Keep an opposite-side fill that `completeHedge` refused. The position
   * stays LEG1_OPEN and settles the stray leg with leg 1 at resolution.
   */
  recordStrayLeg(marketId: string, fill: LegFill): Leg1OpenPosition {
    const position = this.requireOpen(marketId);
    position.strayLegs.push({ ...fill });
    return position;
  }

  /**
   * NONE → HEDGED in one step, for paired (buy_both) entries
   */
  recordPairedEntry(params: {
    marketId: string;
    asset: string;
    strategy: string;
    yesFill: LegFill;
    noFill: LegFill;
  }): HedgedPosition {
    const { marketId, yesFill, noFill } = params;
    if (this.open.has(marketId)) {
      throw new PositionStateError(
        `Market ${marketId} already has an open position`,
        marketId,
      );
    }
    const combinedCost = yesFill.price + noFill.price;
    return {
      state: "HEDGED",
      marketId,
      asset: params.asset,
      strategy: params.strategy,
      leg1: { ...yesFill },
      leg2: { ...noFill },
      combinedCost,
      expectedProfitPerShare: Math.max(0, 1 - combinedCost),
      lockedPnl: lockedPnl(yesFill, noFill),
    };
  }

  /**
   * LEG1_OPEN → EXPIRED on market resolution. Returns null when the market
   * holds no open position.
   */
  expire(marketId: string, winningSide: OutcomeSide): ExpiredPosition | null {
    const position = this.open.get(marketId);
    if (!position) return null;
    this.open.delete(marketId);
    const pnl = position.strayLegs.reduce(
      (sum, leg) => sum + settleLeg(leg, winningSide),
      settleLeg(position.leg1, winningSide),
    );
    return {
      ...position,
      state: "EXPIRED",
      winningSide,
      pnl,
    };
  }

  private requireOpen(marketId: string): Leg1OpenPosition {
    const position = this.open.get(marketId);
    if (!position) {
      throw new PositionStateError(
        `Market ${marketId} has no open leg 1`,
        marketId,
      );
    }
    return position;
  }
}

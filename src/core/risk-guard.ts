/**
 * Risk Guard - pre-trade authorisation
 *
 * Checks run in a fixed order and the first failure blocks the order:
 *
 * 1. Circuit breaker - the last N settled trades were all losses
 * 2. Daily loss limit - dailyPnl < -maxDailyLossUsd
 * 3. Daily trade limit - tradesToday + orders > maxDailyTrades
 * 4. Asset exposure - the order would push one asset above its share of
 *    total balance
 * 5. Liquidity / slippage - projected slippage or depth from the order
 *    book; "no data" lets the order through at reduced priority
 *
 * A block is a result, not an exception. Each check is callable on its own
 * against a PortfolioState / RiskStats fixture.
 */

import type { Logger } from "../utils/logger.util";
import type { PortfolioLedger, PortfolioState } from "./portfolio";
import type { RiskStats } from "./risk-stats";
import type { OrderBookProvider, OutcomeSide, SettledTrade } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export interface RiskGuardConfig {
  /** Settled trades inspected by the circuit breaker. Default: 5 */
  circuitBreakerLosses: number;
  /** Default: 10 USD */
  maxDailyLossUsd: number;
  /** Default: 50 */
  maxDailyTrades: number;
  /** Percent of total balance per underlying asset. Default: 30 */
  maxAssetExposurePct: number;
  /** Percent, |avg fill - mid| / mid. Default: 5 */
  maxSlippagePct: number;
}

export const DEFAULT_RISK_GUARD_CONFIG: RiskGuardConfig = {
  circuitBreakerLosses: 5,
  maxDailyLossUsd: 10,
  maxDailyTrades: 50,
  maxAssetExposurePct: 30,
  maxSlippagePct: 5,
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type RiskCheckName =
  | "circuit_breaker"
  | "daily_loss"
  | "daily_trades"
  | "asset_exposure"
  | "liquidity";

export interface RiskCheckResult {
  check: RiskCheckName;
  allowed: boolean;
  reason?: string;
  severity?: "INFO" | "WARNING" | "CRITICAL";
  /** Passed on missing data rather than a real measurement */
  degraded?: boolean;
}

export interface TradeIntent {
  marketId: string;
  asset: string;
  tokenId: string;
  side: OutcomeSide;
  price: number;
  shares: number;
  /** price * shares */
  notional: number;
}

export interface RiskDecision {
  allowed: boolean;
  /** Results of the checks that ran, in order */
  results: RiskCheckResult[];
  blockedBy?: RiskCheckResult;
  priority: "normal" | "reduced";
  caveats: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// RISK GUARD
// ═══════════════════════════════════════════════════════════════════════════

export class RiskGuard {
  private readonly config: RiskGuardConfig;
  private readonly portfolio: PortfolioLedger;
  private readonly stats: RiskStats;
  private readonly orderBook?: OrderBookProvider;
  private readonly logger?: Logger;

  constructor(params: {
    portfolio: PortfolioLedger;
    stats: RiskStats;
    orderBook?: OrderBookProvider;
    config?: Partial<RiskGuardConfig>;
    logger?: Logger;
  }) {
    this.config = { ...DEFAULT_RISK_GUARD_CONFIG, ...params.config };
    this.portfolio = params.portfolio;
    this.stats = params.stats;
    this.orderBook = params.orderBook;
    this.logger = params.logger;
  }

  checkCircuitBreaker(stats: RiskStats = this.stats): RiskCheckResult {
    const n = this.config.circuitBreakerLosses;
    if (stats.lastAllLosses(n)) {
      return {
        check: "circuit_breaker",
        allowed: false,
        reason: `Circuit breaker: last ${n} settled trades were losses`,
        severity: "CRITICAL",
      };
    }
    return { check: "circuit_breaker", allowed: true };
  }

  checkDailyLoss(state: PortfolioState): RiskCheckResult {
    if (state.dailyPnl < -this.config.maxDailyLossUsd) {
      return {
        check: "daily_loss",
        allowed: false,
        reason: `Daily loss $${(-state.dailyPnl).toFixed(2)} exceeds limit $${this.config.maxDailyLossUsd.toFixed(2)}`,
        severity: "CRITICAL",
      };
    }
    return { check: "daily_loss", allowed: true };
  }

  /**
   * `orders` is how many fills the decision will book; a paired entry needs
   * two free slots.
   */
  checkDailyTrades(state: PortfolioState, orders = 1): RiskCheckResult {
    const max = this.config.maxDailyTrades;
    if (state.tradesToday + orders > max) {
      return {
        check: "daily_trades",
        allowed: false,
        reason:
          orders === 1
            ? `Daily trade limit reached (${state.tradesToday}/${max})`
            : `Daily trade limit: ${orders} orders would exceed ${max} (${state.tradesToday} today)`,
        severity: "WARNING",
      };
    }
    return { check: "daily_trades", allowed: true };
  }

  checkAssetExposure(
    state: PortfolioState,
    asset: string,
    notional: number,
  ): RiskCheckResult {
    if (state.totalBalance <= 0) {
      return {
        check: "asset_exposure",
        allowed: false,
        reason: "No balance to size exposure against",
        severity: "CRITICAL",
      };
    }
    const current = state.assetExposure[asset] ?? 0;
    const projectedPct = ((current + notional) / state.totalBalance) * 100;
    if (projectedPct > this.config.maxAssetExposurePct) {
      return {
        check: "asset_exposure",
        allowed: false,
        reason: `${asset} exposure would be ${projectedPct.toFixed(1)}% > ${this.config.maxAssetExposurePct}% of balance`,
        severity: "WARNING",
      };
    }
    return { check: "asset_exposure", allowed: true };
  }

  /**
   * Liquidity check against the order book. Provider errors propagate: the
   * caller skips the market for this tick.
   */
  async checkLiquidity(tokenId: string, shares: number): Promise<RiskCheckResult> {
    if (!this.orderBook) {
      return {
        check: "liquidity",
        allowed: true,
        degraded: true,
        reason: "No order book provider configured",
        severity: "INFO",
      };
    }

    const estimate = await this.orderBook.estimateSlippage(tokenId, shares);
    if (estimate.kind === "no_data") {
      return {
        check: "liquidity",
        allowed: true,
        degraded: true,
        reason: `No order book data (${estimate.reason})`,
        severity: "INFO",
      };
    }

    if (estimate.availableDepth < shares) {
      return {
        check: "liquidity",
        allowed: false,
        reason: `Insufficient depth (need ${shares.toFixed(2)}, available ${estimate.availableDepth.toFixed(2)})`,
        severity: "WARNING",
      };
    }
    const slippagePct = estimate.slippage * 100;
    if (slippagePct > this.config.maxSlippagePct) {
      return {
        check: "liquidity",
        allowed: false,
        reason: `Excessive slippage ${slippagePct.toFixed(2)}% > ${this.config.maxSlippagePct}%`,
        severity: "WARNING",
      };
    }
    return { check: "liquidity", allowed: true };
  }

  /**
   * Run every check in order, stopping at the first block
   */
  async evaluate(intent: TradeIntent, now: number = Date.now()): Promise<RiskDecision> {
    return this.run([intent], now);
  }

  /**
   * Authorise both legs of a paired entry at once: one trade slot per leg,
   * exposure against the combined notional, liquidity on each token.
   */
  async evaluatePair(
    yes: TradeIntent,
    no: TradeIntent,
    now: number = Date.now(),
  ): Promise<RiskDecision> {
    return this.run([yes, no], now);
  }

  private async run(
    legs: readonly [TradeIntent, ...TradeIntent[]],
    now: number,
  ): Promise<RiskDecision> {
    const intent = legs[0];
    const state = this.portfolio.getState(now);
    const notional = legs.reduce((sum, leg) => sum + leg.notional, 0);
    const results: RiskCheckResult[] = [];

    const syncChecks: Array<() => RiskCheckResult> = [
      () => this.checkCircuitBreaker(),
      () => this.checkDailyLoss(state),
      () => this.checkDailyTrades(state, legs.length),
      () => this.checkAssetExposure(state, intent.asset, notional),
    ];
    for (const check of syncChecks) {
      const result = check();
      results.push(result);
      if (!result.allowed) return this.blocked(legs, results, result);
    }

    for (const leg of legs) {
      const liquidity = await this.checkLiquidity(leg.tokenId, leg.shares);
      results.push(liquidity);
      if (!liquidity.allowed) return this.blocked(legs, results, liquidity);
    }

    const caveats = results
      .filter((r) => r.degraded && r.reason)
      .map((r) => `${r.check}: ${r.reason}`);
    if (caveats.length > 0) {
      this.logger?.debug(
        `[RiskGuard] ${intent.marketId} allowed at reduced priority: ${caveats.join("; ")}`,
      );
    }
    return {
      allowed: true,
      results,
      priority: caveats.length > 0 ? "reduced" : "normal",
      caveats,
    };
  }

  /**
   * Feed a settled trade into the breaker history and the ledger
   */
  recordOutcome(trade: SettledTrade, now: number = Date.now()): void {
    this.stats.record(trade.outcome);
    this.portfolio.settle(trade.marketId, trade.pnl, now);
    if (this.stats.consecutiveLosses >= this.config.circuitBreakerLosses) {
      this.logger?.warn(
        `[RiskGuard] Circuit breaker tripped after ${this.stats.consecutiveLosses} consecutive losses`,
      );
    }
  }

  private blocked(
    legs: readonly [TradeIntent, ...TradeIntent[]],
    results: RiskCheckResult[],
    blockedBy: RiskCheckResult,
  ): RiskDecision {
    const { asset, marketId } = legs[0];
    const sides = legs.map((leg) => leg.side).join("+");
    this.logger?.info(
      `[RiskGuard] Blocked ${asset} ${sides} ${marketId} (${blockedBy.check}): ${blockedBy.reason ?? "blocked"}`,
    );
    return {
      allowed: false,
      results,
      blockedBy,
      priority: "normal",
      caveats: [],
    };
  }
}

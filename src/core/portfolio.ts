/**
 * Portfolio Ledger
 *
 * Single owner of PortfolioState. Balances move on every fill and every
 * settlement; daily counters roll over at UTC midnight, with a summary
 * logged for the day that just ended.
 *
 * Conservative mode: when total balance falls below 20% of the starting
 * balance, trades need at least 80 confidence until the balance recovers to
 * 50% of the start.
 */

import type { Logger } from "../utils/logger.util";
import type { TradeOutcome } from "./types";

export interface PortfolioConfig {
  startingBalanceUsd: number;
  conservativeEnterFraction: number;
  conservativeExitFraction: number;
  conservativeMinConfidence: number;
}

export const DEFAULT_PORTFOLIO_CONFIG: PortfolioConfig = {
  startingBalanceUsd: 100,
  conservativeEnterFraction: 0.2,
  conservativeExitFraction: 0.5,
  conservativeMinConfidence: 80,
};

export interface OpenExposure {
  marketId: string;
  asset: string;
  /** USD spent on this market's open legs */
  cost: number;
}

export interface PortfolioState {
  availableBalance: number;
  totalBalance: number;
  openPositions: OpenExposure[];
  dailyPnl: number;
  tradesToday: number;
  winsToday: number;
  lossesToday: number;
  failedAttemptsToday: number;
  /** USD per asset symbol */
  assetExposure: Record<string, number>;
  /** 0-100; 0 when nothing settled today */
  winRateToday: number;
  conservativeMode: boolean;
  /** UTC date, YYYY-MM-DD */
  day: string;
}

export const utcDay = (timestamp: number): string =>
  new Date(timestamp).toISOString().slice(0, 10);

export class PortfolioLedger {
  private readonly config: PortfolioConfig;
  private readonly logger?: Logger;

  private availableBalance: number;
  private totalBalance: number;
  private readonly open = new Map<string, OpenExposure>();
  private readonly exposure = new Map<string, number>();
  private dailyPnl = 0;
  private dailyStartBalance: number;
  private tradesToday = 0;
  private winsToday = 0;
  private lossesToday = 0;
  private failedAttemptsToday = 0;
  private conservativeMode = false;
  private day: string;

  constructor(
    config: Partial<PortfolioConfig> = {},
    logger?: Logger,
    now: number = Date.now(),
  ) {
    this.config = { ...DEFAULT_PORTFOLIO_CONFIG, ...config };
    this.logger = logger;
    this.availableBalance = this.config.startingBalanceUsd;
    this.totalBalance = this.config.startingBalanceUsd;
    this.dailyStartBalance = this.config.startingBalanceUsd;
    this.day = utcDay(now);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════

  getState(now: number = Date.now()): PortfolioState {
    this.rollover(now);
    const settled = this.winsToday + this.lossesToday;
    return {
      availableBalance: this.availableBalance,
      totalBalance: this.totalBalance,
      openPositions: [...this.open.values()].map((p) => ({ ...p })),
      dailyPnl: this.dailyPnl,
      tradesToday: this.tradesToday,
      winsToday: this.winsToday,
      lossesToday: this.lossesToday,
      failedAttemptsToday: this.failedAttemptsToday,
      assetExposure: Object.fromEntries(this.exposure),
      winRateToday: settled > 0 ? (this.winsToday / settled) * 100 : 0,
      conservativeMode: this.conservativeMode,
      day: this.day,
    };
  }

  /**
   * Minimum confidence a trade needs given the current mode
   */
  requiredConfidence(base: number): number {
    return this.conservativeMode
      ? Math.max(base, this.config.conservativeMinConfidence)
      : base;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITES
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * A filled order. `cost` is filled shares times fill price.
   */
  recordFill(
    params: { marketId: string; asset: string; cost: number },
    now: number = Date.now(),
  ): void {
    this.rollover(now);
    const { marketId, asset, cost } = params;
    this.tradesToday += 1;
    this.availableBalance -= cost;

    const existing = this.open.get(marketId);
    if (existing) {
      existing.cost += cost;
    } else {
      this.open.set(marketId, { marketId, asset, cost });
    }
    this.exposure.set(asset, (this.exposure.get(asset) ?? 0) + cost);
  }

  recordFailedAttempt(now: number = Date.now()): void {
    this.rollover(now);
    this.failedAttemptsToday += 1;
  }

  /**
   * Close a market's open exposure with realised `pnl`. Returns the outcome
   * tag, or null when the market had no open exposure.
   */
  settle(marketId: string, pnl: number, now: number = Date.now()): TradeOutcome | null {
    this.rollover(now);
    const position = this.open.get(marketId);
    if (!position) return null;
    this.open.delete(marketId);

    const remaining = (this.exposure.get(position.asset) ?? 0) - position.cost;
    if (remaining > 1e-9) {
      this.exposure.set(position.asset, remaining);
    } else {
      this.exposure.delete(position.asset);
    }

    this.availableBalance += position.cost + pnl;
    this.totalBalance += pnl;
    this.dailyPnl += pnl;

    const outcome: TradeOutcome = pnl >= 0 ? "win" : "loss";
    if (outcome === "win") this.winsToday += 1;
    else this.lossesToday += 1;

    this.updateConservativeMode();
    return outcome;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // DAILY ROLLOVER
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Reset daily counters when `now` falls on a later UTC day. Returns
   * whether a rollover happened.
   */
  rollover(now: number): boolean {
    const today = utcDay(now);
    if (today <= this.day) return false;

    this.logDailySummary();
    this.day = today;
    this.dailyStartBalance = this.totalBalance;
    this.dailyPnl = 0;
    this.tradesToday = 0;
    this.winsToday = 0;
    this.lossesToday = 0;
    this.failedAttemptsToday = 0;
    this.updateConservativeMode();
    return true;
  }

  private logDailySummary(): void {
    if (!this.logger) return;
    const settled = this.winsToday + this.lossesToday;
    const winRate = settled > 0 ? (this.winsToday / settled) * 100 : 0;
    const roi =
      this.dailyStartBalance > 0 ? (this.dailyPnl / this.dailyStartBalance) * 100 : 0;
    this.logger.info(
      `[Portfolio] Daily summary ${this.day}: trades=${this.tradesToday} wins=${this.winsToday} losses=${this.lossesToday} win_rate=${winRate.toFixed(1)}% pnl=$${this.dailyPnl.toFixed(2)} roi=${roi.toFixed(2)}% balance=$${this.dailyStartBalance.toFixed(2)}->$${this.totalBalance.toFixed(2)} failed=${this.failedAttemptsToday} conservative=${this.conservativeMode}`,
    );
  }

  private updateConservativeMode(): void {
    const start = this.config.startingBalanceUsd;
    if (!this.conservativeMode) {
      const enterBelow = start * this.config.conservativeEnterFraction;
      if (this.totalBalance < enterBelow) {
        this.conservativeMode = true;
        this.logger?.warn(
          `[Portfolio] Conservative mode ON: balance $${this.totalBalance.toFixed(2)} < $${enterBelow.toFixed(2)}; requiring ${this.config.conservativeMinConfidence}+ confidence`,
        );
      }
      return;
    }
    const exitAt = start * this.config.conservativeExitFraction;
    if (this.totalBalance >= exitAt) {
      this.conservativeMode = false;
      this.logger?.info(
        `[Portfolio] Conservative mode OFF: balance $${this.totalBalance.toFixed(2)} >= $${exitAt.toFixed(2)}`,
      );
    }
  }
}

/**
 * Historical performance tracker
 *
 * Win/loss tallies per strategy and per asset, fed by settled trades. The
 * aggregator consults `confidenceMultiplier` before counting votes: a
 * strategy/asset pair with a poor record has every vote's confidence cut.
 */

import type { SettledTrade } from "../core/types";

export interface HistoricalTrackerConfig {
  /** Trades needed before a win rate counts; below it 0.5 is assumed */
  minTrades: number;
  strategyWeight: number;
  assetWeight: number;
  /** Combined win rate below which confidences are reduced */
  poorWinRate: number;
  /** Multiplier applied to every vote's confidence on a poor record */
  penalty: number;
}

export const DEFAULT_HISTORICAL_TRACKER_CONFIG: HistoricalTrackerConfig = {
  minTrades: 5,
  strategyWeight: 0.6,
  assetWeight: 0.4,
  poorWinRate: 0.4,
  penalty: 0.8,
};

export interface PerformanceStats {
  trades: number;
  wins: number;
  losses: number;
  totalPnl: number;
  /** 0-1 */
  winRate: number;
}

const EMPTY_STATS: PerformanceStats = {
  trades: 0,
  wins: 0,
  losses: 0,
  totalPnl: 0,
  winRate: 0,
};

export class HistoricalTracker {
  private readonly config: HistoricalTrackerConfig;
  private readonly byStrategy = new Map<string, PerformanceStats>();
  private readonly byAsset = new Map<string, PerformanceStats>();

  constructor(config: Partial<HistoricalTrackerConfig> = {}) {
    this.config = { ...DEFAULT_HISTORICAL_TRACKER_CONFIG, ...config };
  }

  record(trade: SettledTrade): void {
    this.bump(this.byStrategy, trade.strategy, trade);
    this.bump(this.byAsset, trade.asset, trade);
  }

  strategyStats(strategy: string): PerformanceStats {
    return { ...(this.byStrategy.get(strategy) ?? EMPTY_STATS) };
  }

  assetStats(asset: string): PerformanceStats {
    return { ...(this.byAsset.get(asset) ?? EMPTY_STATS) };
  }

  /**
   * strategy win rate * 0.6 + asset win rate * 0.4, 0-1
   */
  combinedWinRate(strategy: string, asset: string): number {
    const rate = (stats: PerformanceStats): number =>
      stats.trades >= this.config.minTrades ? stats.winRate : 0.5;
    return (
      rate(this.strategyStats(strategy)) * this.config.strategyWeight +
      rate(this.assetStats(asset)) * this.config.assetWeight
    );
  }

  /**
   * 1 normally; `penalty` once the strategy has enough trades and the
   * combined win rate is poor
   */
  confidenceMultiplier(strategy: string, asset: string): number {
    const strategyTrades = this.strategyStats(strategy).trades;
    if (strategyTrades < this.config.minTrades) return 1;
    return this.combinedWinRate(strategy, asset) < this.config.poorWinRate
      ? this.config.penalty
      : 1;
  }

  private bump(
    map: Map<string, PerformanceStats>,
    key: string,
    trade: SettledTrade,
  ): void {
    const stats = map.get(key) ?? { ...EMPTY_STATS };
    stats.trades += 1;
    if (trade.outcome === "win") stats.wins += 1;
    else stats.losses += 1;
    stats.totalPnl += trade.pnl;
    stats.winRate = stats.wins / stats.trades;
    map.set(key, stats);
  }
}

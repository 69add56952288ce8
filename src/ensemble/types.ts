import type { PortfolioState } from "../core/portfolio";
import type { PricePoint } from "../core/price-history";
import type { MarketSnapshot } from "../core/types";

export type EnsembleAction = "buy_yes" | "buy_no" | "buy_both" | "skip";

export const ENSEMBLE_ACTIONS: readonly EnsembleAction[] = [
  "buy_yes",
  "buy_no",
  "buy_both",
  "skip",
];

/**
 * What the decision is for. Thresholds and historical performance are
 * tracked per opportunity type.
 */
export type OpportunityType = "directional" | "arbitrage" | "flash_crash";

export interface EnsembleVote {
  source: string;
  action: EnsembleAction;
  /** 0-100 */
  confidence: number;
  reasoning: string;
}

export interface EnsembleDecision {
  action: EnsembleAction;
  /** Weighted average confidence of the votes agreeing with `action`, 0-100 */
  confidence: number;
  /** Weighted percentage of votes for `action`, 0-100 */
  consensusScore: number;
  votes: EnsembleVote[];
  reasoning: string;
  opportunityType: OpportunityType;
}

export interface MarketContext {
  market: MarketSnapshot;
  /** Recent prices per outcome, oldest first */
  yesHistory: readonly PricePoint[];
  noHistory: readonly PricePoint[];
  now: number;
}

/**
 * Anything that can look at a market and vote. Sources may throw; the
 * aggregator turns a failure into a zero-confidence skip.
 */
export interface SignalSource {
  readonly name: string;
  /** Cache this source's vote per (asset, opportunity type) */
  readonly cacheTtlMs?: number;
  vote(
    context: MarketContext,
    portfolio: PortfolioState,
  ): EnsembleVote | Promise<EnsembleVote>;
}

/**
 * Vote Aggregator - ensemble consensus over independent signal sources
 *
 * Every configured source votes once per decision (in parallel, each under a
 * timeout). A source that throws, times out or returns a malformed vote is
 * counted as `skip` with confidence 0; it never aborts the decision.
 *
 * - consensus(A)  = weighted share of sources voting A, 0-100
 * - winner        = non-skip action with the largest weighted mass; skip on
 *                   a tie, on zero mass, or below the minimum plurality
 * - confidence    = weighted mean confidence of the votes agreeing with the
 *                   winner
 *
 * Consensus and confidence are independent gates in `shouldExecute`.
 */

import { ConfigurationError } from "../errors/app.errors";
import { formatErrorForLog } from "../lib/error-handling";
import { withTimeout } from "../lib/retry";
import type { PortfolioState } from "../core/portfolio";
import type { Logger } from "../utils/logger.util";
import { TTLCache } from "../utils/parallel-utils";
import type { HistoricalTracker } from "./historical-tracker";
import {
  ENSEMBLE_ACTIONS,
  type EnsembleAction,
  type EnsembleDecision,
  type EnsembleVote,
  type MarketContext,
  type OpportunityType,
  type SignalSource,
} from "./types";

// Mass differences below this count as a tie
const MASS_EPSILON = 1e-9;
const HIGH_CONSENSUS = 70;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export interface VoteAggregatorConfig {
  minConsensus: number;
  minConfidence: number;
  /** Winner needs at least this consensus or the decision is skip */
  minPluralityPct: number;
  /** buy_both decisions use these when set */
  arbitrageMinConsensus?: number;
  arbitrageMinConfidence?: number;
  sourceTimeoutMs: number;
  /** Missing names default to 1 */
  weights: Record<string, number>;
}

export const DEFAULT_VOTE_AGGREGATOR_CONFIG: VoteAggregatorConfig = {
  minConsensus: 60,
  minConfidence: 55,
  minPluralityPct: 25,
  sourceTimeoutMs: 3000,
  weights: {},
};

export interface WeightedVote {
  vote: EnsembleVote;
  weight: number;
}

export interface AggregateResult {
  action: EnsembleAction;
  consensusScore: number;
  confidence: number;
}

export interface EnsembleStats {
  totalDecisions: number;
  highConsensusDecisions: number;
  approved: number;
  rejected: number;
  /** 0-100 */
  approvalRate: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PURE AGGREGATION
// ═══════════════════════════════════════════════════════════════════════════

const weightedMeanConfidence = (votes: WeightedVote[]): number => {
  let weight = 0;
  let sum = 0;
  for (const v of votes) {
    weight += v.weight;
    sum += v.weight * v.vote.confidence;
  }
  return weight > 0 ? sum / weight : 0;
};

export function aggregateVotes(
  votes: WeightedVote[],
  minPluralityPct = 0,
): AggregateResult {
  const totalWeight = votes.reduce((acc, v) => acc + v.weight, 0);
  const share = (action: EnsembleAction): number => {
    if (totalWeight <= 0) return 0;
    const mass = votes
      .filter((v) => v.vote.action === action)
      .reduce((acc, v) => acc + v.weight, 0);
    return (mass / totalWeight) * 100;
  };
  const skip = (): AggregateResult => ({
    action: "skip",
    consensusScore: share("skip"),
    confidence: weightedMeanConfidence(votes.filter((v) => v.vote.action === "skip")),
  });

  if (totalWeight <= 0) return skip();

  let best: EnsembleAction | null = null;
  let bestShare = 0;
  let tied = false;
  for (const action of ENSEMBLE_ACTIONS) {
    if (action === "skip") continue;
    const actionShare = share(action);
    if (actionShare <= 0) continue;
    if (best === null || actionShare > bestShare + MASS_EPSILON) {
      best = action;
      bestShare = actionShare;
      tied = false;
    } else if (Math.abs(actionShare - bestShare) <= MASS_EPSILON) {
      tied = true;
    }
  }

  if (best === null || tied || bestShare < minPluralityPct) return skip();

  const winner = best;
  return {
    action: winner,
    consensusScore: bestShare,
    confidence: weightedMeanConfidence(votes.filter((v) => v.vote.action === winner)),
  };
}

/**
 * Coerce whatever a source returned into a well-formed vote
 */
export function normalizeVote(source: string, raw: unknown): EnsembleVote {
  if (!raw || typeof raw !== "object") {
    return errorVote(source, "malformed vote");
  }
  const action: unknown = Reflect.get(raw, "action");
  const confidence: unknown = Reflect.get(raw, "confidence");
  const reasoning: unknown = Reflect.get(raw, "reasoning");
  const knownAction = ENSEMBLE_ACTIONS.find((a) => a === action);
  if (knownAction === undefined) {
    return errorVote(source, `unknown action ${String(action)}`);
  }
  if (typeof confidence !== "number" || !Number.isFinite(confidence)) {
    return errorVote(source, "non-numeric confidence");
  }
  return {
    source,
    action: knownAction,
    confidence: Math.min(100, Math.max(0, confidence)),
    reasoning: typeof reasoning === "string" ? reasoning : "",
  };
}

export const errorVote = (source: string, message: string): EnsembleVote => ({
  source,
  action: "skip",
  confidence: 0,
  reasoning: `Error: ${message}`,
});

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATOR
// ═══════════════════════════════════════════════════════════════════════════

export class VoteAggregator {
  private readonly sources: readonly SignalSource[];
  private readonly config: VoteAggregatorConfig;
  private readonly tracker?: HistoricalTracker;
  private readonly logger?: Logger;
  private readonly voteCache: TTLCache<string, EnsembleVote>;
  private readonly stats = {
    totalDecisions: 0,
    highConsensusDecisions: 0,
    approved: 0,
    rejected: 0,
  };

  constructor(params: {
    sources: readonly SignalSource[];
    config?: Partial<VoteAggregatorConfig>;
    tracker?: HistoricalTracker;
    logger?: Logger;
    now?: () => number;
  }) {
    this.config = { ...DEFAULT_VOTE_AGGREGATOR_CONFIG, ...params.config };
    this.sources = params.sources;
    this.tracker = params.tracker;
    this.logger = params.logger;
    this.voteCache = new TTLCache<string, EnsembleVote>(60_000, params.now);
    this.validate();
  }

  private validate(): void {
    if (this.sources.length === 0) {
      throw new ConfigurationError("Ensemble needs at least one signal source");
    }
    const names = new Set<string>();
    for (const source of this.sources) {
      if (names.has(source.name)) {
        throw new ConfigurationError(`Duplicate signal source "${source.name}"`);
      }
      names.add(source.name);
    }
    for (const [name, weight] of Object.entries(this.config.weights)) {
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ConfigurationError(
          `Weight for signal source "${name}" must be a finite number >= 0`,
          "ENSEMBLE_WEIGHTS",
        );
      }
      if (!names.has(name)) {
        this.logger?.warn(`[Ensemble] Weight configured for unknown source "${name}"`);
      }
    }
    if (this.sources.every((s) => this.weightOf(s.name) === 0)) {
      throw new ConfigurationError("All signal source weights are zero", "ENSEMBLE_WEIGHTS");
    }
  }

  weightOf(source: string): number {
    return this.config.weights[source] ?? 1;
  }

  async decide(
    context: MarketContext,
    portfolio: PortfolioState,
    opportunityType: OpportunityType,
  ): Promise<EnsembleDecision> {
    const asset = context.market.asset;
    const collected = await Promise.all(
      this.sources.map((source) => this.collectVote(source, context, portfolio, opportunityType)),
    );

    const multiplier = this.tracker?.confidenceMultiplier(opportunityType, asset) ?? 1;
    const votes =
      multiplier === 1
        ? collected
        : collected.map((vote) => ({ ...vote, confidence: vote.confidence * multiplier }));
    if (multiplier !== 1) {
      this.logger?.debug(
        `[Ensemble] Poor history for ${opportunityType}/${asset}; confidences x${multiplier}`,
      );
    }

    const result = aggregateVotes(
      votes.map((vote) => ({ vote, weight: this.weightOf(vote.source) })),
      this.config.minPluralityPct,
    );

    this.stats.totalDecisions += 1;
    if (result.consensusScore >= HIGH_CONSENSUS) this.stats.highConsensusDecisions += 1;

    const summary = votes
      .map((v) => `${v.source}=${v.action}/${v.confidence.toFixed(0)}`)
      .join(", ");
    const decision: EnsembleDecision = {
      ...result,
      votes,
      opportunityType,
      reasoning: `${result.action} consensus=${result.consensusScore.toFixed(1)}% confidence=${result.confidence.toFixed(1)}% [${summary}]`,
    };
    this.logger?.debug(`[Ensemble] ${context.market.marketId} ${decision.reasoning}`);
    return decision;
  }

  /**
   * Both gates must pass. `minConfidenceFloor` raises the confidence gate
   * (conservative mode).
   */
  shouldExecute(
    decision: EnsembleDecision,
    options: { minConfidenceFloor?: number } = {},
  ): boolean {
    const thresholds = this.thresholdsFor(decision);
    const minConfidence = Math.max(thresholds.minConfidence, options.minConfidenceFloor ?? 0);
    const approved =
      decision.action !== "skip" &&
      decision.consensusScore >= thresholds.minConsensus &&
      decision.confidence >= minConfidence;

    if (approved) this.stats.approved += 1;
    else this.stats.rejected += 1;
    return approved;
  }

  getStats(): EnsembleStats {
    const judged = this.stats.approved + this.stats.rejected;
    return {
      ...this.stats,
      approvalRate: judged > 0 ? (this.stats.approved / judged) * 100 : 0,
    };
  }

  private thresholdsFor(decision: EnsembleDecision): {
    minConsensus: number;
    minConfidence: number;
  } {
    if (decision.action === "buy_both") {
      return {
        minConsensus: this.config.arbitrageMinConsensus ?? this.config.minConsensus,
        minConfidence: this.config.arbitrageMinConfidence ?? this.config.minConfidence,
      };
    }
    return {
      minConsensus: this.config.minConsensus,
      minConfidence: this.config.minConfidence,
    };
  }

  private async collectVote(
    source: SignalSource,
    context: MarketContext,
    portfolio: PortfolioState,
    opportunityType: OpportunityType,
  ): Promise<EnsembleVote> {
    const cacheKey = `${source.name}:${context.market.asset}:${opportunityType}`;
    if (source.cacheTtlMs !== undefined && source.cacheTtlMs > 0) {
      const cached = this.voteCache.get(cacheKey);
      if (cached) return cached;
    }

    try {
      const raw: unknown = await withTimeout(
        async () => source.vote(context, portfolio),
        this.config.sourceTimeoutMs,
        `signal source ${source.name}`,
      );
      const vote = normalizeVote(source.name, raw);
      if (source.cacheTtlMs !== undefined && source.cacheTtlMs > 0 && !vote.reasoning.startsWith("Error:")) {
        this.voteCache.set(cacheKey, vote, source.cacheTtlMs);
      }
      return vote;
    } catch (err) {
      const message = formatErrorForLog(err, 120);
      this.logger?.warn(`[Ensemble] Source ${source.name} failed: ${message}`);
      return errorVote(source.name, message);
    }
  }
}

/**
 * Momentum signal source
 *
 * Scores the YES price series with a short return, a longer return and a
 * volatility penalty, squashed through a sigmoid into P(up). Confidence is
 * the distance of P(up) from a coin flip.
 */

import type { PricePoint } from "../../core/price-history";
import type { EnsembleVote, MarketContext, SignalSource } from "../types";

export interface MomentumSourceConfig {
  /** Points back for the short return */
  shortLookback: number;
  /** Points back for the long return and the volatility window */
  longLookback: number;
  /** Points required before voting */
  minPoints: number;
  /** Scales the raw score before the sigmoid */
  sensitivity: number;
  /** Below this the source votes skip */
  minVoteConfidence: number;
}

export const DEFAULT_MOMENTUM_CONFIG: MomentumSourceConfig = {
  shortLookback: 3,
  longLookback: 12,
  minPoints: 3,
  sensitivity: 10,
  minVoteConfidence: 10,
};

const SHORT_WEIGHT = 3.2;
const LONG_WEIGHT = 1.8;
const VOL_WEIGHT = 2.2;
const MAX_CONFIDENCE = 99;

export interface MomentumFeatures {
  shortReturn: number;
  longReturn: number;
  volatility: number;
}

const safeReturn = (now: number, then: number): number =>
  then === 0 ? 0 : (now - then) / then;

function stdev(values: number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((s, x) => s + x, 0) / values.length;
  const variance = values.reduce((s, x) => s + (x - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function momentumFeatures(
  history: readonly PricePoint[],
  config: Pick<MomentumSourceConfig, "shortLookback" | "longLookback">,
): MomentumFeatures {
  const last = history.length - 1;
  const now = history[last].price;
  const short = history[Math.max(0, last - config.shortLookback)].price;
  const long = history[Math.max(0, last - config.longLookback)].price;
  const window = history.slice(Math.max(0, last - config.longLookback)).map((p) => p.price);
  return {
    shortReturn: safeReturn(now, short),
    longReturn: safeReturn(now, long),
    volatility: stdev(window),
  };
}

export class MomentumSource implements SignalSource {
  readonly name = "momentum";
  private readonly config: MomentumSourceConfig;

  constructor(config: Partial<MomentumSourceConfig> = {}) {
    this.config = { ...DEFAULT_MOMENTUM_CONFIG, ...config };
  }

  vote(context: MarketContext): EnsembleVote {
    const history = context.yesHistory;
    if (history.length < this.config.minPoints) {
      return {
        source: this.name,
        action: "skip",
        confidence: 0,
        reasoning: `Not enough history (${history.length}/${this.config.minPoints} points)`,
      };
    }

    const f = momentumFeatures(history, this.config);
    const score =
      this.config.sensitivity *
      (SHORT_WEIGHT * f.shortReturn + LONG_WEIGHT * f.longReturn - VOL_WEIGHT * f.volatility);
    const pUp = 1 / (1 + Math.exp(-score));
    const confidence = Math.min(MAX_CONFIDENCE, Math.abs(pUp - 0.5) * 200);
    const reasoning = `r_short=${f.shortReturn.toFixed(4)} r_long=${f.longReturn.toFixed(4)} vol=${f.volatility.toFixed(4)} p_up=${pUp.toFixed(3)}`;

    if (confidence < this.config.minVoteConfidence) {
      return { source: this.name, action: "skip", confidence, reasoning };
    }
    return {
      source: this.name,
      action: pUp > 0.5 ? "buy_yes" : "buy_no",
      confidence,
      reasoning,
    };
  }
}

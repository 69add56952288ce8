/**
 * Spread signal source
 *
 * YES and NO pay out $1 between them. When the two asks sum to less than
 * `maxPriceSum`, buying both locks in `1 - (yes + no)` per share whichever
 * way the market resolves; the wider the gap the higher the confidence.
 */

import type { EnsembleVote, MarketContext, SignalSource } from "../types";

export interface SpreadSourceConfig {
  /** Vote buy_both when yes + no <= this */
  maxPriceSum: number;
  baseConfidence: number;
  /** Added per unit of edge, 1 - (yes + no) */
  confidencePerEdge: number;
}

export const DEFAULT_SPREAD_CONFIG: SpreadSourceConfig = {
  maxPriceSum: 0.95,
  baseConfidence: 50,
  confidencePerEdge: 500,
};

const PRICE_EPSILON = 1e-9;

export class SpreadSource implements SignalSource {
  readonly name = "spread";
  private readonly config: SpreadSourceConfig;

  constructor(config: Partial<SpreadSourceConfig> = {}) {
    this.config = { ...DEFAULT_SPREAD_CONFIG, ...config };
  }

  vote(context: MarketContext): EnsembleVote {
    const { yesPrice, noPrice } = context.market;
    const sum = yesPrice + noPrice;

    if (yesPrice <= 0 || noPrice <= 0) {
      return {
        source: this.name,
        action: "skip",
        confidence: 0,
        reasoning: "Missing price on one side",
      };
    }
    if (sum > this.config.maxPriceSum + PRICE_EPSILON) {
      return {
        source: this.name,
        action: "skip",
        confidence: 0,
        reasoning: `No mispricing (sum=${sum.toFixed(3)})`,
      };
    }

    const edge = 1 - sum;
    return {
      source: this.name,
      action: "buy_both",
      confidence: Math.min(100, this.config.baseConfidence + edge * this.config.confidencePerEdge),
      reasoning: `Sum-to-one gap: yes=${yesPrice.toFixed(3)} no=${noPrice.toFixed(3)} edge=${edge.toFixed(3)}`,
    };
  }
}

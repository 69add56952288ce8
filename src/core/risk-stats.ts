import type { TradeOutcome } from "./types";

export const DEFAULT_RISK_STATS_CAPACITY = 50;

/**
 * Rolling win/loss history of settled trades, newest last. Survives the
 * daily rollover so a losing streak across midnight still trips the breaker.
 */
export class RiskStats {
  private readonly capacity: number;
  private readonly outcomes: TradeOutcome[] = [];

  constructor(capacity: number = DEFAULT_RISK_STATS_CAPACITY, seed: TradeOutcome[] = []) {
    this.capacity = Math.max(1, capacity);
    for (const outcome of seed) this.record(outcome);
  }

  record(outcome: TradeOutcome): void {
    this.outcomes.push(outcome);
    if (this.outcomes.length > this.capacity) {
      this.outcomes.splice(0, this.outcomes.length - this.capacity);
    }
  }

  recent(n: number): TradeOutcome[] {
    return n <= 0 ? [] : this.outcomes.slice(-n);
  }

  /** True only with at least `n` outcomes, all of them losses */
  lastAllLosses(n: number): boolean {
    if (n <= 0) return false;
    const window = this.recent(n);
    return window.length >= n && window.every((o) => o === "loss");
  }

  get consecutiveLosses(): number {
    let count = 0;
    for (let i = this.outcomes.length - 1; i >= 0; i -= 1) {
      if (this.outcomes[i] !== "loss") break;
      count += 1;
    }
    return count;
  }

  get size(): number {
    return this.outcomes.length;
  }
}

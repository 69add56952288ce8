/**
 * Price History Store
 *
 * Bounded, time-ordered price series per (market, token) key. Entries are
 * created on first observation and capped by eviction of the oldest point.
 */

export interface PricePoint {
  readonly timestamp: number;
  readonly price: number;
}

export interface PriceHistoryConfig {
  /** Points retained per key */
  capacity: number;
}

export const DEFAULT_PRICE_HISTORY_CONFIG: PriceHistoryConfig = {
  capacity: 100,
};

export const historyKey = (marketId: string, tokenId: string): string =>
  `${marketId}:${tokenId}`;

export class PriceHistoryStore {
  private readonly config: PriceHistoryConfig;
  private readonly series = new Map<string, PricePoint[]>();

  constructor(config: Partial<PriceHistoryConfig> = {}) {
    this.config = { ...DEFAULT_PRICE_HISTORY_CONFIG, ...config };
    if (this.config.capacity < 1) {
      throw new RangeError("PriceHistoryStore capacity must be >= 1");
    }
  }

  /**
   * Append a point. Out-of-order points (older than the newest stored one)
   * and non-finite prices are ignored; returns whether the point was kept.
   */
  observe(key: string, timestamp: number, price: number): boolean {
    if (!Number.isFinite(price) || !Number.isFinite(timestamp)) return false;

    let points = this.series.get(key);
    if (!points) {
      points = [];
      this.series.set(key, points);
    }

    const last = points[points.length - 1];
    if (last && timestamp < last.timestamp) return false;

    points.push({ timestamp, price });
    if (points.length > this.config.capacity) {
      points.splice(0, points.length - this.config.capacity);
    }
    return true;
  }

  /**
   * Points with `from <= timestamp <= to`, oldest first
   */
  window(key: string, from: number, to: number): PricePoint[] {
    const points = this.series.get(key);
    if (!points) return [];
    return points.filter((p) => p.timestamp >= from && p.timestamp <= to);
  }

  latest(key: string): PricePoint | undefined {
    const points = this.series.get(key);
    return points ? points[points.length - 1] : undefined;
  }

  /** Full series for a key, oldest first */
  points(key: string): readonly PricePoint[] {
    return this.series.get(key) ?? [];
  }

  size(key: string): number {
    return this.series.get(key)?.length ?? 0;
  }

  get capacity(): number {
    return this.config.capacity;
  }
}

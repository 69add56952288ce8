/**
 * Crash Detector
 *
 * Flags abrupt price dislocations ("flash crashes") over a short sliding
 * window: a crash is `(max - min) / max >= threshold` over the points
 * observed within `windowSeconds` of `now`. Fewer than two points is not a
 * crash. Points stamped after `now` are never read.
 *
 * Picking the side to buy uses the fall from the window high to the latest
 * price, so a token that rose is never treated as crashed.
 */

import type { Logger } from "../utils/logger.util";
import { historyKey, type PriceHistoryStore } from "./price-history";
import type { MarketSnapshot, OutcomeSide } from "./types";

// Float slack for the inclusive threshold comparison
const DROP_EPSILON = 1e-9;

export interface CrashDetectorConfig {
  windowSeconds: number;
  /** Drop fraction, 0-1 */
  threshold: number;
  /** One trigger per market per cooldown; 0 disables */
  cooldownSeconds: number;
}

export const DEFAULT_CRASH_DETECTOR_CONFIG: CrashDetectorConfig = {
  windowSeconds: 3,
  threshold: 0.15,
  cooldownSeconds: 60,
};

export interface CrashSignal {
  marketId: string;
  side: OutcomeSide;
  /** Fall from the window high on the crashed side */
  drop: number;
  /** Latest price of the crashed side */
  price: number;
  detectedAt: number;
}

/**
 * Drop fraction over the window ending at `now`, or null when fewer than two
 * points fall inside it.
 */
export function measureDrop(
  store: PriceHistoryStore,
  key: string,
  now: number,
  windowSeconds: number,
): number | null {
  const points = store.window(key, now - windowSeconds * 1000, now);
  if (points.length < 2) return null;

  let max = -Infinity;
  let min = Infinity;
  for (const { price } of points) {
    if (price > max) max = price;
    if (price < min) min = price;
  }
  if (max <= 0) return 0;
  return (max - min) / max;
}

/**
 * Fall from the window high to the latest price, `(max - latest) / max`.
 * Null when fewer than two points fall inside the window; 0 when the latest
 * point is the high.
 */
export function measureFall(
  store: PriceHistoryStore,
  key: string,
  now: number,
  windowSeconds: number,
): number | null {
  const points = store.window(key, now - windowSeconds * 1000, now);
  if (points.length < 2) return null;

  const latest = points[points.length - 1].price;
  const max = Math.max(...points.map((p) => p.price));
  if (max <= 0 || latest >= max) return 0;
  return (max - latest) / max;
}

export function detectCrash(
  store: PriceHistoryStore,
  key: string,
  now: number,
  windowSeconds = 3,
  thresholdFraction = 0.15,
): boolean {
  const drop = measureDrop(store, key, now, windowSeconds);
  return drop !== null && drop >= thresholdFraction - DROP_EPSILON;
}

/**
 * Pick the crashed side of a market from each side's fall. When both sides
 * crash in the same tick the larger fall wins; YES wins an exact tie.
 */
export function pickCrashedSide(
  yesDrop: number | null,
  noDrop: number | null,
  threshold: number,
): { side: OutcomeSide; drop: number } | null {
  const crashed = (drop: number | null): number | null =>
    drop !== null && drop >= threshold - DROP_EPSILON ? drop : null;
  const yes = crashed(yesDrop);
  const no = crashed(noDrop);

  if (yes !== null && no !== null) {
    return no > yes + DROP_EPSILON
      ? { side: "NO", drop: no }
      : { side: "YES", drop: yes };
  }
  if (yes !== null) return { side: "YES", drop: yes };
  if (no !== null) return { side: "NO", drop: no };
  return null;
}

export class CrashDetector {
  private readonly store: PriceHistoryStore;
  private readonly config: CrashDetectorConfig;
  private readonly logger?: Logger;
  private readonly lastTrigger = new Map<string, number>();

  constructor(
    store: PriceHistoryStore,
    config: Partial<CrashDetectorConfig> = {},
    logger?: Logger,
  ) {
    this.store = store;
    this.config = { ...DEFAULT_CRASH_DETECTOR_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Evaluate both outcome tokens of a market. Returns a signal at most once
   * per market per cooldown.
   */
  detect(market: MarketSnapshot, now: number): CrashSignal | null {
    const { windowSeconds, threshold } = this.config;
    const yesFall = measureFall(
      this.store,
      historyKey(market.marketId, market.yesTokenId),
      now,
      windowSeconds,
    );
    const noFall = measureFall(
      this.store,
      historyKey(market.marketId, market.noTokenId),
      now,
      windowSeconds,
    );

    const crashed = pickCrashedSide(yesFall, noFall, threshold);
    if (!crashed) return null;

    if (this.inCooldown(market.marketId, now)) {
      this.logger?.debug(
        `[CrashDetector] ${market.marketId} ${crashed.side} drop ${(crashed.drop * 100).toFixed(1)}% ignored (cooldown)`,
      );
      return null;
    }

    this.pruneCooldowns(now);
    this.lastTrigger.set(market.marketId, now);
    const price = crashed.side === "YES" ? market.yesPrice : market.noPrice;
    this.logger?.info(
      `[CrashDetector] Flash crash ${market.asset} ${crashed.side} drop=${(crashed.drop * 100).toFixed(1)}% in ${windowSeconds}s price=${price.toFixed(3)}`,
    );
    return {
      marketId: market.marketId,
      side: crashed.side,
      drop: crashed.drop,
      price,
      detectedAt: now,
    };
  }

  inCooldown(marketId: string, now: number): boolean {
    if (this.config.cooldownSeconds <= 0) return false;
    const last = this.lastTrigger.get(marketId);
    return last !== undefined && now - last < this.config.cooldownSeconds * 1000;
  }

  /**
   * Forget triggers whose cooldown has run out. Returns how many were dropped.
   */
  pruneCooldowns(now: number): number {
    let dropped = 0;
    for (const [marketId, last] of this.lastTrigger) {
      if (now - last >= this.config.cooldownSeconds * 1000) {
        this.lastTrigger.delete(marketId);
        dropped += 1;
      }
    }
    return dropped;
  }
}

/**
 * CLOB order-book provider - projected slippage for a buy
 *
 * Walks the ask ladder for the requested size. Any size beyond the visible
 * depth is priced at the last level. Slippage is measured against the mid:
 *
 *   avg      = cost / shares
 *   slippage = |avg - mid| / mid
 *
 * Books are cached for 2 seconds so one scan tick fetches each token once.
 */

import { formatErrorForLog, parseError } from "../lib/error-handling";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../lib/retry";
import type { OrderBookProvider, SlippageEstimate } from "../core/types";
import type { Logger } from "../utils/logger.util";
import { TTLCache } from "../utils/parallel-utils";

const ORDERBOOK_CACHE_TTL_MS = 2000;

export interface BookLevel {
  price: string;
  size: string;
}

export interface OrderBookLevels {
  bids: BookLevel[];
  asks: BookLevel[];
}

/**
 * The slice of ClobClient this provider reads
 */
export interface OrderBookSource {
  getOrderBook(tokenId: string): Promise<OrderBookLevels>;
}

interface Level {
  price: number;
  size: number;
}

const toLevels = (levels: unknown): Level[] => {
  if (!Array.isArray(levels)) return [];
  const parsed: Level[] = [];
  for (const level of levels) {
    if (typeof level !== "object" || level === null) continue;
    const price = Number(Reflect.get(level, "price"));
    const size = Number(Reflect.get(level, "size"));
    if (Number.isFinite(price) && Number.isFinite(size) && price > 0 && size > 0) {
      parsed.push({ price, size });
    }
  }
  return parsed;
};

const isMissingBook = (err: unknown): boolean => {
  const message = err instanceof Error ? err.message : String(err);
  return /no orderbook exists|\b404\b/i.test(message);
};

/**
 * Pure slippage estimate over a book snapshot
 */
export function estimateFromBook(book: unknown, shares: number): SlippageEstimate {
  const asks =
    typeof book === "object" && book !== null ? toLevels(Reflect.get(book, "asks")) : [];
  const bids =
    typeof book === "object" && book !== null ? toLevels(Reflect.get(book, "bids")) : [];
  if (asks.length === 0) return { kind: "no_data", reason: "empty ask side" };
  if (bids.length === 0) return { kind: "no_data", reason: "empty bid side" };

  asks.sort((a, b) => a.price - b.price);
  bids.sort((a, b) => b.price - a.price);
  const midPrice = (bids[0].price + asks[0].price) / 2;
  const availableDepth = asks.reduce((sum, level) => sum + level.size, 0);

  if (!(shares > 0)) {
    return {
      kind: "estimate",
      avgPrice: asks[0].price,
      midPrice,
      slippage: Math.abs(asks[0].price - midPrice) / midPrice,
      availableDepth,
    };
  }

  let remaining = shares;
  let cost = 0;
  for (const level of asks) {
    if (remaining <= 0) break;
    const take = Math.min(remaining, level.size);
    cost += take * level.price;
    remaining -= take;
  }
  if (remaining > 0) {
    cost += remaining * asks[asks.length - 1].price;
  }

  const avgPrice = cost / shares;
  return {
    kind: "estimate",
    avgPrice,
    midPrice,
    slippage: Math.abs(avgPrice - midPrice) / midPrice,
    availableDepth,
  };
}

export class ClobOrderBookProvider implements OrderBookProvider {
  private readonly source: OrderBookSource;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly cache: TTLCache<string, OrderBookLevels>;

  constructor(params: {
    source: OrderBookSource;
    retryPolicy?: RetryPolicy;
    logger?: Logger;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.source = params.source;
    this.retryPolicy = params.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.logger = params.logger;
    this.sleep = params.sleep;
    this.cache = new TTLCache<string, OrderBookLevels>(ORDERBOOK_CACHE_TTL_MS, params.now);
  }

  async estimateSlippage(tokenId: string, shares: number): Promise<SlippageEstimate> {
    let book: OrderBookLevels;
    try {
      book = await this.cache.getOrFetch(tokenId, () =>
        withRetry(() => this.source.getOrderBook(tokenId), this.retryPolicy, {
          label: `orderbook ${tokenId.slice(0, 12)}`,
          logger: this.logger,
          shouldRetry: (err) => !isMissingBook(err) && parseError(err).recoverable,
          sleep: this.sleep,
        }),
      );
    } catch (err) {
      if (isMissingBook(err)) {
        this.logger?.debug(`[OrderBook] No orderbook for ${tokenId.slice(0, 12)}...`);
        return { kind: "no_data", reason: "no orderbook" };
      }
      this.logger?.warn(
        `[OrderBook] Fetch failed for ${tokenId.slice(0, 12)}...: ${formatErrorForLog(err, 200)}`,
      );
      throw err;
    }
    return estimateFromBook(book, shares);
  }
}

/**
 * Parallel Execution Utilities
 *
 * - Bounded worker pool with per-item error capture
 * - Result caching with TTL
 */

import type { Logger } from "./logger.util";

export interface BatchResult<T> {
  /** Results in input order; failed items are absent */
  results: T[];
  errors: Array<{ index: number; error: Error }>;
  totalTime: number;
}

export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * A failing item never aborts the others.
 */
export async function parallelBatch<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: {
    concurrency?: number;
    logger?: Logger;
    label?: string;
  } = {},
): Promise<BatchResult<R>> {
  const { logger, label = "batch" } = options;
  const concurrency = Math.max(1, options.concurrency ?? 4);
  const startTime = Date.now();
  const settled: Array<{ ok: true; value: R } | { ok: false } | undefined> =
    new Array(items.length).fill(undefined);
  const errors: Array<{ index: number; error: Error }> = [];
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        settled[index] = { ok: true, value: await fn(items[index], index) };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        settled[index] = { ok: false };
        errors.push({ index, error });
        logger?.debug(`[${label}] Item ${index} failed: ${error.message}`);
      }
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, () => worker()),
  );

  const totalTime = Date.now() - startTime;
  logger?.debug(
    `[${label}] Processed ${items.length} items in ${totalTime}ms (${errors.length} errors)`,
  );

  const results: R[] = [];
  for (const entry of settled) {
    if (entry?.ok) results.push(entry.value);
  }
  return { results, errors, totalTime };
}

/**
 * TTL-based cache for expensive operations
 */
export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private pendingFetches = new Map<K, Promise<V>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(defaultTtlMs: number = 30_000, now: () => number = Date.now) {
    this.defaultTtlMs = defaultTtlMs;
    this.now = now;
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V, ttlMs?: number): void {
    this.prune();
    this.cache.set(key, {
      value,
      expiresAt: this.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  /**
   * Drop every expired entry. Returns how many were dropped.
   */
  prune(): number {
    const now = this.now();
    let dropped = 0;
    for (const [key, entry] of this.cache) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  /**
   * Get or fetch with automatic caching. Concurrent callers for the same
   * uncached key share one fetch.
   */
  async getOrFetch(
    key: K,
    fetcher: () => Promise<V>,
    ttlMs?: number,
  ): Promise<V> {
    const cached = this.cache.get(key);
    if (cached && this.now() <= cached.expiresAt) {
      return cached.value;
    }

    const pendingFetch = this.pendingFetches.get(key);
    if (pendingFetch) {
      return pendingFetch;
    }

    const fetchPromise = (async () => {
      try {
        const value = await fetcher();
        this.set(key, value, ttlMs);
        return value;
      } finally {
        this.pendingFetches.delete(key);
      }
    })();

    this.pendingFetches.set(key, fetchPromise);
    return fetchPromise;
  }
}

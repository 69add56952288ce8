/**
 * Gamma market provider - current 15-minute up/down market per asset
 *
 * Each asset's market lives under the event slug
 * `{asset}-updown-15m-{intervalStartSeconds}`. Entries that fail to parse are
 * dropped for the tick; an asset whose event is missing (404) contributes no
 * markets.
 */

import axios, { type AxiosInstance } from "axios";
import { NetworkError } from "../errors/app.errors";
import { formatErrorForLog } from "../lib/error-handling";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../lib/retry";
import type { MarketDataProvider, MarketSnapshot } from "../core/types";
import type { Logger } from "../utils/logger.util";
import { eventSlug, isRecord, parseGammaMarket } from "./gamma-parsing";

export interface GammaMarketProviderParams {
  baseUrl: string;
  /** Lower-case asset symbols, e.g. ["btc", "eth"] */
  assets: readonly string[];
  http?: AxiosInstance;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class GammaMarketProvider implements MarketDataProvider {
  private readonly http: AxiosInstance;
  private readonly assets: readonly string[];
  private readonly retryPolicy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(params: GammaMarketProviderParams) {
    this.retryPolicy = params.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.http =
      params.http ??
      axios.create({ baseURL: params.baseUrl, timeout: this.retryPolicy.timeoutMs });
    this.assets = params.assets;
    this.logger = params.logger;
    this.now = params.now ?? Date.now;
    this.sleep = params.sleep;
  }

  async fetchSnapshots(): Promise<MarketSnapshot[]> {
    const now = this.now();
    const byMarket = new Map<string, MarketSnapshot>();
    let failures = 0;
    let lastError: unknown;

    for (const asset of this.assets) {
      try {
        for (const snapshot of await this.fetchAsset(asset, now)) {
          byMarket.set(snapshot.marketId, snapshot);
        }
      } catch (err) {
        failures += 1;
        lastError = err;
        this.logger?.warn(
          `[Gamma] Failed to fetch ${asset.toUpperCase()} markets: ${formatErrorForLog(err, 200)}`,
        );
      }
    }

    if (this.assets.length > 0 && failures === this.assets.length) {
      throw new NetworkError(
        `Gamma market fetch failed for every asset: ${formatErrorForLog(lastError, 200)}`,
        "gamma/events",
        lastError instanceof Error ? lastError : undefined,
      );
    }
    return [...byMarket.values()];
  }

  private async fetchAsset(asset: string, now: number): Promise<MarketSnapshot[]> {
    const slug = eventSlug(asset, now);
    const response = await withRetry(
      () =>
        this.http.get<unknown>(`/events/slug/${slug}`, {
          validateStatus: (status) => status === 200 || status === 404,
        }),
      this.retryPolicy,
      { label: `gamma ${slug}`, logger: this.logger, sleep: this.sleep },
    );

    if (response.status === 404) {
      this.logger?.debug(`[Gamma] No event for ${slug}`);
      return [];
    }
    const event = response.data;
    const markets = isRecord(event) && Array.isArray(event.markets) ? event.markets : [];

    const snapshots: MarketSnapshot[] = [];
    for (const raw of markets) {
      try {
        snapshots.push(parseGammaMarket(raw, asset, now));
      } catch (err) {
        this.logger?.debug(`[Gamma] Skipping ${slug} market: ${formatErrorForLog(err, 200)}`);
      }
    }
    return snapshots;
  }
}

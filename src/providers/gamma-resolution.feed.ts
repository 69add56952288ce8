/**
 * Gamma resolution feed
 *
 * Looks up each watched market by condition id; a closed market whose
 * outcome prices have settled to 1/0 yields a resolution event.
 */

import axios, { type AxiosInstance } from "axios";
import { formatErrorForLog } from "../lib/error-handling";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../lib/retry";
import type { ResolutionEvent, ResolutionFeed } from "../core/types";
import type { Logger } from "../utils/logger.util";
import { parallelBatch } from "../utils/parallel-utils";
import { isRecord, resolvedWinner } from "./gamma-parsing";

export class GammaResolutionFeed implements ResolutionFeed {
  private readonly http: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly concurrency: number;

  constructor(params: {
    baseUrl: string;
    http?: AxiosInstance;
    retryPolicy?: RetryPolicy;
    concurrency?: number;
    logger?: Logger;
  }) {
    this.retryPolicy = params.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.http =
      params.http ??
      axios.create({ baseURL: params.baseUrl, timeout: this.retryPolicy.timeoutMs });
    this.concurrency = params.concurrency ?? 4;
    this.logger = params.logger;
  }

  async pollResolutions(marketIds: readonly string[]): Promise<ResolutionEvent[]> {
    if (marketIds.length === 0) return [];

    const { results, errors } = await parallelBatch(
      marketIds,
      (marketId) => this.lookup(marketId),
      { concurrency: this.concurrency, logger: this.logger, label: "Resolution" },
    );
    for (const { index, error } of errors) {
      this.logger?.warn(
        `[Resolution] Lookup failed for ${marketIds[index]}: ${formatErrorForLog(error, 200)}`,
      );
    }

    const events: ResolutionEvent[] = [];
    for (const event of results) {
      if (event) events.push(event);
    }
    return events;
  }

  private async lookup(marketId: string): Promise<ResolutionEvent | null> {
    const { data } = await withRetry(
      () => this.http.get<unknown>("/markets", { params: { condition_ids: marketId } }),
      this.retryPolicy,
      { label: `resolution ${marketId}`, logger: this.logger },
    );
    if (!Array.isArray(data)) return null;

    const market = data.find((m) => isRecord(m) && m.conditionId === marketId);
    const winningSide = resolvedWinner(market);
    if (!winningSide) return null;

    this.logger?.info(`[Resolution] ${marketId} resolved ${winningSide}`);
    return { marketId, winningSide };
  }
}

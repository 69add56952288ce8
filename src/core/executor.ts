/**
 * Order Executor
 *
 * Sizes an order to the minimum notional, submits it through the gateway
 * under the retry policy, and books the FILLED size into the ledger. A
 * rejection is a failed attempt and books nothing.
 *
 * Only submissions that never reached the exchange are resent. A timeout or
 * a dropped connection leaves the order's fate unknown: it is reported as
 * such and never sent a second time.
 */

import { NetworkError } from "../errors/app.errors";
import {
  formatErrorForLog,
  isSafeToResend,
  parseError,
  type ParsedError,
  type RejectionReason,
} from "../lib/error-handling";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../lib/retry";
import type { Logger } from "../utils/logger.util";
import type { LegFill } from "./hedge-state-machine";
import { DEFAULT_MIN_NOTIONAL_USD, sizeOrder, type SizedOrder } from "./order-sizer";
import type { PortfolioLedger } from "./portfolio";
import type { ExecutionGateway, OrderResult, OutcomeSide } from "./types";

export interface BuyRequest {
  marketId: string;
  asset: string;
  tokenId: string;
  side: OutcomeSide;
  price: number;
  requestedShares: number;
}

export type ExecutionOutcome =
  | {
      status: "filled";
      fill: LegFill;
      requestedShares: number;
      /** Shares sent after min-notional sizing */
      sentShares: number;
      cost: number;
    }
  | {
      status: "rejected";
      reason: RejectionReason | "invalid_size";
      message: string;
    }
  | {
      /** Transient failures outlasted the retry policy */
      status: "failed";
      error: ParsedError;
    }
  | {
      /** The order may have reached the exchange; nothing was booked */
      status: "unknown";
      error: ParsedError;
    };

export interface OrderExecutorParams {
  gateway: ExecutionGateway;
  ledger: PortfolioLedger;
  retryPolicy?: RetryPolicy;
  minNotionalUsd?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export class OrderExecutor {
  private readonly gateway: ExecutionGateway;
  private readonly ledger: PortfolioLedger;
  private readonly retryPolicy: RetryPolicy;
  private readonly minNotionalUsd: number;
  private readonly logger?: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(params: OrderExecutorParams) {
    this.gateway = params.gateway;
    this.ledger = params.ledger;
    this.retryPolicy = params.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.minNotionalUsd = params.minNotionalUsd ?? DEFAULT_MIN_NOTIONAL_USD;
    this.logger = params.logger;
    this.sleep = params.sleep;
  }

  /** The size `buy` would send for this price and request */
  sizeFor(price: number, requestedShares: number): SizedOrder {
    return sizeOrder(price, requestedShares, this.minNotionalUsd);
  }

  async buy(request: BuyRequest, now: number = Date.now()): Promise<ExecutionOutcome> {
    const { marketId, tokenId, side, price, requestedShares } = request;
    const sized = this.sizeFor(price, requestedShares);
    if (sized.shares <= 0) {
      this.ledger.recordFailedAttempt(now);
      return {
        status: "rejected",
        reason: "invalid_size",
        message: `Cannot size order at price ${price}`,
      };
    }
    if (sized.shares !== requestedShares) {
      this.logger?.debug(
        `[Executor] ${marketId} ${side} sized ${requestedShares} -> ${sized.shares} shares ($${sized.value.toFixed(4)}) for $${this.minNotionalUsd.toFixed(2)} minimum`,
      );
    }

    let result: OrderResult;
    try {
      result = await withRetry(
        async () => {
          const attempt = await this.gateway.submit({
            marketId,
            tokenId,
            side,
            price,
            shares: sized.shares,
          });
          if (attempt.status === "rejected" && attempt.reason === "rate_limited") {
            throw new NetworkError(`429 rate limited: ${attempt.message}`, "order");
          }
          return attempt;
        },
        this.retryPolicy,
        {
          label: `order ${marketId} ${side}`,
          logger: this.logger,
          shouldRetry: isSafeToResend,
          sleep: this.sleep,
        },
      );
    } catch (err) {
      const parsed = parseError(err);
      if (parsed.recoverable && !isSafeToResend(err)) {
        this.logger?.error(
          `[Executor] Order ${marketId} ${side} ${sized.shares} @ ${price} outcome UNKNOWN (${parsed.code}): ${formatErrorForLog(err, 200)}; not resending`,
        );
        return { status: "unknown", error: parsed };
      }
      this.ledger.recordFailedAttempt(now);
      this.logger?.warn(
        `[Executor] Order ${marketId} ${side} failed (${parsed.code}): ${formatErrorForLog(err, 200)}`,
      );
      return { status: "failed", error: parsed };
    }

    if (result.status === "rejected") {
      this.ledger.recordFailedAttempt(now);
      this.logger?.warn(
        `[Executor] Order ${marketId} ${side} rejected (${result.reason}): ${result.message}`,
      );
      return { status: "rejected", reason: result.reason, message: result.message };
    }

    if (!(result.filledShares > 0) || !(result.avgPrice > 0)) {
      this.ledger.recordFailedAttempt(now);
      return {
        status: "rejected",
        reason: "unknown",
        message: `Empty fill (shares=${result.filledShares}, price=${result.avgPrice})`,
      };
    }

    const fill: LegFill = {
      side,
      price: result.avgPrice,
      shares: result.filledShares,
      timestamp: now,
      orderId: result.orderId,
    };
    const cost = fill.price * fill.shares;
    this.ledger.recordFill({ marketId, asset: request.asset, cost }, now);

    if (fill.shares < sized.shares) {
      this.logger?.info(
        `[Executor] Partial fill ${marketId} ${side}: ${fill.shares}/${sized.shares} shares @ ${fill.price.toFixed(3)}`,
      );
    } else {
      this.logger?.info(
        `[Executor] Filled ${marketId} ${side}: ${fill.shares} shares @ ${fill.price.toFixed(3)} ($${cost.toFixed(2)})`,
      );
    }
    return {
      status: "filled",
      fill,
      requestedShares,
      sentShares: sized.shares,
      cost,
    };
  }
}

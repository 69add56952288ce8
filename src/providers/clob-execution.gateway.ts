/**
 * CLOB execution gateway - fill-or-kill market buys
 *
 * Signs a market order for `shares * price` USDC and posts it FOK. For a
 * buy, the response's takingAmount is the shares received and makingAmount
 * the USDC paid; when the exchange omits them the order is taken as filled
 * in full at the limit price.
 *
 * Exchange rejections come back as `rejected` results. Transport failures
 * are thrown for the executor's retry policy to classify.
 */

import { OrderType, Side, type UserMarketOrder } from "@polymarket/clob-client";
import { formatErrorForLog, toRejectionReason } from "../lib/error-handling";
import type { ExecutionGateway, OrderRequest, OrderResult } from "../core/types";
import type { Logger } from "../utils/logger.util";

/**
 * The slice of ClobClient this gateway uses
 */
export interface OrderClient<TSigned> {
  createMarketOrder(order: UserMarketOrder): Promise<TSigned>;
  postOrder(order: TSigned, orderType: OrderType): Promise<unknown>;
}

const field = (response: unknown, key: string): unknown =>
  typeof response === "object" && response !== null ? Reflect.get(response, key) : undefined;

const positive = (value: unknown): number | null => {
  const n = typeof value === "string" || typeof value === "number" ? Number(value) : NaN;
  return Number.isFinite(n) && n > 0 ? n : null;
};

/**
 * Map a postOrder response onto an OrderResult
 */
export function interpretPostOrderResponse(
  response: unknown,
  order: OrderRequest,
): OrderResult {
  const errorMsg = field(response, "errorMsg");
  const error = field(response, "error");
  if (field(response, "success") !== true) {
    const message =
      (typeof errorMsg === "string" && errorMsg) ||
      (typeof error === "string" && error) ||
      "Order not accepted";
    return { status: "rejected", reason: toRejectionReason(message), message };
  }

  const orderIdRaw = field(response, "orderID") ?? field(response, "orderId");
  const orderId = typeof orderIdRaw === "string" ? orderIdRaw : "";
  const taking = positive(field(response, "takingAmount"));
  const making = positive(field(response, "makingAmount"));

  const filledShares = taking ?? order.shares;
  const avgPrice = taking !== null && making !== null ? making / taking : order.price;
  return { status: "filled", orderId, filledShares, avgPrice };
}

export class ClobExecutionGateway<TSigned> implements ExecutionGateway {
  private readonly client: OrderClient<TSigned>;
  private readonly logger?: Logger;

  constructor(params: { client: OrderClient<TSigned>; logger?: Logger }) {
    this.client = params.client;
    this.logger = params.logger;
  }

  async submit(order: OrderRequest): Promise<OrderResult> {
    let response: unknown;
    try {
      const signed = await this.client.createMarketOrder({
        side: Side.BUY,
        tokenID: order.tokenId,
        amount: order.shares * order.price,
        price: order.price,
      });
      response = await this.client.postOrder(signed, OrderType.FOK);
    } catch (err) {
      const message = formatErrorForLog(err, 300);
      const reason = toRejectionReason(message);
      if (reason === "unknown") throw err;
      return { status: "rejected", reason, message };
    }

    const result = interpretPostOrderResponse(response, order);
    if (result.status === "rejected") {
      this.logger?.debug(`[CLOB] ${order.marketId} ${order.side} rejected: ${result.message}`);
    }
    return result;
  }
}

import type { ExecutionGateway, OrderRequest, OrderResult } from "../core/types";
import type { Logger } from "../utils/logger.util";

/**
 * Dry-run gateway: every order fills in full at its limit price
 */
export class PaperExecutionGateway implements ExecutionGateway {
  private readonly logger?: Logger;
  private sequence = 0;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async submit(order: OrderRequest): Promise<OrderResult> {
    this.sequence += 1;
    const orderId = `paper-${this.sequence}`;
    this.logger?.info(
      `[Paper] ${orderId} BUY ${order.side} ${order.shares} @ ${order.price.toFixed(3)} on ${order.marketId}`,
    );
    return {
      status: "filled",
      orderId,
      filledShares: order.shares,
      avgPrice: order.price,
    };
  }
}

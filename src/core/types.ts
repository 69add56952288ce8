import type { RejectionReason } from "../lib/error-handling";

export type { RejectionReason };

export type OutcomeSide = "YES" | "NO";

export const oppositeSide = (side: OutcomeSide): OutcomeSide =>
  side === "YES" ? "NO" : "YES";

// ═══════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One market as seen during a single scan tick. Replaced wholesale each tick.
 */
export interface MarketSnapshot {
  readonly marketId: string;
  readonly question: string;
  /** Underlying asset symbol, upper case (BTC, ETH, ...) */
  readonly asset: string;
  readonly yesPrice: number;
  readonly noPrice: number;
  readonly yesLiquidity: number;
  readonly noLiquidity: number;
  readonly volume24h: number;
  readonly minutesToResolution: number;
  readonly yesTokenId: string;
  readonly noTokenId: string;
}

export const tokenIdFor = (market: MarketSnapshot, side: OutcomeSide): string =>
  side === "YES" ? market.yesTokenId : market.noTokenId;

export const priceFor = (market: MarketSnapshot, side: OutcomeSide): number =>
  side === "YES" ? market.yesPrice : market.noPrice;

export interface MarketDataProvider {
  fetchSnapshots(): Promise<MarketSnapshot[]>;
}

// ═══════════════════════════════════════════════════════════════════════════
// ORDER BOOK
// ═══════════════════════════════════════════════════════════════════════════

export type SlippageEstimate =
  | {
      kind: "estimate";
      avgPrice: number;
      midPrice: number;
      /** Fraction, |avg - mid| / mid */
      slippage: number;
      availableDepth: number;
    }
  | { kind: "no_data"; reason: string };

export interface OrderBookProvider {
  estimateSlippage(tokenId: string, shares: number): Promise<SlippageEstimate>;
}

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export interface OrderRequest {
  marketId: string;
  tokenId: string;
  side: OutcomeSide;
  price: number;
  shares: number;
}

export type OrderResult =
  | {
      status: "filled";
      orderId: string;
      filledShares: number;
      avgPrice: number;
    }
  | {
      status: "rejected";
      reason: RejectionReason;
      message: string;
    };

export interface ExecutionGateway {
  submit(order: OrderRequest): Promise<OrderResult>;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

export interface ResolutionEvent {
  marketId: string;
  winningSide: OutcomeSide;
}

export interface ResolutionFeed {
  pollResolutions(marketIds: readonly string[]): Promise<ResolutionEvent[]>;
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

export type TradeOutcome = "win" | "loss";

/**
 * A settled trade, fed back into risk statistics and the historical tracker
 */
export interface SettledTrade {
  marketId: string;
  asset: string;
  strategy: string;
  pnl: number;
  outcome: TradeOutcome;
  settledAt: number;
}

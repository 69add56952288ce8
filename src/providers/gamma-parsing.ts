/**
 * Gamma API response parsing
 *
 * Gamma returns `clobTokenIds` and `outcomePrices` either as arrays or as
 * JSON strings ('["yesTokenId", "noTokenId"]', '["0.65", "0.35"]'). Index 0
 * is the YES ("Up") outcome, index 1 the NO ("Down") outcome.
 */

import { MarketDataError } from "../errors/app.errors";
import type { MarketSnapshot, OutcomeSide } from "../core/types";

// 15-minute up/down markets open on 900-second boundaries
export const INTERVAL_SECONDS = 900;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Array field that may arrive JSON-encoded. Null when neither form parses.
 */
export function parseJsonArray(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value !== "string") return null;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Finite number from a number or numeric string, else NaN
 */
export function toNumber(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : NaN;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : NaN;
  }
  return NaN;
}

export const intervalStart = (nowMs: number): number =>
  Math.floor(nowMs / 1000 / INTERVAL_SECONDS) * INTERVAL_SECONDS;

export const eventSlug = (asset: string, nowMs: number): string =>
  `${asset.toLowerCase()}-updown-15m-${intervalStart(nowMs)}`;

export function parseOutcomePrices(raw: Record<string, unknown>): [number, number] | null {
  const prices = parseJsonArray(raw.outcomePrices);
  if (!prices || prices.length < 2) return null;
  const yes = toNumber(prices[0]);
  const no = toNumber(prices[1]);
  if (Number.isNaN(yes) || Number.isNaN(no)) return null;
  return [yes, no];
}

/**
 * One Gamma market entry as a snapshot. Throws MarketDataError naming the
 * field that failed; closed or inactive markets are rejected the same way.
 */
export function parseGammaMarket(
  raw: unknown,
  asset: string,
  nowMs: number,
): MarketSnapshot {
  if (!isRecord(raw)) throw new MarketDataError("Market entry is not an object");

  const marketId = raw.conditionId;
  if (typeof marketId !== "string" || marketId === "") {
    throw new MarketDataError("Missing conditionId");
  }
  if (raw.closed === true) throw new MarketDataError("Market is closed", marketId);
  if (raw.active === false) throw new MarketDataError("Market is not active", marketId);

  const tokenIds = parseJsonArray(raw.clobTokenIds);
  const yesTokenId = tokenIds?.[0];
  const noTokenId = tokenIds?.[1];
  if (
    typeof yesTokenId !== "string" ||
    typeof noTokenId !== "string" ||
    yesTokenId === "" ||
    noTokenId === ""
  ) {
    throw new MarketDataError("Invalid clobTokenIds", marketId);
  }

  const prices = parseOutcomePrices(raw);
  if (!prices || prices.some((p) => p < 0 || p > 1)) {
    throw new MarketDataError("Invalid outcomePrices", marketId);
  }

  const endMs = typeof raw.endDate === "string" ? Date.parse(raw.endDate) : NaN;
  if (Number.isNaN(endMs)) throw new MarketDataError("Invalid endDate", marketId);
  const minutesToResolution = (endMs - nowMs) / 60_000;
  if (minutesToResolution <= 0) {
    throw new MarketDataError("Market past its end date", marketId);
  }

  // Gamma reports liquidity per market, not per outcome
  const liquidity = toNumber(raw.liquidityNum ?? raw.liquidity);
  const volume = toNumber(raw.volume24hr);

  return {
    marketId,
    question: typeof raw.question === "string" ? raw.question : "",
    asset: asset.toUpperCase(),
    yesPrice: prices[0],
    noPrice: prices[1],
    yesLiquidity: Number.isNaN(liquidity) ? 0 : liquidity,
    noLiquidity: Number.isNaN(liquidity) ? 0 : liquidity,
    volume24h: Number.isNaN(volume) ? 0 : volume,
    minutesToResolution,
    yesTokenId,
    noTokenId,
  };
}

/**
 * Winner of a settled market: the outcome priced at 1. Null while the
 * market is open or the prices are not yet final.
 */
export function resolvedWinner(raw: unknown): OutcomeSide | null {
  if (!isRecord(raw) || raw.closed !== true) return null;
  const prices = parseOutcomePrices(raw);
  if (!prices) return null;
  const [yes, no] = prices;
  if (yes >= 0.99 && no <= 0.01) return "YES";
  if (no >= 0.99 && yes <= 0.01) return "NO";
  return null;
}

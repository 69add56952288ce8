/**
 * Order sizing with a guaranteed minimum notional.
 *
 * Share counts use the exchange tick of 0.01. The minimum share count for
 * the notional is rounded UP, so `price * shares` never lands a fraction of
 * a cent below the minimum (e.g. 4.34 @ 0.23 = $0.9982 is rejected by the
 * exchange, 4.35 @ 0.23 = $1.0005 is not).
 */

export const SHARE_TICK = 0.01;
export const DEFAULT_MIN_NOTIONAL_USD = 1.0;

// Float slack so exact products such as 0.5 * 2 are not bumped a tick
const EPSILON = 1e-9;

export interface SizedOrder {
  shares: number;
  /** price * shares */
  value: number;
}

export const roundToTick = (value: number): number =>
  Math.round(value / SHARE_TICK) * SHARE_TICK;

const ceilToTick = (value: number): number =>
  Math.ceil(value / SHARE_TICK - EPSILON) * SHARE_TICK;

// Trim binary noise such as 4.3500000000000005
const clean = (value: number): number => Number(value.toFixed(2));

export function sizeOrder(
  price: number,
  requestedShares: number,
  minNotional: number = DEFAULT_MIN_NOTIONAL_USD,
): SizedOrder {
  if (!Number.isFinite(price) || price <= 0) {
    return { shares: 0, value: 0 };
  }
  const requested =
    Number.isFinite(requestedShares) && requestedShares > 0 ? requestedShares : 0;

  const minShares = clean(ceilToTick(minNotional / price));
  let shares = clean(roundToTick(Math.max(requested, minShares)));
  while (price * shares < minNotional - EPSILON) {
    shares = clean(shares + SHARE_TICK);
  }
  return { shares, value: price * shares };
}

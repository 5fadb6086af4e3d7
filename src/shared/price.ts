/**
 * Price and size rounding for on-chain order parameters.
 *
 * Markets quote prices and sizes as integers scaled by `10^decimals`;
 * valid prices are multiples of the market's tick size and valid sizes
 * multiples of its lot size (both in scaled units).
 */

import Decimal from "decimal.js";

const HalfEven = Decimal.ROUND_HALF_EVEN;

export type Numeric = number | string | Decimal;

function scale(decimals: number): Decimal {
  return new Decimal(10).pow(decimals);
}

/**
 * Round a price to a tick boundary, up or down.
 *
 * @example
 * ```typescript
 * roundToTickSize(97123.45, 10, 1, false); // 97123.0
 * ```
 */
export function roundToTickSize(
  price: Numeric,
  tickSize: Numeric,
  pxDecimals: number,
  roundUp: boolean
): number {
  const value = new Decimal(price);
  if (value.isZero()) {
    return 0;
  }
  const ticks = value.mul(scale(pxDecimals)).div(tickSize);
  const rounded = (roundUp ? ticks.ceil() : ticks.floor()).mul(tickSize);
  return rounded.div(scale(pxDecimals)).toDecimalPlaces(pxDecimals, HalfEven).toNumber();
}

/**
 * Round a price to the nearest tick, ties to even.
 */
export function roundToValidPrice(price: Numeric, tickSize: Numeric, pxDecimals: number): number {
  const value = new Decimal(price);
  if (value.isZero()) {
    return 0;
  }
  const ticks = value.mul(scale(pxDecimals)).div(tickSize).toDecimalPlaces(0, HalfEven);
  return ticks.mul(tickSize).div(scale(pxDecimals)).toDecimalPlaces(pxDecimals, HalfEven).toNumber();
}

/**
 * Round an order size to the nearest lot, ties to even. Sizes below the
 * market minimum are raised to the minimum.
 */
export function roundToValidOrderSize(
  orderSize: Numeric,
  lotSize: Numeric,
  szDecimals: number,
  minSize: Numeric
): number {
  const value = new Decimal(orderSize);
  if (value.isZero()) {
    return 0;
  }
  const normalizedMin = new Decimal(minSize).div(scale(szDecimals));
  if (value.lessThan(normalizedMin)) {
    return normalizedMin.toNumber();
  }
  const lots = value.mul(scale(szDecimals)).div(lotSize).toDecimalPlaces(0, HalfEven);
  return lots.mul(lotSize).div(scale(szDecimals)).toDecimalPlaces(szDecimals, HalfEven).toNumber();
}

/**
 * Convert a decimal amount to integer chain units, truncating.
 *
 * @example
 * ```typescript
 * amountToChainUnits(5.67); // 5670000n
 * ```
 */
export function amountToChainUnits(amount: Numeric, decimals: number = 6): bigint {
  return BigInt(new Decimal(amount).mul(scale(decimals)).trunc().toFixed(0));
}

/**
 * Convert integer chain units back to a decimal amount.
 */
export function chainUnitsToAmount(chainUnits: bigint | number | string, decimals: number = 6): number {
  return new Decimal(chainUnits.toString()).div(scale(decimals)).toNumber();
}

/**
 * Snap a chain-unit value to the nearest multiple of `tickSize`, ties to
 * even. A zero value or tick gives zero.
 */
export function roundToTickMultiple(value: Numeric | bigint, tickSize: Numeric | bigint): bigint {
  const v = new Decimal(value.toString());
  const tick = new Decimal(tickSize.toString());
  if (v.isZero() || tick.isZero()) {
    return 0n;
  }
  const snapped = v.div(tick).toDecimalPlaces(0, HalfEven).mul(tick);
  return BigInt(snapped.toFixed(0, HalfEven));
}

/**
 * STEMWISE - Pool Math
 *
 * Integer helpers for constant-function pools. All values are bigint and all
 * rounding directions are explicit.
 */

import { ENGINE_CONSTANTS } from '../interfaces/types';

/**
 * Floor of the square root of a non-negative integer.
 */
export function isqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new Error('Square root of negative value');
  }
  if (value < 2n) {
    return value;
  }

  // Newton iteration from an upper bound
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/**
 * Division rounding up. Both operands must be positive.
 */
export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new Error('Division by non-positive denominator');
  }
  if (numerator === 0n) {
    return 0n;
  }
  return (numerator - 1n) / denominator + 1n;
}

/**
 * Pool-share supply of a two-token constant-product pool: floor(sqrt(x * y)).
 */
export function constantProductSupply(reserves: readonly bigint[]): bigint {
  if (reserves.length !== 2) {
    throw new Error(`Constant product pool needs 2 reserves, got ${reserves.length}`);
  }
  return isqrt(reserves[0] * reserves[1]);
}

/**
 * Reserve j must hold for the pool to back lpSupply, rounded up so the pool
 * never pays out more than the invariant allows.
 */
export function constantProductReserve(
  reserves: readonly bigint[],
  j: number,
  lpSupply: bigint
): bigint {
  const other = reserves[1 - j];
  return ceilDiv(lpSupply * lpSupply, other);
}

/**
 * Price of one unit of the quote token in units of the base token, scaled
 * by PRICE_PRECISION.
 */
export function poolPrice(baseReserve: bigint, quoteReserve: bigint): bigint {
  if (quoteReserve === 0n) {
    return 0n;
  }
  return (baseReserve * ENGINE_CONSTANTS.PRICE_PRECISION) / quoteReserve;
}

/**
 * Check a live price against a manipulation-resistant reference.
 *
 * Accepts when |current - reference| <= reference * slippageRatio / SLIPPAGE_PRECISION.
 */
export function isWithinSlippage(
  currentPrice: bigint,
  referencePrice: bigint,
  slippageRatio: bigint
): boolean {
  const deviation = currentPrice > referencePrice
    ? currentPrice - referencePrice
    : referencePrice - currentPrice;

  return deviation * ENGINE_CONSTANTS.SLIPPAGE_PRECISION <= referencePrice * slippageRatio;
}

/**
 * Decimal amounts and rational prices.
 *
 * Amounts are fixed point with seven decimal places, stored on the wire as a
 * signed 64-bit count of stroops. Prices are `n/d` with both terms in int32.
 *
 * @packageDocumentation
 */

import type { WirePrice } from '@txnkit/wire';
import { ValidationError } from '../errors/index.js';

export const STROOPS_PER_UNIT = 10_000_000n;
export const MAX_INT64 = 9_223_372_036_854_775_807n;
export const MAX_INT32 = 2_147_483_647;

/**
 * Largest representable amount.
 */
export const MAX_AMOUNT = '922337203685.4775807';

const AMOUNT_PATTERN = /^(\d+)(?:\.(\d{1,7}))?$/;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal amount string into stroops.
 *
 * @example
 * ```ts
 * parseAmount('10');        // 100000000n
 * parseAmount('0.0000001'); // 1n
 * ```
 */
export function parseAmount(value: string): bigint {
  const match = typeof value === 'string' ? AMOUNT_PATTERN.exec(value) : null;
  if (!match) {
    throw new ValidationError(`invalid amount: ${String(value)}`, { value });
  }
  const [, whole, fraction = ''] = match;
  const stroops = BigInt(whole) * STROOPS_PER_UNIT + BigInt(fraction.padEnd(7, '0'));
  if (stroops > MAX_INT64) {
    throw new ValidationError(`invalid amount: ${value} exceeds ${MAX_AMOUNT}`, { value });
  }
  return stroops;
}

/**
 * Format stroops as a decimal amount string with seven decimal places.
 */
export function formatAmount(stroops: bigint): string {
  const sign = stroops < 0n ? '-' : '';
  const abs = stroops < 0n ? -stroops : stroops;
  const whole = abs / STROOPS_PER_UNIT;
  const fraction = (abs % STROOPS_PER_UNIT).toString().padStart(7, '0');
  return `${sign}${whole}.${fraction}`;
}

export type PriceInput = string | { n: number; d: number };

/**
 * Convert a price to a rational with int32 terms.
 *
 * Decimal strings are approximated by the best continued-fraction convergent
 * whose terms fit in int32.
 *
 * @example
 * ```ts
 * parsePrice('0.01'); // { n: 1, d: 100 }
 * parsePrice({ n: 3, d: 4 });
 * ```
 */
export function parsePrice(price: PriceInput): WirePrice {
  if (typeof price !== 'string') {
    const { n, d } = price;
    if (!isPositiveInt32(n) || !isPositiveInt32(d)) {
      throw new ValidationError(`invalid price: ${n}/${d}`, { price });
    }
    return { n, d };
  }

  const match = DECIMAL_PATTERN.exec(price);
  if (!match) {
    throw new ValidationError(`invalid price: ${price}`, { price });
  }
  const [, whole, fraction = ''] = match;
  let p = BigInt(whole + fraction);
  let q = 10n ** BigInt(fraction.length);

  const max = BigInt(MAX_INT32);
  let previous: [bigint, bigint] = [1n, 0n];
  let beforePrevious: [bigint, bigint] = [0n, 1n];
  let best: [bigint, bigint] | undefined;

  while (p <= max * q) {
    const a = p / q;
    const h = a * previous[0] + beforePrevious[0];
    const k = a * previous[1] + beforePrevious[1];
    if (h > max || k > max) break;

    best = [h, k];
    beforePrevious = previous;
    previous = [h, k];

    const remainder = p - a * q;
    if (remainder === 0n) break;
    [p, q] = [q, remainder];
  }

  if (!best || best[0] === 0n || best[1] === 0n) {
    throw new ValidationError(`invalid price: ${price}`, { price });
  }
  return { n: Number(best[0]), d: Number(best[1]) };
}

function isPositiveInt32(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_INT32;
}

/**
 * Quantity helpers for wei-scale values crossing the JSON boundary.
 */

import { formatUnits, parseUnits } from 'viem';

const DECIMAL_RE = /^\d+$/;
const HEX_RE = /^0x[0-9a-fA-F]+$/;

/**
 * Read an integer quantity from a decimal string, hex string, bigint or safe integer.
 * Returns null for anything else (floats, negative values, unsafe numbers, junk strings).
 */
export function readQuantity(value: unknown): bigint | null {
  if (typeof value === 'bigint') {
    return value >= 0n ? value : null;
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (DECIMAL_RE.test(trimmed) || HEX_RE.test(trimmed)) {
      return BigInt(trimmed);
    }
  }
  return null;
}

/**
 * Convert a human amount ("0.125") into base units. Amounts stay decimal
 * strings from generation to here so no float rounding creeps in.
 */
export function toBaseUnits(amount: string | number, decimals = 18): bigint {
  const text = typeof amount === 'number' ? amount.toString() : amount.trim();
  return parseUnits(text, decimals);
}

export function fromBaseUnits(amount: bigint, decimals = 18): string {
  return formatUnits(amount, decimals);
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/**
 * Relative tolerance in parts per billion, compared with bigint math.
 */

import { absDiff } from '../utils/amounts';

const PPB = 1_000_000_000n;

export function toPartsPerBillion(tolerance: number): bigint {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new Error(`Invalid tolerance: ${tolerance}`);
  }
  return BigInt(Math.round(tolerance * 1e9));
}

/**
 * |actual - expected| <= expected * tolerance, boundary included.
 * An expected value of zero only matches zero.
 */
export function withinTolerance(actual: bigint, expected: bigint, tolerance: number): boolean {
  if (expected === 0n) return actual === 0n;
  const magnitude = expected < 0n ? -expected : expected;
  return absDiff(actual, expected) * PPB <= magnitude * toPartsPerBillion(tolerance);
}

export function describeTolerance(tolerance: number): string {
  return `${Number((tolerance * 100).toFixed(4))}%`;
}

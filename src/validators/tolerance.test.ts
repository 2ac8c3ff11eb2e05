import { describe, expect, it } from 'vitest';
import { describeTolerance, toPartsPerBillion, withinTolerance } from './tolerance';

describe('withinTolerance', () => {
  it('includes the boundary', () => {
    expect(withinTolerance(1001n, 1000n, 0.001)).toBe(true);
    expect(withinTolerance(999n, 1000n, 0.001)).toBe(true);
    expect(withinTolerance(1002n, 1000n, 0.001)).toBe(false);
  });

  it('only matches zero when zero is expected', () => {
    expect(withinTolerance(0n, 0n, 0.5)).toBe(true);
    expect(withinTolerance(1n, 0n, 0.5)).toBe(false);
  });

  it('handles negative deltas', () => {
    expect(withinTolerance(-999n, -1000n, 0.001)).toBe(true);
    expect(withinTolerance(-1100n, -1000n, 0.01)).toBe(false);
  });

  it('is exact for wei-sized amounts', () => {
    const oneEther = 10n ** 18n;
    expect(withinTolerance(oneEther + 10n ** 15n, oneEther, 0.001)).toBe(true);
    expect(withinTolerance(oneEther + 10n ** 15n + 1n, oneEther, 0.001)).toBe(false);
  });
});

describe('toPartsPerBillion', () => {
  it('rejects negative and non-finite tolerances', () => {
    expect(() => toPartsPerBillion(-1)).toThrow('Invalid tolerance: -1');
    expect(() => toPartsPerBillion(Number.NaN)).toThrow('Invalid tolerance: NaN');
  });

  it('converts ratios', () => {
    expect(toPartsPerBillion(0.01)).toBe(10_000_000n);
  });
});

describe('describeTolerance', () => {
  it('renders a percentage', () => {
    expect(describeTolerance(0.001)).toBe('0.1%');
    expect(describeTolerance(0.02)).toBe('2%');
  });
});

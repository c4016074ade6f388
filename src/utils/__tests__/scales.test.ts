/**
 * Tests for per-axis map derivation and application.
 */

import { describe, it, expect } from 'vitest';
import { applyAxisMap, applyFlippedAxisMap, deriveAxisMap } from '../scales';

describe('deriveAxisMap', () => {
  it('computes scale from interval widths and translation from canvas min', () => {
    const axis = deriveAxisMap(0, 400, 0, 100);

    expect(axis.s).toBe(4);
    expect(axis.t).toBe(0);
  });

  it('handles negative data intervals', () => {
    const axis = deriveAxisMap(10, 100, -100, 100);

    expect(axis.s).toBeCloseTo(0.45, 12);
    expect(axis.t).toBe(10);
  });

  it('produces Infinity for a zero-span data interval', () => {
    const axis = deriveAxisMap(0, 100, 5, 5);

    expect(axis.s).toBe(Number.POSITIVE_INFINITY);
  });

  it('produces NaN when both intervals have zero span', () => {
    const axis = deriveAxisMap(7, 7, 5, 5);

    expect(axis.s).toBeNaN();
  });

  it('returns a frozen map', () => {
    expect(Object.isFrozen(deriveAxisMap(0, 1, 0, 1))).toBe(true);
  });
});

describe('applyAxisMap', () => {
  it('measures from the data minimum', () => {
    const axis = deriveAxisMap(0, 400, 0, 100);

    expect(applyAxisMap(axis, 0, 0)).toBe(0);
    expect(applyAxisMap(axis, 0, 25)).toBe(100);
    expect(applyAxisMap(axis, 0, 100)).toBe(400);
  });

  it('extrapolates outside the data interval', () => {
    const axis = deriveAxisMap(0, 400, 0, 100);

    expect(applyAxisMap(axis, 0, -10)).toBe(-40);
    expect(applyAxisMap(axis, 0, 150)).toBe(600);
  });
});

describe('applyFlippedAxisMap', () => {
  it('measures back from the data maximum', () => {
    const axis = deriveAxisMap(0, 400, 0, 100);

    expect(applyFlippedAxisMap(axis, 100, 100)).toBe(0);
    expect(applyFlippedAxisMap(axis, 100, 75)).toBe(100);
    expect(applyFlippedAxisMap(axis, 100, 0)).toBe(400);
  });
});

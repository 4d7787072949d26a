/**
 * @see src/utils/math.ts
 */

import { describe, it, expect } from 'vitest';
import { clamp, safeMax, safeMin } from '../../../src/utils/math.js';

describe('safeMin / safeMax', () => {
  it('returns undefined for an empty array', () => {
    expect(safeMin([])).toBeUndefined();
    expect(safeMax([])).toBeUndefined();
  });

  it('handles arrays too large to spread', () => {
    const values = Array.from({ length: 200_000 }, (_, i) => i - 100);
    expect(safeMin(values)).toBe(-100);
    expect(safeMax(values)).toBe(199_899);
  });
});

describe('clamp', () => {
  it('restricts to the range and maps NaN to the minimum', () => {
    expect(clamp(1.4, 0, 1)).toBe(1);
    expect(clamp(-0.2, 0, 1)).toBe(0);
    expect(clamp(0.42, 0, 1)).toBe(0.42);
    expect(clamp(Number.NaN, 0, 1)).toBe(0);
  });
});

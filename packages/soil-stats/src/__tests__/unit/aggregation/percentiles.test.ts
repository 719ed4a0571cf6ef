/**
 * Percentiles
 */

import { describe, it, expect } from 'vitest';
import { percentileLabel, percentiles, quantileSorted, sortedPositive } from '../../../aggregation/percentiles.js';
import { DEFAULT_PERCENTILES } from '../../../core/constants.js';

describe('percentileLabel', () => {
  it('should format fractions as percent labels', () => {
    expect(percentileLabel(0.02)).toBe('2%');
    expect(percentileLabel(0.1)).toBe('10%');
    expect(percentileLabel(0.98)).toBe('98%');
    expect(percentileLabel(0.025)).toBe('2.5%');
  });
});

describe('percentiles', () => {
  it('should interpolate linearly between closest ranks', () => {
    const result = percentiles([5, 1, 4, 2, 3], [0.5, 0.1, 0.9]);
    expect(Object.keys(result)).toEqual(['50%', '10%', '90%']);
    expect(result['50%']).toBe(3);
    expect(result['10%']).toBeCloseTo(1.4, 10);
    expect(result['90%']).toBeCloseTo(4.6, 10);
  });

  it('should ignore non-positive and non-finite values', () => {
    expect(percentiles([0, -1, Number.NaN, Infinity, 10], [0.5])).toEqual({ '50%': 10 });
  });

  it('should return an empty record for empty input', () => {
    expect(percentiles([])).toEqual({});
    expect(percentiles([0, -3])).toEqual({});
  });

  it('should be non-decreasing across the default percentile set', () => {
    const values = [3.2, 18, 7.5, 44, 12, 9.9, 26, 31, 1.1, 15];
    const result = percentiles(values);
    const ordered = DEFAULT_PERCENTILES.map((p) => result[percentileLabel(p)]);
    expect(ordered).toHaveLength(DEFAULT_PERCENTILES.length);
    for (let i = 1; i < ordered.length; i++) {
      expect(ordered[i]).toBeGreaterThanOrEqual(ordered[i - 1]);
    }
    expect(ordered[0]).toBeGreaterThanOrEqual(1.1);
    expect(ordered[ordered.length - 1]).toBeLessThanOrEqual(44);
  });
});

describe('quantileSorted', () => {
  const sorted = sortedPositive([4, 2, 8, 6]);

  it('should sort positive values ascending', () => {
    expect(Array.from(sorted)).toEqual([2, 4, 6, 8]);
  });

  it('should clamp p to [0, 1]', () => {
    expect(quantileSorted(sorted, -1)).toBe(2);
    expect(quantileSorted(sorted, 0)).toBe(2);
    expect(quantileSorted(sorted, 1)).toBe(8);
    expect(quantileSorted(sorted, 3)).toBe(8);
  });
});

/**
 * Descriptive statistics
 */

import { describe, it, expect } from 'vitest';
import { describeArea, describeValues } from '../../../aggregation/descriptive-stats.js';

describe('describeValues', () => {
  it('should compute sample statistics', () => {
    const stats = describeValues([2, 4, 4, 4, 5, 5, 7, 9]);

    expect(stats?.count).toBe(8);
    expect(stats?.mean).toBe(5);
    expect(stats?.median).toBe(4.5);
    expect(stats?.min).toBe(2);
    expect(stats?.max).toBe(9);
    expect(stats?.std).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(stats?.cv).toBeCloseTo(Math.sqrt(32 / 7) / 5, 10);
  });

  it('should skip non-finite values', () => {
    expect(describeValues([Number.NaN, 3, Infinity])).toEqual({
      count: 1,
      mean: 3,
      median: 3,
      min: 3,
      max: 3,
      std: 0,
      cv: 0,
    });
    expect(describeValues([Number.NaN])).toBeNull();
    expect(describeValues([])).toBeNull();
  });

  it('should report zero variation for a zero mean', () => {
    expect(describeValues([-1, 1])?.cv).toBe(0);
  });
});

describe('describeArea', () => {
  it('should total the area and describe the values', () => {
    expect(describeArea([10, 20], [1, 2])).toEqual({
      totalArea: 3,
      mean: 15,
      median: 15,
      min: 10,
      max: 20,
    });
  });

  it('should return null without values', () => {
    expect(describeArea([], [])).toBeNull();
  });
});

/**
 * Descriptive statistics over finite values
 */

import type { AreaStats, DescriptiveStats } from '../core/types/summary.js';
import { quantileSorted } from './percentiles.js';

function finiteSorted(values: ArrayLike<number>): Float64Array {
  const kept: number[] = [];
  for (let i = 0; i < values.length; i++) {
    if (Number.isFinite(values[i])) kept.push(values[i]);
  }
  return Float64Array.from(kept).sort();
}

/**
 * count, mean, median, min, max, sample standard deviation (n - 1) and
 * coefficient of variation. Null when no value is finite.
 */
export function describeValues(values: ArrayLike<number>): DescriptiveStats | null {
  const sorted = finiteSorted(values);
  const count = sorted.length;
  if (count === 0) {
    return null;
  }

  let sum = 0;
  for (const value of sorted) sum += value;
  const mean = sum / count;

  let squares = 0;
  for (const value of sorted) squares += (value - mean) ** 2;
  const std = count < 2 ? 0 : Math.sqrt(squares / (count - 1));

  return {
    count,
    mean,
    median: quantileSorted(sorted, 0.5),
    min: sorted[0],
    max: sorted[count - 1],
    std,
    cv: mean === 0 ? 0 : std / mean,
  };
}

/**
 * Total area of the counted mapped rows plus the spread of their values
 */
export function describeArea(values: ArrayLike<number>, areas: ArrayLike<number>): AreaStats | null {
  const stats = describeValues(values);
  if (!stats) {
    return null;
  }
  let totalArea = 0;
  for (let i = 0; i < areas.length; i++) totalArea += areas[i];
  return {
    totalArea,
    mean: stats.mean,
    median: stats.median,
    min: stats.min,
    max: stats.max,
  };
}

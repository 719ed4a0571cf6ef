/**
 * PercentileCalculator
 *
 * Linear interpolation between closest ranks at position (n - 1) · p over
 * the finite positive values. Never throws; empty input gives {}.
 */

import { DEFAULT_PERCENTILES } from '../core/constants.js';

/**
 * 0.02 -> '2%', 0.1 -> '10%', 0.025 -> '2.5%'
 */
export function percentileLabel(p: number): string {
  return `${Number((p * 100).toFixed(4))}%`;
}

/**
 * Finite values > 0, sorted ascending
 */
export function sortedPositive(values: ArrayLike<number>): Float64Array {
  const kept: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (Number.isFinite(value) && value > 0) kept.push(value);
  }
  return Float64Array.from(kept).sort();
}

/**
 * Percentile of an ascending, non-empty array. p is clamped to [0, 1].
 */
export function quantileSorted(sorted: Float64Array, p: number): number {
  const q = Number.isNaN(p) ? 0 : Math.min(1, Math.max(0, p));
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) {
    return sorted[lo];
  }
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function percentiles(
  values: ArrayLike<number>,
  ps: readonly number[] = DEFAULT_PERCENTILES
): Record<string, number> {
  const sorted = sortedPositive(values);
  const result: Record<string, number> = {};
  if (sorted.length === 0) {
    return result;
  }
  for (const p of ps) {
    result[percentileLabel(p)] = quantileSorted(sorted, p);
  }
  return result;
}

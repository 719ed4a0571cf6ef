/**
 * AttributeClassifier
 *
 * Maps raw measurements to grades. Missing, NaN and non-positive values are
 * unclassifiable; classification never throws. +Infinity lands in the last
 * level, whose threshold is always +Infinity.
 *
 * Scalar and column paths both go through searchLevel, so
 * classifyColumn(values)[i] always matches classify(values[i]).
 */

import type { GradeCode, GradeResult } from '../core/types/grading.js';
import { NOT_COUNTED } from '../core/constants.js';
import { searchLevel, type GradeScale } from './grade-scale.js';

export function classify(value: number | null | undefined, scale: GradeScale): GradeResult {
  if (value === null || value === undefined) {
    return { kind: 'unclassifiable', reason: 'missing' };
  }
  if (Number.isNaN(value)) {
    return { kind: 'unclassifiable', reason: 'not_a_number' };
  }
  if (value <= 0) {
    return { kind: 'unclassifiable', reason: 'non_positive' };
  }
  const levelIndex = searchLevel(scale.thresholds, value);
  return {
    kind: 'graded',
    code: scale.levels[levelIndex].code,
    rank: levelIndex + 1,
    levelIndex,
  };
}

/**
 * Grade code or null when unclassifiable
 */
export function classifyCode(value: number | null | undefined, scale: GradeScale): GradeCode | null {
  const result = classify(value, scale);
  return result.kind === 'graded' ? result.code : null;
}

/**
 * Classify a whole column. Unclassifiable entries get NOT_COUNTED (-1).
 */
export function classifyColumn(values: Float64Array, scale: GradeScale): Int16Array {
  const out = new Int16Array(values.length);
  const thresholds = scale.thresholds;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    out[i] = !Number.isNaN(value) && value > 0 ? searchLevel(thresholds, value) : NOT_COUNTED;
  }
  return out;
}

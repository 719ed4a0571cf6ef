/**
 * Display labels for grade levels: Roman numeral codes and range text.
 */

import type { GradeCode } from '../core/types/grading.js';
import type { GradeLabel } from '../core/types/summary.js';
import type { GradeScale } from './grade-scale.js';

const ROMAN_NUMERALS = ['Ⅰ', 'Ⅱ', 'Ⅲ', 'Ⅳ', 'Ⅴ', 'Ⅵ', 'Ⅶ'] as const;

/**
 * '1级' -> 'Ⅰ级' up to '7级'; other codes are returned unchanged
 */
export function toRomanGradeCode(code: GradeCode): string {
  const match = /^([1-7])级$/.exec(code);
  if (!match) return code;
  return `${ROMAN_NUMERALS[Number(match[1]) - 1]}级`;
}

/**
 * Range text of level i: '≤t0' for the first, 'a～b' in between and '>t' for
 * the open-ended last level.
 */
export function levelRangeText(scale: GradeScale, index: number): string {
  const thresholds = scale.thresholds;
  const upper = thresholds[index];
  const lower = index > 0 ? thresholds[index - 1] : null;

  if (upper === Number.POSITIVE_INFINITY) {
    return `>${lower ?? 0}`;
  }
  if (lower === null) {
    return `≤${upper}`;
  }
  return `${lower}～${upper}`;
}

export function describeGradeLevels(scale: GradeScale): GradeLabel[] {
  return scale.levels.map((level, index) => ({
    code: level.code,
    rank: index + 1,
    displayCode: toRomanGradeCode(level.code),
    description: level.description,
    range: levelRangeText(scale, index),
  }));
}

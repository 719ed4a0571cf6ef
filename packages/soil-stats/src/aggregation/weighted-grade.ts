/**
 * WeightedGradeCalculator
 *
 * Area-weighted mean rank: Σ(rank_i · area_i) / Σ area_i over the grades
 * with positive area. Null when no grade has area.
 */

import type { GradeCode } from '../core/types/grading.js';
import type { GradeScale } from '../grading/grade-scale.js';

/**
 * Weighted rank from per-level areas indexed like `scale.levels`
 */
export function weightedAvgGradeByLevel(areaByLevel: ArrayLike<number>, scale: GradeScale): number | null {
  let weighted = 0;
  let total = 0;
  for (let i = 0; i < scale.size; i++) {
    const area = areaByLevel[i];
    if (area > 0) {
      weighted += (i + 1) * area;
      total += area;
    }
  }
  if (total === 0) {
    return null;
  }
  // keep rounding error inside [1, N]
  return Math.min(scale.size, Math.max(1, weighted / total));
}

export function weightedAvgGrade(
  perGradeArea: Readonly<Record<GradeCode, number>>,
  scale: GradeScale
): number | null {
  return weightedAvgGradeByLevel(
    scale.levels.map((level) => perGradeArea[level.code] ?? 0),
    scale
  );
}

/**
 * GradeScale
 *
 * Validated, immutable list of grade levels for one attribute. Invariants are
 * checked once in GradeScale.create; every other method assumes them.
 *
 * Invariants:
 * - at least one level
 * - thresholds strictly increasing, the last one +Infinity
 * - grade codes unique and non-empty
 * - rank(code) is the 1-based position of the code in the list
 */

import type { GradeCode, GradeLevel } from '../core/types/grading.js';
import { GradingConfigError } from '../core/types/errors.js';

/** Level indices are stored in Int16Array columns */
const MAX_LEVELS = 0x7fff;

export interface GradeScaleContext {
  readonly standardId?: string;
  readonly attrKey?: string;
}

/**
 * Index of the first threshold t with value <= t.
 *
 * Shared by scalar and column classification. Expects a positive, non-NaN
 * value; a value equal to a threshold belongs to the earlier level.
 */
export function searchLevel(thresholds: Float64Array, value: number): number {
  let lo = 0;
  let hi = thresholds.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (value <= thresholds[mid]) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

export class GradeScale {
  readonly levels: readonly GradeLevel[];
  readonly thresholds: Float64Array;
  private readonly rankByCode: ReadonlyMap<GradeCode, number>;

  private constructor(levels: readonly GradeLevel[]) {
    this.levels = Object.freeze(levels.map((level) => Object.freeze({ ...level })));
    this.thresholds = Float64Array.from(levels, (level) => level.threshold);
    this.rankByCode = new Map(levels.map((level, index) => [level.code, index + 1]));
  }

  /**
   * Validate levels and build a scale.
   *
   * @throws GradingConfigError when any invariant is violated
   */
  static create(levels: readonly GradeLevel[], context: GradeScaleContext = {}): GradeScale {
    const where = context.attrKey
      ? ` (${context.standardId ? `${context.standardId}/` : ''}${context.attrKey})`
      : '';

    if (levels.length === 0) {
      throw new GradingConfigError(`Grade scale has no levels${where}`, { ...context });
    }
    if (levels.length > MAX_LEVELS) {
      throw new GradingConfigError(`Grade scale has too many levels${where}`, {
        ...context,
        levels: levels.length,
      });
    }

    const seen = new Set<GradeCode>();
    levels.forEach((level, index) => {
      if (Number.isNaN(level.threshold)) {
        throw new GradingConfigError(`Threshold ${index} is not a number${where}`, {
          ...context,
          index,
        });
      }
      if (index > 0 && !(level.threshold > levels[index - 1].threshold)) {
        throw new GradingConfigError(
          `Thresholds must be strictly increasing: ${levels[index - 1].threshold} then ${level.threshold}${where}`,
          { ...context, index }
        );
      }
      if (level.code.trim() === '') {
        throw new GradingConfigError(`Grade code ${index} is empty${where}`, { ...context, index });
      }
      if (seen.has(level.code)) {
        throw new GradingConfigError(`Duplicate grade code ${level.code}${where}`, {
          ...context,
          code: level.code,
        });
      }
      seen.add(level.code);
    });

    const last = levels[levels.length - 1];
    if (last.threshold !== Number.POSITIVE_INFINITY) {
      throw new GradingConfigError(
        `Last threshold must be Infinity, got ${last.threshold}${where}`,
        { ...context, threshold: last.threshold }
      );
    }

    return new GradeScale(levels);
  }

  /** Number of levels (N); ranks run 1..N */
  get size(): number {
    return this.levels.length;
  }

  /** Grade codes in rank order */
  get codes(): readonly GradeCode[] {
    return this.levels.map((level) => level.code);
  }

  rankOf(code: GradeCode): number | undefined {
    return this.rankByCode.get(code);
  }

  /** Level index for a positive value; see searchLevel */
  indexOf(value: number): number {
    return searchLevel(this.thresholds, value);
  }
}

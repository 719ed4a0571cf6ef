/**
 * Grading Types
 *
 * Vocabulary of grading standards: attribute keys, grade codes, level
 * definitions and the classification result union.
 *
 * TYPE SAFETY: AttrKey and GradeCode are plain string aliases. Standards are
 * data loaded from files, so their vocabularies are only known at run time.
 */

import type { GradeScale } from '../../grading/grade-scale.js';

/** Standardized attribute key, e.g. 'OM', 'ph', 'AK' */
export type AttrKey = string;

/** Grade code as written in a standard, e.g. '1级' */
export type GradeCode = string;

/**
 * Which land-use rows an attribute is evaluated on
 */
export type LandFilter = 'none' | 'cultivated_and_garden' | 'paddy_only' | 'cultivated_only';

export const LAND_FILTERS: readonly LandFilter[] = [
  'none',
  'cultivated_and_garden',
  'paddy_only',
  'cultivated_only',
] as const;

/**
 * One level of a grade scale. A value v belongs to the first level whose
 * threshold satisfies v <= threshold.
 */
export interface GradeLevel {
  readonly threshold: number;
  readonly code: GradeCode;
  readonly description: string;
}

/**
 * Grading rules for one attribute
 */
export interface AttributeGradeConfig {
  readonly key: AttrKey;
  readonly displayName: string;
  readonly unit: string;
  /** Presentation hint only; never changes rank order */
  readonly reverseDisplay: boolean;
  readonly landFilter: LandFilter;
  readonly scale: GradeScale;
}

/**
 * A named, swappable set of attribute grading rules
 */
export interface GradingStandard {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly attributes: ReadonlyMap<AttrKey, AttributeGradeConfig>;
}

/**
 * Registry listing entry
 */
export interface GradingStandardInfo {
  readonly id: string;
  readonly name: string;
  readonly description: string;
}

export type UnclassifiableReason = 'missing' | 'not_a_number' | 'non_positive';

/**
 * Classification outcome. Unclassifiable values are an expected result, not
 * an error.
 */
export type GradeResult =
  | {
      readonly kind: 'graded';
      readonly code: GradeCode;
      /** 1-based position in the scale */
      readonly rank: number;
      readonly levelIndex: number;
    }
  | {
      readonly kind: 'unclassifiable';
      readonly reason: UnclassifiableReason;
    };

/**
 * Type guard for LandFilter values read from untyped input
 */
export function isLandFilter(value: unknown): value is LandFilter {
  return typeof value === 'string' && (LAND_FILTERS as readonly string[]).includes(value);
}

/**
 * Summary Types
 *
 * Output shapes of the aggregation engine. Every summary is deep-frozen by
 * the assembler and owned by the caller.
 */

import type { AttrKey, GradeCode } from './grading.js';

export type DimensionKind = 'region' | 'land_use' | 'soil_taxonomy';

export const DIMENSION_KINDS: readonly DimensionKind[] = [
  'region',
  'land_use',
  'soil_taxonomy',
] as const;

export interface SampleValueStats {
  readonly count: number;
  readonly mean: number;
  readonly min: number;
  readonly max: number;
}

export interface DimensionalBucket {
  readonly dimension: DimensionKind;
  /** Path from the hierarchy root; length 1 for top-level buckets */
  readonly keyPath: readonly string[];
  readonly label: string;
  readonly perGradeCounts: Readonly<Record<GradeCode, number>>;
  readonly perGradeArea: Readonly<Record<GradeCode, number>>;
  readonly totalCount: number;
  readonly totalArea: number;
  readonly weightedAvgGrade: number | null;
  readonly sampleValues: SampleValueStats | null;
}

export interface DescriptiveStats {
  readonly count: number;
  readonly mean: number;
  readonly median: number;
  readonly min: number;
  readonly max: number;
  readonly std: number;
  readonly cv: number;
}

export interface AreaStats {
  readonly totalArea: number;
  readonly mean: number;
  readonly median: number;
  readonly min: number;
  readonly max: number;
}

export interface GradeBreakdownEntry {
  readonly count: number;
  readonly area: number;
  /** Percent (0-100) of total area, or of sample count when no area */
  readonly pct: number;
}

export interface GradeLabel {
  readonly code: GradeCode;
  readonly rank: number;
  readonly displayCode: string;
  readonly description: string;
  readonly range: string;
}

export interface AttributeStatsSummary {
  readonly attrKey: AttrKey;
  readonly displayName: string;
  readonly unit: string;
  readonly standardId: string;
  readonly reverseDisplay: boolean;
  readonly sampleStats: DescriptiveStats | null;
  readonly areaStats: AreaStats | null;
  readonly globalGradeBreakdown: Readonly<Record<GradeCode, GradeBreakdownEntry>>;
  readonly weightedAvgGrade: number | null;
  readonly buckets: readonly DimensionalBucket[];
  readonly dimensions: readonly DimensionKind[];
  readonly percentiles: Readonly<Record<string, number>>;
  readonly gradeLabels: readonly GradeLabel[];
}

export interface AttributeFailure {
  readonly attrKey: AttrKey;
  readonly error: string;
  readonly code?: string;
}

export interface ReportResult {
  readonly standardId: string;
  readonly summaries: readonly AttributeStatsSummary[];
  readonly failures: readonly AttributeFailure[];
}

/**
 * StatsSummary assembler
 *
 * Pure composition of already computed parts into one deep-frozen
 * AttributeStatsSummary. Nothing is recomputed here.
 */

import type { AttributeGradeConfig, GradeCode } from '../core/types/grading.js';
import type {
  AreaStats,
  AttributeStatsSummary,
  DescriptiveStats,
  DimensionKind,
  DimensionalBucket,
  GradeBreakdownEntry,
  GradeLabel,
} from '../core/types/summary.js';
import { deepFreeze } from '../core/utils/freeze.js';

export interface SummaryParts {
  readonly standardId: string;
  readonly config: AttributeGradeConfig;
  readonly sampleStats: DescriptiveStats | null;
  readonly areaStats: AreaStats | null;
  readonly globalGradeBreakdown: Readonly<Record<GradeCode, GradeBreakdownEntry>>;
  readonly weightedAvgGrade: number | null;
  readonly buckets: readonly DimensionalBucket[];
  readonly dimensions: readonly DimensionKind[];
  readonly percentiles: Readonly<Record<string, number>>;
  readonly gradeLabels: readonly GradeLabel[];
}

export function assembleSummary(parts: SummaryParts): AttributeStatsSummary {
  const { config } = parts;
  return deepFreeze({
    attrKey: config.key,
    displayName: config.displayName,
    unit: config.unit,
    standardId: parts.standardId,
    reverseDisplay: config.reverseDisplay,
    sampleStats: parts.sampleStats,
    areaStats: parts.areaStats,
    globalGradeBreakdown: parts.globalGradeBreakdown,
    weightedAvgGrade: parts.weightedAvgGrade,
    buckets: parts.buckets,
    dimensions: parts.dimensions,
    percentiles: parts.percentiles,
    gradeLabels: parts.gradeLabels,
  });
}

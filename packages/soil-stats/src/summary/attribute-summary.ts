/**
 * Per-attribute pipeline
 *
 * classification → aggregation, percentiles and descriptive stats →
 * weighted grades → assembly, for one attribute of one dataset.
 */

import type { AttrKey, GradeCode, GradingStandard } from '../core/types/grading.js';
import type { ObservationDataset } from '../core/types/observation.js';
import type { DimensionKind, DimensionalBucket, GradeBreakdownEntry, AttributeStatsSummary } from '../core/types/summary.js';
import { DIMENSION_KINDS } from '../core/types/summary.js';
import { IngestionError, SoilStatsError } from '../core/types/errors.js';
import { DEFAULT_PERCENTILES } from '../core/constants.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { describeGradeLevels } from '../grading/grade-labels.js';
import { classifyTable, countedAreas, countedValues } from '../aggregation/classified-table.js';
import { GradeTally, aggregate, tallyTable } from '../aggregation/dimensional-aggregator.js';
import { percentiles } from '../aggregation/percentiles.js';
import { describeArea, describeValues } from '../aggregation/descriptive-stats.js';
import { weightedAvgGradeByLevel } from '../aggregation/weighted-grade.js';
import type { GradeScale } from '../grading/grade-scale.js';
import { assembleSummary } from './assembler.js';

const defaultLog = createLogger({ module: 'summary' });

export interface AttributeSummaryOptions {
  readonly percentiles?: readonly number[];
  readonly logger?: Logger;
}

/**
 * pct is the share of total area when the mapped table contributes area,
 * otherwise the share of sample count
 */
function gradeBreakdown(tally: GradeTally, scale: GradeScale): Record<GradeCode, GradeBreakdownEntry> {
  const totalArea = tally.totalArea;
  const totalCount = tally.totalCount;
  return Object.fromEntries(
    scale.levels.map((level, i) => {
      const count = tally.counts[i];
      const area = tally.areas[i];
      const pct =
        totalArea > 0 ? (area / totalArea) * 100 : totalCount > 0 ? (count / totalCount) * 100 : 0;
      return [level.code, { count, area, pct }];
    })
  );
}

/**
 * Compute the summary of one attribute.
 *
 * @throws SoilStatsError unknown_attribute when the standard has no such attribute
 * @throws IngestionError missing_column when no table carries the attribute
 */
export function computeAttributeSummary(
  dataset: ObservationDataset,
  attrKey: AttrKey,
  standard: GradingStandard,
  options: AttributeSummaryOptions = {}
): AttributeStatsSummary {
  const log = options.logger ?? defaultLog;
  const config = standard.attributes.get(attrKey);
  if (!config) {
    throw new SoilStatsError(`Attribute ${attrKey} is not graded by standard ${standard.id}`, 'unknown_attribute', {
      attrKey,
      standardId: standard.id,
    });
  }

  const sample = dataset.sample ? classifyTable(dataset.sample, config, log) : null;
  const mapped = dataset.mapped ? classifyTable(dataset.mapped, config, log) : null;
  if (!sample && !mapped) {
    throw new IngestionError(`No table has a column for ${attrKey}`, 'missing_column', { attrKey });
  }
  log.debug('Attribute classified', {
    attrKey,
    sample: sample?.diagnostics ?? null,
    mapped: mapped?.diagnostics ?? null,
  });

  const { scale } = config;
  const global = new GradeTally(scale.size);
  if (sample) tallyTable(global, sample);
  if (mapped) tallyTable(global, mapped);

  const buckets: DimensionalBucket[] = [];
  const dimensions: DimensionKind[] = [];
  for (const dimension of DIMENSION_KINDS) {
    const result = aggregate({ sample, mapped }, dimension, scale);
    if (result) {
      dimensions.push(dimension);
      buckets.push(...result);
    }
  }

  const sampleValues = sample ? countedValues(sample) : new Float64Array(0);

  return assembleSummary({
    standardId: standard.id,
    config,
    sampleStats: describeValues(sampleValues),
    areaStats: mapped ? describeArea(countedValues(mapped), countedAreas(mapped)) : null,
    globalGradeBreakdown: gradeBreakdown(global, scale),
    weightedAvgGrade: weightedAvgGradeByLevel(global.areas, scale),
    buckets,
    dimensions,
    percentiles: percentiles(sampleValues, options.percentiles ?? DEFAULT_PERCENTILES),
    gradeLabels: describeGradeLevels(scale),
  });
}

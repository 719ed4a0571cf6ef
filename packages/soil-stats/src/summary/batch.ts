/**
 * Batch runner
 *
 * Computes one summary per attribute. Each attribute runs in its own
 * try/catch: a failure is logged and recorded, the batch continues and no
 * partial summary of the failed attribute is returned. An unknown grading
 * standard is fatal and aborts the whole batch.
 */

import type { AttrKey, GradingStandard } from '../core/types/grading.js';
import type { ObservationDataset } from '../core/types/observation.js';
import type { AttributeFailure, AttributeStatsSummary, ReportResult } from '../core/types/summary.js';
import { isGradingStandardNotFoundError, isSoilStatsError } from '../core/types/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { availableAttributes } from '../normalization/dataset.js';
import { computeAttributeSummary } from './attribute-summary.js';

const defaultLog = createLogger({ module: 'batch' });

export interface RunReportOptions {
  readonly standard: GradingStandard;
  /** Defaults to every standard attribute present in the dataset */
  readonly attributes?: readonly AttrKey[];
  readonly percentiles?: readonly number[];
  readonly logger?: Logger;
}

export function runReport(dataset: ObservationDataset, options: RunReportOptions): ReportResult {
  const { standard } = options;
  const log = options.logger ?? defaultLog;
  const attributes = options.attributes ?? availableAttributes(dataset, standard);

  const summaries: AttributeStatsSummary[] = [];
  const failures: AttributeFailure[] = [];

  for (const attrKey of attributes) {
    log.debug('Attribute started', { attrKey, standardId: standard.id });
    try {
      summaries.push(
        computeAttributeSummary(dataset, attrKey, standard, {
          percentiles: options.percentiles,
          logger: log,
        })
      );
      log.debug('Attribute finished', { attrKey });
    } catch (error) {
      if (isGradingStandardNotFoundError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      log.error('Attribute failed', { attrKey, error: message });
      failures.push(
        isSoilStatsError(error) ? { attrKey, error: message, code: error.code } : { attrKey, error: message }
      );
    }
  }

  log.info('Report computed', {
    standardId: standard.id,
    attributes: attributes.length,
    failed: failures.length,
  });
  return { standardId: standard.id, summaries, failures };
}

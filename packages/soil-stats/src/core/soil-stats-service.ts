/**
 * Soil Stats Service
 *
 * Facade over the engine: resolves the grading standard once per request,
 * normalizes the input tables and runs the per-attribute batch.
 *
 * An unknown standard id throws GradingStandardNotFoundError before any
 * table is touched. A logLevel passed in the config applies process-wide.
 */

import type { AttrKey, GradingStandard } from './types/grading.js';
import type { RawTable } from './types/observation.js';
import type { ReportResult } from './types/summary.js';
import { DEFAULT_CONFIG, type SoilStatsConfig } from './config.js';
import { BYTES_PER_MB } from './constants.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { GradingStandardRegistry } from '../grading/registry.js';
import { createDefaultRegistry } from '../grading/builtin-standards.js';
import { normalizeDataset, datasetFromObservations, type ObservationDatasetInput } from '../normalization/dataset.js';
import { readTableFiles } from '../ingestion/table-reader.js';
import { runReport } from '../summary/batch.js';

export interface ReportRequest {
  readonly standardId?: string;
  readonly sample?: RawTable | readonly RawTable[] | null;
  readonly mapped?: RawTable | readonly RawTable[] | null;
  readonly attributes?: readonly AttrKey[];
}

export interface ObservationReportRequest extends ObservationDatasetInput {
  readonly standardId?: string;
  readonly attributes?: readonly AttrKey[];
}

export interface FileReportRequest {
  readonly standardId?: string;
  readonly sampleFiles?: readonly string[];
  readonly mappedFiles?: readonly string[];
  readonly attributes?: readonly AttrKey[];
}

export class SoilStatsService {
  readonly config: SoilStatsConfig;
  readonly registry: GradingStandardRegistry;
  private readonly log = createLogger({ module: 'service' });

  constructor(config: Partial<SoilStatsConfig> = {}, registry?: GradingStandardRegistry) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (config.logLevel) {
      setLogLevel(config.logLevel);
    }
    this.registry =
      registry ??
      createDefaultRegistry({
        standardsDirs: this.config.standardsDirs,
        activeId: this.config.defaultStandard,
      });
  }

  /**
   * Explicit id, else the registry's active standard, else the configured
   * default.
   *
   * @throws GradingStandardNotFoundError
   */
  resolveStandard(standardId?: string): GradingStandard {
    return this.registry.require(standardId ?? this.registry.activeId() ?? this.config.defaultStandard);
  }

  /**
   * Compute summaries for header/row tables
   */
  generateReport(request: ReportRequest): ReportResult {
    const standard = this.resolveStandard(request.standardId);
    this.log.info('Generating report', {
      standardId: standard.id,
      attributes: request.attributes ?? 'all',
    });
    const dataset = normalizeDataset({ sample: request.sample, mapped: request.mapped }, standard);
    return runReport(dataset, {
      standard,
      attributes: request.attributes,
      percentiles: this.config.percentiles,
    });
  }

  /**
   * Compute summaries for Observation rows
   */
  generateReportFromObservations(request: ObservationReportRequest): ReportResult {
    const standard = this.resolveStandard(request.standardId);
    const dataset = datasetFromObservations({ sample: request.sample, mapped: request.mapped }, standard);
    return runReport(dataset, {
      standard,
      attributes: request.attributes,
      percentiles: this.config.percentiles,
    });
  }

  /**
   * Read CSV/XLSX files and compute summaries
   */
  generateReportFromFiles(request: FileReportRequest): ReportResult {
    const standard = this.resolveStandard(request.standardId);
    const readOptions = { maxFileBytes: this.config.maxFileMb * BYTES_PER_MB };
    const sample = readTableFiles(request.sampleFiles ?? [], readOptions);
    const mapped = readTableFiles(request.mappedFiles ?? [], readOptions);
    return this.generateReport({
      standardId: standard.id,
      sample,
      mapped,
      attributes: request.attributes,
    });
  }
}

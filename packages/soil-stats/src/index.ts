/**
 * soil-stats
 *
 * Attribute classification and multi-dimensional statistics for soil survey
 * tables.
 *
 * @example
 * ```typescript
 * import { SoilStatsService } from 'soil-stats';
 *
 * const service = new SoilStatsService();
 * const report = service.generateReportFromFiles({
 *   sampleFiles: ['samples.csv'],
 *   mappedFiles: ['zones.xlsx'],
 * });
 * for (const summary of report.summaries) {
 *   console.log(summary.attrKey, summary.weightedAvgGrade);
 * }
 * ```
 */

export * from './core/types/index.js';
export { DEFAULT_CONFIG } from './core/config.js';
export type { SoilStatsConfig } from './core/config.js';
export { DEFAULT_PERCENTILES, DEFAULT_STANDARD_ID } from './core/constants.js';
export { SoilStatsService } from './core/soil-stats-service.js';
export type { FileReportRequest, ObservationReportRequest, ReportRequest } from './core/soil-stats-service.js';
export { createLogger, logger, setLogLevel } from './core/utils/logger.js';
export type { LogLevel, Logger, LogMetadata } from './core/utils/logger.js';

export * from './grading/index.js';
export * from './normalization/index.js';
export * from './aggregation/index.js';
export * from './summary/index.js';
export * from './ingestion/index.js';

export { loadConfig, findConfigFile } from './cli/lib/config.js';
export type { CLIConfig, LoadConfigOptions } from './cli/lib/config.js';

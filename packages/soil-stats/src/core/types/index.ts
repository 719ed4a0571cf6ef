/**
 * Core type exports
 */

export type {
  AttrKey,
  GradeCode,
  LandFilter,
  GradeLevel,
  AttributeGradeConfig,
  GradingStandard,
  GradingStandardInfo,
  UnclassifiableReason,
  GradeResult,
} from './grading.js';
export { LAND_FILTERS, isLandFilter } from './grading.js';

export type {
  TableKind,
  LandUsePrimary,
  LandUseSecondary,
  LandUseClass,
  SoilTaxonomyRaw,
  SoilTaxonomyClass,
  Observation,
  RawTable,
  ObservationTable,
  ObservationDataset,
  ClassificationDiagnostics,
  ClassifiedTable,
} from './observation.js';

export type {
  DimensionKind,
  SampleValueStats,
  DimensionalBucket,
  DescriptiveStats,
  AreaStats,
  GradeBreakdownEntry,
  GradeLabel,
  AttributeStatsSummary,
  AttributeFailure,
  ReportResult,
} from './summary.js';
export { DIMENSION_KINDS } from './summary.js';

export type { IngestionErrorCode } from './errors.js';
export {
  SoilStatsError,
  IngestionError,
  GradingConfigError,
  GradingStandardNotFoundError,
  ConfigError,
  isSoilStatsError,
  isIngestionError,
  isGradingConfigError,
  isGradingStandardNotFoundError,
  isConfigError,
} from './errors.js';

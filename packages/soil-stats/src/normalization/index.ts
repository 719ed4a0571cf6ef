/**
 * Normalization exports
 */

export { coerceNumeric, coerceText } from './coerce.js';
export {
  COLUMN_ALIASES,
  DIMENSION_COLUMNS,
  findColumnByNames,
  resolveAttributeColumn,
  resolveColumns,
} from './column-resolver.js';
export type { ColumnAliasTable, ColumnResolution, DimensionColumn } from './column-resolver.js';
export { LAND_USE_STRUCTURE, OTHER_LAND_USE, landUseLabel, normalizeLandUse } from './land-use.js';
export type { LandUseCategory, LandUseNode } from './land-use.js';
export { UNKNOWN_SOIL_SORT_INDEX, compareSoilTaxonomy, normalizeSoilTaxonomy } from './soil-taxonomy.js';
export { buildTableFromObservations, buildTableFromRaw, concatRawTables } from './table-builder.js';
export type { BuiltTable } from './table-builder.js';
export { availableAttributes, datasetFromObservations, normalizeDataset } from './dataset.js';
export type { NormalizedDataset, ObservationDatasetInput, RawDatasetInput } from './dataset.js';

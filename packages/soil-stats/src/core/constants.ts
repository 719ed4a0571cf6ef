/**
 * Engine-wide constants
 */

/** Standard id used when neither config nor CLI names one */
export const DEFAULT_STANDARD_ID = 'jiangsu';

/** Percentile set reported for every attribute */
export const DEFAULT_PERCENTILES: readonly number[] = [
  0.02, 0.05, 0.1, 0.2, 0.8, 0.9, 0.95, 0.98,
] as const;

/** Order label for rows whose soil order is missing */
export const UNCLASSIFIED_SOIL_ORDER = '未分类';

/** Cell spellings treated as missing text */
export const MISSING_TEXT_TOKENS: ReadonlySet<string> = new Set(['', 'nan', 'none', 'null']);

/** Level index of rows that are not counted */
export const NOT_COUNTED = -1;

/** Upload size limit in megabytes */
export const DEFAULT_MAX_FILE_MB = 50;

export const BYTES_PER_MB = 1024 * 1024;

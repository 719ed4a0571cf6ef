/**
 * Soil Stats Service Configuration
 *
 * Defaults for the SoilStatsService facade. The CLI layers a config file,
 * environment variables and flags on top of these (see cli/lib/config.ts).
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import type { LogLevel } from './utils/logger.js';
import { DEFAULT_MAX_FILE_MB, DEFAULT_PERCENTILES, DEFAULT_STANDARD_ID } from './constants.js';

export interface SoilStatsConfig {
  /** Standard used when a request names none */
  readonly defaultStandard: string;

  /** Extra directories of standard files, registered after the builtins */
  readonly standardsDirs: readonly string[];

  /** Maximum size of one input file */
  readonly maxFileMb: number;

  /** Percentiles reported per attribute, as fractions */
  readonly percentiles: readonly number[];

  readonly logLevel: LogLevel;
}

export const DEFAULT_CONFIG: SoilStatsConfig = {
  defaultStandard: DEFAULT_STANDARD_ID,
  standardsDirs: [],
  maxFileMb: DEFAULT_MAX_FILE_MB,
  percentiles: DEFAULT_PERCENTILES,
  logLevel: 'info',
};

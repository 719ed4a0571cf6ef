/**
 * CLI global context
 *
 * Configuration and service shared by every command, built once in the
 * program's preAction hook.
 *
 * @module cli/lib/context
 */

import { SoilStatsService } from '../../core/soil-stats-service.js';
import { setLogLevel, type LogLevel } from '../../core/utils/logger.js';
import { loadConfig, type CLIConfig } from './config.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Report written, some attributes failed */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly service: SoilStatsService;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export type GlobalOptions = {
  readonly config?: string;
  readonly standardsDir?: readonly string[];
  readonly maxFileMb?: number;
  readonly logLevel?: LogLevel;
  readonly verbose?: boolean;
};

export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      standardsDirs: options.standardsDir,
      maxFileMb: options.maxFileMb,
      logLevel: options.logLevel,
      verbose: options.verbose,
    },
  });
  setLogLevel(config.logLevel);

  const service = new SoilStatsService(config);
  globalContext = { config, service };
  return globalContext;
}

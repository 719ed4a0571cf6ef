/**
 * Soil Stats CLI Configuration Management
 *
 * Loads configuration from .soilstatsrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SOIL_STATS_*)
 * 3. Config file (.soilstatsrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { delimiter, dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_CONFIG, type SoilStatsConfig } from '../../core/config.js';
import { ConfigError } from '../../core/types/errors.js';
import { isLogLevel, type LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig extends SoilStatsConfig {
  /** Enable debug logging */
  readonly verbose: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const configFileSchema = z
  .object({
    version: z.literal(1).default(1),
    standard: z.string().min(1).optional(),
    standards_dirs: z.array(z.string().min(1)).optional(),
    max_file_mb: z.number().positive().optional(),
    percentiles: z.array(z.number().min(0).max(1)).min(1).optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.soilstatsrc',
  '.soilstatsrc.yaml',
  '.soilstatsrc.yml',
  '.soilstatsrc.json',
] as const;

/**
 * Find config file in the directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content. YAML also covers plain JSON.
 */
function parseConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    parsed = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: filePath }
    );
  }

  // An empty YAML document parses to null
  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new ConfigError(
      `Invalid config file ${filePath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
      { path: filePath }
    );
  }
  return result.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`SOIL_STATS_${name}`];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) {
    throw new ConfigError(`SOIL_STATS_${name} must be a positive number, got "${value}"`);
  }
  return num;
}

function getEnvLogLevel(): LogLevel | undefined {
  const value = getEnvVar('LOG_LEVEL')?.toLowerCase();
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigError(`SOIL_STATS_LOG_LEVEL must be debug|info|warn|error, got "${value}"`);
  }
  return value;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    standard?: string;
    standardsDirs?: readonly string[];
    maxFileMb?: number;
    logLevel?: LogLevel;
    verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = { version: 1 };

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  // Relative directories in a config file are relative to that file
  const fileDir = configPath ? dirname(configPath) : process.cwd();
  const envDirs = getEnvVar('STANDARDS_DIR')?.split(delimiter).filter((dir) => dir !== '');
  const verbose = options.overrides?.verbose ?? false;

  return {
    defaultStandard:
      options.overrides?.standard ??
      getEnvVar('STANDARD') ??
      fileConfig.standard ??
      DEFAULT_CONFIG.defaultStandard,
    standardsDirs:
      options.overrides?.standardsDirs?.map((dir) => resolve(dir)) ??
      envDirs?.map((dir) => resolve(dir)) ??
      fileConfig.standards_dirs?.map((dir) => resolve(fileDir, dir)) ??
      DEFAULT_CONFIG.standardsDirs,
    maxFileMb:
      options.overrides?.maxFileMb ??
      getEnvNumber('MAX_FILE_MB') ??
      fileConfig.max_file_mb ??
      DEFAULT_CONFIG.maxFileMb,
    percentiles: fileConfig.percentiles ?? DEFAULT_CONFIG.percentiles,
    logLevel:
      options.overrides?.logLevel ??
      (verbose ? 'debug' : undefined) ??
      getEnvLogLevel() ??
      fileConfig.log_level ??
      DEFAULT_CONFIG.logLevel,
    verbose,
    configPath,
  };
}

/**
 * Soil Stats Error Types
 *
 * Typed errors for the failure modes the engine surfaces to callers.
 * Unclassifiable values are NOT errors: they are a GradeResult variant.
 *
 * - IngestionError: input tables or files cannot be used
 * - GradingConfigError: a grading standard violates its invariants
 * - GradingStandardNotFoundError: unknown standard id (aborts a batch)
 * - ConfigError: unreadable or invalid .soilstatsrc
 */

/**
 * Ingestion failure codes
 */
export type IngestionErrorCode =
  | 'no_usable_attributes'
  | 'missing_column'
  | 'file_too_large'
  | 'unreadable_file'
  | 'unsupported_encoding'
  | 'unsupported_format';

/**
 * Base class for every error raised by this package
 */
export class SoilStatsError extends Error {
  public override readonly name: string = 'SoilStatsError';

  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SoilStatsError.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`${this.name}: ${this.message}`, `  Code: ${this.code}`];
    for (const [key, value] of Object.entries(this.details)) {
      parts.push(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
    return parts.join('\n');
  }
}

/**
 * Raised when a table or file cannot be turned into observations.
 *
 * @example
 * ```typescript
 * throw new IngestionError('Mapped table has no area column', 'missing_column', {
 *   table: 'mapped',
 *   column: 'area',
 * });
 * ```
 */
export class IngestionError extends SoilStatsError {
  public override readonly name = 'IngestionError' as const;

  constructor(
    message: string,
    public override readonly code: IngestionErrorCode,
    details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message, code, details);
    Object.setPrototypeOf(this, IngestionError.prototype);
  }
}

/**
 * Raised when grading standard data violates the scale invariants
 */
export class GradingConfigError extends SoilStatsError {
  public override readonly name = 'GradingConfigError' as const;

  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super(message, 'invalid_grading_config', details);
    Object.setPrototypeOf(this, GradingConfigError.prototype);
  }
}

/**
 * Raised when a standard id does not resolve in the registry
 */
export class GradingStandardNotFoundError extends SoilStatsError {
  public override readonly name = 'GradingStandardNotFoundError' as const;

  constructor(public readonly standardId: string, available: readonly string[] = []) {
    super(
      `Grading standard not found: ${standardId}`,
      'standard_not_found',
      { standardId, available }
    );
    Object.setPrototypeOf(this, GradingStandardNotFoundError.prototype);
  }
}

/**
 * Raised when a configuration file cannot be found, parsed or validated
 */
export class ConfigError extends SoilStatsError {
  public override readonly name = 'ConfigError' as const;

  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super(message, 'invalid_config', details);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Type guard for any error raised by this package
 */
export function isSoilStatsError(error: unknown): error is SoilStatsError {
  return error instanceof SoilStatsError;
}

/**
 * Type guard for IngestionError, optionally narrowed to one code
 */
export function isIngestionError(
  error: unknown,
  code?: IngestionErrorCode
): error is IngestionError {
  return error instanceof IngestionError && (code === undefined || error.code === code);
}

export function isGradingConfigError(error: unknown): error is GradingConfigError {
  return error instanceof GradingConfigError;
}

export function isGradingStandardNotFoundError(
  error: unknown
): error is GradingStandardNotFoundError {
  return error instanceof GradingStandardNotFoundError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

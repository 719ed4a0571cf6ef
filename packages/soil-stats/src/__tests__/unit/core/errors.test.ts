/**
 * Error types
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  GradingConfigError,
  GradingStandardNotFoundError,
  IngestionError,
  SoilStatsError,
  isConfigError,
  isGradingConfigError,
  isIngestionError,
  isSoilStatsError,
} from '../../../core/types/errors.js';

describe('error types', () => {
  it('should keep the prototype chain', () => {
    const error = new IngestionError('Mapped table has no area column', 'missing_column', { column: 'area' });
    expect(error).toBeInstanceOf(IngestionError);
    expect(error).toBeInstanceOf(SoilStatsError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('IngestionError');
    expect(error.code).toBe('missing_column');
  });

  it('should format a log string with code and details', () => {
    const error = new IngestionError('Mapped table has no area column', 'missing_column', {
      column: 'area',
      headers: ['a'],
    });
    expect(error.toLogString()).toBe(
      ['IngestionError: Mapped table has no area column', '  Code: missing_column', '  column: area', '  headers: ["a"]'].join(
        '\n'
      )
    );
  });

  it('should narrow with type guards', () => {
    const ingestion = new IngestionError('too big', 'file_too_large');
    expect(isIngestionError(ingestion)).toBe(true);
    expect(isIngestionError(ingestion, 'file_too_large')).toBe(true);
    expect(isIngestionError(ingestion, 'missing_column')).toBe(false);
    expect(isGradingConfigError(new GradingConfigError('bad'))).toBe(true);
    expect(isConfigError(new ConfigError('bad'))).toBe(true);
    expect(isSoilStatsError(new GradingStandardNotFoundError('x'))).toBe(true);
    expect(isSoilStatsError(new Error('plain'))).toBe(false);
  });

  it('should give fixed codes to config errors', () => {
    expect(new GradingConfigError('bad').code).toBe('invalid_grading_config');
    expect(new ConfigError('bad').code).toBe('invalid_config');
    expect(new GradingStandardNotFoundError('x', ['jiangsu']).message).toBe('Grading standard not found: x');
  });
});

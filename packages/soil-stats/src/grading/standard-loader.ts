/**
 * Grading Standard Loader
 *
 * Turns standard files into validated GradingStandard objects. Schema
 * problems and scale invariant violations both surface as
 * GradingConfigError at load time.
 *
 * @module grading/standard-loader
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import type { AttrKey, AttributeGradeConfig, GradingStandard } from '../core/types/grading.js';
import { GradingConfigError } from '../core/types/errors.js';
import { GradeScale } from './grade-scale.js';
import { gradingStandardFileSchema, type GradingStandardFile } from './standard-schema.js';

export type StandardFileFormat = 'json' | 'yaml';

const STANDARD_EXTENSIONS: Readonly<Record<string, StandardFileFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

function formatZodError(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toStandard(file: GradingStandardFile): GradingStandard {
  const attributes = new Map<AttrKey, AttributeGradeConfig>();
  for (const [key, attr] of Object.entries(file.attributes)) {
    const scale = GradeScale.create(
      attr.levels.map(([threshold, code, description]) => ({ threshold, code, description })),
      { standardId: file.id, attrKey: key }
    );
    attributes.set(key, {
      key,
      displayName: attr.name,
      unit: attr.unit,
      reverseDisplay: attr.reverse_display,
      landFilter: attr.land_filter,
      scale,
    });
  }
  return {
    id: file.id,
    name: file.name,
    description: file.description,
    attributes,
  };
}

/**
 * Validate parsed standard data and build a GradingStandard
 *
 * @param input - Parsed JSON/YAML document
 * @param source - File name or label used in error messages
 */
export function buildGradingStandard(input: unknown, source = '(inline)'): GradingStandard {
  const result = gradingStandardFileSchema.safeParse(input);
  if (!result.success) {
    throw new GradingConfigError(`Invalid grading standard ${source}: ${formatZodError(result.error)}`, {
      source,
      issues: result.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return toStandard(result.data);
}

/**
 * Parse standard file content
 */
export function parseStandardText(
  content: string,
  format: StandardFileFormat,
  source = '(inline)'
): GradingStandard {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new GradingConfigError(
      `Cannot parse grading standard ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }
  return buildGradingStandard(parsed, source);
}

export function standardFileFormat(filePath: string): StandardFileFormat | null {
  return STANDARD_EXTENSIONS[extname(filePath).toLowerCase()] ?? null;
}

/**
 * Load one standard file (.json, .yaml or .yml)
 */
export function loadStandardFile(filePath: string): GradingStandard {
  const absolute = resolve(filePath);
  const format = standardFileFormat(absolute);
  if (!format) {
    throw new GradingConfigError(`Unsupported grading standard file type: ${filePath}`, {
      source: absolute,
    });
  }
  if (!existsSync(absolute)) {
    throw new GradingConfigError(`Grading standard file not found: ${filePath}`, { source: absolute });
  }
  return parseStandardText(readFileSync(absolute, 'utf-8'), format, absolute);
}

/**
 * Load every standard file in a directory, in file name order
 */
export function loadStandardsFromDirectory(dir: string): GradingStandard[] {
  const absolute = resolve(dir);
  if (!existsSync(absolute)) {
    throw new GradingConfigError(`Grading standards directory not found: ${dir}`, { source: absolute });
  }
  return readdirSync(absolute)
    .filter((name) => standardFileFormat(name) !== null)
    .sort()
    .map((name) => loadStandardFile(join(absolute, name)));
}

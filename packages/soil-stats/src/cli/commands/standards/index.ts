/**
 * Standards Commands
 *
 * Inspect the grading standards known to the registry:
 * - list: registered standards, active one marked
 * - show <id>: per-attribute levels with range labels
 * - validate <file>: load a standard file and report problems
 *
 * Examples:
 *   soil-stats standards list
 *   soil-stats standards show jiangsu --format json
 *   soil-stats standards validate ./standards/custom.yaml
 *
 * TYPE SAFETY: No `any`, no loose casts.
 */

import type { Command } from 'commander';
import type { GradingStandard } from '../../../core/types/grading.js';
import type { GradeLabel } from '../../../core/types/summary.js';
import type { GradingStandardRegistry } from '../../../grading/registry.js';
import { describeGradeLevels } from '../../../grading/grade-labels.js';
import { loadStandardFile } from '../../../grading/standard-loader.js';
import { EXIT_CODES, getGlobalContext, type ExitCode } from '../../lib/context.js';
import {
  formatJson,
  formatNdjson,
  formatTable,
  formatters,
  isOutputFormat,
  printError,
  printSuccess,
  writeOutput,
  type OutputFormat,
} from '../../lib/output.js';

interface FormatOptions {
  readonly format: string;
}

// ============================================================================
// Rendering
// ============================================================================

export interface StandardListEntry {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly attributes: number;
  readonly active: boolean;
}

export function listStandardEntries(registry: GradingStandardRegistry): StandardListEntry[] {
  const activeId = registry.activeId();
  return registry.list().map((info) => ({
    ...info,
    attributes: registry.get(info.id)?.attributes.size ?? 0,
    active: info.id === activeId,
  }));
}

export function formatStandardList(registry: GradingStandardRegistry, format: OutputFormat): string {
  const entries = listStandardEntries(registry);
  switch (format) {
    case 'json':
      return formatJson(entries);
    case 'ndjson':
      return formatNdjson(entries);
    case 'table':
      return formatTable(entries, [
        { header: 'Active', value: (entry) => (entry.active ? '*' : '') },
        { header: 'ID', value: (entry) => entry.id },
        { header: 'Name', value: (entry) => entry.name },
        { header: 'Attributes', align: 'right', value: (entry) => String(entry.attributes) },
        { header: 'Description', value: (entry) => entry.description },
      ]);
  }
}

export interface AttributeDetail {
  readonly key: string;
  readonly displayName: string;
  readonly unit: string;
  readonly reverseDisplay: boolean;
  readonly landFilter: string;
  readonly levels: readonly GradeLabel[];
}

export function describeStandard(standard: GradingStandard): AttributeDetail[] {
  return [...standard.attributes.values()].map((config) => ({
    key: config.key,
    displayName: config.displayName,
    unit: config.unit,
    reverseDisplay: config.reverseDisplay,
    landFilter: config.landFilter,
    levels: describeGradeLevels(config.scale),
  }));
}

export function formatStandardDetail(standard: GradingStandard, format: OutputFormat): string {
  const attributes = describeStandard(standard);
  switch (format) {
    case 'json':
      return formatJson({ id: standard.id, name: standard.name, description: standard.description, attributes });
    case 'ndjson':
      return formatNdjson(attributes);
    case 'table':
      return [
        `${standard.name} (${standard.id})`,
        formatTable(attributes, [
          { header: 'Key', value: (attr) => attr.key },
          { header: 'Name', value: (attr) => attr.displayName },
          { header: 'Unit', value: (attr) => attr.unit || '-' },
          { header: 'Land filter', value: (attr) => attr.landFilter },
          { header: 'Reverse', value: (attr) => formatters.yesNo(attr.reverseDisplay) },
          {
            header: 'Levels',
            value: (attr) =>
              attr.levels.map((level) => `${level.displayCode} ${level.range} ${level.description}`).join('; '),
          },
        ]),
      ].join('\n');
  }
}

// ============================================================================
// Commands
// ============================================================================

function resolveFormat(value: string): OutputFormat | null {
  if (isOutputFormat(value)) return value;
  printError(`Unknown format "${value}" (expected table|json|ndjson)`);
  return null;
}

export function executeList(registry: GradingStandardRegistry, options: FormatOptions): ExitCode {
  const format = resolveFormat(options.format);
  if (!format) return EXIT_CODES.ERRORS;
  writeOutput(formatStandardList(registry, format));
  return EXIT_CODES.SUCCESS;
}

export function executeShow(registry: GradingStandardRegistry, id: string, options: FormatOptions): ExitCode {
  const format = resolveFormat(options.format);
  if (!format) return EXIT_CODES.ERRORS;
  const standard = registry.get(id);
  if (!standard) {
    printError(`Grading standard not found: ${id} (available: ${registry.ids().join(', ')})`);
    return EXIT_CODES.ERRORS;
  }
  writeOutput(formatStandardDetail(standard, format));
  return EXIT_CODES.SUCCESS;
}

export function executeValidate(filePath: string): ExitCode {
  try {
    const standard = loadStandardFile(filePath);
    printSuccess(`${filePath}: standard "${standard.id}" with ${standard.attributes.size} attributes is valid`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    return EXIT_CODES.ERRORS;
  }
}

/**
 * Register the standards commands
 */
export function registerStandardsCommands(program: Command): void {
  const standards = program.command('standards').description('Inspect grading standards');

  standards
    .command('list')
    .description('List registered grading standards')
    .option('--format <fmt>', 'Output format: table|json|ndjson', 'table')
    .action((options: FormatOptions) => {
      process.exitCode = executeList(getGlobalContext().service.registry, options);
    });

  standards
    .command('show <id>')
    .description('Show the grade levels of every attribute of a standard')
    .option('--format <fmt>', 'Output format: table|json|ndjson', 'table')
    .action((id: string, options: FormatOptions) => {
      process.exitCode = executeShow(getGlobalContext().service.registry, id, options);
    });

  standards
    .command('validate <file>')
    .description('Validate a grading standard file (JSON or YAML)')
    .action((file: string) => {
      process.exitCode = executeValidate(file);
    });
}

/**
 * Report Command
 *
 * Reads sample and mapped tables, computes one summary per attribute and
 * writes the result.
 *
 * Usage:
 *   soil-stats report --sample <files...> --mapped <files...> [options]
 *
 * Options:
 *   --standard <id>        Grading standard (default: config)
 *   --attributes <keys>    Comma-separated attribute keys (default: all found)
 *   --format <fmt>         json|ndjson|table (default: json)
 *   -o, --output <file>    Write to file instead of stdout
 *
 * Exit codes: 0 all attributes computed, 1 some attributes failed,
 * 2 input or standard errors, 3 configuration errors.
 */

import type { Command } from 'commander';
import type { AttributeStatsSummary, ReportResult } from '../../../core/types/summary.js';
import { isConfigError, isGradingConfigError, isSoilStatsError } from '../../../core/types/errors.js';
import type { SoilStatsService } from '../../../core/soil-stats-service.js';
import { EXIT_CODES, getGlobalContext, type ExitCode } from '../../lib/context.js';
import {
  formatJson,
  formatNdjson,
  formatTable,
  formatters,
  isOutputFormat,
  printError,
  printWarning,
  writeOutput,
  type OutputFormat,
} from '../../lib/output.js';

/**
 * Report options from CLI
 */
export interface ReportOptions {
  readonly sample?: readonly string[];
  readonly mapped?: readonly string[];
  readonly standard?: string;
  readonly attributes?: string;
  readonly format: string;
  readonly output?: string;
}

// ============================================================================
// Rendering
// ============================================================================

const num = formatters.number(2);

function formatSummaryTable(summary: AttributeStatsSummary): string {
  const rows = summary.gradeLabels.map((label) => ({
    label,
    entry: summary.globalGradeBreakdown[label.code],
  }));
  return [
    `${summary.displayName} (${summary.attrKey})${summary.unit ? ` [${summary.unit}]` : ''}`,
    formatTable(rows, [
      { header: 'Grade', value: (row) => row.label.displayCode },
      { header: 'Range', value: (row) => row.label.range },
      { header: 'Description', value: (row) => row.label.description },
      { header: 'Samples', align: 'right', value: (row) => String(row.entry?.count ?? 0) },
      { header: 'Area', align: 'right', value: (row) => num(row.entry?.area) },
      { header: 'Share', align: 'right', value: (row) => formatters.percent(row.entry?.pct) },
    ]),
  ].join('\n');
}

export function formatReport(result: ReportResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(result);
    case 'ndjson':
      return formatNdjson(result.summaries);
    case 'table': {
      const overview = formatTable(result.summaries, [
        { header: 'Attribute', value: (s) => s.attrKey },
        { header: 'Name', value: (s) => s.displayName },
        { header: 'Samples', align: 'right', value: (s) => String(s.sampleStats?.count ?? 0) },
        { header: 'Mean', align: 'right', value: (s) => num(s.sampleStats?.mean) },
        { header: 'Median', align: 'right', value: (s) => num(s.sampleStats?.median) },
        { header: 'Min', align: 'right', value: (s) => num(s.sampleStats?.min) },
        { header: 'Max', align: 'right', value: (s) => num(s.sampleStats?.max) },
        { header: 'Area', align: 'right', value: (s) => num(s.areaStats?.totalArea) },
        { header: 'Weighted grade', align: 'right', value: (s) => num(s.weightedAvgGrade) },
      ]);
      return [`Standard: ${result.standardId}`, overview, ...result.summaries.map(formatSummaryTable)].join('\n\n');
    }
  }
}

export function parseAttributeList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const keys = value
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key !== '');
  return keys.length > 0 ? keys : undefined;
}

// ============================================================================
// Command
// ============================================================================

export function executeReport(service: SoilStatsService, options: ReportOptions): ExitCode {
  if (!isOutputFormat(options.format)) {
    printError(`Unknown format "${options.format}" (expected table|json|ndjson)`);
    return EXIT_CODES.ERRORS;
  }
  if ((options.sample?.length ?? 0) === 0 && (options.mapped?.length ?? 0) === 0) {
    printError('Provide at least one --sample or --mapped file');
    return EXIT_CODES.ERRORS;
  }

  let result: ReportResult;
  try {
    result = service.generateReportFromFiles({
      standardId: options.standard,
      sampleFiles: options.sample,
      mappedFiles: options.mapped,
      attributes: parseAttributeList(options.attributes),
    });
  } catch (error) {
    if (!isSoilStatsError(error)) {
      throw error;
    }
    printError(error.message);
    return isConfigError(error) || isGradingConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
  }

  writeOutput(formatReport(result, options.format), options.output);

  for (const failure of result.failures) {
    printWarning(`${failure.attrKey}: ${failure.error}`);
  }
  return result.failures.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}

/**
 * Register the report command
 */
export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Compute attribute statistics for sample and mapped tables')
    .option('--sample <files...>', 'Sample point tables (.csv, .xlsx)')
    .option('--mapped <files...>', 'Mapped zone tables with an area column (.csv, .xlsx)')
    .option('--standard <id>', 'Grading standard id')
    .option('--attributes <keys>', 'Comma-separated attribute keys')
    .option('--format <fmt>', 'Output format: json|ndjson|table', 'json')
    .option('-o, --output <file>', 'Write to file instead of stdout')
    .action((options: ReportOptions) => {
      process.exitCode = executeReport(getGlobalContext().service, options);
    });
}

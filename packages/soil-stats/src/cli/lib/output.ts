/**
 * Output Formatting for CLI Commands
 *
 * Table, JSON and NDJSON rendering for command results. Table widths count
 * CJK characters as two columns so Chinese labels line up in a terminal.
 *
 * @module cli/lib/output
 */

import { writeFileSync } from 'node:fs';

export type OutputFormat = 'table' | 'json' | 'ndjson';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson'] as const;

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly value: (row: T) => string;
}

// ============================================================================
// Width
// ============================================================================

/**
 * Full-width ranges: CJK ideographs and punctuation, Hangul, full-width forms
 */
function isWide(codePoint: number): boolean {
  return (
    (codePoint >= 0x1100 && codePoint <= 0x115f) ||
    (codePoint >= 0x2e80 && codePoint <= 0xa4cf) ||
    (codePoint >= 0xac00 && codePoint <= 0xd7a3) ||
    (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
    (codePoint >= 0xfe30 && codePoint <= 0xfe4f) ||
    (codePoint >= 0xff00 && codePoint <= 0xff60) ||
    (codePoint >= 0xffe0 && codePoint <= 0xffe6) ||
    (codePoint >= 0x20000 && codePoint <= 0x3fffd)
  );
}

/**
 * Terminal column width of a string
 */
export function displayWidth(value: string): number {
  let width = 0;
  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? 0;
    width += isWide(codePoint) ? 2 : 1;
  }
  return width;
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const padding = ' '.repeat(Math.max(0, width - displayWidth(value)));
  return align === 'right' ? padding + value : value + padding;
}

// ============================================================================
// Formats
// ============================================================================

/**
 * Format rows as an aligned table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, i) =>
    Math.max(displayWidth(column.header), ...cells.map((line) => displayWidth(line[i])))
  );

  const headerRow = columns.map((column, i) => padCell(column.header, widths[i], column.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = cells.map((line) =>
    line.map((cell, i) => padCell(cell, widths[i], columns[i].align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Common cell formatters
 */
export const formatters = {
  /** Fixed decimals, '-' for null */
  number:
    (digits = 2) =>
    (value: number | null | undefined): string =>
      value === null || value === undefined || Number.isNaN(value) ? '-' : value.toFixed(digits),

  percent: (value: number | null | undefined): string =>
    value === null || value === undefined ? '-' : `${value.toFixed(1)}%`,

  yesNo: (value: boolean): string => (value ? 'yes' : 'no'),
};

// ============================================================================
// Printing
// ============================================================================

/**
 * Write to a file when a path is given, otherwise to stdout
 */
export function writeOutput(output: string, filePath?: string): void {
  if (filePath) {
    writeFileSync(filePath, output.endsWith('\n') ? output : `${output}\n`, 'utf-8');
    return;
  }
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}

/**
 * Table file reader
 *
 * Reads survey tables from disk into header/row form:
 * - .csv / .txt: UTF-8 (BOM stripped), falling back to GB18030 for files
 *   exported by legacy Chinese tools
 * - .xlsx / .xls: first sheet
 *
 * Parsing is delegated to SheetJS; cells keep their raw values and are
 * coerced during normalization.
 *
 * @module ingestion/table-reader
 */

import { readFileSync, statSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import * as XLSX from 'xlsx';
import type { RawTable } from '../core/types/observation.js';
import { IngestionError } from '../core/types/errors.js';
import { BYTES_PER_MB, DEFAULT_MAX_FILE_MB } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { coerceText } from '../normalization/coerce.js';

const log = createLogger({ module: 'ingestion' });

export type TableFileFormat = 'csv' | 'xlsx';

export type TextEncodingName = 'utf-8' | 'gb18030';

const FORMAT_BY_EXTENSION: Readonly<Record<string, TableFileFormat>> = {
  '.csv': 'csv',
  '.txt': 'csv',
  '.xlsx': 'xlsx',
  '.xls': 'xlsx',
};

export interface ReadTableOptions {
  /** Files larger than this are rejected */
  readonly maxFileBytes?: number;
}

export interface TableFile extends RawTable {
  readonly path: string;
  readonly format: TableFileFormat;
  /** Detected text encoding (text formats only) */
  readonly encoding: TextEncodingName | null;
}

export function tableFileFormat(filePath: string): TableFileFormat | null {
  return FORMAT_BY_EXTENSION[extname(filePath).toLowerCase()] ?? null;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode text bytes as UTF-8, or GB18030 when the bytes are not valid UTF-8
 *
 * @throws IngestionError unsupported_encoding
 */
export function decodeText(bytes: Uint8Array): { readonly text: string; readonly encoding: TextEncodingName } {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes), encoding: 'utf-8' };
  } catch (utf8Error) {
    log.debug('Not valid UTF-8, trying GB18030', {
      error: utf8Error instanceof Error ? utf8Error.message : String(utf8Error),
    });
  }
  try {
    return { text: new TextDecoder('gb18030', { fatal: true }).decode(bytes), encoding: 'gb18030' };
  } catch (error) {
    throw new IngestionError('File is neither UTF-8 nor GB18030 text', 'unsupported_encoding', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

// ============================================================================
// Parsing
// ============================================================================

function sheetToTable(workbook: XLSX.WorkBook, source: string): RawTable {
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) {
    throw new IngestionError(`No sheet in ${source}`, 'unreadable_file', { path: source });
  }
  const grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  const [headerRow = [], ...rows] = grid;
  const headers = headerRow.map((cell, index) => coerceText(cell) ?? `column_${index + 1}`);
  return { headers, rows };
}

/**
 * Parse delimited text (CSV, TSV). Values stay as text.
 */
export function parseDelimitedText(text: string, source = '(text)'): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(text, { type: 'string', raw: true });
  } catch (error) {
    throw new IngestionError(`Cannot parse ${source}`, 'unreadable_file', {
      path: source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return sheetToTable(workbook, source);
}

/**
 * Parse a spreadsheet workbook (first sheet)
 */
export function parseWorkbook(bytes: Uint8Array, source = '(workbook)'): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'array' });
  } catch (error) {
    throw new IngestionError(`Cannot parse ${source}`, 'unreadable_file', {
      path: source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return sheetToTable(workbook, source);
}

// ============================================================================
// Files
// ============================================================================

/**
 * Read one table file
 *
 * @throws IngestionError file_too_large, unreadable_file, unsupported_encoding, unsupported_format
 */
export function readTableFile(filePath: string, options: ReadTableOptions = {}): TableFile {
  const path = resolve(filePath);
  const format = tableFileFormat(path);
  if (!format) {
    throw new IngestionError(`Unsupported file type: ${basename(path)}`, 'unsupported_format', {
      path,
      extension: extname(path),
    });
  }

  let size: number;
  try {
    size = statSync(path).size;
  } catch (error) {
    throw new IngestionError(`Cannot read ${basename(path)}`, 'unreadable_file', {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_MB * BYTES_PER_MB;
  if (size > maxFileBytes) {
    throw new IngestionError(`${basename(path)} exceeds ${maxFileBytes} bytes`, 'file_too_large', {
      path,
      size,
      maxFileBytes,
    });
  }

  const bytes = readFileSync(path);
  if (format === 'xlsx') {
    const table = parseWorkbook(bytes, path);
    log.debug('Workbook read', { path, rows: table.rows.length });
    return { ...table, path, format, encoding: null };
  }

  const { text, encoding } = decodeText(bytes);
  const table = parseDelimitedText(text, path);
  log.debug('Text table read', { path, rows: table.rows.length, encoding });
  return { ...table, path, format, encoding };
}

export function readTableFiles(filePaths: readonly string[], options: ReadTableOptions = {}): TableFile[] {
  return filePaths.map((filePath) => readTableFile(filePath, options));
}

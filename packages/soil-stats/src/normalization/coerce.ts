/**
 * Cell coercion
 *
 * Spreadsheet and CSV cells arrive as numbers, strings, booleans or nothing.
 * Numeric coercion yields NaN on failure so downstream classification treats
 * the value as unclassifiable. Only decimal and exponent notation count as
 * numbers; hex, octal and binary literals do not.
 */

import { MISSING_TEXT_TOKENS } from '../core/constants.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/**
 * Coerce a cell to a number (infinities included), or NaN
 */
export function coerceNumeric(raw: unknown): number {
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw === 'bigint') {
    return Number(raw);
  }
  if (typeof raw !== 'string') {
    return Number.NaN;
  }
  const text = raw.trim();
  if (text === '') {
    return Number.NaN;
  }
  if (DECIMAL_PATTERN.test(text)) {
    return Number(text);
  }
  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity) {
    return infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return Number.NaN;
}

/**
 * Coerce a cell to trimmed text, or null for blanks and the usual missing
 * spellings ('nan', 'None', 'null')
 */
export function coerceText(raw: unknown): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  let text: string;
  if (typeof raw === 'string') {
    text = raw.trim();
  } else if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return null;
    text = String(raw);
  } else if (typeof raw === 'bigint' || typeof raw === 'boolean') {
    text = String(raw);
  } else if (raw instanceof Date) {
    text = raw.toISOString();
  } else {
    return null;
  }
  return MISSING_TEXT_TOKENS.has(text.toLowerCase()) ? null : text;
}

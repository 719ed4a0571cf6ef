/**
 * Locations of the JSON data files shipped with the package
 *
 * @module core/data-files
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

/** packages/soil-stats/data */
export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

/** Builtin grading standards, one file per standard */
export const BUILTIN_STANDARDS_DIR = join(DATA_DIR, 'standards');

/**
 * Read and parse a JSON file from the data directory. Callers validate the
 * result with their own schema.
 */
export function readDataJson(relativePath: string): unknown {
  const content = readFileSync(join(DATA_DIR, relativePath), 'utf-8');
  return JSON.parse(content);
}

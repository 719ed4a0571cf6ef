#!/usr/bin/env tsx
/**
 * Soil Stats CLI Entry Point
 *
 * @module soil-stats-cli
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createProgram } from '../src/cli/program.js';
import { EXIT_CODES } from '../src/cli/lib/context.js';
import { logger } from '../src/core/utils/logger.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    logger.debug('Cannot read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const program = createProgram(getVersion());
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(EXIT_CODES.ERRORS);
});

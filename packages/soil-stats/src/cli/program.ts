/**
 * Soil Stats CLI program
 *
 * Builds the commander program: global options, the preAction hook that
 * loads configuration, and the command groups.
 *
 * @module cli/program
 */

import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from '../core/utils/logger.js';
import { registerReportCommand } from './commands/report/index.js';
import { registerStandardsCommands } from './commands/standards/index.js';
import { EXIT_CODES, initializeContext, type GlobalOptions } from './lib/context.js';

function parsePositive(value: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || num <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return num;
}

function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Expected debug|info|warn|error.');
  }
  return level;
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('soil-stats')
    .description('Soil survey attribute grading and statistics')
    .version(version, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--config <path>', 'Path to config file (default: .soilstatsrc)')
    .option('--standards-dir <dirs...>', 'Extra directories of grading standard files')
    .option('--max-file-mb <n>', 'Maximum input file size in MB', parsePositive)
    .option('--log-level <level>', 'Log level: debug|info|warn|error', parseLogLevel)
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerStandardsCommands(program);
  registerReportCommand(program);

  return program;
}

#!/usr/bin/env tsx
/**
 * Scene Search CLI Entry Point
 *
 * Catalog search, processing work-list selection, data-take completeness
 * checks and local scene indexing for Sentinel-1 ARD production.
 *
 * @module scene-search-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCheckCommand, registerIndexCommand, registerSearchCommand } from '../src/cli/commands/index.js';
import { initializeContext, type GlobalOptions } from '../src/cli/context.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/exit-codes.js';
import { toError } from '../src/core/errors.js';
import { logger, parseLogLevel } from '../src/core/utils/logger.js';

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    logger.debug('package.json unreadable', { error: toError(error).message });
  }
  return '0.0.0';
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return n;
}

function logLevel(value: string): string {
  if (!parseLogLevel(value)) {
    throw new InvalidArgumentError('Expected debug, info, warn or error.');
  }
  return value.toLowerCase();
}

function catalogKind(value: string): string {
  if (value !== 'stac' && value !== 'sqlite' && value !== 'asf') {
    throw new InvalidArgumentError('Expected stac, sqlite or asf.');
  }
  return value;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('scene-search')
    .description('Sentinel-1 scene search and data-take completeness checks')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-level <level>', 'Log level: debug|info|warn|error', logLevel)
    .option('--config <path>', 'Path to config file (default: .scene-searchrc)')
    .option('--catalog <kind>', 'Primary catalog: stac|sqlite|asf', catalogKind)
    .option('--url <url>', 'STAC API root URL')
    .option('--collections <names>', 'STAC collection(s), comma-separated')
    .option('--database <file>', 'SQLite scene index')
    .option('--grid <file>', 'Tile grid GeoJSON file')
    .option('--concurrency <n>', 'Searches in flight at once', positiveInt)
    .option('--timeout <ms>', 'HTTP request timeout in milliseconds', positiveInt)
    .option('--max-attempts <n>', 'Attempts per catalog request', positiveInt)
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(`Configuration error: ${toError(error).message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerSearchCommand(program);
  registerCheckCommand(program);
  registerIndexCommand(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error('Command failed', {
      error: toError(error).message,
    });
    process.exit(exitCodeFor(error));
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});

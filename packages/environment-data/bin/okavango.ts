#!/usr/bin/env tsx
/**
 * Okavango CLI Entry Point
 *
 * Download the environmental datasets, merge them with the world map and
 * report or export the result.
 *
 * @module okavango-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerExportCommand } from '../src/cli/commands/export.js';
import { registerFetchCommand } from '../src/cli/commands/fetch.js';
import { registerSummaryCommand } from '../src/cli/commands/summary.js';
import { ConfigError, DatasetBatchError, EnvironmentDataError } from '../src/core/errors.js';
import { logger } from '../src/core/utils/logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
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
    logger.debug('package.json unreadable', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return '0.0.0';
}

function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof DatasetBatchError) {
    return error.stage === 'download' ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (error instanceof EnvironmentDataError) {
    return error.code === 'NETWORK' ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('okavango')
    .description('Environmental data explorer: download, merge and export world maps')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerFetchCommand(program);
  registerSummaryCommand(program);
  registerExportCommand(program);

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof DatasetBatchError) {
      console.error(`\n${error.getSummary()}`);
    } else {
      console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = exitCodeFor(error);
  }
}

await main();

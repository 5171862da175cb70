#!/usr/bin/env tsx
/**
 * Time Atlas CLI Entry Point
 *
 * Resolve local datetimes, inspect dataset health and manage the historical
 * patch set from the command line.
 *
 * @module time-atlas-cli
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type TimeAtlasConfig } from '../src/core/config.js';
import { createTimeResolutionService } from '../src/core/datasets.js';
import { createLogger } from '../src/core/utils/logger.js';
import type { TimeResolutionService } from '../src/resolution/time-resolution-service.js';
import { EXIT_CODES, describeError, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { printError } from '../src/cli/lib/output.js';
import { runResolve } from '../src/cli/commands/resolve.js';
import { runHealth } from '../src/cli/commands/diagnose/health.js';
import { registerPatchesCommands } from '../src/cli/commands/patches/index.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// Global State
// ============================================================================

let config: TimeAtlasConfig | null = null;

function getConfig(): TimeAtlasConfig {
  if (!config) {
    throw new Error('Configuration not loaded. The preAction hook must run first.');
  }
  return config;
}

async function loadService(): Promise<TimeResolutionService> {
  const current = getConfig();
  return createTimeResolutionService(
    current,
    createLogger({ module: 'cli' }, current.logLevel === 'info' ? 'warn' : current.logLevel)
  );
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(here, '..', 'package.json');
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
    printError(`cannot read package version: ${describeError(error)}`);
  }
  return '0.0.0';
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number`);
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer`);
  }
  return parsed;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('time-atlas')
    .description('Historical local-time to UTC resolution')
    .version(getVersion())
    .hook('preAction', () => {
      try {
        config = loadConfig();
      } catch (error) {
        printError(describeError(error));
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('resolve')
    .description('Resolve a local datetime at a coordinate to UTC')
    .argument('<local-datetime>', 'Local civil time, YYYY-MM-DDTHH:MM[:SS[.fff]]')
    .requiredOption('--lat <degrees>', 'Latitude in decimal degrees', parseNumber)
    .requiredOption('--lon <degrees>', 'Longitude in decimal degrees', parseNumber)
    .option('--profile <name>', 'Parity profile', 'strict_history')
    .option('--offset <seconds>', 'Caller offset in seconds east of UTC (as_entered)', parseInteger)
    .option('--zone <zone>', 'Caller zone or abbreviation (as_entered)')
    .option('--json', 'Output the wire response body')
    .action(
      async (
        localDatetime: string,
        options: {
          lat: number;
          lon: number;
          profile: string;
          offset?: number;
          zone?: string;
          json?: boolean;
        }
      ) => {
        const service = await loadService();
        const result = runResolve(service, localDatetime, options);
        process.exitCode = result.exitCode;
      }
    );

  program
    .command('health')
    .description('Load all datasets and print the health report')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const service = await loadService();
      const result = runHealth(service, { json: options.json });
      process.exitCode = result.exitCode;
    });

  registerPatchesCommands(program, getConfig);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    printError(describeError(error));
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.UNEXPECTED_ERROR);
});

/**
 * Patches Commands
 *
 * @module cli/commands/patches
 */

import type { Command } from 'commander';
import { loadPatchRegistry } from '../../../core/datasets.js';
import type { TimeAtlasConfig } from '../../../core/config.js';
import { runPatchesList } from './list.js';
import { runPatchesValidate } from './validate.js';

export { runPatchesList, describeEffect } from './list.js';
export { runPatchesValidate, type ValidateResult } from './validate.js';

/**
 * Register `patches list` and `patches validate` on the program
 */
export function registerPatchesCommands(
  program: Command,
  getConfig: () => TimeAtlasConfig
): void {
  const patches = program.command('patches').description('Inspect the historical patch registry');

  patches
    .command('list')
    .description('List loaded patches in priority order')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const registry = await loadPatchRegistry(getConfig().patchFile);
      runPatchesList(registry, { json: options.json });
    });

  patches
    .command('validate')
    .description('Validate a patch file (defaults to the configured one)')
    .argument('[file]', 'Patch file to validate')
    .action(async (file: string | undefined) => {
      const result = await runPatchesValidate(file ?? getConfig().patchFile);
      process.exitCode = result.exitCode;
    });
}

/**
 * Patches Validate Command
 *
 * Load a patch file with the same checks the service runs at startup.
 *
 * USAGE:
 *   time-atlas patches validate [file]
 *
 * @module cli/commands/patches/validate
 */

import { loadPatchRegistry } from '../../../core/datasets.js';
import { isDataUnavailableError } from '../../../core/errors.js';
import { EXIT_CODES, describeError, exitCodeFor, type ExitCode } from '../../lib/exit-codes.js';
import { printError, printOutput } from '../../lib/output.js';

export interface ValidateResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly patches?: number;
  readonly version?: string;
  readonly issues: readonly string[];
}

export async function runPatchesValidate(path: string): Promise<ValidateResult> {
  try {
    const registry = await loadPatchRegistry(path);
    printOutput(`[ok] ${path}: ${registry.size} patches, version ${registry.version}`);
    return {
      success: true,
      exitCode: EXIT_CODES.SUCCESS,
      patches: registry.size,
      version: registry.version,
      issues: [],
    };
  } catch (error) {
    printError(`[FAIL] ${describeError(error)}`);
    return {
      success: false,
      exitCode: exitCodeFor(error),
      issues: isDataUnavailableError(error) ? error.issues : [],
    };
  }
}

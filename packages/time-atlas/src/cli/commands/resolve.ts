/**
 * Resolve Command
 *
 * Resolve one local datetime at a coordinate.
 *
 * USAGE:
 *   time-atlas resolve <local-datetime> --lat <n> --lon <n> [options]
 *
 * OPTIONS:
 *   --profile <name>  Parity profile (default: strict_history)
 *   --offset <s>      Caller offset in seconds east of UTC (as_entered)
 *   --zone <zone>     Caller zone or abbreviation (as_entered)
 *   --json            Print the wire response body
 *
 * EXAMPLES:
 *   time-atlas resolve 1943-06-15T14:30 --lat 40.7128 --lon -74.006
 *   time-atlas resolve "2023-11-05 01:30" --lat 40.71 --lon -74.0 --profile astro_compat --json
 *
 * @module cli/commands/resolve
 */

import type { ResolveRequestBody, ResolveResponseBody } from '@civil-time/types';
import type { TimeResolutionService } from '../../resolution/time-resolution-service.js';
import { formatOffset } from '../../resolution/local-datetime.js';
import { EXIT_CODES, describeError, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { formatFields, formatJson, printError, printOutput } from '../lib/output.js';

export interface ResolveOptions {
  readonly lat: number;
  readonly lon: number;
  readonly profile?: string;
  readonly offset?: number;
  readonly zone?: string;
  readonly json?: boolean;
}

export interface ResolveResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly response?: ResolveResponseBody;
  readonly error?: string;
}

/**
 * Run the resolve command against a loaded service
 */
export function runResolve(
  service: TimeResolutionService,
  localDatetime: string,
  options: ResolveOptions
): ResolveResult {
  const body: Record<keyof ResolveRequestBody, unknown> = {
    local_datetime: localDatetime,
    latitude: options.lat,
    longitude: options.lon,
    parity_profile: options.profile ?? 'strict_history',
    user_provided_offset: options.offset,
    user_provided_zone: options.zone,
  };

  try {
    const response = service.resolveBody(body);
    printOutput(options.json ? formatJson(response) : renderResponse(response));
    return { success: true, exitCode: EXIT_CODES.SUCCESS, response };
  } catch (error) {
    const message = describeError(error);
    printError(message);
    return { success: false, exitCode: exitCodeFor(error), error: message };
  }
}

/**
 * Human-readable rendering of a response
 */
export function renderResponse(response: ResolveResponseBody): string {
  const provenance = response.provenance;
  const lines = [
    formatFields([
      ['UTC', response.utc],
      ['Zone', response.zone_id],
      ['Offset', `UTC${formatOffset(response.offset_seconds)} (${response.offset_seconds} s)`],
      ['DST', response.dst_active ? 'yes' : 'no'],
      ['Confidence', response.confidence],
      ['Reason', response.reason],
      ['Mode', `${provenance.resolution_mode} (${provenance.fold_policy})`],
      ['Sources', provenance.sources.join(' -> ')],
      ['Patches', provenance.patches_applied.length > 0 ? provenance.patches_applied.join(', ') : 'none'],
      ['tzdb', provenance.tzdb_version],
      ['Patch set', provenance.patch_version],
    ]),
  ];

  if (response.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of response.warnings) {
      lines.push(`  [${warning.code}] ${warning.message}`);
    }
  }

  if (response.notes.length > 0) {
    lines.push('', 'Notes:');
    for (const note of response.notes) {
      lines.push(`  - ${note}`);
    }
  }

  return lines.join('\n');
}

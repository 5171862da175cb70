/**
 * Diagnose Health Command
 *
 * Load every dataset and print the service health report.
 *
 * USAGE:
 *   time-atlas health [--json]
 *
 * @module cli/commands/diagnose/health
 */

import type { TimeResolutionService } from '../../../resolution/time-resolution-service.js';
import type { HealthReport } from '../../../serving/health.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import { formatJson, printOutput } from '../../lib/output.js';

export interface HealthOptions {
  readonly json?: boolean;
}

export interface HealthResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly report: HealthReport;
}

/**
 * Run the health command
 */
export function runHealth(service: TimeResolutionService, options: HealthOptions = {}): HealthResult {
  const report = service.health();
  const success = report.status === 'healthy';

  printOutput(options.json ? formatJson({ success, report }) : renderReport(report));

  return {
    success,
    exitCode: success ? EXIT_CODES.SUCCESS : EXIT_CODES.UNEXPECTED_ERROR,
    report,
  };
}

export function renderReport(report: HealthReport): string {
  const statusIcon = report.status === 'healthy' ? '[HEALTHY]' : '[DEGRADED]';
  const rule = '='.repeat(60);
  const { cache, queries } = report;

  return [
    rule,
    `  Time Atlas Health Report                    ${statusIcon}`,
    rule,
    '',
    'Datasets:',
    '-'.repeat(60),
    `  tzdb:              ${report.tzdbVersion}`,
    `  Patches:           ${report.patchesLoaded} (${report.patchVersion})`,
    `  Boundaries:        ${report.boundaryFeatures} features (${report.boundaryVersion})`,
    `  Settlements:       ${report.settlements} (${report.settlementVersion})`,
    '',
    'Cache:',
    '-'.repeat(60),
    `  Capacity:          ${cache.capacity === 0 ? 'disabled' : cache.capacity}`,
    `  Size:              ${cache.size}`,
    `  Hit Rate:          ${(cache.hitRate * 100).toFixed(1)}% (${cache.hits} hits, ${cache.misses} misses)`,
    `  Evictions:         ${cache.evictions}`,
    '',
    'Queries:',
    '-'.repeat(60),
    `  Total:             ${queries.total} (${queries.successful} ok, ${queries.failed} failed)`,
    `  Latency:           p50 ${queries.latencyP50Ms.toFixed(2)} ms, p95 ${queries.latencyP95Ms.toFixed(2)} ms`,
    '',
    rule,
    `  Overall: ${report.status.toUpperCase()}`,
    rule,
  ].join('\n');
}

/**
 * Patches List Command
 *
 * Print the loaded historical patches in priority order.
 *
 * USAGE:
 *   time-atlas patches list [--json]
 *
 * @module cli/commands/patches/list
 */

import type { HistoricalPatch, PatchRegistry } from '../../../patches/patch-registry.js';
import { formatLocalDateTime, formatOffset } from '../../../resolution/local-datetime.js';
import { formatJson, formatTable, printOutput, type TableColumn } from '../../lib/output.js';

export interface ListOptions {
  readonly json?: boolean;
}

/**
 * Short description of a patch effect
 */
export function describeEffect(patch: HistoricalPatch): string {
  const effect = patch.effect;
  switch (effect.kind) {
    case 'zone':
      return `zone ${effect.zoneId}`;
    case 'fixed_offset':
      return effect.dstRule === 'none'
        ? `UTC${formatOffset(effect.offsetSeconds)}`
        : `UTC${formatOffset(effect.offsetSeconds)} + seasonal DST`;
    case 'local_mean_time':
      return 'local mean time';
  }
}

interface RankedPatch {
  readonly rank: number;
  readonly patch: HistoricalPatch;
}

const COLUMNS: readonly TableColumn<RankedPatch>[] = [
  { header: '#', align: 'right', value: (row) => String(row.rank) },
  { header: 'ID', value: (row) => row.patch.id },
  { header: 'From', value: (row) => formatLocalDateTime(row.patch.validFrom) },
  { header: 'To', value: (row) => formatLocalDateTime(row.patch.validTo) },
  { header: 'Effect', value: (row) => describeEffect(row.patch) },
  { header: 'Era', value: (row) => row.patch.era },
  { header: 'Confidence', value: (row) => row.patch.confidence },
  { header: 'Sources', value: (row) => row.patch.sources.join('; ') || '-' },
];

export function runPatchesList(registry: PatchRegistry, options: ListOptions = {}): void {
  const patches = registry.list();

  if (options.json) {
    printOutput(formatJson({ version: registry.version, patches }));
    return;
  }

  printOutput(`Patch set ${registry.version}\n`);
  printOutput(formatTable(patches.map((patch, i) => ({ rank: i + 1, patch })), COLUMNS));
}

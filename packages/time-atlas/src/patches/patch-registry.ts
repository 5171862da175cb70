/**
 * Historical Patch Registry
 *
 * Curated corrections for periods and places where the zone database is
 * known to be incomplete: wartime clocks, local-option DST, pre-standard
 * solar time, forward-looking convention changes.
 *
 * PRIORITY (fixed at load, first match wins, patches never stack):
 * 1. Smaller region area (geodesic)
 * 2. Narrower [validFrom, validTo) interval
 * 3. File order
 *
 * Intervals are half-open and compared on the local wall clock.
 */

import { createHash } from 'crypto';
import type { MultiPolygon, Polygon } from 'geojson';
import { IANAZone } from 'luxon';
import type { ConfidenceTier, Coordinate, LocalDateTime } from '../core/types.js';
import {
  bboxToPolygon,
  extractBBox,
  isPointInBBox,
  regionAreaSquareMeters,
  type BBox,
} from '../core/geo-utils.js';
import { DataUnavailableError, formatIssues, isInputInvalidError } from '../core/errors.js';
import { PointInPolygonEngine } from '../boundary/pip-engine.js';
import { parseLocalDateTime, toWallClockMillis } from '../resolution/local-datetime.js';
import {
  patchFileSchema,
  type PatchDefinition,
  type PatchEffect,
  type PatchRegion,
} from './patch-schema.js';

export type PatchScope = 'all' | 'future';

export interface HistoricalPatch {
  readonly id: string;
  readonly region: PatchRegion;
  readonly validFrom: LocalDateTime;
  readonly validTo: LocalDateTime;
  readonly effect: PatchEffect;
  readonly era: 'historical' | 'future';
  readonly confidence: ConfidenceTier;
  readonly note: string;
  readonly sources: readonly string[];
  readonly areaSquareMeters: number;
}

interface IndexedPatch extends HistoricalPatch {
  readonly geometry: Polygon | MultiPolygon;
  readonly bbox: BBox;
  readonly fromMillis: number;
  readonly toMillis: number;
  readonly order: number;
}

export interface PatchMatch {
  readonly patch: HistoricalPatch;
  /** Lower-priority patches that also matched; reported, never applied */
  readonly shadowedIds: readonly string[];
}

/**
 * Sort comparator implementing registry priority
 */
export function comparePatchPriority(
  a: { areaSquareMeters: number; fromMillis: number; toMillis: number; order: number },
  b: { areaSquareMeters: number; fromMillis: number; toMillis: number; order: number }
): number {
  return (
    a.areaSquareMeters - b.areaSquareMeters ||
    a.toMillis - a.fromMillis - (b.toMillis - b.fromMillis) ||
    a.order - b.order
  );
}

export class PatchRegistry {
  private readonly pip = new PointInPolygonEngine();

  private constructor(
    private readonly patches: readonly IndexedPatch[],
    readonly version: string
  ) {}

  /**
   * Empty registry (profiles that never consult patches, tests)
   */
  static empty(version = 'none'): PatchRegistry {
    return new PatchRegistry([], version);
  }

  /**
   * Validate a parsed patch document and build the registry.
   *
   * @throws DataUnavailableError for any schema or consistency violation
   */
  static fromDocument(source: unknown, path?: string): PatchRegistry {
    const parsed = patchFileSchema.safeParse(source);
    if (!parsed.success) {
      throw new DataUnavailableError(
        'Patch file failed schema validation',
        'patches',
        path,
        formatIssues(parsed.error.issues)
      );
    }

    const { version, areas, patches } = parsed.data;
    const pip = new PointInPolygonEngine();
    const issues: string[] = [];
    const seen = new Set<string>();
    const indexed: IndexedPatch[] = [];

    for (const [name, geometry] of Object.entries(areas)) {
      for (const error of pip.validateGeometry(geometry)) {
        issues.push(`areas.${name}: ${error}`);
      }
    }

    patches.forEach((definition, order) => {
      const where = `patches.${order} (${definition.id})`;

      if (seen.has(definition.id)) {
        issues.push(`${where}: duplicate patch id`);
        return;
      }
      seen.add(definition.id);

      const geometry = resolveRegionGeometry(definition.region, areas);
      if (!geometry) {
        issues.push(`${where}: unknown area "${regionName(definition.region)}"`);
        return;
      }
      if (definition.region.kind === 'polygon') {
        issues.push(...pip.validateGeometry(geometry).map((error) => `${where}: ${error}`));
      }

      const interval = parseInterval(definition, where, issues);
      if (!interval) {
        return;
      }

      if (definition.effect.kind === 'zone' && !IANAZone.isValidZone(definition.effect.zoneId)) {
        issues.push(`${where}: unknown IANA zone "${definition.effect.zoneId}"`);
        return;
      }

      indexed.push({
        id: definition.id,
        region: definition.region,
        validFrom: interval.validFrom,
        validTo: interval.validTo,
        effect: definition.effect,
        era: definition.era,
        confidence: definition.confidence,
        note: definition.note,
        sources: definition.sources,
        areaSquareMeters: regionAreaSquareMeters(geometry),
        geometry,
        bbox: extractBBox(geometry),
        fromMillis: toWallClockMillis(interval.validFrom),
        toMillis: toWallClockMillis(interval.validTo),
        order,
      });
    });

    if (issues.length > 0) {
      throw new DataUnavailableError('Patch file is corrupt', 'patches', path, issues);
    }

    const checksum = createHash('sha256').update(JSON.stringify(source)).digest('hex');
    return new PatchRegistry(
      [...indexed].sort(comparePatchPriority),
      `${version}+${checksum.slice(0, 12)}`
    );
  }

  get size(): number {
    return this.patches.length;
  }

  /**
   * Patches in priority order
   */
  list(): readonly HistoricalPatch[] {
    return this.patches;
  }

  /**
   * Highest-priority patch covering the coordinate at the local datetime
   */
  match(coordinate: Coordinate, local: LocalDateTime, scope: PatchScope = 'all'): PatchMatch | null {
    const wall = toWallClockMillis(local);

    const matches = this.patches.filter(
      (patch) =>
        (scope === 'all' || patch.era === 'future') &&
        wall >= patch.fromMillis &&
        wall < patch.toMillis &&
        this.covers(patch, coordinate)
    );

    if (matches.length === 0) {
      return null;
    }

    const [winner, ...shadowed] = matches;
    return { patch: winner, shadowedIds: shadowed.map((patch) => patch.id) };
  }

  private covers(patch: IndexedPatch, coordinate: Coordinate): boolean {
    if (!isPointInBBox(coordinate, patch.bbox)) {
      return false;
    }
    if (patch.region.kind === 'bbox') {
      return true;
    }
    return this.pip.isPointInPolygon(coordinate, patch.geometry);
  }
}

function regionName(region: PatchRegion): string {
  return region.kind === 'area' ? region.name : region.kind;
}

function resolveRegionGeometry(
  region: PatchRegion,
  areas: Readonly<Record<string, Polygon | MultiPolygon>>
): Polygon | MultiPolygon | null {
  switch (region.kind) {
    case 'bbox':
      return bboxToPolygon([region.minLon, region.minLat, region.maxLon, region.maxLat]);
    case 'area':
      return areas[region.name] ?? null;
    case 'polygon':
      return region.geometry;
  }
}

function parseInterval(
  definition: PatchDefinition,
  where: string,
  issues: string[]
): { validFrom: LocalDateTime; validTo: LocalDateTime } | null {
  try {
    const validFrom = parseLocalDateTime(definition.validFrom, 'validFrom');
    const validTo = parseLocalDateTime(definition.validTo, 'validTo');
    if (toWallClockMillis(validFrom) >= toWallClockMillis(validTo)) {
      issues.push(`${where}: validFrom must be before validTo`);
      return null;
    }
    return { validFrom, validTo };
  } catch (error) {
    if (isInputInvalidError(error)) {
      issues.push(`${where}: ${error.field ?? 'interval'}: ${error.message}`);
      return null;
    }
    throw error;
  }
}

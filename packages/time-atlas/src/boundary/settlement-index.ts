/**
 * Nearest-Settlement Fallback Index
 *
 * Used when no boundary polygon covers a coordinate (coastal waters, islands
 * missing from the boundary set). Settlements are projected onto the unit
 * sphere and stored in a balanced 3-d tree, so nearest-neighbor search is
 * O(log n) and wraps across the antimeridian and the poles without special
 * cases. Chord length is monotonic in great-circle distance, so the nearest
 * point by chord is the nearest point on the globe.
 */

import { z } from 'zod';
import { IANAZone } from 'luxon';
import type { Coordinate } from '../core/types.js';
import { haversineDistanceKm } from '../core/geo-utils.js';
import { DataUnavailableError, formatIssues } from '../core/errors.js';

export const settlementSchema = z.object({
  name: z.string().min(1),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  zoneId: z.string().min(1),
});

export const settlementCatalogSchema = z.object({
  settlements: z.array(settlementSchema).min(1),
});

export type Settlement = z.infer<typeof settlementSchema>;

export interface NearestSettlement {
  readonly settlement: Settlement;
  readonly zoneId: string;
  readonly distanceKm: number;
}

type Vector3 = readonly [number, number, number];

interface KdNode {
  readonly point: Vector3;
  readonly settlement: Settlement;
  readonly axis: 0 | 1 | 2;
  readonly left: KdNode | null;
  readonly right: KdNode | null;
}

const AXES = [0, 1, 2] as const;

function toUnitVector(coordinate: Coordinate): Vector3 {
  const lat = (coordinate.lat * Math.PI) / 180;
  const lon = (coordinate.lon * Math.PI) / 180;
  const cosLat = Math.cos(lat);
  return [cosLat * Math.cos(lon), cosLat * Math.sin(lon), Math.sin(lat)];
}

function squaredChord(a: Vector3, b: Vector3): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  const dz = a[2] - b[2];
  return dx * dx + dy * dy + dz * dz;
}

interface Projected {
  readonly point: Vector3;
  readonly settlement: Settlement;
  /** Catalog position, used to keep equal-coordinate ordering stable */
  readonly order: number;
}

function buildTree(items: Projected[], depth: number): KdNode | null {
  if (items.length === 0) {
    return null;
  }

  const axis = AXES[depth % 3];
  items.sort((a, b) => a.point[axis] - b.point[axis] || a.order - b.order);
  const median = Math.floor(items.length / 2);
  const pivot = items[median];

  return {
    point: pivot.point,
    settlement: pivot.settlement,
    axis,
    left: buildTree(items.slice(0, median), depth + 1),
    right: buildTree(items.slice(median + 1), depth + 1),
  };
}

export class SettlementIndex {
  private constructor(
    private readonly root: KdNode | null,
    readonly size: number,
    readonly version: string
  ) {}

  /**
   * Build the index from validated settlements
   */
  static fromSettlements(settlements: readonly Settlement[], version: string): SettlementIndex {
    const projected = settlements.map((settlement, order) => ({
      point: toUnitVector(settlement),
      settlement,
      order,
    }));
    return new SettlementIndex(buildTree(projected, 0), settlements.length, version);
  }

  /**
   * Validate a parsed catalog file and build the index.
   *
   * @throws DataUnavailableError on schema violations or unknown zones
   */
  static fromCatalog(source: unknown, version: string, path?: string): SettlementIndex {
    const parsed = settlementCatalogSchema.safeParse(source);
    if (!parsed.success) {
      throw new DataUnavailableError(
        'Settlement catalog failed schema validation',
        'settlements',
        path,
        formatIssues(parsed.error.issues)
      );
    }

    const issues = parsed.data.settlements.flatMap((settlement, i) =>
      IANAZone.isValidZone(settlement.zoneId)
        ? []
        : [`settlements.${i}: unknown IANA zone "${settlement.zoneId}" for ${settlement.name}`]
    );
    if (issues.length > 0) {
      throw new DataUnavailableError('Settlement catalog is corrupt', 'settlements', path, issues);
    }

    return SettlementIndex.fromSettlements(parsed.data.settlements, version);
  }

  /**
   * Closest settlement by great-circle distance, or null for an empty index
   */
  nearest(coordinate: Coordinate): NearestSettlement | null {
    if (!this.root) {
      return null;
    }

    const target = toUnitVector(coordinate);
    let best: KdNode = this.root;
    let bestDistance = squaredChord(target, this.root.point);

    const search = (node: KdNode | null): void => {
      if (!node) return;

      const distance = squaredChord(target, node.point);
      if (distance < bestDistance) {
        best = node;
        bestDistance = distance;
      }

      const delta = target[node.axis] - node.point[node.axis];
      const near = delta < 0 ? node.left : node.right;
      const far = delta < 0 ? node.right : node.left;

      search(near);
      if (delta * delta < bestDistance) {
        search(far);
      }
    };

    search(this.root);

    return {
      settlement: best.settlement,
      zoneId: best.settlement.zoneId,
      distanceKm: haversineDistanceKm(coordinate, best.settlement),
    };
  }
}

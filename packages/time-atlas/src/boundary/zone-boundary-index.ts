/**
 * Zone Boundary Index
 *
 * Maps a coordinate to the IANA zone whose boundary polygon contains it.
 * Built once from a GeoJSON FeatureCollection (`properties.tzid` on every
 * feature) and read-only afterwards.
 *
 * Tie-break: features keep their dataset order and the first containing
 * feature wins, so a point on a shared edge always lands in the same zone.
 */

import { z } from 'zod';
import type { MultiPolygon, Polygon } from 'geojson';
import { IANAZone } from 'luxon';
import type { Coordinate } from '../core/types.js';
import { extractBBox, type BBox } from '../core/geo-utils.js';
import { DataUnavailableError, formatIssues } from '../core/errors.js';
import { PointInPolygonEngine, type BoundedGeometry } from './pip-engine.js';

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema);

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ringSchema) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ringSchema)) }),
]);

const boundaryFeatureSchema = z.object({
  type: z.literal('Feature'),
  properties: z.object({ tzid: z.string().min(1) }).passthrough(),
  geometry: geometrySchema,
});

export const boundaryCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(boundaryFeatureSchema).min(1),
});

interface IndexedBoundary extends BoundedGeometry {
  readonly zoneId: string;
  readonly featureIndex: number;
}

export interface BoundaryMatch {
  readonly zoneId: string;
  /** Position of the winning feature in the source collection */
  readonly featureIndex: number;
}

export class ZoneBoundaryIndex {
  private readonly boundaries: readonly IndexedBoundary[];
  private readonly pip: PointInPolygonEngine;

  private constructor(
    boundaries: readonly IndexedBoundary[],
    readonly version: string,
    pip: PointInPolygonEngine
  ) {
    this.boundaries = boundaries;
    this.pip = pip;
  }

  /**
   * Validate and index a boundary collection.
   *
   * @param source - parsed GeoJSON (unknown until validated)
   * @param version - dataset version recorded in health output
   * @param path - file the collection came from, for error messages
   * @throws DataUnavailableError on schema violations, broken rings or unknown zones
   */
  static fromGeoJSON(source: unknown, version: string, path?: string): ZoneBoundaryIndex {
    const parsed = boundaryCollectionSchema.safeParse(source);
    if (!parsed.success) {
      throw new DataUnavailableError(
        'Zone boundary collection failed schema validation',
        'boundaries',
        path,
        formatIssues(parsed.error.issues)
      );
    }

    const pip = new PointInPolygonEngine();
    const issues: string[] = [];
    const boundaries: IndexedBoundary[] = [];

    parsed.data.features.forEach((feature, featureIndex) => {
      const zoneId = feature.properties.tzid;
      if (!IANAZone.isValidZone(zoneId)) {
        issues.push(`features.${featureIndex}: unknown IANA zone "${zoneId}"`);
        return;
      }

      const geometry: Polygon | MultiPolygon = feature.geometry;
      const geometryErrors = pip.validateGeometry(geometry);
      if (geometryErrors.length > 0) {
        issues.push(...geometryErrors.map((error) => `features.${featureIndex}: ${error}`));
        return;
      }

      const bbox: BBox = extractBBox(geometry);
      boundaries.push({ zoneId, featureIndex, geometry, bbox });
    });

    if (issues.length > 0) {
      throw new DataUnavailableError('Zone boundary collection is corrupt', 'boundaries', path, issues);
    }

    return new ZoneBoundaryIndex(boundaries, version, pip);
  }

  get featureCount(): number {
    return this.boundaries.length;
  }

  /**
   * Zone containing the coordinate, or null when no polygon covers it
   */
  lookup(coordinate: Coordinate): BoundaryMatch | null {
    const index = this.pip.findFirstContaining(coordinate, this.boundaries);
    if (index === -1) {
      return null;
    }
    const boundary = this.boundaries[index];
    return { zoneId: boundary.zoneId, featureIndex: boundary.featureIndex };
  }
}

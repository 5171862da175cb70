/**
 * Point-in-Polygon Engine
 *
 * Ray-casting containment test shared by the zone boundary index and the
 * patch registry's polygon regions.
 *
 * Edge handling:
 * - A point within `tolerance` degrees of any ring edge counts as inside.
 *   Callers that need a unique answer on shared edges break the tie
 *   themselves (the boundary index takes the first feature in dataset order).
 * - Holes (interior rings) exclude their interior.
 */

import type { Polygon, MultiPolygon, Position } from 'geojson';
import type { Coordinate } from '../core/types.js';
import { isPointInBBox, type BBox } from '../core/geo-utils.js';

/**
 * Polygon ring as GeoJSON positions ([lon, lat])
 */
export type PolygonRing = Position[];

/**
 * Anything with a pre-computed bounding box and polygonal geometry
 */
export interface BoundedGeometry {
  readonly bbox: BBox;
  readonly geometry: Polygon | MultiPolygon;
}

/** ~0.1 mm at the equator */
export const DEFAULT_BOUNDARY_TOLERANCE = 1e-9;

export class PointInPolygonEngine {
  constructor(private readonly tolerance: number = DEFAULT_BOUNDARY_TOLERANCE) {}

  /**
   * Test if point is inside polygon or on its boundary
   */
  isPointInPolygon(point: Coordinate, polygon: Polygon | MultiPolygon): boolean {
    if (this.isPointOnBoundary(point, polygon)) {
      return true;
    }

    if (polygon.type === 'Polygon') {
      return this.testPolygon(point, polygon.coordinates);
    }
    return polygon.coordinates.some((polygonCoords) =>
      this.testPolygon(point, polygonCoords)
    );
  }

  /**
   * Index of the first candidate containing the point, or -1.
   *
   * Candidates are tested in the order given; bounding boxes reject most of
   * them before the ray-casting test runs.
   */
  findFirstContaining(point: Coordinate, candidates: readonly BoundedGeometry[]): number {
    for (let i = 0; i < candidates.length; i++) {
      const candidate = candidates[i];
      if (!isPointInBBox(point, candidate.bbox)) {
        continue;
      }
      if (this.isPointInPolygon(point, candidate.geometry)) {
        return i;
      }
    }
    return -1;
  }

  /**
   * Inside exterior ring and outside every hole
   */
  private testPolygon(point: Coordinate, coordinates: Position[][]): boolean {
    const exteriorRing = coordinates[0];
    if (!exteriorRing || !this.testRing(point, exteriorRing)) {
      return false;
    }

    for (let i = 1; i < coordinates.length; i++) {
      if (this.testRing(point, coordinates[i])) {
        return false;
      }
    }

    return true;
  }

  private testRing(point: Coordinate, ring: PolygonRing): boolean {
    return this.countRayIntersections(point, ring) % 2 === 1;
  }

  /**
   * Count crossings of an eastward horizontal ray from the point.
   *
   * Edge (x1, y1)→(x2, y2) is crossed when min(y) <= py < max(y) and the
   * intersection x lies strictly east of px. Horizontal edges never count.
   */
  private countRayIntersections(point: Coordinate, ring: PolygonRing): number {
    let intersections = 0;
    const px = point.lon;
    const py = point.lat;

    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      if (y1 === y2) {
        continue;
      }

      if (py < Math.min(y1, y2) || py >= Math.max(y1, y2)) {
        continue;
      }

      const t = (py - y1) / (y2 - y1);
      const xIntersection = x1 + t * (x2 - x1);

      if (xIntersection > px) {
        intersections++;
      }
    }

    return intersections;
  }

  /**
   * True when the point lies within tolerance of any ring edge
   */
  isPointOnBoundary(point: Coordinate, polygon: Polygon | MultiPolygon): boolean {
    const rings =
      polygon.type === 'Polygon' ? polygon.coordinates : polygon.coordinates.flat();

    return rings.some((ring) => this.isPointOnRing(point, ring));
  }

  private isPointOnRing(point: Coordinate, ring: PolygonRing): boolean {
    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];
      if (pointToSegmentDistance(point.lon, point.lat, x1, y1, x2, y2) <= this.tolerance) {
        return true;
      }
    }
    return false;
  }

  /**
   * Structural problems in a ring (empty when valid)
   */
  validateRing(ring: PolygonRing): string[] {
    const errors: string[] = [];

    if (ring.length < 4) {
      errors.push(`ring has ${ring.length} points, minimum 4 required (triangle + closure)`);
      return errors;
    }

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      errors.push('ring is not closed (first point != last point)');
    }

    for (const [lon, lat] of ring) {
      if (!(lon >= -180 && lon <= 180 && lat >= -90 && lat <= 90)) {
        errors.push(`position [${lon}, ${lat}] is outside WGS84 range`);
        break;
      }
    }

    return errors;
  }

  /**
   * Validate every ring of a polygonal geometry
   */
  validateGeometry(geometry: Polygon | MultiPolygon): string[] {
    const polygons = geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
    const errors: string[] = [];
    if (polygons.length === 0) {
      errors.push('geometry has no polygons');
    }
    polygons.forEach((rings, polygonIndex) => {
      if (rings.length === 0) {
        errors.push(`polygon ${polygonIndex} has no rings`);
      }
      rings.forEach((ring, ringIndex) => {
        for (const error of this.validateRing(ring)) {
          errors.push(`polygon ${polygonIndex} ring ${ringIndex}: ${error}`);
        }
      });
    });
    return errors;
  }
}

/**
 * Euclidean distance (degrees) from a point to a segment
 */
function pointToSegmentDistance(
  px: number,
  py: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number
): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  const lengthSquared = dx * dx + dy * dy;

  if (lengthSquared === 0) {
    return Math.sqrt((px - x1) ** 2 + (py - y1) ** 2);
  }

  let t = ((px - x1) * dx + (py - y1) * dy) / lengthSquared;
  t = Math.max(0, Math.min(1, t));

  const closestX = x1 + t * dx;
  const closestY = y1 + t * dy;
  return Math.sqrt((px - closestX) ** 2 + (py - closestY) ** 2);
}

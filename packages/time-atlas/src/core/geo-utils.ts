/**
 * Geographic Utilities - Shared Geometry Functions
 *
 * - extractBBox: bounding box of polygonal geometry
 * - isPointInBBox: O(1) pre-filter before point-in-polygon
 * - haversineDistanceKm: great-circle distance
 * - roundCoordinate / coordinateKey: cache key normalization
 * - regionAreaSquareMeters: geodesic area used for patch specificity
 */

import type { MultiPolygon, Polygon, Position } from 'geojson';
import { area } from '@turf/area';
import type { Coordinate } from './types.js';

/**
 * Bounding box [minLon, minLat, maxLon, maxLat]
 */
export type BBox = readonly [number, number, number, number];

/**
 * Mean Earth radius (km)
 */
export const EARTH_RADIUS_KM = 6371;

/**
 * Extract bounding box from polygonal geometry
 *
 * @returns Bounding box [minLon, minLat, maxLon, maxLat]
 */
export function extractBBox(geometry: Polygon | MultiPolygon): BBox {
    let minLon = Infinity;
    let minLat = Infinity;
    let maxLon = -Infinity;
    let maxLat = -Infinity;

    const processRing = (ring: Position[]): void => {
        for (const [lon, lat] of ring) {
            minLon = Math.min(minLon, lon);
            minLat = Math.min(minLat, lat);
            maxLon = Math.max(maxLon, lon);
            maxLat = Math.max(maxLat, lat);
        }
    };

    if (geometry.type === 'Polygon') {
        for (const ring of geometry.coordinates) {
            processRing(ring);
        }
    } else {
        for (const polygon of geometry.coordinates) {
            for (const ring of polygon) {
                processRing(ring);
            }
        }
    }

    return [minLon, minLat, maxLon, maxLat] as const;
}

/**
 * Check if point is inside bounding box (edges inclusive)
 */
export function isPointInBBox(point: Coordinate, bbox: BBox): boolean {
    const [minLon, minLat, maxLon, maxLat] = bbox;
    return (
        point.lon >= minLon &&
        point.lon <= maxLon &&
        point.lat >= minLat &&
        point.lat <= maxLat
    );
}

/**
 * Polygon covering a bounding box, counter-clockwise exterior ring
 */
export function bboxToPolygon(bbox: BBox): Polygon {
    const [minLon, minLat, maxLon, maxLat] = bbox;
    return {
        type: 'Polygon',
        coordinates: [
            [
                [minLon, minLat],
                [maxLon, minLat],
                [maxLon, maxLat],
                [minLon, maxLat],
                [minLon, minLat],
            ],
        ],
    };
}

/**
 * Geodesic area of a polygonal region in square meters
 */
export function regionAreaSquareMeters(geometry: Polygon | MultiPolygon): number {
    return area(geometry);
}

/**
 * Great-circle distance between two coordinates (km)
 */
export function haversineDistanceKm(a: Coordinate, b: Coordinate): number {
    const dLat = ((b.lat - a.lat) * Math.PI) / 180;
    const dLon = ((b.lon - a.lon) * Math.PI) / 180;
    const h =
        Math.sin(dLat / 2) * Math.sin(dLat / 2) +
        Math.cos((a.lat * Math.PI) / 180) *
            Math.cos((b.lat * Math.PI) / 180) *
            Math.sin(dLon / 2) *
            Math.sin(dLon / 2);
    return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Round both axes to `precision` decimals. Negative zero collapses to zero.
 */
export function roundCoordinate(coordinate: Coordinate, precision: number): Coordinate {
    const factor = 10 ** precision;
    return {
        lat: Math.round(coordinate.lat * factor) / factor + 0,
        lon: Math.round(coordinate.lon * factor) / factor + 0,
    };
}

/**
 * Stable string key for a coordinate rounded to `precision` decimals
 */
export function coordinateKey(coordinate: Coordinate, precision: number): string {
    const rounded = roundCoordinate(coordinate, precision);
    return `${rounded.lat.toFixed(precision)},${rounded.lon.toFixed(precision)}`;
}

export function isValidCoordinate(coordinate: Coordinate): boolean {
    return (
        Number.isFinite(coordinate.lat) &&
        Number.isFinite(coordinate.lon) &&
        coordinate.lat >= -90 &&
        coordinate.lat <= 90 &&
        coordinate.lon >= -180 &&
        coordinate.lon <= 180
    );
}

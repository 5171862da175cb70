/**
 * In-process fixtures for resolution tests
 *
 * Small boundary, settlement and patch datasets with hand-checked geometry,
 * plus a factory that wires them into a TimeResolutionService the same way
 * the composition root does.
 */

import type { Polygon } from 'geojson';
import { ZoneBoundaryIndex } from '../../boundary/zone-boundary-index.js';
import { SettlementIndex, type Settlement } from '../../boundary/settlement-index.js';
import { ZoneLocator, type ZoneLocation } from '../../boundary/zone-locator.js';
import { PatchRegistry } from '../../patches/patch-registry.js';
import { CoordinateCache } from '../../serving/coordinate-cache.js';
import {
  ParityProfileSelector,
  type FoldPolicyOverrides,
} from '../../resolution/parity-profiles.js';
import { TimeResolutionService } from '../../resolution/time-resolution-service.js';
import { Logger } from '../../core/utils/logger.js';

export function square(minLon: number, minLat: number, maxLon: number, maxLat: number): Polygon {
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
 * Feature order matters: New York comes before Chicago, so the shared edge
 * at lon -75 belongs to New York. Berlin has a hole that Paris fills.
 */
export const FIXTURE_BOUNDARIES = {
  type: 'FeatureCollection',
  features: [
    {
      type: 'Feature',
      properties: { tzid: 'America/New_York' },
      geometry: square(-75, 40, -73, 42),
    },
    {
      type: 'Feature',
      properties: { tzid: 'America/Chicago' },
      geometry: square(-77, 40, -75, 42),
    },
    {
      type: 'Feature',
      properties: { tzid: 'Europe/Berlin' },
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [10, 50],
            [14, 50],
            [14, 54],
            [10, 54],
            [10, 50],
          ],
          [
            [11, 51],
            [13, 51],
            [13, 53],
            [11, 53],
            [11, 51],
          ],
        ],
      },
    },
    {
      type: 'Feature',
      properties: { tzid: 'Europe/Paris' },
      geometry: square(11, 51, 13, 53),
    },
    {
      type: 'Feature',
      properties: { tzid: 'Australia/Sydney' },
      geometry: {
        type: 'MultiPolygon',
        coordinates: [square(150, -35, 152, -33).coordinates, square(145, -38, 147, -36).coordinates],
      },
    },
  ],
};

export const FIXTURE_SETTLEMENTS: Settlement[] = [
  { name: 'New York', lat: 40.7128, lon: -74.006, zoneId: 'America/New_York' },
  { name: 'Chicago', lat: 41.8781, lon: -87.6298, zoneId: 'America/Chicago' },
  { name: 'Phoenix', lat: 33.4484, lon: -112.074, zoneId: 'America/Phoenix' },
  { name: 'Honolulu', lat: 21.3069, lon: -157.8583, zoneId: 'Pacific/Honolulu' },
  { name: 'London', lat: 51.5074, lon: -0.1278, zoneId: 'Europe/London' },
  { name: 'Reykjavik', lat: 64.1466, lon: -21.9426, zoneId: 'Atlantic/Reykjavik' },
  { name: 'Suva', lat: -18.1248, lon: 178.4501, zoneId: 'Pacific/Fiji' },
  { name: 'Apia', lat: -13.8507, lon: -171.7514, zoneId: 'Pacific/Apia' },
];

export const FIXTURE_PATCHES = {
  version: 'fixture-1',
  areas: {
    nyc: square(-74.26, 40.49, -73.7, 40.92),
  },
  patches: [
    {
      id: 'eastern_war_time_1942',
      region: { kind: 'bbox', minLat: 38, maxLat: 44, minLon: -76, maxLon: -70 },
      validFrom: '1942-02-09T02:00:00',
      validTo: '1945-09-30T02:00:00',
      effect: { kind: 'fixed_offset', offsetSeconds: -14400, dstActive: true },
      confidence: 'high',
      note: 'Regional war time',
    },
    {
      id: 'nyc_war_time_1943',
      region: { kind: 'area', name: 'nyc' },
      validFrom: '1942-02-09T02:00:00',
      validTo: '1945-09-30T02:00:00',
      effect: { kind: 'fixed_offset', offsetSeconds: -14400, dstActive: true },
      confidence: 'medium',
      note: 'City war time',
      sources: ['City ordinance records'],
    },
    {
      id: 'lmt_before_1883',
      region: { kind: 'bbox', minLat: 39, maxLat: 43, minLon: -76, maxLon: -72 },
      validFrom: '1800-01-01T00:00:00',
      validTo: '1883-11-18T12:00:00',
      effect: { kind: 'local_mean_time' },
      confidence: 'low',
      note: 'Local solar time',
    },
    {
      id: 'seasonal_rule_1946',
      region: { kind: 'bbox', minLat: 40, maxLat: 42, minLon: -77, maxLon: -75 },
      validFrom: '1946-01-01T00:00:00',
      validTo: '1967-01-01T00:00:00',
      effect: {
        kind: 'fixed_offset',
        offsetSeconds: -21600,
        dstActive: false,
        dstRule: 'us_last_sunday_april_october',
      },
      confidence: 'medium',
      note: 'Municipal daylight schedule',
    },
    {
      id: 'zone_override_1961',
      region: { kind: 'bbox', minLat: 41.5, maxLat: 41.9, minLon: -74.9, maxLon: -74.5 },
      validFrom: '1961-01-01T00:00:00',
      validTo: '1974-01-06T02:00:00',
      effect: { kind: 'zone', zoneId: 'America/Chicago' },
      confidence: 'high',
      note: 'Followed central time',
    },
    {
      id: 'future_fixed_2031',
      region: { kind: 'bbox', minLat: 50, maxLat: 54, minLon: 10, maxLon: 14 },
      validFrom: '2031-01-01T00:00:00',
      validTo: '2100-01-01T00:00:00',
      effect: { kind: 'fixed_offset', offsetSeconds: 3600, dstActive: false },
      era: 'future',
      confidence: 'low',
      note: 'Permanent standard time',
    },
  ],
};

/** Logger that only reports errors, keeping test output quiet */
export const quietLogger = new Logger({
  level: 'error',
  service: 'time-atlas:test',
  pretty: true,
  context: {},
});

export interface FixtureServiceOptions {
  readonly cacheCapacity?: number;
  readonly cachePrecision?: number;
  readonly foldPolicies?: FoldPolicyOverrides;
  readonly patches?: unknown;
  readonly fallbackMaxDistanceKm?: number;
}

export interface FixtureService {
  readonly service: TimeResolutionService;
  readonly cache: CoordinateCache<ZoneLocation>;
  readonly locator: ZoneLocator;
  readonly patches: PatchRegistry;
}

export function buildFixtureService(options: FixtureServiceOptions = {}): FixtureService {
  const boundaries = ZoneBoundaryIndex.fromGeoJSON(FIXTURE_BOUNDARIES, 'fixture-boundaries');
  const settlements = SettlementIndex.fromSettlements(FIXTURE_SETTLEMENTS, 'fixture-settlements');
  const patches = PatchRegistry.fromDocument(options.patches ?? FIXTURE_PATCHES);
  const cache = new CoordinateCache<ZoneLocation>({
    capacity: options.cacheCapacity ?? 64,
    precision: options.cachePrecision ?? 3,
  });
  const locator = new ZoneLocator({
    boundaries,
    settlements,
    cache,
    ...(options.fallbackMaxDistanceKm !== undefined
      ? { fallbackMaxDistanceKm: options.fallbackMaxDistanceKm }
      : {}),
  });

  const service = new TimeResolutionService({
    locator,
    patches,
    profiles: new ParityProfileSelector(options.foldPolicies),
    boundaries,
    settlements,
    cache,
    tzdbVersion: 'test-tzdb',
    logger: quietLogger,
  });

  return { service, cache, locator, patches };
}

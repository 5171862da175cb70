/**
 * Zone Locator
 *
 * Coordinate → zone identity, trying in order:
 * 1. Zone Boundary Index (high confidence)
 * 2. Nearest-settlement fallback within `fallbackMaxDistanceKm` (medium)
 * 3. Nautical zone Etc/GMT±N from longitude (low)
 *
 * Lookups go through the coordinate cache and always run on the rounded
 * coordinate, so cached and uncached answers are identical.
 */

import type { ConfidenceTier, Coordinate, ResolutionSource } from '../core/types.js';
import type { CoordinateCache } from '../serving/coordinate-cache.js';
import type { ZoneBoundaryIndex } from './zone-boundary-index.js';
import type { SettlementIndex } from './settlement-index.js';

export const DEFAULT_FALLBACK_MAX_KM = 100;

export type ZoneLocationMethod = 'boundary' | 'fallback' | 'nautical';

export interface ZoneLocation {
  readonly zoneId: string;
  readonly method: ZoneLocationMethod;
  readonly confidence: ConfidenceTier;
  readonly sources: readonly ResolutionSource[];
  readonly notes: readonly string[];
  /** Present for fallback and nautical lookups */
  readonly settlement?: {
    readonly name: string;
    readonly distanceKm: number;
  };
}

export interface ZoneLocatorOptions {
  readonly boundaries: ZoneBoundaryIndex;
  readonly settlements: SettlementIndex;
  readonly cache: CoordinateCache<ZoneLocation>;
  readonly fallbackMaxDistanceKm?: number;
}

/**
 * Etc/GMT zone for a longitude. POSIX sign convention: Etc/GMT+5 is UTC-5.
 */
export function nauticalZoneId(lon: number): string {
  const hours = Math.round(lon / 15) + 0;
  if (hours === 0) {
    return 'Etc/GMT';
  }
  return hours > 0 ? `Etc/GMT-${hours}` : `Etc/GMT+${-hours}`;
}

export class ZoneLocator {
  private readonly boundaries: ZoneBoundaryIndex;
  private readonly settlements: SettlementIndex;
  private readonly cache: CoordinateCache<ZoneLocation>;
  readonly fallbackMaxDistanceKm: number;

  constructor(options: ZoneLocatorOptions) {
    this.boundaries = options.boundaries;
    this.settlements = options.settlements;
    this.cache = options.cache;
    this.fallbackMaxDistanceKm = options.fallbackMaxDistanceKm ?? DEFAULT_FALLBACK_MAX_KM;
  }

  locate(coordinate: Coordinate): ZoneLocation {
    return this.cache.getOrCompute(coordinate, (rounded) => this.compute(rounded));
  }

  private compute(coordinate: Coordinate): ZoneLocation {
    const match = this.boundaries.lookup(coordinate);
    if (match) {
      return {
        zoneId: match.zoneId,
        method: 'boundary',
        confidence: 'high',
        sources: ['boundary_index'],
        notes: [],
      };
    }

    const nearest = this.settlements.nearest(coordinate);
    const distance = nearest ? nearest.distanceKm.toFixed(1) : '';

    if (nearest && nearest.distanceKm <= this.fallbackMaxDistanceKm) {
      return {
        zoneId: nearest.zoneId,
        method: 'fallback',
        confidence: 'medium',
        sources: ['boundary_index', 'fallback_index'],
        notes: [
          `No boundary polygon contains the coordinate; using ${nearest.zoneId} from nearest settlement ${nearest.settlement.name} (${distance} km)`,
        ],
        settlement: { name: nearest.settlement.name, distanceKm: nearest.distanceKm },
      };
    }

    const zoneId = nauticalZoneId(coordinate.lon);
    const notes = nearest
      ? [
          `Nearest settlement ${nearest.settlement.name} is ${distance} km away, beyond the ${this.fallbackMaxDistanceKm} km fallback limit; using nautical zone ${zoneId}`,
        ]
      : [`No settlement data available; using nautical zone ${zoneId}`];

    return {
      zoneId,
      method: 'nautical',
      confidence: 'low',
      sources: ['boundary_index', 'fallback_index', 'nautical_zone'],
      notes,
      ...(nearest
        ? { settlement: { name: nearest.settlement.name, distanceKm: nearest.distanceKm } }
        : {}),
    };
  }
}

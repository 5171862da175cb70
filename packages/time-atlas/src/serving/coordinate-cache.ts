/**
 * Coordinate Lookup Cache
 *
 * Bounded LRU keyed by coordinates rounded to a fixed number of decimals.
 * Callers compute on the rounded coordinate (see `round`) so that a hit and a
 * miss for the same key always produce the same value.
 *
 * Map iteration order is insertion order; re-inserting on every hit keeps the
 * least recently used key first.
 */

import type { Coordinate } from '../core/types.js';
import { coordinateKey, roundCoordinate } from '../core/geo-utils.js';

export const DEFAULT_CACHE_CAPACITY = 1024;
/** 3 decimals ≈ 111 m of latitude */
export const DEFAULT_CACHE_PRECISION = 3;

export interface CoordinateCacheOptions {
  /** Maximum entries; 0 disables caching */
  readonly capacity?: number;
  /** Decimal places kept when building keys (0-6) */
  readonly precision?: number;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly size: number;
  readonly capacity: number;
  readonly hitRate: number;
}

export class CoordinateCache<T> {
  readonly capacity: number;
  readonly precision: number;
  private readonly entries = new Map<string, T>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: CoordinateCacheOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
    this.precision = options.precision ?? DEFAULT_CACHE_PRECISION;

    if (!Number.isInteger(this.capacity) || this.capacity < 0) {
      throw new RangeError(`cache capacity must be a non-negative integer, got ${this.capacity}`);
    }
    if (!Number.isInteger(this.precision) || this.precision < 0 || this.precision > 6) {
      throw new RangeError(`cache precision must be an integer in [0, 6], got ${this.precision}`);
    }
  }

  get enabled(): boolean {
    return this.capacity > 0;
  }

  /**
   * Coordinate snapped to the cache grid
   */
  round(coordinate: Coordinate): Coordinate {
    return roundCoordinate(coordinate, this.precision);
  }

  key(coordinate: Coordinate): string {
    return coordinateKey(coordinate, this.precision);
  }

  /**
   * Cached value for the coordinate's key, computing and storing it on a miss.
   *
   * `compute` receives the rounded coordinate, never the raw one.
   */
  getOrCompute(coordinate: Coordinate, compute: (rounded: Coordinate) => T): T {
    const rounded = this.round(coordinate);

    if (!this.enabled) {
      this.misses++;
      return compute(rounded);
    }

    const key = this.key(rounded);
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    this.misses++;
    const value = compute(rounded);
    this.set(key, value);
    return value;
  }

  private set(key: string, value: T): void {
    while (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    this.entries.set(key, value);
  }

  has(coordinate: Coordinate): boolean {
    return this.entries.has(this.key(coordinate));
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }
}

/**
 * Coordinate Lookup Cache Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CoordinateCache } from '../../../serving/coordinate-cache.js';
import type { Coordinate } from '../../../core/types.js';

describe('CoordinateCache', () => {
  let cache: CoordinateCache<string>;

  beforeEach(() => {
    cache = new CoordinateCache<string>({ capacity: 2, precision: 3 });
  });

  describe('rounding', () => {
    it('should share one entry between coordinates in the same cell', () => {
      const compute = vi.fn((rounded: Coordinate) => `${rounded.lat},${rounded.lon}`);

      const first = cache.getOrCompute({ lat: 40.71281, lon: -74.00601 }, compute);
      const second = cache.getOrCompute({ lat: 40.71251, lon: -74.00649 }, compute);

      expect(first).toBe('40.713,-74.006');
      expect(second).toBe('40.713,-74.006');
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should pass the rounded coordinate to compute', () => {
      const compute = vi.fn((rounded: Coordinate) => `${rounded.lat}`);

      cache.getOrCompute({ lat: 12.34567, lon: 1 }, compute);

      expect(compute).toHaveBeenCalledWith({ lat: 12.346, lon: 1 });
    });

    it('should collapse negative zero', () => {
      expect(cache.key({ lat: -0.0001, lon: 0.0001 })).toBe('0.000,0.000');
    });
  });

  describe('LRU eviction', () => {
    it('should evict the least recently used entry', () => {
      const compute = vi.fn((rounded: Coordinate) => `${rounded.lat}`);

      cache.getOrCompute({ lat: 1, lon: 0 }, compute);
      cache.getOrCompute({ lat: 2, lon: 0 }, compute);
      // Touch 1 so 2 becomes least recently used
      cache.getOrCompute({ lat: 1, lon: 0 }, compute);
      cache.getOrCompute({ lat: 3, lon: 0 }, compute);

      expect(cache.has({ lat: 1, lon: 0 })).toBe(true);
      expect(cache.has({ lat: 2, lon: 0 })).toBe(false);
      expect(cache.has({ lat: 3, lon: 0 })).toBe(true);
      expect(cache.stats()).toEqual({
        hits: 1,
        misses: 3,
        evictions: 1,
        size: 2,
        capacity: 2,
        hitRate: 0.25,
      });
    });
  });

  describe('disabled cache', () => {
    it('should compute on every call when capacity is 0', () => {
      const disabled = new CoordinateCache<string>({ capacity: 0 });
      const compute = vi.fn(() => 'value');

      disabled.getOrCompute({ lat: 1, lon: 1 }, compute);
      disabled.getOrCompute({ lat: 1, lon: 1 }, compute);

      expect(compute).toHaveBeenCalledTimes(2);
      expect(disabled.enabled).toBe(false);
      expect(disabled.stats().size).toBe(0);
    });

    it('should still hand compute the rounded coordinate', () => {
      const disabled = new CoordinateCache<string>({ capacity: 0, precision: 1 });
      const compute = vi.fn((rounded: Coordinate) => `${rounded.lat}`);

      expect(disabled.getOrCompute({ lat: 1.26, lon: 0 }, compute)).toBe('1.3');
    });
  });

  describe('options', () => {
    it('should default to 1024 entries at 3 decimals', () => {
      const defaults = new CoordinateCache<string>();

      expect(defaults.capacity).toBe(1024);
      expect(defaults.precision).toBe(3);
    });

    it('should reject invalid capacity and precision', () => {
      expect(() => new CoordinateCache<string>({ capacity: -1 })).toThrow(RangeError);
      expect(() => new CoordinateCache<string>({ precision: 7 })).toThrow(RangeError);
    });
  });
});

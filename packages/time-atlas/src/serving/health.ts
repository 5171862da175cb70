/**
 * Health Monitoring
 *
 * Tracks request outcomes and latency, and combines them with dataset
 * versions and cache statistics into a health report.
 */

import type { CacheStats } from './coordinate-cache.js';

export type HealthStatus = 'healthy' | 'degraded';

/** Hit rate is only judged once this many lookups have happened */
export const CACHE_WARMUP_LOOKUPS = 100;
export const MIN_HEALTHY_HIT_RATE = 0.5;

export interface QueryMetrics {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
  readonly latencyP50Ms: number;
  readonly latencyP95Ms: number;
}

export interface DatasetSummary {
  readonly tzdbVersion: string;
  readonly patchVersion: string;
  readonly patchesLoaded: number;
  readonly boundaryFeatures: number;
  readonly boundaryVersion: string;
  readonly settlements: number;
  readonly settlementVersion: string;
}

export interface HealthReport extends DatasetSummary {
  readonly status: HealthStatus;
  readonly cache: CacheStats;
  readonly queries: QueryMetrics;
}

export class HealthMonitor {
  private successCount = 0;
  private errorCount = 0;
  private latencies: number[] = [];

  recordSuccess(latencyMs: number): void {
    this.successCount++;
    this.latencies.push(latencyMs);

    // Keep last 10,000 latencies for percentiles
    if (this.latencies.length > 10000) {
      this.latencies.shift();
    }
  }

  recordFailure(): void {
    this.errorCount++;
  }

  report(datasets: DatasetSummary, cache: CacheStats): HealthReport {
    const queries: QueryMetrics = {
      total: this.successCount + this.errorCount,
      successful: this.successCount,
      failed: this.errorCount,
      latencyP50Ms: this.percentile(0.5),
      latencyP95Ms: this.percentile(0.95),
    };

    return {
      status: determineHealthStatus(cache),
      ...datasets,
      cache,
      queries,
    };
  }

  private percentile(p: number): number {
    if (this.latencies.length === 0) {
      return 0;
    }

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }
}

export function determineHealthStatus(cache: CacheStats): HealthStatus {
  const lookups = cache.hits + cache.misses;
  if (cache.capacity > 0 && lookups >= CACHE_WARMUP_LOOKUPS && cache.hitRate < MIN_HEALTHY_HIT_RATE) {
    return 'degraded';
  }
  return 'healthy';
}

/**
 * Time Atlas core domain types
 *
 * Wire-level names (snake_case) live in @civil-time/types; everything inside
 * the core uses these camelCase shapes.
 */

import type {
  ConfidenceTier,
  FoldPolicy,
  ParityProfileName,
  ResolutionSource,
  ResolutionWarningCode,
} from '@civil-time/types';

export type {
  ConfidenceTier,
  FoldPolicy,
  ParityProfileName,
  ResolutionSource,
  ResolutionWarningCode,
};

/**
 * Geographic coordinate in decimal degrees (WGS84)
 */
export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

/**
 * Civil date and wall-clock time with no offset attached.
 *
 * May name a moment that does not exist (gap) or exists twice (fold) in a
 * given zone.
 */
export interface LocalDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/**
 * IANA zone name, or a `UTC±HH:MM` label for caller-supplied offsets
 */
export type ZoneIdentity = string;

export interface ResolutionWarning {
  readonly code: ResolutionWarningCode;
  readonly message: string;
}

export interface ResolutionProvenance {
  readonly tzdbVersion: string;
  readonly patchVersion: string;
  readonly sources: readonly ResolutionSource[];
  readonly resolutionMode: ParityProfileName;
  readonly foldPolicy: FoldPolicy;
  readonly patchesApplied: readonly string[];
}

/**
 * Final answer for one request. Frozen after construction.
 */
export interface ResolutionResult {
  /** ISO-8601 instant, `Z` suffix */
  readonly utc: string;
  /** Same instant as epoch milliseconds */
  readonly utcMillis: number;
  readonly zoneId: ZoneIdentity;
  readonly offsetSeconds: number;
  readonly dstActive: boolean;
  readonly confidence: ConfidenceTier;
  readonly reason: string;
  readonly notes: readonly string[];
  readonly warnings: readonly ResolutionWarning[];
  readonly provenance: ResolutionProvenance;
}

/**
 * Validated resolution request
 */
export interface ResolveRequest {
  readonly localDateTime: LocalDateTime;
  readonly coordinate: Coordinate;
  readonly profile: ParityProfileName;
  readonly userProvidedOffset?: number;
  readonly userProvidedZone?: string;
}

const CONFIDENCE_RANK: Record<ConfidenceTier, number> = {
  high: 2,
  medium: 1,
  low: 0,
};

/**
 * Lower of two confidence tiers
 */
export function minConfidence(a: ConfidenceTier, b: ConfidenceTier): ConfidenceTier {
  return CONFIDENCE_RANK[a] <= CONFIDENCE_RANK[b] ? a : b;
}

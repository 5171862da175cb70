/**
 * Civil time resolution wire contract
 *
 * Request and response bodies exchanged with the API layer and, transitively,
 * the ephemeris engine. Field names are snake_case on the wire.
 *
 * The ephemeris engine is the sole downstream consumer of `utc` and must treat
 * it as an opaque absolute instant.
 */

/**
 * Pipeline configuration names accepted in `parity_profile`
 */
export const PARITY_PROFILE_NAMES = [
  'strict_history',
  'astro_compat',
  'future_compat',
  'as_entered',
] as const;

export type ParityProfileName = (typeof PARITY_PROFILE_NAMES)[number];

export const FOLD_POLICIES = [
  'prefer_standard_time',
  'prefer_daylight_time',
  'prefer_earlier_instant',
] as const;

export type FoldPolicy = (typeof FOLD_POLICIES)[number];

export type ConfidenceTier = 'high' | 'medium' | 'low';

export type ResolutionWarningCode =
  | 'non_existent_local_time'
  | 'ambiguous_local_time'
  | 'trusted_user_input'
  | 'caller_zone_label'
  | 'caller_zone_conflict'
  | 'caller_offset_conflict'
  | 'nautical_zone_fallback';

/**
 * Subsystems that can contribute to a resolution, in the order consulted
 */
export type ResolutionSource =
  | 'boundary_index'
  | 'fallback_index'
  | 'nautical_zone'
  | 'patch_registry'
  | 'iana_tzdb'
  | 'caller_input';

export interface ResolutionWarningBody {
  readonly code: ResolutionWarningCode;
  readonly message: string;
}

/**
 * POST body for a single resolution
 */
export interface ResolveRequestBody {
  /** Civil timestamp without offset, e.g. "1943-06-15T14:30:00" */
  readonly local_datetime: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly parity_profile: ParityProfileName;
  /** Seconds east of UTC; honored by `as_entered` only */
  readonly user_provided_offset?: number;
  /** IANA zone or North American abbreviation; honored by `as_entered` only */
  readonly user_provided_zone?: string;
}

export interface ResolveProvenanceBody {
  readonly tzdb_version: string;
  readonly patch_version: string;
  readonly sources: readonly ResolutionSource[];
  readonly resolution_mode: ParityProfileName;
  readonly fold_policy: FoldPolicy;
  readonly patches_applied: readonly string[];
}

export interface ResolveResponseBody {
  /** ISO-8601 instant with `Z` suffix */
  readonly utc: string;
  readonly zone_id: string;
  readonly offset_seconds: number;
  readonly dst_active: boolean;
  readonly confidence: ConfidenceTier;
  readonly reason: string;
  readonly notes: readonly string[];
  readonly warnings: readonly ResolutionWarningBody[];
  readonly provenance: ResolveProvenanceBody;
}

/**
 * Error body for rejected requests
 */
export interface ResolveErrorBody {
  readonly error: 'input_invalid';
  readonly message: string;
  readonly field?: string;
  readonly issues: readonly string[];
}

/**
 * Result Assembler
 *
 * Collects what each stage decided into one frozen ResolutionResult and
 * derives the confidence tier from the degradations that occurred.
 */

import type { ResolveResponseBody } from '@civil-time/types';
import type {
  ConfidenceTier,
  FoldPolicy,
  ParityProfileName,
  ResolutionResult,
  ResolutionSource,
  ResolutionWarning,
} from '../core/types.js';
import { minConfidence } from '../core/types.js';
import { formatUtcInstant } from './local-datetime.js';

/**
 * Degradations that cap confidence
 */
export interface ConfidenceFactors {
  /** Zone came from the nearest-settlement fallback */
  readonly fallbackUsed?: boolean;
  /** Zone came from longitude alone */
  readonly nauticalZone?: boolean;
  /** Confidence declared by the applied patch */
  readonly patchConfidence?: ConfidenceTier;
  /** Fold or gap was resolved by policy */
  readonly ambiguousLocalTime?: boolean;
  /** Offset taken from the caller without verification */
  readonly trustedCallerInput?: boolean;
}

export interface AssemblyInput {
  readonly utcMillis: number;
  readonly zoneId: string;
  readonly offsetSeconds: number;
  readonly dstActive: boolean;
  readonly reason: string;
  readonly resolutionMode: ParityProfileName;
  readonly foldPolicy: FoldPolicy;
  readonly sources: readonly ResolutionSource[];
  readonly notes?: readonly string[];
  readonly warnings?: readonly ResolutionWarning[];
  readonly patchesApplied?: readonly string[];
  readonly factors?: ConfidenceFactors;
}

export function computeConfidence(factors: ConfidenceFactors = {}): ConfidenceTier {
  let confidence: ConfidenceTier = 'high';
  if (factors.fallbackUsed) {
    confidence = minConfidence(confidence, 'medium');
  }
  if (factors.nauticalZone) {
    confidence = minConfidence(confidence, 'low');
  }
  if (factors.patchConfidence) {
    confidence = minConfidence(confidence, minConfidence('medium', factors.patchConfidence));
  }
  if (factors.ambiguousLocalTime || factors.trustedCallerInput) {
    confidence = 'low';
  }
  return confidence;
}

export class ResultAssembler {
  constructor(
    private readonly tzdbVersion: string,
    private readonly patchVersion: string
  ) {}

  assemble(input: AssemblyInput): ResolutionResult {
    const patchesApplied = input.patchesApplied ?? [];
    if (patchesApplied.length > 1) {
      throw new Error(`at most one patch may apply, got ${patchesApplied.join(', ')}`);
    }

    const provenance = Object.freeze({
      tzdbVersion: this.tzdbVersion,
      patchVersion: this.patchVersion,
      sources: Object.freeze([...new Set(input.sources)]),
      resolutionMode: input.resolutionMode,
      foldPolicy: input.foldPolicy,
      patchesApplied: Object.freeze([...patchesApplied]),
    });

    return Object.freeze({
      utc: formatUtcInstant(input.utcMillis),
      utcMillis: input.utcMillis,
      zoneId: input.zoneId,
      offsetSeconds: input.offsetSeconds,
      dstActive: input.dstActive,
      confidence: computeConfidence(input.factors),
      reason: input.reason,
      notes: Object.freeze([...(input.notes ?? [])]),
      warnings: Object.freeze((input.warnings ?? []).map((warning) => Object.freeze({ ...warning }))),
      provenance,
    });
  }
}

/**
 * Wire representation (snake_case) of a result
 */
export function toResponseBody(result: ResolutionResult): ResolveResponseBody {
  return {
    utc: result.utc,
    zone_id: result.zoneId,
    offset_seconds: result.offsetSeconds,
    dst_active: result.dstActive,
    confidence: result.confidence,
    reason: result.reason,
    notes: [...result.notes],
    warnings: result.warnings.map((warning) => ({ code: warning.code, message: warning.message })),
    provenance: {
      tzdb_version: result.provenance.tzdbVersion,
      patch_version: result.provenance.patchVersion,
      sources: [...result.provenance.sources],
      resolution_mode: result.provenance.resolutionMode,
      fold_policy: result.provenance.foldPolicy,
      patches_applied: [...result.provenance.patchesApplied],
    },
  };
}

/**
 * @civil-time/types
 *
 * Shared wire types for the civil time resolution service.
 *
 * @packageDocumentation
 */

export {
  PARITY_PROFILE_NAMES,
  FOLD_POLICIES,
  type ParityProfileName,
  type FoldPolicy,
  type ConfidenceTier,
  type ResolutionWarningCode,
  type ResolutionSource,
  type ResolutionWarningBody,
  type ResolveRequestBody,
  type ResolveProvenanceBody,
  type ResolveResponseBody,
  type ResolveErrorBody,
} from './time-resolution.js';

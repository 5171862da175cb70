/**
 * Parity Profile Selector
 *
 * A parity profile names a pipeline configuration so that results can be
 * made to agree with a particular downstream convention. The table below is
 * the single place where profile behavior is decided.
 */

import { FOLD_POLICIES, PARITY_PROFILE_NAMES } from '@civil-time/types';
import type { FoldPolicy, ParityProfileName } from '../core/types.js';
import { InputInvalidError } from '../core/errors.js';
import type { PatchScope } from '../patches/patch-registry.js';

export interface ProfilePlan {
  readonly profile: ParityProfileName;
  readonly usePatches: boolean;
  readonly patchScope: PatchScope;
  readonly foldPolicy: FoldPolicy;
  /** Echo a caller-supplied offset instead of computing one */
  readonly trustCallerOffset: boolean;
}

const PROFILE_TABLE: Readonly<Record<ParityProfileName, Omit<ProfilePlan, 'profile'>>> = {
  strict_history: {
    usePatches: true,
    patchScope: 'all',
    foldPolicy: 'prefer_standard_time',
    trustCallerOffset: false,
  },
  astro_compat: {
    usePatches: false,
    patchScope: 'all',
    foldPolicy: 'prefer_earlier_instant',
    trustCallerOffset: false,
  },
  future_compat: {
    usePatches: true,
    patchScope: 'future',
    foldPolicy: 'prefer_standard_time',
    trustCallerOffset: false,
  },
  as_entered: {
    usePatches: true,
    patchScope: 'all',
    foldPolicy: 'prefer_standard_time',
    trustCallerOffset: true,
  },
};

export type FoldPolicyOverrides = Partial<Record<ParityProfileName, FoldPolicy>>;

export function isParityProfileName(value: string): value is ParityProfileName {
  return PARITY_PROFILE_NAMES.some((name) => name === value);
}

export function isFoldPolicy(value: string): value is FoldPolicy {
  return FOLD_POLICIES.some((policy) => policy === value);
}

/**
 * Parse `profile=policy,profile=policy`
 *
 * @throws InputInvalidError on unknown names or malformed pairs
 */
export function parseFoldPolicyOverrides(text: string): FoldPolicyOverrides {
  const overrides: FoldPolicyOverrides = {};

  for (const pair of text.split(',').map((part) => part.trim()).filter(Boolean)) {
    const [profile, policy, ...extra] = pair.split('=').map((part) => part.trim());
    if (!profile || !policy || extra.length > 0) {
      throw new InputInvalidError(`malformed fold policy override "${pair}"`, 'TIME_ATLAS_FOLD_POLICIES');
    }
    if (!isParityProfileName(profile)) {
      throw new InputInvalidError(`unknown parity profile "${profile}"`, 'TIME_ATLAS_FOLD_POLICIES');
    }
    if (!isFoldPolicy(policy)) {
      throw new InputInvalidError(`unknown fold policy "${policy}"`, 'TIME_ATLAS_FOLD_POLICIES');
    }
    overrides[profile] = policy;
  }

  return overrides;
}

export class ParityProfileSelector {
  constructor(private readonly foldPolicyOverrides: FoldPolicyOverrides = {}) {}

  /**
   * Pipeline plan for a profile name.
   *
   * @throws InputInvalidError for names outside the closed profile set
   */
  plan(profile: string): ProfilePlan {
    if (!isParityProfileName(profile)) {
      throw new InputInvalidError(
        `unknown parity profile "${profile}"; expected one of ${PARITY_PROFILE_NAMES.join(', ')}`,
        'parity_profile'
      );
    }

    const base = PROFILE_TABLE[profile];
    return {
      profile,
      ...base,
      foldPolicy: this.foldPolicyOverrides[profile] ?? base.foldPolicy,
    };
  }
}

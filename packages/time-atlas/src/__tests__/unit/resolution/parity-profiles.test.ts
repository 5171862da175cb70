import { describe, it, expect } from 'vitest';
import {
  ParityProfileSelector,
  parseFoldPolicyOverrides,
} from '../../../resolution/parity-profiles.js';
import { InputInvalidError } from '../../../core/errors.js';

describe('ParityProfileSelector', () => {
  const selector = new ParityProfileSelector();

  it('should plan strict_history with patches and the standard-time fold', () => {
    expect(selector.plan('strict_history')).toEqual({
      profile: 'strict_history',
      usePatches: true,
      patchScope: 'all',
      foldPolicy: 'prefer_standard_time',
      trustCallerOffset: false,
    });
  });

  it('should skip patches and pick the earlier instant under astro_compat', () => {
    const plan = selector.plan('astro_compat');

    expect(plan.usePatches).toBe(false);
    expect(plan.foldPolicy).toBe('prefer_earlier_instant');
  });

  it('should restrict future_compat to future-scoped patches', () => {
    expect(selector.plan('future_compat').patchScope).toBe('future');
  });

  it('should trust caller input only under as_entered', () => {
    expect(selector.plan('as_entered').trustCallerOffset).toBe(true);
    expect(selector.plan('strict_history').trustCallerOffset).toBe(false);
  });

  it('should apply configured fold policy overrides', () => {
    const overridden = new ParityProfileSelector({ strict_history: 'prefer_daylight_time' });

    expect(overridden.plan('strict_history').foldPolicy).toBe('prefer_daylight_time');
    expect(overridden.plan('future_compat').foldPolicy).toBe('prefer_standard_time');
  });

  it('should reject unknown profiles', () => {
    try {
      selector.plan('legacy');
      expect.fail('expected InputInvalidError');
    } catch (error) {
      expect(error).toBeInstanceOf(InputInvalidError);
      if (error instanceof InputInvalidError) {
        expect(error.field).toBe('parity_profile');
      }
    }
  });
});

describe('parseFoldPolicyOverrides', () => {
  it('should parse comma-separated pairs', () => {
    expect(
      parseFoldPolicyOverrides('strict_history=prefer_daylight_time, as_entered = prefer_earlier_instant')
    ).toEqual({
      strict_history: 'prefer_daylight_time',
      as_entered: 'prefer_earlier_instant',
    });
  });

  it('should treat an empty string as no overrides', () => {
    expect(parseFoldPolicyOverrides('')).toEqual({});
  });

  it.each([
    ['strict_history', 'malformed fold policy override "strict_history"'],
    ['legacy=prefer_standard_time', 'unknown parity profile "legacy"'],
    ['strict_history=latest', 'unknown fold policy "latest"'],
  ])('should reject %s', (text, message) => {
    expect(() => parseFoldPolicyOverrides(text)).toThrow(message);
  });
});

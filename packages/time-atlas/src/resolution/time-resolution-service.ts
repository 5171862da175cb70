/**
 * Time Resolution Service
 *
 * Request pipeline:
 *   validate → profile plan → zone locator → patch registry
 *     → ambiguity resolver → result assembler
 *
 * All collaborators are injected by the composition root (see datasets.ts)
 * and are read-only after construction apart from the coordinate cache.
 */

import type { ResolveResponseBody } from '@civil-time/types';
import type {
  ResolutionResult,
  ResolutionSource,
  ResolutionWarning,
  ResolveRequest,
} from '../core/types.js';
import { InputInvalidError, isInputInvalidError } from '../core/errors.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import type { ZoneLocation, ZoneLocator } from '../boundary/zone-locator.js';
import type { ZoneBoundaryIndex } from '../boundary/zone-boundary-index.js';
import type { SettlementIndex } from '../boundary/settlement-index.js';
import type { CoordinateCache } from '../serving/coordinate-cache.js';
import { HealthMonitor, type HealthReport } from '../serving/health.js';
import type { PatchMatch, PatchRegistry } from '../patches/patch-registry.js';
import { AmbiguityResolver, type AmbiguityResolution } from './ambiguity-resolver.js';
import type { ParityProfileSelector, ProfilePlan } from './parity-profiles.js';
import { ResultAssembler, toResponseBody, type AssemblyInput } from './result-assembler.js';
import { parseResolveRequest } from './request-schema.js';
import {
  FixedOffsetTimeline,
  SeasonalRuleTimeline,
  ZoneTimeline,
  isKnownZone,
  tzdbVersion as runtimeTzdbVersion,
  type OffsetTimeline,
} from './offset-timeline.js';
import { formatLocalDateTime, formatOffset, toWallClockMillis } from './local-datetime.js';

/**
 * North American zone abbreviations accepted from callers
 */
const CALLER_ZONE_LABELS: Readonly<Record<string, { offsetSeconds: number; dstActive: boolean }>> = {
  EST: { offsetSeconds: -5 * 3600, dstActive: false },
  EDT: { offsetSeconds: -4 * 3600, dstActive: true },
  CST: { offsetSeconds: -6 * 3600, dstActive: false },
  CDT: { offsetSeconds: -5 * 3600, dstActive: true },
  MST: { offsetSeconds: -7 * 3600, dstActive: false },
  MDT: { offsetSeconds: -6 * 3600, dstActive: true },
  PST: { offsetSeconds: -8 * 3600, dstActive: false },
  PDT: { offsetSeconds: -7 * 3600, dstActive: true },
};

const TRUSTED_INPUT_WARNING: ResolutionWarning = {
  code: 'trusted_user_input',
  message: 'Offset taken from caller input without verification',
};

const CALLER_OFFSET_TOLERANCE_SECONDS = 3600;

export interface TimeResolutionServiceDeps {
  readonly locator: ZoneLocator;
  readonly patches: PatchRegistry;
  readonly profiles: ParityProfileSelector;
  readonly boundaries: ZoneBoundaryIndex;
  readonly settlements: SettlementIndex;
  readonly cache: CoordinateCache<ZoneLocation>;
  readonly resolver?: AmbiguityResolver;
  readonly tzdbVersion?: string;
  readonly logger?: Logger;
}

interface LocatedResolution {
  readonly location: ZoneLocation;
  readonly patchMatch: PatchMatch | null;
  readonly choice: TimelineChoice;
  readonly resolution: AmbiguityResolution;
}

interface TimelineChoice {
  readonly timeline: OffsetTimeline;
  readonly zoneId: string;
  readonly reason: string;
  readonly notes: readonly string[];
  readonly usesTzdb: boolean;
}

export class TimeResolutionService {
  private readonly deps: TimeResolutionServiceDeps;
  private readonly resolver: AmbiguityResolver;
  private readonly assembler: ResultAssembler;
  private readonly monitor = new HealthMonitor();
  private readonly log: Logger;
  readonly tzdbVersion: string;

  constructor(deps: TimeResolutionServiceDeps) {
    this.deps = deps;
    this.resolver = deps.resolver ?? new AmbiguityResolver();
    this.tzdbVersion = deps.tzdbVersion ?? runtimeTzdbVersion();
    this.assembler = new ResultAssembler(this.tzdbVersion, deps.patches.version);
    this.log = (deps.logger ?? rootLogger).child({ component: 'time-resolution' });
  }

  /**
   * Resolve a validated request.
   *
   * @throws InputInvalidError before any lookup when the request is unusable
   */
  resolve(request: ResolveRequest): ResolutionResult {
    const started = performance.now();
    try {
      const result = this.run(request);
      this.monitor.recordSuccess(performance.now() - started);
      this.log.info('resolution_completed', {
        zoneId: result.zoneId,
        offsetSeconds: result.offsetSeconds,
        confidence: result.confidence,
        patchesApplied: result.provenance.patchesApplied,
      });
      return result;
    } catch (error) {
      this.monitor.recordFailure();
      if (isInputInvalidError(error)) {
        this.log.warn('resolution_rejected', { field: error.field, message: error.message });
      }
      throw error;
    }
  }

  /**
   * Validate a wire body, resolve it and return the wire response
   */
  resolveBody(body: unknown): ResolveResponseBody {
    let request: ResolveRequest;
    try {
      request = parseResolveRequest(body);
    } catch (error) {
      this.monitor.recordFailure();
      throw error;
    }
    return toResponseBody(this.resolve(request));
  }

  health(): HealthReport {
    return this.monitor.report(
      {
        tzdbVersion: this.tzdbVersion,
        patchVersion: this.deps.patches.version,
        patchesLoaded: this.deps.patches.size,
        boundaryFeatures: this.deps.boundaries.featureCount,
        boundaryVersion: this.deps.boundaries.version,
        settlements: this.deps.settlements.size,
        settlementVersion: this.deps.settlements.version,
      },
      this.deps.cache.stats()
    );
  }

  private run(request: ResolveRequest): ResolutionResult {
    if (!isValidCoordinate(request.coordinate)) {
      throw new InputInvalidError(
        `coordinate (${request.coordinate.lat}, ${request.coordinate.lon}) is outside WGS84 range`,
        'coordinate'
      );
    }

    const plan = this.deps.profiles.plan(request.profile);

    this.log.debug('resolution_request', {
      localDateTime: formatLocalDateTime(request.localDateTime),
      lat: request.coordinate.lat,
      lon: request.coordinate.lon,
      profile: plan.profile,
    });

    if (plan.trustCallerOffset) {
      if (request.userProvidedOffset !== undefined) {
        return this.resolveTrustedOffset(request, plan, request.userProvidedOffset);
      }
      if (request.userProvidedZone !== undefined) {
        return this.resolveCallerZone(request, plan, request.userProvidedZone);
      }
      return this.resolveFromLocation(request, plan, [
        'No caller offset or zone supplied; resolved with strict_history rules',
      ]);
    }

    const ignored = [
      request.userProvidedOffset !== undefined ? 'user_provided_offset' : null,
      request.userProvidedZone !== undefined ? 'user_provided_zone' : null,
    ].filter((field): field is string => field !== null);

    return this.resolveFromLocation(
      request,
      plan,
      ignored.map((field) => `${field} ignored under ${plan.profile}`)
    );
  }

  private resolveFromLocation(
    request: ResolveRequest,
    plan: ProfilePlan,
    extraNotes: readonly string[]
  ): ResolutionResult {
    const { location, patchMatch, choice, resolution } = this.locateAndResolve(request, plan);

    const sources: ResolutionSource[] = [...location.sources];
    if (plan.usePatches) sources.push('patch_registry');
    if (choice.usesTzdb) sources.push('iana_tzdb');

    const warnings: ResolutionWarning[] = [];
    if (location.method === 'nautical') {
      warnings.push({
        code: 'nautical_zone_fallback',
        message: `No settlement within ${this.deps.locator.fallbackMaxDistanceKm} km; zone derived from longitude`,
      });
    }
    if (resolution.warning) warnings.push(resolution.warning);

    const notes = [...extraNotes, ...location.notes, ...choice.notes];
    if (patchMatch && patchMatch.shadowedIds.length > 0) {
      notes.push(
        `Lower-priority patches also matched and were not applied: ${patchMatch.shadowedIds.join(', ')}`
      );
    }

    return this.assemble(resolution, {
      zoneId: choice.zoneId,
      reason: choice.reason,
      resolutionMode: plan.profile,
      foldPolicy: plan.foldPolicy,
      sources,
      notes,
      warnings,
      patchesApplied: patchMatch ? [patchMatch.patch.id] : [],
      factors: {
        fallbackUsed: location.method === 'fallback',
        nauticalZone: location.method === 'nautical',
        ...(patchMatch ? { patchConfidence: patchMatch.patch.confidence } : {}),
        ambiguousLocalTime: resolution.kind !== 'normal',
      },
    });
  }

  private locateAndResolve(request: ResolveRequest, plan: ProfilePlan): LocatedResolution {
    const location = this.deps.locator.locate(request.coordinate);

    const patchMatch = plan.usePatches
      ? this.deps.patches.match(request.coordinate, request.localDateTime, plan.patchScope)
      : null;

    const choice = this.chooseTimeline(location, patchMatch, request);
    const resolution = this.resolver.resolve(request.localDateTime, choice.timeline, plan.foldPolicy);

    return { location, patchMatch, choice, resolution };
  }

  /**
   * Compare caller input with the strict_history answer for the same request
   */
  private callerConflicts(
    request: ResolveRequest,
    caller: { readonly zoneId?: string; readonly offsetSeconds?: number }
  ): ResolutionWarning[] {
    const { choice, resolution } = this.locateAndResolve(request, this.deps.profiles.plan('strict_history'));
    const warnings: ResolutionWarning[] = [];

    if (caller.zoneId !== undefined && caller.zoneId !== choice.zoneId) {
      warnings.push({
        code: 'caller_zone_conflict',
        message: `Caller zone ${caller.zoneId} differs from calculated ${choice.zoneId}`,
      });
    }
    if (
      caller.offsetSeconds !== undefined &&
      Math.abs(caller.offsetSeconds - resolution.offsetSeconds) > CALLER_OFFSET_TOLERANCE_SECONDS
    ) {
      warnings.push({
        code: 'caller_offset_conflict',
        message: `Caller offset ${caller.offsetSeconds}s differs from calculated ${resolution.offsetSeconds}s by more than ${CALLER_OFFSET_TOLERANCE_SECONDS}s`,
      });
    }

    return warnings;
  }

  private chooseTimeline(
    location: ZoneLocation,
    patchMatch: PatchMatch | null,
    request: ResolveRequest
  ): TimelineChoice {
    const locatedBy =
      location.method === 'boundary'
        ? 'boundary index'
        : location.method === 'fallback'
          ? 'nearest-settlement fallback'
          : 'nautical zone';

    if (!patchMatch) {
      return {
        timeline: new ZoneTimeline(location.zoneId),
        zoneId: location.zoneId,
        reason: `${location.zoneId} via ${locatedBy}, offset from IANA tzdb`,
        notes: [],
        usesTzdb: true,
      };
    }

    const { patch } = patchMatch;
    const applied =
      patch.sources.length > 0
        ? `Applied patch ${patch.id}: ${patch.note} (sources: ${patch.sources.join('; ')})`
        : `Applied patch ${patch.id}: ${patch.note}`;
    const effect = patch.effect;

    switch (effect.kind) {
      case 'zone':
        return {
          timeline: new ZoneTimeline(effect.zoneId),
          zoneId: effect.zoneId,
          reason: `Patch ${patch.id} overrides ${location.zoneId} with ${effect.zoneId}`,
          notes: [applied],
          usesTzdb: true,
        };
      case 'fixed_offset': {
        const timeline =
          effect.dstRule === 'us_last_sunday_april_october'
            ? new SeasonalRuleTimeline(effect.offsetSeconds, `${location.zoneId} (${patch.id})`)
            : new FixedOffsetTimeline(
                effect.offsetSeconds,
                effect.dstActive,
                `${location.zoneId} (${patch.id})`
              );
        return {
          timeline,
          zoneId: location.zoneId,
          reason: `Patch ${patch.id} fixes ${location.zoneId} at UTC${formatOffset(effect.offsetSeconds)}${
            effect.dstRule === 'none' ? '' : ' standard time with seasonal daylight time'
          }`,
          notes: [applied],
          usesTzdb: false,
        };
      }
      case 'local_mean_time': {
        const offsetSeconds = Math.round(request.coordinate.lon * 240);
        return {
          timeline: new FixedOffsetTimeline(offsetSeconds, false, `local mean time (${patch.id})`),
          zoneId: location.zoneId,
          reason: `Patch ${patch.id} applies local mean time UTC${formatOffset(offsetSeconds)} at longitude ${request.coordinate.lon}`,
          notes: [applied],
          usesTzdb: false,
        };
      }
    }
  }

  private resolveTrustedOffset(
    request: ResolveRequest,
    plan: ProfilePlan,
    offsetSeconds: number
  ): ResolutionResult {
    const zone = request.userProvidedZone;
    const label = zone === undefined ? undefined : CALLER_ZONE_LABELS[zone.toUpperCase()];
    const utcMillis = toWallClockMillis(request.localDateTime) - offsetSeconds * 1000;

    let zoneId = `UTC${formatOffset(offsetSeconds)}`;
    let dstActive = false;
    let callerZoneId: string | undefined;
    if (label) {
      zoneId = `UTC${formatOffset(label.offsetSeconds)}`;
      dstActive = label.dstActive;
    } else if (zone !== undefined) {
      if (!isKnownZone(zone)) {
        throw unknownCallerZone(zone);
      }
      zoneId = zone;
      callerZoneId = zone;
      dstActive = new ZoneTimeline(zone).isDaylightTime(utcMillis, offsetSeconds);
    }

    return this.assembler.assemble({
      utcMillis,
      zoneId,
      offsetSeconds,
      dstActive,
      reason: `Caller-supplied offset UTC${formatOffset(offsetSeconds)} used as entered`,
      resolutionMode: plan.profile,
      foldPolicy: plan.foldPolicy,
      sources: ['caller_input'],
      warnings: [
        TRUSTED_INPUT_WARNING,
        ...this.callerConflicts(request, {
          offsetSeconds,
          ...(callerZoneId !== undefined ? { zoneId: callerZoneId } : {}),
        }),
      ],
      factors: { trustedCallerInput: true },
    });
  }

  private resolveCallerZone(request: ResolveRequest, plan: ProfilePlan, zone: string): ResolutionResult {
    const label = CALLER_ZONE_LABELS[zone.toUpperCase()];

    let timeline: OffsetTimeline;
    let zoneId: string;
    const warnings: ResolutionWarning[] = [TRUSTED_INPUT_WARNING];
    const sources: ResolutionSource[] = ['caller_input'];

    if (label) {
      zoneId = `UTC${formatOffset(label.offsetSeconds)}`;
      timeline = new FixedOffsetTimeline(label.offsetSeconds, label.dstActive, zone.toUpperCase());
      warnings.push({
        code: 'caller_zone_label',
        message: `Zone abbreviation ${zone.toUpperCase()} interpreted as fixed offset ${zoneId}`,
      });
    } else if (isKnownZone(zone)) {
      zoneId = zone;
      timeline = new ZoneTimeline(zone);
      sources.push('iana_tzdb');
      warnings.push(...this.callerConflicts(request, { zoneId: zone }));
    } else {
      throw unknownCallerZone(zone);
    }

    const resolution = this.resolver.resolve(request.localDateTime, timeline, plan.foldPolicy);
    if (resolution.warning) warnings.push(resolution.warning);

    return this.assemble(resolution, {
      zoneId,
      reason: `Caller-supplied zone ${zone} used as entered`,
      resolutionMode: plan.profile,
      foldPolicy: plan.foldPolicy,
      sources,
      warnings,
      factors: { trustedCallerInput: true, ambiguousLocalTime: resolution.kind !== 'normal' },
    });
  }

  private assemble(
    resolution: AmbiguityResolution,
    input: Omit<AssemblyInput, 'utcMillis' | 'offsetSeconds' | 'dstActive'>
  ): ResolutionResult {
    return this.assembler.assemble({
      ...input,
      utcMillis: resolution.utcMillis,
      offsetSeconds: resolution.offsetSeconds,
      dstActive: resolution.dstActive,
    });
  }
}

function unknownCallerZone(zone: string): InputInvalidError {
  return new InputInvalidError(
    `user_provided_zone "${zone}" is neither an IANA zone nor a known abbreviation`,
    'user_provided_zone'
  );
}

/**
 * Ambiguity Resolver
 *
 * Converts a local wall-clock reading to an absolute instant against an
 * offset timeline, deterministically handling the two irregular cases:
 *
 * - Gap (clocks jumped forward, the reading never happened): the reading is
 *   shifted forward by the gap length and read with the post-transition
 *   offset. Equivalently, the reading is interpreted with the offset in force
 *   just before the jump.
 * - Fold (clocks fell back, the reading happened twice): one of the two
 *   instants is chosen by fold policy.
 *
 * Candidate offsets are those in force one day either side of the reading; a
 * candidate is valid when the instant it produces actually carries it.
 */

import type { FoldPolicy, LocalDateTime, ResolutionWarning } from '../core/types.js';
import {
  formatLocalDateTime,
  formatOffset,
  fromWallClockMillis,
  toWallClockMillis,
} from './local-datetime.js';
import type { OffsetTimeline } from './offset-timeline.js';

const DAY_MILLIS = 86_400_000;

export const DEFAULT_FOLD_POLICY: FoldPolicy = 'prefer_standard_time';

export type AmbiguityKind = 'normal' | 'gap' | 'fold';

interface Reading {
  readonly utcMillis: number;
  readonly offsetSeconds: number;
  readonly dstActive: boolean;
}

export interface AmbiguityResolution extends Reading {
  readonly kind: AmbiguityKind;
  readonly warning?: ResolutionWarning;
  /** Gap only: the wall-clock reading after shifting past the gap */
  readonly shiftedLocal?: LocalDateTime;
  /** Gap only */
  readonly gapSeconds?: number;
  /** Fold only: the offset of the instant not chosen */
  readonly rejectedOffsetSeconds?: number;
}

function readingFor(timeline: OffsetTimeline, wallMillis: number, offsetSeconds: number): Reading {
  const utcMillis = wallMillis - offsetSeconds * 1000;
  return {
    utcMillis,
    offsetSeconds,
    dstActive: timeline.isDaylightTime(utcMillis, offsetSeconds),
  };
}

/**
 * Pick one instant from a fold. Readings are ordered by ascending offset,
 * which is descending instant.
 */
export function chooseFoldReading(readings: readonly Reading[], policy: FoldPolicy): Reading {
  const smallestOffset = readings[0];
  const largestOffset = readings[readings.length - 1];

  switch (policy) {
    case 'prefer_standard_time':
      return readings.find((reading) => !reading.dstActive) ?? smallestOffset;
    case 'prefer_daylight_time':
      return [...readings].reverse().find((reading) => reading.dstActive) ?? largestOffset;
    case 'prefer_earlier_instant':
      return largestOffset;
  }
}

export class AmbiguityResolver {
  /**
   * Resolve a local reading against a timeline.
   *
   * Pure: the same inputs always give the same output.
   */
  resolve(
    local: LocalDateTime,
    timeline: OffsetTimeline,
    foldPolicy: FoldPolicy = DEFAULT_FOLD_POLICY
  ): AmbiguityResolution {
    const wallMillis = toWallClockMillis(local);

    const candidates = [
      ...new Set([
        timeline.offsetAt(wallMillis - DAY_MILLIS),
        timeline.offsetAt(wallMillis),
        timeline.offsetAt(wallMillis + DAY_MILLIS),
      ]),
    ].sort((a, b) => a - b);

    const valid = candidates
      .filter((offset) => timeline.offsetAt(wallMillis - offset * 1000) === offset)
      .map((offset) => readingFor(timeline, wallMillis, offset));

    if (valid.length === 1) {
      return { kind: 'normal', ...valid[0] };
    }

    if (valid.length > 1) {
      return this.resolveFold(local, timeline, valid, foldPolicy);
    }

    return this.resolveGap(local, timeline, wallMillis);
  }

  private resolveFold(
    local: LocalDateTime,
    timeline: OffsetTimeline,
    readings: readonly Reading[],
    foldPolicy: FoldPolicy
  ): AmbiguityResolution {
    const chosen = chooseFoldReading(readings, foldPolicy);
    const rejected = readings.find((reading) => reading !== chosen) ?? chosen;

    return {
      kind: 'fold',
      ...chosen,
      rejectedOffsetSeconds: rejected.offsetSeconds,
      warning: {
        code: 'ambiguous_local_time',
        message:
          `${formatLocalDateTime(local)} occurs twice in ${timeline.label}; ` +
          `chose UTC${formatOffset(chosen.offsetSeconds)} over ` +
          `UTC${formatOffset(rejected.offsetSeconds)} (${foldPolicy})`,
      },
    };
  }

  private resolveGap(
    local: LocalDateTime,
    timeline: OffsetTimeline,
    wallMillis: number
  ): AmbiguityResolution {
    const before = timeline.offsetAt(wallMillis - DAY_MILLIS);
    const after = timeline.offsetAt(wallMillis + DAY_MILLIS);
    const gapSeconds = after - before;

    const utcMillis = wallMillis - before * 1000;
    const shiftedLocal = fromWallClockMillis(wallMillis + gapSeconds * 1000);

    return {
      kind: 'gap',
      utcMillis,
      offsetSeconds: after,
      dstActive: timeline.isDaylightTime(utcMillis, after),
      shiftedLocal,
      gapSeconds,
      warning: {
        code: 'non_existent_local_time',
        message:
          `${formatLocalDateTime(local)} does not exist in ${timeline.label} ` +
          `(clocks skipped ${gapSeconds} s); interpreted as ${formatLocalDateTime(shiftedLocal)}`,
      },
    };
  }
}

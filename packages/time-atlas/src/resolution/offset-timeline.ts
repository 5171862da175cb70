/**
 * Offset timelines: UTC offset as a function of the absolute instant.
 *
 * Three sources feed the ambiguity resolver:
 * - an IANA zone (luxon over the runtime's ICU tzdb)
 * - a fixed offset from a patch or caller input
 * - a fixed standard offset with a seasonal daylight rule from a patch
 */

import { IANAZone } from 'luxon';
import { InputInvalidError } from '../core/errors.js';
import { formatOffset, toWallClockMillis } from './local-datetime.js';

export interface OffsetTimeline {
  /** Zone id or `UTC±HH:MM` label used in messages */
  readonly label: string;
  /** Seconds east of UTC in effect at the instant */
  offsetAt(utcMillis: number): number;
  /** Whether `offsetSeconds` counts as daylight time at the instant */
  isDaylightTime(utcMillis: number, offsetSeconds: number): boolean;
}

export type SeasonalRule = 'none' | 'us_last_sunday_april_october';

const HOUR_SECONDS = 3600;

/**
 * tzdb version reported in provenance
 */
export function tzdbVersion(): string {
  return process.versions.tz ?? 'system-tzdb';
}

export function isKnownZone(zoneId: string): boolean {
  return IANAZone.isValidZone(zoneId);
}

export class ZoneTimeline implements OffsetTimeline {
  private readonly zone: IANAZone;
  private readonly standardOffsets = new Map<number, number>();

  constructor(readonly label: string) {
    this.zone = IANAZone.create(label);
    if (!this.zone.isValid) {
      throw new InputInvalidError(`unknown IANA zone "${label}"`, 'zone');
    }
  }

  offsetAt(utcMillis: number): number {
    return Math.round(this.zone.offset(utcMillis) * 60);
  }

  /**
   * Daylight time when the offset exceeds the smaller of the offsets on
   * 1 January and 1 July of the same year. Matches luxon's `isInDST`.
   */
  isDaylightTime(utcMillis: number, offsetSeconds: number): boolean {
    return offsetSeconds > this.standardOffset(new Date(utcMillis).getUTCFullYear());
  }

  private standardOffset(year: number): number {
    const memo = this.standardOffsets.get(year);
    if (memo !== undefined) {
      return memo;
    }

    let smallest = Infinity;
    for (const month of [1, 7]) {
      const sample = toWallClockMillis({
        year,
        month,
        day: 1,
        hour: 12,
        minute: 0,
        second: 0,
        millisecond: 0,
      });
      smallest = Math.min(smallest, this.offsetAt(sample));
    }

    this.standardOffsets.set(year, smallest);
    return smallest;
  }
}

export class FixedOffsetTimeline implements OffsetTimeline {
  readonly label: string;

  constructor(
    private readonly offsetSeconds: number,
    private readonly dstActive: boolean,
    label?: string
  ) {
    this.label = label ?? `UTC${formatOffset(offsetSeconds)}`;
  }

  offsetAt(): number {
    return this.offsetSeconds;
  }

  isDaylightTime(): boolean {
    return this.dstActive;
  }
}

/**
 * Last Sunday of a month, as a day-of-month
 */
export function lastSundayOf(year: number, month: number): number {
  const nextMonthStart = toWallClockMillis({
    year,
    month: month + 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  });
  const lastDay = new Date(nextMonthStart - 1);
  return lastDay.getUTCDate() - lastDay.getUTCDay();
}

/**
 * Standard offset plus one hour from 02:00 on the last Sunday of April to
 * 02:00 on the last Sunday of October, local time.
 */
export class SeasonalRuleTimeline implements OffsetTimeline {
  readonly label: string;

  constructor(
    private readonly standardOffsetSeconds: number,
    label?: string
  ) {
    this.label = label ?? `UTC${formatOffset(standardOffsetSeconds)}`;
  }

  private window(year: number): { start: number; end: number } {
    const at0200 = (month: number): number =>
      toWallClockMillis({
        year,
        month,
        day: lastSundayOf(year, month),
        hour: 2,
        minute: 0,
        second: 0,
        millisecond: 0,
      });
    const standard = this.standardOffsetSeconds * 1000;
    return {
      start: at0200(4) - standard,
      end: at0200(10) - standard - HOUR_SECONDS * 1000,
    };
  }

  offsetAt(utcMillis: number): number {
    const { start, end } = this.window(new Date(utcMillis).getUTCFullYear());
    return utcMillis >= start && utcMillis < end
      ? this.standardOffsetSeconds + HOUR_SECONDS
      : this.standardOffsetSeconds;
  }

  isDaylightTime(_utcMillis: number, offsetSeconds: number): boolean {
    return offsetSeconds > this.standardOffsetSeconds;
  }
}

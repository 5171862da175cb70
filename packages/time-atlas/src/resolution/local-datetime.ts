/**
 * Local civil datetime parsing and wall-clock arithmetic.
 *
 * Wall-clock values are handled as "UTC-shaped" epoch milliseconds: the
 * fields are read as if they were UTC. Subtracting a zone offset from that
 * number yields the real instant.
 */

import type { LocalDateTime } from '../core/types.js';
import { InputInvalidError } from '../core/errors.js';

const LOCAL_DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;

const OFFSET_SUFFIX_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse `YYYY-MM-DDTHH:MM[:SS[.fff]]` (space allowed instead of `T`).
 *
 * @throws InputInvalidError for offsets, out-of-range fields and impossible dates
 */
export function parseLocalDateTime(text: string, field = 'local_datetime'): LocalDateTime {
  const trimmed = text.trim();

  if (OFFSET_SUFFIX_PATTERN.test(trimmed)) {
    throw new InputInvalidError(
      `local datetime must not carry a UTC offset or Z suffix: "${text}"`,
      field
    );
  }

  const match = LOCAL_DATETIME_PATTERN.exec(trimmed);
  if (!match) {
    throw new InputInvalidError(
      `local datetime must match YYYY-MM-DDTHH:MM[:SS[.fff]]: "${text}"`,
      field
    );
  }

  const [, year, month, day, hour, minute, second, fraction] = match;
  const local: LocalDateTime = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second === undefined ? 0 : Number(second),
    millisecond: fraction === undefined ? 0 : Number(fraction.padEnd(3, '0')),
  };

  const problem = describeInvalidFields(local);
  if (problem) {
    throw new InputInvalidError(`${problem}: "${text}"`, field);
  }

  return local;
}

function describeInvalidFields(local: LocalDateTime): string | null {
  if (local.year < 1 || local.year > 9999) return 'year must be within 1-9999';
  if (local.month < 1 || local.month > 12) return 'month must be within 1-12';
  if (local.day < 1 || local.day > daysInMonth(local.year, local.month)) {
    return `day ${local.day} does not exist in ${local.year}-${pad(local.month, 2)}`;
  }
  if (local.hour > 23) return 'hour must be within 0-23';
  if (local.minute > 59) return 'minute must be within 0-59';
  if (local.second > 59) return 'second must be within 0-59';
  return null;
}

export function daysInMonth(year: number, month: number): number {
  const firstOfNext = toWallClockMillis({
    year,
    month: month + 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  });
  return new Date(firstOfNext - 1).getUTCDate();
}

/**
 * Fields read as UTC, as epoch milliseconds
 */
export function toWallClockMillis(local: LocalDateTime): number {
  const date = new Date(0);
  // setUTCFullYear keeps years 1-99 literal (Date.UTC maps them to 19xx)
  date.setUTCFullYear(local.year, local.month - 1, local.day);
  date.setUTCHours(local.hour, local.minute, local.second, local.millisecond);
  return date.getTime();
}

/**
 * Inverse of `toWallClockMillis`
 */
export function fromWallClockMillis(millis: number): LocalDateTime {
  const date = new Date(millis);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
  };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DDTHH:MM:SS`, with `.fff` only when milliseconds are non-zero
 */
export function formatLocalDateTime(local: LocalDateTime): string {
  const base =
    `${pad(local.year, 4)}-${pad(local.month, 2)}-${pad(local.day, 2)}` +
    `T${pad(local.hour, 2)}:${pad(local.minute, 2)}:${pad(local.second, 2)}`;
  return local.millisecond === 0 ? base : `${base}.${pad(local.millisecond, 3)}`;
}

/**
 * ISO-8601 UTC instant with `Z`, milliseconds only when non-zero
 */
export function formatUtcInstant(millis: number): string {
  return new Date(millis).toISOString().replace('.000Z', 'Z');
}

/**
 * `±HH:MM` for an offset in seconds east of UTC
 */
export function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const absolute = Math.abs(offsetSeconds);
  const hours = Math.floor(absolute / 3600);
  const minutes = Math.floor((absolute % 3600) / 60);
  const seconds = absolute % 60;
  const base = `${sign}${pad(hours, 2)}:${pad(minutes, 2)}`;
  return seconds === 0 ? base : `${base}:${pad(seconds, 2)}`;
}

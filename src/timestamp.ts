/**
 * Timestamp handling for export dates
 *
 * Snapchat labels every date "UTC" but some exports carry Pacific wall-clock
 * time. The digits are always kept as-is (a NaiveDateTime); a TimestampPolicy
 * decides which instant they denote.
 */

import { type NaiveDateTime, ParseError, type TimezoneDescriptor } from './types.js';

const NAIVE_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
const EXPORT_DATE_RE = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\s*(?:UTC|GMT|Z|[A-Z]{3,4}))?$/;
const OFFSET_RE = /^(?:UTC|GMT)?\s*([+-])(\d{1,2})(?::?(\d{2}))?$/i;

export interface TimestampPolicy {
  readonly kind: 'utc' | 'local';
  /** Offset from UTC in minutes (negative west of Greenwich) */
  readonly offsetMinutes: number;
  /** Offset as `±HH:MM` */
  readonly offset: string;
  toInstant(value: NaiveDateTime): Date;
  formatForRemote(value: NaiveDateTime): string;
  formatExif(value: NaiveDateTime): string;
  /** Descriptor stored in the metadata bundle, absent for UTC */
  describe(): TimezoneDescriptor | undefined;
}

interface NaiveParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

function splitNaive(value: NaiveDateTime): NaiveParts {
  const match = value.match(NAIVE_RE);
  if (!match) {
    throw new ParseError(`Invalid date format: ${value}`);
  }
  const [, year, month, day, hours, minutes, seconds] = match;
  return {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hours: Number(hours),
    minutes: Number(minutes),
    seconds: Number(seconds),
  };
}

function wallClockMs(parts: NaiveParts): number {
  return Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hours,
    parts.minutes,
    parts.seconds
  );
}

function isCalendarDate(parts: NaiveParts): boolean {
  const check = new Date(wallClockMs(parts));
  return (
    check.getUTCFullYear() === parts.year &&
    check.getUTCMonth() === parts.month - 1 &&
    check.getUTCDate() === parts.day &&
    check.getUTCHours() === parts.hours &&
    check.getUTCMinutes() === parts.minutes &&
    check.getUTCSeconds() === parts.seconds
  );
}

/**
 * Whether a value is a real `YYYY-MM-DDTHH:MM:SS` wall-clock time
 */
export function isNaiveDateTime(value: string): boolean {
  return NAIVE_RE.test(value) && isCalendarDate(splitNaive(value));
}

/**
 * Parse an export date such as "2024-07-01 23:13:15 UTC" into its literal
 * wall-clock digits. The zone label is not used.
 */
export function parseExportDate(dateStr: string): NaiveDateTime {
  const match = dateStr.trim().match(EXPORT_DATE_RE);
  if (!match) {
    throw new ParseError(`Invalid date format: ${dateStr}`);
  }

  const naive = `${match[1]}T${match[2]}`;

  // Reject rollovers such as 2024-02-30 or 25:00:00
  if (!isNaiveDateTime(naive)) {
    throw new ParseError(`Invalid date format: ${dateStr}`);
  }

  return naive;
}

/**
 * Filename-safe key, `YYYY-MM-DD_HH-MM-SS`
 */
export function toDateKey(value: NaiveDateTime): string {
  splitNaive(value);
  return value.replace('T', '_').replace(/:/g, '-');
}

/**
 * Parse `-08:00`, `-8`, `UTC-8` or `+05:30` into minutes
 */
export function parseUtcOffset(value: string): number {
  const match = value.trim().match(OFFSET_RE);
  if (!match) {
    throw new Error(`Invalid UTC offset: ${value}`);
  }
  const sign = match[1] === '-' ? -1 : 1;
  const hours = Number(match[2]);
  const minutes = match[3] ? Number(match[3]) : 0;
  if (hours > 14 || minutes > 59) {
    throw new Error(`Invalid UTC offset: ${value}`);
  }
  return sign * (hours * 60 + minutes);
}

export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

function formatExif(value: NaiveDateTime): string {
  const p = splitNaive(value);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${p.year}:${pad(p.month)}:${pad(p.day)} ${pad(p.hours)}:${pad(p.minutes)}:${pad(p.seconds)}`;
}

/**
 * The export digits are a UTC instant
 */
export const parseAsUtc: TimestampPolicy = {
  kind: 'utc',
  offsetMinutes: 0,
  offset: '+00:00',
  toInstant: (value) => new Date(wallClockMs(splitNaive(value))),
  formatForRemote: (value) => {
    splitNaive(value);
    return `${value}.000Z`;
  },
  formatExif,
  describe: () => undefined,
};

/**
 * The export digits are local wall-clock time at a fixed offset
 */
export function parseAsLocal(offset: string | number): TimestampPolicy {
  const offsetMinutes = typeof offset === 'number' ? offset : parseUtcOffset(offset);
  const formatted = formatUtcOffset(offsetMinutes);

  const hours = Math.trunc(offsetMinutes / 60);
  const rest = Math.abs(offsetMinutes % 60);
  const shortOffset = `UTC${offsetMinutes < 0 ? '-' : '+'}${Math.abs(hours)}${rest ? `:${String(rest).padStart(2, '0')}` : ''}`;

  return {
    kind: 'local',
    offsetMinutes,
    offset: formatted,
    toInstant: (value) => new Date(wallClockMs(splitNaive(value)) - offsetMinutes * 60_000),
    formatForRemote: (value) => {
      splitNaive(value);
      return `${value}.000${formatted}`;
    },
    formatExif,
    describe: () => ({
      timezone: offsetMinutes === -480 ? 'PST' : shortOffset,
      offset: shortOffset,
    }),
  };
}

/**
 * Parse a timestamp reported by the remote library. A value without a zone
 * designator is read as UTC.
 */
export function parseRemoteTimestamp(value: string): Date | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const date = new Date(hasZone ? trimmed : `${trimmed}Z`);
  return isNaN(date.getTime()) ? null : date;
}

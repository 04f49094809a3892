/**
 * Time and calendar date shapes
 *
 * `Time` is an instant stored inline as `{ seconds: i64, nanos: i32 }` after
 * the Unix epoch, the same layout as the protocol timestamp message, so the
 * two convert by copying bytes. All zero bytes is the epoch itself.
 *
 * `CalendarDate` is a day without a zone, stored as `i32` days since
 * 1970-01-01.
 */

import type { Heap } from '../heap.ts';
import type { Shape } from '../shape.ts';

const MS_PER_DAY = 86_400_000;
const SECONDS_PER_DAY = 86_400;

export const INSTANT_SIZE = 16;

/**
 * An instant with nanosecond precision, as stored in a heap.
 */
export interface Instant {
  seconds: bigint;
  nanos: number;
}

export function readInstant(heap: Heap, address: number): Instant {
  return { seconds: heap.readI64(address), nanos: heap.readI32(address + 8) };
}

export function writeInstant(heap: Heap, address: number, instant: Instant): void {
  heap.writeI64(address, instant.seconds);
  heap.writeI32(address + 8, instant.nanos);
}

/**
 * A `Date` read from a heap, carrying the nanoseconds of its second that a
 * millisecond clock drops. Writing or formatting one keeps every digit.
 */
export class PreciseDate extends Date {
  readonly nanos: number;

  constructor(instant: Instant) {
    super(Number(instant.seconds) * 1000 + Math.floor(instant.nanos / 1_000_000));
    this.nanos = instant.nanos;
  }
}

/** Nanoseconds within the second; a `PreciseDate` moved by `setTime` falls back to its milliseconds */
function subsecondNanos(date: Date): number {
  const ms = date.getTime();
  const millis = ms - Math.floor(ms / 1000) * 1000;
  if (date instanceof PreciseDate && Math.floor(date.nanos / 1_000_000) === millis) {
    return date.nanos;
  }
  return millis * 1_000_000;
}

export function instantFromDate(date: Date): Instant {
  return { seconds: BigInt(Math.floor(date.getTime() / 1000)), nanos: subsecondNanos(date) };
}

export function instantToDate(instant: Instant): PreciseDate {
  return new PreciseDate(instant);
}

/**
 * RFC 3339 with the fractional seconds trimmed of trailing zeros.
 */
export function formatInstant(date: Date): string {
  const iso = date.toISOString();
  const dot = iso.lastIndexOf('.');
  const fraction = String(subsecondNanos(date)).padStart(9, '0').replace(/0+$/, '');
  return `${iso.slice(0, dot)}${fraction ? `.${fraction}` : ''}Z`;
}

export const Time: Shape<Date> = {
  name: 'Time',
  size: INSTANT_SIZE,
  align: 8,
  def: { kind: 'opaque', domain: 'time' },
  traits: {
    marshal: (value) => JSON.stringify(formatInstant(value)),
  },
  read: (heap, address) => instantToDate(readInstant(heap, address)),
  write: (heap, address, value) => writeInstant(heap, address, instantFromDate(value)),
  accepts: (value): value is Date => value instanceof Date,
};

// ============================================================================
// Calendar dates
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseDays(value: string): number | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // Rejects overflowing days such as 2024-02-30
  if (new Date(ms).toISOString().slice(0, 10) !== value) return null;
  return ms / MS_PER_DAY;
}

export function formatDays(days: number): string {
  return new Date(days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Days since the epoch of the UTC day containing `seconds` */
export function daysFromSeconds(seconds: bigint): number {
  return Math.floor(Number(seconds) / SECONDS_PER_DAY);
}

/** Seconds at UTC midnight of the given day */
export function midnightSeconds(days: number): bigint {
  return BigInt(days) * BigInt(SECONDS_PER_DAY);
}

export const CalendarDate: Shape<string> = {
  name: 'Date',
  size: 4,
  align: 4,
  def: { kind: 'opaque', domain: 'date' },
  traits: {
    marshal: (value) => JSON.stringify(value),
  },
  read: (heap, address) => formatDays(heap.readI32(address)),
  write(heap, address, value) {
    const days = parseDays(value);
    if (days === null) {
      throw new RangeError(`Invalid date: ${value}`);
    }
    heap.writeI32(address, days);
  },
  accepts: (value): value is string => typeof value === 'string' && parseDays(value) !== null,
};

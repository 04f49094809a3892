/**
 * Built-in conversions between domain leaves and their wire forms.
 *
 * Pointer sources that are nil, and timestamps outside the valid range, leave
 * the destination untouched.
 */

import type { Heap } from './heap.ts';
import { pointer, string } from './intrinsics.ts';
import { DecimalValue, formatDecimal, parseDecimal } from './lib/decimal.ts';
import { LanguageTag, parseLanguageTag } from './lib/language-tag.ts';
import { CalendarDate, INSTANT_SIZE, Time, daysFromSeconds, midnightSeconds } from './lib/time.ts';
import { isValidTimestamp, Timestamp, TimestampPtr } from './lib/timestamp.ts';
import { encodeUlid, parseUlid, Ulid } from './lib/ulid.ts';
import { bytesToUuid, parseUuid, Uuid } from './lib/uuid.ts';
import type { Shape } from './shape.ts';

export type Converter = (heap: Heap, dst: number, src: number) => void;

export interface DomainConversion {
  readonly name: string;
  readonly dst: Shape;
  readonly src: Shape;
  readonly run: Converter;
}

export const TimePtr: Shape<Date | null> = pointer(Time);

/**
 * Box a copy of the instant at `src` as a new timestamp message.
 */
export function boxTimestamp(heap: Heap, dst: number, src: number): void {
  const address = heap.alloc(Timestamp.size, Timestamp.align);
  heap.copy(address, src, INSTANT_SIZE);
  heap.writeU32(dst, address);
}

const conversions: DomainConversion[] = [
  {
    name: 'timeToTimestamp',
    dst: TimestampPtr,
    src: Time,
    run: boxTimestamp,
  },
  {
    name: 'timePtrToTimestamp',
    dst: TimestampPtr,
    src: TimePtr,
    run(heap, dst, src) {
      const time = heap.readU32(src);
      if (time !== 0) boxTimestamp(heap, dst, time);
    },
  },
  {
    name: 'timestampToTime',
    dst: Time,
    src: TimestampPtr,
    run(heap, dst, src) {
      const ts = heap.readU32(src);
      if (isValidTimestamp(heap, ts)) heap.copy(dst, ts, INSTANT_SIZE);
    },
  },
  {
    name: 'timestampToTimePtr',
    dst: TimePtr,
    src: TimestampPtr,
    run(heap, dst, src) {
      const ts = heap.readU32(src);
      if (!isValidTimestamp(heap, ts)) return;
      const address = heap.alloc(Time.size, Time.align);
      heap.copy(address, ts, INSTANT_SIZE);
      heap.writeU32(dst, address);
    },
  },
  {
    name: 'timestampToDate',
    dst: CalendarDate,
    src: TimestampPtr,
    run(heap, dst, src) {
      const ts = heap.readU32(src);
      if (isValidTimestamp(heap, ts)) heap.writeI32(dst, daysFromSeconds(heap.readI64(ts)));
    },
  },
  {
    name: 'dateToTimestamp',
    dst: TimestampPtr,
    src: CalendarDate,
    run(heap, dst, src) {
      const address = heap.alloc(Timestamp.size, Timestamp.align);
      heap.writeI64(address, midnightSeconds(heap.readI32(src)));
      heap.writeU32(dst, address);
    },
  },
  {
    name: 'uuidToString',
    dst: string,
    src: Uuid,
    run: (heap, dst, src) => heap.writeText(dst, bytesToUuid(heap.readBytes(src, 16))),
  },
  {
    name: 'stringToUuid',
    dst: Uuid,
    src: string,
    run: (heap, dst, src) => heap.bytes.set(parseUuid(heap.readText(src)), dst),
  },
  {
    name: 'ulidToString',
    dst: string,
    src: Ulid,
    run: (heap, dst, src) => heap.writeText(dst, encodeUlid(heap.readBytes(src, 16))),
  },
  {
    name: 'stringToUlid',
    dst: Ulid,
    src: string,
    run: (heap, dst, src) => heap.bytes.set(parseUlid(heap.readText(src)), dst),
  },
  {
    name: 'decimalToString',
    dst: string,
    src: DecimalValue,
    run: (heap, dst, src) => heap.writeText(dst, formatDecimal(DecimalValue.read(heap, src))),
  },
  {
    name: 'stringToDecimal',
    dst: DecimalValue,
    src: string,
    run(heap, dst, src) {
      const text = heap.readText(src);
      // The empty string keeps the destination's current (default) value
      if (text !== '') heap.writeU32(dst, heap.retain(parseDecimal(text)));
    },
  },
  {
    name: 'languageTagToString',
    dst: string,
    src: LanguageTag,
    run: (heap, dst, src) => heap.writeText(dst, LanguageTag.read(heap, src)),
  },
  {
    name: 'stringToLanguageTag',
    dst: LanguageTag,
    src: string,
    run: (heap, dst, src) => heap.writeU32(dst, heap.retain(parseLanguageTag(heap.readText(src)))),
  },
];

const table = new Map<Shape, Map<Shape, DomainConversion>>();
for (const conversion of conversions) {
  let bySource = table.get(conversion.dst);
  if (!bySource) {
    bySource = new Map();
    table.set(conversion.dst, bySource);
  }
  bySource.set(conversion.src, conversion);
}

export function findDomainConversion(dst: Shape, src: Shape): DomainConversion | undefined {
  return table.get(dst)?.get(src);
}

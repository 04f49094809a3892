/**
 * google.protobuf.Timestamp
 *
 * The message shape is derived from the descriptor protobufjs ships, which
 * gives `{ Seconds: i64, Nanos: i32 }` at offsets 0 and 8: the same layout as
 * `Time`.
 */

import type { Heap } from '../heap.ts';
import { pointer } from '../intrinsics.ts';
import type { Shape } from '../shape.ts';
import { messageShape, wellKnownType } from './protobuf.ts';

/** 0001-01-01T00:00:00Z */
const MIN_VALID_SECONDS = -62135596800n;
/** 9999-12-31T23:59:59Z */
const MAX_VALID_SECONDS = 253402300799n;

export const TimestampType = wellKnownType('google/protobuf/timestamp.proto', 'google.protobuf.Timestamp');

export const Timestamp = messageShape(TimestampType);

export const TimestampPtr: Shape<Record<string, unknown> | null> = pointer(Timestamp);

/**
 * Whether the timestamp at `address` is non-nil and within the range that
 * RFC 3339 can represent.
 */
export function isValidTimestamp(heap: Heap, address: number): boolean {
  if (address === 0) return false;
  const seconds = heap.readI64(address);
  const nanos = heap.readI32(address + 8);
  return (
    seconds >= MIN_VALID_SECONDS &&
    seconds <= MAX_VALID_SECONDS &&
    nanos >= 0 &&
    nanos < 1_000_000_000
  );
}


/**
 * ULID shape
 *
 * Stored inline as its 16 bytes (48-bit big-endian timestamp followed by 80
 * bits of randomness), read back as the 26-character Crockford base32 form.
 * The 16 bytes are those of the ULID's UUID form.
 */

import { isValid, ulidToUUID, uuidToULID } from 'ulidx';

import { ParseError } from '../errors.ts';
import type { Shape } from '../shape.ts';
import { bytesToUuid, parseUuid } from './uuid.ts';

export function encodeUlid(bytes: Uint8Array): string {
  return uuidToULID(bytesToUuid(bytes));
}

/**
 * Parse a ULID string (case-insensitive) into its 16 bytes.
 * The leading character must not exceed `7`, or the value overflows 128 bits.
 */
export function parseUlid(text: string): Uint8Array {
  if (!isValid(text) || text[0] > '7') {
    throw new ParseError('ULID', text);
  }
  let uuid: string;
  try {
    uuid = ulidToUUID(text.toUpperCase());
  } catch (err) {
    throw new ParseError('ULID', text, err);
  }
  return parseUuid(uuid);
}

export const Ulid: Shape<string> = {
  name: 'ULID',
  size: 16,
  align: 1,
  def: { kind: 'opaque', domain: 'ulid' },
  traits: {
    marshal: (value) => JSON.stringify(value),
  },
  read: (heap, address) => encodeUlid(heap.readBytes(address, 16)),
  write: (heap, address, value) => heap.bytes.set(parseUlid(value), address),
  accepts: (value): value is string => typeof value === 'string' && isValid(value) && value[0] <= '7',
};

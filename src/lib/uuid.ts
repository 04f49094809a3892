/**
 * UUID shape
 *
 * Stored inline as its 16 bytes. Read back as the canonical lowercase
 * `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx` form.
 */

import { ParseError } from '../errors.ts';
import type { Shape } from '../shape.ts';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const HEX_PATTERN = /^[0-9a-f]{32}$/i;

/**
 * Convert bytes to a formatted UUID string.
 * Format: xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx
 */
export function bytesToUuid(bytes: Uint8Array): string {
  const hex = Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

/** Hex digits of a UUID in any accepted form, or null */
function uuidHex(value: string): string | null {
  let text = value;
  if (text.length === 45 && text.slice(0, 9).toLowerCase() === 'urn:uuid:') {
    text = text.slice(9);
  } else if (text.length === 38 && text.startsWith('{') && text.endsWith('}')) {
    text = text.slice(1, -1);
  }
  if (UUID_PATTERN.test(text)) return text.replace(/-/g, '');
  return HEX_PATTERN.test(text) ? text : null;
}

/**
 * Parse a UUID string into its 16 bytes. Any version and variant is
 * accepted, in canonical form, as 32 hex digits, braced or as a `urn:uuid:`.
 */
export function parseUuid(value: string): Uint8Array {
  const hex = uuidHex(value);
  if (hex === null) {
    throw new ParseError('UUID', value);
  }
  const bytes = new Uint8Array(16);
  for (let i = 0; i < 16; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * @example
 * ```typescript
 * const User = m.struct('User', { ID: Uuid, Name: m.string });
 * ```
 */
export const Uuid: Shape<string> = {
  name: 'UUID',
  size: 16,
  align: 1,
  def: { kind: 'opaque', domain: 'uuid' },
  traits: {
    marshal: (value) => JSON.stringify(value),
  },
  read: (heap, address) => bytesToUuid(heap.readBytes(address, 16)),
  write: (heap, address, value) => heap.bytes.set(parseUuid(value), address),
  accepts: (value): value is string => typeof value === 'string' && uuidHex(value) !== null,
};

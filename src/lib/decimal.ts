/**
 * Arbitrary-precision decimal shape
 *
 * The value is a decimal.js `Decimal` held in the heap's handle table; the
 * field itself is the 4-byte handle. A nil handle reads as zero.
 */

import Decimal from 'decimal.js';

import { ParseError } from '../errors.ts';
import type { Shape } from '../shape.ts';

const ZERO = new Decimal(0);

/**
 * Plain notation, never exponential: `1e21` formats as
 * `1000000000000000000000`.
 */
export function formatDecimal(value: Decimal): string {
  return value.toFixed();
}

export function parseDecimal(text: string): Decimal {
  let value: Decimal;
  try {
    value = new Decimal(text);
  } catch (err) {
    throw new ParseError('decimal', text, err);
  }
  if (!value.isFinite()) {
    throw new ParseError('decimal', text);
  }
  return value;
}

export const DecimalValue: Shape<Decimal> = {
  name: 'Decimal',
  size: 4,
  align: 4,
  def: { kind: 'opaque', domain: 'decimal' },
  traits: {
    marshal: (value) => JSON.stringify(formatDecimal(value)),
  },
  read(heap, address) {
    const value = heap.resolve(heap.readU32(address));
    return value instanceof Decimal ? value : ZERO;
  },
  write: (heap, address, value) => heap.writeU32(address, heap.retain(value)),
  accepts: (value): value is Decimal => Decimal.isDecimal(value),
};

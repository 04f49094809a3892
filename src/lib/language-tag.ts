/**
 * BCP 47 language tag shape
 *
 * Backed by `Intl.Locale`, held in the heap's handle table. Tags read back in
 * canonical form; a nil handle reads as `und`.
 */

import { ParseError } from '../errors.ts';
import type { Shape } from '../shape.ts';

const UNDETERMINED = 'und';

export function parseLanguageTag(text: string): Intl.Locale {
  try {
    return new Intl.Locale(text);
  } catch (err) {
    throw new ParseError('language tag', text, err);
  }
}

export function formatLanguageTag(value: unknown): string {
  return value instanceof Intl.Locale ? value.toString() : UNDETERMINED;
}

export const LanguageTag: Shape<string> = {
  name: 'LanguageTag',
  size: 4,
  align: 4,
  def: { kind: 'opaque', domain: 'languageTag' },
  traits: {
    marshal: (value) => JSON.stringify(value),
  },
  read: (heap, address) => formatLanguageTag(heap.resolve(heap.readU32(address))),
  write: (heap, address, value) => heap.writeU32(address, heap.retain(parseLanguageTag(value))),
  accepts: (value): value is string => typeof value === 'string',
};

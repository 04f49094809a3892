/**
 * Shape-driven JSON encoder
 *
 * Encodes a value by walking its shape over the heap bytes, so a value seen
 * through a derived serialization shape encodes with that shape's keys.
 */

import Decimal from 'decimal.js';

import { EncodeError } from './errors.ts';
import type { Heap, Ref } from './heap.ts';
import { formatDecimal } from './lib/decimal.ts';
import { formatInstant } from './lib/time.ts';
import {
  alignOffset,
  isRecord,
  unlazy,
  wrappedShape,
  wrappedValueOffset,
  type Field,
  type Shape,
} from './shape.ts';

export interface MarshalOptions {
  /** Tag namespace naming struct keys. Default is `json`. */
  tag?: string;
}

interface FieldKey {
  key: string;
  omitEmpty: boolean;
}

/**
 * Key for a struct field: the name part of its tag, or the field name.
 * `null` when the field is skipped.
 */
export function fieldKey(field: Field, tag: string): FieldKey | null {
  if (!field.exported) return null;
  const value = field.tags[tag];
  if (value === undefined) return { key: field.name, omitEmpty: false };
  if (value === '-') return null;
  const [name, ...flags] = value.split(',');
  return { key: name || field.name, omitEmpty: flags.includes('omitempty') };
}

function encodeNumber(value: number, context: string): string {
  if (!Number.isFinite(value)) {
    throw new EncodeError(`unsupported value: ${value}`, { at: context });
  }
  return String(value);
}

/** Shortest decimal that reads back as the same single-precision float */
function encodeFloat32(value: number, context: string): string {
  if (!Number.isFinite(value)) {
    return encodeNumber(value, context);
  }
  for (let precision = 1; precision < 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(value);
}

function encodeBytes(bytes: Uint8Array): string {
  return JSON.stringify(Buffer.from(bytes).toString('base64'));
}

function isEmpty(heap: Heap, shape: Shape, address: number): boolean {
  switch (shape.def.kind) {
    case 'scalar':
      switch (shape.def.type) {
        case 'f32':
          return heap.readF32(address) === 0;
        case 'f64':
          return heap.readF64(address) === 0;
        default:
          return heap.isZeroed(address, shape.size);
      }
    case 'string':
    case 'slice':
      return heap.readU32(address) === 0 || heap.readU32(address + 4) === 0;
    case 'pointer':
      return heap.readU32(address) === 0;
    case 'map': {
      const map = heap.resolve(heap.readU32(address));
      return !isRecord(map) || Object.keys(map).length === 0;
    }
    default:
      return false;
  }
}

/**
 * Encode a host value held in a dynamic map.
 */
export function encodeAny(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return encodeNumber(value, 'map value');
    case 'bigint':
      return value.toString();
    case 'string':
      return JSON.stringify(value);
  }
  if (value instanceof Date) return JSON.stringify(formatInstant(value));
  if (value instanceof Decimal) return JSON.stringify(formatDecimal(value));
  if (value instanceof Intl.Locale) return JSON.stringify(value.toString());
  if (value instanceof Uint8Array) return encodeBytes(value);
  if (Array.isArray(value)) return `[${value.map(encodeAny).join(',')}]`;
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${encodeAny(value[k])}`).join(',')}}`;
  }
  throw new EncodeError(`unsupported type: ${typeof value}`);
}

function encode(heap: Heap, shapeRef: Shape, address: number, tag: string): string {
  const shape = unlazy(shapeRef);

  const marshal = shape.traits.marshal;
  if (marshal) {
    return marshal(shape.read(heap, address));
  }

  const inner = wrappedShape(shape);
  if (inner) {
    if (!heap.readBool(address)) return 'null';
    return encode(heap, inner, address + wrappedValueOffset(unlazy(inner)), tag);
  }

  const def = shape.def;
  switch (def.kind) {
    case 'scalar':
      switch (def.type) {
        case 'bool':
          return heap.readBool(address) ? 'true' : 'false';
        case 'i64':
          return heap.readI64(address).toString();
        case 'u64':
          return heap.readU64(address).toString();
        case 'f32':
          return encodeFloat32(heap.readF32(address), shape.name);
        default:
          return encodeNumber(Number(shape.read(heap, address)), shape.name);
      }

    case 'string':
      return JSON.stringify(heap.readText(address));

    case 'slice': {
      const data = heap.readU32(address);
      if (data === 0) return 'null';
      const length = heap.readU32(address + 4);
      const elem = unlazy(def.elem);
      if (elem.def.kind === 'scalar' && elem.def.type === 'u8') {
        return encodeBytes(heap.readBytes(data, length));
      }
      const stride = alignOffset(elem.size, elem.align);
      const items: string[] = [];
      for (let i = 0; i < length; i++) {
        items.push(encode(heap, elem, data + i * stride, tag));
      }
      return `[${items.join(',')}]`;
    }

    case 'pointer': {
      const target = heap.readU32(address);
      return target === 0 ? 'null' : encode(heap, def.elem, target, tag);
    }

    case 'map': {
      const map = heap.resolve(heap.readU32(address));
      return isRecord(map) ? encodeAny(map) : 'null';
    }

    case 'struct': {
      const members: string[] = [];
      for (const field of def.fields) {
        const key = fieldKey(field, tag);
        if (!key) continue;
        const fieldAddress = address + field.offset;
        if (key.omitEmpty && isEmpty(heap, unlazy(field.shape), fieldAddress)) continue;
        members.push(`${JSON.stringify(key.key)}:${encode(heap, field.shape, fieldAddress, tag)}`);
      }
      return `{${members.join(',')}}`;
    }

    case 'opaque':
    case 'lazy':
      return encodeAny(shape.read(heap, address));
  }
}

/**
 * Encode the referenced value as JSON text.
 *
 * @example
 * ```typescript
 * marshal(heap.store(Car, car), { tag: 'jsonv2' });
 * ```
 */
export function marshal(ref: Ref, options: MarshalOptions = {}): string {
  return encode(ref.heap, ref.shape, ref.address, options.tag ?? 'json');
}

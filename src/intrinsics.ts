/**
 * Built-in shapes for memcast
 *
 * This module provides all structural shapes:
 * - Scalars: bool, i8, u8, i16, u16, i32, u32, i64, u64, f32, f64
 * - Text: string, named, enumeration
 * - Containers: slice, pointer, dynamicMap
 * - Records: struct, field
 * - Wrappers: optional, required
 * - Utilities: lazy, withCopyTo
 */

import type { Heap } from './heap.ts';
import {
  alignOffset,
  isRecord,
  wrappedValueOffset,
  type CopyTo,
  type Field,
  type ScalarType,
  type Shape,
  type Traits,
} from './shape.ts';

// ============================================================================
// Scalars
// ============================================================================

function createScalar<T>(
  type: ScalarType,
  size: number,
  read: (heap: Heap, address: number) => T,
  write: (heap: Heap, address: number, value: T) => void,
  accepts: (value: unknown) => value is T,
): Shape<T> {
  return {
    name: type,
    size,
    align: size,
    def: { kind: 'scalar', type },
    traits: {},
    read,
    write,
    accepts,
  };
}

function integerIn(min: number, max: number) {
  return (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

function bigintIn(bits: number, signed: boolean) {
  return (value: unknown): value is bigint =>
    typeof value === 'bigint' &&
    (signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value)) === value;
}

const isNumber = (value: unknown): value is number => typeof value === 'number';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';

export const bool: Shape<boolean> = createScalar('bool', 1, (h, a) => h.readBool(a), (h, a, v) => h.writeBool(a, v), isBoolean);
export const i8: Shape<number> = createScalar('i8', 1, (h, a) => h.readI8(a), (h, a, v) => h.writeI8(a, v), integerIn(-0x80, 0x7f));
export const u8: Shape<number> = createScalar('u8', 1, (h, a) => h.readU8(a), (h, a, v) => h.writeU8(a, v), integerIn(0, 0xff));
export const i16: Shape<number> = createScalar('i16', 2, (h, a) => h.readI16(a), (h, a, v) => h.writeI16(a, v), integerIn(-0x8000, 0x7fff));
export const u16: Shape<number> = createScalar('u16', 2, (h, a) => h.readU16(a), (h, a, v) => h.writeU16(a, v), integerIn(0, 0xffff));
export const i32: Shape<number> = createScalar('i32', 4, (h, a) => h.readI32(a), (h, a, v) => h.writeI32(a, v), integerIn(-0x80000000, 0x7fffffff));
export const u32: Shape<number> = createScalar('u32', 4, (h, a) => h.readU32(a), (h, a, v) => h.writeU32(a, v), integerIn(0, 0xffffffff));
export const i64: Shape<bigint> = createScalar('i64', 8, (h, a) => h.readI64(a), (h, a, v) => h.writeI64(a, v), bigintIn(64, true));
export const u64: Shape<bigint> = createScalar('u64', 8, (h, a) => h.readU64(a), (h, a, v) => h.writeU64(a, v), bigintIn(64, false));
export const f32: Shape<number> = createScalar('f32', 4, (h, a) => h.readF32(a), (h, a, v) => h.writeF32(a, v), isNumber);
export const f64: Shape<number> = createScalar('f64', 8, (h, a) => h.readF64(a), (h, a, v) => h.writeF64(a, v), isNumber);

// ============================================================================
// Text
// ============================================================================

/**
 * UTF-8 string, laid out as `{ ptr: u32, len: u32 }`.
 * The empty string is all zero bytes.
 */
export const string: Shape<string> = {
  name: 'string',
  size: 8,
  align: 4,
  def: { kind: 'string' },
  traits: {},
  read: (heap, address) => heap.readText(address),
  write: (heap, address, value) => heap.writeText(address, value),
  accepts: isString,
};

/**
 * A distinct named type with the representation of a scalar or string base,
 * e.g. `named('Email', string)`.
 *
 * Named types are not identical to their base, but they share its
 * representation, so the engine copies between them byte for byte.
 */
export function named<T>(name: string, base: Shape<T>): Shape<T> {
  if (base.def.kind !== 'scalar' && base.def.kind !== 'string') {
    throw new TypeError(`named types need a scalar or string base, got ${base.name}`);
  }
  return { ...base, name, traits: {} };
}

/**
 * Closed enumeration: a string type restricted to `members`.
 *
 * Writing does not validate. Membership is checked when a plain string is
 * converted into the enumeration.
 *
 * @example
 * ```typescript
 * const Color = m.enumeration('Color', ['red', 'green', 'blue']);
 * ```
 */
export function enumeration(name: string, members: readonly string[]): Shape<string> {
  const closedEnum: ReadonlySet<string> = new Set(members);
  return {
    ...string,
    name,
    traits: { closedEnum },
    accepts: (value): value is string => typeof value === 'string' && closedEnum.has(value),
  };
}

// ============================================================================
// Records
// ============================================================================

/**
 * A struct field with tags or visibility.
 */
export interface FieldSpec<T = unknown> {
  shape: Shape<T>;
  tags?: Record<string, string>;
  /** Defaults to true */
  exported?: boolean;
}

export type FieldInput<T = unknown> = Shape<T> | FieldSpec<T>;

type FieldValue<I> = I extends FieldSpec<infer T> ? T : I extends Shape<infer T> ? T : never;

export type StructValue<F> = { [K in keyof F]: FieldValue<F[K]> };

export function field<T>(
  shape: Shape<T>,
  tags: Record<string, string> = {},
  options: { exported?: boolean } = {},
): FieldSpec<T> {
  return { shape, tags, exported: options.exported };
}

function isFieldSpec(input: FieldInput): input is FieldSpec {
  return 'shape' in input;
}

/**
 * Struct - C-style record with named fields.
 * Each call creates a new, distinct shape.
 *
 * @example
 * ```typescript
 * const Engine = m.struct('Engine', {
 *   HP: m.field(m.i32, { json: 'hp' }),
 *   Fuel: m.string,
 * });
 * ```
 */
export function struct<F extends Record<string, FieldInput>>(
  name: string,
  fields: F,
  traits: Traits<StructValue<F>> = {},
): Shape<StructValue<F>> {
  // Calculate C-style layout
  let currentOffset = 0;
  let maxAlign = 1;
  const layout: Field[] = [];

  for (const fieldName of Object.keys(fields)) {
    const input = fields[fieldName];
    const entry: FieldSpec = isFieldSpec(input) ? input : { shape: input };
    currentOffset = alignOffset(currentOffset, entry.shape.align);
    layout.push({
      name: fieldName,
      shape: entry.shape,
      offset: currentOffset,
      tags: { ...entry.tags },
      exported: entry.exported ?? true,
    });
    currentOffset += entry.shape.size;
    maxAlign = Math.max(maxAlign, entry.shape.align);
  }

  return structWithLayout(name, layout, alignOffset(currentOffset, maxAlign), maxAlign, traits);
}

/**
 * Struct from precomputed field offsets.
 */
export function structWithLayout<T extends Record<string, unknown>>(
  name: string,
  fields: readonly Field[],
  size: number,
  align: number,
  traits: Traits<T> = {},
): Shape<T> {
  return {
    name,
    size,
    align,
    def: { kind: 'struct', fields },
    traits,

    read(heap, address) {
      const result: Record<string, unknown> = {};
      for (const f of fields) {
        result[f.name] = f.shape.read(heap, address + f.offset);
      }
      return result as T;
    },

    write(heap, address, value) {
      for (const f of fields) {
        f.shape.write(heap, address + f.offset, value[f.name]);
      }
    },

    accepts(value): value is T {
      return isRecord(value) && fields.every((f) => f.shape.accepts(value[f.name]));
    },
  };
}

// ============================================================================
// Containers
// ============================================================================

const slices = new WeakMap<Shape, Shape>();
const pointers = new WeakMap<Shape, Shape>();

/**
 * Slice - variable-length sequence, laid out as `{ ptr: u32, len: u32 }`.
 * A nil slice has ptr 0; an empty slice has a non-zero ptr and len 0.
 *
 * Slices are canonical: `slice(x) === slice(x)`.
 */
export function slice<T>(elem: Shape<T>): Shape<T[] | null> {
  const existing = slices.get(elem);
  if (existing) return existing as Shape<T[] | null>;

  // Computed lazily to support recursive types via lazy()
  let elemStride: number | null = null;
  const getStride = () => {
    if (elemStride === null) {
      elemStride = alignOffset(elem.size, elem.align);
    }
    return elemStride;
  };

  const shape: Shape<T[] | null> = {
    get name() { return `[]${elem.name}`; },
    size: 8, // ptr (4) + len (4)
    align: 4,
    def: { kind: 'slice', elem },
    traits: {},

    read(heap, address) {
      const dataAddress = heap.readU32(address);
      if (dataAddress === 0) return null;
      const length = heap.readU32(address + 4);
      const stride = getStride();
      const result: T[] = new Array(length);
      for (let i = 0; i < length; i++) {
        result[i] = elem.read(heap, dataAddress + i * stride);
      }
      return result;
    },

    write(heap, address, value) {
      if (value === null) {
        heap.writeU32(address, 0);
        heap.writeU32(address + 4, 0);
        return;
      }
      const stride = getStride();
      const dataAddress = heap.alloc(stride * value.length, elem.align);
      for (let i = 0; i < value.length; i++) {
        elem.write(heap, dataAddress + i * stride, value[i]);
      }
      heap.writeU32(address, dataAddress);
      heap.writeU32(address + 4, value.length);
    },

    accepts(value): value is T[] | null {
      return value === null || (Array.isArray(value) && value.every((item) => elem.accepts(item)));
    },
  };

  slices.set(elem, shape);
  return shape;
}

/**
 * Pointer - `u32` address of a separately allocated value; 0 is nil.
 *
 * Pointers are canonical: `pointer(x) === pointer(x)`.
 */
export function pointer<T>(elem: Shape<T>): Shape<T | null> {
  const existing = pointers.get(elem);
  if (existing) return existing as Shape<T | null>;

  const shape: Shape<T | null> = {
    get name() { return `*${elem.name}`; },
    size: 4,
    align: 4,
    def: { kind: 'pointer', elem },
    traits: {},

    read(heap, address) {
      const target = heap.readU32(address);
      return target === 0 ? null : elem.read(heap, target);
    },

    write(heap, address, value) {
      if (value === null) {
        heap.writeU32(address, 0);
        return;
      }
      const target = heap.alloc(elem.size, elem.align);
      elem.write(heap, target, value);
      heap.writeU32(address, target);
    },

    accepts(value): value is T | null {
      return value === null || elem.accepts(value);
    },
  };

  pointers.set(elem, shape);
  return shape;
}

/**
 * The dynamic key-value map shape: a handle to a plain object.
 * Reading returns the stored object itself, so writes through it are shared.
 */
export const dynamicMap: Shape<Record<string, unknown> | null> = {
  name: 'map[string]any',
  size: 4,
  align: 4,
  def: { kind: 'map' },
  traits: {},

  read(heap, address) {
    const target = heap.resolve(heap.readU32(address));
    return isRecord(target) ? target : null;
  },

  write(heap, address, value) {
    heap.writeU32(address, value === null ? 0 : heap.retain(value));
  },

  accepts(value): value is Record<string, unknown> | null {
    return value === null || isRecord(value);
  },
};

// ============================================================================
// Wrappers
// ============================================================================

const optionals = new WeakMap<Shape, Shape>();
const requireds = new WeakMap<Shape, Shape>();

function wrapper<T>(kind: 'Optional' | 'Required', inner: Shape<T>): Shape<T | null> {
  const valueOffset = wrappedValueOffset(inner);
  const align = Math.max(1, inner.align);
  const size = alignOffset(valueOffset + inner.size, align);
  const fields: Field[] = [
    { name: 'present', shape: bool, offset: 0, tags: {}, exported: false },
    { name: 'value', shape: inner, offset: valueOffset, tags: {}, exported: false },
  ];

  return {
    name: `${kind}[${inner.name}]`,
    size,
    align,
    def: { kind: 'struct', fields },
    traits: kind === 'Optional' ? { optional: inner } : { required: inner },

    read(heap, address) {
      if (!heap.readBool(address)) return null;
      return inner.read(heap, address + valueOffset);
    },

    write(heap, address, value) {
      heap.bytes.fill(0, address, address + size);
      if (value !== null) {
        heap.writeBool(address, true);
        inner.write(heap, address + valueOffset, value);
      }
    },

    accepts(value): value is T | null {
      return value === null || inner.accepts(value);
    },
  };
}

/**
 * Optional - distinguishes "value present" from "absent" independently of
 * pointer nullability. Layout: `{ present: bool, value: T }`.
 */
export function optional<T>(inner: Shape<T>): Shape<T | null> {
  const existing = optionals.get(inner);
  if (existing) return existing as Shape<T | null>;
  const shape = wrapper('Optional', inner);
  optionals.set(inner, shape);
  return shape;
}

/**
 * Required - a wrapper that must hold a value when it is converted.
 * Same layout as optional().
 */
export function required<T>(inner: Shape<T>): Shape<T | null> {
  const existing = requireds.get(inner);
  if (existing) return existing as Shape<T | null>;
  const shape = wrapper('Required', inner);
  requireds.set(inner, shape);
  return shape;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Lazy shape for recursive types
 *
 * @example
 * ```typescript
 * const Employee = m.struct('Employee', {
 *   Name: m.string,
 *   Subordinates: m.slice(m.lazy(() => Employee)),
 * });
 * ```
 */
export function lazy<T>(getShape: () => Shape<T>): Shape<T> {
  let cached: Shape<T> | null = null;
  const get = () => {
    if (!cached) cached = getShape();
    return cached;
  };

  return {
    get name() { return get().name; },
    get size() { return get().size; },
    get align() { return get().align; },
    get traits() { return get().traits; },
    def: { kind: 'lazy', resolve: get },
    read: (heap, address) => get().read(heap, address),
    write: (heap, address, value) => get().write(heap, address, value),
    accepts: (value): value is T => get().accepts(value),
  };
}

/**
 * Attach a copy-to hook to a shape. The result is a new, distinct shape.
 */
export function withCopyTo<T>(shape: Shape<T>, hook: CopyTo, name = shape.name): Shape<T> {
  return { ...shape, name, traits: { ...shape.traits, copyTo: hook } };
}

import type { Heap } from './heap.ts';

/**
 * Scalar representations. 64-bit integers are read as `bigint`,
 * every other numeric scalar as `number`.
 */
export type ScalarType =
  | 'bool'
  | 'i8'
  | 'u8'
  | 'i16'
  | 'u16'
  | 'i32'
  | 'u32'
  | 'i64'
  | 'u64'
  | 'f32'
  | 'f64';

export type NumericType = Exclude<ScalarType, 'bool'>;

/**
 * Domain leaves whose parsing and formatting come from dedicated libraries.
 */
export type DomainKind = 'time' | 'date' | 'uuid' | 'ulid' | 'decimal' | 'languageTag';

export interface Field {
  readonly name: string;
  readonly shape: Shape;
  /** Byte offset from the start of the struct */
  readonly offset: number;
  readonly tags: Readonly<Record<string, string>>;
  /** Unexported fields are never copied and cannot be transmuted */
  readonly exported: boolean;
}

/**
 * Kind-specific part of a shape. The set of kinds is closed; everything the
 * engine does dispatches on `def.kind`.
 */
export type ShapeDef =
  | { readonly kind: 'scalar'; readonly type: ScalarType }
  | { readonly kind: 'string' }
  | { readonly kind: 'struct'; readonly fields: readonly Field[] }
  | { readonly kind: 'slice'; readonly elem: Shape }
  | { readonly kind: 'pointer'; readonly elem: Shape }
  | { readonly kind: 'map' }
  | { readonly kind: 'opaque'; readonly domain: DomainKind }
  | { readonly kind: 'lazy'; resolve(): Shape };

export type ShapeKind = ShapeDef['kind'];

/**
 * A user hook that converts values of the carrying shape into other shapes.
 */
export interface CopyTo {
  /** Checked once, when a plan for the pair is compiled */
  canCopyTo(dest: Shape): boolean;
  /** Write a value of `dest` at `dst` from the value at `src` */
  copyTo(heap: Heap, dest: Shape, dst: number, src: number): void;
}

/**
 * Capabilities a shape may carry. The compiler records which one applies to a
 * field once; nothing is re-checked per call.
 */
export interface Traits<T = unknown> {
  /** String shape restricted to a fixed set of members */
  readonly closedEnum?: ReadonlySet<string>;
  /** Present/absent wrapper around the given shape */
  readonly optional?: Shape;
  /** Wrapper that must hold a value of the given shape */
  readonly required?: Shape;
  readonly copyTo?: CopyTo;
  /** The shape encodes itself as JSON text */
  marshal?(value: T): string;
}

/**
 * Description of a type: its layout in a heap, its kind and capabilities, and
 * how to move values of it between JavaScript and the heap.
 */
export interface Shape<T = unknown> {
  readonly name: string;
  /** Size in bytes */
  readonly size: number;
  /** Alignment requirement */
  readonly align: number;
  readonly def: ShapeDef;
  readonly traits: Traits<T>;

  /** Read the value at `address` */
  read(heap: Heap, address: number): T;

  /** Write `value` at `address`, allocating dependent storage as needed */
  write(heap: Heap, address: number, value: T): void;

  /** Whether `value` can be written as this shape as is */
  accepts(value: unknown): value is T;
}

/**
 * Infer the JavaScript type of a shape.
 */
export type Infer<S> = S extends Shape<infer T> ? T : never;

/**
 * Align an offset to the given alignment
 */
export function alignOffset(offset: number, align: number): number {
  const remainder = offset % align;
  return remainder === 0 ? offset : offset + (align - remainder);
}

/**
 * Follow lazy shapes to the shape they stand for.
 */
export function unlazy(shape: Shape): Shape {
  let current = shape;
  while (current.def.kind === 'lazy') {
    current = current.def.resolve();
  }
  return current;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPointer(shape: Shape): boolean {
  return shape.def.kind === 'pointer';
}

/**
 * Offset of the value inside an optional or required wrapper.
 */
export function wrappedValueOffset(inner: Shape): number {
  return alignOffset(1, inner.align);
}

/**
 * The wrapped shape of an optional or required wrapper, if `shape` is one.
 */
export function wrappedShape(shape: Shape): Shape | undefined {
  return shape.traits.optional ?? shape.traits.required;
}

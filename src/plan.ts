/**
 * Compiled conversion plans
 *
 * A plan is what the resolver decides once per shape pair. It is a tree of
 * tagged operations over byte offsets; `execute` walks it against a heap.
 */

import type { Converter } from './domain.ts';
import { boxTimestamp } from './domain.ts';
import { ClosedEnumError, MapKeyError, RequiredValueError } from './errors.ts';
import type { Heap } from './heap.ts';
import { INSTANT_SIZE } from './lib/time.ts';
import { isValidTimestamp } from './lib/timestamp.ts';
import { isRecord, type CopyTo, type NumericType, type Shape } from './shape.ts';

/**
 * Anything that copies one struct into another, i.e. a compiled struct copier.
 */
export interface CompiledCopier {
  run(heap: Heap, dst: number, src: number): void;
}

/**
 * A struct field addressed by a map key.
 */
export interface KeyedField {
  readonly key: string;
  readonly offset: number;
  readonly shape: Shape;
}

export type Plan =
  /** Raw byte copy of identical shapes */
  | { readonly op: 'copy'; readonly size: number }
  | { readonly op: 'enum'; readonly members: ReadonlySet<string>; readonly dstName: string }
  /** Byte copy between shapes with the same underlying representation */
  | { readonly op: 'alias'; readonly size: number }
  | { readonly op: 'convert'; readonly from: NumericType; readonly to: NumericType }
  | { readonly op: 'stringToBytes' }
  | { readonly op: 'bytesToString' }
  | { readonly op: 'domain'; readonly name: string; readonly run: Converter }
  | { readonly op: 'copyTo'; readonly hook: CopyTo; readonly dest: Shape }
  | { readonly op: 'sharePointer' }
  | { readonly op: 'pointer'; readonly elem: Shape; readonly inner: Plan }
  | {
      readonly op: 'slice';
      readonly dstElem: Shape;
      readonly dstStride: number;
      readonly srcStride: number;
      readonly inner: Plan;
    }
  | { readonly op: 'optionalToPointer'; readonly valueOffset: number; readonly elem: Shape; readonly inner: Plan }
  | { readonly op: 'optionalTimeToTimestamp'; readonly valueOffset: number }
  | { readonly op: 'pointerToOptional'; readonly valueOffset: number; readonly inner: Plan }
  | { readonly op: 'timestampToOptionalTime'; readonly valueOffset: number }
  | { readonly op: 'valueToOptional'; readonly srcSize: number; readonly valueOffset: number; readonly inner: Plan }
  | { readonly op: 'required'; readonly valueOffset: number; readonly shapeName: string; readonly inner: Plan }
  | { readonly op: 'box'; readonly elem: Shape; readonly inner: Plan }
  | { readonly op: 'deref'; readonly inner: Plan }
  | { readonly op: 'struct'; readonly copier: CompiledCopier }
  | { readonly op: 'structToMap'; readonly fields: readonly KeyedField[] }
  | { readonly op: 'mapToStruct'; readonly fields: readonly KeyedField[]; readonly dstName: string }
  | { readonly op: 'custom'; readonly run: Converter };

export type PlanOp = Plan['op'];

// ============================================================================
// Numeric conversion
// ============================================================================

function readNumeric(heap: Heap, type: NumericType, address: number): number | bigint {
  switch (type) {
    case 'i8': return heap.readI8(address);
    case 'u8': return heap.readU8(address);
    case 'i16': return heap.readI16(address);
    case 'u16': return heap.readU16(address);
    case 'i32': return heap.readI32(address);
    case 'u32': return heap.readU32(address);
    case 'i64': return heap.readI64(address);
    case 'u64': return heap.readU64(address);
    case 'f32': return heap.readF32(address);
    case 'f64': return heap.readF64(address);
  }
}

/** Floats truncate toward zero; NaN and infinities become 0. */
function toInteger(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  return Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;
}

/**
 * Integers wrap to the destination width, floats round to the destination
 * precision.
 */
function writeNumeric(heap: Heap, type: NumericType, address: number, value: number | bigint): void {
  switch (type) {
    case 'i8': return heap.writeI8(address, Number(BigInt.asIntN(8, toInteger(value))));
    case 'u8': return heap.writeU8(address, Number(BigInt.asUintN(8, toInteger(value))));
    case 'i16': return heap.writeI16(address, Number(BigInt.asIntN(16, toInteger(value))));
    case 'u16': return heap.writeU16(address, Number(BigInt.asUintN(16, toInteger(value))));
    case 'i32': return heap.writeI32(address, Number(BigInt.asIntN(32, toInteger(value))));
    case 'u32': return heap.writeU32(address, Number(BigInt.asUintN(32, toInteger(value))));
    case 'i64': return heap.writeI64(address, BigInt.asIntN(64, toInteger(value)));
    case 'u64': return heap.writeU64(address, BigInt.asUintN(64, toInteger(value)));
    case 'f32': return heap.writeF32(address, Number(value));
    case 'f64': return heap.writeF64(address, Number(value));
  }
}

// ============================================================================
// Execution
// ============================================================================

function mapAt(heap: Heap, address: number): Record<string, unknown> | null {
  const value = heap.resolve(heap.readU32(address));
  return isRecord(value) ? value : null;
}

/**
 * Run `plan`, writing the destination value at `dst` from the source value at
 * `src`. Throws on the first conversion error; whatever was written before it
 * stays written.
 */
export function execute(plan: Plan, heap: Heap, dst: number, src: number): void {
  switch (plan.op) {
    case 'copy':
    case 'alias':
      heap.copy(dst, src, plan.size);
      return;

    case 'enum': {
      const value = heap.readText(src);
      if (!plan.members.has(value)) {
        throw new ClosedEnumError(value, plan.dstName);
      }
      heap.copy(dst, src, 8);
      return;
    }

    case 'convert':
      writeNumeric(heap, plan.to, dst, readNumeric(heap, plan.from, src));
      return;

    case 'stringToBytes': {
      const length = heap.readU32(src + 4);
      const data = heap.alloc(length, 1);
      heap.bytes.copyWithin(data, heap.readU32(src), heap.readU32(src) + length);
      heap.writeU32(dst, data);
      heap.writeU32(dst + 4, length);
      return;
    }

    case 'bytesToString': {
      const data = heap.readU32(src);
      const length = data === 0 ? 0 : heap.readU32(src + 4);
      const text = length === 0 ? 0 : heap.alloc(length, 1);
      if (length !== 0) heap.bytes.copyWithin(text, data, data + length);
      heap.writeU32(dst, text);
      heap.writeU32(dst + 4, length);
      return;
    }

    case 'domain':
    case 'custom':
      plan.run(heap, dst, src);
      return;

    case 'copyTo':
      plan.hook.copyTo(heap, plan.dest, dst, src);
      return;

    case 'sharePointer':
      heap.writeU32(dst, heap.readU32(src));
      return;

    case 'pointer': {
      const target = heap.readU32(src);
      if (target === 0) return;
      const address = heap.alloc(plan.elem.size, plan.elem.align);
      execute(plan.inner, heap, address, target);
      heap.writeU32(dst, address);
      return;
    }

    case 'slice': {
      const srcData = heap.readU32(src);
      if (srcData === 0) return;
      const length = heap.readU32(src + 4);
      const dstData = heap.alloc(plan.dstStride * length, plan.dstElem.align);
      for (let i = 0; i < length; i++) {
        execute(plan.inner, heap, dstData + i * plan.dstStride, srcData + i * plan.srcStride);
      }
      heap.writeU32(dst, dstData);
      heap.writeU32(dst + 4, length);
      return;
    }

    case 'optionalToPointer': {
      if (!heap.readBool(src)) return;
      const address = heap.alloc(plan.elem.size, plan.elem.align);
      execute(plan.inner, heap, address, src + plan.valueOffset);
      heap.writeU32(dst, address);
      return;
    }

    case 'optionalTimeToTimestamp':
      if (heap.readBool(src)) boxTimestamp(heap, dst, src + plan.valueOffset);
      return;

    case 'pointerToOptional': {
      const target = heap.readU32(src);
      if (target === 0) return;
      execute(plan.inner, heap, dst + plan.valueOffset, target);
      heap.writeBool(dst, true);
      return;
    }

    case 'timestampToOptionalTime': {
      const ts = heap.readU32(src);
      if (!isValidTimestamp(heap, ts)) return;
      heap.copy(dst + plan.valueOffset, ts, INSTANT_SIZE);
      heap.writeBool(dst, true);
      return;
    }

    case 'valueToOptional':
      if (heap.isZeroed(src, plan.srcSize)) return;
      execute(plan.inner, heap, dst + plan.valueOffset, src);
      heap.writeBool(dst, true);
      return;

    case 'required':
      if (!heap.readBool(src)) {
        throw new RequiredValueError(plan.shapeName);
      }
      execute(plan.inner, heap, dst, src + plan.valueOffset);
      return;

    case 'box': {
      const address = heap.alloc(plan.elem.size, plan.elem.align);
      execute(plan.inner, heap, address, src);
      heap.writeU32(dst, address);
      return;
    }

    case 'deref': {
      const target = heap.readU32(src);
      if (target !== 0) execute(plan.inner, heap, dst, target);
      return;
    }

    case 'struct':
      plan.copier.run(heap, dst, src);
      return;

    case 'structToMap': {
      let map = mapAt(heap, dst);
      if (!map) {
        map = {};
        heap.writeU32(dst, heap.retain(map));
      }
      for (const field of plan.fields) {
        map[field.key] = field.shape.read(heap, src + field.offset);
      }
      return;
    }

    case 'mapToStruct': {
      const map = mapAt(heap, src) ?? {};
      for (const field of plan.fields) {
        if (!Object.hasOwn(map, field.key)) {
          throw new MapKeyError(field.key, 'missing', plan.dstName);
        }
        const value = map[field.key];
        if (!field.shape.accepts(value)) {
          throw new MapKeyError(field.key, 'mismatch', plan.dstName);
        }
        field.shape.write(heap, dst + field.offset, value);
      }
      return;
    }
  }
}

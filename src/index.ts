/**
 * memcast: compiled conversions between independently defined value shapes
 *
 * Values live in a `Heap` and are described by shapes. For any pair of shapes
 * the engine compiles a plan once (numeric conversions, closed enumerations,
 * optional and required wrappers, nested structs, pointers, slices, dynamic
 * maps and domain types such as timestamps, UUIDs and decimals) and reuses it
 * for every copy.
 *
 * @example
 * ```typescript
 * import { createEngine, m } from 'memcast';
 *
 * const UserRow = m.struct('UserRow', { ID: m.string, Age: m.i64 });
 * const User = m.struct('User', { ID: m.Uuid, Age: m.i32 });
 *
 * const engine = createEngine();
 * const heap = engine.createHeap();
 * const row = heap.store(UserRow, { ID: '3f2c1a9e-5b7d-4c8e-9f10-2a3b4c5d6e7f', Age: 41n });
 * const user = heap.allocate(User);
 * engine.copy(user, row);
 * user.load(); // { ID: '3f2c1a9e-5b7d-4c8e-9f10-2a3b4c5d6e7f', Age: 41 }
 * ```
 *
 * @packageDocumentation
 */

import {
  bool,
  dynamicMap,
  enumeration,
  f32,
  f64,
  field,
  i16,
  i32,
  i64,
  i8,
  lazy,
  named,
  optional,
  pointer,
  required,
  slice,
  string,
  struct,
  structWithLayout,
  u16,
  u32,
  u64,
  u8,
  withCopyTo,
} from './intrinsics.ts';
import { DecimalValue } from './lib/decimal.ts';
import { LanguageTag } from './lib/language-tag.ts';
import { messageShape } from './lib/protobuf.ts';
import { CalendarDate, Time } from './lib/time.ts';
import { Timestamp, TimestampPtr } from './lib/timestamp.ts';
import { Ulid } from './lib/ulid.ts';
import { Uuid } from './lib/uuid.ts';
import type { Infer } from './shape.ts';

export * from './intrinsics.ts';
export * from './errors.ts';
export { Heap, Ref, type HeapOptions } from './heap.ts';
export {
  alignOffset,
  unlazy,
  type CopyTo,
  type DomainKind,
  type Field,
  type Infer,
  type NumericType,
  type ScalarType,
  type Shape,
  type ShapeDef,
  type ShapeKind,
  type Traits,
} from './shape.ts';

export { DEFAULT_CONFIG, resolveConfig, type EngineConfig, type LogLevel, type ReinterpretMode } from './config.ts';
export { createLogger, type Logger } from './logger.ts';
export { ConversionCache, optionsKey, type CompileFn } from './cache.ts';
export { ConversionRegistry } from './registry.ts';
export { compileStructCopier, StructCopier, type CopierOptions, type FieldPlan } from './copier.ts';
export { resolvePlan, type ResolveContext } from './resolver.ts';
export { execute, type Plan, type PlanOp } from './plan.ts';
export { TimePtr } from './domain.ts';
export {
  createEngine,
  Engine,
  type Cast,
  type EngineOptions,
  type SliceCopier,
  type ValueCopier,
} from './engine.ts';
export {
  buildReinterpreter,
  deriveSerializationShape,
  type Reinterpreter,
  type ReinterpreterOptions,
} from './transmute.ts';
export { encodeAny, fieldKey, marshal, type MarshalOptions } from './json.ts';

export { CalendarDate, PreciseDate, Time } from './lib/time.ts';
export { Timestamp, TimestampPtr } from './lib/timestamp.ts';
export { messageShape, wellKnownType } from './lib/protobuf.ts';
export { Uuid } from './lib/uuid.ts';
export { Ulid } from './lib/ulid.ts';
export { DecimalValue } from './lib/decimal.ts';
export { LanguageTag } from './lib/language-tag.ts';

export const m = {
  // Scalars
  bool,
  i8,
  u8,
  i16,
  u16,
  i32,
  u32,
  i64,
  u64,
  f32,
  f64,

  // Text
  string,
  named,
  enumeration,

  // Records
  struct,
  structWithLayout,
  field,

  // Containers
  slice,
  pointer,
  dynamicMap,

  // Wrappers
  optional,
  required,

  // Domain
  Time,
  CalendarDate,
  Timestamp,
  TimestampPtr,
  Uuid,
  Ulid,
  DecimalValue,
  LanguageTag,
  messageShape,

  // Utilities
  lazy,
  withCopyTo,
} as const;

export declare namespace m {
  export type infer<S> = Infer<S>;
}

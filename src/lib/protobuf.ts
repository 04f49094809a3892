/**
 * Struct shapes for protocol buffer messages
 *
 * Messages are described by protobufjs reflection types, loaded from a
 * `.proto` file or from protobufjs' bundled well-known types. A derived shape
 * lays the message out like any other struct: scalars inline, `string` and
 * `bytes` as pointer/length pairs, nested messages behind pointers.
 */

import protobuf from 'protobufjs';
import type { Field as ProtoField, Type } from 'protobufjs';

import * as m from '../intrinsics.ts';
import type { FieldInput } from '../intrinsics.ts';
import type { Shape } from '../shape.ts';

const scalarShapes: Readonly<Record<string, Shape>> = {
  double: m.f64,
  float: m.f32,
  int32: m.i32,
  sint32: m.i32,
  sfixed32: m.i32,
  uint32: m.u32,
  fixed32: m.u32,
  int64: m.i64,
  sint64: m.i64,
  sfixed64: m.i64,
  uint64: m.u64,
  fixed64: m.u64,
  bool: m.bool,
  string: m.string,
  bytes: m.slice(m.u8),
};

const messageShapes = new WeakMap<Type, Shape<Record<string, unknown>>>();

/** `seconds` becomes `Seconds` */
function exportedName(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

function elementShape(field: ProtoField): Shape {
  const scalar = scalarShapes[field.type];
  if (scalar) return scalar;

  const resolved = field.resolvedType;
  if (resolved instanceof protobuf.Enum) return m.i32;
  if (resolved instanceof protobuf.Type) {
    const message = resolved;
    return m.pointer(m.lazy(() => messageShape(message)));
  }
  throw new TypeError(`unresolved protobuf type "${field.type}" for field ${field.fullName}`);
}

function fieldShape(field: ProtoField): Shape {
  if (field.map) return m.dynamicMap;
  const elem = elementShape(field);
  return field.repeated ? m.slice(elem) : elem;
}

/**
 * Derive a struct shape from a protobufjs message type. The type's root must
 * be resolved (`root.resolveAll()`).
 *
 * Field names are capitalized (`seconds` becomes `Seconds`); each field is
 * tagged with its field number under `protobuf` and its JSON name under
 * `json`. Repeated fields become slices and nested messages pointers.
 *
 * @example
 * ```typescript
 * const root = await protobuf.load('order.proto');
 * const Order = messageShape(root.resolveAll().lookupType('shop.Order'));
 * ```
 */
export function messageShape(type: Type): Shape<Record<string, unknown>> {
  const existing = messageShapes.get(type);
  if (existing) return existing;

  const fields: Record<string, FieldInput> = {};
  for (const field of type.fieldsArray) {
    fields[exportedName(field.name)] = {
      shape: fieldShape(field),
      tags: { protobuf: String(field.id), json: `${field.name},omitempty` },
    };
  }

  const shape = m.struct(type.fullName.replace(/^\./, ''), fields);
  messageShapes.set(type, shape);
  return shape;
}

/**
 * Look up a well-known type bundled with protobufjs, e.g.
 * `google/protobuf/timestamp.proto`.
 */
export function wellKnownType(file: string, typeName: string): Type {
  const json = protobuf.common.get(file);
  if (!json) {
    throw new Error(`unknown well-known proto file: ${file}`);
  }
  return protobuf.Root.fromJSON(json).resolveAll().lookupType(typeName);
}

/**
 * Shape transmutation and reinterpretation
 *
 * `deriveSerializationShape` builds, from a struct shape, a shape with the
 * same layout whose fields carry their serialization names from a chosen tag
 * namespace as `json` tags. A reinterpreter then presents existing values as
 * that shape, either by reusing their bytes (`alias`) or by rebuilding them
 * (`copy`).
 */

import {
  CircularReferenceError,
  MarshalingShapeError,
  MissingTagError,
  UnexportedFieldError,
} from './errors.ts';
import { Ref } from './heap.ts';
import { pointer, slice, structWithLayout } from './intrinsics.ts';
import { DecimalValue } from './lib/decimal.ts';
import { Time } from './lib/time.ts';
import type { ReinterpretMode } from './config.ts';
import { unlazy, type Field, type Shape } from './shape.ts';

/** Leaves whose own marshaling is authoritative */
const opaqueLeaves: ReadonlySet<Shape> = new Set<Shape>([Time, DecimalValue]);

const derived = new WeakMap<Shape, Map<string, Shape>>();

function derive(shape: Shape, namespace: string, ancestors: readonly Shape[]): Shape {
  const s = unlazy(shape);
  if (opaqueLeaves.has(s)) return s;
  if (ancestors.includes(s)) {
    throw new CircularReferenceError(s.name);
  }

  switch (s.def.kind) {
    case 'struct': {
      if (s.traits.marshal) {
        throw new MarshalingShapeError(s.name);
      }
      const path = [...ancestors, s];
      const fields = s.def.fields.map((f): Field => {
        if (!f.exported) {
          throw new UnexportedFieldError(s.name, f.name);
        }
        const tag = f.tags[namespace];
        if (tag === undefined) {
          throw new MissingTagError(s.name, f.name, namespace);
        }
        return {
          name: f.name,
          shape: derive(f.shape, namespace, path),
          offset: f.offset,
          tags: { json: tag },
          exported: true,
        };
      });
      return structWithLayout(`${s.name}@${namespace}`, fields, s.size, s.align);
    }

    case 'slice': {
      const elem = unlazy(s.def.elem);
      if (elem.def.kind !== 'struct' && elem.def.kind !== 'pointer') return s;
      return slice(derive(elem, namespace, ancestors));
    }

    case 'pointer':
      return pointer(derive(s.def.elem, namespace, ancestors));

    default:
      return s;
  }
}

/**
 * Derive the serialization shape of `shape` under `tagNamespace`.
 *
 * The result has the size, alignment and field offsets of `shape`; every
 * field's `json` tag is its tag in `tagNamespace`. Results are memoized per
 * (shape, namespace); failures are not.
 *
 * @throws CircularReferenceError if the shape contains itself
 * @throws MarshalingShapeError for a struct that marshals itself
 * @throws UnexportedFieldError for a struct with unexported fields
 * @throws MissingTagError for a field without a tag in `tagNamespace`
 */
export function deriveSerializationShape(shape: Shape, tagNamespace: string): Shape {
  const root = unlazy(shape);
  let byNamespace = derived.get(root);
  const cached = byNamespace?.get(tagNamespace);
  if (cached) return cached;

  const result = derive(root, tagNamespace, []);
  if (!byNamespace) {
    byNamespace = new Map();
    derived.set(root, byNamespace);
  }
  byNamespace.set(tagNamespace, result);
  return result;
}

export type Reinterpreter = (value: Ref) => Ref;

export interface ReinterpreterOptions {
  /** Default is 'copy' */
  mode?: ReinterpretMode;
}

/**
 * Build a function presenting values as `target`.
 *
 * In `alias` mode the result shares the value's address, so nothing is
 * allocated or copied; it is only valid for values whose shape is the one
 * `target` was derived from. In `copy` mode the value is read and written
 * into fresh storage of `target` in the same heap.
 */
export function buildReinterpreter(target: Shape, options: ReinterpreterOptions = {}): Reinterpreter {
  if (options.mode === 'alias') {
    return (value) => new Ref(value.heap, target, value.address);
  }
  return (value) => value.heap.store(target, value.load());
}

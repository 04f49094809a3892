/**
 * Conversion rule resolver
 *
 * Picks exactly one rule for a (destination, source) shape pair and compiles
 * it into a plan. Rules are tried in a fixed priority order and the first
 * match wins; nested shapes resolve recursively, so the depth of resolution is
 * bounded by the shapes and never by the data.
 */

import { findDomainConversion, type Converter } from './domain.ts';
import { UnsupportedTypePairError } from './errors.ts';
import { Time } from './lib/time.ts';
import { TimestampPtr } from './lib/timestamp.ts';
import type { CompiledCopier, KeyedField, Plan } from './plan.ts';
import {
  alignOffset,
  unlazy,
  wrappedValueOffset,
  type Field,
  type Shape,
} from './shape.ts';

export interface ResolveContext {
  /** Compiled copier for a nested struct pair, usually from the cache */
  structCopier(dst: Shape, src: Shape): CompiledCopier;
  /** Registered ad hoc conversion for the pair, if any */
  lookupCustom(dst: Shape, src: Shape): Converter | undefined;
  /** Tag whose value `-` excludes a field from copying */
  readonly excludeTag: string;
  /** Tag overriding a field's key in a dynamic map */
  readonly mapKeyTag: string;
}

function isByteSlice(shape: Shape): boolean {
  if (shape.def.kind !== 'slice') return false;
  const elem = unlazy(shape.def.elem).def;
  return elem.kind === 'scalar' && elem.type === 'u8';
}

function isWrapper(shape: Shape): boolean {
  return shape.traits.optional !== undefined || shape.traits.required !== undefined;
}

/**
 * Whether two shapes share their underlying representation, so that a value
 * of one is a valid value of the other byte for byte. Tags are ignored.
 * Pointers are left to the pointer rule, which shares identical pointees.
 */
export function sameUnderlying(a: Shape, b: Shape): boolean {
  const x = a.def;
  const y = b.def;
  switch (x.kind) {
    case 'scalar':
      return y.kind === 'scalar' && x.type === y.type;
    case 'string':
      return y.kind === 'string';
    case 'struct':
      if (y.kind !== 'struct' || isWrapper(a) || isWrapper(b)) return false;
      return (
        a.size === b.size &&
        x.fields.length === y.fields.length &&
        x.fields.every((f, i) => {
          const g = y.fields[i];
          return (
            f.name === g.name &&
            f.offset === g.offset &&
            f.exported === g.exported &&
            unlazy(f.shape) === unlazy(g.shape)
          );
        })
      );
    case 'slice':
      return y.kind === 'slice' && unlazy(x.elem) === unlazy(y.elem);
    case 'map':
      return y.kind === 'map';
    default:
      return false;
  }
}

/**
 * Exported fields that take part in map conversion, keyed by their map key.
 */
export function keyedFields(fields: readonly Field[], context: ResolveContext): KeyedField[] {
  return fields
    .filter((f) => f.exported && f.tags[context.excludeTag] !== '-')
    .map((f) => ({ key: f.tags[context.mapKeyTag] || f.name, offset: f.offset, shape: f.shape }));
}

function stride(shape: Shape): number {
  return alignOffset(shape.size, shape.align);
}

/**
 * Resolve the plan converting a value of `srcShape` into `dstShape`.
 *
 * @throws UnsupportedTypePairError when no rule applies
 */
export function resolvePlan(dstShape: Shape, srcShape: Shape, context: ResolveContext): Plan {
  const dst = unlazy(dstShape);
  const src = unlazy(srcShape);

  // 1. identical
  if (dst === src) {
    return { op: 'copy', size: dst.size };
  }

  // 2. closed enumeration
  const members = dst.traits.closedEnum;
  if (members && dst.def.kind === 'string' && src.def.kind === 'string') {
    return { op: 'enum', members, dstName: dst.name };
  }

  // 3. same representation
  if (sameUnderlying(dst, src)) {
    return { op: 'alias', size: dst.size };
  }

  // 4. value conversion
  if (dst.def.kind === 'scalar' && src.def.kind === 'scalar') {
    const to = dst.def.type;
    const from = src.def.type;
    if (to !== 'bool' && from !== 'bool') {
      return { op: 'convert', from, to };
    }
  }
  if (isByteSlice(dst) && src.def.kind === 'string') {
    return { op: 'stringToBytes' };
  }
  if (dst.def.kind === 'string' && isByteSlice(src)) {
    return { op: 'bytesToString' };
  }

  // 5. domain leaves
  const domain = findDomainConversion(dst, src);
  if (domain) {
    return { op: 'domain', name: domain.name, run: domain.run };
  }

  // 6. copy-to hook
  const hook = src.traits.copyTo;
  if (hook) {
    if (!hook.canCopyTo(dst)) {
      throw new UnsupportedTypePairError(dst.name, src.name);
    }
    return { op: 'copyTo', hook, dest: dst };
  }

  // 7. pointer to pointer
  if (dst.def.kind === 'pointer' && src.def.kind === 'pointer') {
    const dstElem = unlazy(dst.def.elem);
    const srcElem = unlazy(src.def.elem);
    if (dstElem === srcElem) {
      return { op: 'sharePointer' };
    }
    return { op: 'pointer', elem: dstElem, inner: resolvePlan(dstElem, srcElem, context) };
  }

  // 8. slice to slice
  if (dst.def.kind === 'slice' && src.def.kind === 'slice') {
    const dstElem = unlazy(dst.def.elem);
    const srcElem = unlazy(src.def.elem);
    return {
      op: 'slice',
      dstElem,
      dstStride: stride(dstElem),
      srcStride: stride(srcElem),
      inner: resolvePlan(dstElem, srcElem, context),
    };
  }

  // 9. optional to pointer
  const srcOptional = src.traits.optional;
  if (srcOptional && dst.def.kind === 'pointer') {
    const inner = unlazy(srcOptional);
    const valueOffset = wrappedValueOffset(inner);
    if (dst === TimestampPtr && inner === Time) {
      return { op: 'optionalTimeToTimestamp', valueOffset };
    }
    const elem = unlazy(dst.def.elem);
    return { op: 'optionalToPointer', valueOffset, elem, inner: resolvePlan(elem, inner, context) };
  }

  const dstOptional = dst.traits.optional;
  if (dstOptional) {
    const inner = unlazy(dstOptional);
    const valueOffset = wrappedValueOffset(inner);

    // 10. pointer to optional
    if (src.def.kind === 'pointer') {
      if (src === TimestampPtr && inner === Time) {
        return { op: 'timestampToOptionalTime', valueOffset };
      }
      return { op: 'pointerToOptional', valueOffset, inner: resolvePlan(inner, src.def.elem, context) };
    }

    // 11. value to optional
    return { op: 'valueToOptional', srcSize: src.size, valueOffset, inner: resolvePlan(inner, src, context) };
  }

  // 12. required
  const srcRequired = src.traits.required;
  if (srcRequired) {
    const inner = unlazy(srcRequired);
    return {
      op: 'required',
      valueOffset: wrappedValueOffset(inner),
      shapeName: src.name,
      inner: resolvePlan(dst, inner, context),
    };
  }

  // 13. box
  if (dst.def.kind === 'pointer') {
    const elem = unlazy(dst.def.elem);
    return { op: 'box', elem, inner: resolvePlan(elem, src, context) };
  }

  // 14. dereference
  if (src.def.kind === 'pointer') {
    return { op: 'deref', inner: resolvePlan(dst, src.def.elem, context) };
  }

  // 15. struct to struct
  if (dst.def.kind === 'struct' && src.def.kind === 'struct') {
    return { op: 'struct', copier: context.structCopier(dst, src) };
  }

  // 16. struct to map
  if (dst.def.kind === 'map' && src.def.kind === 'struct') {
    return { op: 'structToMap', fields: keyedFields(src.def.fields, context) };
  }

  // 17. map to struct
  if (src.def.kind === 'map' && dst.def.kind === 'struct') {
    return { op: 'mapToStruct', fields: keyedFields(dst.def.fields, context), dstName: dst.name };
  }

  const custom = context.lookupCustom(dst, src);
  if (custom) {
    return { op: 'custom', run: custom };
  }

  throw new UnsupportedTypePairError(dst.name, src.name);
}

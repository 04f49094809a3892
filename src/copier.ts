/**
 * Struct copier compiler
 *
 * Turns a pair of struct shapes into an ordered list of field plans, one per
 * copied source field, each bound to the two fields' byte offsets.
 */

import {
  FieldConversionError,
  FieldNotFoundError,
  RequiredValueError,
  TypeNotStructError,
} from './errors.ts';
import type { Heap } from './heap.ts';
import { execute, type CompiledCopier, type Plan } from './plan.ts';
import { resolvePlan, type ResolveContext } from './resolver.ts';
import { unlazy, type Field, type Shape } from './shape.ts';

export interface CopierOptions {
  /** Skip source fields without a destination counterpart instead of failing */
  omitUnmatchedFields?: boolean;
  /** Copy only these source fields */
  fieldsToInclude?: readonly string[];
  /** Never copy these source fields */
  fieldsToExclude?: readonly string[];
}

export interface FieldPlan {
  readonly name: string;
  readonly dstOffset: number;
  readonly srcOffset: number;
  readonly plan: Plan;
}

export class StructCopier implements CompiledCopier {
  constructor(
    readonly dst: Shape,
    readonly src: Shape,
    readonly fields: readonly FieldPlan[],
  ) {}

  /**
   * Copy the struct at `src` into the struct at `dst`, field by field in
   * source declaration order. Stops at the first failing field.
   *
   * @throws RequiredValueError naming the innermost struct field left absent
   */
  run(heap: Heap, dst: number, src: number): void {
    for (const f of this.fields) {
      try {
        execute(f.plan, heap, dst + f.dstOffset, src + f.srcOffset);
      } catch (err) {
        if (err instanceof RequiredValueError && err.field === undefined) {
          throw new RequiredValueError(err.shapeName, `${this.src.name}.${f.name}`, err);
        }
        throw err;
      }
    }
  }
}

function structFields(shape: Shape): readonly Field[] {
  const def = unlazy(shape).def;
  if (def.kind !== 'struct') {
    throw new TypeNotStructError(shape.name);
  }
  return def.fields;
}

/**
 * Compile a copier for two struct shapes.
 *
 * @throws TypeNotStructError if either shape is not a struct
 * @throws FieldNotFoundError for an unmatched source field, unless `omitUnmatchedFields`
 * @throws FieldConversionError wrapping the resolver's error for a field
 */
export function compileStructCopier(
  dstShape: Shape,
  srcShape: Shape,
  options: CopierOptions,
  context: ResolveContext,
): StructCopier {
  const dstFields = structFields(dstShape);
  const srcFields = structFields(srcShape);
  const byName = new Map(dstFields.map((f) => [f.name, f]));
  const plans: FieldPlan[] = [];

  for (const srcField of srcFields) {
    if (!srcField.exported) continue;
    if (srcField.tags[context.excludeTag] === '-') continue;
    if (options.fieldsToExclude?.includes(srcField.name)) continue;
    if (options.fieldsToInclude && !options.fieldsToInclude.includes(srcField.name)) continue;

    const dstField = byName.get(srcField.name);
    if (!dstField) {
      if (options.omitUnmatchedFields) continue;
      throw new FieldNotFoundError(srcField.name, srcShape.name, dstShape.name);
    }

    let plan: Plan;
    try {
      plan = resolvePlan(dstField.shape, srcField.shape, context);
    } catch (err) {
      throw new FieldConversionError(srcField.name, srcShape.name, err);
    }
    plans.push({
      name: srcField.name,
      dstOffset: dstField.offset,
      srcOffset: srcField.offset,
      plan,
    });
  }

  return new StructCopier(unlazy(dstShape), unlazy(srcShape), plans);
}

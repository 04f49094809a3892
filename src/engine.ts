/**
 * The conversion engine: the entry point tying the resolver, the struct
 * copier compiler and the type-pair cache together.
 */

import type { DestinationStream } from 'pino';

import { ConversionCache } from './cache.ts';
import { resolveConfig, type EngineConfig } from './config.ts';
import { compileStructCopier, type CopierOptions, type StructCopier } from './copier.ts';
import { HeapMismatchError, UnsupportedTypePairError } from './errors.ts';
import { Heap, type Ref } from './heap.ts';
import { createLogger, type Logger } from './logger.ts';
import { execute } from './plan.ts';
import { ConversionRegistry } from './registry.ts';
import { resolvePlan, type ResolveContext } from './resolver.ts';
import { unlazy, type Shape } from './shape.ts';
import { buildReinterpreter, deriveSerializationShape, type Reinterpreter, type ReinterpreterOptions } from './transmute.ts';

export interface EngineOptions extends Partial<EngineConfig> {
  /** Use this logger instead of creating one */
  logger?: Logger;
  /** Where a created logger writes; stdout by default */
  logDestination?: DestinationStream;
  /** Environment consulted for configuration; `process.env` by default */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Copies the value referenced by `src` into the storage referenced by `dst`.
 */
export interface ValueCopier<D, S> {
  (dst: Ref<D>, src: Ref<S>): void;
  readonly dst: Shape<D>;
  readonly src: Shape<S>;
}

export type SliceCopier<D, S> = (values: readonly Ref<S>[]) => Ref<D>[];

/**
 * A value copier working on plain JavaScript values.
 */
export interface Cast<D, S> {
  /** Convert `value` through a scratch heap */
  copy(value: S): D;
  /** Convert into fresh storage in the source's heap */
  copyRef(ref: Ref<S>): Ref<D>;
}

function sameHeap(dst: Ref, src: Ref): void {
  if (dst.heap !== src.heap) {
    throw new HeapMismatchError();
  }
}

export class Engine {
  readonly config: EngineConfig;
  readonly logger: Logger;
  readonly cache: ConversionCache;
  readonly registry = new ConversionRegistry();
  private readonly context: ResolveContext;

  constructor(options: EngineOptions = {}) {
    const { logger, logDestination, env, ...overrides } = options;
    this.config = resolveConfig(overrides, env);
    this.logger = logger ?? createLogger(this.config.logLevel, logDestination);

    const registry = this.registry;
    this.context = {
      excludeTag: this.config.excludeTag,
      mapKeyTag: this.config.mapKeyTag,
      structCopier: (dst, src) => this.cache.getOrCompile(dst, src),
      lookupCustom: (dst, src) => registry.lookup(dst, src),
    };
    this.cache = new ConversionCache(
      (dst, src, copierOptions) => compileStructCopier(dst, src, copierOptions, this.context),
      this.logger,
    );
  }

  /**
   * A heap sized by the engine's `heapCapacity`.
   */
  createHeap(): Heap {
    return new Heap({ initialCapacity: this.config.heapCapacity });
  }

  /**
   * Compiled copier for a pair of struct shapes, compiled on first request.
   */
  buildStructCopier(dst: Shape, src: Shape, options: CopierOptions = {}): StructCopier {
    return this.cache.getOrCompile(dst, src, options);
  }

  /**
   * Copy one struct into another of a possibly different shape.
   *
   * @throws UnsupportedTypePairError unless both refs point at structs
   * @throws HeapMismatchError if the refs live in different heaps
   */
  copy(dst: Ref, src: Ref): void {
    if (unlazy(dst.shape).def.kind !== 'struct' || unlazy(src.shape).def.kind !== 'struct') {
      throw new UnsupportedTypePairError(dst.shape.name, src.shape.name);
    }
    sameHeap(dst, src);
    this.cache.getOrCompile(dst.shape, src.shape).run(dst.heap, dst.address, src.address);
  }

  /**
   * Copier for any supported pair of shapes, not only structs.
   */
  buildValueCopier<D, S>(dst: Shape<D>, src: Shape<S>): ValueCopier<D, S> {
    const plan = resolvePlan(dst, src, this.context);
    this.logger.debug({ dst: dst.name, src: src.name, op: plan.op }, 'value copier compiled');
    const run = (dstRef: Ref<D>, srcRef: Ref<S>) => {
      sameHeap(dstRef, srcRef);
      execute(plan, dstRef.heap, dstRef.address, srcRef.address);
    };
    return Object.assign(run, { dst, src });
  }

  /**
   * Copier for lists of structs. The first failing element aborts the whole
   * list.
   */
  buildSliceCopier<D, S>(dst: Shape<D>, src: Shape<S>): SliceCopier<D, S> {
    const copier = this.buildStructCopier(dst, src);
    return (values) =>
      values.map((value) => {
        const result = value.heap.allocate(dst);
        copier.run(value.heap, result.address, value.address);
        return result;
      });
  }

  /**
   * Copy each struct in `values` into fresh storage of `dst`.
   */
  copyList<D>(dst: Shape<D>, values: readonly Ref[]): Ref<D>[] {
    return values.map((value) => {
      const result = value.heap.allocate(dst);
      this.copy(result, value);
      return result;
    });
  }

  /**
   * Register an ad hoc conversion, consulted when no built-in rule applies.
   * Register before the first copier for an affected pair is compiled.
   */
  register<D, S>(dst: Shape<D>, src: Shape<S>, convert: (value: S) => D): this {
    this.registry.register(dst, src, convert);
    return this;
  }

  cast<D, S>(copier: ValueCopier<D, S>): Cast<D, S> {
    return {
      copy: (value) => {
        const heap = this.createHeap();
        const src = heap.store(copier.src, value);
        const dst = heap.allocate(copier.dst);
        copier(dst, src);
        return dst.load();
      },
      copyRef: (ref) => {
        const dst = ref.heap.allocate(copier.dst);
        copier(dst, ref);
        return dst;
      },
    };
  }

  /**
   * Serialization shape of `shape` under `tagNamespace`.
   */
  deriveSerializationShape(shape: Shape, tagNamespace: string): Shape {
    return deriveSerializationShape(shape, tagNamespace);
  }

  /**
   * Reinterpreter for `target`; the mode defaults to `reinterpretMode`.
   */
  buildReinterpreter(target: Shape, options: ReinterpreterOptions = {}): Reinterpreter {
    return buildReinterpreter(target, { mode: options.mode ?? this.config.reinterpretMode });
  }
}

export function createEngine(options: EngineOptions = {}): Engine {
  return new Engine(options);
}

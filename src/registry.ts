import type { Converter } from './domain.ts';
import type { Shape } from './shape.ts';

/**
 * Ad hoc conversions between a destination and a source shape, registered by
 * the application. The resolver consults them after every built-in rule, so
 * they can add pairs but never change how a supported pair converts.
 */
export class ConversionRegistry {
  private readonly entries = new Map<Shape, Map<Shape, Converter>>();
  private count = 0;

  /**
   * Register `convert` for values of `src` copied into `dst`. A later
   * registration for the same pair replaces the earlier one.
   */
  register<D, S>(dst: Shape<D>, src: Shape<S>, convert: (value: S) => D): this {
    let bySource = this.entries.get(dst);
    if (!bySource) {
      bySource = new Map();
      this.entries.set(dst, bySource);
    }
    if (!bySource.has(src)) this.count++;
    bySource.set(src, (heap, dstAddress, srcAddress) => {
      dst.write(heap, dstAddress, convert(src.read(heap, srcAddress)));
    });
    return this;
  }

  lookup(dst: Shape, src: Shape): Converter | undefined {
    return this.entries.get(dst)?.get(src);
  }

  get size(): number {
    return this.count;
  }
}

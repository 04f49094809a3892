import type { CopierOptions, StructCopier } from './copier.ts';
import { CircularReferenceError } from './errors.ts';
import type { Logger } from './logger.ts';
import { unlazy, type Shape } from './shape.ts';

export type CompileFn = (dst: Shape, src: Shape, options: CopierOptions) => StructCopier;

/**
 * Stable key for copier options: two option objects that select the same
 * fields share a cache entry.
 */
export function optionsKey(options: CopierOptions): string {
  const include = options.fieldsToInclude ? [...options.fieldsToInclude].sort().join(',') : '*';
  const exclude = options.fieldsToExclude ? [...options.fieldsToExclude].sort().join(',') : '';
  return `${options.omitUnmatchedFields ? 1 : 0}|${include}|${exclude}`;
}

/**
 * Compiled struct copiers by (destination, source, options).
 *
 * Entries are added once and never evicted. A compilation that throws leaves
 * no entry behind, so the next request for the pair compiles again.
 *
 * Compilation is synchronous, so no other caller can observe the cache
 * between a miss and the matching insert.
 */
export class ConversionCache {
  private readonly entries = new Map<Shape, Map<Shape, Map<string, StructCopier>>>();
  /** Pairs being compiled right now, outermost first */
  private readonly inProgress: Array<{ dst: Shape; src: Shape; key: string }> = [];
  private count = 0;

  constructor(
    private readonly compile: CompileFn,
    private readonly logger?: Logger,
  ) {}

  get size(): number {
    return this.count;
  }

  get(dst: Shape, src: Shape, options: CopierOptions = {}): StructCopier | undefined {
    return this.entries.get(unlazy(dst))?.get(unlazy(src))?.get(optionsKey(options));
  }

  /**
   * @throws CircularReferenceError when the pair is requested again while it
   * is still being compiled
   */
  getOrCompile(dstShape: Shape, srcShape: Shape, options: CopierOptions = {}): StructCopier {
    const dst = unlazy(dstShape);
    const src = unlazy(srcShape);
    const key = optionsKey(options);

    let bySource = this.entries.get(dst);
    const cached = bySource?.get(src)?.get(key);
    if (cached) {
      this.logger?.trace({ dst: dst.name, src: src.name }, 'copier cache hit');
      return cached;
    }

    if (this.inProgress.some((p) => p.dst === dst && p.src === src && p.key === key)) {
      throw new CircularReferenceError(src.name);
    }

    this.inProgress.push({ dst, src, key });
    let copier: StructCopier;
    try {
      copier = this.compile(dst, src, options);
    } catch (err) {
      this.logger?.debug({ dst: dst.name, src: src.name, err }, 'copier compilation failed');
      throw err;
    } finally {
      this.inProgress.pop();
    }
    this.logger?.debug({ dst: dst.name, src: src.name, fields: copier.fields.length }, 'copier compiled');

    if (!bySource) {
      bySource = new Map();
      this.entries.set(dst, bySource);
    }
    let byOptions = bySource.get(src);
    if (!byOptions) {
      byOptions = new Map();
      bySource.set(src, byOptions);
    }
    byOptions.set(key, copier);
    this.count++;
    return copier;
  }

  clear(): void {
    this.entries.clear();
    this.count = 0;
  }
}

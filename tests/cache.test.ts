import { describe, it, expect } from 'vitest';
import {
  CircularReferenceError,
  compileStructCopier,
  ConversionCache,
  createEngine,
  FieldConversionError,
  m,
  optionsKey,
  StructCopier,
  type ResolveContext,
} from '../src/index.ts';

interface LogLine {
  msg: string;
  [key: string]: unknown;
}

function capture() {
  const lines: LogLine[] = [];
  const engine = createEngine({
    env: {},
    logLevel: 'debug',
    logDestination: { write: (line: string) => { lines.push(JSON.parse(line)); } },
  });
  return { engine, lines };
}

const Src = m.struct('Src', { A: m.i32, B: m.string, C: m.bool });
const Dst = m.struct('Dst', { A: m.i64, B: m.string, C: m.bool });

describe('optionsKey', () => {
  it('should not depend on field order', () => {
    expect(optionsKey({})).toBe('0|*|');
    expect(optionsKey({ omitUnmatchedFields: true, fieldsToInclude: ['b', 'a'] })).toBe('1|a,b|');
    expect(optionsKey({ fieldsToExclude: ['b', 'a'] })).toBe(optionsKey({ fieldsToExclude: ['a', 'b'] }));
  });
});

describe('ConversionCache', () => {
  it('should compile each pair once', () => {
    const { engine, lines } = capture();
    const first = engine.buildStructCopier(Dst, Src);
    expect(engine.buildStructCopier(Dst, Src)).toBe(first);
    expect(engine.cache.get(Dst, Src)).toBe(first);
    expect(engine.cache.size).toBe(1);

    const compiled = lines.filter((line) => line.msg === 'copier compiled');
    expect(compiled).toHaveLength(1);
    expect(compiled[0]).toMatchObject({ name: 'memcast', dst: 'Dst', src: 'Src', fields: 3 });
  });

  it('should key entries by options', () => {
    const { engine } = capture();
    const all = engine.buildStructCopier(Dst, Src);
    const some = engine.buildStructCopier(Dst, Src, { fieldsToExclude: ['C', 'B'] });
    expect(some).not.toBe(all);
    expect(engine.buildStructCopier(Dst, Src, { fieldsToExclude: ['B', 'C'] })).toBe(some);
    expect(some.fields.map((f) => f.name)).toEqual(['A']);
    expect(engine.cache.size).toBe(2);
  });

  it('should not cache failures', () => {
    const { engine, lines } = capture();
    const Flagged = m.struct('Flagged', { C: m.string });
    expect(() => engine.buildStructCopier(Flagged, Src, { fieldsToInclude: ['C'] })).toThrow(FieldConversionError);
    expect(engine.cache.size).toBe(0);
    expect(lines.filter((line) => line.msg === 'copier compilation failed')).toHaveLength(1);

    engine.register(m.string, m.bool, (value) => (value ? 'on' : 'off'));
    const copier = engine.buildStructCopier(Flagged, Src, { fieldsToInclude: ['C'] });
    expect(engine.cache.size).toBe(1);

    const heap = engine.createHeap();
    const src = heap.store(Src, { A: 1, B: 'b', C: true });
    const dst = heap.allocate(Flagged);
    copier.run(heap, dst.address, src.address);
    expect(dst.load()).toEqual({ C: 'on' });
  });

  it('should detect a pair requested while it compiles', () => {
    const cache: ConversionCache = new ConversionCache((dst, src) => cache.getOrCompile(dst, src));
    expect(() => cache.getOrCompile(Dst, Src)).toThrow(CircularReferenceError);
    expect(cache.size).toBe(0);
  });

  it('should work without a logger', () => {
    const context: ResolveContext = {
      excludeTag: 'kv',
      mapKeyTag: 'key',
      structCopier: (dst, src) => cache.getOrCompile(dst, src),
      lookupCustom: () => undefined,
    };
    const cache = new ConversionCache((dst, src, options) => compileStructCopier(dst, src, options, context));
    expect(cache.getOrCompile(Dst, Src)).toBeInstanceOf(StructCopier);
    expect(cache.get(Dst, Src, { fieldsToInclude: ['A'] })).toBeUndefined();
  });

  it('should forget every entry on clear', () => {
    const { engine } = capture();
    const first = engine.buildStructCopier(Dst, Src);
    engine.cache.clear();
    expect(engine.cache.size).toBe(0);
    expect(engine.buildStructCopier(Dst, Src)).not.toBe(first);
  });

  it('should log compiled value copiers', () => {
    const { engine, lines } = capture();
    engine.buildValueCopier(m.i64, m.i32);
    expect(lines.find((line) => line.msg === 'value copier compiled')).toMatchObject({
      dst: 'i64',
      src: 'i32',
      op: 'convert',
    });
  });
});

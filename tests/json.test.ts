import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { EncodeError, encodeAny, fieldKey, Heap, m, marshal, type Field, type Shape } from '../src/index.ts';

function encode<T>(shape: Shape<T>, value: T): string {
  return marshal(new Heap().store(shape, value));
}

describe('marshal', () => {
  describe('scalars', () => {
    it('should encode numbers and booleans', () => {
      expect(encode(m.bool, true)).toBe('true');
      expect(encode(m.i8, -5)).toBe('-5');
      expect(encode(m.u32, 4294967295)).toBe('4294967295');
      expect(encode(m.f64, 1.5)).toBe('1.5');
    });

    it('should encode 64-bit integers exactly', () => {
      expect(encode(m.i64, -9223372036854775808n)).toBe('-9223372036854775808');
      expect(encode(m.u64, 18446744073709551615n)).toBe('18446744073709551615');
    });

    it('should encode single-precision floats in shortest form', () => {
      expect(encode(m.f32, 0.1)).toBe('0.1');
      expect(encode(m.f32, 16777216)).toBe('16777216');
    });

    it('should reject non-finite floats', () => {
      expect(() => encode(m.f64, Number.NaN)).toThrow(EncodeError);
      expect(() => encode(m.f64, Number.POSITIVE_INFINITY)).toThrow('unsupported value: Infinity');
    });
  });

  describe('strings and slices', () => {
    it('should escape strings', () => {
      expect(encode(m.string, 'a "quoted"\nline')).toBe('"a \\"quoted\\"\\nline"');
    });

    it('should encode byte slices as base64', () => {
      expect(encode(m.slice(m.u8), [1, 2, 3])).toBe('"AQID"');
    });

    it('should distinguish nil and empty slices', () => {
      expect(encode(m.slice(m.i32), null)).toBe('null');
      expect(encode(m.slice(m.i32), [])).toBe('[]');
      expect(encode(m.slice(m.i32), [1, -2])).toBe('[1,-2]');
    });
  });

  describe('references and wrappers', () => {
    it('should encode pointers by their target', () => {
      expect(encode(m.pointer(m.string), null)).toBe('null');
      expect(encode(m.pointer(m.string), 'x')).toBe('"x"');
    });

    it('should encode optionals by their value', () => {
      expect(encode(m.optional(m.i32), null)).toBe('null');
      expect(encode(m.optional(m.i32), 7)).toBe('7');
    });

    it('should encode maps with sorted keys', () => {
      expect(encode(m.dynamicMap, { b: 1, a: [true, null], c: { z: 'y' } })).toBe(
        '{"a":[true,null],"b":1,"c":{"z":"y"}}',
      );
      expect(encode(m.dynamicMap, null)).toBe('null');
    });
  });

  describe('domain leaves', () => {
    it('should use their own text forms', () => {
      expect(encode(m.Time, new Date('2024-03-01T00:00:00.120Z'))).toBe('"2024-03-01T00:00:00.12Z"');
      expect(encode(m.CalendarDate, '2024-03-01')).toBe('"2024-03-01"');
      expect(encode(m.Uuid, 'f47ac10b-58cc-4372-a567-0e02b2c3d479')).toBe('"f47ac10b-58cc-4372-a567-0e02b2c3d479"');
      expect(encode(m.DecimalValue, new Decimal('-0.50'))).toBe('"-0.5"');
      expect(encode(m.LanguageTag, 'pt-br')).toBe('"pt-BR"');
    });
  });

  describe('structs', () => {
    const Row = m.struct('Row', {
      Name: m.field(m.string, { json: 'name' }),
      Count: m.field(m.i32, { json: 'count,omitempty' }),
      Plain: m.i32,
      Renamed: m.field(m.string, { json: ',omitempty' }),
      Skipped: m.field(m.string, { json: '-' }),
      hidden: m.field(m.string, {}, { exported: false }),
    });

    it('should follow field tags', () => {
      expect(encode(Row, { Name: 'n', Count: 2, Plain: 3, Renamed: 'r', Skipped: 's', hidden: 'h' })).toBe(
        '{"name":"n","count":2,"Plain":3,"Renamed":"r"}',
      );
    });

    it('should omit empty values marked omitempty', () => {
      expect(encode(Row, { Name: '', Count: 0, Plain: 0, Renamed: '', Skipped: '', hidden: '' })).toBe(
        '{"name":"","Plain":0}',
      );
    });

    it('should treat negative zero as an empty float', () => {
      const Reading = m.struct('Reading', {
        Value: m.field(m.f64, { json: 'value,omitempty' }),
        Scale: m.field(m.f32, { json: 'scale,omitempty' }),
      });
      expect(encode(Reading, { Value: -0, Scale: -0 })).toBe('{}');
      expect(encode(Reading, { Value: -1.5, Scale: 0.5 })).toBe('{"value":-1.5,"scale":0.5}');
    });

    it('should read keys from another tag namespace', () => {
      const Tagged = m.struct('Tagged', { A: m.field(m.i32, { json: 'a', yaml: 'alpha' }) });
      expect(marshal(new Heap().store(Tagged, { A: 1 }), { tag: 'yaml' })).toBe('{"alpha":1}');
    });
  });
});

describe('fieldKey', () => {
  const base: Field = { name: 'Field', shape: m.i32, offset: 0, tags: {}, exported: true };

  it('should parse the name and flags of a tag', () => {
    expect(fieldKey(base, 'json')).toEqual({ key: 'Field', omitEmpty: false });
    expect(fieldKey({ ...base, tags: { json: 'f,omitempty' } }, 'json')).toEqual({ key: 'f', omitEmpty: true });
    expect(fieldKey({ ...base, tags: { json: '-' } }, 'json')).toBeNull();
    expect(fieldKey({ ...base, exported: false }, 'json')).toBeNull();
  });
});

describe('encodeAny', () => {
  it('should encode host values', () => {
    expect(encodeAny(new Date(0))).toBe('"1970-01-01T00:00:00Z"');
    expect(encodeAny(new Decimal('1e2'))).toBe('"100"');
    expect(encodeAny(new Uint8Array([255]))).toBe('"/w=="');
    expect(encodeAny(12n)).toBe('12');
    expect(encodeAny(undefined)).toBe('null');
  });

  it('should reject values without a JSON form', () => {
    expect(() => encodeAny(() => 1)).toThrow('unsupported type: function');
  });
});

import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import protobuf from 'protobufjs';
import { Heap } from '../src/heap.ts';
import { m, ParseError, unlazy } from '../src/index.ts';
import { formatDecimal, parseDecimal } from '../src/lib/decimal.ts';
import { parseLanguageTag } from '../src/lib/language-tag.ts';
import { messageShape } from '../src/lib/protobuf.ts';
import { formatInstant, parseDays, PreciseDate } from '../src/lib/time.ts';
import { isValidTimestamp } from '../src/lib/timestamp.ts';
import { encodeUlid, parseUlid } from '../src/lib/ulid.ts';
import { parseUuid } from '../src/lib/uuid.ts';

describe('domain shapes', () => {
  describe('Time', () => {
    it('should store seconds and nanos since the epoch', () => {
      const heap = new Heap();
      const ref = heap.store(m.Time, new Date('2024-03-01T12:34:56.789Z'));
      expect(heap.readI64(ref.address)).toBe(1709296496n);
      expect(heap.readI32(ref.address + 8)).toBe(789000000);
      expect(ref.load().toISOString()).toBe('2024-03-01T12:34:56.789Z');
    });

    it('should read zero bytes as the epoch', () => {
      expect(new Heap().allocate(m.Time).load().getTime()).toBe(0);
    });

    it('should store instants before the epoch with positive nanos', () => {
      const heap = new Heap();
      const ref = heap.store(m.Time, new Date(-1500));
      expect(heap.readI64(ref.address)).toBe(-2n);
      expect(heap.readI32(ref.address + 8)).toBe(500000000);
      expect(ref.load().getTime()).toBe(-1500);
    });

    it('should keep nanoseconds through a store and load', () => {
      const heap = new Heap();
      const time = new PreciseDate({ seconds: 1709296496n, nanos: 789012300 });
      const loaded = heap.store(m.Time, time).load();
      expect(loaded).toBeInstanceOf(PreciseDate);
      expect(loaded.getTime()).toBe(1709296496789);
      expect(heap.readI32(heap.store(m.Time, loaded).address + 8)).toBe(789012300);
      expect(formatInstant(loaded)).toBe('2024-03-01T12:34:56.7890123Z');
    });

    it('should fall back to milliseconds once a precise date is moved', () => {
      const time = new PreciseDate({ seconds: 0n, nanos: 123456789 });
      time.setTime(2500);
      expect(formatInstant(time)).toBe('1970-01-01T00:00:02.5Z');
    });

    it('should format RFC 3339 with trimmed fractional seconds', () => {
      expect(formatInstant(new Date('2024-03-01T12:34:56.789Z'))).toBe('2024-03-01T12:34:56.789Z');
      expect(formatInstant(new Date('2024-03-01T12:34:56.100Z'))).toBe('2024-03-01T12:34:56.1Z');
      expect(formatInstant(new Date('2024-03-01T12:34:56.000Z'))).toBe('2024-03-01T12:34:56Z');
    });
  });

  describe('CalendarDate', () => {
    it('should store days since the epoch', () => {
      const heap = new Heap();
      const ref = heap.store(m.CalendarDate, '2024-03-01');
      expect(heap.readI32(ref.address)).toBe(19783);
      expect(ref.load()).toBe('2024-03-01');
      expect(heap.store(m.CalendarDate, '1969-12-31').load()).toBe('1969-12-31');
    });

    it('should reject impossible dates', () => {
      expect(parseDays('2024-02-30')).toBeNull();
      expect(parseDays('2024-3-1')).toBeNull();
      expect(m.CalendarDate.accepts('2024-02-29')).toBe(true);
      expect(() => new Heap().store(m.CalendarDate, '2023-02-29')).toThrow(RangeError);
    });
  });

  describe('Timestamp', () => {
    it('should be derived from the protobuf descriptor', () => {
      expect(m.Timestamp.name).toBe('google.protobuf.Timestamp');
      expect(m.Timestamp.size).toBe(16);
      expect(m.Timestamp.align).toBe(8);
      const def = m.Timestamp.def;
      if (def.kind !== 'struct') throw new Error('expected struct');
      expect(def.fields.map((f) => [f.name, f.offset, f.shape.name, f.tags])).toEqual([
        ['Seconds', 0, 'i64', { protobuf: '1', json: 'seconds,omitempty' }],
        ['Nanos', 8, 'i32', { protobuf: '2', json: 'nanos,omitempty' }],
      ]);
    });

    it('should validate range and presence', () => {
      const heap = new Heap();
      const valid = heap.store(m.Timestamp, { Seconds: 253402300799n, Nanos: 999999999 });
      const tooLate = heap.store(m.Timestamp, { Seconds: 253402300800n, Nanos: 0 });
      const negativeNanos = heap.store(m.Timestamp, { Seconds: 0n, Nanos: -1 });
      expect(isValidTimestamp(heap, valid.address)).toBe(true);
      expect(isValidTimestamp(heap, tooLate.address)).toBe(false);
      expect(isValidTimestamp(heap, negativeNanos.address)).toBe(false);
      expect(isValidTimestamp(heap, 0)).toBe(false);
    });
  });

  describe('messageShape', () => {
    const root = protobuf.Root.fromJSON({
      nested: {
        shop: {
          nested: {
            Status: { values: { UNKNOWN: 0, ACTIVE: 1 } },
            Line: {
              fields: {
                sku: { type: 'string', id: 1 },
                qty: { type: 'uint32', id: 2 },
              },
            },
            Order: {
              fields: {
                id: { type: 'string', id: 1 },
                lines: { rule: 'repeated', type: 'Line', id: 2 },
                status: { type: 'Status', id: 3 },
                parent: { type: 'Order', id: 4 },
                payload: { type: 'bytes', id: 5 },
              },
            },
          },
        },
      },
    }).resolveAll();
    const Order = messageShape(root.lookupType('shop.Order'));
    const Line = messageShape(root.lookupType('shop.Line'));

    it('should lay out message fields as a struct', () => {
      expect(Order.name).toBe('shop.Order');
      const def = Order.def;
      if (def.kind !== 'struct') throw new Error('expected struct');
      expect(def.fields.map((f) => [f.name, f.offset])).toEqual([
        ['Id', 0],
        ['Lines', 8],
        ['Status', 16],
        ['Parent', 20],
        ['Payload', 24],
      ]);
      expect(def.fields[2].shape).toBe(m.i32);
      expect(def.fields[4].shape).toBe(m.slice(m.u8));
      expect(Order.size).toBe(32);
    });

    it('should point at nested and recursive messages', () => {
      const def = Order.def;
      if (def.kind !== 'struct') throw new Error('expected struct');
      const lines = def.fields[1].shape.def;
      const parent = def.fields[3].shape.def;
      if (lines.kind !== 'slice' || parent.kind !== 'pointer') throw new Error('unexpected kinds');
      const lineElem = lines.elem.def;
      if (lineElem.kind !== 'pointer') throw new Error('expected pointer');
      expect(unlazy(lineElem.elem)).toBe(Line);
      expect(unlazy(parent.elem)).toBe(Order);
    });

    it('should memoize per message type', () => {
      expect(messageShape(root.lookupType('shop.Order'))).toBe(Order);
    });

    it('should round-trip message values', () => {
      const heap = new Heap();
      const order = {
        Id: 'o-1',
        Lines: [{ Sku: 'sku-1', Qty: 2 }],
        Status: 1,
        Parent: null,
        Payload: [7, 8],
      };
      expect(heap.store(Order, order).load()).toEqual(order);
    });
  });

  describe('Uuid', () => {
    it('should store the 16 bytes and read the canonical form', () => {
      const heap = new Heap();
      const ref = heap.store(m.Uuid, 'F47AC10B-58CC-4372-A567-0E02B2C3D479');
      expect(heap.readU8(ref.address)).toBe(0xf4);
      expect(heap.readU8(ref.address + 15)).toBe(0x79);
      expect(ref.load()).toBe('f47ac10b-58cc-4372-a567-0e02b2c3d479');
    });

    it('should accept every version and variant', () => {
      const heap = new Heap();
      expect(heap.store(m.Uuid, '00000000-0000-0000-0000-000000000001').load()).toBe(
        '00000000-0000-0000-0000-000000000001',
      );
      expect(heap.store(m.Uuid, '0b6e3c1d-2f4a-0b5c-cd9e-0f1a2b3c4d5e').load()).toBe(
        '0b6e3c1d-2f4a-0b5c-cd9e-0f1a2b3c4d5e',
      );
    });

    it('should accept the braced, urn and bare hex forms', () => {
      const expected = parseUuid('f47ac10b-58cc-4372-a567-0e02b2c3d479');
      expect(parseUuid('{f47ac10b-58cc-4372-a567-0e02b2c3d479}')).toEqual(expected);
      expect(parseUuid('urn:uuid:f47ac10b-58cc-4372-a567-0e02b2c3d479')).toEqual(expected);
      expect(parseUuid('f47ac10b58cc4372a5670e02b2c3d479')).toEqual(expected);
    });

    it('should fail to parse malformed input', () => {
      expect(() => parseUuid('f47ac10b-58cc-4372-a567-0e02b2c3d47g')).toThrow(ParseError);
      expect(() => parseUuid('f47ac10b58cc-4372-a567-0e02b2c3d479')).toThrow(ParseError);
      expect(() => parseUuid('not-a-uuid')).toThrow(ParseError);
      expect(() => parseUuid('not-a-uuid')).toThrow('invalid UUID: "not-a-uuid"');
    });
  });

  describe('Ulid', () => {
    it('should encode the extremes', () => {
      expect(encodeUlid(new Uint8Array(16))).toBe('00000000000000000000000000');
      expect(encodeUlid(new Uint8Array(16).fill(0xff))).toBe('7ZZZZZZZZZZZZZZZZZZZZZZZZZ');
    });

    it('should round-trip through its bytes', () => {
      const text = '01HQ3Z8K4M5N6P7Q8R9S0T1V2W';
      expect(encodeUlid(parseUlid(text))).toBe(text);
      expect(new Heap().store(m.Ulid, text).load()).toBe(text);
    });

    it('should reject overflow and bad characters', () => {
      expect(() => parseUlid('8ZZZZZZZZZZZZZZZZZZZZZZZZZ')).toThrow(ParseError);
      expect(() => parseUlid('01HQ3Z8K4M5N6P7Q8R9S0T1V2U')).toThrow(ParseError);
      expect(() => parseUlid('short')).toThrow(ParseError);
    });
  });

  describe('DecimalValue', () => {
    it('should hold the decimal by handle', () => {
      const heap = new Heap();
      const price = new Decimal('12.50');
      const ref = heap.store(m.DecimalValue, price);
      expect(ref.load()).toBe(price);
      expect(heap.resolve(heap.readU32(ref.address))).toBe(price);
    });

    it('should read nil as zero', () => {
      expect(new Heap().allocate(m.DecimalValue).load().isZero()).toBe(true);
    });

    it('should format in plain notation', () => {
      expect(formatDecimal(new Decimal('12.50'))).toBe('12.5');
      expect(formatDecimal(new Decimal('1e21'))).toBe('1000000000000000000000');
      expect(formatDecimal(new Decimal('-0.000001'))).toBe('-0.000001');
    });

    it('should reject malformed and non-finite input', () => {
      expect(() => parseDecimal('abc')).toThrow(ParseError);
      expect(() => parseDecimal('Infinity')).toThrow(ParseError);
      expect(parseDecimal('3.14').toFixed()).toBe('3.14');
    });
  });

  describe('LanguageTag', () => {
    it('should read tags in canonical form', () => {
      expect(new Heap().store(m.LanguageTag, 'en-us').load()).toBe('en-US');
    });

    it('should read nil as und', () => {
      expect(new Heap().allocate(m.LanguageTag).load()).toBe('und');
    });

    it('should reject malformed tags', () => {
      expect(() => parseLanguageTag('')).toThrow(ParseError);
      expect(() => parseLanguageTag('en_US!')).toThrow(ParseError);
    });
  });
});

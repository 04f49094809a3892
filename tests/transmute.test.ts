import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
  buildReinterpreter,
  CircularReferenceError,
  createEngine,
  deriveSerializationShape,
  Heap,
  m,
  marshal,
  MarshalingShapeError,
  MissingTagError,
  PreciseDate,
  UnexportedFieldError,
  type Shape,
} from '../src/index.ts';

const Engine = m.struct('Engine', {
  HP: m.field(m.i32, { jsonv2: 'hp' }),
  Fuel: m.field(m.string, { jsonv2: 'fuel,omitempty' }),
});

const Car = m.struct('Car', {
  Make: m.field(m.string, { jsonv2: 'make' }),
  Year: m.field(m.i32, { jsonv2: 'year' }),
  Color: m.field(m.enumeration('Color', ['red', 'blue']), { jsonv2: 'color' }),
  Engine: m.field(Engine, { jsonv2: 'engine' }),
  Spare: m.field(m.pointer(Engine), { jsonv2: 'spare,omitempty' }),
  Owners: m.field(m.slice(m.string), { jsonv2: 'owners' }),
  Registered: m.field(m.Time, { jsonv2: 'registered' }),
  Price: m.field(m.DecimalValue, { jsonv2: 'price' }),
  Internal: m.field(m.string, { jsonv2: '-' }),
});

const car: m.infer<typeof Car> = {
  Make: 'Acme',
  Year: 2024,
  Color: 'red',
  Engine: { HP: 300, Fuel: '' },
  Spare: null,
  Owners: ['ann', 'bo'],
  Registered: new Date('2024-03-01T12:34:56.789Z'),
  Price: new Decimal('19999.90'),
  Internal: 'hidden',
};

const expected =
  '{"make":"Acme","year":2024,"color":"red","engine":{"hp":300},"owners":["ann","bo"],' +
  '"registered":"2024-03-01T12:34:56.789Z","price":"19999.9"}';

describe('deriveSerializationShape', () => {
  it('should keep the layout and move tags to json', () => {
    const derived = deriveSerializationShape(Car, 'jsonv2');
    expect(derived.name).toBe('Car@jsonv2');
    expect(derived.size).toBe(80);
    expect(derived.align).toBe(8);

    const def = derived.def;
    if (def.kind !== 'struct' || Car.def.kind !== 'struct') throw new Error('expected struct shapes');
    expect(def.fields.map((f) => [f.name, f.offset, f.tags])).toEqual([
      ['Make', 0, { json: 'make' }],
      ['Year', 8, { json: 'year' }],
      ['Color', 12, { json: 'color' }],
      ['Engine', 20, { json: 'engine' }],
      ['Spare', 32, { json: 'spare,omitempty' }],
      ['Owners', 36, { json: 'owners' }],
      ['Registered', 48, { json: 'registered' }],
      ['Price', 64, { json: 'price' }],
      ['Internal', 68, { json: '-' }],
    ]);
    expect(def.fields.map((f) => f.offset)).toEqual(Car.def.fields.map((f) => f.offset));
  });

  it('should derive nested structs and re-wrap pointers', () => {
    const derived = deriveSerializationShape(Car, 'jsonv2');
    if (derived.def.kind !== 'struct') throw new Error('expected a struct shape');
    const [, , color, engine, spare, owners, registered, price] = derived.def.fields;
    expect(engine.shape.name).toBe('Engine@jsonv2');
    expect(spare.shape.name).toBe('*Engine@jsonv2');
    expect(owners.shape).toBe(m.slice(m.string));
    expect(color.shape.name).toBe('Color');
    expect(registered.shape).toBe(m.Time);
    expect(price.shape).toBe(m.DecimalValue);
  });

  it('should derive slices of structs', () => {
    const Fleet = m.struct('Fleet', { Cars: m.field(m.slice(Car), { jsonv2: 'cars' }) });
    const derived = deriveSerializationShape(Fleet, 'jsonv2');
    if (derived.def.kind !== 'struct') throw new Error('expected a struct shape');
    expect(derived.def.fields[0].shape.name).toBe('[]Car@jsonv2');
  });

  it('should memoize per namespace', () => {
    const Tagged = m.struct('Tagged', { A: m.field(m.i32, { v1: 'a', v2: 'alpha' }) });
    const v1 = deriveSerializationShape(Tagged, 'v1');
    expect(deriveSerializationShape(Tagged, 'v1')).toBe(v1);
    expect(deriveSerializationShape(Tagged, 'v2')).not.toBe(v1);
  });

  it('should pass leaves through unchanged', () => {
    expect(deriveSerializationShape(m.i32, 'jsonv2')).toBe(m.i32);
    expect(deriveSerializationShape(m.Time, 'jsonv2')).toBe(m.Time);
    expect(deriveSerializationShape(m.DecimalValue, 'jsonv2')).toBe(m.DecimalValue);
  });

  it('should reject self-referential structs', () => {
    interface EmployeeValue { Name: string; Reports: EmployeeValue[] | null }
    const Employee: Shape<EmployeeValue> = m.struct('Employee', {
      Name: m.field(m.string, { jsonv2: 'name' }),
      Reports: m.field(m.slice(m.lazy(() => Employee)), { jsonv2: 'reports' }),
    });
    expect(() => deriveSerializationShape(Employee, 'jsonv2')).toThrow(CircularReferenceError);
    expect(() => deriveSerializationShape(Employee, 'jsonv2')).toThrow(
      'circular type reference not supported: Employee',
    );
  });

  it('should allow the same struct in sibling fields', () => {
    const Pair = m.struct('Pair', {
      Left: m.field(Engine, { jsonv2: 'left' }),
      Right: m.field(Engine, { jsonv2: 'right' }),
    });
    expect(deriveSerializationShape(Pair, 'jsonv2').name).toBe('Pair@jsonv2');
  });

  it('should reject unexported fields', () => {
    const Secretive = m.struct('Secretive', {
      Name: m.field(m.string, { jsonv2: 'name' }),
      token: m.field(m.string, { jsonv2: 'token' }, { exported: false }),
    });
    expect(() => deriveSerializationShape(Secretive, 'jsonv2')).toThrow(UnexportedFieldError);
    expect(() => deriveSerializationShape(Secretive, 'jsonv2')).toThrow(
      'unexported field in transmutable structure: Secretive.token',
    );
  });

  it('should reject optional fields, whose wrapper is unexported', () => {
    const Maybe = m.struct('Maybe', { Age: m.field(m.optional(m.i32), { jsonv2: 'age' }) });
    expect(() => deriveSerializationShape(Maybe, 'jsonv2')).toThrow(
      'unexported field in transmutable structure: Optional[i32].present',
    );
  });

  it('should reject structs that marshal themselves', () => {
    const Money = m.struct('Money', { Units: m.field(m.i64, { jsonv2: 'units' }) }, {
      marshal: (value) => JSON.stringify(value.Units.toString()),
    });
    expect(() => deriveSerializationShape(Money, 'jsonv2')).toThrow(MarshalingShapeError);
    expect(() => deriveSerializationShape(Money, 'jsonv2')).toThrow('transmuting a self-marshaling type: Money');
  });

  it('should reject fields without a tag in the namespace', () => {
    expect(() => deriveSerializationShape(Car, 'xml')).toThrow(MissingTagError);
    expect(() => deriveSerializationShape(Car, 'xml')).toThrow('field Car.Make has no "xml" tag');
  });
});

describe('buildReinterpreter', () => {
  const target = deriveSerializationShape(Car, 'jsonv2');

  it('should encode the source shape under its namespace', () => {
    const heap = new Heap();
    expect(marshal(heap.store(Car, car), { tag: 'jsonv2' })).toBe(expected);
  });

  it('should alias without allocating', () => {
    const heap = new Heap();
    const ref = heap.store(Car, car);
    const used = heap.used;
    const view = buildReinterpreter(target, { mode: 'alias' })(ref);

    expect(view.address).toBe(ref.address);
    expect(view.shape).toBe(target);
    expect(heap.used).toBe(used);
    expect(marshal(view)).toBe(expected);
  });

  it('should copy into fresh storage with identical output', () => {
    const heap = new Heap();
    const ref = heap.store(Car, car);
    const view = buildReinterpreter(target, { mode: 'copy' })(ref);

    expect(view.address).not.toBe(ref.address);
    expect(view.heap).toBe(heap);
    expect(marshal(view)).toBe(expected);
  });

  it('should keep nanoseconds when copying times', () => {
    const Event = m.struct('Event', { At: m.field(m.Time, { jsonv2: 'at' }) });
    const heap = new Heap();
    const ref = heap.store(Event, { At: new PreciseDate({ seconds: 0n, nanos: 123456789 }) });
    const view = buildReinterpreter(deriveSerializationShape(Event, 'jsonv2'), { mode: 'copy' })(ref);

    expect(view.address).not.toBe(ref.address);
    expect(heap.readI32(view.address + 8)).toBe(123456789);
    expect(marshal(view)).toBe('{"at":"1970-01-01T00:00:00.123456789Z"}');
  });

  it('should encode pointers and omit empty values the same way', () => {
    const heap = new Heap();
    const withSpare = heap.store(Car, { ...car, Spare: { HP: 90, Fuel: 'diesel' }, Owners: null });
    const json = marshal(buildReinterpreter(target, { mode: 'alias' })(withSpare));
    expect(json).toBe(marshal(withSpare, { tag: 'jsonv2' }));
    expect(json).toContain('"spare":{"hp":90,"fuel":"diesel"},"owners":null');
  });

  it('should default to the configured mode', () => {
    const heap = new Heap();
    const ref = heap.store(Car, car);

    const copying = createEngine({ env: {} });
    expect(copying.buildReinterpreter(target)(ref).address).not.toBe(ref.address);

    const aliasing = createEngine({ env: { MEMCAST_REINTERPRET_MODE: 'alias' } });
    expect(aliasing.buildReinterpreter(target)(ref).address).toBe(ref.address);
    expect(aliasing.buildReinterpreter(target, { mode: 'copy' })(ref).address).not.toBe(ref.address);
  });
});

/**
 * Benchmarks for compiled copies and reinterpretation.
 *
 * Run with: npm run benchmark
 */

import { run, bench, group, summary } from 'mitata';
import protobuf from 'protobufjs';

import { buildReinterpreter, createEngine, deriveSerializationShape, m, marshal } from '../src/index.ts';

const engine = createEngine({ env: {} });

// ============================================================================
// Shapes
// ============================================================================

const Person = m.struct('Person', {
  Id: m.field(m.string, { wire: 'id' }),
  Name: m.field(m.string, { wire: 'name' }),
  Age: m.field(m.i32, { wire: 'age' }),
  Email: m.field(m.pointer(m.string), { wire: 'email,omitempty' }),
  Scores: m.field(m.slice(m.i32), { wire: 'scores' }),
  Active: m.field(m.bool, { wire: 'active' }),
});

type Person = m.infer<typeof Person>;

const PersonRow = m.struct('PersonRow', {
  Id: m.Uuid,
  Name: m.string,
  Age: m.i64,
  Email: m.optional(m.string),
  Scores: m.slice(m.i64),
  Active: m.bool,
});

const ProtoPerson = protobuf.Root.fromJSON({
  nested: {
    Person: {
      fields: {
        id: { type: 'string', id: 1 },
        name: { type: 'string', id: 2 },
        age: { type: 'int32', id: 3 },
        email: { type: 'string', id: 4 },
        scores: { rule: 'repeated', type: 'int32', id: 5 },
        active: { type: 'bool', id: 6 },
      },
    },
  },
}).lookupType('Person');

// ============================================================================
// Test data
// ============================================================================

const testPerson: Person = {
  Id: '0b6e3c1d-2f4a-4b5c-8d9e-0f1a2b3c4d5e',
  Name: 'Alice',
  Age: 30,
  Email: 'alice@example.test',
  Scores: [100, 95, 87, 92],
  Active: true,
};

const testPersonLarge: Person = {
  ...testPerson,
  Name: 'Bob Johnson with a very long name that exceeds inline storage',
  Scores: Array.from({ length: 100 }, (_, i) => i * 10),
};

const heap = engine.createHeap();
const personRef = heap.store(Person, testPerson);
const personLargeRef = heap.store(Person, testPersonLarge);

const copier = engine.buildStructCopier(PersonRow, Person);
const wireShape = deriveSerializationShape(Person, 'wire');
const alias = buildReinterpreter(wireShape, { mode: 'alias' });
const copy = buildReinterpreter(wireShape, { mode: 'copy' });

function handWritten(person: Person) {
  return {
    Id: person.Id.toLowerCase(),
    Name: person.Name,
    Age: BigInt(person.Age),
    Email: person.Email,
    Scores: person.Scores?.map((score) => BigInt(score)) ?? null,
    Active: person.Active,
  };
}

// ============================================================================
// Benchmarks
// ============================================================================

console.log(`Heap after setup: ${heap.used} bytes`);
console.log('');

for (const [label, ref, value] of [
  ['small', personRef, testPerson],
  ['large', personLargeRef, testPersonLarge],
] as const) {
  summary(() => {
    group(`Person (${label}) copy`, () => {
      bench('compiled copier', () => {
        const scratch = engine.createHeap();
        const src = scratch.store(Person, value);
        const dst = scratch.allocate(PersonRow);
        copier.run(scratch, dst.address, src.address);
      }).baseline();

      bench('hand-written mapping', () => {
        handWritten(value);
      });

      bench('protobufjs fromObject', () => {
        ProtoPerson.fromObject({
          id: value.Id,
          name: value.Name,
          age: value.Age,
          email: value.Email ?? undefined,
          scores: value.Scores ?? [],
          active: value.Active,
        });
      });
    });
  });

  summary(() => {
    group(`Person (${label}) serialize under renamed keys`, () => {
      bench('marshal with tag', () => {
        marshal(ref, { tag: 'wire' });
      });

      bench('alias reinterpreter', () => {
        marshal(alias(ref));
      }).baseline();

      bench('copy reinterpreter', () => {
        const scratch = engine.createHeap();
        marshal(copy(scratch.store(Person, value)));
      });

      bench('JSON.stringify of loaded value', () => {
        JSON.stringify(ref.load());
      });
    });
  });
}

await run({
  colors: true,
});

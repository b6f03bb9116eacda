/**
 * define_schema() 门面：parse / to_dto / mock / describe / schema_id，以及叶子边界
 */
import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import { define_schema } from '../index';
import { inclusive, optional, required, type Marker } from '../../ast/markers';
import { list, make_object, type RawSchema } from '../../ast/wrappers';
import { bigint, datetime, decimal, integer, number, string } from '../../converters';
import { MultipleInvalidError, SchemaDefinitionError, issue } from '../../errors';
import { Extra } from '../../types';

const order_fields = () =>
  new Map<Marker, RawSchema>([
    [required('id'), integer()],
    [required('placed_at'), datetime()],
    [optional('tags'), list(string())],
    [required('status'), new Set<RawSchema>(['open', 'closed'])],
    [inclusive('lat', undefined, 'geo'), number()],
    [inclusive('lng', undefined, 'geo'), number()],
    [required('lines'), list(new Map<Marker, RawSchema>([[required('sku'), string()], [required('qty'), integer()]]))],
  ]);

describe('define_schema: parse', () => {
  it('is deterministic for equal input', () => {
    const schema = define_schema(order_fields());
    const input = { id: '1', placed_at: '2024-03-01 10:20.30', status: 'open', lines: [{ sku: 'A', qty: '2' }] };
    const a = schema.parse(input);
    const b = schema.parse({ ...input });
    expect(a).toEqual(b);
    expect(a).toEqual({
      id: 1,
      placed_at: new Date(2024, 2, 1, 10, 20, 30),
      status: 'open',
      lines: [{ sku: 'A', qty: 2 }],
    });
  });

  it('is a no-op on already converted string data', () => {
    const schema = define_schema(new Map([[required('a'), string()], [required('b'), string()]]));
    const once = schema.parse({ a: 'x', b: 'y' });
    expect(schema.parse(once)).toEqual(once);
  });

  it('throws MultipleInvalidError holding every issue', () => {
    const schema = define_schema(new Map<Marker, RawSchema>([[required('name'), string()], [required('age'), integer()]]));
    let caught: unknown;
    try {
      schema.parse({});
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MultipleInvalidError);
    if (!(caught instanceof MultipleInvalidError)) return;
    expect(caught.message).toBe("required field is missing @ data['name']");
    expect(caught.errors).toHaveLength(2);
    expect(caught.render()).toBe(
      "required field is missing @ data['name']\nrequired field is missing @ data['age']",
    );
  });
});

describe('leaf boundary', () => {
  it('wraps unexpected exceptions into a generic CONVERSION issue', () => {
    const explode = (): never => {
      throw new TypeError('boom');
    };
    expect(define_schema(new Map([[required('a'), explode]])).safe_parse({ a: 1 })).toEqual({
      ok: false,
      errors: [{ code: 'CONVERSION', path: ['a'], message: 'error converting value', hint: 'boom' }],
    });
  });

  it('keeps the issues of a nested MultipleInvalidError and prefixes them', () => {
    const pair = (): never => {
      throw new MultipleInvalidError([issue('CONVERSION', ['left'], 'bad left'), issue('CONVERSION', ['right'], 'bad right')]);
    };
    const r = define_schema(new Map([[required('p'), pair]])).safe_parse({ p: null });
    if (r.ok) throw new Error('expected failure');
    expect(r.errors.map((e) => e.path)).toEqual([
      ['p', 'left'],
      ['p', 'right'],
    ]);
  });
});

describe('define_schema: to_dto', () => {
  it('applies to_primitive on leaves', () => {
    const schema = define_schema(
      new Map<Marker, RawSchema>([
        [required('price'), decimal()],
        [required('big'), bigint()],
        [required('at'), datetime('yyyy-MM-dd')],
      ]),
    );
    expect(schema.to_dto({ price: new Decimal('1.25'), big: 7n, at: new Date(2024, 0, 31) })).toEqual({
      price: '1.25',
      big: '7',
      at: '2024-01-31',
    });
  });

  it('checks literals before converting back', () => {
    const schema = define_schema(new Map([[required('version'), 2]]));
    expect(schema.to_dto({ version: 2 })).toEqual({ version: 2 });
    const r = schema.safe_to_dto({ version: 3 });
    if (r.ok) throw new Error('expected failure');
    expect(r.errors[0]).toMatchObject({ code: 'LITERAL_MISMATCH', path: ['version'] });
  });
});

describe('define_schema: mock', () => {
  it('is deterministic per seed and survives a to_dto / parse round trip', () => {
    const schema = define_schema(order_fields());
    for (const seed of [0, 1, 2, 3, 42]) {
      const sample = schema.mock(seed);
      expect(schema.mock(seed)).toEqual(sample);
      expect(schema.parse(schema.to_dto(sample))).toEqual(sample);
    }
  });

  it('builds objects through their initializer', () => {
    class Tag {
      label: string;
      constructor(fields: Record<string, unknown>) {
        this.label = String(fields.label);
      }
    }
    expect(define_schema(make_object(Tag, new Map([[required('label'), string()]]))).mock(1)).toBeInstanceOf(Tag);
  });

  it('fails for converters without a mock capability', () => {
    const schema = define_schema(new Map([[required('a'), (v: unknown) => v]]));
    expect(() => schema.mock()).toThrow(SchemaDefinitionError);
  });
});

describe('define_schema: describe / schema_id', () => {
  it('describes a dict in the DSL vocabulary', () => {
    const schema = define_schema(
      new Map<Marker, RawSchema>([
        [required('a', 'b'), string()],
        [inclusive('c', undefined, 'g'), 1],
      ]),
      { extra: Extra.Remove },
    );
    expect(schema.describe()).toEqual({
      type: 'dict',
      extra: 'remove',
      fields: [
        { name: 'a', rename_to: 'b', schema: { type: 'string' } },
        {
          name: 'c',
          presence: 'inclusive',
          monitor: 'g',
          schema: { type: 'literal', converter: { type: 'integer' }, value: 1 },
        },
      ],
    });
  });

  it('gives equal schemas the same id and different schemas different ids', () => {
    const a = define_schema(order_fields());
    const b = define_schema(order_fields());
    const c = define_schema(order_fields(), { extra: Extra.Allow });
    expect(a.schema_id).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(b.schema_id).toBe(a.schema_id);
    expect(c.schema_id).not.toBe(a.schema_id);
  });
});

/**
 * JSON DSL：加载、编译、结构/语义错误与 describe() 回读
 */
import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import { compile_dsl, load_dsl } from '../from-dsl';
import { Extra } from '../../types';

function catalog_dsl() {
  return {
    type: 'dict',
    fields: [
      { name: 'id', schema: { type: 'integer' } },
      { name: 'createdAt', rename_to: 'created_at', schema: { type: 'datetime', format: 'yyyy-MM-dd' } },
      { name: 'price', schema: { type: 'decimal' } },
      { name: 'kind', schema: { type: 'enum', values: ['book', 'dvd'] } },
      { name: 'tags', presence: 'optional', schema: { type: 'list', items: { type: 'string' } } },
      { name: 'dims', presence: 'optional', schema: [{ type: 'number' }, { type: 'number' }] },
      { name: 'meta', presence: 'optional', schema: { type: 'unvalidated_dict' } },
      { name: 'version', schema: 1 },
    ],
  };
}

describe('compile_dsl', () => {
  it('compiles a document into a working schema', () => {
    const out = compile_dsl(catalog_dsl());
    expect(out.ok).toBe(true);
    expect(out.errors).toEqual([]);
    expect(out.schema_id).toMatch(/^sha256:/);
    if (!out.schema) throw new Error('expected a schema');
    expect(out.schema_id).toBe(out.schema.schema_id);

    const value = out.schema.parse({
      id: '5',
      createdAt: '2024-01-31',
      price: '9.99',
      kind: 'dvd',
      tags: ['new'],
      dims: ['1.5', 2],
      version: 1,
    });
    expect(value).toEqual({
      id: 5,
      created_at: new Date(2024, 0, 31),
      price: new Decimal('9.99'),
      kind: 'dvd',
      tags: ['new'],
      dims: [1.5, 2],
      version: 1,
    });
  });

  it('reads back its own description with the same schema_id', () => {
    const first = compile_dsl(catalog_dsl());
    if (!first.schema) throw new Error('expected a schema');
    const again = compile_dsl(first.schema.describe());
    expect(again.ok).toBe(true);
    expect(again.schema_id).toBe(first.schema_id);
  });

  it('applies compile options', () => {
    const doc = { type: 'dict', fields: [{ name: 'a', schema: { type: 'string' } }] };
    const out = compile_dsl(doc, { extra: Extra.Allow });
    expect(out.schema?.parse({ a: 'x', b: 1 })).toEqual({ a: 'x', b: 1 });
    const nested = compile_dsl({ ...doc, extra: 'remove' }, { extra: Extra.Allow });
    expect(nested.schema?.parse({ a: 'x', b: 1 })).toEqual({ a: 'x' });
  });

  it('reports definition errors as SCHEMA_ERROR', () => {
    const out = compile_dsl({
      type: 'dict',
      fields: [
        { name: 'a', schema: 'x' },
        { name: 'a', schema: 'y' },
      ],
    });
    expect(out).toMatchObject({
      ok: false,
      schema: null,
      schema_id: null,
      errors: [{ code: 'SCHEMA_ERROR', path: [], message: "duplicate field 'a' in schema" }],
    });
  });
});

describe('load_dsl: errors', () => {
  it('reports unknown keys', () => {
    expect(load_dsl({ type: 'list', items: { type: 'string' }, extra: 1 })).toEqual({
      ok: false,
      errors: [{ code: 'SCHEMA_ERROR', path: [], message: "Unrecognized key(s) in object: 'extra'" }],
    });
  });

  it('points at the offending field', () => {
    expect(
      load_dsl({ type: 'dict', fields: [{ name: 'a', monitor: 'g', schema: { type: 'string' } }] }),
    ).toEqual({
      ok: false,
      errors: [{ code: 'SCHEMA_ERROR', path: ['fields', 0, 'monitor'], message: 'monitor requires presence=inclusive' }],
    });
  });

  it('rejects an empty enum', () => {
    expect(load_dsl({ type: 'enum', values: [] })).toEqual({
      ok: false,
      errors: [{ code: 'SCHEMA_ERROR', path: ['values'], message: 'enum 至少需要一个值' }],
    });
  });

  it('checks literal values against their converter', () => {
    expect(load_dsl({ type: 'literal', converter: { type: 'integer' }, value: 'abc' })).toEqual({
      ok: false,
      errors: [{ code: 'SCHEMA_ERROR', path: ['value'], message: 'expected an integer, got "abc"' }],
    });
  });

  it('checks datetime formats', () => {
    const r = load_dsl({ type: 'list', items: { type: 'datetime', format: 'yyyy-jj' } });
    if (r.ok) throw new Error('expected failure');
    expect(r.errors).toHaveLength(1);
    expect(r.errors[0]).toMatchObject({ code: 'SCHEMA_ERROR', path: ['items', 'format'] });
  });
});

/**
 * compile() 的单元测试
 *
 * 覆盖：
 * - 分派规则：原生字面量 / 包装器 / 标量 / 转换器
 * - extra 策略的继承与覆盖
 * - SchemaDefinitionError：无法分类的输入、重名字段、非字面量枚举成员、对象初始化器
 */
import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import { compile } from './index';
import { inclusive, optional, required, type Marker } from '../ast/markers';
import { NodeKind, type CompiledNode } from '../ast/nodes';
import {
  dict,
  enum_of,
  fixed_list,
  list,
  literal,
  make_object,
  unvalidated_dict,
  type RawSchema,
} from '../ast/wrappers';
import { string, integer } from '../converters';
import { SchemaDefinitionError } from '../errors';
import { Extra } from '../types';

function kind_of(node: CompiledNode) {
  return node.kind;
}

// JS 调用方可以传入任意值，这里绕过 RawSchema 的静态类型
const compile_raw = (raw: unknown): CompiledNode => Reflect.apply(compile, undefined, [raw]);

class Point {
  x = 0;
  y = 0;
  constructor(fields: Record<string, unknown> = {}) {
    this.x = Number(fields.x ?? 0);
    this.y = Number(fields.y ?? 0);
  }
  assign(fields: Record<string, unknown>) {
    this.x = Number(fields.x);
    this.y = Number(fields.y);
  }
}

describe('compile: dispatch', () => {
  it('compiles a Map of markers into a dict node in declaration order', () => {
    const node = compile(new Map<Marker, RawSchema>([
      [required('b'), string()],
      [optional('a', 'alpha'), integer()],
    ]));

    expect(node.kind).toBe(NodeKind.Dict);
    if (node.kind !== NodeKind.Dict) return;
    expect(node.fields.map((f) => f.marker.name)).toEqual(['b', 'a']);
    expect(node.fields[1].marker.rename_to).toBe('alpha');
    expect(node.extra).toBe(Extra.Prevent);
    expect(node.enforce_inclusive).toBe(false);
  });

  it('compiles arrays into fixed lists and list() into a single shared child', () => {
    const fixed = compile([string(), 1]);
    expect(fixed.kind).toBe(NodeKind.FixedList);
    if (fixed.kind === NodeKind.FixedList) {
      expect(fixed.items.map(kind_of)).toEqual([NodeKind.Callable, NodeKind.Literal]);
    }

    expect(compile(fixed_list([string()])).kind).toBe(NodeKind.FixedList);

    const seq = compile(list(integer()));
    expect(seq.kind).toBe(NodeKind.List);
    if (seq.kind === NodeKind.List) expect(seq.item.kind).toBe(NodeKind.Callable);
  });

  it('turns scalars into implicit literals with the scalar as expected value', () => {
    for (const value of ['x', 3, 1.5, true, 7n, new Decimal('2.50')]) {
      const node = compile(value);
      expect(node.kind).toBe(NodeKind.Literal);
      if (node.kind === NodeKind.Literal) expect(node.value).toBe(value);
    }
  });

  it('uses the integer converter for whole numbers and number for fractions', () => {
    const whole = compile(3);
    const frac = compile(1.5);
    if (whole.kind !== NodeKind.Literal || frac.kind !== NodeKind.Literal) throw new Error('expected literals');
    expect(whole.converter.label).toBe('integer');
    expect(frac.converter.label).toBe('number');
  });

  it('compiles Set and enum_of() into enum nodes of literals', () => {
    const a = compile(new Set<RawSchema>([6, 'VI']));
    const b = compile(enum_of([literal(integer(), 6), literal(string(), 'VI')]));
    for (const node of [a, b]) {
      expect(node.kind).toBe(NodeKind.Enum);
      if (node.kind === NodeKind.Enum) expect(node.values.map((v) => v.value)).toEqual([6, 'VI']);
    }
  });

  it('treats any other function as a converter', () => {
    const upper = (v: unknown) => String(v).toUpperCase();
    const node = compile(upper);
    expect(node.kind).toBe(NodeKind.Callable);
    if (node.kind === NodeKind.Callable) expect(node.converter).toBe(upper);
  });

  it('compiles an empty plain object and unvalidated_dict()', () => {
    const empty = compile_raw({});
    expect(empty.kind).toBe(NodeKind.Dict);
    if (empty.kind === NodeKind.Dict) expect(empty.fields).toEqual([]);
    expect(compile(unvalidated_dict())).toEqual({ kind: NodeKind.Opaque, container: 'dict' });
  });

  it('resolves object initializers at compile time', () => {
    const by_ctor = compile(make_object(Point, new Map([[required('x'), integer()]])));
    const by_name = compile(make_object(Point, new Map([[required('x'), integer()]]), 'assign'));
    const by_fn = compile(make_object(Point, new Map([[required('x'), integer()]]), Point.prototype.assign));

    if (by_ctor.kind !== NodeKind.Object || by_name.kind !== NodeKind.Object || by_fn.kind !== NodeKind.Object) {
      throw new Error('expected object nodes');
    }
    expect(by_ctor.initializer).toEqual({ mode: 'constructor' });
    expect(by_name.initializer).toMatchObject({ mode: 'method', name: 'assign' });
    expect(by_fn.initializer).toMatchObject({ mode: 'method', name: 'assign' });
  });
});

describe('compile: extra policy', () => {
  it('inherits the root policy and lets dict() override it for its subtree', () => {
    const node = compile(
      new Map<Marker, RawSchema>([
        [required('outer'), new Map([[required('a'), string()]])],
        [
          required('inner'),
          dict([[required('deep'), new Map([[required('b'), string()]])]], { extra: Extra.Remove }),
        ],
      ]),
      { extra: Extra.Allow, enforce_inclusive: true },
    );

    if (node.kind !== NodeKind.Dict) throw new Error('expected dict');
    const [outer, inner] = node.fields.map((f) => f.node);
    if (outer.kind !== NodeKind.Dict || inner.kind !== NodeKind.Dict) throw new Error('expected dicts');
    const deep = inner.fields[0].node;
    if (deep.kind !== NodeKind.Dict) throw new Error('expected dict');

    expect(node.extra).toBe(Extra.Allow);
    expect(outer.extra).toBe(Extra.Allow);
    expect(inner.extra).toBe(Extra.Remove);
    expect(deep.extra).toBe(Extra.Remove);
    expect(deep.enforce_inclusive).toBe(true);
  });
});

describe('compile: definition errors', () => {
  it('rejects non-marker keys', () => {
    expect(() => compile_raw({ name: string() })).toThrow(SchemaDefinitionError);
    expect(() => compile_raw({ name: string() })).toThrow("keys in schema should be markers, got 'name' (use a Map or dict())");
    expect(() => compile_raw(new Map([['name', string()]]))).toThrow(
      'keys in schema should be markers, got "name"',
    );
  });

  it('rejects duplicate names and duplicate targets', () => {
    expect(() => compile(dict([[required('a'), string()], [optional('a'), string()]]))).toThrow(
      "duplicate field 'a' in schema",
    );
    expect(() => compile(dict([[required('a', 'x'), string()], [inclusive('b', 'x'), string()]]))).toThrow(
      "more than one field is renamed to 'x'",
    );
  });

  it('rejects non-literal enum members and empty enums', () => {
    expect(() => compile(enum_of([string()]))).toThrow('only literal values supported in enum, got callable');
    expect(() => compile(enum_of([]))).toThrow('enum requires at least one value');
  });

  it('rejects values that cannot be classified', () => {
    expect(() => compile_raw(null)).toThrow('null is not a valid value in schema');
    expect(() => compile(Number.NaN)).toThrow('NaN is not a valid literal in schema');
    expect(() => compile_raw(required('a'))).toThrow("marker 'a' can only be used as a dictionary key");
  });

  it('rejects unknown initializers', () => {
    const fields = new Map([[required('x'), integer()]]);
    expect(() => compile(make_object(Point, fields, 'missing'))).toThrow('Point does not have a method named missing');
    function stray(this: Point) {
      this.x = 1;
    }
    expect(() => compile(make_object(Point, fields, stray))).toThrow('stray is not a Point method');
  });

  it('rejects an object target that is not a class', () => {
    const raw = { ...make_object(Point, new Map([[required('x'), integer()]])), target: null };
    expect(() => compile_raw(raw)).toThrow(SchemaDefinitionError);
    expect(() => compile_raw(raw)).toThrow('expected a class for make_object()');
  });
});

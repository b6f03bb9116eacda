import { inclusive, optional, required, type Marker } from '../ast/markers';
import {
  dict,
  enum_of,
  fixed_list,
  list,
  literal,
  unvalidated_dict,
  unvalidated_list,
  type RawSchema,
} from '../ast/wrappers';
import { boolean, datetime, decimal, integer, number, string } from '../converters';
import { create_schema } from '../engine';
import { ConversionError, SchemaDefinitionError, issue } from '../errors';
import { flatten_zod_issues, parse_dsl, type DslField, type DslLeaf, type DslNode } from '../schema';
import {
  Extra,
  type CompileOptions,
  type CompileOutput,
  type Converter,
  type EvalResult,
  type PathSegment,
  type ValidationIssue,
} from '../types';
import { compile } from './index';

type AddIssue = (path: PathSegment[], message: string) => void;

/**
 * 读取 JSON DSL，生成编写期 schema（尚未编译）
 * - 结构错误：zod 校验，逐条转成 SCHEMA_ERROR
 * - 语义错误：字面量值无法被其转换器接受、datetime 格式非法等，同样为 SCHEMA_ERROR
 */
export function load_dsl(input: unknown): EvalResult<RawSchema> {
  const result = parse_dsl(input);
  if (!result.success) {
    return {
      ok: false,
      errors: flatten_zod_issues(result.error.issues).map((e) => issue('SCHEMA_ERROR', [...e.path], e.message)),
    };
  }

  const errors: ValidationIssue[] = [];
  const add_issue: AddIssue = (path, message) => errors.push(issue('SCHEMA_ERROR', path, message));
  const raw = build_node(result.data, [], add_issue);
  return errors.length ? { ok: false, errors } : { ok: true, value: raw };
}

/**
 * DSL → 编译 → schema，一步到位；不抛出，失败信息都在 errors 中
 */
export function compile_dsl(input: unknown, options: CompileOptions = {}): CompileOutput {
  // 记时
  const t0 = Date.now();
  const failed = (errors: ValidationIssue[]): CompileOutput => ({
    ok: false,
    schema: null,
    schema_id: null,
    errors,
    time_ms: Date.now() - t0,
  });

  const loaded = load_dsl(input);
  if (!loaded.ok) return failed(loaded.errors);

  try {
    const schema = create_schema(compile(loaded.value, options));
    return { ok: true, schema, schema_id: schema.schema_id, errors: [], time_ms: Date.now() - t0 };
  } catch (e) {
    if (e instanceof SchemaDefinitionError) return failed([issue('SCHEMA_ERROR', [], e.message)]);
    throw e;
  }
}

function build_node(node: DslNode, path: PathSegment[], add_issue: AddIssue): RawSchema {
  if (typeof node === 'string' || typeof node === 'number' || typeof node === 'boolean') return node;
  if (Array.isArray(node)) return node.map((item, i) => build_node(item, [...path, i], add_issue));

  switch (node.type) {
    case 'string':
    case 'integer':
    case 'number':
    case 'decimal':
    case 'boolean':
    case 'datetime':
      return build_leaf(node, path, add_issue);
    case 'literal': {
      const converter = build_leaf(node.converter, [...path, 'converter'], add_issue);
      // 期望值按转换器转成 native（decimal → Decimal，datetime → Date）
      try {
        return literal(converter, converter(node.value));
      } catch (e) {
        add_issue([...path, 'value'], e instanceof ConversionError ? e.message : String(e));
        return literal(converter, node.value);
      }
    }
    case 'dict': {
      const entries = node.fields.map((f, i): [Marker, RawSchema] => [
        build_marker(f),
        build_node(f.schema, [...path, 'fields', i, 'schema'], add_issue),
      ]);
      return dict(entries, { extra: node.extra === undefined ? undefined : to_extra(node.extra) });
    }
    case 'list':
      return list(build_node(node.items, [...path, 'items'], add_issue));
    case 'fixed_list':
      return fixed_list(node.items.map((item, i) => build_node(item, [...path, 'items', i], add_issue)));
    case 'enum':
      return enum_of(node.values.map((v, i) => build_node(v, [...path, 'values', i], add_issue)));
    case 'unvalidated_dict':
      return unvalidated_dict();
    case 'unvalidated_list':
      return unvalidated_list();
  }
}

function build_leaf(leaf: DslLeaf, path: PathSegment[], add_issue: AddIssue): Converter {
  switch (leaf.type) {
    case 'string':
      return string();
    case 'integer':
      return integer();
    case 'number':
      return number();
    case 'decimal':
      return decimal();
    case 'boolean':
      return boolean({ strict: leaf.strict });
    case 'datetime':
      try {
        return datetime(leaf.format);
      } catch (e) {
        if (!(e instanceof SchemaDefinitionError)) throw e;
        add_issue([...path, 'format'], e.message);
        return datetime();
      }
  }
}

function build_marker(field: DslField): Marker {
  switch (field.presence ?? 'required') {
    case 'required':
      return required(field.name, field.rename_to);
    case 'optional':
      return optional(field.name, field.rename_to);
    case 'inclusive':
      return inclusive(field.name, field.rename_to, field.monitor);
  }
}

function to_extra(extra: 'prevent' | 'allow' | 'remove'): Extra {
  switch (extra) {
    case 'prevent':
      return Extra.Prevent;
    case 'allow':
      return Extra.Allow;
    case 'remove':
      return Extra.Remove;
  }
}

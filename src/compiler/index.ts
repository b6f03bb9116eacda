import { is_marker, type Marker } from '../ast/markers';
import {
  NodeKind,
  create_callable_node,
  create_dict_node,
  create_enum_node,
  create_fixed_list_node,
  create_literal_node,
  create_list_node,
  create_object_node,
  create_opaque_node,
  type CompiledNode,
  type DictField,
  type DictNode,
  type LiteralNode,
} from '../ast/nodes';
import { is_wrapper, type RawSchema } from '../ast/wrappers';
import { SchemaDefinitionError } from '../errors';
import { Extra, type CompileOptions, type Converter } from '../types';
import { describe_value } from '../utils/path.util';
import { is_plain_object } from '../utils/value.util';
import { resolve_initializer } from './object';
import { implicit_literal, is_scalar } from './scalar';

/** 递归编译时向下传递的上下文 */
interface CompileContext {
  /** 当前生效的 extra 策略（外层继承，dict({ extra }) 覆盖） */
  extra: Extra;
  enforce_inclusive: boolean;
}

/**
 * 把用户编写的 schema 编译成不可变的节点树。
 * 编译只做一次，产物可被任意多次求值复用。
 * @throws {SchemaDefinitionError} schema 本身写错时
 */
export function compile(raw: RawSchema, options: CompileOptions = {}): CompiledNode {
  return compile_node(raw, {
    extra: options.extra ?? Extra.Prevent,
    enforce_inclusive: options.enforce_inclusive ?? false,
  });
}

/**
 * 分派规则（按优先级）：
 *  1. Map → dict（键必须是 marker）
 *  2. 数组 → 定长列表
 *  3. 显式包装器（dict / list / fixed_list / literal / enum / object / opaque）
 *  4. 标量与 Decimal → 隐式字面量
 *  5. Set → 枚举
 *  6. 其它函数 → 转换器
 *  7. 其余（marker、非空普通对象等）→ SchemaDefinitionError；空对象视为空 dict
 */
function compile_node(raw: unknown, ctx: CompileContext): CompiledNode {
  if (raw instanceof Map) return compile_fields(raw, ctx);
  if (Array.isArray(raw)) return create_fixed_list_node(raw.map((item) => compile_node(item, ctx)));

  if (is_wrapper(raw)) {
    switch (raw.kind) {
      case NodeKind.Dict:
        return compile_fields(raw.fields, { ...ctx, extra: raw.extra ?? ctx.extra });
      case NodeKind.List:
        return create_list_node(compile_node(raw.item, ctx));
      case NodeKind.FixedList:
        return create_fixed_list_node(raw.items.map((item) => compile_node(item, ctx)));
      case NodeKind.Literal:
        if (typeof raw.converter !== 'function') {
          throw new SchemaDefinitionError(`literal converter must be a function, got ${describe_value(raw.converter)}`);
        }
        return create_literal_node(raw.converter, raw.value);
      case NodeKind.Enum:
        return compile_enum(raw.values, ctx);
      case NodeKind.Object: {
        const fields = raw.fields instanceof Map
          ? compile_fields(raw.fields, ctx)
          : raw.fields.kind === NodeKind.Dict
            ? compile_fields(raw.fields.fields, { ...ctx, extra: raw.fields.extra ?? ctx.extra })
            : null;
        if (!fields) throw new SchemaDefinitionError('make_object() expects a dictionary of fields');
        return create_object_node(raw.target, fields, resolve_initializer(raw.target, raw.initializer));
      }
      case NodeKind.Opaque:
        return create_opaque_node(raw.container);
    }
  }

  if (is_scalar(raw)) return implicit_literal(raw);
  if (raw instanceof Set) return compile_enum([...raw], ctx);
  if (is_converter(raw)) return create_callable_node(raw);

  if (is_marker(raw)) {
    throw new SchemaDefinitionError(`marker '${raw.name}' can only be used as a dictionary key`);
  }
  if (is_plain_object(raw)) {
    const keys = Object.keys(raw);
    if (keys.length === 0) return create_dict_node([], ctx.extra, ctx.enforce_inclusive);
    throw new SchemaDefinitionError(`keys in schema should be markers, got '${keys[0]}' (use a Map or dict())`);
  }
  throw new SchemaDefinitionError(`${describe_value(raw)} is not a valid value in schema`);
}

function is_converter(value: unknown): value is Converter {
  return typeof value === 'function';
}

/**
 * 编译映射字段：
 * - 每个键必须是 marker
 * - 同一映射内 name 不可重复，rename_to 也不可重复
 */
function compile_fields(fields: Map<unknown, unknown>, ctx: CompileContext): DictNode {
  const names = new Set<string>();
  const targets = new Set<string>();
  const compiled: DictField[] = [];

  for (const [key, value] of fields) {
    if (!is_marker(key)) {
      throw new SchemaDefinitionError(`keys in schema should be markers, got ${describe_value(key)}`);
    }
    assert_unique(key, names, targets);
    compiled.push({ marker: key, node: compile_node(value, ctx) });
  }
  return create_dict_node(compiled, ctx.extra, ctx.enforce_inclusive);
}

function assert_unique(marker: Marker, names: Set<string>, targets: Set<string>) {
  if (names.has(marker.name)) {
    throw new SchemaDefinitionError(`duplicate field '${marker.name}' in schema`);
  }
  if (targets.has(marker.rename_to)) {
    throw new SchemaDefinitionError(`more than one field is renamed to '${marker.rename_to}'`);
  }
  names.add(marker.name);
  targets.add(marker.rename_to);
}

/**
 * 枚举：每个成员必须编译为字面量
 */
function compile_enum(values: readonly unknown[], ctx: CompileContext): CompiledNode {
  if (values.length === 0) {
    throw new SchemaDefinitionError('enum requires at least one value');
  }
  const literals: LiteralNode[] = values.map((v) => {
    const node = compile_node(v, ctx);
    if (node.kind !== NodeKind.Literal) {
      throw new SchemaDefinitionError(`only literal values supported in enum, got ${node.kind}`);
    }
    return node;
  });
  return create_enum_node(literals);
}

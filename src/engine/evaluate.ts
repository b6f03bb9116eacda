import {
  NodeKind,
  type CompiledNode,
  type EnumNode,
  type FixedListNode,
  type ListNode,
  type LiteralNode,
  type OpaqueNode,
} from '../ast/nodes';
import { issue, prefix_issues } from '../errors';
import type { Direction, EvalResult, ValidationIssue } from '../types';
import { describe_value } from '../utils/path.util';
import { is_plain_object, same_value } from '../utils/value.util';
import { evaluate_dict } from './dict';
import { convert } from './leaf';
import { instantiate, read_fields } from './object';
import { fail, ok } from './result';

/**
 * 对编译节点求值。
 * 数据错误以 { ok:false, errors } 返回而不是抛出；同一次求值会尽量收集全部错误。
 * @param direction to_native（默认）解析输入；to_dto 把 native 值转回可序列化形态
 */
export function evaluate(node: CompiledNode, value: unknown, direction: Direction = 'to_native'): EvalResult {
  switch (node.kind) {
    case NodeKind.Literal:
      return evaluate_literal(node, value, direction);
    case NodeKind.Dict:
      return evaluate_dict(node, value, direction, evaluate);
    case NodeKind.List:
      return evaluate_list(node, value, direction);
    case NodeKind.FixedList:
      return evaluate_fixed_list(node, value, direction);
    case NodeKind.Enum:
      return evaluate_enum(node, value, direction);
    case NodeKind.Object: {
      if (direction === 'to_dto') {
        const fields = read_fields(node, value);
        return fields.ok ? evaluate_dict(node.fields, fields.value, direction, evaluate) : fields;
      }
      const fields = evaluate_dict(node.fields, value, direction, evaluate);
      return fields.ok ? instantiate(node, fields.value) : fields;
    }
    case NodeKind.Opaque:
      return evaluate_opaque(node, value);
    case NodeKind.Callable:
      return convert(node.converter, value, direction);
  }
}

/**
 * 字面量
 * - to_native：先转换，再与期望值比较
 * - to_dto：先比较，再 to_primitive
 */
function evaluate_literal(node: LiteralNode, value: unknown, direction: Direction): EvalResult {
  const equals = node.converter.equals ?? same_value;
  const mismatch = (actual: unknown) =>
    fail([
      issue('LITERAL_MISMATCH', [], `${describe_value(actual)} is not equal to ${describe_value(node.value)}`, {
        expected: describe_value(node.value),
        actual: describe_value(actual),
      }),
    ]);

  if (direction === 'to_dto') {
    return equals(value, node.value) ? convert(node.converter, value, direction) : mismatch(value);
  }
  const r = convert(node.converter, value, direction);
  if (!r.ok) return r;
  return equals(r.value, node.value) ? r : mismatch(r.value);
}

function evaluate_list(node: ListNode, value: unknown, direction: Direction): EvalResult {
  if (!Array.isArray(value)) {
    return fail([issue('NOT_A_SEQUENCE', [], `expected a list, got ${describe_value(value)}`)]);
  }
  const items: unknown[] = value;
  return evaluate_items(items.length, () => node.item, items, direction);
}

/**
 * 定长列表：长度不符时只报一个错误，不再逐项求值
 */
function evaluate_fixed_list(node: FixedListNode, value: unknown, direction: Direction): EvalResult {
  if (!Array.isArray(value)) {
    return fail([issue('NOT_A_SEQUENCE', [], `expected a list, got ${describe_value(value)}`)]);
  }
  if (value.length !== node.items.length) {
    return fail([
      issue('SEQUENCE_LENGTH_MISMATCH', [], `${value.length} length is not equal to ${node.items.length}`, {
        expected: String(node.items.length),
        actual: String(value.length),
      }),
    ]);
  }
  const items: unknown[] = value;
  return evaluate_items(items.length, (i) => node.items[i], items, direction);
}

/**
 * 按下标逐项求值（稀疏数组的空位按 undefined 处理，长度不变）
 */
function evaluate_items(
  length: number,
  node_at: (i: number) => CompiledNode,
  items: readonly unknown[],
  direction: Direction,
): EvalResult {
  const out: unknown[] = [];
  const errors: ValidationIssue[] = [];
  for (let i = 0; i < length; i++) {
    const r = evaluate(node_at(i), items[i], direction);
    if (r.ok) out.push(r.value);
    else errors.push(...prefix_issues(i, r.errors));
  }
  return errors.length ? fail(errors) : ok(out);
}

/**
 * 枚举：按声明顺序尝试，第一个成功者胜出；全部失败只报一个 ENUM_NO_MATCH
 */
function evaluate_enum(node: EnumNode, value: unknown, direction: Direction): EvalResult {
  for (const literal of node.values) {
    const r = evaluate_literal(literal, value, direction);
    if (r.ok) return r;
  }
  return fail([
    issue('ENUM_NO_MATCH', [], `value ${describe_value(value)} doesn't match any enum value`, {
      expected: node.values.map((v) => describe_value(v.value)).join(' | '),
      actual: describe_value(value),
    }),
  ]);
}

/** 不透明容器：只检查容器种类，返回浅拷贝 */
function evaluate_opaque(node: OpaqueNode, value: unknown): EvalResult {
  if (node.container === 'dict') {
    return is_plain_object(value)
      ? ok({ ...value })
      : fail([issue('NOT_A_MAPPING', [], `expected a dictionary, got ${describe_value(value)}`)]);
  }
  return Array.isArray(value)
    ? ok([...value])
    : fail([issue('NOT_A_SEQUENCE', [], `expected a list, got ${describe_value(value)}`)]);
}

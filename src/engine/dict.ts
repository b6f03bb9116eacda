import type { Marker } from '../ast/markers';
import type { CompiledNode, DictField, DictNode } from '../ast/nodes';
import { issue, prefix_issues } from '../errors';
import { Extra, type Direction, type EvalResult, type ValidationIssue } from '../types';
import { describe_value } from '../utils/path.util';
import { is_plain_object, set_own } from '../utils/value.util';
import { fail, ok } from './result';

export type Evaluate = (node: CompiledNode, value: unknown, direction: Direction) => EvalResult;

const has_own = (obj: object, key: string) => Object.prototype.hasOwnProperty.call(obj, key);

/**
 * 源键 / 目标键：to_native 读 name 写 rename_to，to_dto 反之
 */
export function field_keys(marker: Marker, direction: Direction): [source: string, target: string] {
  return direction === 'to_native' ? [marker.name, marker.rename_to] : [marker.rename_to, marker.name];
}

/**
 * 映射求值
 * 1) 输入必须是普通对象，先做浅拷贝
 * 2) 按声明顺序处理每个 marker：存在则求值（错误加上源键前缀），缺失且 required 报 REQUIRED_FIELD_MISSING
 * 3) enforce_inclusive 时检查 inclusive 分组
 * 4) 剩余键按 extra 策略处理
 * 所有问题都会收集，不在第一个错误处停止。
 */
export function evaluate_dict(
  node: DictNode,
  value: unknown,
  direction: Direction,
  evaluate: Evaluate,
): EvalResult<Record<string, unknown>> {
  if (!is_plain_object(value)) {
    return fail([issue('NOT_A_MAPPING', [], `expected a dictionary, got ${describe_value(value)}`)]);
  }

  const remaining: Record<string, unknown> = { ...value };
  const result: Record<string, unknown> = {};
  const errors: ValidationIssue[] = [];
  const present = new Set<Marker>();

  for (const { marker, node: child } of node.fields) {
    const [source, target] = field_keys(marker, direction);
    if (!has_own(remaining, source)) {
      if (marker.presence === 'required') {
        errors.push(issue('REQUIRED_FIELD_MISSING', [source], 'required field is missing'));
      }
      continue;
    }
    const raw = remaining[source];
    delete remaining[source];
    present.add(marker);

    const r = evaluate(child, raw, direction);
    if (r.ok) set_own(result, target, r.value);
    else errors.push(...prefix_issues(source, r.errors));
  }

  if (node.enforce_inclusive) {
    errors.push(...check_inclusive(node.fields, present, direction));
  }

  for (const key of Object.keys(remaining)) {
    switch (node.extra) {
      case Extra.Prevent:
        errors.push(issue('UNKNOWN_FIELD', [key], 'extra keys not allowed'));
        break;
      case Extra.Allow:
        if (has_own(result, key)) {
          errors.push(issue('KEY_POPULATE_CONFLICT', [key], 'tried to populate key that already exists'));
        } else {
          set_own(result, key, remaining[key]);
        }
        break;
      case Extra.Remove:
        break;
    }
  }

  return errors.length ? fail(errors) : ok(result);
}

/**
 * inclusive 分组：同一 monitor 下出现了一部分字段时，缺失的每个字段各报一次
 */
function check_inclusive(
  fields: readonly DictField[],
  present: ReadonlySet<Marker>,
  direction: Direction,
): ValidationIssue[] {
  const groups = new Map<string, Marker[]>();
  for (const { marker } of fields) {
    if (marker.presence !== 'inclusive') continue;
    const group = marker.monitor ?? '';
    groups.set(group, [...(groups.get(group) ?? []), marker]);
  }

  const out: ValidationIssue[] = [];
  for (const [group, members] of groups) {
    const missing = members.filter((m) => !present.has(m));
    if (missing.length === 0 || missing.length === members.length) continue;
    for (const m of missing) {
      const [source] = field_keys(m, direction);
      out.push(
        issue('INCLUSIVE_FIELD_MISSING', [source], 'some but not all values in the same group of inclusion', {
          hint: `group '${group}': ${members.map((x) => field_keys(x, direction)[0]).join(', ')}`,
        }),
      );
    }
  }
  return out;
}

import type { ObjectNode } from '../ast/nodes';
import { issue } from '../errors';
import type { EvalResult } from '../types';
import { describe_value } from '../utils/path.util';
import { set_own } from '../utils/value.util';
import { fail, ok } from './result';

/**
 * 用已校验的字段构造实例
 * - constructor：new target(fields)
 * - method：无参 new target()，再以实例为 this 调用 method(fields)
 * 初始化器抛出的任何异常都变成 OBJECT_INVALID。
 */
export function instantiate(node: ObjectNode, fields: Record<string, unknown>): EvalResult {
  const { target, initializer } = node;
  try {
    if (initializer.mode === 'constructor') return ok(new target(fields));
    const instance: unknown = Reflect.construct(target, []);
    Reflect.apply(initializer.method, instance, [fields]);
    return ok(instance);
  } catch (e) {
    return fail([
      issue('OBJECT_INVALID', [], `cannot construct ${target.name}: ${e instanceof Error ? e.message : String(e)}`),
    ]);
  }
}

/**
 * to_dto：从实例上按 rename_to 读出已声明的字段（值为 undefined 视为缺失）
 */
export function read_fields(node: ObjectNode, value: unknown): EvalResult<Record<string, unknown>> {
  if (!(value instanceof node.target)) {
    return fail([
      issue('OBJECT_INVALID', [], `expected an instance of ${node.target.name}, got ${describe_value(value)}`),
    ]);
  }
  const fields: Record<string, unknown> = {};
  for (const { marker } of node.fields.fields) {
    const v: unknown = Reflect.get(value, marker.rename_to);
    if (v !== undefined) set_own(fields, marker.rename_to, v);
  }
  return ok(fields);
}

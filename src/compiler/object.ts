import type { ObjectTarget, ResolvedInitializer } from '../ast/nodes';
import { SchemaDefinitionError } from '../errors';

/**
 * 在编译期解析对象初始化器（而不是等到求值期才发现拼写错误）
 * - 省略 / 'constructor'：new target(fields)
 * - 方法名：原型上必须存在同名函数
 * - 函数：必须能在 target 的原型链上找到
 */
export function resolve_initializer(
  target: ObjectTarget,
  initializer: string | Function | undefined,
): ResolvedInitializer {
  if (typeof target !== 'function') {
    throw new SchemaDefinitionError('expected a class for make_object()');
  }
  const proto: unknown = target.prototype;
  if (typeof proto !== 'object' || proto === null) {
    throw new SchemaDefinitionError('expected a class for make_object()');
  }
  if (initializer === undefined || initializer === 'constructor') {
    return { mode: 'constructor' };
  }
  if (typeof initializer === 'string') {
    const method: unknown = Reflect.get(proto, initializer);
    if (typeof method !== 'function') {
      throw new SchemaDefinitionError(`${target.name} does not have a method named ${initializer}`);
    }
    return { mode: 'method', name: initializer, method };
  }
  if (typeof initializer === 'function') {
    if (!on_prototype_chain(proto, initializer)) {
      throw new SchemaDefinitionError(`${initializer.name || 'function'} is not a ${target.name} method`);
    }
    return { mode: 'method', name: initializer.name, method: initializer };
  }
  throw new SchemaDefinitionError(`expected a ${target.name} method or method name`);
}

function on_prototype_chain(proto: object, fn: Function): boolean {
  for (let p: object | null = proto; p !== null && p !== Object.prototype; p = Object.getPrototypeOf(p)) {
    for (const name of Object.getOwnPropertyNames(p)) {
      if (Object.getOwnPropertyDescriptor(p, name)?.value === fn) return true;
    }
  }
  return false;
}

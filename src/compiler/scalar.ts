import { Decimal } from 'decimal.js';
import { create_literal_node, type LiteralNode } from '../ast/nodes';
import type { Scalar } from '../ast/wrappers';
import { bigint, boolean, decimal, integer, number, string } from '../converters';
import { SchemaDefinitionError } from '../errors';

export function is_scalar(value: unknown): value is Scalar | Decimal {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return true;
    default:
      return Decimal.isDecimal(value);
  }
}

/**
 * 直接写在 schema 里的标量 → 隐式字面量：
 * 转换器为“转成该标量自身的类型”，期望值为标量本身。
 * 整数 number 用 integer()，其余 number 用 number()。
 */
export function implicit_literal(value: Scalar | Decimal): LiteralNode {
  if (typeof value === 'string') return create_literal_node(string(), value);
  if (typeof value === 'boolean') return create_literal_node(boolean(), value);
  if (typeof value === 'bigint') return create_literal_node(bigint(), value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SchemaDefinitionError(`${value} is not a valid literal in schema`);
    }
    return create_literal_node(Number.isInteger(value) ? integer() : number(), value);
  }
  return create_literal_node(decimal(), value);
}

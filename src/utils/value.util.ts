import { Decimal } from 'decimal.js';

/**
 * 映射形态的输入：原型为 Object.prototype 或 null 的普通对象
 */
export function is_plain_object(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * 写入自有属性；'__proto__' 这类键也落在结果对象上，不触发原型 setter
 */
export function set_own(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * 字面量比较：Decimal 按数值，Date 按时间戳，其余用 ===（0 与 -0 相等，NaN 等于 NaN）
 */
export function same_value(a: unknown, b: unknown): boolean {
  if (Decimal.isDecimal(a) && Decimal.isDecimal(b)) return a.equals(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a)) return Number.isNaN(b);
  return a === b;
}

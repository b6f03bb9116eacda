import { ConversionError, MultipleInvalidError, issue } from '../errors';
import type { Converter, Direction, EvalResult } from '../types';
import { fail, ok } from './result';

/**
 * 叶子边界：执行一次用户转换，并把抛出的异常统一成问题列表
 * - ConversionError → CONVERSION（保留其 message / expected / actual）
 * - MultipleInvalidError → 原样保留内部问题（路径由外层继续加前缀）
 * - 其它任何异常 → CONVERSION "error converting value"，原始信息放进 hint
 */
export function run_leaf<T>(fn: () => T): EvalResult<T> {
  try {
    return ok(fn());
  } catch (e) {
    if (e instanceof ConversionError) {
      return fail([issue('CONVERSION', [], e.message, { expected: e.expected, actual: e.actual })]);
    }
    if (e instanceof MultipleInvalidError) return fail(e.errors);
    return fail([
      issue('CONVERSION', [], 'error converting value', { hint: e instanceof Error ? e.message : String(e) }),
    ]);
  }
}

/**
 * 按方向调用转换器：to_native 调用本体，to_dto 调用 to_primitive（缺省原样返回）
 */
export function convert(converter: Converter, value: unknown, direction: Direction): EvalResult {
  if (direction === 'to_native') return run_leaf(() => converter(value));
  const { to_primitive } = converter;
  return run_leaf(() => (to_primitive ? to_primitive.call(converter, value) : value));
}

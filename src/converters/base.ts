import type { Converter } from '../types/converter.type';

type Capabilities<T> = Omit<Converter<T>, 'label'>;

/**
 * 把一元函数包装为带能力属性的转换器
 * @param label 诊断名
 * @param fn 转换函数（失败时抛 ConversionError）
 * @param caps 可选能力（to_primitive / mock / equals / descriptor）
 */
export function create_converter<T>(
  label: string,
  fn: (value: unknown) => T,
  caps: Capabilities<T> = {},
): Converter<T> {
  const converter = (value: unknown): T => fn(value);
  return Object.assign(converter, caps, { label });
}

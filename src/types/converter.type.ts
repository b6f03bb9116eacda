import type { DslLeaf } from '../schema';
import type { Rng } from '../utils/rng.util';

/**
 * 叶子转换器协议：一元函数，失败时抛出 ConversionError。
 * 其余属性均为可选能力，供反向序列化 / mock / 描述使用。
 */
export interface Converter<T = unknown> {
  (value: unknown): T;
  /** 诊断与描述中使用的名字 */
  label?: string;
  /** 可回写为 DSL 的描述 */
  descriptor?: DslLeaf;
  /** 反向转换（to_dto）；缺省时原样返回 */
  to_primitive?(value: T): unknown;
  /** 生成一个样例值（native 形态） */
  mock?(rng: Rng): T;
  /** 字面量比较；缺省时使用 same_value */
  equals?(a: unknown, b: unknown): boolean;
}

import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  编译 / 求值（选项 / 结果）
 * ---------------------------*/

/**
 * 未声明键的处理策略：
 * - prevent: 每个多余键报 UNKNOWN_FIELD
 * - allow: 原样拷贝到结果
 * - remove: 静默丢弃
 */
export enum Extra {
  Prevent = 'prevent',
  Allow = 'allow',
  Remove = 'remove',
}

/** 编译选项 */
export interface CompileOptions {
  /** 根节点的 extra 策略（默认 prevent），被内层 dict({ extra }) 覆盖。 */
  extra?: Extra;
  /**
   * 是否强制 inclusive 分组：同组字段出现一部分时，缺失者报 INCLUSIVE_FIELD_MISSING。
   * 默认关闭（inclusive 仅作记录）。
   */
  enforce_inclusive?: boolean;
}

/** 求值方向：to_native 为解析输入，to_dto 为反向序列化。 */
export type Direction = 'to_native' | 'to_dto';

/** 单次求值结果（成功值或非空错误列表） */
export type EvalResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationIssue[] };

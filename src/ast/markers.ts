/** marker 的品牌符号，用于区分普通对象 */
export const MARKER_BRAND: unique symbol = Symbol('dtocast.marker');

/**
 * 字段出现要求：
 * - required: 缺失即报 REQUIRED_FIELD_MISSING
 * - optional: 缺失时跳过
 * - inclusive: 缺失时跳过；同一 monitor 分组可选择性地要求“要么全有，要么全无”
 */
export type Presence = 'required' | 'optional' | 'inclusive';

/**
 * 映射字段描述：源键名、目标键名与出现要求
 */
export interface Marker {
  readonly [MARKER_BRAND]: true;
  /** 输入数据中的键 */
  readonly name: string;
  /** 输出结果中的键（缺省等于 name） */
  readonly rename_to: string;
  readonly presence: Presence;
  /** inclusive 分组名；其它 presence 为 null */
  readonly monitor: string | null;
}

function create_marker(
  name: string,
  rename_to: string | undefined,
  presence: Presence,
  monitor: string | null,
): Marker {
  return { [MARKER_BRAND]: true, name, rename_to: rename_to ?? name, presence, monitor };
}

/**
 * 必填字段
 * @param name 源键
 * @param rename_to 目标键
 */
export function required(name: string, rename_to?: string): Marker {
  return create_marker(name, rename_to, 'required', null);
}

/**
 * 可选字段
 * @param name 源键
 * @param rename_to 目标键
 */
export function optional(name: string, rename_to?: string): Marker {
  return create_marker(name, rename_to, 'optional', null);
}

/**
 * inclusive 字段：同一 monitor 的字段应当同时出现
 * @param name 源键
 * @param rename_to 目标键
 * @param monitor 分组名（缺省为默认分组 ''）
 */
export function inclusive(name: string, rename_to?: string, monitor = ''): Marker {
  return create_marker(name, rename_to, 'inclusive', monitor);
}

export function is_marker(value: unknown): value is Marker {
  return typeof value === 'object' && value !== null && MARKER_BRAND in value;
}

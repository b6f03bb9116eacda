import type { Decimal } from 'decimal.js';
import type { Converter } from '../types/converter.type';
import type { Extra } from '../types/compile.type';
import type { Marker } from './markers';
import { NodeKind, type ObjectTarget, type OpaqueNode } from './nodes';

/** 编写期包装器的品牌符号 */
export const WRAPPER_BRAND: unique symbol = Symbol('dtocast.wrapper');

export type Scalar = string | number | boolean | bigint;

/** 原生映射写法：键为 marker */
export type RawFields = Map<Marker, RawSchema>;

/** dict() 接受的字段写法：Map 或 [marker, schema] 列表 */
export type FieldEntries = RawFields | ReadonlyArray<readonly [Marker, RawSchema]>;

/**
 * 对象初始化器：
 * - 'constructor' 或省略：new target(fields)
 * - 方法名：new target() 后调用该方法
 * - 原型链上的函数：new target() 后以实例为 this 调用
 */
export type Initializer<T = unknown> =
  | 'constructor'
  | string
  | ((this: T, fields: Record<string, unknown>) => void);

interface WrapperBase {
  readonly [WRAPPER_BRAND]: true;
}

export interface RawLiteral extends WrapperBase {
  readonly kind: NodeKind.Literal;
  readonly converter: Converter;
  readonly value: unknown;
}

export interface RawDict extends WrapperBase {
  readonly kind: NodeKind.Dict;
  readonly fields: RawFields;
  /** 省略时继承外层策略 */
  readonly extra?: Extra;
}

export interface RawList extends WrapperBase {
  readonly kind: NodeKind.List;
  readonly item: RawSchema;
}

export interface RawFixedList extends WrapperBase {
  readonly kind: NodeKind.FixedList;
  readonly items: readonly RawSchema[];
}

export interface RawEnum extends WrapperBase {
  readonly kind: NodeKind.Enum;
  readonly values: readonly RawSchema[];
}

export interface RawObject<T extends object = object> extends WrapperBase {
  readonly kind: NodeKind.Object;
  readonly target: ObjectTarget<T>;
  readonly fields: RawFields | RawDict;
  readonly initializer?: string | Function;
}

export interface RawOpaque extends WrapperBase {
  readonly kind: NodeKind.Opaque;
  readonly container: OpaqueNode['container'];
}

export type RawWrapper =
  | RawLiteral
  | RawDict
  | RawList
  | RawFixedList
  | RawEnum
  | RawObject
  | RawOpaque;

/**
 * 用户编写的 schema：原生字面量（Map / 数组 / Set / 标量）、显式包装器或转换函数
 */
export type RawSchema =
  | Scalar
  | Decimal
  | Converter
  | RawWrapper
  | RawFields
  | readonly RawSchema[]
  | Set<RawSchema>;

export function is_wrapper(value: unknown): value is RawWrapper {
  return typeof value === 'object' && value !== null && WRAPPER_BRAND in value;
}

/**
 * 字面量：转换后必须等于 value
 *
 * ```ts
 * define_schema(new Map([[required('aString'), literal(string(), 'hello')]]));
 * ```
 */
export function literal<T>(converter: Converter<T>, value: T): RawLiteral {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.Literal, converter, value };
}

/**
 * 映射：字段按声明顺序求值；extra 覆盖外层策略
 */
export function dict(fields: FieldEntries, options: { extra?: Extra } = {}): RawDict {
  return {
    [WRAPPER_BRAND]: true,
    kind: NodeKind.Dict,
    fields: fields instanceof Map ? fields : new Map(fields),
    extra: options.extra,
  };
}

/**
 * 同构列表：每个元素都符合 item
 */
export function list(item: RawSchema): RawList {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.List, item };
}

/**
 * 定长列表：与直接写数组等价
 */
export function fixed_list(items: readonly RawSchema[]): RawFixedList {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.FixedList, items: [...items] };
}

/**
 * 枚举：成员必须都是字面量，与直接写 Set 等价
 */
export function enum_of(values: Iterable<RawSchema>): RawEnum {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.Enum, values: [...values] };
}

/**
 * 对象构造：fields 校验通过后用 initializer 生成 target 实例
 *
 * ```ts
 * class User {
 *   constructor(public fields: Record<string, unknown>) {}
 * }
 * define_schema(make_object(User, new Map([[required('first_name'), string()]])));
 * ```
 */
export function make_object<T extends object>(
  target: ObjectTarget<T>,
  fields: FieldEntries | RawDict,
  initializer?: Initializer<T>,
): RawObject<T> {
  return {
    [WRAPPER_BRAND]: true,
    kind: NodeKind.Object,
    target,
    fields: is_wrapper(fields) ? fields : dict(fields).fields,
    initializer,
  };
}

/** 只要求是映射，内部不做校验 */
export function unvalidated_dict(): RawOpaque {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.Opaque, container: 'dict' };
}

/** 只要求是列表，内部不做校验 */
export function unvalidated_list(): RawOpaque {
  return { [WRAPPER_BRAND]: true, kind: NodeKind.Opaque, container: 'list' };
}

import type { Converter } from '../types/converter.type';
import type { Extra } from '../types/compile.type';
import type { Marker } from './markers';

/**
 * 节点类型枚举（编写期包装器与编译产物共用）
 */
export enum NodeKind {
  Literal = 'literal',
  Dict = 'dict',
  List = 'list',
  FixedList = 'fixed_list',
  Enum = 'enum',
  Object = 'object',
  Opaque = 'opaque',
  Callable = 'callable',
}

/** make_object 的目标类型：接收字段对象的构造器 */
export type ObjectTarget<T extends object = object> = new (fields: Record<string, unknown>) => T;

/**
 * 对象初始化方式（已在编译期解析完毕）
 * - constructor: new target(fields)
 * - method: new target() 后调用原型上的方法 method(fields)
 */
export type ResolvedInitializer =
  | { mode: 'constructor' }
  | { mode: 'method'; name: string; method: Function };

/**
 * 所有编译节点的基础结构
 */
export interface BaseNode {
  readonly kind: NodeKind;
}

/**
 * 字面量节点：先转换，再与固定值比较
 */
export interface LiteralNode extends BaseNode {
  readonly kind: NodeKind.Literal;
  readonly converter: Converter;
  readonly value: unknown;
}

/**
 * 映射字段：一个 marker 与其子节点
 */
export interface DictField {
  readonly marker: Marker;
  readonly node: CompiledNode;
}

/**
 * 映射节点：按声明顺序处理字段，再按 extra 策略处理多余键
 */
export interface DictNode extends BaseNode {
  readonly kind: NodeKind.Dict;
  readonly fields: readonly DictField[];
  readonly extra: Extra;
  readonly enforce_inclusive: boolean;
}

/**
 * 同构序列节点：每个元素复用同一个子节点
 */
export interface ListNode extends BaseNode {
  readonly kind: NodeKind.List;
  readonly item: CompiledNode;
}

/**
 * 定长异构序列节点：按位置一一对应
 */
export interface FixedListNode extends BaseNode {
  readonly kind: NodeKind.FixedList;
  readonly items: readonly CompiledNode[];
}

/**
 * 枚举节点：依次尝试字面量，首个成功者胜出
 */
export interface EnumNode extends BaseNode {
  readonly kind: NodeKind.Enum;
  readonly values: readonly LiteralNode[];
}

/**
 * 对象构造节点：内部 dict 全部成功后再调用初始化器
 */
export interface ObjectNode extends BaseNode {
  readonly kind: NodeKind.Object;
  readonly target: ObjectTarget;
  readonly fields: DictNode;
  readonly initializer: ResolvedInitializer;
}

/**
 * 不校验内部结构的容器节点（只检查是 dict 还是 list）
 */
export interface OpaqueNode extends BaseNode {
  readonly kind: NodeKind.Opaque;
  readonly container: 'dict' | 'list';
}

/**
 * 任意用户提供的一元转换器
 */
export interface CallableNode extends BaseNode {
  readonly kind: NodeKind.Callable;
  readonly converter: Converter;
}

export type CompiledNode =
  | LiteralNode
  | DictNode
  | ListNode
  | FixedListNode
  | EnumNode
  | ObjectNode
  | OpaqueNode
  | CallableNode;

/**
 * 创建字面量节点
 * @param converter 转换器
 * @param value 期望值
 */
export function create_literal_node(converter: Converter, value: unknown): LiteralNode {
  return { kind: NodeKind.Literal, converter, value };
}

/**
 * 创建映射节点
 * @param fields 字段列表（声明顺序）
 * @param extra 多余键策略
 * @param enforce_inclusive 是否强制 inclusive 分组
 */
export function create_dict_node(
  fields: DictField[],
  extra: Extra,
  enforce_inclusive = false,
): DictNode {
  return { kind: NodeKind.Dict, fields, extra, enforce_inclusive };
}

/**
 * 创建同构序列节点
 * @param item 元素节点
 */
export function create_list_node(item: CompiledNode): ListNode {
  return { kind: NodeKind.List, item };
}

/**
 * 创建定长序列节点
 * @param items 各位置的节点
 */
export function create_fixed_list_node(items: CompiledNode[]): FixedListNode {
  return { kind: NodeKind.FixedList, items };
}

/**
 * 创建枚举节点
 * @param values 候选字面量
 */
export function create_enum_node(values: LiteralNode[]): EnumNode {
  return { kind: NodeKind.Enum, values };
}

/**
 * 创建对象构造节点
 */
export function create_object_node(
  target: ObjectTarget,
  fields: DictNode,
  initializer: ResolvedInitializer,
): ObjectNode {
  return { kind: NodeKind.Object, target, fields, initializer };
}

/**
 * 创建不透明容器节点
 * @param container 期望的容器类型
 */
export function create_opaque_node(container: OpaqueNode['container']): OpaqueNode {
  return { kind: NodeKind.Opaque, container };
}

/**
 * 创建转换器节点
 * @param converter 一元转换函数
 */
export function create_callable_node(converter: Converter): CallableNode {
  return { kind: NodeKind.Callable, converter };
}

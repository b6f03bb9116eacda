import type { CompiledNode } from '../ast/nodes';
import type { EvalResult } from './compile.type';
import type { ValidationIssue } from './issue.type';

/** JSON 描述（与 DSL 同构，额外包含 object / converter 等 DSL 无法表达的节点） */
export type SchemaDescription = { [key: string]: unknown } | unknown[] | string | number | boolean;

/**
 * 编译完成、可复用的 schema
 */
export interface Schema {
  /** 编译产物（只读） */
  readonly node: CompiledNode;
  /** 稳定指纹（sha256:...），由 describe() 的规范化 JSON 计算 */
  readonly schema_id: string;
  /** 解析输入；失败抛出 MultipleInvalidError */
  parse(data: unknown): unknown;
  /** 解析输入；失败返回 { ok:false, errors } */
  safe_parse(data: unknown): EvalResult;
  /** 反向转换（native → DTO）；失败抛出 MultipleInvalidError */
  to_dto(value: unknown): unknown;
  safe_to_dto(value: unknown): EvalResult;
  /** 生成确定性的 native 样例 */
  mock(seed?: number): unknown;
  /** JSON 描述 */
  describe(): SchemaDescription;
}

/** DSL 编译输出（含成功/失败两种分支） */
export interface CompileOutput {
  /** 是否编译成功（成功时 errors 为空） */
  ok: boolean;
  /** 成功时给出 schema；失败为 null */
  schema: Schema | null;
  /** 成功时等于 schema.schema_id；失败为 null */
  schema_id: string | null;
  /** 致命错误列表（失败原因） */
  errors: ValidationIssue[];
  /** 编译耗时（毫秒） */
  time_ms: number;
}

import type { IssueCode, PathSegment, ValidationIssue } from '../types/issue.type';
import { format_issue } from '../utils/path.util';

/**
 * schema 编写错误（编译期抛出，属于程序员错误，不可恢复）
 */
export class SchemaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * 叶子转换器的失败信号；引擎会把它包装成带路径的 CONVERSION 问题
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly expected?: string,
    public readonly actual?: string,
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}

/**
 * 面向调用方的聚合错误：errors 恒为非空，按发现顺序排列
 */
export class MultipleInvalidError extends Error {
  readonly errors: ValidationIssue[];

  constructor(errors: ValidationIssue[]) {
    if (errors.length === 0) {
      throw new RangeError('MultipleInvalidError requires at least one issue');
    }
    super(format_issue(errors[0]));
    this.name = 'MultipleInvalidError';
    this.errors = [...errors];
  }

  /** 全部问题的多行文本 */
  render(): string {
    return this.errors.map(format_issue).join('\n');
  }
}

/** 构造统一的问题对象（求值器/DSL 加载复用） */
export function issue(
  code: IssueCode,
  path: PathSegment[],
  message: string,
  extra: Pick<ValidationIssue, 'expected' | 'actual' | 'hint'> = {},
): ValidationIssue {
  const out: ValidationIssue = { code, path, message };
  // 只保留有值的诊断字段
  if (extra.expected !== undefined) out.expected = extra.expected;
  if (extra.actual !== undefined) out.actual = extra.actual;
  if (extra.hint !== undefined) out.hint = extra.hint;
  return out;
}

/** 给问题加上外层键/下标前缀（返回新对象，不修改原问题） */
export function prefix_issues(segment: PathSegment, errors: readonly ValidationIssue[]): ValidationIssue[] {
  return errors.map((e) => ({ ...e, path: [segment, ...e.path] }));
}

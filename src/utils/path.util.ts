import type { PathSegment, ValidationIssue } from '../types/issue.type';

/**
 * 以方括号链渲染路径：["items", 2, "qty"] => data['items'][2]['qty']
 */
export function format_path(path: readonly PathSegment[]): string {
  return 'data' + path.map((p) => `[${typeof p === 'number' ? p : quote(p)}]`).join('');
}

/**
 * 渲染单个问题：
 *   "required field is missing @ data['a']"
 * 根路径不附加位置。
 */
export function format_issue(issue: ValidationIssue): string {
  return issue.path.length ? `${issue.message} @ ${format_path(issue.path)}` : issue.message;
}

/**
 * 转为 JSON Pointer（RFC 6901）
 */
export function to_pointer(path: readonly PathSegment[]): string {
  if (path.length === 0) return '';
  return '/' + path.map((p) => String(p).replace(/~/g, '~0').replace(/\//g, '~1')).join('/');
}

function quote(key: string): string {
  return `'${key.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * 用于诊断的简短值描述
 */
export function describe_value(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
  if (value instanceof Date) return `Date(${Number.isNaN(value.getTime()) ? 'invalid' : value.toISOString()})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'object' && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== null && proto !== Object.prototype) {
      const text = String(value);
      return text.startsWith('[object') ? value.constructor.name : `${value.constructor.name}(${text})`;
    }
    return 'object';
  }
  return String(value);
}

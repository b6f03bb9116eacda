import type { EvalResult, ValidationIssue } from '../types';

export function ok<T>(value: T): EvalResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(errors: ValidationIssue[]): EvalResult<T> {
  return { ok: false, errors };
}

/** 路径片段：映射键（string）或序列下标（number）。 */
export type PathSegment = string | number;

/** 机器可读错误码（求值期 + DSL 加载期）。 */
export type IssueCode =
  | 'NOT_A_MAPPING'
  | 'NOT_A_SEQUENCE'
  | 'SEQUENCE_LENGTH_MISMATCH'
  | 'REQUIRED_FIELD_MISSING'
  | 'INCLUSIVE_FIELD_MISSING'
  | 'UNKNOWN_FIELD'
  | 'KEY_POPULATE_CONFLICT'
  | 'LITERAL_MISMATCH'
  | 'ENUM_NO_MATCH'
  | 'CONVERSION'
  | 'OBJECT_INVALID'
  | 'SCHEMA_ERROR';

/** 结构/数据问题统一表示（求值器与 DSL 加载共用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 REQUIRED_FIELD_MISSING / UNKNOWN_FIELD）。 */
  code: IssueCode;
  /** 从根到出错位置的键/下标序列（最外层在前）。 */
  path: PathSegment[];
  /** 人类可读消息。 */
  message: string;
  /** 可选：期望值（诊断用）。 */
  expected?: string;
  /** 可选：实际值（诊断用）。 */
  actual?: string;
  /** 可选：底层异常信息或修复建议。 */
  hint?: string;
}

import { z } from 'zod';

/**
 * JSON 形式的 schema DSL（可从文件加载）的结构校验。
 * 只描述形状；重名字段、枚举成员必须为字面量等语义检查在 compiler 完成。
 */

export type DslScalar = string | number | boolean;

/** 叶子转换器描述 */
export type DslLeaf =
  | { type: 'string' }
  | { type: 'integer' }
  | { type: 'number' }
  | { type: 'decimal' }
  | { type: 'boolean'; strict?: boolean }
  | { type: 'datetime'; format?: string };

export interface DslField {
  name: string;
  rename_to?: string;
  presence?: 'required' | 'optional' | 'inclusive';
  monitor?: string;
  schema: DslNode;
}

export type DslNode =
  | DslScalar
  | DslNode[]
  | DslLeaf
  | { type: 'literal'; converter: DslLeaf; value: DslScalar }
  | { type: 'dict'; extra?: 'prevent' | 'allow' | 'remove'; fields: DslField[] }
  | { type: 'list'; items: DslNode }
  | { type: 'fixed_list'; items: DslNode[] }
  | { type: 'enum'; values: DslNode[] }
  | { type: 'unvalidated_dict' }
  | { type: 'unvalidated_list' };

/**
 * 叶子：
 * - string / integer / number / decimal：无参数
 * - boolean：strict 默认 true（只认 true/t/yes/y/1 与 false/f/no/n/0）
 * - datetime：format 为 date-fns 格式串，默认 "yyyy-MM-dd HH:mm.ss"
 */
const DSL_String = z.object({ type: z.literal('string') }).strict();
const DSL_Integer = z.object({ type: z.literal('integer') }).strict();
const DSL_Number = z.object({ type: z.literal('number') }).strict();
const DSL_Decimal = z.object({ type: z.literal('decimal') }).strict();
const DSL_Boolean = z.object({ type: z.literal('boolean'), strict: z.boolean().optional() }).strict();
const DSL_DateTime = z
  .object({ type: z.literal('datetime'), format: z.string().min(1, 'format 不能为空').optional() })
  .strict();

export const DSL_Leaf = z.discriminatedUnion('type', [
  DSL_String,
  DSL_Integer,
  DSL_Number,
  DSL_Decimal,
  DSL_Boolean,
  DSL_DateTime,
]);

const DSL_Scalar = z.union([z.string(), z.number(), z.boolean()]);

/**
 * 映射字段：
 * - name：输入键
 * - rename_to：输出键（省略时同 name）
 * - presence：默认 required
 * - monitor：inclusive 分组名（仅 presence=inclusive 时有意义）
 */
const DSL_Field: z.ZodType<DslField> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1, '字段名不能为空'),
      rename_to: z.string().min(1, 'rename_to 不能为空').optional(),
      presence: z.enum(['required', 'optional', 'inclusive']).optional(),
      monitor: z.string().optional(),
      schema: DSL_Node,
    })
    .strict()
    .superRefine((field, ctx) => {
      if (field.monitor !== undefined && field.presence !== 'inclusive') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'monitor requires presence=inclusive',
          path: ['monitor'],
        });
      }
    })
);

/**
 * 节点：
 * - 原生标量 → 隐式字面量
 * - 数组 → 定长列表
 * - 带 type 的对象 → 叶子 / 包装器
 */
export const DSL_Node: z.ZodType<DslNode> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(DSL_Node),
    z.discriminatedUnion('type', [
      DSL_String,
      DSL_Integer,
      DSL_Number,
      DSL_Decimal,
      DSL_Boolean,
      DSL_DateTime,
      z.object({ type: z.literal('literal'), converter: DSL_Leaf, value: DSL_Scalar }).strict(),
      z
        .object({
          type: z.literal('dict'),
          extra: z.enum(['prevent', 'allow', 'remove']).optional(),
          fields: z.array(DSL_Field),
        })
        .strict(),
      z.object({ type: z.literal('list'), items: DSL_Node }).strict(),
      z.object({ type: z.literal('fixed_list'), items: z.array(DSL_Node) }).strict(),
      z.object({ type: z.literal('enum'), values: z.array(DSL_Node).min(1, 'enum 至少需要一个值') }).strict(),
      z.object({ type: z.literal('unvalidated_dict') }).strict(),
      z.object({ type: z.literal('unvalidated_list') }).strict(),
    ]),
  ])
);

/**
 * 展开 union 错误：丢弃仅因“类型不符”而失败的分支，保留与输入类型匹配的那一支的细节，
 * 使错误路径指向真正出错的位置。
 */
export function flatten_zod_issues(issues: readonly z.ZodIssue[]): z.ZodIssue[] {
  const out: z.ZodIssue[] = [];
  for (const i of issues) {
    if (i.code === z.ZodIssueCode.invalid_union) {
      const branch = i.unionErrors.find(
        (err) => !err.issues.every((x) => x.code === z.ZodIssueCode.invalid_type && x.path.length === i.path.length),
      );
      if (branch) {
        out.push(...flatten_zod_issues(branch.issues));
        continue;
      }
    }
    out.push(i);
  }
  return out;
}

/** 安全解析 DSL：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_dsl(input: unknown) {
  return DSL_Node.safeParse(input);
}

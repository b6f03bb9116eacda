import type { CompiledNode } from '../ast/nodes';
import type { RawSchema } from '../ast/wrappers';
import { compile } from '../compiler';
import { MultipleInvalidError } from '../errors';
import type { CompileOptions, EvalResult, Schema } from '../types';
import { create_rng } from '../utils/rng.util';
import { describe_node, schema_id_of } from './describe';
import { evaluate } from './evaluate';
import { mock_node } from './mock';

export { evaluate } from './evaluate';
export { evaluate_dict } from './dict';
export { describe_node, schema_id_of } from './describe';
export { mock_node } from './mock';
export { run_leaf } from './leaf';

/**
 * define_schema()
 * ----------------
 * 编译一次，得到可反复使用的 schema：
 *  - parse / safe_parse：输入 → native
 *  - to_dto / safe_to_dto：native → 可 JSON 序列化的值
 *  - mock：由种子确定的样例
 *  - describe / schema_id：JSON 描述与稳定指纹
 *
 * @throws {SchemaDefinitionError} schema 写错时（编译期）
 *
 * ```ts
 * const s = define_schema(new Map([[required('qty'), integer()]]));
 * s.parse({ qty: '3' }); // { qty: 3 }
 * ```
 */
export function define_schema(raw: RawSchema, options: CompileOptions = {}): Schema {
  return create_schema(compile(raw, options));
}

/**
 * 用已编译的节点创建 schema（DSL 加载走这里）
 */
export function create_schema(node: CompiledNode): Schema {
  const schema_id = schema_id_of(node);
  const unwrap = (r: EvalResult) => {
    if (!r.ok) throw new MultipleInvalidError(r.errors);
    return r.value;
  };

  return {
    node,
    schema_id,
    parse: (data) => unwrap(evaluate(node, data, 'to_native')),
    safe_parse: (data) => evaluate(node, data, 'to_native'),
    to_dto: (value) => unwrap(evaluate(node, value, 'to_dto')),
    safe_to_dto: (value) => evaluate(node, value, 'to_dto'),
    mock: (seed = 0) => mock_node(node, create_rng(seed)),
    describe: () => describe_node(node),
  };
}

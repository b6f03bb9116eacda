import { NodeKind, type CompiledNode, type DictNode } from '../ast/nodes';
import { MultipleInvalidError, SchemaDefinitionError } from '../errors';
import type { Rng } from '../utils/rng.util';
import { set_own } from '../utils/value.util';
import { instantiate } from './object';

/**
 * 生成一个 native 形态的样例值（同一 rng 种子 → 同一结果）
 * @throws {SchemaDefinitionError} 遇到不提供 mock 能力的转换器时
 */
export function mock_node(node: CompiledNode, rng: Rng): unknown {
  switch (node.kind) {
    case NodeKind.Literal:
      return node.value;
    case NodeKind.Dict:
      return mock_fields(node, rng);
    case NodeKind.List:
      return Array.from({ length: rng.int(0, 3) }, () => mock_node(node.item, rng));
    case NodeKind.FixedList:
      return node.items.map((item) => mock_node(item, rng));
    case NodeKind.Enum:
      return mock_node(rng.pick(node.values), rng);
    case NodeKind.Object: {
      const r = instantiate(node, mock_fields(node.fields, rng));
      if (!r.ok) throw new MultipleInvalidError(r.errors);
      return r.value;
    }
    case NodeKind.Opaque:
      return node.container === 'dict' ? {} : [];
    case NodeKind.Callable: {
      const { converter } = node;
      if (!converter.mock) {
        throw new SchemaDefinitionError(
          `converter '${converter.label ?? (converter.name || 'anonymous')}' cannot generate mock values`,
        );
      }
      return converter.mock(rng);
    }
  }
}

/**
 * required 总是生成；optional 逐个抛硬币；inclusive 按 monitor 分组整体抛一次
 */
function mock_fields(node: DictNode, rng: Rng): Record<string, unknown> {
  const groups = new Map<string, boolean>();
  const out: Record<string, unknown> = {};
  for (const { marker, node: child } of node.fields) {
    let include = true;
    if (marker.presence === 'optional') {
      include = rng.bool();
    } else if (marker.presence === 'inclusive') {
      const group = marker.monitor ?? '';
      include = groups.get(group) ?? rng.bool();
      groups.set(group, include);
    }
    if (include) set_own(out, marker.rename_to, mock_node(child, rng));
  }
  return out;
}

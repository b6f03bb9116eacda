import { NodeKind, type CompiledNode, type DictNode } from '../ast/nodes';
import type { Converter, SchemaDescription } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';

/**
 * 节点的 JSON 描述。
 * DSL 能表达的部分与 DSL 同形（可被 load_dsl 读回）；
 * object 与没有 descriptor 的转换器用 { type: 'object' | 'converter' } 表示。
 */
export function describe_node(node: CompiledNode): SchemaDescription {
  switch (node.kind) {
    case NodeKind.Literal: {
      const { converter } = node;
      const value = converter.to_primitive ? converter.to_primitive(node.value) : node.value;
      if (!is_json_scalar(value)) return { type: 'literal', converter: describe_converter(converter) };
      return { type: 'literal', converter: describe_converter(converter), value };
    }
    case NodeKind.Dict:
      return describe_dict(node);
    case NodeKind.List:
      return { type: 'list', items: describe_node(node.item) };
    case NodeKind.FixedList:
      return { type: 'fixed_list', items: node.items.map(describe_node) };
    case NodeKind.Enum:
      return { type: 'enum', values: node.values.map(describe_node) };
    case NodeKind.Object:
      return {
        type: 'object',
        target: node.target.name,
        initializer: node.initializer.mode === 'constructor' ? 'constructor' : node.initializer.name,
        fields: describe_dict(node.fields),
      };
    case NodeKind.Opaque:
      return { type: node.container === 'dict' ? 'unvalidated_dict' : 'unvalidated_list' };
    case NodeKind.Callable:
      return describe_converter(node.converter);
  }
}

/**
 * schema 指纹：sha256(canonical_stringify(describe))
 */
export function schema_id_of(node: CompiledNode): string {
  return hash_sha256(canonical_stringify(describe_node(node)));
}

function describe_dict(node: DictNode): SchemaDescription {
  return {
    type: 'dict',
    extra: node.extra,
    fields: node.fields.map(({ marker, node: child }) => {
      const field: Record<string, unknown> = { name: marker.name };
      if (marker.rename_to !== marker.name) field.rename_to = marker.rename_to;
      if (marker.presence !== 'required') field.presence = marker.presence;
      if (marker.presence === 'inclusive' && marker.monitor) field.monitor = marker.monitor;
      field.schema = describe_node(child);
      return field;
    }),
  };
}

function describe_converter(converter: Converter): SchemaDescription {
  if (converter.descriptor) return { ...converter.descriptor };
  return { type: 'converter', name: converter.label ?? (converter.name || 'anonymous') };
}

function is_json_scalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

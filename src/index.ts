export { compile } from './compiler';
export { compile_dsl, load_dsl } from './compiler/from-dsl';
export { define_schema, create_schema, evaluate, describe_node, schema_id_of, mock_node } from './engine';
export { required, optional, inclusive, is_marker } from './ast/markers';
export type { Marker, Presence } from './ast/markers';
export {
  literal,
  dict,
  list,
  fixed_list,
  enum_of,
  make_object,
  unvalidated_dict,
  unvalidated_list,
} from './ast/wrappers';
export type { RawSchema, RawFields, FieldEntries, Initializer } from './ast/wrappers';
export { NodeKind } from './ast/nodes';
export type { CompiledNode } from './ast/nodes';
export * from './converters';
export { SchemaDefinitionError, ConversionError, MultipleInvalidError } from './errors';
export { format_path, format_issue, to_pointer } from './utils/path.util';
export { Extra } from './types';
export type * from './types';
export type { DslNode as DtocastDsl } from './schema';

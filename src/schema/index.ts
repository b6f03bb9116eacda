export * from './dsl.schema';

export * from './compile.type';
export * from './converter.type';
export * from './issue.type';
export * from './schema.type';

export { create_converter } from './base';
export { string } from './string';
export { integer } from './integer';
export { number } from './number';
export { bigint } from './bigint';
export { decimal } from './decimal';
export { boolean, TRUTH_VALUES, FALSE_VALUES } from './boolean';
export { datetime, DEFAULT_DATETIME_FORMAT } from './datetime';
export { from_zod } from './zod';

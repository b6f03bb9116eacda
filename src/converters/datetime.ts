import { format, isValid, parse } from 'date-fns';
import { ConversionError, SchemaDefinitionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

export const DEFAULT_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm.ss';

// 缺省字段（如只有日期时的时分秒）取自该参考时间
const REFERENCE_DATE = new Date(2000, 0, 1, 0, 0, 0, 0);

/**
 * 日期时间：按 date-fns 格式串解析字符串，反向时按同一格式输出。
 * 格式串在构造时校验：当前时间格式化后必须能被同一格式解析回来。
 */
export function datetime(pattern: string = DEFAULT_DATETIME_FORMAT) {
  try {
    const probe = format(new Date(), pattern);
    if (!isValid(parse(probe, pattern, REFERENCE_DATE))) {
      throw new SchemaDefinitionError(`bad datetime format '${pattern}': cannot parse its own output`);
    }
  } catch (e) {
    if (e instanceof SchemaDefinitionError) throw e;
    throw new SchemaDefinitionError(`bad datetime format '${pattern}': ${e instanceof Error ? e.message : String(e)}`);
  }

  const normalize = (d: Date) => parse(format(d, pattern), pattern, REFERENCE_DATE);

  return create_converter<Date>(
    'datetime',
    (value) => {
      if (typeof value !== 'string') {
        throw new ConversionError(`bad datetime ${describe_value(value)}: expected a string`, pattern, describe_value(value));
      }
      const d = parse(value, pattern, REFERENCE_DATE);
      if (!isValid(d)) {
        throw new ConversionError(`bad datetime ${describe_value(value)}: does not match '${pattern}'`, pattern, value);
      }
      return d;
    },
    {
      descriptor: pattern === DEFAULT_DATETIME_FORMAT ? { type: 'datetime' } : { type: 'datetime', format: pattern },
      to_primitive: (d) => {
        if (!(d instanceof Date) || !isValid(d)) {
          throw new ConversionError(`expected a valid Date, got ${describe_value(d)}`);
        }
        return format(d, pattern);
      },
      mock: (rng) =>
        normalize(new Date(1990 + rng.int(0, 35), rng.int(0, 11), rng.int(1, 28), rng.int(0, 23), rng.int(0, 59), rng.int(0, 59))),
      equals: (a, b) => a instanceof Date && b instanceof Date && a.getTime() === b.getTime(),
    },
  );
}

import { Decimal } from 'decimal.js';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

/**
 * 十进制数：只接受字符串与整数 number（浮点 number 已丢失精度，拒绝）。
 * 已经是 Decimal 的值原样通过。
 */
export function decimal() {
  return create_converter<Decimal>(
    'decimal',
    (value) => {
      if (Decimal.isDecimal(value)) return value;
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new ConversionError(
          `value for a decimal can be only a string or an integer, got ${describe_value(value)}`,
          'decimal',
          describe_value(value),
        );
      }
      if (typeof value === 'number' && !Number.isInteger(value)) {
        throw new ConversionError(`float ${value} is not accepted for a decimal, pass a string`, 'decimal', String(value));
      }
      let d: Decimal;
      try {
        d = new Decimal(typeof value === 'string' ? value.trim() : value);
      } catch (e) {
        throw new ConversionError(`bad decimal number ${describe_value(value)}: ${e instanceof Error ? e.message : String(e)}`);
      }
      if (!d.isFinite()) {
        throw new ConversionError(`bad decimal number ${describe_value(value)}`, 'finite decimal', describe_value(value));
      }
      return d;
    },
    {
      descriptor: { type: 'decimal' },
      to_primitive: (v) => v.toString(),
      mock: (rng) => new Decimal(rng.int(0, 100000)).div(100),
      equals: (a, b) => Decimal.isDecimal(a) && Decimal.isDecimal(b) && a.equals(b),
    },
  );
}

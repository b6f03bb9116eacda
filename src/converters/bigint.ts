import { z } from 'zod';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

const BigInt_Input = z.union([z.bigint(), z.number().int(), z.string().trim().regex(/^-?\d+$/)]);

/** 任意精度整数；反向转换为十进制字符串 */
export function bigint() {
  return create_converter<bigint>(
    'bigint',
    (value) => {
      const parsed = BigInt_Input.safeParse(value);
      if (!parsed.success) {
        throw new ConversionError(`expected an integer, got ${describe_value(value)}`, 'bigint', describe_value(value));
      }
      return BigInt(parsed.data);
    },
    {
      to_primitive: (v) => v.toString(),
      mock: (rng) => BigInt(rng.int(0, 1_000_000)),
    },
  );
}

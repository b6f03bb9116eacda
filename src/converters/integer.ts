import { z } from 'zod';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

const Integer_Input = z.union([z.number().int(), z.string().trim().regex(/^[-+]?\d+$/), z.bigint()]);

/** 整数：接受整数 number、十进制整数字符串与安全范围内的 bigint */
export function integer() {
  return create_converter<number>(
    'integer',
    (value) => {
      const parsed = Integer_Input.safeParse(value);
      const n = parsed.success ? Number(parsed.data) : Number.NaN;
      if (!Number.isSafeInteger(n)) {
        throw new ConversionError(`expected an integer, got ${describe_value(value)}`, 'integer', describe_value(value));
      }
      return n;
    },
    {
      descriptor: { type: 'integer' },
      mock: (rng) => rng.int(0, 1000),
    },
  );
}

import { z } from 'zod';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

// 标量才允许转成字符串；对象/数组/null 一律拒绝
const String_Input = z.union([z.string(), z.number().finite(), z.boolean(), z.bigint()]);

export function string() {
  return create_converter<string>(
    'string',
    (value) => {
      const parsed = String_Input.safeParse(value);
      if (!parsed.success) {
        throw new ConversionError(`expected a string, got ${describe_value(value)}`, 'string', describe_value(value));
      }
      return String(parsed.data);
    },
    {
      descriptor: { type: 'string' },
      mock: (rng) => `str${rng.int(0, 9999)}`,
    },
  );
}

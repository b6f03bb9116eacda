import { z } from 'zod';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

const Number_Input = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/),
]);

/** 浮点数：有限 number 或数字字符串 */
export function number() {
  return create_converter<number>(
    'number',
    (value) => {
      const parsed = Number_Input.safeParse(value);
      if (!parsed.success) {
        throw new ConversionError(`expected a number, got ${describe_value(value)}`, 'number', describe_value(value));
      }
      return Number(parsed.data);
    },
    {
      descriptor: { type: 'number' },
      mock: (rng) => rng.int(0, 100000) / 100,
    },
  );
}

import type { z } from 'zod';
import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

/**
 * 把任意 zod schema 用作叶子转换器；zod 的失败被转成 ConversionError
 *
 * ```ts
 * const email = from_zod(z.string().email(), 'email');
 * ```
 */
export function from_zod<S extends z.ZodTypeAny>(schema: S, label = 'zod') {
  return create_converter<z.output<S>>(label, (value) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => i.message).join('; ');
      throw new ConversionError(message, label, describe_value(value));
    }
    return parsed.data;
  });
}

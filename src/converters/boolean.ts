import { ConversionError } from '../errors';
import { describe_value } from '../utils/path.util';
import { create_converter } from './base';

export const TRUTH_VALUES: readonly string[] = ['true', 't', 'yes', 'y', '1'];
export const FALSE_VALUES: readonly string[] = ['false', 'f', 'no', 'n', '0'];

/**
 * 布尔值
 * - strict（默认）：String(value) 必须落在 TRUTH_VALUES / FALSE_VALUES 中
 * - 非 strict：按 JS 真值规则
 */
export function boolean(options: { strict?: boolean } = {}) {
  const strict = options.strict ?? true;
  return create_converter<boolean>(
    'boolean',
    (value) => {
      if (typeof value === 'boolean') return value;
      if (!strict) return Boolean(value);
      const text = String(value);
      if (TRUTH_VALUES.includes(text)) return true;
      if (FALSE_VALUES.includes(text)) return false;
      throw new ConversionError(
        `a strict boolean should be either one of ${TRUTH_VALUES.join('/')} or one of ${FALSE_VALUES.join('/')}`,
        'boolean',
        describe_value(value),
      );
    },
    {
      descriptor: strict ? { type: 'boolean' } : { type: 'boolean', strict: false },
      mock: (rng) => rng.bool(),
    },
  );
}

import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import { describe_value, format_issue, format_path, to_pointer } from './path.util';
import { canonical_stringify, hash_sha256 } from './canonical.util';
import { create_rng } from './rng.util';

describe('format_path', () => {
  it('renders a bracketed key/index chain', () => {
    expect(format_path(['items', 2, 'qty'])).toBe("data['items'][2]['qty']");
    expect(format_path([])).toBe('data');
    expect(format_path(["it's"])).toBe("data['it\\'s']");
  });
});

describe('format_issue', () => {
  it('appends the path unless it is the root', () => {
    expect(format_issue({ code: 'UNKNOWN_FIELD', path: ['x'], message: 'extra keys not allowed' })).toBe(
      "extra keys not allowed @ data['x']",
    );
    expect(format_issue({ code: 'NOT_A_MAPPING', path: [], message: 'expected a dictionary' })).toBe(
      'expected a dictionary',
    );
  });
});

describe('to_pointer', () => {
  it('escapes ~ and /', () => {
    expect(to_pointer(['a/b', 0, 'c~d'])).toBe('/a~1b/0/c~0d');
    expect(to_pointer([])).toBe('');
  });
});

describe('describe_value', () => {
  it('gives short diagnostics', () => {
    expect(describe_value('x')).toBe('"x"');
    expect(describe_value(3n)).toBe('3n');
    expect(describe_value([1, 2, 3])).toBe('array(3)');
    expect(describe_value({ a: 1 })).toBe('object');
    expect(describe_value(new Decimal('1.5'))).toBe('Decimal(1.5)');
    expect(describe_value(null)).toBe('null');
  });
});

describe('canonical_stringify / hash_sha256', () => {
  it('sorts keys at every depth and keeps array order', () => {
    expect(canonical_stringify({ b: 1, a: { d: null, c: [2, { z: 0, y: 1 }] } })).toBe(
      '{"a":{"c":[2,{"y":1,"z":0}],"d":null},"b":1}',
    );
    expect(hash_sha256('hello')).toBe('sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });
});

describe('create_rng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = create_rng(7);
    const b = create_rng(7);
    const seq = (r: ReturnType<typeof create_rng>) => [r.int(0, 100), r.int(0, 100), r.bool(), r.pick(['x', 'y', 'z'])];
    expect(seq(a)).toEqual(seq(b));
  });

  it('stays inside the requested range', () => {
    const r = create_rng(1);
    for (let i = 0; i < 50; i++) {
      const n = r.int(3, 5);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThanOrEqual(5);
    }
  });
});

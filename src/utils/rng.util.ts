/**
 * 同样的初始种子 → 完全一致的输出序列
 * @param seed
 * @returns
 */
export function mulberry32(seed: number) {
  let t = seed >>> 0;
  return {
    next_uint32(): number {
      t += 0x6D2B79F5;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0);
    },
    get state(): number { return t >>> 0; }
  };
}

/** mock 生成使用的随机源 */
export interface Rng {
  /** [min, max] 闭区间整数 */
  int(min: number, max: number): number;
  /** 抛硬币 */
  bool(): boolean;
  /** 从非空数组中取一个 */
  pick<T>(items: readonly T[]): T;
}

/**
 * 基于 mulberry32 的确定性随机源
 * @param seed
 */
export function create_rng(seed: number): Rng {
  const g = mulberry32(seed);
  const int = (min: number, max: number) => min + (g.next_uint32() % (max - min + 1));
  return {
    int,
    bool: () => (g.next_uint32() & 1) === 1,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) throw new RangeError('pick() from empty list');
      return items[int(0, items.length - 1)];
    },
  };
}

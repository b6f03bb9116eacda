import { createHash } from "crypto";

/**
 * 键按字典序深度排序后再 JSON.stringify，数组保持原顺序。
 * 同一份 schema 描述无论键的插入顺序如何，都得到同一个字符串。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(input, (_key, value: unknown) => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
    const sorted: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) sorted[k] = Reflect.get(value, k);
    return sorted;
  });
}

/** "sha256:" + 十六进制摘要 */
export function hash_sha256(text: string): string {
  return `sha256:${createHash("sha256").update(text, "utf8").digest("hex")}`;
}

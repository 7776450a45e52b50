/**
 * 指纹缓存：输入字节的 SHA-256 → 处理结果
 * 相同输入必然得到相同输出，重复写入无害
 */
import { createHash } from 'node:crypto';

export function fingerprint(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export interface CacheLimits<V> {
  /** 所有条目的字节总量上限，默认不限 */
  maxBytes?: number;
  /** 估算单个条目占用的字节数 */
  sizeOf?: (value: V) => number;
}

interface CacheEntry<V> {
  value: V;
  bytes: number;
}

export class FingerprintCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly maxBytes: number;
  private readonly sizeOf: (value: V) => number;
  private totalBytes = 0;

  /**
   * @param maxEntries 条数上限，超出时丢弃最早写入的条目；0 表示不缓存
   */
  constructor(
    private readonly maxEntries: number,
    limits: CacheLimits<V> = {}
  ) {
    this.maxBytes = limits.maxBytes ?? Infinity;
    this.sizeOf = limits.sizeOf ?? (() => 0);
  }

  get size(): number {
    return this.entries.size;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  get(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  /** 单个条目超过字节上限时不写入 */
  set(key: string, value: V): void {
    if (this.maxEntries <= 0) return;
    const bytes = this.sizeOf(value);
    if (bytes > this.maxBytes) return;
    this.delete(key);
    while (this.entries.size >= this.maxEntries || this.totalBytes + bytes > this.maxBytes) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.delete(oldest.value);
    }
    this.entries.set(key, { value, bytes });
    this.totalBytes += bytes;
  }

  private delete(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.totalBytes -= entry.bytes;
  }
}

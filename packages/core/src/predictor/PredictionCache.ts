import type { ClockSource } from '../clock/ClockSource.js';
import { ClockSourceSystem } from '../clock/ClockSourceSystem.js';

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface PredictionCacheOptions {
  maxSize: number;
  ttlMs: number;
  clock?: ClockSource;
}

/**
 * 预测结果缓存（TTL + 容量上限）
 */
export class PredictionCache<T> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly clock: ClockSource;
  // Map 按插入顺序迭代，第一个即最旧
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(options: PredictionCacheOptions) {
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? new ClockSourceSystem();
  }

  /**
   * 生成缓存键，特征按键名排序
   */
  static makeKey(prefix: string, record: Readonly<Record<string, string | number | boolean>>): string {
    const parts = Object.keys(record)
      .sort()
      .map(key => `${key}=${String(record[key])}`);
    return `${prefix}:${parts.join(',')}`;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.clock.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, { value, storedAt: this.clock.now() });
  }

  /**
   * 失效缓存
   * @param pattern 只删除包含该子串的键；不提供时清空
   */
  invalidate(pattern?: string): number {
    if (pattern === undefined) {
      const count = this.entries.size;
      this.entries.clear();
      return count;
    }

    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.includes(pattern)) {
        this.entries.delete(key);
        count++;
      }
    }
    return count;
  }

  get size(): number {
    return this.entries.size;
  }
}

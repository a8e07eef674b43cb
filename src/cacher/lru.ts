// 内存 LRU：Map 保持插入顺序，命中即移到末尾，超出容量从头部淘汰


export class LruCache<K, V> {
  private readonly map = new Map<K, V>();
  private cap: number;

  /** onEvict 在条目因容量被淘汰时调用（remove / clear 不触发） */
  constructor(capacity: number, private readonly onEvict?: (key: K, value: V) => void) {
    this.cap = Math.max(1, Math.floor(capacity));
  }

  get capacity(): number {
    return this.cap;
  }

  get size(): number {
    return this.map.size;
  }

  get(key: K): V | undefined {
    if (!this.map.has(key)) return undefined;
    const value = this.map.get(key);
    this.map.delete(key);
    if (value !== undefined) this.map.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    this.evict();
  }

  remove(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  /** 调整容量，缩小时立即淘汰最久未用的条目 */
  setCapacity(capacity: number): void {
    this.cap = Math.max(1, Math.floor(capacity));
    this.evict();
  }

  private evict(): void {
    while (this.map.size > this.cap) {
      const oldest = this.map.entries().next();
      if (oldest.done) return;
      const [key, value] = oldest.value;
      this.map.delete(key);
      this.onEvict?.(key, value);
    }
  }
}

/**
 * Bounded set of recently processed keys. Insertion order doubles as age:
 * once full, the oldest key is evicted.
 */
export class SeenCache {
  private readonly keys = new Set<string>();
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`SeenCache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  add(key: string): void {
    if (this.keys.has(key)) {
      this.keys.delete(key);
    }
    this.keys.add(key);

    while (this.keys.size > this.capacity) {
      const oldest = this.keys.values().next();
      if (oldest.done) break;
      this.keys.delete(oldest.value);
    }
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * RejectSet Value Object
 * Set of batch item keys compared by value, so ['S1', 'A1'] added twice is stored once
 * and a freshly built ['S1', 'A1'] is found by has().
 */

export type RejectKey = string | readonly string[];

function encodeKey(key: RejectKey): string {
  return JSON.stringify(key);
}

export class RejectSet<K extends RejectKey> implements Iterable<K> {
  private readonly entries = new Map<string, K>();

  static of<K extends RejectKey>(keys: Iterable<K>): RejectSet<K> {
    const set = new RejectSet<K>();
    for (const key of keys) {
      set.add(key);
    }
    return set;
  }

  add(key: K): this {
    const encoded = encodeKey(key);
    if (!this.entries.has(encoded)) {
      this.entries.set(encoded, key);
    }
    return this;
  }

  has(key: K): boolean {
    return this.entries.has(encodeKey(key));
  }

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  values(): IterableIterator<K> {
    return this.entries.values();
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.values();
  }

  toArray(): K[] {
    return [...this.entries.values()];
  }
}

/**
 * Keyed in-memory store. All access goes through methods so callers never hold
 * the backing map; `update` mutates in place and hands back the stored value.
 */
export class Store<K, V> {
  private readonly items_ = new Map<K, V>();

  add(key: K, value: V): void {
    this.items_.set(key, value);
  }

  get(key: K): V | undefined {
    return this.items_.get(key);
  }

  /** Snapshot of all entries, in insertion order. */
  items(): Map<K, V> {
    return new Map(this.items_);
  }

  len(): number {
    return this.items_.size;
  }

  /** Applies `mutate` to the stored value. Returns undefined when the key is absent. */
  update(key: K, mutate: (value: V) => void): V | undefined {
    const value = this.items_.get(key);
    if (value === undefined) return undefined;
    mutate(value);
    return value;
  }
}

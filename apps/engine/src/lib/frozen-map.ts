/** Read-only view over a private copy of its entries. Exposes no mutators. */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly entriesByKey: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]> = []) {
    this.entriesByKey = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: K): boolean {
    return this.entriesByKey.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void): void {
    this.entriesByKey.forEach((value, key) => callback(value, key, this));
  }

  entries() {
    return this.entriesByKey.entries();
  }

  keys() {
    return this.entriesByKey.keys();
  }

  values() {
    return this.entriesByKey.values();
  }

  [Symbol.iterator]() {
    return this.entriesByKey[Symbol.iterator]();
  }
}

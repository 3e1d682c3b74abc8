// Path: src/utils/frozen-map.ts
// Read-only Map used for per-run secret sets

/**
 * Map that rejects mutation once constructed.
 * `ReadonlyMap` only protects at compile time; this also holds at runtime.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  private readonly sealed: boolean;

  constructor(entries: Iterable<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    // Map's constructor populates through set() before sealing
    if (this.sealed) {
      throw new TypeError('Map is read-only');
    }
    return super.set(key, value);
  }

  override delete(_key: K): boolean {
    throw new TypeError('Map is read-only');
  }

  override clear(): void {
    throw new TypeError('Map is read-only');
  }
}

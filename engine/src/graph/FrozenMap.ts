/**
 * A Map that rejects writes once constructed. `Object.freeze` does not
 * stop `Map#set`, so the graph's indexes use this instead.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  private readonly sealed: boolean;

  constructor(entries: Iterable<readonly [K, V]>) {
    super();
    for (const [key, value] of entries) {
      super.set(key, value);
    }
    this.sealed = true;
    Object.freeze(this);
  }

  override set(key: K, value: V): this {
    if (this.sealed) {
      throw new TypeError('Cannot modify a frozen workflow graph');
    }
    return super.set(key, value);
  }

  override delete(_key: K): boolean {
    throw new TypeError('Cannot modify a frozen workflow graph');
  }

  override clear(): void {
    throw new TypeError('Cannot modify a frozen workflow graph');
  }
}

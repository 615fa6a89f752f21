import { makeKey } from "./columnKey";

export type ColumnKey = string | null;

export type ColumnsSource<V> =
  | Columns<V>
  | ReadonlyMap<ColumnKey, V>
  | Iterable<readonly [ColumnKey, V]>
  | Readonly<Record<string, V>>;

function isIterable<V>(
  source: ColumnsSource<V>,
): source is Iterable<readonly [ColumnKey, V]> {
  return Symbol.iterator in source;
}

/**
 * Ordered mapping keyed by normalized column key.
 *
 * Lookups normalize the requested key the same way, so `get("Phone Number")`
 * finds a value stored under "phone_number". When two source keys normalize
 * to the same key the later value wins and the first position is kept.
 */
export class Columns<V> implements Iterable<[ColumnKey, V]> {
  private readonly store = new Map<ColumnKey, V>();

  constructor(source?: ColumnsSource<V> | null) {
    if (!source) return;
    if (source instanceof Columns) {
      for (const [key, value] of source.store) this.store.set(key, value);
      return;
    }
    const pairs: Iterable<readonly [ColumnKey, V]> = isIterable(source)
      ? source
      : Object.entries(source);
    for (const [key, value] of pairs) {
      this.store.set(makeKey(key), value);
    }
  }

  /** A Columns whose keys and values are both the normalized names. */
  static fromKeys(keys: Iterable<string>): Columns<string> {
    const columns = new Columns<string>();
    for (const key of keys) columns.set(key, key);
    return columns;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: ColumnKey): V | undefined {
    return this.store.get(makeKey(key));
  }

  has(key: ColumnKey): boolean {
    return this.store.has(makeKey(key));
  }

  set(key: ColumnKey, value: V): this {
    this.store.set(makeKey(key), value);
    return this;
  }

  keys(): ColumnKey[] {
    return [...this.store.keys()];
  }

  values(): V[] {
    return [...this.store.values()];
  }

  entries(): [ColumnKey, V][] {
    return [...this.store.entries()];
  }

  [Symbol.iterator](): Iterator<[ColumnKey, V]> {
    return this.store.entries();
  }

  copy(): Columns<V> {
    return new Columns(this);
  }

  /**
   * Plain record keyed by the names given (not normalized), each looked up
   * through the normalized key. Names with no value map to undefined.
   */
  asRecordWithKeys(keys: Iterable<string>): Record<string, V | undefined> {
    const out: Record<string, V | undefined> = {};
    for (const key of keys) out[key] = this.get(key);
    return out;
  }
}

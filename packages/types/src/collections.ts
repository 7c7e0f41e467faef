/**
 * Flat, single level key-value mapping that bulk operations read from.
 *
 * A native `Map`, a `KeyedMap`, every view returned by a container and an
 * array of pairs all satisfy this shape.
 */
export type FlatMapSource<K, V> = Iterable<readonly [K, V]>;

/**
 * Flat, single level key-value mapping that bulk operations write into.
 */
export interface FlatMapTarget<K, V> {
  clear(): void;
  set(key: K, value: V): unknown;
}

/**
 * A `[rowKey, columnKey, value]` triple.
 */
export type Cell<R, C, V> = [rowKey: R, columnKey: C, value: V];

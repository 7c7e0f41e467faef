import type { FlatMapSource } from '@map2d/types/collections';
import { encodeKey } from './codec.js';

type EntryIndex<K, V> = Map<string, [K, V]>;

function writeEntry<K, V>(index: EntryIndex<K, V>, key: K, value: V) {
  const code = encodeKey(key);
  const existing = index.get(code);
  index.set(code, [existing ? existing[0] : key, value]);
}

function indexEntries<K, V>(
  entries?: FlatMapSource<K, V> | null
): EntryIndex<K, V> {
  const index: EntryIndex<K, V> = new Map();
  if (entries) {
    for (const [key, value] of entries) {
      writeEntry(index, key, value);
    }
  }
  return index;
}

/**
 * Read side shared by {@link KeyedMap} and {@link ImmutableKeyedMap}.
 *
 * Keys are compared through {@link encodeKey}, so two distinct arrays or
 * objects with the same content address the same entry. Iteration follows
 * insertion order and overwriting a key keeps both its position and the key
 * object that was first stored.
 *
 * The backing index is held in a private field and this class never writes
 * to it, so only subclasses that keep their own handle can mutate.
 */
export abstract class BaseKeyedMap<K, V> implements Iterable<[K, V]> {
  readonly #data: EntryIndex<K, V>;

  protected constructor(index: EntryIndex<K, V>) {
    this.#data = index;
  }

  get size(): number {
    return this.#data.size;
  }

  get(key: K): V | undefined {
    return this.#data.get(encodeKey(key))?.[1];
  }

  has(key: K): boolean {
    return this.#data.has(encodeKey(key));
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.#data.values()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.#data.values()) {
      yield value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.#data.values()) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(callback: (value: V, key: K, map: this) => void) {
    for (const [key, value] of this.#data.values()) {
      callback(value, key, this);
    }
  }

  /**
   * Copies the entries into a native Map. Keys keep their stored identity, so
   * object keys in the result compare by reference again.
   */
  toMap(): Map<K, V> {
    return new Map(this.entries());
  }
}

export class KeyedMap<K, V> extends BaseKeyedMap<K, V> {
  readonly #index: EntryIndex<K, V>;

  constructor(entries?: FlatMapSource<K, V> | null) {
    const index = indexEntries(entries);
    super(index);
    this.#index = index;
  }

  set(key: K, value: V): this {
    writeEntry(this.#index, key, value);
    return this;
  }

  delete(key: K): boolean {
    return this.#index.delete(encodeKey(key));
  }

  clear() {
    this.#index.clear();
  }
}

/**
 * Snapshot mapping returned by container views. It has no mutators and the
 * instance is frozen once built.
 */
export class ImmutableKeyedMap<K, V> extends BaseKeyedMap<K, V> {
  constructor(entries?: FlatMapSource<K, V> | null) {
    super(indexEntries(entries));
    Object.freeze(this);
  }

  static empty<K, V>(): ImmutableKeyedMap<K, V> {
    return new ImmutableKeyedMap<K, V>();
  }
}

import type {
  Cell,
  FlatMapSource,
  FlatMapTarget,
} from '@map2d/types/collections';
import type { Key } from './codec.js';
import type { ImmutableKeyedMap } from './keyed-map.js';

/**
 * A two dimensional map: a sheet of cells addressed by a row key and a column
 * key.
 *
 * Keys compare by value (see {@link Key}), so `['a', 1]` used as a row key
 * addresses the same row as any other `['a', 1]`. Every view returned by the
 * map is a snapshot: later writes to the map never show up in a view that was
 * already handed out.
 *
 * Bulk operations that receive a `null` or `undefined` source or target do
 * nothing and return the map, so they can still be chained.
 *
 * @typeParam R - row key type
 * @typeParam C - column key type
 * @typeParam V - value type
 */
export interface Map2D<R extends Key, C extends Key, V> extends Iterable<
  Cell<R, C, V>
> {
  /**
   * Stores `value` at the given coordinates, replacing what was there.
   *
   * @returns the value previously stored at these coordinates, or `undefined`
   * if there was none
   * @throws InvalidKeyError if `rowKey` or `columnKey` is `null` or `undefined`
   */
  put(rowKey: R, columnKey: C, value: V): V | undefined;

  /**
   * @returns the value stored at the given coordinates, or `undefined`
   */
  get(rowKey: R, columnKey: C): V | undefined;

  /**
   * Like {@link Map2D.get}, but falls back to `defaultValue`. A cell that
   * holds `undefined` is indistinguishable from an empty one here and yields
   * `defaultValue` as well.
   */
  getOrDefault(rowKey: R, columnKey: C, defaultValue: V): V;

  /**
   * Removes the cell at the given coordinates.
   *
   * @returns the removed value, or `undefined` if the cell was empty
   */
  remove(rowKey: R, columnKey: C): V | undefined;

  isEmpty(): boolean;

  nonEmpty(): boolean;

  /**
   * Number of cells holding a value.
   */
  readonly size: number;

  clear(): void;

  /**
   * Snapshot of a single row, keyed by column. Empty when the row has no
   * cells.
   */
  rowView(rowKey: R): ImmutableKeyedMap<C, V>;

  /**
   * Snapshot of a single column, keyed by row. Empty when the column has no
   * cells. Costs a full transpose of the map.
   */
  columnView(columnKey: C): ImmutableKeyedMap<R, V>;

  /**
   * Whether any cell holds a value structurally equal to `value`.
   */
  containsValue(value: V): boolean;

  /**
   * Whether {@link Map2D.get} would return something other than `undefined`.
   */
  containsKey(rowKey: R, columnKey: C): boolean;

  /**
   * Whether the row holds at least one cell.
   */
  containsRow(rowKey: R): boolean;

  /**
   * Whether the column holds at least one cell. Scans every row.
   */
  containsColumn(columnKey: C): boolean;

  /**
   * Snapshot of the whole map as rows of columns. Inner maps are snapshots
   * too.
   */
  rowMapView(): ImmutableKeyedMap<R, ImmutableKeyedMap<C, V>>;

  /**
   * Snapshot of the whole map transposed, as columns of rows.
   */
  columnMapView(): ImmutableKeyedMap<C, ImmutableKeyedMap<R, V>>;

  /**
   * Replaces the contents of `target` with the cells of a row. When the row
   * has no cells `target` is left as it was.
   *
   * @returns this map
   */
  fillMapFromRow(target: FlatMapTarget<C, V> | null | undefined, rowKey: R): this;

  /**
   * Replaces the contents of `target` with the cells of a column. When the
   * column has no cells `target` is left as it was.
   *
   * @returns this map
   */
  fillMapFromColumn(
    target: FlatMapTarget<R, V> | null | undefined,
    columnKey: C
  ): this;

  /**
   * Copies every cell of `source` into this map, overwriting on collision.
   *
   * @returns this map
   */
  putAll(source: Map2D<R, C, V> | null | undefined): this;

  /**
   * Stores every entry of `source` in the row `rowKey`, each source key
   * becoming a column key.
   *
   * @returns this map
   * @throws InvalidKeyError if `source` is present and `rowKey` or any of its
   * keys is `null` or `undefined`. Keys are checked before anything is
   * written.
   */
  putAllToRow(source: FlatMapSource<C, V> | null | undefined, rowKey: R): this;

  /**
   * Stores every entry of `source` in the column `columnKey`, each source key
   * becoming a row key.
   *
   * @returns this map
   * @throws InvalidKeyError if `source` is present and `columnKey` or any of
   * its keys is `null` or `undefined`. Keys are checked before anything is
   * written.
   */
  putAllToColumn(
    source: FlatMapSource<R, V> | null | undefined,
    columnKey: C
  ): this;

  /**
   * Creates an independent copy with every row key, column key and value
   * converted. When conversions map several cells onto the same coordinates
   * the first cell in iteration order is kept.
   */
  copyWithConversion<R2 extends Key, C2 extends Key, V2>(
    rowFunction: (rowKey: R) => R2,
    columnFunction: (columnKey: C) => C2,
    valueFunction: (value: V) => V2
  ): Map2D<R2, C2, V2>;

  /**
   * Cells in iteration order: rows in the order they were first written,
   * and columns within a row likewise.
   */
  entries(): IterableIterator<Cell<R, C, V>>;

  rowKeys(): IterableIterator<R>;

  /**
   * Distinct column keys in order of first appearance.
   */
  columnKeys(): IterableIterator<C>;

  values(): IterableIterator<V>;

  forEach(
    callback: (value: V, rowKey: R, columnKey: C, map: this) => void
  ): void;

  /**
   * Whether both maps hold the same coordinates with structurally equal
   * values, regardless of order.
   */
  equals(other: Map2D<R, C, V> | null | undefined): boolean;
}

import { logger as rootLogger, type Logger } from '@map2d/logger';
import type {
  Cell,
  FlatMapSource,
  FlatMapTarget,
} from '@map2d/types/collections';
import type { Key } from './codec.js';
import { InvalidKeyError } from './errors.js';
import { ImmutableKeyedMap, KeyedMap } from './keyed-map.js';
import type { Map2D } from './map2d.js';
import { valuesEqual } from './utils/equality.js';

const defaultLogger = rootLogger.context('map2d');

export interface Map2DOptions {
  /**
   * Receives DEBUG records for skipped bulk operations and conversion
   * collisions, and TRACE records for bulk merges. Defaults to the `map2d`
   * context of the package logger, which has no handlers until one is
   * registered.
   */
  logger?: Logger;
}

function assertKey(part: 'row' | 'column', key: unknown) {
  if (key === null || key === undefined) {
    throw new InvalidKeyError(part, key);
  }
}

/**
 * {@link Map2D} backed by a map of rows, each row a map of columns.
 *
 * Rows are dropped as soon as their last cell is removed, so a row exists
 * exactly when it holds at least one cell.
 */
export class HashMap2D<R extends Key, C extends Key, V>
  implements Map2D<R, C, V>
{
  private readonly rows = new KeyedMap<R, KeyedMap<C, V>>();
  private _size = 0;
  private readonly logger: Logger;

  constructor(private readonly options: Map2DOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  static from<R extends Key, C extends Key, V>(
    cells: Iterable<Cell<R, C, V>>,
    options?: Map2DOptions
  ): HashMap2D<R, C, V> {
    const map = new HashMap2D<R, C, V>(options);
    for (const [rowKey, columnKey, value] of cells) {
      map.put(rowKey, columnKey, value);
    }
    return map;
  }

  get size(): number {
    return this._size;
  }

  put(rowKey: R, columnKey: C, value: V): V | undefined {
    assertKey('row', rowKey);
    assertKey('column', columnKey);

    const existing = this.rows.get(rowKey);
    const row = existing ?? new KeyedMap<C, V>();
    const hadKey = row.has(columnKey);
    const previous = row.get(columnKey);
    row.set(columnKey, value);
    if (!existing) {
      this.rows.set(rowKey, row);
    }
    if (!hadKey) {
      this._size += 1;
    }
    return previous;
  }

  get(rowKey: R, columnKey: C): V | undefined {
    return this.rows.get(rowKey)?.get(columnKey);
  }

  getOrDefault(rowKey: R, columnKey: C, defaultValue: V): V {
    const value = this.get(rowKey, columnKey);
    return value === undefined ? defaultValue : value;
  }

  remove(rowKey: R, columnKey: C): V | undefined {
    const row = this.rows.get(rowKey);
    if (!row || !row.has(columnKey)) {
      return undefined;
    }
    const previous = row.get(columnKey);
    row.delete(columnKey);
    this._size -= 1;
    if (row.size === 0) {
      this.rows.delete(rowKey);
    }
    return previous;
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  nonEmpty(): boolean {
    return this._size !== 0;
  }

  clear() {
    this.rows.clear();
    this._size = 0;
  }

  rowView(rowKey: R): ImmutableKeyedMap<C, V> {
    return new ImmutableKeyedMap(this.rows.get(rowKey));
  }

  columnView(columnKey: C): ImmutableKeyedMap<R, V> {
    return (
      this.columnMapView().get(columnKey) ??
      ImmutableKeyedMap.empty<R, V>()
    );
  }

  containsValue(value: V): boolean {
    for (const stored of this.values()) {
      if (valuesEqual(stored, value)) {
        return true;
      }
    }
    return false;
  }

  containsKey(rowKey: R, columnKey: C): boolean {
    return this.get(rowKey, columnKey) !== undefined;
  }

  containsRow(rowKey: R): boolean {
    return this.rows.has(rowKey);
  }

  containsColumn(columnKey: C): boolean {
    for (const row of this.rows.values()) {
      if (row.has(columnKey)) {
        return true;
      }
    }
    return false;
  }

  rowMapView(): ImmutableKeyedMap<R, ImmutableKeyedMap<C, V>> {
    const snapshot: [R, ImmutableKeyedMap<C, V>][] = [];
    for (const [rowKey, row] of this.rows) {
      snapshot.push([rowKey, new ImmutableKeyedMap(row)]);
    }
    return new ImmutableKeyedMap(snapshot);
  }

  columnMapView(): ImmutableKeyedMap<C, ImmutableKeyedMap<R, V>> {
    const columns = new KeyedMap<C, [R, V][]>();
    for (const [rowKey, columnKey, value] of this.entries()) {
      let column = columns.get(columnKey);
      if (!column) {
        column = [];
        columns.set(columnKey, column);
      }
      column.push([rowKey, value]);
    }
    const snapshot: [C, ImmutableKeyedMap<R, V>][] = [];
    for (const [columnKey, column] of columns) {
      snapshot.push([columnKey, new ImmutableKeyedMap(column)]);
    }
    return new ImmutableKeyedMap(snapshot);
  }

  fillMapFromRow(
    target: FlatMapTarget<C, V> | null | undefined,
    rowKey: R
  ): this {
    if (!target) {
      this.logger.debug('fillMapFromRow skipped: target is absent');
      return this;
    }
    if (this.isEmpty()) {
      return this;
    }
    const row = this.rows.get(rowKey);
    if (!row) {
      return this;
    }
    target.clear();
    for (const [columnKey, value] of row) {
      target.set(columnKey, value);
    }
    return this;
  }

  fillMapFromColumn(
    target: FlatMapTarget<R, V> | null | undefined,
    columnKey: C
  ): this {
    if (!target) {
      this.logger.debug('fillMapFromColumn skipped: target is absent');
      return this;
    }
    const columns = this.columnMapView();
    if (columns.size === 0) {
      return this;
    }
    const column = columns.get(columnKey);
    if (column && column.size > 0) {
      target.clear();
      for (const [rowKey, value] of column) {
        target.set(rowKey, value);
      }
    }
    return this;
  }

  putAll(source: Map2D<R, C, V> | null | undefined): this {
    if (!source) {
      this.logger.debug('putAll skipped: source is absent');
      return this;
    }
    let count = 0;
    for (const [rowKey, row] of source.rowMapView()) {
      for (const [columnKey, value] of row) {
        this.put(rowKey, columnKey, value);
        count++;
      }
    }
    this.logger.trace('putAll merged entries', { count });
    return this;
  }

  putAllToRow(source: FlatMapSource<C, V> | null | undefined, rowKey: R): this {
    if (!source) {
      this.logger.debug('putAllToRow skipped: source is absent');
      return this;
    }
    assertKey('row', rowKey);
    const cells = Array.from(source);
    for (const [columnKey] of cells) {
      assertKey('column', columnKey);
    }

    const existing = this.rows.get(rowKey);
    const row = existing ?? new KeyedMap<C, V>();
    const before = row.size;
    for (const [columnKey, value] of cells) {
      row.set(columnKey, value);
    }
    this._size += row.size - before;
    if (!existing && row.size > 0) {
      this.rows.set(rowKey, row);
    }
    this.logger.trace('putAllToRow merged entries', { count: cells.length });
    return this;
  }

  putAllToColumn(
    source: FlatMapSource<R, V> | null | undefined,
    columnKey: C
  ): this {
    if (!source) {
      this.logger.debug('putAllToColumn skipped: source is absent');
      return this;
    }
    assertKey('column', columnKey);
    const cells = Array.from(source);
    for (const [rowKey] of cells) {
      assertKey('row', rowKey);
    }

    for (const [rowKey, value] of cells) {
      const row = this.rows.get(rowKey);
      if (row) {
        const before = row.size;
        row.set(columnKey, value);
        this._size += row.size - before;
      } else {
        this.put(rowKey, columnKey, value);
      }
    }
    this.logger.trace('putAllToColumn merged entries', {
      count: cells.length,
    });
    return this;
  }

  copyWithConversion<R2 extends Key, C2 extends Key, V2>(
    rowFunction: (rowKey: R) => R2,
    columnFunction: (columnKey: C) => C2,
    valueFunction: (value: V) => V2
  ): HashMap2D<R2, C2, V2> {
    const converted = new HashMap2D<R2, C2, V2>(this.options);
    let collisions = 0;
    for (const [rowKey, columnKey, value] of this.entries()) {
      const convertedRowKey = rowFunction(rowKey);
      const convertedColumnKey = columnFunction(columnKey);
      // First cell wins
      if (converted.hasCell(convertedRowKey, convertedColumnKey)) {
        collisions++;
        continue;
      }
      converted.put(convertedRowKey, convertedColumnKey, valueFunction(value));
    }
    if (collisions > 0) {
      this.logger.debug('copyWithConversion dropped colliding entries', {
        collisions,
      });
    }
    return converted;
  }

  private hasCell(rowKey: R, columnKey: C): boolean {
    return this.rows.get(rowKey)?.has(columnKey) ?? false;
  }

  *entries(): IterableIterator<Cell<R, C, V>> {
    for (const [rowKey, row] of this.rows) {
      for (const [columnKey, value] of row) {
        yield [rowKey, columnKey, value];
      }
    }
  }

  [Symbol.iterator](): IterableIterator<Cell<R, C, V>> {
    return this.entries();
  }

  rowKeys(): IterableIterator<R> {
    return this.rows.keys();
  }

  *columnKeys(): IterableIterator<C> {
    const seen = new KeyedMap<C, true>();
    for (const row of this.rows.values()) {
      for (const columnKey of row.keys()) {
        if (!seen.has(columnKey)) {
          seen.set(columnKey, true);
          yield columnKey;
        }
      }
    }
  }

  *values(): IterableIterator<V> {
    for (const row of this.rows.values()) {
      yield* row.values();
    }
  }

  forEach(
    callback: (value: V, rowKey: R, columnKey: C, map: this) => void
  ): void {
    for (const [rowKey, columnKey, value] of this.entries()) {
      callback(value, rowKey, columnKey, this);
    }
  }

  equals(other: Map2D<R, C, V> | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    if (other.size !== this._size) return false;
    for (const [rowKey, columnKey, value] of other.entries()) {
      if (!this.hasCell(rowKey, columnKey)) return false;
      if (!valuesEqual(this.get(rowKey, columnKey), value)) return false;
    }
    return true;
  }
}

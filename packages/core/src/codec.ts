// The codec turns a key into a canonical string so that keys compare by value.
// Two keys are equal exactly when their encodings are equal.

import { UnencodableKeyError } from './errors.js';

/**
 * Extension point for user-defined key classes. Instances with equal
 * `hashKey()` results are the same key.
 */
export interface Hashable {
  hashKey(): string;
}

export type KeyPrimitive = string | number | bigint | boolean;

/**
 * Types usable as row or column keys.
 *
 * Plain data (type aliases and object literals) works as is. Classes should
 * implement {@link Hashable}.
 */
export type Key =
  | KeyPrimitive
  | Date
  | Hashable
  | readonly KeyPart[]
  | ReadonlyMap<KeyPart, KeyPart>
  | ReadonlySet<KeyPart>
  | { readonly [key: string]: KeyPart };

/**
 * A value allowed inside a composite key. Unlike a top level row or column
 * key, nested parts may be `null`.
 */
export type KeyPart = Key | null | undefined;

export const encodingByte = {
  undefined: 'u',
  null: 'z',
  boolean: 'b',
  number: 'n',
  bigint: 'i',
  string: 's',
  date: 'd',
  array: 'a',
  map: 'm',
  set: 'e',
  object: 'o',
  hashable: 'h',
  instance: 'c',
} as const;

export type EncodingType = keyof typeof encodingByte;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hashKey' in value &&
    typeof value.hashKey === 'function'
  );
}

export function encodingTypeOf(value: unknown): EncodingType {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'bigint':
      return 'bigint';
    case 'string':
      return 'string';
    case 'object':
      if (isHashable(value)) return 'hashable';
      if (value instanceof Date) return 'date';
      if (Array.isArray(value)) return 'array';
      if (value instanceof Map) return 'map';
      if (value instanceof Set) return 'set';
      if (isPlainObject(value)) return 'object';
      return 'instance';
  }
  throw new UnencodableKeyError(describe(value));
}

function describe(value: unknown): string {
  if (typeof value === 'function') {
    return `function ${value.name || '(anonymous)'}`;
  }
  return String(value);
}

function encodeNumber(value: number): string {
  // -0 and 0 are the same key
  return Object.is(value, -0) ? '0' : String(value);
}

function encodeEntries(entries: [string, unknown][]): string {
  return (
    '{' +
    entries
      .filter(([, v]) => v !== undefined)
      .sort(([k1], [k2]) => (k1 < k2 ? -1 : k1 > k2 ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${encodeKey(v)}`)
      .join(',') +
    '}'
  );
}

/**
 * Encodes a key into its canonical string form.
 *
 * Strings are JSON quoted so every encoded part is self delimiting. Object
 * properties are sorted and `undefined` properties are ignored, so
 * `{ a: 1, b: undefined }` and `{ a: 1 }` are the same key. Maps and sets
 * compare by content regardless of insertion order.
 *
 * Class instances without `hashKey` are encoded by constructor name and own
 * enumerable properties. An instance with no such properties (a `RegExp`, or a
 * class holding only `#private` state) has nothing to compare by and is
 * rejected.
 */
export function encodeKey(key: unknown): string {
  if (key === undefined) return encodingByte.undefined;
  if (key === null) return encodingByte.null;
  if (typeof key === 'boolean') return encodingByte.boolean + String(key);
  if (typeof key === 'number') return encodingByte.number + encodeNumber(key);
  if (typeof key === 'bigint') return encodingByte.bigint + String(key);
  if (typeof key === 'string') return encodingByte.string + JSON.stringify(key);
  if (typeof key !== 'object') throw new UnencodableKeyError(describe(key));

  if (isHashable(key)) {
    return encodingByte.hashable + JSON.stringify(key.hashKey());
  }
  if (key instanceof Date) {
    return encodingByte.date + encodeNumber(key.getTime());
  }
  if (Array.isArray(key)) {
    const parts: unknown[] = key;
    return encodingByte.array + '[' + parts.map(encodeKey).join(',') + ']';
  }
  if (key instanceof Map) {
    const pairs: string[] = [];
    key.forEach((value: unknown, mapKey: unknown) => {
      pairs.push(`${encodeKey(mapKey)}:${encodeKey(value)}`);
    });
    return encodingByte.map + '{' + pairs.sort().join(',') + '}';
  }
  if (key instanceof Set) {
    const members: string[] = [];
    key.forEach((member: unknown) => {
      members.push(encodeKey(member));
    });
    return encodingByte.set + '[' + members.sort().join(',') + ']';
  }

  const entries = Object.entries(key);
  if (isPlainObject(key)) {
    return encodingByte.object + encodeEntries(entries);
  }
  // Instances of different classes are never equal
  const ctor: unknown = Object.getPrototypeOf(key)?.constructor;
  const name = typeof ctor === 'function' ? ctor.name : '';
  if (entries.length === 0) {
    throw new UnencodableKeyError(
      `${name || 'anonymous'} instance without enumerable properties`
    );
  }
  return encodingByte.instance + JSON.stringify(name) + encodeEntries(entries);
}

export function keysEqual(a: unknown, b: unknown): boolean {
  return encodeKey(a) === encodeKey(b);
}

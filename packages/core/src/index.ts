export type { Map2D } from './map2d.js';
export { HashMap2D, type Map2DOptions } from './hash-map2d.js';
export { BaseKeyedMap, KeyedMap, ImmutableKeyedMap } from './keyed-map.js';
export {
  encodeKey,
  encodingByte,
  encodingTypeOf,
  isHashable,
  isPlainObject,
  keysEqual,
  type EncodingType,
  type Hashable,
  type Key,
  type KeyPart,
  type KeyPrimitive,
} from './codec.js';
export { valuesEqual } from './utils/equality.js';
export {
  Map2DError,
  InvalidKeyError,
  UnencodableKeyError,
  isMap2DError,
} from './errors.js';
export type {
  Cell,
  FlatMapSource,
  FlatMapTarget,
} from '@map2d/types/collections';
export type { IMap2DError } from '@map2d/types/errors';

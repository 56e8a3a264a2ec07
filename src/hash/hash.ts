/***
 * Hash - Key hashing and equality for HashMap.
 *
 * A Hasher maps a key to an unsigned 32-bit integer; the map reduces it
 * modulo its bucket count. Strings use FNV-1a over UTF-16 code units,
 * int32 numbers and booleans a golden-ratio multiply. Everything else
 * that is a primitive goes through its string form.
 *
 * Object keys have no structural hash; callers supply their own
 * hasher/equality pair (e.g. hashing an object's id field).
 *
 ***/

import {
  FNV_OFFSET_BASIS,
  FNV_PRIME,
  HASH_GOLDEN_RATIO,
  HASH_SECONDARY_PRIME,
} from "../utils/constants";
import { HASH_MAP_ERROR, HashMapError } from "../utils/error";

export type Hasher<K> = (key: K) => number;
export type Equality<K> = (a: K, b: K) => boolean;

export function hash_string(key: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

export function hash_number(key: number): number {
  // int32 check; -0 passes too and hashes as 0, matching same_value_zero
  if ((key | 0) === key) {
    return Math.imul(key | 0, HASH_GOLDEN_RATIO) >>> 0;
  }
  return hash_string(String(key));
}

export function hash_boolean(key: boolean): number {
  return (key ? HASH_SECONDARY_PRIME : HASH_GOLDEN_RATIO) >>> 0;
}

/**
 * Hash any primitive key. Throws UNHASHABLE_KEY for objects, symbols,
 * functions, null and undefined.
 */
export function default_hash(key: unknown): number {
  switch (typeof key) {
    case "string":
      return hash_string(key);
    case "number":
      return hash_number(key);
    case "boolean":
      return hash_boolean(key);
    case "bigint":
      return hash_string(key.toString());
    default:
      throw new HashMapError(
        HASH_MAP_ERROR.UNHASHABLE_KEY,
        `No default hash for keys of type ${key === null ? "null" : typeof key}; pass a hasher`,
      );
  }
}

/** SameValueZero, the equality native Map uses: NaN equals NaN, 0 equals -0. */
export function same_value_zero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

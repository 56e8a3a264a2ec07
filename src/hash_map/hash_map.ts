/***
 *
 * HashMap - Separate-chaining hash table with cursor traversal.
 *
 * Keys hash to a bucket (hash mod capacity); colliding keys form a chain
 * hanging off that bucket. New keys are appended at the chain tail, so a
 * chain lists its keys in insertion order. Entries live in an EntryArena
 * and chains link them by EntryID.
 *
 * Growth: after an insert that adds a key, if size / capacity exceeds
 * LOAD_FACTOR_THRESHOLD (0.4) the table rehashes to
 * size * RESIZE_MULTIPLE + RESIZE_INCREMENT buckets before insert returns.
 * The additive increment matters for small tables, where tripling alone
 * would resize again almost immediately.
 *
 * Resize invalidates every cursor obtained before it (see cursor.ts).
 *
 * Usage:
 *
 *   const prices = new HashMap<string, number>();
 *   prices.insert("coal", 1.2);
 *   const { updated } = prices.insert("coal", 1.4); // updated === true
 *
 *   for (const it = prices.begin(); !it.is_end; it.next()) {
 *     it.value *= 2;
 *   }
 *
 ***/

import { is_positive_integer } from "../type_primitives";
import { __DEV__ } from "../utils/dev";
import {
  DEFAULT_BUCKET_COUNT,
  LOAD_FACTOR_THRESHOLD,
  NO_ENTRY,
  RESIZE_INCREMENT,
  RESIZE_MULTIPLE,
} from "../utils/constants";
import { HASH_MAP_ERROR, HashMapError } from "../utils/error";
import {
  default_hash,
  same_value_zero,
  type Equality,
  type Hasher,
} from "../hash/hash";
import { BucketStore } from "./bucket_store";
import { EntryArena, type EntryID } from "./entry_arena";
import {
  Cursor,
  ReadonlyCursor,
  type ChainPosition,
  type CursorSource,
} from "./cursor";

export interface HashMapOptions<K> {
  /** Bucket count before any growth. Defaults to 23. */
  initial_size?: number;
  /** Defaults to default_hash, which covers primitive keys. */
  hash?: Hasher<K>;
  /** Defaults to SameValueZero. Must agree with `hash`. */
  equals?: Equality<K>;
}

export interface InsertResult<K, V> {
  /** Points at the inserted or updated entry. */
  cursor: Cursor<K, V>;
  /** True when the key already existed and its value was overwritten. */
  updated: boolean;
}

/** Tuning statistics. */
export interface HashMapStats {
  size: number;
  capacity: number;
  load_factor: number;
  /** Entries appended behind an existing chain head since the last resize. */
  collisions: number;
  /** Growth resizes triggered by insert. */
  resizes: number;
}

export class HashMap<K, V> implements CursorSource<K, V>, Iterable<[K, V]> {
  private readonly _hash: Hasher<K>;
  private readonly _equals: Equality<K>;
  private readonly _arena = new EntryArena<K, V>();
  private _buckets: BucketStore;
  private _entry_count = 0;
  private _generation = 0;
  private _collisions = 0;
  private _resizes = 0;

  constructor(options?: HashMapOptions<K>) {
    const initial_size = options?.initial_size ?? DEFAULT_BUCKET_COUNT;
    check_capacity(initial_size);
    this._hash = options?.hash ?? default_hash;
    this._equals = options?.equals ?? same_value_zero;
    this._buckets = new BucketStore(initial_size);
  }

  /** The universal end sentinel. */
  static end<K, V>(): Cursor<K, V> {
    return new Cursor<K, V>(null, null);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of distinct keys. */
  get size(): number {
    return this._entry_count;
  }

  get is_empty(): boolean {
    return this._entry_count === 0;
  }

  /** Current bucket count. */
  get capacity(): number {
    return this._buckets.capacity;
  }

  /** Incremented whenever a resize relinks the chains. */
  get generation(): number {
    return this._generation;
  }

  find(key: K): Cursor<K, V> {
    return new Cursor(this.locate(key), this);
  }

  find_readonly(key: K): ReadonlyCursor<K, V> {
    return new ReadonlyCursor(this.locate(key), this);
  }

  has(key: K): boolean {
    return this.locate(key) !== null;
  }

  get(key: K): V | undefined {
    const position = this.locate(key);
    return position === null ? undefined : this._arena.value(position.entry);
  }

  begin(): Cursor<K, V> {
    return new Cursor(this.first_position(), this);
  }

  begin_readonly(): ReadonlyCursor<K, V> {
    return new ReadonlyCursor(this.first_position(), this);
  }

  end(): Cursor<K, V> {
    return HashMap.end<K, V>();
  }

  stats(): HashMapStats {
    return {
      size: this._entry_count,
      capacity: this._buckets.capacity,
      load_factor: this._entry_count / this._buckets.capacity,
      collisions: this._collisions,
      resizes: this._resizes,
    };
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Insert a key or overwrite its value.
   *
   * A new key goes to the tail of its bucket's chain. If that pushes the
   * load factor over the threshold the table resizes before returning,
   * and the returned cursor already reflects the new layout.
   */
  insert(key: K, value: V): InsertResult<K, V> {
    const bucket = this.bucket_of(key);

    let prev: EntryID | typeof NO_ENTRY = NO_ENTRY;
    let curr = this._buckets.head(bucket);
    while (curr !== NO_ENTRY) {
      if (this._equals(this._arena.key(curr), key)) {
        this._arena.set_value(curr, value);
        return {
          cursor: new Cursor({ entry: curr, bucket }, this),
          updated: true,
        };
      }
      prev = curr;
      curr = this._arena.next(curr);
    }

    const id = this._arena.allocate(key, value);
    this._entry_count++;
    if (prev === NO_ENTRY) {
      this._buckets.set_head(bucket, id);
    } else {
      this._arena.link(prev, id);
      this._collisions++;
    }

    if (this._entry_count / this._buckets.capacity > LOAD_FACTOR_THRESHOLD) {
      this._resizes++;
      this.resize(this._entry_count * RESIZE_MULTIPLE + RESIZE_INCREMENT);
      return {
        cursor: new Cursor({ entry: id, bucket: this.bucket_of(key) }, this),
        updated: false,
      };
    }

    return { cursor: new Cursor({ entry: id, bucket }, this), updated: false };
  }

  /**
   * Rehash every entry into `new_size` buckets. No-op when the size is
   * unchanged.
   *
   * Entries are moved, never copied, and entry_count is untouched. Every
   * key is hashed before the first link changes, so a throwing hasher
   * leaves the map as it was.
   */
  resize(new_size: number): void {
    check_capacity(new_size);
    if (new_size === this._buckets.capacity) return;

    const ids = this.collect_entries();
    const targets = new Int32Array(ids.length);
    for (let i = 0; i < ids.length; i++) {
      targets[i] = this.hash_to_bucket(this._arena.key(ids[i]), new_size);
    }
    const buckets = new BucketStore(new_size);

    for (let i = 0; i < ids.length; i++) this._arena.unlink(ids[i]);

    let collisions = 0;
    for (let i = 0; i < ids.length; i++) {
      const id = ids[i];
      const bucket = targets[i];
      let tail = buckets.head(bucket);
      if (tail === NO_ENTRY) {
        buckets.set_head(bucket, id);
        continue;
      }
      let next = this._arena.next(tail);
      while (next !== NO_ENTRY) {
        tail = next;
        next = this._arena.next(tail);
      }
      this._arena.link(tail, id);
      collisions++;
    }

    this._buckets = buckets;
    this._collisions = collisions;
    this._generation++;
  }

  for_each(fn: (value: V, key: K) => void): void {
    for (const it = this.begin_readonly(); !it.is_end; it.next()) {
      fn(it.value, it.key);
    }
  }

  //=========================================================
  // Iteration
  //=========================================================

  *entries(): IterableIterator<[K, V]> {
    for (const it = this.begin_readonly(); !it.is_end; it.next()) {
      yield [it.key, it.value];
    }
  }

  *keys(): IterableIterator<K> {
    for (const it = this.begin_readonly(); !it.is_end; it.next()) {
      yield it.key;
    }
  }

  *values(): IterableIterator<V> {
    for (const it = this.begin_readonly(); !it.is_end; it.next()) {
      yield it.value;
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  //=========================================================
  // CursorSource
  //=========================================================

  entry_key(id: EntryID): K {
    return this._arena.key(id);
  }

  entry_value(id: EntryID): V {
    return this._arena.value(id);
  }

  set_entry_value(id: EntryID, value: V): void {
    this._arena.set_value(id, value);
  }

  next_position(entry: EntryID, bucket: number): ChainPosition | null {
    const successor = this._arena.next(entry);
    if (successor !== NO_ENTRY) return { entry: successor, bucket };
    return this.occupied_from(bucket + 1);
  }

  //=========================================================
  // Internal
  //=========================================================

  private bucket_of(key: K): number {
    return this.hash_to_bucket(key, this._buckets.capacity);
  }

  private hash_to_bucket(key: K, capacity: number): number {
    return (this._hash(key) >>> 0) % capacity;
  }

  private locate(key: K): ChainPosition | null {
    const bucket = this.bucket_of(key);
    for (
      let curr = this._buckets.head(bucket);
      curr !== NO_ENTRY;
      curr = this._arena.next(curr)
    ) {
      if (this._equals(this._arena.key(curr), key)) {
        return { entry: curr, bucket };
      }
    }
    return null;
  }

  private first_position(): ChainPosition | null {
    if (this._entry_count === 0) return null;
    return this.occupied_from(0);
  }

  private occupied_from(from: number): ChainPosition | null {
    const bucket = this._buckets.first_occupied(from);
    if (bucket === NO_ENTRY) return null;
    const head = this._buckets.head(bucket);
    if (head === NO_ENTRY) return null;
    return { entry: head, bucket };
  }

  /**
   * Every entry reachable from the buckets, in ascending id order.
   *
   * Relinking in this order keeps each successor newer than its
   * predecessor. A count that disagrees with entry_count means a chain
   * was corrupted.
   */
  private collect_entries(): EntryID[] {
    if (__DEV__ && this._arena.size !== this._entry_count) {
      throw entry_count_mismatch(this._arena.size, this._entry_count);
    }
    const ids: EntryID[] = [];
    let found = 0;
    for (let bucket = 0; bucket < this._buckets.capacity; bucket++) {
      for (
        let curr = this._buckets.head(bucket);
        curr !== NO_ENTRY;
        curr = this._arena.next(curr)
      ) {
        if (found === this._entry_count) {
          throw entry_count_mismatch(found + 1, this._entry_count);
        }
        ids.push(curr);
        found++;
      }
    }
    if (found !== this._entry_count) {
      throw entry_count_mismatch(found, this._entry_count);
    }
    return ids.sort((a, b) => a - b);
  }
}

//=========================================================
// Helpers
//=========================================================

function check_capacity(capacity: number): void {
  if (!is_positive_integer(capacity)) {
    throw new HashMapError(
      HASH_MAP_ERROR.INVALID_CAPACITY,
      `Bucket count must be a positive integer, got ${capacity}`,
      { capacity },
    );
  }
}

function entry_count_mismatch(found: number, expected: number): HashMapError {
  return new HashMapError(
    HASH_MAP_ERROR.ENTRY_COUNT_MISMATCH,
    `Found ${found} reachable entries, expected ${expected}`,
    { found, expected },
  );
}

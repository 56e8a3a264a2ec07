/***
 *
 * EntryArena - Owns every key/value entry of a HashMap.
 *
 * Entries are addressed by EntryID (their allocation index) and are
 * never freed or moved individually; the arena lives and dies with its
 * map. Keys and values sit in parallel dense arrays, successor links in
 * a growable Int32Array, so a chain is a walk over integer ids.
 *
 * A successor id is always greater than the id linking to it. Appending
 * at insert time gets this for free (the new entry is the newest), and
 * resize relinks in ascending id order, so no chain can loop back on
 * itself. link() checks the ordering in dev builds.
 *
 ***/

import {
  type Brand,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "../type_primitives";
import { __DEV__ } from "../utils/dev";
import {
  ARENA_GROWTH_FACTOR,
  INITIAL_ARENA_CAPACITY,
  NO_ENTRY,
} from "../utils/constants";
import { HASH_MAP_ERROR, HashMapError } from "../utils/error";

export type EntryID = Brand<number, "entry_id">;
export const as_entry_id = (value: number) =>
  validate_and_cast<number, EntryID>(
    value,
    is_non_negative_integer,
    "EntryID must be a non-negative integer",
  );

export class EntryArena<K, V> {
  private readonly _keys: K[] = [];
  private readonly _values: V[] = [];
  private _next: Int32Array = new Int32Array(INITIAL_ARENA_CAPACITY).fill(
    NO_ENTRY,
  );

  /** Number of entries ever allocated. */
  get size(): number {
    return this._keys.length;
  }

  //=========================================================
  // Access
  //=========================================================

  key(id: EntryID): K {
    return this._keys[id];
  }

  value(id: EntryID): V {
    return this._values[id];
  }

  set_value(id: EntryID, value: V): void {
    this._values[id] = value;
  }

  /** Successor in the chain, or NO_ENTRY at the tail. */
  next(id: EntryID): EntryID | typeof NO_ENTRY {
    const successor = this._next[id];
    return successor === NO_ENTRY ? NO_ENTRY : unsafe_cast<EntryID>(successor);
  }

  //=========================================================
  // Mutations
  //=========================================================

  /** Allocate a fresh, unlinked entry. */
  allocate(key: K, value: V): EntryID {
    const id = as_entry_id(this._keys.length);
    if (id >= this._next.length) this.grow();
    this._keys.push(key);
    this._values.push(value);
    this._next[id] = NO_ENTRY;
    return id;
  }

  /** Make `successor` follow `id` in its chain. */
  link(id: EntryID, successor: EntryID): void {
    if (__DEV__ && successor <= id) {
      throw new HashMapError(
        HASH_MAP_ERROR.CHAIN_CYCLE,
        `Entry ${successor} cannot follow entry ${id}`,
        { id, successor },
      );
    }
    this._next[id] = successor;
  }

  /** Clear the successor link of `id`. */
  unlink(id: EntryID): void {
    this._next[id] = NO_ENTRY;
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(): void {
    const next = new Int32Array(
      this._next.length * ARENA_GROWTH_FACTOR,
    ).fill(NO_ENTRY);
    next.set(this._next);
    this._next = next;
  }
}

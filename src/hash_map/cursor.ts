/***
 *
 * Cursor - Forward traversal over a HashMap.
 *
 * A cursor holds the entry it points at, that entry's bucket index, and
 * the map that owns both (so it can resume the bucket scan once a chain
 * runs out). Order is chain first, then increasing bucket index.
 *
 * One traversal core, two capability views:
 *   ReadonlyCursor  key + value
 *   Cursor          key + value, value writable in place
 *
 * The end sentinel has no entry, bucket 0 and no owning map, so every
 * end cursor equals every other regardless of where it came from.
 *
 * Invalidation: a resize relinks every chain, so cursors obtained before
 * it no longer describe a valid position. Re-derive them with find() or
 * begin(). Dev builds catch stale use through the map's generation
 * counter and throw STALE_CURSOR.
 *
 ***/

import { __DEV__ } from "../utils/dev";
import { NO_ENTRY } from "../utils/constants";
import { HASH_MAP_ERROR, HashMapError } from "../utils/error";
import type { EntryID } from "./entry_arena";

//=========================================================
// Traversal contract
//=========================================================

export interface ChainPosition {
  readonly entry: EntryID;
  readonly bucket: number;
}

/** What a cursor needs from the map it walks. */
export interface CursorSource<K, V> {
  /** Bumped on every resize; cursors compare it against their own copy. */
  readonly generation: number;
  entry_key(id: EntryID): K;
  entry_value(id: EntryID): V;
  set_entry_value(id: EntryID, value: V): void;
  /** Position after (entry, bucket), or null past the last entry. */
  next_position(entry: EntryID, bucket: number): ChainPosition | null;
}

//=========================================================
// Shared core
//=========================================================

export abstract class CursorCore<K, V> {
  protected _entry: EntryID | typeof NO_ENTRY;
  protected _bucket: number;
  protected _source: CursorSource<K, V> | null;
  protected _generation: number;

  constructor(
    position: ChainPosition | null,
    source: CursorSource<K, V> | null,
    generation?: number,
  ) {
    if (position === null || source === null) {
      this._entry = NO_ENTRY;
      this._bucket = 0;
      this._source = null;
      this._generation = 0;
    } else {
      this._entry = position.entry;
      this._bucket = position.bucket;
      this._source = source;
      this._generation = generation ?? source.generation;
    }
  }

  get is_end(): boolean {
    return this._entry === NO_ENTRY;
  }

  /** Bucket index of the current entry (0 for the end sentinel). */
  get bucket(): number {
    return this._bucket;
  }

  get key(): K {
    const source = this.live(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
    return source.entry_key(this.current());
  }

  /** Same owning map, same entry, same bucket. End cursors are all equal. */
  equals(other: CursorCore<K, V>): boolean {
    return (
      this._entry === other._entry &&
      this._bucket === other._bucket &&
      this._source === other._source
    );
  }

  protected read_value(): V {
    const source = this.live(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
    return source.entry_value(this.current());
  }

  protected write_value(value: V): void {
    const source = this.live(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
    source.set_entry_value(this.current(), value);
  }

  /** Step to the next entry, or become the end sentinel. */
  protected advance(): void {
    const source = this.live(HASH_MAP_ERROR.END_CURSOR_ADVANCE);
    const position = source.next_position(this.current(), this._bucket);
    if (position === null) {
      this._entry = NO_ENTRY;
      this._bucket = 0;
      this._source = null;
      this._generation = 0;
      return;
    }
    this._entry = position.entry;
    this._bucket = position.bucket;
  }

  protected position(): ChainPosition | null {
    if (this._entry === NO_ENTRY) return null;
    return { entry: this._entry, bucket: this._bucket };
  }

  //=========================================================
  // Internal
  //=========================================================

  private live(on_end: HASH_MAP_ERROR): CursorSource<K, V> {
    const source = this._source;
    if (source === null || this._entry === NO_ENTRY) {
      throw new HashMapError(on_end);
    }
    if (__DEV__ && source.generation !== this._generation) {
      throw new HashMapError(
        HASH_MAP_ERROR.STALE_CURSOR,
        "Cursor was obtained before the map resized",
        { cursor_generation: this._generation, map_generation: source.generation },
      );
    }
    return source;
  }

  private current(): EntryID {
    if (this._entry === NO_ENTRY) {
      throw new HashMapError(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
    }
    return this._entry;
  }
}

//=========================================================
// Views
//=========================================================

export class ReadonlyCursor<K, V> extends CursorCore<K, V> {
  get value(): V {
    return this.read_value();
  }

  /** Advance in place (prefix increment). Throws on the end sentinel. */
  next(): this {
    this.advance();
    return this;
  }

  /** Independent copy at the same position (postfix increment). */
  clone(): ReadonlyCursor<K, V> {
    return new ReadonlyCursor(this.position(), this._source, this._generation);
  }
}

export class Cursor<K, V> extends CursorCore<K, V> {
  get value(): V {
    return this.read_value();
  }

  set value(value: V) {
    this.write_value(value);
  }

  /** Advance in place (prefix increment). Throws on the end sentinel. */
  next(): this {
    this.advance();
    return this;
  }

  clone(): Cursor<K, V> {
    return new Cursor(this.position(), this._source, this._generation);
  }

  /** Read-only view at the same position. */
  as_readonly(): ReadonlyCursor<K, V> {
    return new ReadonlyCursor(this.position(), this._source, this._generation);
  }
}

/***
 *
 * BucketStore - One chain head per hash slot.
 *
 * A slot holds the EntryID at the head of its chain, or NO_ENTRY when
 * the bucket is empty. Capacity is fixed for the store's lifetime; a
 * HashMap that grows builds a new store and swaps it in.
 *
 ***/

import { unsafe_cast } from "../type_primitives";
import { NO_ENTRY } from "../utils/constants";
import type { EntryID } from "./entry_arena";

export class BucketStore {
  private readonly _heads: Int32Array;

  constructor(capacity: number) {
    this._heads = new Int32Array(capacity).fill(NO_ENTRY);
  }

  get capacity(): number {
    return this._heads.length;
  }

  head(bucket: number): EntryID | typeof NO_ENTRY {
    const head = this._heads[bucket];
    // slots only ever receive EntryIDs or NO_ENTRY
    return head === NO_ENTRY ? NO_ENTRY : unsafe_cast<EntryID>(head);
  }

  set_head(bucket: number, id: EntryID): void {
    this._heads[bucket] = id;
  }

  /** First non-empty bucket at index >= `from`, or NO_ENTRY if none. */
  first_occupied(from: number): number {
    for (let i = from; i < this._heads.length; i++) {
      if (this._heads[i] !== NO_ENTRY) return i;
    }
    return NO_ENTRY;
  }
}

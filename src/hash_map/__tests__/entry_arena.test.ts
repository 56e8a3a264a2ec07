import { describe, expect, it } from "vitest";
import { EntryArena, as_entry_id } from "../entry_arena";
import { HashMapError, HASH_MAP_ERROR } from "../../utils/error";
import { TypeError, TYPE_ERROR } from "../../type_primitives";
import { NO_ENTRY } from "../../utils/constants";

describe("EntryArena", () => {
  //=========================================================
  // Allocation
  //=========================================================

  it("allocates sequential ids starting at 0", () => {
    const arena = new EntryArena<string, number>();
    expect(arena.allocate("a", 1)).toBe(0);
    expect(arena.allocate("b", 2)).toBe(1);
    expect(arena.size).toBe(2);
  });

  it("new entries are unlinked", () => {
    const arena = new EntryArena<string, number>();
    const id = arena.allocate("a", 1);
    expect(arena.next(id)).toBe(NO_ENTRY);
  });

  it("stores key and value per entry", () => {
    const arena = new EntryArena<string, number>();
    const a = arena.allocate("a", 1);
    const b = arena.allocate("b", 2);
    expect(arena.key(a)).toBe("a");
    expect(arena.value(b)).toBe(2);
    arena.set_value(a, 10);
    expect(arena.value(a)).toBe(10);
  });

  it("grows past its initial capacity", () => {
    const arena = new EntryArena<number, number>();
    for (let i = 0; i < 40; i++) arena.allocate(i, i * 2);
    const last = as_entry_id(39);
    expect(arena.key(last)).toBe(39);
    expect(arena.value(last)).toBe(78);
    expect(arena.next(last)).toBe(NO_ENTRY);
  });

  //=========================================================
  // Linking
  //=========================================================

  it("link and unlink set the successor", () => {
    const arena = new EntryArena<string, number>();
    const a = arena.allocate("a", 1);
    const b = arena.allocate("b", 2);
    arena.link(a, b);
    expect(arena.next(a)).toBe(b);
    arena.unlink(a);
    expect(arena.next(a)).toBe(NO_ENTRY);
  });

  it("links survive growth", () => {
    const arena = new EntryArena<number, number>();
    const first = arena.allocate(0, 0);
    for (let i = 1; i < 20; i++) arena.allocate(i, i);
    const last = as_entry_id(19);
    arena.link(first, last);
    for (let i = 20; i < 70; i++) arena.allocate(i, i);
    expect(arena.next(first)).toBe(last);
  });

  it("rejects a successor that is not newer than its predecessor", () => {
    const arena = new EntryArena<string, number>();
    const a = arena.allocate("a", 1);
    const b = arena.allocate("b", 2);
    expect(() => arena.link(b, a)).toThrow(HashMapError);
    try {
      arena.link(b, a);
    } catch (e) {
      expect((e as HashMapError).category).toBe(HASH_MAP_ERROR.CHAIN_CYCLE);
    }
  });

  it("rejects a self link", () => {
    const arena = new EntryArena<string, number>();
    const a = arena.allocate("a", 1);
    expect(() => arena.link(a, a)).toThrow(HashMapError);
  });

  //=========================================================
  // EntryID
  //=========================================================

  it("as_entry_id rejects negative and fractional values", () => {
    expect(() => as_entry_id(-1)).toThrow(TypeError);
    expect(() => as_entry_id(1.5)).toThrow(TypeError);
    try {
      as_entry_id(-1);
    } catch (e) {
      expect((e as TypeError).category).toBe(
        TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      );
    }
  });
});

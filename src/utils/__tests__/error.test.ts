import { describe, expect, it } from "vitest";
import {
  AppError,
  HashMapError,
  HASH_MAP_ERROR,
  RegistryError,
  REGISTRY_ERROR,
  is_hash_map_error,
  is_registry_error,
} from "../error";

describe("HashMapError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new HashMapError(HASH_MAP_ERROR.STALE_CURSOR);
    expect(err.category).toBe(HASH_MAP_ERROR.STALE_CURSOR);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new HashMapError(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
    expect(err.message).toBe(HASH_MAP_ERROR.END_CURSOR_DEREFERENCE);
  });

  it("uses provided message when given", () => {
    const err = new HashMapError(
      HASH_MAP_ERROR.INVALID_CAPACITY,
      "bucket count must be positive",
    );
    expect(err.message).toBe("bucket count must be positive");
  });

  it("is never operational", () => {
    const err = new HashMapError(HASH_MAP_ERROR.CHAIN_CYCLE);
    expect(err.is_operational).toBe(false);
  });

  it("stores provided context", () => {
    const err = new HashMapError(HASH_MAP_ERROR.ENTRY_COUNT_MISMATCH, "bad", {
      found: 3,
      expected: 4,
    });
    expect(err.context).toEqual({ found: 3, expected: 4 });
  });

  it("sets name to HashMapError", () => {
    const err = new HashMapError(HASH_MAP_ERROR.UNHASHABLE_KEY);
    expect(err.name).toBe("HashMapError");
  });

  it("is an instance of AppError and Error", () => {
    const err = new HashMapError(HASH_MAP_ERROR.END_CURSOR_ADVANCE);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  it("all HASH_MAP_ERROR enum members are distinct strings", () => {
    const values = Object.values(HASH_MAP_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_hash_map_error guard
  //=========================================================

  it("is_hash_map_error recognises only HashMapError", () => {
    expect(is_hash_map_error(new HashMapError(HASH_MAP_ERROR.STALE_CURSOR))).toBe(true);
    expect(is_hash_map_error(new RegistryError(REGISTRY_ERROR.REGISTRY_DISPOSED))).toBe(false);
    expect(is_hash_map_error(new Error("plain"))).toBe(false);
    expect(is_hash_map_error(null)).toBe(false);
    expect(is_hash_map_error("string")).toBe(false);
  });
});

describe("RegistryError", () => {
  it("is operational", () => {
    const err = new RegistryError(REGISTRY_ERROR.REGISTRY_DISPOSED);
    expect(err.is_operational).toBe(true);
  });

  it("defaults the message to the category", () => {
    const err = new RegistryError(REGISTRY_ERROR.REGISTER_DURING_TEARDOWN);
    expect(err.message).toBe(REGISTRY_ERROR.REGISTER_DURING_TEARDOWN);
    expect(err.context).toBeUndefined();
  });

  it("sets name to RegistryError", () => {
    const err = new RegistryError(REGISTRY_ERROR.REGISTRY_DISPOSED);
    expect(err.name).toBe("RegistryError");
  });

  it("is_registry_error recognises only RegistryError", () => {
    expect(is_registry_error(new RegistryError(REGISTRY_ERROR.REGISTRY_DISPOSED))).toBe(true);
    expect(is_registry_error(new HashMapError(HASH_MAP_ERROR.CHAIN_CYCLE))).toBe(false);
    expect(is_registry_error(undefined)).toBe(false);
    expect(is_registry_error({})).toBe(false);
  });
});

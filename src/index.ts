// Hash map
export {
  HashMap,
  type HashMapOptions,
  type HashMapStats,
  type InsertResult,
} from "./hash_map/hash_map";
export { Cursor, ReadonlyCursor, CursorCore } from "./hash_map/cursor";
export type { EntryID } from "./hash_map/entry_arena";

// Hashing
export {
  default_hash,
  hash_boolean,
  hash_number,
  hash_string,
  same_value_zero,
  type Equality,
  type Hasher,
} from "./hash/hash";

// Atoms
export {
  NamedAtom,
  type Atom,
  type AtomDisposal,
  type AtomOwner,
} from "./atom/atom";
export { AtomRegistry, type AtomRegistryOptions } from "./atom/atom_registry";

// Errors
export {
  AppError,
  HASH_MAP_ERROR,
  HashMapError,
  REGISTRY_ERROR,
  RegistryError,
  is_hash_map_error,
  is_registry_error,
} from "./utils/error";
export { TYPE_ERROR, TypeError } from "./type_primitives";

// Logging
export {
  console_logger,
  create_console_logger,
  type LogContext,
  type LogLevel,
  type Logger,
} from "./utils/logger";

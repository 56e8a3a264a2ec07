export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

//=========================================================
// HashMap
//=========================================================

export enum HASH_MAP_ERROR {
  END_CURSOR_DEREFERENCE = "END_CURSOR_DEREFERENCE",
  END_CURSOR_ADVANCE = "END_CURSOR_ADVANCE",
  STALE_CURSOR = "STALE_CURSOR",
  CHAIN_CYCLE = "CHAIN_CYCLE",
  ENTRY_COUNT_MISMATCH = "ENTRY_COUNT_MISMATCH",
  INVALID_CAPACITY = "INVALID_CAPACITY",
  UNHASHABLE_KEY = "UNHASHABLE_KEY",
}

/** Corrupted invariant or misuse of a cursor. Never operational. */
export class HashMapError extends AppError {
  constructor(
    public readonly category: HASH_MAP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, false, context);
  }
}

export function is_hash_map_error(error: unknown): error is HashMapError {
  return error instanceof HashMapError;
}

//=========================================================
// AtomRegistry
//=========================================================

export enum REGISTRY_ERROR {
  REGISTRY_DISPOSED = "REGISTRY_DISPOSED",
  REGISTER_DURING_TEARDOWN = "REGISTER_DURING_TEARDOWN",
}

export class RegistryError extends AppError {
  constructor(
    public readonly category: REGISTRY_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_registry_error(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

/***
 *
 * AtomRegistry - Interns atoms by id and owns them until teardown.
 *
 * At most one atom per id. register_atom takes ownership of its argument:
 * a duplicate is disposed on the spot and the call returns false, so the
 * caller must not keep using the atom it passed in. Lookups hand out
 * read-only references that must not outlive the registry.
 *
 * The table starts at 103 buckets so a typical atom population never
 * triggers a resize.
 *
 * A shared instance is available through get_instance() and is torn
 * down explicitly with dispose_instance(). Code that wants its own
 * scope constructs a registry and passes it around instead.
 *
 * Usage:
 *
 *   const registry = AtomRegistry.get_instance();
 *   registry.register_atom(new NamedAtom("CO2"));      // true
 *   registry.register_atom(new NamedAtom("CO2"));      // false, disposed
 *   registry.find_atom("CO2")?.get_id();               // "CO2"
 *
 ***/

import { HashMap } from "../hash_map/hash_map";
import { ATOM_REGISTRY_INITIAL_SIZE } from "../utils/constants";
import { REGISTRY_ERROR, RegistryError } from "../utils/error";
import { console_logger, type Logger } from "../utils/logger";
import type { Atom, AtomOwner } from "./atom";

export interface AtomRegistryOptions {
  /** Bucket count of the backing table. Defaults to 103. */
  initial_size?: number;
  logger?: Logger;
}

export class AtomRegistry implements AtomOwner {
  private static _instance: AtomRegistry | null = null;

  private _atoms: HashMap<string, Atom> | null;
  private _deallocating = false;
  private readonly logger: Logger;

  constructor(options?: AtomRegistryOptions) {
    this._atoms = new HashMap<string, Atom>({
      initial_size: options?.initial_size ?? ATOM_REGISTRY_INITIAL_SIZE,
    });
    this.logger = options?.logger ?? console_logger;
  }

  //=========================================================
  // Shared instance
  //=========================================================

  /** The shared registry, created on first call. */
  static get_instance(): AtomRegistry {
    if (AtomRegistry._instance === null) {
      AtomRegistry._instance = new AtomRegistry();
    }
    return AtomRegistry._instance;
  }

  /**
   * Tear down the shared registry, disposing every atom it owns. The
   * next get_instance() builds a fresh one.
   */
  static dispose_instance(): void {
    const instance = AtomRegistry._instance;
    if (instance === null) return;
    AtomRegistry._instance = null;
    instance.dispose();
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of registered atoms. */
  get count(): number {
    return this._atoms?.size ?? 0;
  }

  get is_disposed(): boolean {
    return this._atoms === null;
  }

  find_atom(id: string): Readonly<Atom> | undefined {
    return this._atoms?.get(id);
  }

  /** True only while dispose() is releasing atoms. */
  is_currently_deallocating(): boolean {
    return this._deallocating;
  }

  *atoms(): IterableIterator<Readonly<Atom>> {
    if (this._atoms === null) return;
    yield* this._atoms.values();
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Take ownership of `atom` and register it under its id.
   *
   * Returns false if the id is taken; the incoming atom has then already
   * been disposed.
   */
  register_atom(atom: Atom): boolean {
    const atoms = this._atoms;
    if (atoms === null) {
      throw new RegistryError(
        REGISTRY_ERROR.REGISTRY_DISPOSED,
        "Cannot register an atom with a disposed registry",
        { id: atom.get_id() },
      );
    }
    if (this._deallocating) {
      throw new RegistryError(
        REGISTRY_ERROR.REGISTER_DURING_TEARDOWN,
        "Cannot register an atom while the registry is tearing down",
        { id: atom.get_id() },
      );
    }

    const id = atom.get_id();
    if (atoms.has(id)) {
      atom.dispose?.(this);
      this.logger.warn(
        "Attempted to register duplicate atom. This may cause undesired behavior.",
        { id },
      );
      return false;
    }

    atoms.insert(id, atom);
    return true;
  }

  /**
   * Release every atom, then the table. Atoms may query the registry from
   * their dispose hook; is_currently_deallocating() reports true for the
   * duration. Calling dispose() again is a no-op.
   */
  dispose(): void {
    const atoms = this._atoms;
    if (atoms === null) return;

    this._deallocating = true;
    try {
      for (const it = atoms.begin_readonly(); !it.is_end; it.next()) {
        it.value.dispose?.(this);
      }
    } finally {
      this._atoms = null;
      this._deallocating = false;
    }
    this.logger.debug("Atom registry disposed", { count: atoms.size });
  }
}

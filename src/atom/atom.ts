/***
 * Atom - Identity-bearing object interned by string id.
 *
 * The registry only ever reads an atom's id and, when it releases the
 * atom, calls its optional dispose hook. During that hook the atom can
 * ask its owner whether the release is the registry's own teardown or
 * something earlier (a rejected duplicate, for instance).
 *
 * Building an atom that turns out to be a duplicate is wasted work: the
 * registry disposes it straight away. Callers that care check
 * find_atom(id) before constructing a candidate.
 *
 ***/

import { console_logger, type Logger } from "../utils/logger";

/** The view of the registry an atom gets while being disposed. */
export interface AtomOwner {
  is_currently_deallocating(): boolean;
  find_atom(id: string): Readonly<Atom> | undefined;
}

export interface Atom {
  get_id(): string;
  dispose?(owner: AtomOwner): void;
}

export type AtomDisposal = "none" | "teardown" | "early";

/**
 * Minimal atom that remembers how it was released. Release outside of
 * teardown is logged as a warning.
 */
export class NamedAtom implements Atom {
  private _disposal: AtomDisposal = "none";

  constructor(
    private readonly id: string,
    private readonly logger: Logger = console_logger,
  ) {}

  get_id(): string {
    return this.id;
  }

  get disposal(): AtomDisposal {
    return this._disposal;
  }

  dispose(owner: AtomOwner): void {
    if (owner.is_currently_deallocating()) {
      this._disposal = "teardown";
      return;
    }
    this._disposal = "early";
    this.logger.warn("Atom disposed before registry teardown", {
      id: this.id,
    });
  }
}

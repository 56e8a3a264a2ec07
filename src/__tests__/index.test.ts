import { afterEach, describe, expect, it } from "vitest";
import {
  AtomRegistry,
  HashMap,
  NamedAtom,
  create_console_logger,
  is_hash_map_error,
} from "../index";

describe("public API", () => {
  afterEach(() => {
    AtomRegistry.dispose_instance();
  });

  it("interns atoms through the shared registry", () => {
    const registry = AtomRegistry.get_instance();
    const gas = new NamedAtom("CO2");
    expect(registry.register_atom(gas)).toBe(true);
    expect(AtomRegistry.get_instance().find_atom("CO2")).toBe(gas);
  });

  it("an injected registry stays independent of the shared one", () => {
    const silent = create_console_logger("test", "silent");
    const scoped = new AtomRegistry({ logger: silent });
    scoped.register_atom(new NamedAtom("CO2", silent));
    scoped.register_atom(new NamedAtom("CO2", silent));
    expect(scoped.count).toBe(1);
    expect(AtomRegistry.get_instance().find_atom("CO2")).toBeUndefined();
  });

  it("surfaces cursor misuse as HashMapError", () => {
    const map = new HashMap<string, number>();
    let caught: unknown;
    try {
      map.end().value;
    } catch (e) {
      caught = e;
    }
    expect(is_hash_map_error(caught)).toBe(true);
  });
});

/**
 * Function registry tests
 */

import { describe, expect, test } from "vitest";
import { createStandardRegistry } from "../stdlib/index.js";
import { NULL, string } from "../udm/node.js";
import { type FunctionDescriptor, MapFunctionRegistry, maxArity } from "./registry.js";

function descriptor(name: string, overrides: Partial<FunctionDescriptor> = {}): FunctionDescriptor {
  return {
    name,
    minArgs: 1,
    signature: `${name}(x)`,
    description: "test function",
    call: () => NULL,
    ...overrides,
  };
}

describe("MapFunctionRegistry", () => {
  test("register and lookup", () => {
    const registry = new MapFunctionRegistry().register(descriptor("b")).register(descriptor("a"));
    expect(registry.lookup("a")?.name).toBe("a");
    expect(registry.lookup("z")).toBeUndefined();
    expect(registry.has("b")).toBe(true);
  });

  test("names and list are sorted", () => {
    const registry = new MapFunctionRegistry([descriptor("zeta"), descriptor("alpha")]);
    expect(registry.names()).toEqual(["alpha", "zeta"]);
    expect(registry.list().map((d) => d.name)).toEqual(["alpha", "zeta"]);
  });

  test("registering a name again replaces it", () => {
    const registry = new MapFunctionRegistry([descriptor("f")]);
    registry.register(descriptor("f", { description: "second" }));
    expect(registry.lookup("f")?.description).toBe("second");
    expect(registry.names()).toEqual(["f"]);
  });

  test("unregister", () => {
    const registry = new MapFunctionRegistry([descriptor("f")]);
    expect(registry.unregister("f")).toBe(true);
    expect(registry.unregister("f")).toBe(false);
  });

  test("extend leaves the original untouched", () => {
    const base = new MapFunctionRegistry([descriptor("f")]);
    const extended = base.extend([descriptor("g"), descriptor("f", { call: () => string("new") })]);

    expect(base.has("g")).toBe(false);
    expect(extended.names()).toEqual(["f", "g"]);
    const context = { name: "f", location: { line: 1, column: 1, offset: 0 } };
    expect(extended.lookup("f")?.call([], context)).toEqual(string("new"));
  });

  test("maxArity defaults to minArgs", () => {
    expect(maxArity(descriptor("f", { minArgs: 2 }))).toBe(2);
    expect(maxArity(descriptor("g", { minArgs: 1, maxArgs: 3 }))).toBe(3);
  });
});

describe("standard registry", () => {
  test("every function documents itself", () => {
    for (const fn of createStandardRegistry().list()) {
      expect(fn.signature.startsWith(`${fn.name}(`)).toBe(true);
      expect(fn.description.length).toBeGreaterThan(0);
      expect(maxArity(fn)).toBeGreaterThanOrEqual(fn.minArgs);
    }
  });

  test("includes the core library", () => {
    const names = createStandardRegistry().names();
    for (const name of ["map", "filter", "reduce", "upper", "concat", "keys", "round", "typeOf"]) {
      expect(names).toContain(name);
    }
  });
});

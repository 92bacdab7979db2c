/**
 * Navigator tests
 */

import { describe, expect, test } from "vitest";
import { NavigationError } from "../compiler/weft/errors.js";
import { navigate, type PathSegment } from "./navigator.js";
import { type UDMNode, fromJS, toJS } from "./node.js";

const doc = fromJS(
  {
    "@version": "2",
    order: {
      "@id": "o1",
      items: [
        { sku: "a", qty: 1 },
        { sku: "b", qty: 4 },
      ],
    },
    note: "hi",
  },
  { attributePrefix: "@" }
);

function values<P>(path: PathSegment<P>[], evaluatePredicate?: (p: P, node: UDMNode) => boolean) {
  return navigate(doc, path, { evaluatePredicate }).map((node) => toJS(node));
}

describe("navigate", () => {
  test("property chain", () => {
    expect(
      values([
        { kind: "property", name: "order" },
        { kind: "property", name: "items" },
        { kind: "index", index: 1 },
        { kind: "property", name: "sku" },
      ])
    ).toEqual(["b"]);
  });

  test("missing property yields nothing", () => {
    expect(values([{ kind: "property", name: "nope" }])).toEqual([]);
  });

  test("selectors that do not fit the node yield nothing", () => {
    expect(
      values([
        { kind: "property", name: "note" },
        { kind: "property", name: "x" },
      ])
    ).toEqual([]);
    expect(values([{ kind: "index", index: 0 }])).toEqual([]);
  });

  test("negative and fractional indexes", () => {
    const items = [
      { kind: "property", name: "order" },
      { kind: "property", name: "items" },
    ] as const;
    expect(
      values([...items, { kind: "index", index: -1 }, { kind: "property", name: "sku" }])
    ).toEqual(["b"]);
    expect(values([...items, { kind: "index", index: 0.5 }])).toEqual([]);
    expect(values([...items, { kind: "index", index: -3 }])).toEqual([]);
  });

  test("wildcard over arrays and objects", () => {
    expect(
      values([
        { kind: "property", name: "order" },
        { kind: "property", name: "items" },
        { kind: "wildcard" },
        { kind: "property", name: "qty" },
      ])
    ).toEqual([1, 4]);
    expect(values([{ kind: "property", name: "order" }, { kind: "wildcard" }])).toHaveLength(1);
  });

  test("attributes are read as strings", () => {
    expect(values([{ kind: "attribute", name: "version" }])).toEqual(["2"]);
    expect(values([{ kind: "attribute", name: "missing" }])).toEqual([]);
  });

  test("recursive descent visits the node itself first, then pre-order", () => {
    expect(values([{ kind: "recursive" }, { kind: "property", name: "sku" }])).toEqual(["a", "b"]);
    expect(values([{ kind: "recursive" }, { kind: "attribute", name: "id" }])).toEqual(["o1"]);
    const nested = navigate(fromJS({ a: { a: 1 } }), [
      { kind: "recursive" },
      { kind: "property", name: "a" },
    ]);
    expect(nested.map((node) => toJS(node))).toEqual([{ a: 1 }, 1]);
  });

  test("predicates filter array elements", () => {
    const path: PathSegment<number>[] = [
      { kind: "property", name: "order" },
      { kind: "property", name: "items" },
      { kind: "predicate", predicate: 2 },
      { kind: "property", name: "sku" },
    ];
    const atLeast = (min: number, node: UDMNode): boolean => {
      if (node.kind !== "object") return false;
      const qty = node.properties.get("qty");
      return qty?.kind === "scalar" && typeof qty.value === "number" && qty.value >= min;
    };
    expect(values(path, atLeast)).toEqual(["b"]);
  });

  test("a predicate on a non-array tests the node itself", () => {
    const path: PathSegment<string>[] = [
      { kind: "property", name: "note" },
      { kind: "predicate", predicate: "hi" },
    ];
    expect(values(path, (expected, node) => toJS(node) === expected)).toEqual(["hi"]);
  });

  test("predicate without an evaluator", () => {
    expect(() => navigate(doc, [{ kind: "predicate", predicate: 1 }])).toThrow(
      "Predicate selector used without a predicate evaluator"
    );
  });

  test("predicate failures become navigation errors", () => {
    const failing = () => {
      throw new Error("boom");
    };
    try {
      navigate(doc, [{ kind: "predicate", predicate: 1 }], { evaluatePredicate: failing });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NavigationError);
      if (error instanceof NavigationError) {
        expect(error.message).toBe("Predicate failed: boom");
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });
});

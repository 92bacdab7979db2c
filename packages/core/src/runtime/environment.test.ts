/**
 * Environment tests
 */

import { describe, expect, test } from "vitest";
import { number } from "../udm/node.js";
import { Environment } from "./environment.js";

describe("Environment", () => {
  test("lookups walk to the root", () => {
    const env = new Environment();
    env.define(env.root, "a", number(1));
    const inner = env.child(env.child(env.root), [["b", number(2)]]);

    expect(env.lookup(inner, "a")).toEqual(number(1));
    expect(env.lookup(inner, "b")).toEqual(number(2));
    expect(env.lookup(env.root, "b")).toBeUndefined();
  });

  test("inner bindings shadow outer ones", () => {
    const env = new Environment();
    env.define(env.root, "x", number(1));
    const inner = env.child(env.root, [["x", number(2)]]);

    expect(env.lookup(inner, "x")).toEqual(number(2));
    expect(env.lookup(env.root, "x")).toEqual(number(1));
  });

  test("visible names include every enclosing frame", () => {
    const env = new Environment();
    env.define(env.root, "input", number(0));
    const inner = env.child(env.root, [["k", number(1)]]);
    expect([...env.visibleNames(inner)].sort()).toEqual(["input", "k"]);
  });

  test("frames are allocated in one arena", () => {
    const env = new Environment();
    expect(env.size).toBe(1);
    env.child(env.root);
    env.child(env.root);
    expect(env.size).toBe(3);
  });

  test("unknown frames are rejected", () => {
    const env = new Environment();
    expect(() => env.child(42)).toThrow("Unknown environment frame 42");
  });

  test("deep chains resolve without recursion", () => {
    const env = new Environment();
    env.define(env.root, "base", number(7));
    let frame = env.root;
    for (let i = 0; i < 20000; i++) frame = env.child(frame);
    expect(env.lookup(frame, "base")).toEqual(number(7));
  });
});

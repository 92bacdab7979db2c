/**
 * Argument checks shared by the standard library
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import {
  type UDMArray,
  type UDMNode,
  type UDMObject,
  typeName,
} from "../udm/node.js";
import { type Callable, type FunctionArgument, isCallable } from "../runtime/values.js";

const ORDINALS = ["first", "second", "third", "fourth"];

function describe(arg: FunctionArgument | undefined): string {
  if (arg === undefined) return "nothing";
  return isCallable(arg) ? "function" : typeName(arg);
}

function mismatch(
  fn: string,
  index: number,
  expected: string,
  arg: FunctionArgument | undefined
): ValueTypeError {
  const position = ORDINALS[index] ?? `#${index + 1}`;
  return new ValueTypeError(
    `${fn}() expects ${expected} as its ${position} argument, got ${describe(arg)}`
  );
}

export function data(fn: string, args: readonly FunctionArgument[], index: number): UDMNode {
  const arg = args[index];
  if (arg === undefined || isCallable(arg)) throw mismatch(fn, index, "a value", arg);
  return arg;
}

export function arrayArg(fn: string, args: readonly FunctionArgument[], index: number): UDMArray {
  const arg = args[index];
  if (arg === undefined || arg.kind !== "array") throw mismatch(fn, index, "an array", arg);
  return arg;
}

export function objectArg(fn: string, args: readonly FunctionArgument[], index: number): UDMObject {
  const arg = args[index];
  if (arg === undefined || arg.kind !== "object") throw mismatch(fn, index, "an object", arg);
  return arg;
}

export function stringArg(fn: string, args: readonly FunctionArgument[], index: number): string {
  const arg = args[index];
  if (arg === undefined || arg.kind !== "scalar" || typeof arg.value !== "string") {
    throw mismatch(fn, index, "a string", arg);
  }
  return arg.value;
}

export function numberArg(fn: string, args: readonly FunctionArgument[], index: number): number {
  const arg = args[index];
  if (arg === undefined || arg.kind !== "scalar" || typeof arg.value !== "number") {
    throw mismatch(fn, index, "a number", arg);
  }
  return arg.value;
}

export function callableArg(fn: string, args: readonly FunctionArgument[], index: number): Callable {
  const arg = args[index];
  if (arg === undefined || !isCallable(arg)) throw mismatch(fn, index, "a function", arg);
  return arg;
}

/** Call `fn` with as many of `args` as it declares parameters */
export function invoke(fn: Callable, ...args: UDMNode[]): UDMNode {
  return fn.invoke(args.slice(0, fn.arity));
}

/** Boolean result of a predicate callback */
export function truthy(fn: string, result: UDMNode): boolean {
  if (result.kind !== "scalar" || typeof result.value !== "boolean") {
    throw new ValueTypeError(`${fn}() predicate must return a boolean, got ${typeName(result)}`);
  }
  return result.value;
}

/** Text of a scalar or null; containers are rejected */
export function text(fn: string, node: UDMNode): string {
  if (node.kind === "null") return "";
  if (node.kind === "scalar") return String(node.value);
  throw new ValueTypeError(`${fn}() cannot convert ${typeName(node)} to text`);
}

/** Sort key: all numbers or all strings */
export function sortKey(fn: string, node: UDMNode): number | string {
  if (node.kind === "scalar" && typeof node.value !== "boolean") {
    return node.value;
  }
  throw new ValueTypeError(`${fn}() can only order numbers or strings, got ${typeName(node)}`);
}

/** Ordering of two sort keys of the same type */
export function compareKeys(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

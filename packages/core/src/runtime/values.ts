/**
 * Runtime values
 */

import type { ExpressionNode } from "../compiler/weft/ast.js";
import type { UDMNode } from "../udm/node.js";
import type { FrameId } from "./environment.js";

/** Lambda or declared function closed over the frame it was created in */
export interface FunctionValue {
  readonly kind: "function";
  /** Declared name for `function` definitions; lambdas are anonymous */
  readonly name?: string;
  readonly params: readonly string[];
  readonly body: ExpressionNode;
  readonly closure: FrameId;
}

export type RuntimeValue = UDMNode | FunctionValue;

/**
 * Function handed to a registry function. Invoking it re-enters the
 * interpreter with the captured closure.
 */
export interface Callable {
  readonly kind: "callable";
  readonly arity: number;
  invoke(args: readonly UDMNode[]): UDMNode;
}

/** Argument passed to a registry function */
export type FunctionArgument = UDMNode | Callable;

export function isFunctionValue(value: RuntimeValue): value is FunctionValue {
  return value.kind === "function";
}

export function isCallable(value: FunctionArgument): value is Callable {
  return value.kind === "callable";
}

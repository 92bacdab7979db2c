/**
 * Arithmetic, comparison and equality on UDM values
 */

import type { BinaryOperator, UnaryOperator } from "../compiler/weft/ast.js";
import { ValueTypeError, type WeftErrorOptions } from "../compiler/weft/errors.js";
import {
  type UDMNode,
  array,
  boolean,
  isNumber,
  isString,
  number,
  string,
  typeName,
  udmEquals,
} from "../udm/node.js";

/** Operators the interpreter evaluates eagerly; `&&` and `||` short-circuit */
export type EagerBinaryOperator = Exclude<BinaryOperator, "&&" | "||">;

/**
 * Evaluate binary operation
 */
export function evaluateBinary(
  op: EagerBinaryOperator,
  left: UDMNode,
  right: UDMNode,
  options: WeftErrorOptions = {}
): UDMNode {
  switch (op) {
    case "+":
      return add(left, right, options);

    case "-":
    case "*":
    case "/":
    case "%": {
      if (!isNumber(left) || !isNumber(right)) {
        throw operandError(op, left, right, options);
      }
      return finite(op, arithmetic(op, left.value, right.value, options), options);
    }

    case "<":
    case "<=":
    case ">":
    case ">=": {
      if (isNumber(left) && isNumber(right)) {
        return boolean(compare(op, left.value - right.value));
      }
      if (isString(left) && isString(right)) {
        const order = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
        return boolean(compare(op, order));
      }
      throw operandError(op, left, right, options);
    }

    case "==":
      return boolean(udmEquals(left, right));

    case "!=":
      return boolean(!udmEquals(left, right));
  }
}

/**
 * Evaluate unary operation
 */
export function evaluateUnary(
  op: UnaryOperator,
  operand: UDMNode,
  options: WeftErrorOptions = {}
): UDMNode {
  if (op === "!") {
    if (operand.kind !== "scalar" || typeof operand.value !== "boolean") {
      throw new ValueTypeError(`Operator '!' expects a boolean, got ${typeName(operand)}`, options);
    }
    return boolean(!operand.value);
  }

  if (!isNumber(operand)) {
    throw new ValueTypeError(
      `Unary '${op}' expects a number, got ${typeName(operand)}`,
      options
    );
  }
  return number(op === "-" ? -operand.value : operand.value);
}

function add(left: UDMNode, right: UDMNode, options: WeftErrorOptions): UDMNode {
  if (isNumber(left) && isNumber(right)) {
    return finite("+", left.value + right.value, options);
  }
  if (left.kind === "scalar" && right.kind === "scalar" && (isString(left) || isString(right))) {
    return string(`${String(left.value)}${String(right.value)}`);
  }
  if (left.kind === "array" && right.kind === "array") {
    return array([...left.elements, ...right.elements]);
  }
  throw operandError("+", left, right, options);
}

/** Overflow to Infinity has no representation in the data model */
function finite(op: string, value: number, options: WeftErrorOptions): UDMNode {
  if (!Number.isFinite(value)) {
    throw new ValueTypeError(`Result of '${op}' is not a finite number`, options);
  }
  return number(value);
}

function arithmetic(
  op: "-" | "*" | "/" | "%",
  left: number,
  right: number,
  options: WeftErrorOptions
): number {
  switch (op) {
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
    case "%":
      if (right === 0) {
        throw new ValueTypeError(
          op === "/" ? "Division by zero" : "Modulo by zero",
          options
        );
      }
      return op === "/" ? left / right : left % right;
  }
}

/** Apply a relational operator to the sign of `left - right` */
function compare(op: "<" | "<=" | ">" | ">=", order: number): boolean {
  switch (op) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function operandError(
  op: string,
  left: UDMNode,
  right: UDMNode,
  options: WeftErrorOptions
): ValueTypeError {
  return new ValueTypeError(
    `Operator '${op}' cannot be applied to ${typeName(left)} and ${typeName(right)}`,
    options
  );
}

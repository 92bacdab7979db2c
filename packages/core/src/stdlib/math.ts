/**
 * Math functions
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import { number } from "../udm/node.js";
import type { FunctionDescriptor } from "../runtime/registry.js";
import { numberArg } from "./args.js";

function binary(
  name: string,
  description: string,
  op: (a: number, b: number) => number
): FunctionDescriptor {
  return {
    name,
    minArgs: 2,
    signature: `${name}(a, b)`,
    description,
    call: (args) => {
      const a = numberArg(name, args, 0);
      const b = numberArg(name, args, 1);
      const result = op(a, b);
      if (!Number.isFinite(result)) throw new ValueTypeError(`${name}(${a}, ${b}) is not finite`);
      return number(result);
    },
  };
}

function unary(name: string, description: string, op: (a: number) => number): FunctionDescriptor {
  return {
    name,
    minArgs: 1,
    signature: `${name}(n)`,
    description,
    call: (args) => number(op(numberArg(name, args, 0))),
  };
}

export const mathFunctions: FunctionDescriptor[] = [
  binary("add", "a + b", (a, b) => a + b),
  binary("sub", "a - b", (a, b) => a - b),
  binary("mul", "a * b", (a, b) => a * b),
  binary("div", "a / b", (a, b) => {
    if (b === 0) throw new ValueTypeError("div() by zero");
    return a / b;
  }),
  binary("pow", "a raised to the power b", (a, b) => a ** b),
  unary("abs", "Absolute value", Math.abs),
  unary("floor", "Largest integer not above n", Math.floor),
  unary("ceil", "Smallest integer not below n", Math.ceil),
  unary("sqrt", "Square root", (n) => {
    if (n < 0) throw new ValueTypeError(`sqrt() of negative number ${n}`);
    return Math.sqrt(n);
  }),
  {
    name: "round",
    minArgs: 1,
    maxArgs: 2,
    signature: "round(n, digits?)",
    description: "Round half away from zero to the given number of decimal digits",
    call: (args) => {
      const value = numberArg("round", args, 0);
      const digits = args.length === 2 ? numberArg("round", args, 1) : 0;
      if (!Number.isInteger(digits) || digits < 0) {
        throw new ValueTypeError("round() digits must be a non-negative integer");
      }
      const factor = 10 ** digits;
      return number((Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor);
    },
  },
];

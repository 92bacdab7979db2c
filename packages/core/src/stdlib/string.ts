/**
 * String functions
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import { array, boolean, number, string, typeName, udmEquals } from "../udm/node.js";
import type { FunctionDescriptor } from "../runtime/registry.js";
import { data, numberArg, stringArg, text } from "./args.js";

function unary(
  name: string,
  description: string,
  transform: (value: string) => string
): FunctionDescriptor {
  return {
    name,
    minArgs: 1,
    signature: `${name}(string)`,
    description,
    call: (args) => string(transform(stringArg(name, args, 0))),
  };
}

function predicate(
  name: string,
  description: string,
  test: (value: string, search: string) => boolean
): FunctionDescriptor {
  return {
    name,
    minArgs: 2,
    signature: `${name}(string, search)`,
    description,
    call: (args) => boolean(test(stringArg(name, args, 0), stringArg(name, args, 1))),
  };
}

export const stringFunctions: FunctionDescriptor[] = [
  unary("upper", "Upper-case copy", (value) => value.toUpperCase()),
  unary("lower", "Lower-case copy", (value) => value.toLowerCase()),
  unary("trim", "Copy without leading and trailing whitespace", (value) => value.trim()),
  {
    name: "concat",
    minArgs: 1,
    maxArgs: Number.POSITIVE_INFINITY,
    signature: "concat(value, ...)",
    description: "Text of every scalar argument joined together; null counts as empty",
    call: (args) =>
      string(args.map((_, i) => text("concat", data("concat", args, i))).join("")),
  },
  {
    name: "split",
    minArgs: 2,
    signature: "split(string, separator)",
    description: "Substrings between occurrences of separator",
    call: (args) =>
      array(
        stringArg("split", args, 0)
          .split(stringArg("split", args, 1))
          .map((part) => string(part))
      ),
  },
  {
    name: "replace",
    minArgs: 3,
    signature: "replace(string, search, replacement)",
    description: "Replace every occurrence of search",
    call: (args) => {
      const replacement = stringArg("replace", args, 2);
      // Passed as a function so `$&` and `$1` stay literal
      return string(
        stringArg("replace", args, 0).replaceAll(stringArg("replace", args, 1), () => replacement)
      );
    },
  },
  {
    name: "contains",
    minArgs: 2,
    signature: "contains(stringOrArray, value)",
    description: "Substring test on strings, membership test on arrays",
    call: (args) => {
      const haystack = data("contains", args, 0);
      if (haystack.kind === "array") {
        const needle = data("contains", args, 1);
        return boolean(haystack.elements.some((element) => udmEquals(element, needle)));
      }
      return boolean(stringArg("contains", args, 0).includes(stringArg("contains", args, 1)));
    },
  },
  predicate("startsWith", "Whether string begins with search", (value, search) =>
    value.startsWith(search)
  ),
  predicate("endsWith", "Whether string ends with search", (value, search) =>
    value.endsWith(search)
  ),
  {
    name: "substring",
    minArgs: 2,
    maxArgs: 3,
    signature: "substring(string, start, end?)",
    description: "Characters from start up to but excluding end",
    call: (args) => {
      const value = stringArg("substring", args, 0);
      const start = numberArg("substring", args, 1);
      const end = args.length === 3 ? numberArg("substring", args, 2) : value.length;
      return string(value.substring(start, end));
    },
  },
  {
    name: "length",
    minArgs: 1,
    signature: "length(value)",
    description: "Characters in a string, elements in an array, properties in an object",
    call: (args) => {
      const value = data("length", args, 0);
      switch (value.kind) {
        case "array":
          return number(value.elements.length);
        case "object":
          return number(value.properties.size);
        case "null":
          return number(0);
        case "scalar":
          if (typeof value.value === "string") return number(value.value.length);
          throw new ValueTypeError(`length() is not defined for ${typeName(value)}`);
      }
    },
  },
];

/**
 * Array functions
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import { NULL, type UDMNode, array, number, string, udmEquals } from "../udm/node.js";
import type { FunctionDescriptor } from "../runtime/registry.js";
import {
  arrayArg,
  callableArg,
  compareKeys,
  data,
  invoke,
  numberArg,
  sortKey,
  stringArg,
  text,
  truthy,
} from "./args.js";

function numbers(fn: string, elements: readonly UDMNode[]): number[] {
  return elements.map((element) => {
    if (element.kind !== "scalar" || typeof element.value !== "number") {
      throw new ValueTypeError(`${fn}() expects an array of numbers`);
    }
    return element.value;
  });
}

/** Element whose key orders first under `direction` (1 = max, -1 = min) */
function extreme(fn: string, elements: readonly UDMNode[], direction: 1 | -1): UDMNode {
  let best: UDMNode | undefined;
  let bestKey: number | string | undefined;
  for (const element of elements) {
    const key = sortKey(fn, element);
    if (bestKey !== undefined && typeof key !== typeof bestKey) {
      throw new ValueTypeError(`${fn}() cannot compare numbers with strings`);
    }
    if (bestKey === undefined || compareKeys(key, bestKey) * direction > 0) {
      best = element;
      bestKey = key;
    }
  }
  return best ?? NULL;
}

export const arrayFunctions: FunctionDescriptor[] = [
  {
    name: "map",
    minArgs: 2,
    signature: "map(array, fn)",
    description: "Apply fn(element, index) to every element",
    call: (args) => {
      const fn = callableArg("map", args, 1);
      return array(
        arrayArg("map", args, 0).elements.map((element, i) => invoke(fn, element, number(i)))
      );
    },
  },
  {
    name: "filter",
    minArgs: 2,
    signature: "filter(array, predicate)",
    description: "Keep the elements for which predicate(element, index) is true",
    call: (args) => {
      const fn = callableArg("filter", args, 1);
      return array(
        arrayArg("filter", args, 0).elements.filter((element, i) =>
          truthy("filter", invoke(fn, element, number(i)))
        )
      );
    },
  },
  {
    name: "reduce",
    minArgs: 2,
    maxArgs: 3,
    signature: "reduce(array, fn, initial?)",
    description: "Fold the array with fn(accumulator, element) from the left",
    call: (args) => {
      const elements = arrayArg("reduce", args, 0).elements;
      const fn = callableArg("reduce", args, 1);
      let rest = elements;
      let accumulator: UDMNode;
      if (args.length === 3) {
        accumulator = data("reduce", args, 2);
      } else {
        const [first, ...others] = elements;
        if (first === undefined) {
          throw new ValueTypeError("reduce() of an empty array needs an initial value");
        }
        accumulator = first;
        rest = others;
      }
      for (const element of rest) {
        accumulator = invoke(fn, accumulator, element);
      }
      return accumulator;
    },
  },
  {
    name: "find",
    minArgs: 2,
    signature: "find(array, predicate)",
    description: "First element matching predicate, or null",
    call: (args) => {
      const fn = callableArg("find", args, 1);
      const found = arrayArg("find", args, 0).elements.find((element, i) =>
        truthy("find", invoke(fn, element, number(i)))
      );
      return found ?? NULL;
    },
  },
  {
    name: "count",
    minArgs: 1,
    maxArgs: 2,
    signature: "count(array, predicate?)",
    description: "Number of elements, or of elements matching predicate",
    call: (args) => {
      const elements = arrayArg("count", args, 0).elements;
      if (args.length === 1) return number(elements.length);
      const fn = callableArg("count", args, 1);
      return number(
        elements.filter((element, i) => truthy("count", invoke(fn, element, number(i)))).length
      );
    },
  },
  {
    name: "sum",
    minArgs: 1,
    signature: "sum(array)",
    description: "Sum of an array of numbers",
    call: (args) =>
      number(numbers("sum", arrayArg("sum", args, 0).elements).reduce((a, b) => a + b, 0)),
  },
  {
    name: "avg",
    minArgs: 1,
    signature: "avg(array)",
    description: "Mean of an array of numbers; null when empty",
    call: (args) => {
      const values = numbers("avg", arrayArg("avg", args, 0).elements);
      if (values.length === 0) return NULL;
      return number(values.reduce((a, b) => a + b, 0) / values.length);
    },
  },
  {
    name: "min",
    minArgs: 1,
    signature: "min(array)",
    description: "Smallest number or string; null when empty",
    call: (args) => extreme("min", arrayArg("min", args, 0).elements, -1),
  },
  {
    name: "max",
    minArgs: 1,
    signature: "max(array)",
    description: "Largest number or string; null when empty",
    call: (args) => extreme("max", arrayArg("max", args, 0).elements, 1),
  },
  {
    name: "first",
    minArgs: 1,
    signature: "first(array)",
    description: "First element, or null",
    call: (args) => arrayArg("first", args, 0).elements[0] ?? NULL,
  },
  {
    name: "last",
    minArgs: 1,
    signature: "last(array)",
    description: "Last element, or null",
    call: (args) => {
      const elements = arrayArg("last", args, 0).elements;
      return elements[elements.length - 1] ?? NULL;
    },
  },
  {
    name: "flatten",
    minArgs: 1,
    signature: "flatten(array)",
    description: "Splice nested arrays into their parent, one level deep",
    call: (args) =>
      array(
        arrayArg("flatten", args, 0).elements.flatMap((element) =>
          element.kind === "array" ? element.elements : [element]
        )
      ),
  },
  {
    name: "distinct",
    minArgs: 1,
    signature: "distinct(array)",
    description: "Elements with structural duplicates removed, first occurrence kept",
    call: (args) => {
      const result: UDMNode[] = [];
      for (const element of arrayArg("distinct", args, 0).elements) {
        if (!result.some((seen) => udmEquals(seen, element))) result.push(element);
      }
      return array(result);
    },
  },
  {
    name: "sortBy",
    minArgs: 1,
    maxArgs: 2,
    signature: "sortBy(array, key?)",
    description: "Stable ascending sort by key(element), or by the elements themselves",
    call: (args) => {
      const elements = arrayArg("sortBy", args, 0).elements;
      const fn = args.length === 2 ? callableArg("sortBy", args, 1) : undefined;
      const keyed = elements.map((element) => ({
        element,
        key: sortKey("sortBy", fn ? invoke(fn, element) : element),
      }));
      const kinds = new Set(keyed.map((entry) => typeof entry.key));
      if (kinds.size > 1) {
        throw new ValueTypeError("sortBy() cannot compare numbers with strings");
      }
      keyed.sort((a, b) => compareKeys(a.key, b.key));
      return array(keyed.map((entry) => entry.element));
    },
  },
  {
    name: "join",
    minArgs: 1,
    maxArgs: 2,
    signature: "join(array, separator?)",
    description: "Concatenate scalar elements with separator (default ',')",
    call: (args) => {
      const separator = args.length === 2 ? stringArg("join", args, 1) : ",";
      return string(
        arrayArg("join", args, 0)
          .elements.map((element) => text("join", element))
          .join(separator)
      );
    },
  },
  {
    name: "reverse",
    minArgs: 1,
    signature: "reverse(array)",
    description: "Elements in reverse order",
    call: (args) => array([...arrayArg("reverse", args, 0).elements].reverse()),
  },
  {
    name: "range",
    minArgs: 2,
    signature: "range(start, end)",
    description: "Integers from start up to but excluding end",
    call: (args) => {
      const start = numberArg("range", args, 0);
      const end = numberArg("range", args, 1);
      if (!Number.isInteger(start) || !Number.isInteger(end)) {
        throw new ValueTypeError("range() expects integer bounds");
      }
      const result: UDMNode[] = [];
      for (let i = start; i < end; i++) result.push(number(i));
      return array(result);
    },
  },
];

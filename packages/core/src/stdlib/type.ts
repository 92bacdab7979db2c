/**
 * Type inspection and conversion functions
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import { boolean, number, string, toJS, typeName } from "../udm/node.js";
import type { FunctionDescriptor } from "../runtime/registry.js";
import { isCallable } from "../runtime/values.js";
import { data } from "./args.js";

export const typeFunctions: FunctionDescriptor[] = [
  {
    name: "typeOf",
    minArgs: 1,
    signature: "typeOf(value)",
    description: "One of string, number, boolean, array, object, null, function",
    call: (args) => {
      const [value] = args;
      if (value === undefined) throw new ValueTypeError("typeOf() expects a value");
      return string(isCallable(value) ? "function" : typeName(value));
    },
  },
  {
    name: "toString",
    minArgs: 1,
    signature: "toString(value)",
    description: "Text of a scalar; JSON text of an array or object; 'null' for null",
    call: (args) => {
      const value = data("toString", args, 0);
      switch (value.kind) {
        case "scalar":
          return string(String(value.value));
        case "null":
          return string("null");
        default:
          return string(JSON.stringify(toJS(value, { attributePrefix: "@" })));
      }
    },
  },
  {
    name: "toNumber",
    minArgs: 1,
    signature: "toNumber(value)",
    description: "Number from a number, numeric string or boolean",
    call: (args) => {
      const value = data("toNumber", args, 0);
      if (value.kind === "scalar") {
        if (typeof value.value === "number") return value;
        if (typeof value.value === "boolean") return number(value.value ? 1 : 0);
        const trimmed = value.value.trim();
        const parsed = Number(trimmed);
        if (trimmed !== "" && Number.isFinite(parsed)) return number(parsed);
        throw new ValueTypeError(`toNumber() cannot parse '${value.value}'`);
      }
      throw new ValueTypeError(`toNumber() cannot convert ${typeName(value)}`);
    },
  },
  {
    name: "toBoolean",
    minArgs: 1,
    signature: "toBoolean(value)",
    description: "Boolean from a boolean, 'true'/'false' or a number (non-zero is true)",
    call: (args) => {
      const value = data("toBoolean", args, 0);
      if (value.kind === "scalar") {
        if (typeof value.value === "boolean") return value;
        if (typeof value.value === "number") return boolean(value.value !== 0);
        const lowered = value.value.trim().toLowerCase();
        if (lowered === "true") return boolean(true);
        if (lowered === "false") return boolean(false);
        throw new ValueTypeError(`toBoolean() cannot parse '${value.value}'`);
      }
      throw new ValueTypeError(`toBoolean() cannot convert ${typeName(value)}`);
    },
  },
  {
    name: "isEmpty",
    minArgs: 1,
    signature: "isEmpty(value)",
    description: "True for null, '', [] and {}",
    call: (args) => {
      const value = data("isEmpty", args, 0);
      switch (value.kind) {
        case "null":
          return boolean(true);
        case "array":
          return boolean(value.elements.length === 0);
        case "object":
          return boolean(value.properties.size === 0);
        case "scalar":
          return boolean(value.value === "");
      }
    },
  },
  {
    name: "isNull",
    minArgs: 1,
    signature: "isNull(value)",
    description: "True only for null",
    call: (args) => boolean(data("isNull", args, 0).kind === "null"),
  },
];

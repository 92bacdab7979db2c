/**
 * Object functions
 */

import { ValueTypeError } from "../compiler/weft/errors.js";
import {
  type EditPath,
  type UDMNode,
  array,
  boolean,
  object,
  setIn,
  string,
  typeName,
  withProperty,
  withoutProperty,
} from "../udm/node.js";
import type { FunctionDescriptor } from "../runtime/registry.js";
import { data, objectArg, stringArg } from "./args.js";

/** `"a.b.0"` or `["a", "b", 0]`; numeric string segments address array elements */
function editPath(node: UDMNode): EditPath {
  if (node.kind === "scalar" && typeof node.value === "string") {
    if (node.value === "") return [];
    return node.value.split(".").map((segment) => (/^\d+$/.test(segment) ? Number(segment) : segment));
  }
  if (node.kind === "array") {
    return node.elements.map((element) => {
      if (element.kind === "scalar" && typeof element.value !== "boolean") return element.value;
      throw new ValueTypeError(`setPath() path segments must be strings or numbers, got ${typeName(element)}`);
    });
  }
  throw new ValueTypeError(`setPath() expects a path string or array, got ${typeName(node)}`);
}

export const objectFunctions: FunctionDescriptor[] = [
  {
    name: "keys",
    minArgs: 1,
    signature: "keys(object)",
    description: "Property names in order",
    call: (args) => array([...objectArg("keys", args, 0).properties.keys()].map((key) => string(key))),
  },
  {
    name: "values",
    minArgs: 1,
    signature: "values(object)",
    description: "Property values in order",
    call: (args) => array(objectArg("values", args, 0).properties.values()),
  },
  {
    name: "entries",
    minArgs: 1,
    signature: "entries(object)",
    description: "Properties as {key, value} objects",
    call: (args) =>
      array(
        [...objectArg("entries", args, 0).properties].map(([key, value]) =>
          object({ key: string(key), value })
        )
      ),
  },
  {
    name: "hasKey",
    minArgs: 2,
    signature: "hasKey(object, key)",
    description: "Whether the object has the property",
    call: (args) =>
      boolean(objectArg("hasKey", args, 0).properties.has(stringArg("hasKey", args, 1))),
  },
  {
    name: "merge",
    minArgs: 1,
    maxArgs: Number.POSITIVE_INFINITY,
    signature: "merge(object, ...)",
    description: "Shallow merge; later properties and attributes win",
    call: (args) => {
      const properties = new Map<string, UDMNode>();
      const attributes = new Map<string, string>();
      for (let i = 0; i < args.length; i++) {
        const source = objectArg("merge", args, i);
        for (const [key, value] of source.properties) properties.set(key, value);
        for (const [key, value] of source.metadata.attributes) attributes.set(key, value);
      }
      return object(properties, { attributes });
    },
  },
  {
    name: "put",
    minArgs: 3,
    signature: "put(object, key, value)",
    description: "Copy with the property set",
    call: (args) =>
      withProperty(objectArg("put", args, 0), stringArg("put", args, 1), data("put", args, 2)),
  },
  {
    name: "remove",
    minArgs: 2,
    signature: "remove(object, key)",
    description: "Copy without the property",
    call: (args) => withoutProperty(objectArg("remove", args, 0), stringArg("remove", args, 1)),
  },
  {
    name: "setPath",
    minArgs: 3,
    signature: "setPath(value, path, newValue)",
    description: "Copy with the node at path replaced; missing objects along the path are created",
    call: (args) =>
      setIn(data("setPath", args, 0), editPath(data("setPath", args, 1)), data("setPath", args, 2)),
  },
  {
    name: "attributes",
    minArgs: 1,
    signature: "attributes(value)",
    description: "Attributes of an object as an object of strings; empty for anything else",
    call: (args) => {
      const value = data("attributes", args, 0);
      if (value.kind !== "object") return object();
      return object([...value.metadata.attributes].map(([key, text]) => [key, string(text)] as const));
    },
  },
];

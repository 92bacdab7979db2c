/**
 * Universal Data Model
 *
 * Format-neutral tree that every input is parsed into and every result is
 * serialized from. Nodes are frozen; edits go through the copy-on-write
 * helpers at the bottom of this file.
 */

import { ValueTypeError } from "../compiler/weft/errors.js";

// =============================================================================
// NODE TYPES
// =============================================================================

export type ScalarValue = string | number | boolean;

export interface UDMScalar {
  readonly kind: "scalar";
  readonly value: ScalarValue;
}

export interface UDMArray {
  readonly kind: "array";
  readonly elements: readonly UDMNode[];
}

/** Attributes and naming carried by an object (XML-style data keeps them) */
export interface Metadata {
  readonly attributes: ReadonlyMap<string, string>;
  readonly namespace?: string;
  readonly name?: string;
}

export interface UDMObject {
  readonly kind: "object";
  /** Insertion-ordered */
  readonly properties: ReadonlyMap<string, UDMNode>;
  readonly metadata: Metadata;
}

export interface UDMNull {
  readonly kind: "null";
}

export type UDMNode = UDMScalar | UDMArray | UDMObject | UDMNull;

export type UDMTypeName = "string" | "number" | "boolean" | "array" | "object" | "null";

/** Plain JS value a UDM tree converts to and from */
export type JSValue = null | string | number | boolean | JSValue[] | { [key: string]: JSValue };

const EMPTY_ATTRIBUTES: ReadonlyMap<string, string> = new Map();

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const NULL: UDMNull = Object.freeze({ kind: "null" });

export function scalar(value: ScalarValue): UDMScalar {
  return Object.freeze({ kind: "scalar", value });
}

export function string(value: string): UDMScalar {
  return scalar(value);
}

export function number(value: number): UDMScalar {
  return scalar(value);
}

export function boolean(value: boolean): UDMScalar {
  return scalar(value);
}

export function array(elements: Iterable<UDMNode>): UDMArray {
  return Object.freeze({ kind: "array", elements: Object.freeze([...elements]) });
}

export function object(
  properties: Iterable<readonly [string, UDMNode]> | Readonly<Record<string, UDMNode>> = [],
  metadata: Partial<Metadata> = {}
): UDMObject {
  const entries = isIterable(properties) ? properties : Object.entries(properties);
  return Object.freeze({
    kind: "object",
    properties: new Map(entries),
    metadata: Object.freeze({
      ...metadata,
      attributes: metadata.attributes ?? EMPTY_ATTRIBUTES,
    }),
  });
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

// =============================================================================
// INSPECTION
// =============================================================================

export function typeName(node: UDMNode): UDMTypeName {
  switch (node.kind) {
    case "scalar":
      switch (typeof node.value) {
        case "string":
          return "string";
        case "number":
          return "number";
        default:
          return "boolean";
      }
    case "array":
      return "array";
    case "object":
      return "object";
    case "null":
      return "null";
  }
}

export function isString(node: UDMNode): node is UDMScalar & { readonly value: string } {
  return node.kind === "scalar" && typeof node.value === "string";
}

export function isNumber(node: UDMNode): node is UDMScalar & { readonly value: number } {
  return node.kind === "scalar" && typeof node.value === "number";
}

export function isBoolean(node: UDMNode): node is UDMScalar & { readonly value: boolean } {
  return node.kind === "scalar" && typeof node.value === "boolean";
}

/**
 * Deep structural equality. Objects compare by key set (order-insensitive),
 * attributes and namespace; arrays element by element.
 */
export function udmEquals(a: UDMNode, b: UDMNode): boolean {
  if (a === b) return true;

  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "scalar":
      return b.kind === "scalar" && a.value === b.value;
    case "array":
      return (
        b.kind === "array" &&
        a.elements.length === b.elements.length &&
        a.elements.every((element, i) => {
          const other = b.elements[i];
          return other !== undefined && udmEquals(element, other);
        })
      );
    case "object": {
      if (b.kind !== "object") return false;
      if (a.properties.size !== b.properties.size) return false;
      for (const [key, value] of a.properties) {
        const other = b.properties.get(key);
        if (other === undefined || !udmEquals(value, other)) return false;
      }
      if (a.metadata.namespace !== b.metadata.namespace) return false;
      if (a.metadata.attributes.size !== b.metadata.attributes.size) return false;
      for (const [key, value] of a.metadata.attributes) {
        if (b.metadata.attributes.get(key) !== value) return false;
      }
      return true;
    }
  }
}

// =============================================================================
// CONVERSION
// =============================================================================

export interface ConvertOptions {
  /** Keys with this prefix map to attributes (e.g. "@") */
  attributePrefix?: string;
}

/** Convert a plain JS value into a UDM tree */
export function fromJS(value: unknown, options: ConvertOptions = {}): UDMNode {
  if (value === null || value === undefined) return NULL;

  switch (typeof value) {
    case "string":
    case "boolean":
      return scalar(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new ValueTypeError(`Cannot represent non-finite number ${value}`);
      }
      return scalar(value);
  }

  if (Array.isArray(value)) {
    return array(value.map((element: unknown) => fromJS(element, options)));
  }

  if (typeof value === "object") {
    const prefix = options.attributePrefix;
    const properties: Array<[string, UDMNode]> = [];
    const attributes = new Map<string, string>();

    for (const [key, child] of Object.entries(value)) {
      if (prefix && key.startsWith(prefix) && key.length > prefix.length) {
        const converted = fromJS(child, options);
        if (converted.kind === "null") continue;
        if (converted.kind !== "scalar") {
          throw new ValueTypeError(`Attribute '${key}' must be a scalar, got ${typeName(converted)}`);
        }
        attributes.set(key.slice(prefix.length), String(converted.value));
      } else {
        properties.push([key, fromJS(child, options)]);
      }
    }

    return object(properties, { attributes });
  }

  throw new ValueTypeError(`Cannot convert ${typeof value} to a data value`);
}

/** Convert a UDM tree into a plain JS value */
export function toJS(node: UDMNode, options: ConvertOptions = {}): JSValue {
  switch (node.kind) {
    case "null":
      return null;
    case "scalar":
      return node.value;
    case "array":
      return node.elements.map((element) => toJS(element, options));
    case "object": {
      const result: { [key: string]: JSValue } = {};
      const prefix = options.attributePrefix;
      if (prefix) {
        for (const [key, value] of node.metadata.attributes) {
          setOwn(result, `${prefix}${key}`, value);
        }
      }
      for (const [key, value] of node.properties) {
        setOwn(result, key, toJS(value, options));
      }
      return result;
    }
  }
}

/** Plain assignment would treat `__proto__` as the prototype */
function setOwn(target: { [key: string]: JSValue }, key: string, value: JSValue): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

// =============================================================================
// COPY-ON-WRITE EDITS
// =============================================================================

/** New object with `key` set; an existing key keeps its position */
export function withProperty(target: UDMObject, key: string, value: UDMNode): UDMObject {
  const properties = new Map(target.properties);
  properties.set(key, value);
  return object(properties, target.metadata);
}

/** New object without `key`; returns `target` itself when the key is absent */
export function withoutProperty(target: UDMObject, key: string): UDMObject {
  if (!target.properties.has(key)) return target;
  const properties = new Map(target.properties);
  properties.delete(key);
  return object(properties, target.metadata);
}

/** New array with element `index` replaced; `index === length` appends */
export function withElement(target: UDMArray, index: number, value: UDMNode): UDMArray {
  const resolved = index < 0 ? target.elements.length + index : index;
  if (resolved < 0 || resolved > target.elements.length) {
    throw new ValueTypeError(
      `Index ${index} out of range for array of length ${target.elements.length}`
    );
  }
  const elements = [...target.elements];
  elements[resolved] = value;
  return array(elements);
}

export type EditPath = readonly (string | number)[];

/**
 * Replace the node at `path`, rebuilding only the nodes along it. Missing
 * object levels (absent keys or null) are created as empty objects.
 */
export function setIn(root: UDMNode, path: EditPath, value: UDMNode): UDMNode {
  const [head, ...rest] = path;
  if (head === undefined) return value;

  if (typeof head === "string") {
    const target = root.kind === "null" ? object() : root;
    if (target.kind !== "object") {
      throw new ValueTypeError(`Cannot set property '${head}' on ${typeName(target)}`);
    }
    const child = target.properties.get(head) ?? NULL;
    return withProperty(target, head, setIn(child, rest, value));
  }

  if (root.kind !== "array") {
    throw new ValueTypeError(`Cannot set index ${head} on ${typeName(root)}`);
  }
  const resolved = head < 0 ? root.elements.length + head : head;
  const child = root.elements[resolved] ?? NULL;
  return withElement(root, head, setIn(child, rest, value));
}

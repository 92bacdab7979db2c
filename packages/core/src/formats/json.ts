/**
 * JSON adapter
 *
 * Keys starting with `@` hold attributes: `{"@id": "7", "name": "x"}` parses
 * to an object with attribute `id` and property `name`, and serializes back
 * the same way.
 */

import { FormatError } from "../compiler/weft/errors.js";
import { type UDMNode, fromJS, toJS } from "../udm/node.js";
import type { FormatAdapter, FormatOptions } from "./types.js";

export const ATTRIBUTE_PREFIX = "@";

const DEFAULT_INDENT = 2;

export const jsonFormat: FormatAdapter = {
  name: "json",

  parse(text: string): UDMNode {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FormatError(`Invalid JSON input: ${message}`, { cause: error });
    }
    return fromJS(value, { attributePrefix: ATTRIBUTE_PREFIX });
  },

  serialize(node: UDMNode, options: FormatOptions = {}): string {
    const value = toJS(node, { attributePrefix: ATTRIBUTE_PREFIX });
    if (options.pretty !== true) {
      return JSON.stringify(value);
    }
    const indent = typeof options.indent === "number" ? options.indent : DEFAULT_INDENT;
    return JSON.stringify(value, null, indent);
  },
};

/**
 * Format lookup
 */

import type { FormatName } from "../compiler/weft/ast.js";
import { FormatError } from "../compiler/weft/errors.js";
import { jsonFormat } from "./json.js";
import type { FormatAdapter } from "./types.js";

export * from "./types.js";
export { jsonFormat } from "./json.js";

const ADAPTERS: ReadonlyMap<string, FormatAdapter> = new Map([[jsonFormat.name, jsonFormat]]);

/** Names a header may use that have no adapter in this package */
const KNOWN_FORMATS: ReadonlySet<string> = new Set(["json", "xml", "csv", "yaml"]);

/**
 * Adapter for a concrete format name
 */
export function getFormat(name: string): FormatAdapter {
  const adapter = ADAPTERS.get(name);
  if (adapter) return adapter;

  throw new FormatError(
    KNOWN_FORMATS.has(name)
      ? `Format '${name}' is not supported by this build`
      : `Unknown format '${name}'`,
    { code: "UNSUPPORTED_FORMAT" }
  );
}

/** Guess the format of input text for `auto` */
export function detectFormat(text: string): Exclude<FormatName, "auto"> {
  const trimmed = text.trimStart();
  if (trimmed.startsWith("<")) return "xml";
  return "json";
}

/** Concrete format for a declared name; `auto` inspects `text` */
export function resolveFormat(name: FormatName, text: string): Exclude<FormatName, "auto"> {
  return name === "auto" ? detectFormat(text) : name;
}

/** Names with a registered adapter */
export function supportedFormats(): string[] {
  return [...ADAPTERS.keys()];
}

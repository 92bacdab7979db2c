/**
 * @weft/core
 * Compiler and runtime for Weft transformation scripts
 */

// Compiler
export * from "./compiler/index.js";

// Data model
export * as udm from "./udm/node.js";
export {
  NULL,
  fromJS,
  navigate,
  setIn,
  toJS,
  typeName,
  udmEquals,
  withProperty,
  withoutProperty,
  type JSValue,
  type Metadata,
  type NavigateOptions,
  type PathSegment,
  type UDMArray,
  type UDMNode,
  type UDMNull,
  type UDMObject,
  type UDMScalar,
} from "./udm/index.js";

// Runtime
export * from "./runtime/index.js";

// Standard library
export {
  arrayFunctions,
  createStandardRegistry,
  mathFunctions,
  objectFunctions,
  stringFunctions,
  typeFunctions,
} from "./stdlib/index.js";

// Formats
export {
  detectFormat,
  getFormat,
  jsonFormat,
  resolveFormat,
  supportedFormats,
  type FormatAdapter,
  type FormatOptions,
  type FormatParser,
  type FormatSerializer,
} from "./formats/index.js";

export { runScript, transform, type RunScriptOptions, type RunScriptResult } from "./transform.js";

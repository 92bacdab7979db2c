/**
 * Weft script compiler
 */

export * from "./errors.js";
export * from "./tokenizer.js";
export * from "./ast.js";
export { Parser, parse, parseScript } from "./parser.js";

/**
 * Compile-and-run entry points
 */

import type { FormatName, Program } from "./compiler/weft/ast.js";
import { parseScript } from "./compiler/weft/parser.js";
import { getFormat, resolveFormat } from "./formats/index.js";
import type { FormatOptions } from "./formats/types.js";
import { type ExecuteOptions, execute } from "./runtime/interpreter.js";
import type { UDMNode } from "./udm/node.js";

export interface RunScriptOptions extends ExecuteOptions {
  /** Overrides the header's input format */
  inputFormat?: FormatName;
  /** Overrides the header's output format */
  outputFormat?: FormatName;
  /** Overrides the output `pretty` option */
  pretty?: boolean;
}

export interface RunScriptResult {
  program: Program;
  result: UDMNode;
  output: string;
  inputFormat: string;
  outputFormat: string;
}

/**
 * Compile `source` and evaluate it against an input document.
 * Throws the structured error on failure.
 */
export function transform(source: string, input: UDMNode, options: ExecuteOptions = {}): UDMNode {
  const program = parseScript(source);
  return execute(program, input, options);
}

/**
 * Parse input text with the script's input format, run the script and
 * serialize the result with its output format
 */
export function runScript(
  source: string | Program,
  inputText: string,
  options: RunScriptOptions = {}
): RunScriptResult {
  const program = typeof source === "string" ? parseScript(source) : source;
  const { header } = program;

  const inputFormat = resolveFormat(options.inputFormat ?? header.input.format, inputText);
  const declaredOutput = options.outputFormat ?? header.output.format;
  const outputFormat = declaredOutput === "auto" ? inputFormat : declaredOutput;

  const input = getFormat(inputFormat).parse(inputText, header.input.options);
  const result = execute(program, input, options);

  const outputOptions: FormatOptions =
    options.pretty === undefined
      ? header.output.options
      : { ...header.output.options, pretty: options.pretty };
  const output = getFormat(outputFormat).serialize(result, outputOptions);

  return { program, result, output, inputFormat, outputFormat };
}

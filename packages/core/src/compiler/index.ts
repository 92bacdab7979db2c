/**
 * Compiler exports
 */

import { readFile } from "node:fs/promises";
import type { Program } from "./weft/ast.js";
import { WeftError } from "./weft/errors.js";
import { parseScript } from "./weft/parser.js";

export * from "./weft/index.js";

/** Diagnostic reported by compile() */
export interface CompilerDiagnostic {
  code: string;
  message: string;
  line?: number;
  column?: number;
}

/** Compile result */
export interface CompilationResult {
  success: boolean;
  program?: Program;
  errors: CompilerDiagnostic[];
}

/** Convert a thrown value into a diagnostic */
export function toDiagnostic(error: unknown): CompilerDiagnostic {
  if (error instanceof WeftError) {
    return {
      code: error.code,
      message: error.message,
      line: error.location?.line,
      column: error.location?.column,
    };
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Compile a Weft script from source string
 * This is the main entry point for compilation
 */
export function compile(source: string): CompilationResult {
  try {
    const program = parseScript(source);
    return { success: true, program, errors: [] };
  } catch (error) {
    if (!(error instanceof WeftError)) throw error;
    return { success: false, errors: [toDiagnostic(error)] };
  }
}

/**
 * Compile a Weft script from file path
 */
export async function compileFile(filePath: string): Promise<CompilationResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      success: false,
      errors: [{ code: "FILE_READ_ERROR", message: `Failed to read file: ${message}` }],
    };
  }
  return compile(content);
}

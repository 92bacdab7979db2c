/**
 * Error taxonomy for Weft scripts
 *
 * Every failure that leaves the core is one of the classes below. Compile-time
 * kinds (lex, parse) are raised before evaluation starts; the others are raised
 * by the interpreter and always carry the location of the offending node.
 */

/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

/** Source span (start to end) */
export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export type WeftErrorCode =
  | "LEX_ERROR"
  | "PARSE_ERROR"
  | "UNDEFINED_VARIABLE"
  | "UNDEFINED_FUNCTION"
  | "TYPE_ERROR"
  | "ARITY_ERROR"
  | "NAVIGATION_ERROR"
  | "FORMAT_ERROR"
  | "UNSUPPORTED_FORMAT";

export interface WeftErrorOptions {
  location?: SourceLocation;
  span?: SourceSpan;
  source?: string;
  cause?: unknown;
}

/** Base error class for Weft */
export class WeftError extends Error {
  readonly code: WeftErrorCode;
  location?: SourceLocation;
  span?: SourceSpan;
  source?: string;

  constructor(code: WeftErrorCode, message: string, options?: WeftErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WeftError";
    this.code = code;
    this.location = options?.location;
    this.span = options?.span;
    this.source = options?.source;
  }

  /** Attach a call-site location to an error raised without one */
  locate(location: SourceLocation, source?: string): this {
    if (!this.location) {
      this.location = location;
      this.source = this.source ?? source;
    }
    return this;
  }

  /** Format error with source context */
  format(): string {
    const lines: string[] = [];

    const loc = this.location;
    if (loc) {
      lines.push(`Error [${this.code}] at line ${loc.line}, column ${loc.column}:`);
    } else {
      lines.push(`Error [${this.code}]:`);
    }

    lines.push(`  ${this.message}`);

    if (this.source && this.location) {
      const sourceLines = this.source.split("\n");
      const lineIdx = this.location.line - 1;

      if (lineIdx >= 0 && lineIdx < sourceLines.length) {
        lines.push("");
        lines.push(`  ${this.location.line} | ${sourceLines[lineIdx]}`);

        const padding = " ".repeat(String(this.location.line).length + 3);
        const pointer = `${" ".repeat(Math.max(0, this.location.column - 1))}^`;
        lines.push(`  ${padding}${pointer}`);
      }
    }

    return lines.join("\n");
  }
}

/** Tokenization error */
export class LexError extends WeftError {
  constructor(message: string, options?: WeftErrorOptions) {
    super("LEX_ERROR", message, options);
    this.name = "LexError";
  }
}

/** Parse error */
export class ParseError extends WeftError {
  readonly expected: string[];
  readonly found: string;

  constructor(
    message: string,
    details: { expected: string[]; found: string },
    options?: WeftErrorOptions
  ) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
    this.expected = details.expected;
    this.found = details.found;
  }
}

/** Reference to a name that no enclosing scope binds */
export class UndefinedVariableError extends WeftError {
  readonly variable: string;

  constructor(variable: string, options?: WeftErrorOptions & { hint?: string }) {
    super("UNDEFINED_VARIABLE", withHint(`Undefined variable: ${variable}`, options?.hint), options);
    this.name = "UndefinedVariableError";
    this.variable = variable;
  }
}

/** Call to a name that is neither a closure in scope nor a registry function */
export class UndefinedFunctionError extends WeftError {
  readonly function: string;

  constructor(fn: string, options?: WeftErrorOptions & { hint?: string }) {
    super("UNDEFINED_FUNCTION", withHint(`Undefined function: ${fn}`, options?.hint), options);
    this.name = "UndefinedFunctionError";
    this.function = fn;
  }
}

/** Operand or argument of the wrong shape */
export class ValueTypeError extends WeftError {
  constructor(message: string, options?: WeftErrorOptions) {
    super("TYPE_ERROR", message, options);
    this.name = "ValueTypeError";
  }
}

/** Wrong number of arguments */
export class ArityError extends WeftError {
  readonly expected: number;
  readonly got: number;

  constructor(
    callee: string,
    expected: number,
    got: number,
    options?: WeftErrorOptions & { atMost?: number }
  ) {
    super("ARITY_ERROR", arityMessage(callee, expected, got, options?.atMost), options);
    this.name = "ArityError";
    this.expected = expected;
    this.got = got;
  }
}

/** Failure while evaluating a predicate selector */
export class NavigationError extends WeftError {
  constructor(message: string, options?: WeftErrorOptions) {
    super("NAVIGATION_ERROR", message, options);
    this.name = "NavigationError";
  }
}

/** Input that a format adapter cannot read or a format with no adapter */
export class FormatError extends WeftError {
  constructor(
    message: string,
    options?: WeftErrorOptions & { code?: "FORMAT_ERROR" | "UNSUPPORTED_FORMAT" }
  ) {
    super(options?.code ?? "FORMAT_ERROR", message, options);
    this.name = "FormatError";
  }
}

/** Create a source location from line, column, offset */
export function loc(line: number, column: number, offset: number): SourceLocation {
  return { line, column, offset };
}

/** Create a source span from start and end locations */
export function span(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/** Format multiple errors */
export function formatErrors(errors: WeftError[]): string {
  return errors.map((e) => e.format()).join("\n\n");
}

/** Follow an `Error.cause` chain to its innermost error */
export function rootCause(error: unknown): unknown {
  let current = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}

/** Outermost `WeftError` in an `Error.cause` chain, if any */
export function firstWeftError(error: unknown): WeftError | undefined {
  let current = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof WeftError) return current;
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

/**
 * Closest candidate by edit distance, for "did you mean" hints.
 * Returns undefined when nothing is within two edits.
 */
export function suggestName(name: string, candidates: Iterable<string>): string | undefined {
  let best: string | undefined;
  let bestDistance = 3;
  for (const candidate of candidates) {
    const distance = editDistance(name.toLowerCase(), candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost)
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

function withHint(message: string, hint: string | undefined): string {
  return hint ? `${message}. Did you mean '${hint}'?` : message;
}

function arityMessage(callee: string, expected: number, got: number, atMost?: number): string {
  if (atMost === undefined || atMost === expected) {
    return `${callee} expects ${expected} argument${expected === 1 ? "" : "s"}, got ${got}`;
  }
  if (atMost === Number.POSITIVE_INFINITY) {
    return `${callee} expects at least ${expected} argument${expected === 1 ? "" : "s"}, got ${got}`;
  }
  return `${callee} expects ${expected} to ${atMost} arguments, got ${got}`;
}

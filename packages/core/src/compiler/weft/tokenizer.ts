/**
 * Tokenizer for Weft scripts
 */

import { LexError, type SourceLocation, loc } from "./errors.js";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type TokenKind =
  // Literals
  | "NUMBER"
  | "STRING"
  | "BOOLEAN"
  | "NULL"
  // Identifiers and keywords
  | "IDENTIFIER"
  | "KEYWORD"
  // Operators
  | "OPERATOR"
  | "ASSIGN" // =
  | "ARROW" // =>
  | "PIPE" // |>
  | "AT" // @
  | "DOT" // .
  | "DOTDOT" // ..
  | "COLON" // :
  | "COMMA" // ,
  // Brackets
  | "LPAREN" // (
  | "RPAREN" // )
  | "LBRACKET" // [
  | "RBRACKET" // ]
  | "LBRACE" // {
  | "RBRACE" // }
  // Header
  | "DIRECTIVE" // %weft 1.0
  | "SEPARATOR" // ---
  | "EOF";

/** Token with location info */
export interface Token {
  kind: TokenKind;
  /** Exact source text of the token */
  lexeme: string;
  /** Decoded value: unescaped string contents, raw number text, operator symbol */
  value: string;
  location: SourceLocation;
}

/** Reserved words */
export const KEYWORDS = new Set(["let", "if", "else", "function"]);

/** Multi-character operators, longest first */
const MULTI_CHAR_OPS = ["==", "!=", "<=", ">=", "&&", "||"];

/** Single-character operators */
const SINGLE_CHAR_OPS = new Set(["+", "-", "*", "/", "%", "<", ">", "!"]);

const PUNCTUATION: Record<string, TokenKind> = {
  "(": "LPAREN",
  ")": "RPAREN",
  "[": "LBRACKET",
  "]": "RBRACKET",
  "{": "LBRACE",
  "}": "RBRACE",
  ":": "COLON",
  ",": "COMMA",
  "@": "AT",
};

/** `$` names the value flowing through a pipe stage */
const IDENT_START = /[\p{L}_$]/u;
const IDENT_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

export class Tokenizer {
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];
  /** Directives and `---` are only recognised before the body starts */
  private section: "start" | "header" | "body" = "start";

  constructor(source: string) {
    this.source = source;
  }

  /** Tokenize the entire source */
  tokenize(): Token[] {
    while (this.pos < this.source.length) {
      this.scanToken();
    }

    this.emit("EOF", "", this.location());
    return this.tokens;
  }

  /** Get current character */
  private current(): string {
    return this.source[this.pos] ?? "";
  }

  /** Peek at next character */
  private peek(offset = 1): string {
    return this.source[this.pos + offset] ?? "";
  }

  /** Advance position and update line/column tracking */
  private advance(): string {
    const char = this.current();
    this.pos++;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  /** Get current location */
  private location(): SourceLocation {
    return loc(this.line, this.column, this.pos);
  }

  /** Emit a token spanning from `start` to the current position */
  private emit(kind: TokenKind, value: string, start: SourceLocation): void {
    this.tokens.push({
      kind,
      lexeme: this.source.slice(start.offset, this.pos),
      value,
      location: start,
    });

    if (this.section === "start") {
      this.section = kind === "DIRECTIVE" ? "header" : "body";
    } else if (kind === "SEPARATOR") {
      this.section = "body";
    }
  }

  private error(message: string, location: SourceLocation): LexError {
    return new LexError(message, { location, source: this.source });
  }

  /** Scan a single token */
  private scanToken(): void {
    const char = this.current();

    if (char === " " || char === "\t" || char === "\r" || char === "\n") {
      this.advance();
      return;
    }

    const startLocation = this.location();

    // Comments
    if (char === "/" && this.peek() === "/") {
      this.skipLineComment();
      return;
    }
    if (char === "/" && this.peek() === "*") {
      this.skipBlockComment(startLocation);
      return;
    }

    // A directive opens the source; `---` closes the header it opened
    if (
      this.section === "start" &&
      this.column === 1 &&
      char === "%" &&
      IDENT_START.test(this.peek())
    ) {
      this.scanDirective(startLocation);
      return;
    }
    if (this.section === "header" && this.column === 1 && this.source.startsWith("---", this.pos)) {
      this.advance();
      this.advance();
      this.advance();
      this.emit("SEPARATOR", "---", startLocation);
      return;
    }

    if (char === '"' || char === "'") {
      this.scanString(char, startLocation);
      return;
    }

    if (DIGIT.test(char)) {
      this.scanNumber(startLocation);
      return;
    }

    if (IDENT_START.test(char)) {
      this.scanIdentifier(startLocation);
      return;
    }

    // Operators that share a first character with something else
    if (char === "|" && this.peek() === ">") {
      this.advance();
      this.advance();
      this.emit("PIPE", "|>", startLocation);
      return;
    }
    if (char === "=" && this.peek() === ">") {
      this.advance();
      this.advance();
      this.emit("ARROW", "=>", startLocation);
      return;
    }
    if (char === "." && this.peek() === ".") {
      this.advance();
      this.advance();
      this.emit("DOTDOT", "..", startLocation);
      return;
    }

    for (const op of MULTI_CHAR_OPS) {
      if (this.source.startsWith(op, this.pos)) {
        for (let i = 0; i < op.length; i++) this.advance();
        this.emit("OPERATOR", op, startLocation);
        return;
      }
    }

    if (char === "=") {
      this.advance();
      this.emit("ASSIGN", "=", startLocation);
      return;
    }
    if (char === ".") {
      this.advance();
      this.emit("DOT", ".", startLocation);
      return;
    }

    if (SINGLE_CHAR_OPS.has(char)) {
      this.advance();
      this.emit("OPERATOR", char, startLocation);
      return;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      this.advance();
      this.emit(punctuation, char, startLocation);
      return;
    }

    throw this.error(`Unexpected character '${char}'`, startLocation);
  }

  /** Skip a `//` comment up to the end of the line */
  private skipLineComment(): void {
    while (this.current() !== "\n" && this.pos < this.source.length) {
      this.advance();
    }
  }

  /** Skip a block comment */
  private skipBlockComment(startLocation: SourceLocation): void {
    this.advance(); // /
    this.advance(); // *
    while (this.pos < this.source.length) {
      if (this.current() === "*" && this.peek() === "/") {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }
    throw this.error("Unterminated block comment", startLocation);
  }

  /** Scan `%name version` to the end of the line */
  private scanDirective(startLocation: SourceLocation): void {
    this.advance(); // %
    while (this.current() !== "\n" && this.pos < this.source.length) {
      this.advance();
    }
    const text = this.source.slice(startLocation.offset + 1, this.pos).trim();
    this.emit("DIRECTIVE", text, startLocation);
  }

  /** Scan a string literal */
  private scanString(quote: string, startLocation: SourceLocation): void {
    this.advance(); // opening quote
    let value = "";

    while (this.current() !== quote && this.pos < this.source.length) {
      if (this.current() === "\\") {
        value += this.scanEscape();
      } else {
        value += this.advance();
      }
    }

    if (this.current() !== quote) {
      throw this.error("Unterminated string literal", startLocation);
    }

    this.advance(); // closing quote
    this.emit("STRING", value, startLocation);
  }

  /** Decode one escape sequence starting at the backslash */
  private scanEscape(): string {
    const escapeLocation = this.location();
    this.advance(); // backslash
    const escaped = this.advance();
    switch (escaped) {
      case "n":
        return "\n";
      case "t":
        return "\t";
      case "r":
        return "\r";
      case "b":
        return "\b";
      case "f":
        return "\f";
      case "\\":
      case '"':
      case "'":
      case "/":
        return escaped;
      case "u": {
        const hex = this.source.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw this.error(`Invalid unicode escape '\\u${hex}'`, escapeLocation);
        }
        for (let i = 0; i < 4; i++) this.advance();
        return String.fromCharCode(Number.parseInt(hex, 16));
      }
      case "":
        throw this.error("Unterminated string literal", escapeLocation);
      default:
        throw this.error(`Invalid escape sequence '\\${escaped}'`, escapeLocation);
    }
  }

  /** Scan an integer, decimal or scientific number */
  private scanNumber(startLocation: SourceLocation): void {
    while (DIGIT.test(this.current())) {
      this.advance();
    }

    // Fraction; `1..2` and `a.1.b` keep the dot for navigation
    if (this.current() === "." && DIGIT.test(this.peek())) {
      this.advance();
      while (DIGIT.test(this.current())) {
        this.advance();
      }
    }

    // Exponent
    if (this.current() === "e" || this.current() === "E") {
      const sign = this.peek();
      const hasSign = sign === "+" || sign === "-";
      if (DIGIT.test(hasSign ? this.peek(2) : sign)) {
        this.advance();
        if (hasSign) this.advance();
        while (DIGIT.test(this.current())) {
          this.advance();
        }
      }
    }

    const text = this.source.slice(startLocation.offset, this.pos);
    this.emit("NUMBER", text, startLocation);
  }

  /** Scan an identifier or keyword */
  private scanIdentifier(startLocation: SourceLocation): void {
    while (IDENT_PART.test(this.current())) {
      this.advance();
    }
    const value = this.source.slice(startLocation.offset, this.pos);

    if (value === "true" || value === "false") {
      this.emit("BOOLEAN", value, startLocation);
      return;
    }

    if (value === "null") {
      this.emit("NULL", value, startLocation);
      return;
    }

    if (KEYWORDS.has(value)) {
      this.emit("KEYWORD", value, startLocation);
      return;
    }

    this.emit("IDENTIFIER", value, startLocation);
  }
}

/**
 * Tokenize source code
 */
export function tokenize(source: string): Token[] {
  const tokenizer = new Tokenizer(source);
  return tokenizer.tokenize();
}

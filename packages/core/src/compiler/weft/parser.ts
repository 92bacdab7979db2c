/**
 * Recursive descent parser for Weft scripts
 *
 * One method per precedence level, lowest first:
 * let > pipe > || > && > equality > relational > additive > multiplicative
 * > unary > postfix > primary.
 */

import type {
  ArrayLiteralNode,
  BinaryOperator,
  CallExprNode,
  ElseIfBranch,
  ExpressionNode,
  FormatName,
  FormatOptionValue,
  FormatSpec,
  FunctionDefNode,
  Header,
  IfNode,
  LambdaNode,
  LetBindingNode,
  ObjectLiteralNode,
  Program,
  PropertyNode,
  StatementNode,
  UnaryOperator,
} from "./ast.js";
import { ParseError, type SourceLocation } from "./errors.js";
import { type Token, type TokenKind, tokenize } from "./tokenizer.js";

const FORMAT_NAMES: ReadonlySet<string> = new Set(["auto", "json", "xml", "csv", "yaml"]);

const EQUALITY_OPS: ReadonlySet<string> = new Set(["==", "!="]);
const RELATIONAL_OPS: ReadonlySet<string> = new Set(["<", "<=", ">", ">="]);
const ADDITIVE_OPS: ReadonlySet<string> = new Set(["+", "-"]);
const MULTIPLICATIVE_OPS: ReadonlySet<string> = new Set(["*", "/", "%"]);
const UNARY_OPS: ReadonlySet<string> = new Set(["!", "-", "+"]);

const DIRECTIVE_NAME = "weft";

function isFormatName(value: string): value is FormatName {
  return FORMAT_NAMES.has(value);
}

function isBinaryOperator(value: string): value is BinaryOperator {
  return (
    EQUALITY_OPS.has(value) ||
    RELATIONAL_OPS.has(value) ||
    ADDITIVE_OPS.has(value) ||
    MULTIPLICATIVE_OPS.has(value) ||
    value === "&&" ||
    value === "||"
  );
}

function isUnaryOperator(value: string): value is UnaryOperator {
  return UNARY_OPS.has(value);
}

// =============================================================================
// PARSER CLASS
// =============================================================================

export class Parser {
  private readonly tokens: Token[];
  private readonly source: string;
  private pos = 0;

  constructor(tokens: Token[], source = "") {
    this.tokens = tokens;
    this.source = source;
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /** Get current token */
  private current(): Token {
    return this.tokens[this.pos] ?? this.endToken();
  }

  /** Peek at token at offset */
  private peek(offset = 1): Token {
    return this.tokens[this.pos + offset] ?? this.endToken();
  }

  private endToken(): Token {
    const last = this.tokens[this.tokens.length - 1];
    return {
      kind: "EOF",
      lexeme: "",
      value: "",
      location: last?.location ?? { line: 1, column: 1, offset: 0 },
    };
  }

  /** Check if current token matches */
  private check(kind: TokenKind, value?: string): boolean {
    const token = this.current();
    if (token.kind !== kind) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  /** Consume the current token if it matches */
  private match(kind: TokenKind, value?: string): boolean {
    if (!this.check(kind, value)) return false;
    this.advance();
    return true;
  }

  /** Advance and return previous token */
  private advance(): Token {
    const token = this.current();
    if (token.kind !== "EOF") {
      this.pos++;
    }
    return token;
  }

  /** Expect and consume a specific token */
  private expect(kind: TokenKind, value?: string): Token {
    if (!this.check(kind, value)) {
      const expected = value ?? describeKind(kind);
      throw this.error(`Expected '${expected}' but got ${describe(this.current())}`, [expected]);
    }
    return this.advance();
  }

  private error(message: string, expected: string[], token = this.current()): ParseError {
    return new ParseError(
      message,
      { expected, found: token.kind === "EOF" ? "end of input" : token.lexeme },
      { location: token.location, source: this.source }
    );
  }

  // ===========================================================================
  // TOP-LEVEL PARSING
  // ===========================================================================

  /** Parse a complete script */
  parseProgram(): Program {
    const start = this.current().location;
    const header = this.parseHeader();

    const statements: StatementNode[] = [];
    while (this.check("KEYWORD", "function")) {
      statements.push(this.parseFunctionDef());
    }

    const body = this.parseExpression();

    if (!this.check("EOF")) {
      throw this.error(
        `Unexpected ${describe(this.current())} after expression`,
        ["end of input"]
      );
    }

    return { kind: "program", header, statements, body, source: this.source, location: start };
  }

  /** Parse `%weft 1.0`, the format declarations and the `---` separator */
  private parseHeader(): Header {
    const start = this.current().location;

    if (!this.check("DIRECTIVE")) {
      const json: FormatSpec = { format: "json", options: {}, location: start };
      return { input: json, output: { ...json }, location: start };
    }

    const directive = this.advance();
    const [name, ...rest] = directive.value.split(/\s+/);
    if (name !== DIRECTIVE_NAME) {
      throw this.error(`Unknown directive '%${name ?? ""}'`, [`%${DIRECTIVE_NAME}`], directive);
    }
    const version = rest.join(" ").trim();
    if (!version) {
      throw this.error(`Directive '%${DIRECTIVE_NAME}' requires a version`, ["version"], directive);
    }

    const defaultSpec = (): FormatSpec => ({ format: "json", options: {}, location: start });
    const input = this.check("IDENTIFIER", "input") ? this.parseFormatSpec("input") : defaultSpec();
    const output = this.check("IDENTIFIER", "output")
      ? this.parseFormatSpec("output")
      : defaultSpec();

    if (!this.check("SEPARATOR")) {
      throw this.error(
        `Expected '---' after header but got ${describe(this.current())}`,
        ["---"]
      );
    }
    this.advance();

    return { version, input, output, location: start };
  }

  /** Parse `input json` / `output xml { pretty: true }` */
  private parseFormatSpec(keyword: "input" | "output"): FormatSpec {
    const start = this.expect("IDENTIFIER", keyword).location;
    const formatToken = this.current();
    if (formatToken.kind !== "IDENTIFIER" || !isFormatName(formatToken.value)) {
      throw this.error(
        `Expected format after '${keyword}' but got ${describe(formatToken)}`,
        [...FORMAT_NAMES]
      );
    }
    this.advance();

    const options: Record<string, FormatOptionValue> = {};
    if (this.match("LBRACE")) {
      if (!this.check("RBRACE")) {
        do {
          const key = this.expectName("option name");
          this.expect("COLON");
          options[key] = this.parseOptionValue();
        } while (this.match("COMMA"));
      }
      this.expect("RBRACE");
    }

    return { format: formatToken.value, options, location: start };
  }

  private parseOptionValue(): FormatOptionValue {
    const token = this.current();
    switch (token.kind) {
      case "STRING":
        this.advance();
        return token.value;
      case "NUMBER":
        this.advance();
        return Number(token.value);
      case "BOOLEAN":
        this.advance();
        return token.value === "true";
      default:
        throw this.error(`Expected option value but got ${describe(token)}`, [
          "string",
          "number",
          "boolean",
        ]);
    }
  }

  /** Parse `function name(a, b) { body }` */
  private parseFunctionDef(): FunctionDefNode {
    const start = this.expect("KEYWORD", "function").location;
    const name = this.expect("IDENTIFIER").value;

    this.expect("LPAREN");
    const params: string[] = [];
    if (!this.check("RPAREN")) {
      do {
        params.push(this.expect("IDENTIFIER").value);
      } while (this.match("COMMA"));
    }
    this.expect("RPAREN");

    this.expect("LBRACE");
    const body = this.parseExpression();
    this.expect("RBRACE");

    return { kind: "function_def", name, params, body, location: start };
  }

  // ===========================================================================
  // EXPRESSION PARSING
  // ===========================================================================

  /** Parse an expression */
  parseExpression(): ExpressionNode {
    if (this.check("KEYWORD", "let")) {
      return this.parseLet();
    }
    return this.parsePipe();
  }

  /** Parse let chain: let x = value, next */
  private parseLet(): LetBindingNode {
    const start = this.expect("KEYWORD", "let").location;
    const name = this.expect("IDENTIFIER").value;
    this.expect("ASSIGN");
    const value = this.parseExpression();
    this.expect("COMMA");
    const next = this.parseExpression();
    return { kind: "let", name, value, next, location: start };
  }

  /** Parse pipe: a |> b, nesting to the right */
  private parsePipe(): ExpressionNode {
    const source = this.parseOr();

    if (this.check("PIPE")) {
      const operator = this.advance();
      const target = this.parsePipe();
      return { kind: "pipe", source, target, location: operator.location };
    }

    return source;
  }

  /** Parse or: a || b */
  private parseOr(): ExpressionNode {
    return this.parseBinaryLevel(new Set(["||"]), () => this.parseAnd());
  }

  /** Parse and: a && b */
  private parseAnd(): ExpressionNode {
    return this.parseBinaryLevel(new Set(["&&"]), () => this.parseEquality());
  }

  /** Parse equality: == != */
  private parseEquality(): ExpressionNode {
    return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseRelational());
  }

  /** Parse relational: < <= > >= */
  private parseRelational(): ExpressionNode {
    return this.parseBinaryLevel(RELATIONAL_OPS, () => this.parseAdditive());
  }

  /** Parse additive: + - */
  private parseAdditive(): ExpressionNode {
    return this.parseBinaryLevel(ADDITIVE_OPS, () => this.parseMultiplicative());
  }

  /** Parse multiplicative: * / % */
  private parseMultiplicative(): ExpressionNode {
    return this.parseBinaryLevel(MULTIPLICATIVE_OPS, () => this.parseUnary());
  }

  /** Left-associative binary level */
  private parseBinaryLevel(
    operators: ReadonlySet<string>,
    next: () => ExpressionNode
  ): ExpressionNode {
    let left = next();

    while (this.check("OPERATOR") && operators.has(this.current().value)) {
      const operator = this.advance();
      const op = operator.value;
      if (!isBinaryOperator(op)) break;
      const right = next();
      left = { kind: "binary", op, left, right, location: operator.location };
    }

    return left;
  }

  /** Parse unary: ! - + */
  private parseUnary(): ExpressionNode {
    const token = this.current();
    if (token.kind === "OPERATOR" && isUnaryOperator(token.value)) {
      this.advance();
      const operand = this.parseUnary();
      return { kind: "unary", op: token.value, operand, location: token.location };
    }

    return this.parsePostfix();
  }

  /** Parse postfix: . .. @ [] () */
  private parsePostfix(): ExpressionNode {
    let expr = this.parsePrimary();

    while (true) {
      const token = this.current();

      if (token.kind === "DOT") {
        this.advance();
        if (this.match("AT")) {
          const name = this.expectName("attribute name");
          expr = { kind: "attribute", target: expr, name, location: token.location };
        } else if (this.match("OPERATOR", "*")) {
          expr = { kind: "wildcard", target: expr, location: token.location };
        } else {
          const property = this.expectName("property name");
          expr = { kind: "member", target: expr, property, location: token.location };
        }
      } else if (token.kind === "DOTDOT") {
        this.advance();
        if (this.match("AT")) {
          const name = this.expectName("attribute name");
          expr = {
            kind: "descendant",
            target: expr,
            selector: { kind: "attribute", name },
            location: token.location,
          };
        } else if (this.match("OPERATOR", "*")) {
          expr = {
            kind: "descendant",
            target: expr,
            selector: { kind: "wildcard" },
            location: token.location,
          };
        } else {
          const name = this.expectName("property name");
          expr = {
            kind: "descendant",
            target: expr,
            selector: { kind: "property", name },
            location: token.location,
          };
        }
      } else if (token.kind === "AT") {
        this.advance();
        const name = this.expectName("attribute name");
        expr = { kind: "attribute", target: expr, name, location: token.location };
      } else if (token.kind === "LBRACKET") {
        this.advance();
        if (this.check("OPERATOR", "*") && this.peek().kind === "RBRACKET") {
          this.advance();
          this.advance();
          expr = { kind: "wildcard", target: expr, location: token.location };
        } else {
          const index = this.parseExpression();
          this.expect("RBRACKET");
          expr = { kind: "index", target: expr, index, location: token.location };
        }
      } else if (token.kind === "LPAREN") {
        this.advance();
        const args = this.parseArguments();
        const call: CallExprNode = { kind: "call", callee: expr, args, location: expr.location };
        expr = call;
      } else {
        break;
      }
    }

    return expr;
  }

  /** Parse call arguments up to and including `)` */
  private parseArguments(): ExpressionNode[] {
    const args: ExpressionNode[] = [];
    if (!this.check("RPAREN")) {
      do {
        args.push(this.parseExpression());
      } while (this.match("COMMA"));
    }
    this.expect("RPAREN");
    return args;
  }

  /** Property, attribute or option name; keywords are allowed here */
  private expectName(what: string): string {
    const token = this.current();
    if (token.kind === "IDENTIFIER" || token.kind === "KEYWORD") {
      this.advance();
      return token.value;
    }
    throw this.error(`Expected ${what} but got ${describe(token)}`, [what]);
  }

  /** Parse primary expression */
  private parsePrimary(): ExpressionNode {
    const token = this.current();

    switch (token.kind) {
      case "NUMBER":
        this.advance();
        return { kind: "literal", value: Number(token.value), location: token.location };

      case "STRING":
        this.advance();
        return { kind: "literal", value: token.value, location: token.location };

      case "BOOLEAN":
        this.advance();
        return { kind: "literal", value: token.value === "true", location: token.location };

      case "NULL":
        this.advance();
        return { kind: "literal", value: null, location: token.location };

      case "IDENTIFIER":
        if (this.peek().kind === "ARROW") {
          return this.parseLambda();
        }
        this.advance();
        return { kind: "identifier", name: token.value, location: token.location };

      case "LPAREN": {
        if (this.isParenthesizedLambda()) {
          return this.parseLambda();
        }
        this.advance();
        const expr = this.parseExpression();
        this.expect("RPAREN");
        return expr;
      }

      case "LBRACKET":
        return this.parseArrayLiteral();

      case "LBRACE":
        return this.parseObjectLiteral();

      case "KEYWORD":
        if (token.value === "if") {
          return this.parseIf();
        }
        break;
    }

    throw this.error(`Unexpected ${describe(token)} in expression`, ["expression"]);
  }

  /** Look ahead for `(a, b) =>`; rejects `() =>` outright */
  private isParenthesizedLambda(): boolean {
    if (this.peek().kind === "RPAREN" && this.peek(2).kind === "ARROW") {
      throw this.error("Lambda must declare at least one parameter", ["parameter name"], this.peek());
    }

    let offset = 1;
    while (true) {
      if (this.peek(offset).kind !== "IDENTIFIER") return false;
      offset++;
      const separator = this.peek(offset).kind;
      if (separator === "COMMA") {
        offset++;
        continue;
      }
      return separator === "RPAREN" && this.peek(offset + 1).kind === "ARROW";
    }
  }

  /** Parse `x => body` or `(a, b) => body` */
  private parseLambda(): LambdaNode {
    const start = this.current().location;
    const params: string[] = [];

    if (this.match("LPAREN")) {
      do {
        params.push(this.expect("IDENTIFIER").value);
      } while (this.match("COMMA"));
      this.expect("RPAREN");
    } else {
      params.push(this.expect("IDENTIFIER").value);
    }

    this.expect("ARROW");
    const body = this.parseExpression();
    return { kind: "lambda", params, body, location: start };
  }

  /** Parse if (c) a else if (d) b else e */
  private parseIf(): IfNode {
    const start = this.expect("KEYWORD", "if").location;
    const { condition, then } = this.parseConditionalBranch();
    const elseIfs: ElseIfBranch[] = [];

    while (true) {
      if (!this.check("KEYWORD", "else")) {
        throw this.error(
          `'if' expression requires an 'else' branch but got ${describe(this.current())}`,
          ["else"]
        );
      }
      this.advance();

      if (this.check("KEYWORD", "if")) {
        const location: SourceLocation = this.advance().location;
        const branch = this.parseConditionalBranch();
        elseIfs.push({ ...branch, location });
        continue;
      }

      const elseExpr = this.parseExpression();
      return { kind: "if", condition, then, elseIfs, else: elseExpr, location: start };
    }
  }

  /** `(condition) expression` after `if` */
  private parseConditionalBranch(): { condition: ExpressionNode; then: ExpressionNode } {
    this.expect("LPAREN");
    const condition = this.parseExpression();
    this.expect("RPAREN");
    const then = this.parseExpression();
    return { condition, then };
  }

  /** Parse [a, b, c] */
  private parseArrayLiteral(): ArrayLiteralNode {
    const start = this.expect("LBRACKET").location;
    const elements: ExpressionNode[] = [];

    if (!this.check("RBRACKET")) {
      do {
        elements.push(this.parseExpression());
      } while (this.match("COMMA"));
    }

    this.expect("RBRACKET");
    return { kind: "array", elements, location: start };
  }

  /** Parse {key: value, @attr: value, "@attr": value} */
  private parseObjectLiteral(): ObjectLiteralNode {
    const start = this.expect("LBRACE").location;
    const properties: PropertyNode[] = [];

    if (!this.check("RBRACE")) {
      do {
        properties.push(this.parseProperty());
      } while (this.match("COMMA"));
    }

    this.expect("RBRACE");
    return { kind: "object", properties, location: start };
  }

  private parseProperty(): PropertyNode {
    const token = this.current();
    let key: string;
    let isAttribute = false;

    if (token.kind === "AT") {
      this.advance();
      key = this.expectName("attribute name");
      isAttribute = true;
    } else if (token.kind === "STRING") {
      this.advance();
      key = token.value;
      if (key.startsWith("@") && key.length > 1) {
        key = key.slice(1);
        isAttribute = true;
      }
    } else if (token.kind === "IDENTIFIER" || token.kind === "KEYWORD") {
      this.advance();
      key = token.value;
    } else {
      throw this.error(`Expected property name but got ${describe(token)}`, ["property name"]);
    }

    this.expect("COLON");
    const value = this.parseExpression();
    return { key, value, isAttribute, location: token.location };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function describeKind(kind: TokenKind): string {
  switch (kind) {
    case "LPAREN":
      return "(";
    case "RPAREN":
      return ")";
    case "LBRACKET":
      return "[";
    case "RBRACKET":
      return "]";
    case "LBRACE":
      return "{";
    case "RBRACE":
      return "}";
    case "COLON":
      return ":";
    case "COMMA":
      return ",";
    case "ASSIGN":
      return "=";
    case "ARROW":
      return "=>";
    case "IDENTIFIER":
      return "identifier";
    default:
      return kind.toLowerCase();
  }
}

function describe(token: Token): string {
  if (token.kind === "EOF") return "end of input";
  return `${token.kind} '${token.lexeme}'`;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Parse a token stream into a program
 */
export function parse(tokens: Token[], source = ""): Program {
  const parser = new Parser(tokens, source);
  return parser.parseProgram();
}

/**
 * Tokenize and parse Weft source code
 */
export function parseScript(source: string): Program {
  return parse(tokenize(source), source);
}

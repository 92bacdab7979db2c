/**
 * AST node types for Weft scripts
 *
 * Nodes are created once by the parser and never mutated afterwards, so a
 * compiled program can be shared by concurrent evaluations.
 */

import type { SourceLocation } from "./errors.js";

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base AST node with location info */
export interface ASTNode {
  readonly location: SourceLocation;
}

// =============================================================================
// PROGRAM
// =============================================================================

/** Complete script */
export interface Program extends ASTNode {
  readonly kind: "program";
  readonly header: Header;
  readonly statements: readonly StatementNode[];
  readonly body: ExpressionNode;
  /** Script text, kept for error formatting */
  readonly source: string;
}

/** Format names a header may declare */
export type FormatName = "auto" | "json" | "xml" | "csv" | "yaml";

export type FormatOptionValue = string | number | boolean;

export interface FormatSpec extends ASTNode {
  readonly format: FormatName;
  readonly options: Readonly<Record<string, FormatOptionValue>>;
}

/** Header before the `---` separator */
export interface Header extends ASTNode {
  /** Version from the `%weft` directive; undefined for a headerless script */
  readonly version?: string;
  readonly input: FormatSpec;
  readonly output: FormatSpec;
}

// =============================================================================
// STATEMENTS
// =============================================================================

export type StatementNode = FunctionDefNode | MatchNode | TryCatchNode;

/** function name(a, b) { body } */
export interface FunctionDefNode extends ASTNode {
  readonly kind: "function_def";
  readonly name: string;
  readonly params: readonly string[];
  readonly body: ExpressionNode;
}

/** Reserved: pattern match over a value; the parser does not produce it yet */
export interface MatchNode extends ASTNode {
  readonly kind: "match";
  readonly subject: ExpressionNode;
  readonly cases: ReadonlyArray<{ pattern: ExpressionNode; body: ExpressionNode }>;
}

/** Reserved: guarded evaluation with a fallback; the parser does not produce it yet */
export interface TryCatchNode extends ASTNode {
  readonly kind: "try_catch";
  readonly body: ExpressionNode;
  readonly errorName: string;
  readonly handler: ExpressionNode;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | ObjectLiteralNode
  | ArrayLiteralNode
  | MemberAccessNode
  | IndexAccessNode
  | AttributeAccessNode
  | WildcardAccessNode
  | DescendantAccessNode
  | CallExprNode
  | LambdaNode
  | LetBindingNode
  | IfNode
  | BinaryExprNode
  | UnaryExprNode
  | PipeNode;

/** Path selector nodes, gathered by the interpreter into one navigation */
export type PathNode =
  | MemberAccessNode
  | IndexAccessNode
  | AttributeAccessNode
  | WildcardAccessNode
  | DescendantAccessNode;

export interface LiteralNode extends ASTNode {
  readonly kind: "literal";
  readonly value: string | number | boolean | null;
}

export interface IdentifierNode extends ASTNode {
  readonly kind: "identifier";
  readonly name: string;
}

/** One `key: value` entry; `@key` entries become attributes */
export interface PropertyNode extends ASTNode {
  readonly key: string;
  readonly value: ExpressionNode;
  readonly isAttribute: boolean;
}

export interface ObjectLiteralNode extends ASTNode {
  readonly kind: "object";
  readonly properties: readonly PropertyNode[];
}

export interface ArrayLiteralNode extends ASTNode {
  readonly kind: "array";
  readonly elements: readonly ExpressionNode[];
}

/** target.name */
export interface MemberAccessNode extends ASTNode {
  readonly kind: "member";
  readonly target: ExpressionNode;
  readonly property: string;
}

/** target[index] */
export interface IndexAccessNode extends ASTNode {
  readonly kind: "index";
  readonly target: ExpressionNode;
  readonly index: ExpressionNode;
}

/** target.@name or target@name */
export interface AttributeAccessNode extends ASTNode {
  readonly kind: "attribute";
  readonly target: ExpressionNode;
  readonly name: string;
}

/** target.* or target[*] */
export interface WildcardAccessNode extends ASTNode {
  readonly kind: "wildcard";
  readonly target: ExpressionNode;
}

/** What follows `..` */
export type DescendantSelector =
  | { readonly kind: "property"; readonly name: string }
  | { readonly kind: "attribute"; readonly name: string }
  | { readonly kind: "wildcard" };

/** target..name, target..@name, target..* */
export interface DescendantAccessNode extends ASTNode {
  readonly kind: "descendant";
  readonly target: ExpressionNode;
  readonly selector: DescendantSelector;
}

export interface CallExprNode extends ASTNode {
  readonly kind: "call";
  readonly callee: ExpressionNode;
  readonly args: readonly ExpressionNode[];
}

/** x => body, (a, b) => body */
export interface LambdaNode extends ASTNode {
  readonly kind: "lambda";
  readonly params: readonly string[];
  readonly body: ExpressionNode;
}

/** let name = value, next */
export interface LetBindingNode extends ASTNode {
  readonly kind: "let";
  readonly name: string;
  readonly value: ExpressionNode;
  readonly next: ExpressionNode;
}

export interface ElseIfBranch extends ASTNode {
  readonly condition: ExpressionNode;
  readonly then: ExpressionNode;
}

export interface IfNode extends ASTNode {
  readonly kind: "if";
  readonly condition: ExpressionNode;
  readonly then: ExpressionNode;
  readonly elseIfs: readonly ElseIfBranch[];
  readonly else: ExpressionNode;
}

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export type UnaryOperator = "!" | "-" | "+";

export interface BinaryExprNode extends ASTNode {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends ASTNode {
  readonly kind: "unary";
  readonly op: UnaryOperator;
  readonly operand: ExpressionNode;
}

/**
 * source |> target. The grammar nests to the right (`a |> (b |> c)`); the
 * interpreter flattens the chain so values still flow left to right.
 */
export interface PipeNode extends ASTNode {
  readonly kind: "pipe";
  readonly source: ExpressionNode;
  readonly target: ExpressionNode;
}

export function isPathNode(node: ExpressionNode): node is PathNode {
  return (
    node.kind === "member" ||
    node.kind === "index" ||
    node.kind === "attribute" ||
    node.kind === "wildcard" ||
    node.kind === "descendant"
  );
}

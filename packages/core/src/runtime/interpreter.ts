/**
 * Weft Interpreter
 * Evaluates a parsed program against an input document
 */

import {
  type CallExprNode,
  type ExpressionNode,
  type IfNode,
  type LetBindingNode,
  type ObjectLiteralNode,
  type PathNode,
  type PipeNode,
  type Program,
  isPathNode,
} from "../compiler/weft/ast.js";
import {
  ArityError,
  NavigationError,
  type SourceLocation,
  UndefinedFunctionError,
  UndefinedVariableError,
  ValueTypeError,
  WeftError,
  type WeftErrorOptions,
  firstWeftError,
  rootCause,
  suggestName,
} from "../compiler/weft/errors.js";
import { navigate, type PathSegment } from "../udm/navigator.js";
import { NULL, type UDMNode, array, object, scalar, typeName } from "../udm/node.js";
import { createStandardRegistry } from "../stdlib/index.js";
import { Environment, type FrameId } from "./environment.js";
import { evaluateBinary, evaluateUnary } from "./operators.js";
import { type FunctionRegistry, maxArity } from "./registry.js";
import { type TraceEvent, createRunId } from "./trace.js";
import type { Callable, FunctionArgument, FunctionValue, RuntimeValue } from "./values.js";
import { isFunctionValue } from "./values.js";

/**
 * Options for executing a program
 */
export interface ExecuteOptions {
  /** Function registry; defaults to the standard library */
  registry?: FunctionRegistry;
  /** Extra names bound in the root scope */
  variables?: Readonly<Record<string, UDMNode>>;
  /** Trace callback */
  onTrace?: (event: TraceEvent) => void;
}

export interface InterpreterOptions {
  registry?: FunctionRegistry;
  onTrace?: (event: TraceEvent) => void;
  /** Script text, attached to errors for formatting */
  source?: string;
}

const ANONYMOUS = "<lambda>";

/** Name bound to the piped value inside a stage */
export const PIPE_SUBJECT = "$";

// =============================================================================
// INTERPRETER CLASS
// =============================================================================

/**
 * Tree-walking evaluator. One instance owns one environment arena; create a
 * new one per evaluation.
 */
export class Interpreter {
  readonly environment = new Environment();
  private readonly registry: FunctionRegistry;
  private readonly onTrace?: (event: TraceEvent) => void;
  private readonly source?: string;

  constructor(options: InterpreterOptions = {}) {
    this.registry = options.registry ?? createStandardRegistry();
    this.onTrace = options.onTrace;
    this.source = options.source;
  }

  /** Bind a name in the root frame */
  define(name: string, value: RuntimeValue): void {
    this.environment.define(this.environment.root, name, value);
  }

  /** Bind program-level function definitions in the root frame */
  declare(program: Program): void {
    for (const statement of program.statements) {
      switch (statement.kind) {
        case "function_def":
          this.define(statement.name, {
            kind: "function",
            name: statement.name,
            params: statement.params,
            body: statement.body,
            closure: this.environment.root,
          });
          break;
        case "match":
        case "try_catch":
          throw new ValueTypeError(
            `'${statement.kind}' statements are not supported`,
            this.at(statement)
          );
      }
    }
  }

  /**
   * Evaluate an expression in `frame`
   */
  evaluate(expr: ExpressionNode, frame: FrameId = this.environment.root): RuntimeValue {
    switch (expr.kind) {
      case "literal":
        return expr.value === null ? NULL : scalar(expr.value);

      case "identifier": {
        const value = this.environment.lookup(frame, expr.name);
        if (value === undefined) {
          throw new UndefinedVariableError(expr.name, {
            ...this.at(expr),
            hint: suggestName(expr.name, this.environment.visibleNames(frame)),
          });
        }
        return value;
      }

      case "object":
        return this.evaluateObject(expr, frame);

      case "array":
        return array(
          expr.elements.map((element) =>
            this.requireData(this.evaluate(element, frame), element, "an array element")
          )
        );

      case "member":
      case "index":
      case "attribute":
      case "wildcard":
      case "descendant":
        return this.evaluatePath(expr, frame);

      case "call":
        return this.evaluateCall(expr, frame);

      case "lambda":
        return { kind: "function", params: expr.params, body: expr.body, closure: frame };

      case "let":
        return this.evaluateLet(expr, frame);

      case "if":
        return this.evaluateIf(expr, frame);

      case "binary": {
        if (expr.op === "&&" || expr.op === "||") {
          const left = this.requireBoolean(this.evaluate(expr.left, frame), expr.left, expr.op);
          if (expr.op === "&&" ? !left : left) return scalar(left);
          return scalar(this.requireBoolean(this.evaluate(expr.right, frame), expr.right, expr.op));
        }
        const left = this.requireData(this.evaluate(expr.left, frame), expr.left, "an operand");
        const right = this.requireData(this.evaluate(expr.right, frame), expr.right, "an operand");
        return evaluateBinary(expr.op, left, right, this.at(expr));
      }

      case "unary": {
        const operand = this.requireData(
          this.evaluate(expr.operand, frame),
          expr.operand,
          "an operand"
        );
        return evaluateUnary(expr.op, operand, this.at(expr));
      }

      case "pipe":
        return this.evaluatePipe(expr, frame);
    }
  }

  // ===========================================================================
  // LITERALS
  // ===========================================================================

  private evaluateObject(expr: ObjectLiteralNode, frame: FrameId): UDMNode {
    const properties = new Map<string, UDMNode>();
    const attributes = new Map<string, string>();

    for (const property of expr.properties) {
      const value = this.requireData(
        this.evaluate(property.value, frame),
        property.value,
        `property '${property.key}'`
      );

      if (!property.isAttribute) {
        properties.set(property.key, value);
        continue;
      }

      if (value.kind === "null") continue;
      if (value.kind !== "scalar") {
        throw new ValueTypeError(
          `Attribute '@${property.key}' must be a scalar, got ${typeName(value)}`,
          this.at(property)
        );
      }
      attributes.set(property.key, String(value.value));
    }

    return object(properties, { attributes });
  }

  // ===========================================================================
  // BINDINGS AND CONTROL FLOW
  // ===========================================================================

  /** Walks the let chain with a loop; each binding gets its own child frame */
  private evaluateLet(expr: LetBindingNode, frame: FrameId): RuntimeValue {
    let current: ExpressionNode = expr;
    let scope = frame;

    while (current.kind === "let") {
      const value = this.evaluate(current.value, scope);
      scope = this.environment.child(scope, [[current.name, value]]);
      current = current.next;
    }

    return this.evaluate(current, scope);
  }

  private evaluateIf(expr: IfNode, frame: FrameId): RuntimeValue {
    if (this.requireCondition(this.evaluate(expr.condition, frame), expr.condition)) {
      return this.evaluate(expr.then, frame);
    }

    for (const branch of expr.elseIfs) {
      if (this.requireCondition(this.evaluate(branch.condition, frame), branch.condition)) {
        return this.evaluate(branch.then, frame);
      }
    }

    return this.evaluate(expr.else, frame);
  }

  // ===========================================================================
  // PATHS
  // ===========================================================================

  /**
   * Gather a chain of selectors into one navigation. Single-valued paths
   * yield the first match or null; `*`, `..` and predicates yield an array.
   */
  private evaluatePath(expr: PathNode, frame: FrameId): UDMNode {
    const chain: PathNode[] = [];
    let base: ExpressionNode = expr;
    while (isPathNode(base)) {
      chain.push(base);
      base = base.target;
    }
    chain.reverse();

    const root = this.requireData(this.evaluate(base, frame), base, "a navigation target");
    const segments: PathSegment<FunctionValue>[] = [];
    let multiValued = false;

    for (const node of chain) {
      switch (node.kind) {
        case "member":
          segments.push({ kind: "property", name: node.property });
          break;

        case "attribute":
          segments.push({ kind: "attribute", name: node.name });
          break;

        case "wildcard":
          segments.push({ kind: "wildcard" });
          multiValued = true;
          break;

        case "descendant":
          segments.push({ kind: "recursive" });
          if (node.selector.kind === "wildcard") {
            segments.push({ kind: "wildcard" });
          } else {
            segments.push(node.selector);
          }
          multiValued = true;
          break;

        case "index": {
          const selector = this.evaluate(node.index, frame);
          if (isFunctionValue(selector)) {
            segments.push({ kind: "predicate", predicate: selector });
            multiValued = true;
          } else if (selector.kind === "scalar" && typeof selector.value === "number") {
            segments.push({ kind: "index", index: selector.value });
          } else if (selector.kind === "scalar" && typeof selector.value === "string") {
            segments.push({ kind: "property", name: selector.value });
          } else {
            throw new ValueTypeError(
              `Index must be a number, string or predicate, got ${typeName(selector)}`,
              this.at(node.index)
            );
          }
          break;
        }
      }
    }

    const matches = navigate(root, segments, {
      evaluatePredicate: (predicate, candidate) =>
        this.testPredicate(predicate, candidate, expr),
    });

    if (multiValued) return array(matches);
    return matches[0] ?? NULL;
  }

  private testPredicate(predicate: FunctionValue, candidate: UDMNode, site: ExpressionNode): boolean {
    const result = this.applyFunction(predicate, [candidate], site, ANONYMOUS);
    if (result.kind !== "scalar" || typeof result.value !== "boolean") {
      throw new NavigationError(
        `Predicate must return a boolean, got ${isFunctionValue(result) ? "function" : typeName(result)}`,
        this.at(site)
      );
    }
    return result.value;
  }

  // ===========================================================================
  // CALLS
  // ===========================================================================

  private evaluateCall(expr: CallExprNode, frame: FrameId, piped?: RuntimeValue): RuntimeValue {
    const args: RuntimeValue[] = piped === undefined ? [] : [piped];
    for (const arg of expr.args) {
      args.push(this.evaluate(arg, frame));
    }

    if (expr.callee.kind === "identifier") {
      return this.callNamed(expr.callee.name, args, expr, frame);
    }

    const callee = this.evaluate(expr.callee, frame);
    if (!isFunctionValue(callee)) {
      throw new ValueTypeError(`Cannot call a value of type ${typeName(callee)}`, this.at(expr));
    }
    return this.applyFunction(callee, args, expr, ANONYMOUS);
  }

  /**
   * A name bound to a function in scope is applied directly; anything else is
   * looked up in the registry.
   */
  private callNamed(
    name: string,
    args: RuntimeValue[],
    site: ExpressionNode,
    frame: FrameId
  ): RuntimeValue {
    const bound = this.environment.lookup(frame, name);
    if (bound !== undefined && isFunctionValue(bound)) {
      return this.applyFunction(bound, args, site, name);
    }

    const descriptor = this.registry.lookup(name);
    if (!descriptor) {
      const candidates = [...this.registry.names(), ...this.functionNames(frame)];
      throw new UndefinedFunctionError(name, {
        ...this.at(site),
        hint: suggestName(name, candidates),
      });
    }

    const max = maxArity(descriptor);
    if (args.length < descriptor.minArgs || args.length > max) {
      throw new ArityError(name, descriptor.minArgs, args.length, {
        ...this.at(site),
        atMost: max,
      });
    }

    this.trace({
      type: "function_called",
      name,
      origin: "registry",
      argCount: args.length,
      line: site.location.line,
      column: site.location.column,
    });

    const callArgs = args.map((arg) => this.toArgument(arg, site));
    try {
      return descriptor.call(callArgs, { name, location: site.location });
    } catch (error) {
      throw this.registryFailure(name, error, site);
    }
  }

  /** Apply a closure in a child frame of the frame it captured */
  private applyFunction(
    fn: FunctionValue,
    args: readonly RuntimeValue[],
    site: ExpressionNode,
    name: string
  ): RuntimeValue {
    if (args.length !== fn.params.length) {
      throw new ArityError(fn.name ?? name, fn.params.length, args.length, this.at(site));
    }

    this.trace({
      type: "function_called",
      name: fn.name ?? name,
      origin: "closure",
      argCount: args.length,
      line: site.location.line,
      column: site.location.column,
    });

    const frame = this.environment.child(
      fn.closure,
      fn.params.map((param, i): [string, RuntimeValue] => [param, args[i] ?? NULL])
    );
    return this.evaluate(fn.body, frame);
  }

  /** Wrap closures for registry functions; data passes through */
  private toArgument(value: RuntimeValue, site: ExpressionNode): FunctionArgument {
    if (!isFunctionValue(value)) return value;

    const callable: Callable = {
      kind: "callable",
      arity: value.params.length,
      invoke: (args) =>
        this.requireData(this.applyFunction(value, args, site, ANONYMOUS), site, "a function result"),
    };
    return callable;
  }

  /**
   * Registry functions may wrap failures. The first Weft error in the cause
   * chain keeps its kind; a chain of foreign errors becomes a type error at
   * the call, reporting its innermost message.
   */
  private registryFailure(name: string, error: unknown, site: ExpressionNode): WeftError {
    const weftError = firstWeftError(error);
    if (weftError) {
      return weftError.locate(site.location, this.source);
    }
    const cause = rootCause(error);
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ValueTypeError(`${name}(): ${message}`, { ...this.at(site), cause: error });
  }

  private functionNames(frame: FrameId): string[] {
    return [...this.environment.visibleNames(frame)].filter((name) => {
      const value = this.environment.lookup(frame, name);
      return value !== undefined && isFunctionValue(value);
    });
  }

  // ===========================================================================
  // PIPES
  // ===========================================================================

  /** `a |> b |> c` nests as `a |> (b |> c)`; stages run left to right */
  private evaluatePipe(expr: PipeNode, frame: FrameId): RuntimeValue {
    const stages: ExpressionNode[] = [];
    let target: ExpressionNode = expr.target;
    while (target.kind === "pipe") {
      stages.push(target.source);
      target = target.target;
    }
    stages.push(target);

    let value = this.evaluate(expr.source, frame);
    for (const [index, stage] of stages.entries()) {
      this.trace({
        type: "pipe_stage",
        stage: index + 1,
        line: stage.location.line,
        column: stage.location.column,
      });
      value = this.applyStage(stage, value, frame);
    }
    return value;
  }

  /**
   * Calls take the value as their first argument, function names and lambdas
   * are applied to it, and any other stage is evaluated with the value bound
   * to `$`.
   */
  private applyStage(stage: ExpressionNode, value: RuntimeValue, frame: FrameId): RuntimeValue {
    const stageFrame = this.environment.child(frame, [[PIPE_SUBJECT, value]]);

    switch (stage.kind) {
      case "call":
        return this.evaluateCall(stage, stageFrame, value);

      case "identifier": {
        const bound = this.environment.lookup(frame, stage.name);
        if (stage.name !== PIPE_SUBJECT && (bound === undefined || isFunctionValue(bound))) {
          return this.callNamed(stage.name, [value], stage, frame);
        }
        return this.evaluate(stage, stageFrame);
      }

      case "lambda": {
        const fn = this.evaluate(stage, stageFrame);
        if (!isFunctionValue(fn)) {
          throw new ValueTypeError("Pipe stage did not produce a function", this.at(stage));
        }
        return this.applyFunction(fn, [value], stage, ANONYMOUS);
      }

      default:
        return this.evaluate(stage, stageFrame);
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /** Error options pointing at `node` */
  private at(node: { location: SourceLocation }): WeftErrorOptions {
    return { location: node.location, source: this.source };
  }

  private trace(event: TraceEvent): void {
    this.onTrace?.(event);
  }

  /** Reject closures where data is required */
  requireData(value: RuntimeValue, node: { location: SourceLocation }, what: string): UDMNode {
    if (isFunctionValue(value)) {
      throw new ValueTypeError(`Functions cannot be used as ${what}`, this.at(node));
    }
    return value;
  }

  private requireBoolean(value: RuntimeValue, node: ExpressionNode, op: string): boolean {
    if (isFunctionValue(value) || value.kind !== "scalar" || typeof value.value !== "boolean") {
      const actual = isFunctionValue(value) ? "function" : typeName(value);
      throw new ValueTypeError(`Operator '${op}' expects booleans, got ${actual}`, this.at(node));
    }
    return value.value;
  }

  private requireCondition(value: RuntimeValue, node: ExpressionNode): boolean {
    if (isFunctionValue(value) || value.kind !== "scalar" || typeof value.value !== "boolean") {
      const actual = isFunctionValue(value) ? "function" : typeName(value);
      throw new ValueTypeError(`Condition must be a boolean, got ${actual}`, this.at(node));
    }
    return value.value;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Execute a program against an input document
 */
export function execute(program: Program, input: UDMNode, options: ExecuteOptions = {}): UDMNode {
  const runId = createRunId();
  const startTime = Date.now();
  const onTrace = options.onTrace;
  const interpreter = new Interpreter({
    registry: options.registry,
    onTrace,
    source: program.source,
  });

  onTrace?.({ type: "run_started", runId });

  try {
    for (const [name, value] of Object.entries(options.variables ?? {})) {
      interpreter.define(name, value);
    }
    interpreter.define("input", input);
    interpreter.declare(program);

    const result = interpreter.requireData(
      interpreter.evaluate(program.body),
      program.body,
      "the result of a script"
    );

    onTrace?.({ type: "run_completed", runId, durationMs: Date.now() - startTime });
    return result;
  } catch (e) {
    const error =
      e instanceof WeftError
        ? e
        : new ValueTypeError(`Evaluation failed: ${e instanceof Error ? e.message : String(e)}`, {
            cause: e,
            source: program.source,
          });
    onTrace?.({
      type: "run_failed",
      runId,
      code: error.code,
      error: error.message,
      line: error.location?.line,
      column: error.location?.column,
    });
    throw error;
  }
}

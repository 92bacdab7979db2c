/**
 * Interpreter tests
 */

import { describe, expect, test } from "vitest";
import type { MatchNode } from "../compiler/weft/ast.js";
import {
  ArityError,
  NavigationError,
  UndefinedFunctionError,
  UndefinedVariableError,
  ValueTypeError,
  WeftError,
} from "../compiler/weft/errors.js";
import { parseScript } from "../compiler/weft/parser.js";
import { createStandardRegistry } from "../stdlib/index.js";
import { transform } from "../transform.js";
import { type JSValue, NULL, fromJS, number, string, toJS } from "../udm/node.js";
import { type ExecuteOptions, execute } from "./interpreter.js";
import type { TraceEvent } from "./trace.js";

const AT = { attributePrefix: "@" };

function run(source: string, input: unknown = null, options: ExecuteOptions = {}): JSValue {
  return toJS(transform(source, fromJS(input, AT), options), AT);
}

function failure(source: string, input: unknown = null, options: ExecuteOptions = {}): WeftError {
  try {
    run(source, input, options);
  } catch (error) {
    if (error instanceof WeftError) return error;
    throw error;
  }
  throw new Error(`Expected evaluation to fail: ${source}`);
}

describe("Interpreter", () => {
  describe("literals and operators", () => {
    test("object and array literals", () => {
      expect(run('{ a: 1, b: [true, null, "x"], c: {} }')).toEqual({
        a: 1,
        b: [true, null, "x"],
        c: {},
      });
    });

    test("arithmetic and precedence", () => {
      expect(run("1 + 2 * 3 - 4 / 2")).toBe(5);
      expect(run("7 % 3")).toBe(1);
      expect(run("-(2 + 3)")).toBe(-5);
    });

    test("string concatenation with +", () => {
      expect(run('"a" + 1')).toBe("a1");
      expect(run('1 + "a"')).toBe("1a");
      expect(run('"n=" + true')).toBe("n=true");
    });

    test("array concatenation with +", () => {
      expect(run("[1] + [2, 3]")).toEqual([1, 2, 3]);
    });

    test("mismatched operands", () => {
      const error = failure("1 + null");
      expect(error).toBeInstanceOf(ValueTypeError);
      expect(error.message).toBe("Operator '+' cannot be applied to number and null");
      expect(failure('1 < "b"').code).toBe("TYPE_ERROR");
    });

    test("division and modulo by zero", () => {
      expect(failure("1 / 0").message).toBe("Division by zero");
      expect(failure("7 % 0").message).toBe("Modulo by zero");
    });

    test("overflowing arithmetic is rejected", () => {
      expect(failure("1e308 * 10").message).toBe("Result of '*' is not a finite number");
      expect(failure("1e308 + 1e308").code).toBe("TYPE_ERROR");
      expect(failure("-1e308 - 1e308").message).toBe("Result of '-' is not a finite number");
    });

    test("comparison", () => {
      expect(run('"a" < "b"')).toBe(true);
      expect(run("2 >= 2")).toBe(true);
    });

    test("structural equality", () => {
      expect(run("{ a: [1], b: 2 } == { b: 2, a: [1] }")).toBe(true);
      expect(run('1 == "1"')).toBe(false);
      expect(run("null == null")).toBe(true);
      expect(run("[1, 2] != [2, 1]")).toBe(true);
    });

    test("logical operators short-circuit", () => {
      expect(run("false && nope()")).toBe(false);
      expect(run("true || nope()")).toBe(true);
    });

    test("logical operators require booleans", () => {
      expect(failure("true && 1").message).toBe("Operator '&&' expects booleans, got number");
      expect(failure("!1").message).toBe("Operator '!' expects a boolean, got number");
    });
  });

  describe("attributes", () => {
    test("attribute properties become metadata", () => {
      const result = transform('{ @id: 7, name: "x", @skip: null }', NULL);
      expect(result.kind).toBe("object");
      if (result.kind !== "object") return;
      expect(result.metadata.attributes.get("id")).toBe("7");
      expect(result.metadata.attributes.has("skip")).toBe(false);
      expect([...result.properties.keys()]).toEqual(["name"]);
    });

    test("container attribute values are rejected", () => {
      expect(failure("{ @bad: [1] }").message).toBe("Attribute '@bad' must be a scalar, got array");
    });

    test("reading attributes", () => {
      const input = { "@id": "a1", v: 1 };
      expect(run("input.@id", input)).toBe("a1");
      expect(run("input@id", input)).toBe("a1");
      expect(run("input.@missing", input)).toBeNull();
    });
  });

  describe("let bindings", () => {
    test("let chain", () => {
      expect(run("let x = 1, let y = x + 1, x + y")).toBe(3);
    });

    test("shadowing", () => {
      expect(run("let x = 1, let x = x + 1, x")).toBe(2);
    });

    test("bindings are scoped to their body", () => {
      const error = failure("(let y = 1, y) + y");
      expect(error).toBeInstanceOf(UndefinedVariableError);
      expect(error.message).toBe("Undefined variable: y");
      expect(error.location).toEqual({ line: 1, column: 18, offset: 17 });
    });

    test("undefined variables suggest a close name", () => {
      expect(failure("let total = 1, totl").message).toBe(
        "Undefined variable: totl. Did you mean 'total'?"
      );
    });

    test("long let chains", () => {
      const bindings = Array.from({ length: 500 }, (_, i) =>
        i === 0 ? "let x0 = 0" : `let x${i} = x${i - 1} + 1`
      );
      expect(run(`${bindings.join(",\n")},\nx499`)).toBe(499);
    });
  });

  describe("conditionals", () => {
    const source = 'if (input.n > 10) "big" else if (input.n > 5) "mid" else "small"';

    test("branches", () => {
      expect(run(source, { n: 20 })).toBe("big");
      expect(run(source, { n: 7 })).toBe("mid");
      expect(run(source, { n: 1 })).toBe("small");
    });

    test("conditions must be booleans", () => {
      expect(failure("if (1) 2 else 3").message).toBe("Condition must be a boolean, got number");
    });
  });

  describe("navigation", () => {
    const input = { a: { b: 1 }, xs: [1, 2, 3] };

    test("missing paths are null", () => {
      expect(run("input.a.b", input)).toBe(1);
      expect(run("input.a.c", input)).toBeNull();
      expect(run("input.a.b.c", input)).toBeNull();
      expect(run("input.x[0]", input)).toBeNull();
      expect(run("input.a[0]", input)).toBeNull();
      expect(run("input.a.b", null)).toBeNull();
    });

    test("indexes", () => {
      expect(run("input.xs[-1]", input)).toBe(3);
      expect(run("input.xs[0.5]", input)).toBeNull();
      expect(run('input["a"].b', input)).toBe(1);
    });

    test("index of the wrong type", () => {
      expect(failure("input.xs[true]", input).message).toBe(
        "Index must be a number, string or predicate, got boolean"
      );
    });

    test("wildcards yield arrays", () => {
      expect(run("input.a.*", { a: { x: 1, y: 2 } })).toEqual([1, 2]);
      expect(run("input.xs[*]", input)).toEqual([1, 2, 3]);
      expect(run("input.none.*", input)).toEqual([]);
    });

    test("recursive descent in document order", () => {
      const doc = { a: { name: "x", b: { name: "y" } }, name: "z" };
      expect(run("input..name", doc)).toEqual(["z", "x", "y"]);
    });

    test("recursive attribute descent", () => {
      const doc = { a: { "@id": "1", b: { "@id": "2" } } };
      expect(run("input..@id", doc)).toEqual(["1", "2"]);
    });

    test("predicates", () => {
      const doc = { xs: [{ n: 1 }, { n: 5 }, { n: 3 }] };
      expect(run("input.xs[x => x.n > 2]", doc)).toEqual([{ n: 5 }, { n: 3 }]);
      expect(run("input.xs[x => x.n > 2].n", doc)).toEqual([5, 3]);
    });

    test("predicates must return booleans", () => {
      const error = failure("input.xs[x => x.n]", { xs: [{ n: 1 }] });
      expect(error).toBeInstanceOf(NavigationError);
      expect(error.message).toBe("Predicate must return a boolean, got number");
    });

    test("errors inside predicates are navigation errors", () => {
      const error = failure('input.xs[x => x.n + "a" * 2]', { xs: [{ n: 1 }] });
      expect(error).toBeInstanceOf(NavigationError);
      expect(error.message).toBe(
        "Predicate failed: Operator '*' cannot be applied to string and number"
      );
    });

    test("predicate errors keep their kind inside registry callbacks", () => {
      const error = failure('map(input.rows, r => r[x => x.n + "a" * 2])', { rows: [{ n: 1 }] });
      expect(error).toBeInstanceOf(NavigationError);
      expect(error.code).toBe("NAVIGATION_ERROR");
      expect(error.message).toBe(
        "Predicate failed: Operator '*' cannot be applied to string and number"
      );
    });
  });

  describe("functions", () => {
    test("lambdas capture their defining scope", () => {
      expect(run("let k = 10, map([1, 2], x => x + k)")).toEqual([11, 12]);
      expect(run("let k = 1, let f = x => x + k, let k = 100, f(1)")).toBe(2);
    });

    test("immediately applied lambda", () => {
      expect(run("(x => x + 1)(2)")).toBe(3);
    });

    test("function definitions", () => {
      expect(run("function double(x) { x * 2 }\ndouble(21)")).toBe(42);
      expect(run("function total() { sum(input.xs) }\ntotal()", { xs: [1, 2] })).toBe(3);
    });

    test("recursion", () => {
      expect(run("function fact(n) { if (n <= 1) 1 else n * fact(n - 1) }\nfact(5)")).toBe(120);
    });

    test("a bound function shadows the registry, bound data does not", () => {
      expect(run('let upper = s => "custom", upper("a")')).toBe("custom");
      expect(run('let upper = 1, upper("a")')).toBe("A");
    });

    test("calling a non-function", () => {
      expect(failure("input.a(1)", { a: 1 }).message).toBe("Cannot call a value of type number");
    });

    test("functions are not data", () => {
      expect(failure("{ f: x => x }").message).toBe("Functions cannot be used as property 'f'");
      expect(failure("x => x").message).toBe("Functions cannot be used as the result of a script");
    });

    test("undefined functions", () => {
      const error = failure("nope(1)");
      expect(error).toBeInstanceOf(UndefinedFunctionError);
      expect(error.message).toBe("Undefined function: nope");
      expect(failure('uper("a")').message).toBe("Undefined function: uper. Did you mean 'upper'?");
    });

    test("arity of closures", () => {
      const error = failure("function f(a, b) { a + b }\nf(1)");
      expect(error).toBeInstanceOf(ArityError);
      expect(error.message).toBe("f expects 2 arguments, got 1");
      expect(failure("let g = (a, b) => a, g(1)").message).toBe("g expects 2 arguments, got 1");
    });

    test("arity of registry functions", () => {
      expect(failure("upper()").message).toBe("upper expects 1 argument, got 0");
      expect(failure('substring("abc")').message).toBe("substring expects 2 to 3 arguments, got 1");
      expect(failure("concat()").message).toBe("concat expects at least 1 argument, got 0");
    });

    test("runaway recursion fails as an evaluation error", () => {
      const error = failure("function f(n) { f(n + 1) }\nf(0)");
      expect(error.code).toBe("TYPE_ERROR");
      expect(error.message.startsWith("Evaluation failed: ")).toBe(true);
    });
  });

  describe("pipes", () => {
    test("call stages get the value as first argument", () => {
      expect(run("5 |> add(1) |> mul(2)")).toBe(12);
      expect(run('[3, 1, 2] |> sortBy() |> join("-")')).toBe("1-2-3");
    });

    test("name and lambda stages", () => {
      expect(run('"abc" |> upper')).toBe("ABC");
      expect(run("3 |> x => x * x")).toBe(9);
    });

    test("other stages see the value as $", () => {
      expect(run("5 |> $ + 1")).toBe(6);
      expect(run("5 |> { v: 1 }")).toEqual({ v: 1 });
      expect(run("input |> { total: $.a + 1 }", { a: 4 })).toEqual({ total: 5 });
      expect(run("2 |> $ * 10 |> [$, $ + 1]")).toEqual([20, 21]);
      expect(run("1 |> 2")).toBe(2);
    });

    test("call arguments can read $", () => {
      expect(run("4 |> add($)")).toBe(8);
      expect(run("input.xs |> map(x => x + count($))", { xs: [1, 2] })).toEqual([3, 4]);
    });

    test("$ is only bound inside a stage", () => {
      const error = failure("let a = 5 |> $ + 1, $");
      expect(error).toBeInstanceOf(UndefinedVariableError);
      if (error instanceof UndefinedVariableError) expect(error.variable).toBe("$");
    });
  });

  describe("registry", () => {
    test("custom functions", () => {
      const registry = createStandardRegistry().extend([
        {
          name: "double",
          minArgs: 1,
          signature: "double(n)",
          description: "Twice n",
          call: (args) => {
            const [n] = args;
            return n?.kind === "scalar" && typeof n.value === "number" ? number(n.value * 2) : NULL;
          },
        },
      ]);
      expect(run("double(21)", null, { registry })).toBe(42);
    });

    test("plain errors from registry functions become type errors at the call", () => {
      const registry = createStandardRegistry().extend([
        {
          name: "boom",
          minArgs: 0,
          signature: "boom()",
          description: "Fails",
          call: () => {
            throw new Error("outer", { cause: new Error("disk full") });
          },
        },
      ]);
      const error = failure("boom()", null, { registry });
      expect(error).toBeInstanceOf(ValueTypeError);
      expect(error.message).toBe("boom(): disk full");
      expect(error.location).toEqual({ line: 1, column: 1, offset: 0 });
    });

    test("wrapped weft errors keep their kind and get the call location", () => {
      const registry = createStandardRegistry().extend([
        {
          name: "probe",
          minArgs: 0,
          signature: "probe()",
          description: "Fails",
          call: () => {
            throw new Error("wrapper", { cause: new UndefinedVariableError("z") });
          },
        },
      ]);
      const error = failure("1 +\n  probe()", null, { registry });
      expect(error).toBeInstanceOf(UndefinedVariableError);
      expect(error.location).toEqual({ line: 2, column: 3, offset: 6 });
    });

    test("standard library errors point at the call", () => {
      const error = failure("reduce([], (a, x) => a)");
      expect(error.message).toBe("reduce() of an empty array needs an initial value");
      expect(error.location?.column).toBe(1);
    });
  });

  describe("execute", () => {
    test("variables are bound in the root scope", () => {
      const variables = { greeting: string("hi "), name: string("Ada") };
      expect(run("greeting + name", null, { variables })).toBe("hi Ada");
    });

    test("input wins over a variable of the same name", () => {
      expect(run("input", 1, { variables: { input: string("x") } })).toBe(1);
    });

    test("unsupported statements", () => {
      const program = parseScript("1");
      const statement: MatchNode = {
        kind: "match",
        subject: program.body,
        cases: [],
        location: program.location,
      };
      expect(() => execute({ ...program, statements: [statement] }, NULL)).toThrow(
        "'match' statements are not supported"
      );
    });

    test("trace events for a pipe", () => {
      const events: TraceEvent[] = [];
      run("5 |> add(1)", null, { onTrace: (event) => events.push(event) });

      expect(events.map((e) => e.type)).toEqual([
        "run_started",
        "pipe_stage",
        "function_called",
        "run_completed",
      ]);
      expect(events[1]).toEqual({ type: "pipe_stage", stage: 1, line: 1, column: 6 });
      expect(events[2]).toEqual({
        type: "function_called",
        name: "add",
        origin: "registry",
        argCount: 2,
        line: 1,
        column: 6,
      });
    });

    test("closures invoked by registry functions are traced", () => {
      const events: TraceEvent[] = [];
      run("map([1], x => x)", null, { onTrace: (event) => events.push(event) });
      const calls = events.flatMap((e) => (e.type === "function_called" ? [e] : []));
      expect(calls.map((c) => [c.name, c.origin, c.argCount])).toEqual([
        ["map", "registry", 2],
        ["<lambda>", "closure", 1],
      ]);
    });

    test("failed runs emit run_failed", () => {
      const events: TraceEvent[] = [];
      failure("nope()", null, { onTrace: (event) => events.push(event) });
      const last = events[events.length - 1];
      expect(last).toMatchObject({
        type: "run_failed",
        code: "UNDEFINED_FUNCTION",
        error: "Undefined function: nope",
        line: 1,
        column: 1,
      });
    });
  });
});

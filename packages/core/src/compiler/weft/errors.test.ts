/**
 * Error class tests
 */

import { describe, expect, test } from "vitest";
import {
  ArityError,
  FormatError,
  NavigationError,
  ParseError,
  UndefinedFunctionError,
  UndefinedVariableError,
  ValueTypeError,
  WeftError,
  firstWeftError,
  formatErrors,
  loc,
  rootCause,
  suggestName,
} from "./errors.js";

describe("WeftError", () => {
  test("format() points at the offending column", () => {
    const error = new UndefinedVariableError("y", {
      location: loc(2, 3, 13),
      source: "let x = 1,\n  y",
    });

    expect(error.format()).toBe(
      [
        "Error [UNDEFINED_VARIABLE] at line 2, column 3:",
        "  Undefined variable: y",
        "",
        "  2 |   y",
        "        ^",
      ].join("\n")
    );
  });

  test("format() without a location", () => {
    expect(new ValueTypeError("boom").format()).toBe("Error [TYPE_ERROR]:\n  boom");
  });

  test("formatErrors joins with a blank line", () => {
    const errors = [new ValueTypeError("a"), new ValueTypeError("b")];
    expect(formatErrors(errors)).toBe("Error [TYPE_ERROR]:\n  a\n\nError [TYPE_ERROR]:\n  b");
  });

  test("locate() only fills in a missing location", () => {
    const error = new ValueTypeError("x");
    error.locate(loc(1, 5, 4), "src");
    expect(error.location).toEqual({ line: 1, column: 5, offset: 4 });
    expect(error.source).toBe("src");

    error.locate(loc(9, 9, 9), "other");
    expect(error.location).toEqual({ line: 1, column: 5, offset: 4 });
    expect(error.source).toBe("src");
  });

  test("subclasses carry their codes", () => {
    expect(new ParseError("p", { expected: [], found: "x" }).code).toBe("PARSE_ERROR");
    expect(new UndefinedFunctionError("f").code).toBe("UNDEFINED_FUNCTION");
    expect(new FormatError("f").code).toBe("FORMAT_ERROR");
    expect(new FormatError("f", { code: "UNSUPPORTED_FORMAT" }).code).toBe("UNSUPPORTED_FORMAT");
    expect(new FormatError("f")).toBeInstanceOf(WeftError);
  });

  test("hints are appended to the message", () => {
    expect(new UndefinedFunctionError("uper", { hint: "upper" }).message).toBe(
      "Undefined function: uper. Did you mean 'upper'?"
    );
  });
});

describe("ArityError", () => {
  test("exact arity", () => {
    expect(new ArityError("f", 2, 1).message).toBe("f expects 2 arguments, got 1");
    expect(new ArityError("g", 1, 0).message).toBe("g expects 1 argument, got 0");
  });

  test("ranges", () => {
    expect(new ArityError("h", 2, 4, { atMost: 3 }).message).toBe(
      "h expects 2 to 3 arguments, got 4"
    );
    expect(new ArityError("v", 1, 0, { atMost: Number.POSITIVE_INFINITY }).message).toBe(
      "v expects at least 1 argument, got 0"
    );
  });
});

describe("helpers", () => {
  test("rootCause follows the cause chain", () => {
    const inner = new ValueTypeError("inner");
    const outer = new Error("outer", { cause: new Error("middle", { cause: inner }) });
    expect(rootCause(outer)).toBe(inner);
    expect(rootCause("plain")).toBe("plain");
  });

  test("firstWeftError stops at the outermost weft error", () => {
    const inner = new ValueTypeError("inner");
    const navigation = new NavigationError("Predicate failed: inner", { cause: inner });
    expect(firstWeftError(new Error("wrapper", { cause: navigation }))).toBe(navigation);
    expect(firstWeftError(new Error("plain", { cause: new Error("deeper") }))).toBeUndefined();
    expect(firstWeftError("text")).toBeUndefined();
  });

  test("suggestName picks the closest name within two edits", () => {
    expect(suggestName("uper", ["lower", "upper", "trim"])).toBe("upper");
    expect(suggestName("INPT", ["input"])).toBe("input");
    expect(suggestName("zzz", ["input", "map"])).toBeUndefined();
  });
});

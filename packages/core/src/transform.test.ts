/**
 * End-to-end tests: script text and input text to output text
 */

import { describe, expect, test } from "vitest";
import { FormatError } from "./compiler/weft/errors.js";
import { parseScript } from "./compiler/weft/parser.js";
import { runScript, transform } from "./transform.js";
import { fromJS, toJS } from "./udm/node.js";

const ORDER_SCRIPT = `%weft 1.0
input json
output json
---
let items = input.order.items,
{
  @id: input.order.@id,
  total: sum(map(items, i => i.qty * i.price)),
  skus: items.*.sku |> join(";")
}`;

const ORDER_INPUT = JSON.stringify({
  order: {
    "@id": "o-7",
    items: [
      { sku: "a", qty: 2, price: 3 },
      { sku: "b", qty: 1, price: 10 },
    ],
  },
});

describe("runScript", () => {
  test("reads input, runs the script and writes output", () => {
    const result = runScript(ORDER_SCRIPT, ORDER_INPUT);
    expect(result.output).toBe('{"@id":"o-7","total":16,"skus":"a;b"}');
    expect(result.inputFormat).toBe("json");
    expect(result.outputFormat).toBe("json");
  });

  test("pretty override", () => {
    const result = runScript("%weft 1.0\n---\n{ n: input.n }", '{"n":1}', { pretty: true });
    expect(result.output).toBe('{\n  "n": 1\n}');
  });

  test("header output options", () => {
    const script = "%weft 1.0\noutput json { pretty: true, indent: 3 }\n---\n{ n: 1 }";
    expect(runScript(script, "null").output).toBe('{\n   "n": 1\n}');
    expect(runScript(script, "null", { pretty: false }).output).toBe('{"n":1}');
  });

  test("auto output follows the input format", () => {
    const result = runScript("%weft 1.0\ninput auto\noutput auto\n---\ninput", "[1, 2]");
    expect(result.inputFormat).toBe("json");
    expect(result.outputFormat).toBe("json");
    expect(result.output).toBe("[1,2]");
  });

  test("accepts a compiled program", () => {
    const program = parseScript("input.a + 1");
    expect(runScript(program, '{"a":1}').output).toBe("2");
    expect(runScript(program, '{"a":41}').output).toBe("42");
  });

  test("unsupported formats fail before evaluation", () => {
    expect(() => runScript("%weft 1.0\ninput xml\n---\ninput", "<a/>")).toThrow(FormatError);
    expect(() => runScript("input", "[]", { outputFormat: "yaml" })).toThrow(
      "Format 'yaml' is not supported by this build"
    );
  });

  test("invalid input text", () => {
    expect(() => runScript("input", "{")).toThrow(FormatError);
  });
});

describe("transform", () => {
  test("evaluates against an input tree", () => {
    const result = transform("input.xs |> filter(x => x > 1)", fromJS({ xs: [1, 2, 3] }));
    expect(toJS(result)).toEqual([2, 3]);
  });
});

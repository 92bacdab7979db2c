/**
 * Example scaffold tests
 */

import { runScript } from "@weft/core";
import { describe, expect, test } from "vitest";
import { EXAMPLE_INPUT, EXAMPLE_SCRIPT } from "./init.js";

describe("init example", () => {
  test("the example script runs against the example input", () => {
    const { output } = runScript(EXAMPLE_SCRIPT, EXAMPLE_INPUT);
    expect(output).toBe(
      [
        "{",
        '  "@id": "ord-1",',
        '  "customer": "ADA",',
        '  "lineCount": 2,',
        '  "total": 40,',
        '  "expensive": [',
        '    "lamp"',
        "  ]",
        "}",
      ].join("\n")
    );
  });
});

/**
 * Init Command
 * Scaffolds an example script and input document
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { pathExists } from "./io-helpers.js";

interface InitOptions {
  force?: boolean;
}

export const EXAMPLE_SCRIPT = `%weft 1.0
input json
output json { pretty: true }
---
// Summarise an order: totals per line, then the order total
function lineTotal(line) { line.price * line.quantity }

let lines = input.order.lines,
let totals = lines |> map(line => lineTotal(line)),
{
  @id: input.order.@id,
  customer: upper(input.order.customer.name),
  lineCount: count(lines),
  total: sum(totals),
  expensive: lines[l => l.price > 20] |> map(l => l.sku)
}
`;

export const EXAMPLE_INPUT = `{
  "order": {
    "@id": "ord-1",
    "customer": { "name": "Ada" },
    "lines": [
      { "sku": "pen", "price": 2.5, "quantity": 4 },
      { "sku": "lamp", "price": 30, "quantity": 1 }
    ]
  }
}
`;

export async function initCommand(dir: string | undefined, options: InitOptions): Promise<void> {
  const baseDir = dir ?? "weft";
  const spinner = ora(`Initializing ${baseDir}...`).start();

  try {
    const scriptPath = join(baseDir, "example.weft");
    const inputPath = join(baseDir, "example.json");

    if ((await pathExists(scriptPath)) && !options.force) {
      spinner.fail(chalk.red(`${scriptPath} already exists. Use --force to overwrite.`));
      process.exit(1);
    }

    await mkdir(baseDir, { recursive: true });
    await writeFile(scriptPath, EXAMPLE_SCRIPT);
    await writeFile(inputPath, EXAMPLE_INPUT);

    spinner.succeed(chalk.green("Example created"));

    console.log();
    console.log(chalk.dim("Created:"));
    console.log(chalk.dim(`  ${scriptPath}`));
    console.log(chalk.dim(`  ${inputPath}`));
    console.log();
    console.log(chalk.cyan("Next steps:"));
    console.log(chalk.white(`  1. Run: weft validate ${scriptPath}`));
    console.log(chalk.white(`  2. Run: weft transform ${scriptPath} ${inputPath}`));
  } catch (error) {
    spinner.fail(
      chalk.red(`Failed to initialize: ${error instanceof Error ? error.message : String(error)}`)
    );
    process.exit(1);
  }
}

/**
 * Functions Command
 * Lists the standard function library
 */

import { createStandardRegistry, maxArity } from "@weft/core";
import chalk from "chalk";

interface FunctionsOptions {
  json?: boolean;
}

export async function functionsCommand(options: FunctionsOptions): Promise<void> {
  const functions = createStandardRegistry().list();

  if (options.json) {
    console.log(
      JSON.stringify(
        functions.map((fn) => {
          const max = maxArity(fn);
          return {
            name: fn.name,
            signature: fn.signature,
            description: fn.description,
            minArgs: fn.minArgs,
            maxArgs: Number.isFinite(max) ? max : null,
          };
        }),
        null,
        2
      )
    );
    return;
  }

  console.log(chalk.bold(`Standard functions (${functions.length}):`));
  console.log();

  const width = Math.max(...functions.map((fn) => fn.signature.length));
  for (const fn of functions) {
    console.log(`  ${chalk.cyan(fn.signature.padEnd(width))}  ${chalk.dim(fn.description)}`);
  }
}

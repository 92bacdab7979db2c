/**
 * Parse Command
 * Prints the syntax tree of a .weft script as JSON
 */

import { writeFile } from "node:fs/promises";
import { compileFile } from "@weft/core";
import chalk from "chalk";
import ora from "ora";

interface ParseOptions {
  output?: string;
  pretty?: boolean;
}

export async function parseCommand(scriptPath: string, options: ParseOptions): Promise<void> {
  const spinner = ora(`Parsing ${scriptPath}...`).start();

  try {
    const result = await compileFile(scriptPath);

    if (!result.success || !result.program) {
      spinner.fail(chalk.red("Parse failed"));
      for (const error of result.errors) {
        const position = error.line !== undefined ? ` (${error.line}:${error.column ?? 1})` : "";
        console.error(chalk.red(`  Error [${error.code}]${position}: ${error.message}`));
      }
      process.exit(1);
    }

    spinner.succeed(chalk.green("Parse successful"));

    const { source: _source, ...ast } = result.program;
    const json = options.pretty ? JSON.stringify(ast, null, 2) : JSON.stringify(ast);

    if (options.output) {
      await writeFile(options.output, `${json}\n`);
      console.error(chalk.dim(`AST written to ${options.output}`));
    } else {
      console.log(json);
    }
  } catch (error) {
    spinner.fail(
      chalk.red(`Failed to parse: ${error instanceof Error ? error.message : String(error)}`)
    );
    process.exit(1);
  }
}

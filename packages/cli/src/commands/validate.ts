/**
 * Validate Command
 * Checks that a .weft script parses
 */

import { compileFile, supportedFormats } from "@weft/core";
import chalk from "chalk";
import ora from "ora";
import { describeError } from "./io-helpers.js";

interface ValidateOptions {
  json?: boolean;
}

export async function validateCommand(scriptPath: string, options: ValidateOptions): Promise<void> {
  const spinner = ora({ text: `Validating ${scriptPath}...`, isSilent: options.json });
  spinner.start();

  try {
    const result = await compileFile(scriptPath);

    if (options.json) {
      console.log(JSON.stringify({ success: result.success, errors: result.errors }));
      if (!result.success) process.exit(1);
      return;
    }

    if (!result.success || !result.program) {
      spinner.fail(chalk.red(`${result.errors.length} error(s)`));
      for (const error of result.errors) {
        console.log(chalk.red(`  [${error.code}] ${error.message}`));
        if (error.line !== undefined) {
          console.log(chalk.dim(`    at line ${error.line}, column ${error.column ?? 1}`));
        }
      }
      console.log();
      console.log(chalk.red("✗ Validation failed"));
      process.exit(1);
    }

    spinner.succeed(chalk.green("✓ Script is valid"));

    const { header, statements } = result.program;
    const supported = new Set(supportedFormats());
    console.log();
    console.log(chalk.dim("Script info:"));
    console.log(chalk.dim(`  Version: ${header.version ?? "(no header)"}`));
    console.log(chalk.dim(`  Input: ${header.input.format}`));
    console.log(chalk.dim(`  Output: ${header.output.format}`));
    console.log(chalk.dim(`  Functions: ${statements.length}`));

    for (const spec of [header.input, header.output]) {
      if (spec.format !== "auto" && !supported.has(spec.format)) {
        console.log(chalk.yellow(`  Warning: format '${spec.format}' has no adapter in this build`));
      }
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to validate: ${describeError(error)}`));
    process.exit(1);
  }
}

/**
 * Transform Command
 * Runs a .weft script against an input document
 */

import { readFile, writeFile } from "node:fs/promises";
import {
  type FormatName,
  TraceLog,
  WeftError,
  runScript,
  toDiagnostic,
  toJS,
} from "@weft/core";
import chalk from "chalk";
import ora from "ora";
import { describeError, formatTraceEvent, parseVariables, readInput } from "./io-helpers.js";

interface TransformOptions {
  inputFormat?: FormatName;
  outputFormat?: FormatName;
  pretty?: boolean;
  output?: string;
  var?: string[];
  trace?: boolean;
  json?: boolean;
}

export async function transformCommand(
  scriptPath: string,
  inputPath: string | undefined,
  options: TransformOptions
): Promise<void> {
  const spinner = ora({ text: `Transforming with ${scriptPath}...`, isSilent: options.json });
  spinner.start();
  const trace = new TraceLog();

  try {
    const source = await readFile(scriptPath, "utf8");
    const inputText = await readInput(inputPath);

    const run = runScript(source, inputText, {
      inputFormat: options.inputFormat,
      outputFormat: options.outputFormat,
      pretty: options.pretty,
      variables: parseVariables(options.var),
      onTrace: options.trace ? (event) => trace.emit(event) : undefined,
    });

    spinner.succeed(chalk.green(`Transformed ${run.inputFormat} → ${run.outputFormat}`));
    printTrace(trace, options);

    if (options.json) {
      console.log(JSON.stringify({ success: true, result: toJS(run.result, { attributePrefix: "@" }) }));
      return;
    }

    if (options.output) {
      await writeFile(options.output, `${run.output}\n`);
      console.error(chalk.dim(`Output written to ${options.output}`));
    } else {
      console.log(run.output);
    }
  } catch (error) {
    spinner.fail(chalk.red("Transformation failed"));
    printTrace(trace, options);

    if (options.json) {
      const diagnostic =
        error instanceof WeftError
          ? toDiagnostic(error)
          : { code: "CLI_ERROR", message: describeError(error) };
      console.log(JSON.stringify({ success: false, errors: [diagnostic] }));
    } else {
      console.error(chalk.red(describeError(error)));
    }
    process.exit(1);
  }
}

function printTrace(trace: TraceLog, options: TransformOptions): void {
  if (!options.trace || options.json) return;
  for (const entry of trace.getEntries()) {
    console.error(chalk.dim(`  [${entry.id}] ${formatTraceEvent(entry.event)}`));
  }
}

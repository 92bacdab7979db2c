#!/usr/bin/env node
/**
 * Weft CLI
 * Command-line interface for running and checking transformation scripts
 */

import { Command, Option } from "commander";
import { functionsCommand } from "./commands/functions.js";
import { initCommand } from "./commands/init.js";
import { collect } from "./commands/io-helpers.js";
import { parseCommand } from "./commands/parse.js";
import { transformCommand } from "./commands/transform.js";
import { validateCommand } from "./commands/validate.js";

const FORMATS = ["auto", "json", "xml", "csv", "yaml"];

const program = new Command();

program
  .name("weft")
  .description("Transform tree-shaped data with Weft scripts")
  .version("0.1.0");

// Transform command
program
  .command("transform <script> [input]")
  .description("Run a script against an input document (stdin when no input file)")
  .addOption(
    new Option("--input-format <format>", "Override the header's input format").choices(FORMATS)
  )
  .addOption(
    new Option("--output-format <format>", "Override the header's output format").choices(FORMATS)
  )
  .option("--pretty", "Pretty print the output")
  .option("-o, --output <file>", "Write the output to a file")
  .option("--var <name=value>", "Bind a variable to a JSON value (repeatable)", collect, [])
  .option("--trace", "Print evaluation trace events")
  .option("--json", "Output results as JSON")
  .action(transformCommand);

// Validate command
program
  .command("validate <script>")
  .description("Check that a script parses")
  .option("--json", "Output results as JSON")
  .action(validateCommand);

// Parse command
program
  .command("parse <script>")
  .description("Print the syntax tree of a script as JSON")
  .option("-o, --output <file>", "Write the tree to a file")
  .option("--pretty", "Pretty print JSON output")
  .action(parseCommand);

// Functions command
program
  .command("functions")
  .description("List the standard function library")
  .option("--json", "Output results as JSON")
  .action(functionsCommand);

// Init command
program
  .command("init [dir]")
  .description("Create an example script and input document (default: ./weft)")
  .option("-f, --force", "Overwrite existing files")
  .action(initCommand);

// Parse and run
program.parse();
